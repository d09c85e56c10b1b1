import { z } from 'zod';
import { METADATA_ENV_VAR, PACKAGE_ENV_VAR } from '../config/constants';

// An exported-but-empty variable counts as unset
const OPTIONAL_ENV_VALUE = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

export const ENV_SCHEMA = z.object({
  [METADATA_ENV_VAR]: OPTIONAL_ENV_VALUE,
  [PACKAGE_ENV_VAR]: OPTIONAL_ENV_VALUE,
});

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
