import { z } from 'zod';
import { LIB_TARGET_KIND } from '../config/constants';

// Check command options schema for command line argument validation
export const CHECK_OPTIONS_SCHEMA = z.object({
  kind: z.string().min(1).default(LIB_TARGET_KIND),
  quiet: z.boolean().default(false),
});

// Inferred types
export type CheckOptions = z.infer<typeof CHECK_OPTIONS_SCHEMA>;
