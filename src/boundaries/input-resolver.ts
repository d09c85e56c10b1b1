import { METADATA_ENV_VAR, PACKAGE_ENV_VAR, STDIN_MARKER } from '../config/constants';
import { MissingInputError } from '../errors/index';
import type { EnvConfig } from '../schemas/env-schemas';

export type MetadataSource =
  | { type: 'file'; path: string }
  | { type: 'stdin' }
  | { type: 'inline'; text: string; origin: string };

export interface CheckRequest {
  source: MetadataSource;
  packageName: string;
}

export function sourceFromPath(metadataPath: string): MetadataSource {
  return metadataPath === STDIN_MARKER ? { type: 'stdin' } : { type: 'file', path: metadataPath };
}

/**
 * Work out what to query. Positional arguments win; the environment pair is
 * only consulted when no positional argument was given at all.
 */
export function resolveCheckRequest(
  args: ReadonlyArray<string | undefined>,
  env: EnvConfig
): CheckRequest {
  const positional = args.filter((arg): arg is string => arg !== undefined);

  if (positional.length > 0) {
    const [metadataPath, packageName] = positional;
    if (metadataPath === undefined || packageName === undefined) {
      throw new MissingInputError('expected a metadata file path and a package name');
    }
    return { source: sourceFromPath(metadataPath), packageName };
  }

  const text = env[METADATA_ENV_VAR];
  const packageName = env[PACKAGE_ENV_VAR];
  if (text === undefined || packageName === undefined) {
    throw new MissingInputError(
      `no metadata file path or package name given (or set ${METADATA_ENV_VAR} and ${PACKAGE_ENV_VAR})`
    );
  }
  return { source: { type: 'inline', text, origin: METADATA_ENV_VAR }, packageName };
}
