import { z } from 'zod';
import { CHECK_OPTIONS_SCHEMA, type CheckOptions } from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseCheckOptions(raw: unknown): CheckOptions {
  try {
    return CHECK_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const fieldErrors = e.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid check options: ${fieldErrors.join(', ')}`);
    }
    const err = handleUnknownError(e, 'Check option parsing');
    throw new ValidationError(`Check option parsing failed: ${err.message}`);
  }
}
