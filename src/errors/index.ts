import type { ZodIssue } from 'zod';

// Base error class for all has-lib-target errors
export class HasLibTargetError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'HasLibTargetError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends HasLibTargetError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Neither positional arguments nor the environment name a complete query
export class MissingInputError extends HasLibTargetError {
  constructor(message: string) {
    super(message, 'MISSING_INPUT');
    this.name = 'MissingInputError';
  }
}

// Metadata file is absent, unreadable or not a file
export class MetadataReadError extends HasLibTargetError {
  constructor(message: string, public readonly path: string) {
    super(message, 'METADATA_READ_ERROR');
    this.name = 'MetadataReadError';
  }
}

// Metadata text is not valid JSON
export class MetadataParseError extends HasLibTargetError {
  constructor(message: string, public readonly source: string) {
    super(message, 'METADATA_PARSE_ERROR');
    this.name = 'MetadataParseError';
  }
}

// Metadata parsed but the consulted fields have the wrong shape
export class MetadataSchemaError extends HasLibTargetError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: readonly ZodIssue[]
  ) {
    super(message, 'METADATA_SCHEMA_ERROR');
    this.name = 'MetadataSchemaError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
