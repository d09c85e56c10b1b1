import { readFileSync } from 'fs';
import { z } from 'zod';
import { METADATA_DOCUMENT_SCHEMA, type MetadataDocument } from '../schemas/metadata-schemas';
import {
  MetadataParseError,
  MetadataReadError,
  MetadataSchemaError,
  handleUnknownError,
} from '../errors/index';
import type { MetadataSource } from './input-resolver';

export type StdinReader = () => string;

export const readProcessStdin: StdinReader = () => readFileSync(0, 'utf-8');

export function describeSource(source: MetadataSource): string {
  switch (source.type) {
    case 'file':
      return source.path;
    case 'stdin':
      return 'stdin';
    case 'inline':
      return source.origin;
  }
}

export function readMetadataSource(source: MetadataSource, readStdin: StdinReader = readProcessStdin): string {
  switch (source.type) {
    case 'inline':
      return source.text;
    case 'stdin':
      try {
        return readStdin();
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Reading stdin');
        throw new MetadataReadError(`Cannot read metadata from stdin: ${err.message}`, 'stdin');
      }
    case 'file':
      try {
        return readFileSync(source.path, 'utf-8');
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Reading metadata file');
        throw new MetadataReadError(`Cannot read metadata file ${source.path}: ${err.message}`, source.path);
      }
  }
}

function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join(', ');
}

export function parseMetadata(text: string, sourceLabel: string): MetadataDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing metadata');
    throw new MetadataParseError(`Metadata from ${sourceLabel} is not valid JSON: ${err.message}`, sourceLabel);
  }

  const parsed = METADATA_DOCUMENT_SCHEMA.safeParse(raw);
  if (!parsed.success) {
    throw new MetadataSchemaError(
      `Metadata from ${sourceLabel} does not match the expected shape: ${formatIssues(parsed.error.issues)}`,
      sourceLabel,
      parsed.error.issues
    );
  }
  return parsed.data;
}

/**
 * Read and validate a metadata document from a file, stdin or the environment.
 */
export function loadMetadata(source: MetadataSource, readStdin: StdinReader = readProcessStdin): MetadataDocument {
  const text = readMetadataSource(source, readStdin);
  return parseMetadata(text, describeSource(source));
}
