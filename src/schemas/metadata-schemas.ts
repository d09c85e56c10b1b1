import { z } from 'zod';

// Only the fields the lookup consults are checked; everything else passes through untouched.
export const METADATA_TARGET_SCHEMA = z
  .object({
    kind: z.array(z.string()),
  })
  .passthrough();

export const METADATA_PACKAGE_SCHEMA = z
  .object({
    name: z.string(),
    targets: z.array(METADATA_TARGET_SCHEMA),
  })
  .passthrough();

export const METADATA_DOCUMENT_SCHEMA = z
  .object({
    packages: z.array(METADATA_PACKAGE_SCHEMA),
  })
  .passthrough();

// Inferred types
export type MetadataTarget = z.infer<typeof METADATA_TARGET_SCHEMA>;
export type MetadataPackage = z.infer<typeof METADATA_PACKAGE_SCHEMA>;
export type MetadataDocument = z.infer<typeof METADATA_DOCUMENT_SCHEMA>;
