import { LIB_TARGET_KIND } from '../config/constants';
import type { MetadataDocument, MetadataPackage } from '../schemas/metadata-schemas';

/**
 * First package whose name matches exactly. Later packages with the same
 * name are never consulted.
 */
export function findPackage(document: MetadataDocument, packageName: string): MetadataPackage | undefined {
  return document.packages.find((pkg) => pkg.name === packageName);
}

export function hasTargetKind(document: MetadataDocument, packageName: string, kind: string): boolean {
  const pkg = findPackage(document, packageName);
  if (!pkg) return false;
  return pkg.targets.some((target) => target.kind.includes(kind));
}

export function hasLibTarget(document: MetadataDocument, packageName: string): boolean {
  return hasTargetKind(document, packageName, LIB_TARGET_KIND);
}
