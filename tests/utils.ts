import { writeFileSync } from 'fs';
import path from 'path';

/**
 * Builds a metadata document with one package per entry; each inner array is
 * the kind set of one target.
 */
export function createMetadata(packages: Array<[name: string, targetKinds: string[][]]>): {
    packages: Array<{ name: string; targets: Array<{ kind: string[] }> }>;
} {
    return {
        packages: packages.map(([name, targetKinds]) => ({
            name,
            targets: targetKinds.map((kind) => ({ kind })),
        })),
    };
}

export function writeMetadataFile(dir: string, contents: unknown, filename = 'metadata.json'): string {
    const filePath = path.join(dir, filename);
    writeFileSync(filePath, typeof contents === 'string' ? contents : JSON.stringify(contents));
    return filePath;
}
