import { createHash } from 'node:crypto';
import { basename } from 'node:path';

export interface HashedFile {
    name: string;
    hash: string;
}

/**
 * SHA-256 of file contents already in memory, prefixed with 'sha256:'.
 * Input files are read once; the same bytes are parsed and hashed.
 */
export function hashContent(filePath: string, content: Uint8Array | string): HashedFile {
    const hash = createHash('sha256').update(content).digest('hex');
    return { name: basename(filePath), hash: `sha256:${hash}` };
}
