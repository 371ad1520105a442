import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/**
 * SHA-256 of a byte buffer, prefixed with 'sha256:'.
 */
export function hashContent(content: Uint8Array): string {
    return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}

/**
 * Computes a SHA-256 hash of a file's content.
 */
export async function hashFile(filePath: string): Promise<string> {
    return hashContent(await readFile(filePath));
}
