import type { Metadata } from '../types/index.js';

/**
 * Turn `key: value` lines into ordered metadata. Lines without a colon, or
 * with nothing before it, are ignored.
 */
export function extractMetadata(lines: readonly string[]): Metadata {
    const metadata: Metadata = new Map();
    for (const line of lines) {
        const colon = line.indexOf(':');
        if (colon < 0) {
            continue;
        }
        const key = line.slice(0, colon).trim();
        if (key !== '') {
            metadata.set(key, line.slice(colon + 1).trim());
        }
    }
    return metadata;
}
