/**
 * Chunk text serialization.
 *
 * Two layouts: the structured block used in normal mode, and the flat
 * "Statement of account" block used whenever the table is unreliable.
 */

import { FALLBACK_MARKER } from '../types/index.js';
import type { Cell, Metadata } from '../types/index.js';

/**
 * One `key: value` line per metadata entry, in insertion order.
 */
export function formatMetadataText(metadata: Metadata): string {
    const lines: string[] = [];
    for (const [key, value] of metadata) {
        lines.push(`${key}: ${value}`);
    }
    return lines.join('\n');
}

/**
 * Space-joined header line followed by one space-joined line per row.
 * Null cells render as ''. Empty when there are no headers or no rows.
 */
export function formatTransactionText(headers: readonly string[], rows: ReadonlyArray<ReadonlyArray<Cell>>): string {
    if (headers.length === 0 || rows.length === 0) {
        return '';
    }
    const lines = [headers.join(' ')];
    for (const row of rows) {
        lines.push(row.map((cell) => cell ?? '').join(' '));
    }
    return lines.join('\n');
}

/**
 * Flat fallback block: metadata lines, then the marker and the rows.
 */
export function createFallbackChunk(
    metadata: Metadata,
    headers: readonly string[],
    rows: ReadonlyArray<ReadonlyArray<Cell>>
): string {
    const parts: string[] = [];
    if (metadata.size > 0) {
        parts.push(formatMetadataText(metadata));
    }
    if (headers.length > 0 && rows.length > 0) {
        parts.push(FALLBACK_MARKER);
        parts.push(formatTransactionText(headers, rows));
    }
    return parts.join('\n');
}

/**
 * Structured block for one window of rows.
 *
 * Keys, values and cells are written as JSON literals, so a missing cell
 * reads `null` and embedded quotes stay unambiguous.
 *
 * @example
 * metadata:
 *   "Account": "123"
 * headers[2]: Date,Narration
 * rows[1]:
 *   - [2]: "01/01/2024",null
 * row_indices[2]: 0,0
 * num_transactions: 1
 *
 * @param start - Absolute index of the first row in the combined table
 * @param end - Absolute index of the last row (inclusive)
 */
export function formatStructuredChunk(
    metadata: Metadata,
    headers: readonly string[],
    rows: ReadonlyArray<ReadonlyArray<Cell>>,
    start: number,
    end: number
): string {
    const parts: string[] = ['metadata:'];
    for (const [key, value] of metadata) {
        parts.push(`  ${JSON.stringify(key)}: ${JSON.stringify(value)}`);
    }
    parts.push(`headers[${headers.length}]: ${headers.join(',')}`);
    parts.push(`rows[${rows.length}]:`);
    for (const row of rows) {
        parts.push(`  - [${headers.length}]: ${row.map((cell) => JSON.stringify(cell)).join(',')}`);
    }
    parts.push(`row_indices[2]: ${start},${end}`);
    parts.push(`num_transactions: ${rows.length}`);
    return parts.join('\n');
}
