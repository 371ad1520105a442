/**
 * Chunk assembly for both serialization modes.
 */

import type { Cell, ChunkerOptions, Metadata, RawCell } from '../types/index.js';
import { cleanValue } from '../rows/index.js';
import { createFallbackChunk, formatMetadataText, formatStructuredChunk } from './format.js';
import { planWindows } from './window.js';

export interface ChunkSource {
    headers: readonly string[];
    rows: ReadonlyArray<ReadonlyArray<RawCell>>;
}

function cleanRows(rows: ReadonlyArray<ReadonlyArray<RawCell>>): Cell[][] {
    return rows.map((row) => row.map(cleanValue));
}

/**
 * Normal mode: a metadata-only chunk, then one structured chunk per window.
 * Row indices in each chunk are absolute and inclusive.
 */
export function chunkNormal(metadata: Metadata, table: ChunkSource, options: ChunkerOptions): string[] {
    const chunks = [formatMetadataText(metadata)];
    const windows = planWindows(table.rows.length, options.chunkSize, options.overlap, 'normal');

    for (const { start, end } of windows) {
        const rows = cleanRows(table.rows.slice(start, end));
        chunks.push(formatStructuredChunk(metadata, table.headers, rows, start, end - 1));
    }

    return chunks;
}

/**
 * Fallback mode: flat blocks only, no metadata-only chunk, windows never overlap.
 */
export function chunkFallback(metadata: Metadata, table: ChunkSource, options: ChunkerOptions): string[] {
    return planWindows(table.rows.length, options.chunkSize, options.overlap, 'fallback')
        .map(({ start, end }) => createFallbackChunk(metadata, table.headers, cleanRows(table.rows.slice(start, end))));
}
