/**
 * Generic grid reader used when line-oriented parsing finds nothing, and
 * for recovery after a failure.
 */

import { TRANSACTION_INDICATORS } from '../types/index.js';
import type { Cell, Metadata, TabularFormat } from '../types/index.js';
import { cleanHeaderCells, countNonEmpty, makeHeadersUnique } from '../columns/index.js';
import { padRow } from '../table/index.js';
import { extractMetadata } from './metadata.js';
import { readGrid } from './read.js';

/**
 * How many leading body rows may hold metadata.
 */
const METADATA_SCAN_ROWS = 10;

export interface GenericTable {
    metadata: Metadata;
    /** Raw header text: blanks become Column_<i>, repeats get numeric suffixes */
    headers: string[];
    rows: Cell[][];
}

/**
 * Carve leading `key: value` rows off the body.
 *
 * Rows whose joined text has a colon and no comma are metadata, and the
 * body starts after the last one seen. Scanning stops at the first row that
 * mentions a transaction column.
 */
export function carveMetadataRows(body: readonly (readonly Cell[])[]): { metadataLines: string[]; start: number } {
    const metadataLines: string[] = [];
    let start = 0;

    for (let idx = 0; idx < Math.min(METADATA_SCAN_ROWS, body.length); idx++) {
        const text = body[idx].filter((cell): cell is string => cell !== null && cell !== '').join(' ');
        if (text.includes(':') && !text.includes(',')) {
            metadataLines.push(text);
            start = idx + 1;
        } else if (TRANSACTION_INDICATORS.some((keyword) => text.toLowerCase().includes(keyword))) {
            break;
        }
    }

    return { metadataLines, start };
}

/**
 * Read the first sheet as-is: first row is the header, fully blank rows are
 * dropped, leading metadata rows are carved off. Rows are not classified.
 *
 * @returns null when the source holds no rows at all
 */
export function readGenericTable(data: ArrayBuffer, format: TabularFormat): GenericTable | null {
    const grid = readGrid(data, format);
    if (grid.length === 0) {
        return null;
    }
    const headerRow = grid[0];

    const body = grid.slice(1).filter((row) => countNonEmpty(row) > 0);
    const width = body.reduce((max, row) => Math.max(max, row.length), headerRow.length);
    const headers = makeHeadersUnique(cleanHeaderCells(padRow(headerRow, width)));

    const { metadataLines, start } = carveMetadataRows(body);
    const rows = body.slice(start).map((row) => padRow(row, width));

    return { metadata: extractMetadata(metadataLines), headers, rows };
}
