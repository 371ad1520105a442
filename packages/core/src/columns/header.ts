/**
 * Header row location inside a raw grid or a delimited text line.
 */

import { HEADER_DETECTION, HEADER_INDICATORS } from '../types/index.js';
import type { RawCell, RawGrid } from '../types/index.js';
import { classifyColumn } from './classify.js';

/**
 * Located header: row index within the grid plus cleaned header cells.
 */
export interface HeaderLocation {
    index: number;
    headers: string[];
}

function isBlank(cell: RawCell): boolean {
    return cell === null || cell === undefined || cell.trim() === '';
}

/**
 * Count cells holding non-whitespace text.
 */
export function countNonEmpty(row: ReadonlyArray<RawCell>): number {
    return row.filter((cell) => !isBlank(cell)).length;
}

/**
 * Test whether a row looks like a table header.
 *
 * - A text line qualifies with at least three of the fixed indicator substrings.
 * - A cell list qualifies when at least 40% of its non-empty cells classify to a known role.
 */
export function isHeaderRow(row: string | ReadonlyArray<RawCell>): boolean {
    if (typeof row === 'string') {
        const lower = row.toLowerCase();
        const matches = HEADER_INDICATORS.filter((indicator) => lower.includes(indicator)).length;
        return matches >= HEADER_DETECTION.MIN_INDICATORS;
    }

    const nonEmpty = countNonEmpty(row);
    if (nonEmpty === 0) {
        return false;
    }
    const known = row.filter((cell) => classifyColumn(cell) !== 'unknown').length;
    return known >= nonEmpty * HEADER_DETECTION.MIN_KNOWN_RATIO;
}

/**
 * Replace blank header cells with Column_<index>; trim the rest.
 */
export function cleanHeaderCells(row: ReadonlyArray<RawCell>): string[] {
    return row.map((cell, i) => (isBlank(cell) ? `Column_${i}` : String(cell).trim()));
}

/**
 * Find the header row of a raw table.
 *
 * Scans the first 10 rows, skipping rows with fewer than 3 non-empty cells;
 * the first qualifying row wins. Without one, the row with the most non-empty
 * cells among the first 5 is used (row 0 on ties or an empty grid).
 */
export function locateHeader(grid: RawGrid): HeaderLocation {
    const scan = grid.slice(0, HEADER_DETECTION.SCAN_ROWS);
    for (let i = 0; i < scan.length; i++) {
        const row = scan[i];
        if (row.length === 0 || countNonEmpty(row) < HEADER_DETECTION.MIN_NON_EMPTY_CELLS) {
            continue;
        }
        if (isHeaderRow(row)) {
            return { index: i, headers: cleanHeaderCells(row) };
        }
    }

    let bestIndex = 0;
    let bestCount = 0;
    const fallbackScan = grid.slice(0, HEADER_DETECTION.FALLBACK_SCAN_ROWS);
    for (let i = 0; i < fallbackScan.length; i++) {
        const count = countNonEmpty(fallbackScan[i]);
        if (count > bestCount) {
            bestCount = count;
            bestIndex = i;
        }
    }

    return { index: bestIndex, headers: cleanHeaderCells(grid[bestIndex] ?? []) };
}
