/**
 * Multi-row cell reconstruction.
 */

import type { ColumnMap, RawCell, Row } from '../types/index.js';
import { isContinuationRow } from './classify.js';
import { cellFor, roleIndex } from './cells.js';

const LINE_BREAK = /\r?\n/;

function hasLineBreak(row: ReadonlyArray<RawCell>): boolean {
    return row.some((cell) => typeof cell === 'string' && LINE_BREAK.test(cell));
}

/**
 * Split cells holding embedded line breaks into one row per line.
 *
 * Each cell is split into its non-blank trimmed lines; shorter lists are padded
 * with '' to the longest, one row is emitted per line index, and rows that end
 * up entirely empty are dropped. Rows without line breaks pass through.
 *
 * @example
 * splitMultilineCells([['01/01\n02/01', 'A\nB', '', '10\n20', '']])
 * // [['01/01', 'A', '', '10', ''], ['02/01', 'B', '', '20', '']]
 */
export function splitMultilineCells(table: ReadonlyArray<ReadonlyArray<RawCell>>): Row[] {
    const expanded: Row[] = [];

    for (const row of table) {
        if (!hasLineBreak(row)) {
            expanded.push(row.map((cell) => cell ?? null));
            continue;
        }

        let maxSplits = 0;
        const splitCells = row.map((cell) => {
            if (typeof cell !== 'string' || cell.trim() === '') {
                return [''];
            }
            const parts = cell.split(LINE_BREAK).map((s) => s.trim()).filter((s) => s !== '');
            maxSplits = Math.max(maxSplits, parts.length);
            return parts.length > 0 ? parts : [''];
        });

        for (let i = 0; i < maxSplits; i++) {
            const newRow = splitCells.map((parts) => parts[i] ?? '');
            if (newRow.some((value) => value.trim() !== '')) {
                expanded.push(newRow);
            }
        }
    }

    return expanded;
}

/**
 * Fold continuation rows into the transaction above them.
 *
 * Single forward pass: a continuation row (other than the first row) appends
 * its narration to the narration of the last row already emitted and is then
 * dropped, so chained continuations accumulate on the same transaction.
 */
export function mergeContinuationRows(table: ReadonlyArray<ReadonlyArray<RawCell>>, columnMap: ColumnMap): Row[] {
    const narrationIdx = roleIndex(columnMap, 'narration');
    const merged: Row[] = [];

    for (const row of table) {
        const target = merged[merged.length - 1];
        if (target !== undefined && narrationIdx !== undefined && isContinuationRow(row, columnMap)) {
            const text = (cellFor(row, columnMap, 'narration') ?? '').trim();
            const previous = target[narrationIdx];
            target[narrationIdx] = previous ? `${previous} ${text}` : text;
            continue;
        }
        merged.push(row.map((cell) => cell ?? null));
    }

    return merged;
}
