/**
 * Multi-page table assembly for PDF statements.
 *
 * The first table of the document fixes the schema (normalized headers and
 * column map); every later table and page is read under that schema. After
 * all pages are read, tables whose column count disagrees with the majority
 * are discarded so a single mis-scanned table cannot corrupt the result.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Diagnostics are returned as warnings.
 */

import type { NormalizedTable, RawCell, RawGrid, Row } from '../types/index.js';
import { isHeaderRow, locateHeader, normalizeHeaders } from '../columns/index.js';
import type { NormalizedHeaders } from '../columns/index.js';
import {
    cleanValue,
    isContinuationRow,
    isFooterRow,
    isTransactionRow,
    mergeContinuationRows,
    reconcileDebitCredit,
    splitMultilineCells,
} from '../rows/index.js';
import type { ColumnVote, PageContent, TableSegment } from './types.js';

export interface SegmentCollection {
    segments: TableSegment[];
    warnings: string[];
}

export interface AssemblyResult {
    table: NormalizedTable | null;
    warnings: string[];
}

/**
 * Pad with nulls or truncate a row to the header length. Empty strings become null.
 */
export function padRow(row: ReadonlyArray<RawCell>, length: number): Row {
    const padded: Row = [];
    for (let i = 0; i < length; i++) {
        const cell = row[i];
        padded.push(cell === undefined || cell === '' ? null : cell);
    }
    return padded;
}

/**
 * Read every page's tables into row-filtered segments under one global schema.
 *
 * A page without tables falls back to its word pseudo-rows, but only once a
 * schema exists. A later table whose first row repeats the header skips it.
 * Footer rows and rows that are neither transactions nor continuations are
 * dropped silently.
 */
export function collectSegments(pages: readonly PageContent[]): SegmentCollection {
    const segments: TableSegment[] = [];
    const warnings: string[] = [];
    let schema: NormalizedHeaders | null = null;

    for (const page of pages) {
        let grids: RawGrid[] = page.tables;

        if (grids.length === 0 && schema !== null && page.wordRows.length > 0) {
            const pseudoRows = page.wordRows.filter((row) => !isFooterRow(row));
            if (pseudoRows.length > 0) {
                warnings.push(`Page ${page.pageNumber}: no table found, reconstructed ${pseudoRows.length} rows from words`);
                grids = [pseudoRows];
            }
        }

        for (let tableIndex = 0; tableIndex < grids.length; tableIndex++) {
            const grid = grids[tableIndex];
            if (grid.length === 0) {
                continue;
            }

            let dataRows: RawGrid;
            if (schema === null) {
                const header = locateHeader(grid);
                dataRows = grid.slice(header.index + 1);
                if (dataRows.length === 0) {
                    warnings.push(`Page ${page.pageNumber}, table ${tableIndex}: no data rows after header`);
                    continue;
                }
                schema = normalizeHeaders(header.headers, 'pdf');
            } else {
                dataRows = isHeaderRow(grid[0]) ? grid.slice(1) : grid;
            }

            if (dataRows.length === 0) {
                continue;
            }

            const { headers, columnMap } = schema;
            const rows = dataRows
                .map((row) => padRow(row, headers.length))
                .filter((row) => !isFooterRow(row))
                .filter((row) => isTransactionRow(row, columnMap) || isContinuationRow(row, columnMap));

            if (rows.length === 0) {
                warnings.push(`Page ${page.pageNumber}, table ${tableIndex}: no valid rows`);
                continue;
            }

            segments.push({
                page: page.pageNumber,
                tableIndex,
                headers: [...headers],
                columnMap: { ...columnMap },
                rows,
            });
        }
    }

    return { segments, warnings };
}

/**
 * Keep only the segments whose column count matches the most common one.
 * Ties go to the count seen first.
 */
export function voteColumnCount(segments: readonly TableSegment[]): ColumnVote {
    const tally = new Map<number, number>();
    for (const segment of segments) {
        const count = segment.headers.length;
        tally.set(count, (tally.get(count) ?? 0) + 1);
    }

    let columnCount: number | null = null;
    let best = 0;
    for (const [count, occurrences] of tally) {
        if (occurrences > best) {
            best = occurrences;
            columnCount = count;
        }
    }

    const kept = segments.filter((s) => s.headers.length === columnCount);
    const discarded = segments.filter((s) => s.headers.length !== columnCount);
    return { columnCount, kept, discarded };
}

/**
 * Re-order a segment's rows into the target header order by column name.
 * Columns missing from the source read as null.
 */
export function alignRows(rows: readonly Row[], from: readonly string[], to: readonly string[]): Row[] {
    if (from.length === to.length && from.every((h, i) => h === to[i])) {
        return rows.map((row) => [...row]);
    }
    const positions = to.map((header) => from.indexOf(header));
    return rows.map((row) => positions.map((pos) => (pos >= 0 ? row[pos] ?? null : null)));
}

/**
 * Assemble all pages into one combined transaction table.
 *
 * Each surviving segment goes through split → merge → reconcile before the
 * segments are concatenated in page order. Cells come out trimmed, with
 * blanks as null.
 *
 * @returns The combined table, or null when no rows survive
 */
export function assembleTables(pages: readonly PageContent[]): AssemblyResult {
    const { segments, warnings } = collectSegments(pages);
    if (segments.length === 0) {
        warnings.push('No tables extracted');
        return { table: null, warnings };
    }

    const vote = voteColumnCount(segments);
    if (vote.discarded.length > 0) {
        const pagesList = vote.discarded.map((s) => `${s.page}:${s.tableIndex}`).join(', ');
        warnings.push(
            `Discarded ${vote.discarded.length} table(s) whose column count differs from the majority ` +
            `(${vote.columnCount}): ${pagesList}`
        );
    }

    if (vote.kept.length === 0) {
        return { table: null, warnings };
    }
    const first = vote.kept[0];

    const rows: Row[] = [];
    for (const segment of vote.kept) {
        const split = splitMultilineCells(segment.rows);
        const merged = mergeContinuationRows(split, segment.columnMap);
        const reconciled = reconcileDebitCredit(merged, segment.columnMap);
        if (reconciled.length === 0) {
            continue;
        }
        for (const row of alignRows(reconciled, segment.headers, first.headers)) {
            rows.push(row.map(cleanValue));
        }
    }

    if (rows.length === 0) {
        warnings.push('No rows remaining after cleaning');
        return { table: null, warnings };
    }

    return {
        table: { headers: first.headers, columnMap: first.columnMap, rows },
        warnings,
    };
}
