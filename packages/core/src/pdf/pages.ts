/**
 * Per-page content assembly: tables, word rows and text lines.
 */

import { HEADER_DETECTION } from '../types/index.js';
import { countNonEmpty, isHeaderRow } from '../columns/index.js';
import type { PageContent } from '../table/index.js';
import {
    buildLineText,
    detectColumnsFromHeader,
    groupByRows,
    mapRowToColumns,
    mergeHeaderFragments,
} from './layout.js';
import type { ColumnBand, LayoutRow, TextItem } from './layout.js';

/**
 * A layout row qualifies as a header under the same test the grid locator
 * uses: at least three cells, enough of them naming a known column.
 */
export function isHeaderLayoutRow(row: LayoutRow): boolean {
    const cells = mergeHeaderFragments(row.items).map((item) => item.str);
    return countNonEmpty(cells) >= HEADER_DETECTION.MIN_NON_EMPTY_CELLS && isHeaderRow(cells);
}

/**
 * Anchors carried over from an earlier page only apply when at least one
 * row actually spreads across the bands.
 */
function fitsBands(grid: ReadonlyArray<ReadonlyArray<string>>): boolean {
    return grid.some((row) => countNonEmpty(row) >= HEADER_DETECTION.MIN_NON_EMPTY_CELLS);
}

/**
 * Split positioned items into one PageContent per page.
 *
 * A page's first header row defines column bands; that row and everything
 * below it become the page's table and everything above it the page's text
 * lines. A page without a header reuses the most recent bands.
 *
 * @param pageCount - Pages in the document; pages without items still get an entry
 */
export function buildPageContents(items: readonly TextItem[], pageCount: number): PageContent[] {
    const rows = groupByRows(items);
    const pages: PageContent[] = [];
    let bands: ColumnBand[] | null = null;

    for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
        const pageRows = rows.filter((row) => row.page === pageNumber);
        const lines = pageRows.map((row) => buildLineText(row.items)).filter((line) => line !== '');
        const wordRows = pageRows.map((row) => row.items.map((item) => item.str));

        const headerIdx = pageRows.findIndex(isHeaderLayoutRow);
        let textRows: LayoutRow[] = pageRows;
        const tables: string[][][] = [];

        if (headerIdx >= 0) {
            bands = detectColumnsFromHeader(pageRows[headerIdx]);
            textRows = pageRows.slice(0, headerIdx);
            const activeBands = bands;
            tables.push(pageRows.slice(headerIdx).map((row) => mapRowToColumns(row, activeBands)));
        } else if (bands !== null) {
            const activeBands = bands;
            const grid = pageRows.map((row) => mapRowToColumns(row, activeBands));
            if (fitsBands(grid)) {
                tables.push(grid);
                textRows = [];
            }
        }

        pages.push({
            pageNumber,
            tables,
            wordRows,
            textLines: textRows.map((row) => buildLineText(row.items)).filter((line) => line !== ''),
            lines,
        });
    }

    return pages;
}
