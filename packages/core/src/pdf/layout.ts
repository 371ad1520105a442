/**
 * Row and column reconstruction from positioned PDF text items.
 * PDF user space: larger y is higher on the page.
 */

import { PDF_LAYOUT } from '../types/index.js';

/**
 * A text item with its position on the page.
 */
export interface TextItem {
    str: string;
    /** Left edge */
    x: number;
    /** Baseline */
    y: number;
    width: number;
    height: number;
    /** 1-indexed */
    page: number;
}

/**
 * Items sharing a visual line, sorted left to right.
 */
export interface LayoutRow {
    y: number;
    page: number;
    items: TextItem[];
}

/**
 * Horizontal extent of one column, derived from the header.
 */
export interface ColumnBand {
    name: string;
    left: number;
    right: number;
}

function createRow(items: TextItem[], page: number): LayoutRow {
    const sorted = [...items].sort((a, b) => a.x - b.x);
    const y = items.reduce((sum, item) => sum + item.y, 0) / items.length;
    return { y, page, items: sorted };
}

/**
 * Group text items into visual rows by y proximity.
 *
 * @param yTolerance - Items within this distance of a row's first item join that row
 * @returns Rows ordered by page, then top to bottom
 */
export function groupByRows(items: readonly TextItem[], yTolerance: number = PDF_LAYOUT.ROW_Y_TOLERANCE): LayoutRow[] {
    const byPage = new Map<number, TextItem[]>();
    for (const item of items) {
        const pageItems = byPage.get(item.page) ?? [];
        pageItems.push(item);
        byPage.set(item.page, pageItems);
    }

    const rows: LayoutRow[] = [];
    const pageNumbers = [...byPage.keys()].sort((a, b) => a - b);

    for (const page of pageNumbers) {
        const sorted = [...(byPage.get(page) ?? [])].sort((a, b) => (b.y - a.y) || (a.x - b.x));
        let current: TextItem[] = [];
        let currentY = 0;

        for (const item of sorted) {
            if (current.length > 0 && Math.abs(item.y - currentY) <= yTolerance) {
                current.push(item);
                continue;
            }
            if (current.length > 0) {
                rows.push(createRow(current, page));
            }
            current = [item];
            currentY = item.y;
        }

        if (current.length > 0) {
            rows.push(createRow(current, page));
        }
    }

    return rows;
}

/**
 * Join a row's items into text. A wide gap becomes a tab, a narrow one a space,
 * and touching items are glued.
 */
export function buildLineText(items: readonly TextItem[]): string {
    const sorted = [...items].sort((a, b) => a.x - b.x);
    let out = '';
    let prevEnd: number | null = null;

    for (const item of sorted) {
        if (item.str === '') {
            continue;
        }
        if (prevEnd !== null) {
            const gap = item.x - prevEnd;
            if (gap > PDF_LAYOUT.COLUMN_GAP) {
                out += '\t';
            } else if (gap > PDF_LAYOUT.SPACE_GAP) {
                out += ' ';
            }
        }
        out += item.str;
        prevEnd = item.x + item.width;
    }

    return out.replace(/[ \t]+$/, '');
}

/**
 * Merge header fragments that sit closer than HEADER_WORD_GAP, so
 * "Value" + "Dt" form one header cell.
 */
export function mergeHeaderFragments(items: readonly TextItem[]): TextItem[] {
    const merged: TextItem[] = [];
    for (const item of [...items].sort((a, b) => a.x - b.x)) {
        const last = merged[merged.length - 1];
        if (last !== undefined && item.x - (last.x + last.width) <= PDF_LAYOUT.HEADER_WORD_GAP) {
            merged[merged.length - 1] = {
                ...last,
                str: `${last.str} ${item.str}`,
                width: item.x + item.width - last.x,
            };
            continue;
        }
        merged.push({ ...item });
    }
    return merged;
}

/**
 * Derive column bands from a header row.
 *
 * Each boundary sits halfway between the centres of neighbouring header
 * cells; the outer bands are open-ended.
 */
export function detectColumnsFromHeader(row: LayoutRow): ColumnBand[] {
    const cells = mergeHeaderFragments(row.items);
    const centres = cells.map((cell) => cell.x + cell.width / 2);

    return cells.map((cell, i) => ({
        name: cell.str.trim(),
        left: i === 0 ? Number.NEGATIVE_INFINITY : (centres[i - 1] + centres[i]) / 2,
        right: i === cells.length - 1 ? Number.POSITIVE_INFINITY : (centres[i] + centres[i + 1]) / 2,
    }));
}

/**
 * Place each item of a row into the band containing its centre.
 * Several items in one band are joined with a space; empty bands read ''.
 */
export function mapRowToColumns(row: LayoutRow, bands: readonly ColumnBand[]): string[] {
    const cells = bands.map(() => '');
    for (const item of row.items) {
        const centre = item.x + item.width / 2;
        const idx = bands.findIndex((band) => centre >= band.left && centre < band.right);
        if (idx < 0) {
            continue;
        }
        cells[idx] = cells[idx] === '' ? item.str : `${cells[idx]} ${item.str}`;
    }
    return cells;
}
