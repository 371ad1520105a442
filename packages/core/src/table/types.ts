/**
 * Internal types for table assembly.
 */

import type { ColumnMap, RawGrid, Row } from '../types/index.js';

/**
 * What the PDF extractor yields for one page.
 */
export interface PageContent {
    /** 1-indexed page number */
    pageNumber: number;
    /** Detected tables, in page order */
    tables: RawGrid[];
    /** One pseudo-row per visual line, one cell per word; used when the page has no table */
    wordRows: RawGrid;
    /** Text outside any detected table */
    textLines: string[];
    /** Full page text, one entry per visual line */
    lines: string[];
}

/**
 * A table that survived row filtering, still tagged with where it came from.
 */
export interface TableSegment {
    page: number;
    tableIndex: number;
    headers: string[];
    columnMap: ColumnMap;
    rows: Row[];
}

/**
 * Outcome of the majority column-count vote.
 */
export interface ColumnVote {
    /** Winning column count, or null when there were no segments */
    columnCount: number | null;
    kept: TableSegment[];
    discarded: TableSegment[];
}
