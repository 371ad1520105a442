/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    ColumnRole,
    ColumnMap,
    ChunkerOptions,
    ChunkerOptionsInput,
    Metadata,
    NormalizedTable,
    ProcessingResult,
} from '@statement-chunker/shared';

export {
    ChunkerOptionsSchema,
    COLUMN_PATTERNS,
    STANDARD_NAMES,
    STANDARD_NAMES_TABULAR,
    HEADER_INDICATORS,
    HEADER_DETECTION,
    FOOTER_KEYWORDS,
    TRANSACTION_INDICATORS,
    TEXT_SPLITTER,
    FALLBACK_MARKER,
    PDF_LAYOUT,
    UnsupportedFormatError,
} from '@statement-chunker/shared';

/**
 * A single cell as it arrives from an extractor: absent, blank or text.
 */
export type RawCell = string | null | undefined;

/**
 * Ordered rows of ordered, possibly-absent cells. Transient, one per table/page.
 */
export type RawGrid = ReadonlyArray<ReadonlyArray<RawCell>>;

/**
 * A cleaned cell: trimmed-or-original text, or null when empty.
 */
export type Cell = string | null;

/**
 * A row aligned to the normalized header.
 */
export type Row = Cell[];

/**
 * Supported input formats, keyed by file extension.
 */
export type StatementFormat = 'pdf' | 'csv' | 'xlsx' | 'xls';

export type TabularFormat = Exclude<StatementFormat, 'pdf'>;
