/**
 * Constants for Statement Chunker.
 * Keyword tables, canonical labels and numeric defaults shared by all packages.
 */

import type { ColumnRole } from './schemas.js';

/**
 * Keyword table for column classification.
 *
 * ORDER MATTERS: a header is assigned the FIRST role whose keyword list has an
 * entry contained in the lowercased header. Declaration order is the tie-break,
 * not the longest match. "Value Dt" therefore classifies as `date`.
 */
export const COLUMN_PATTERNS: ReadonlyArray<readonly [Exclude<ColumnRole, 'unknown'>, readonly string[]]> = [
    ['date', ['date', 'tran date', 'value dt', 'txn date', 'transaction date', 'value date']],
    ['narration', ['narration', 'particulars', 'description', 'details', 'transaction details']],
    ['reference', ['chq', 'cheque', 'ref', 'chq no', 'chq/ref', 'reference', 'chq./ref.no.']],
    ['debit', ['debit', 'withdrawal', 'dr', 'withdrawal amt', 'amount debited', 'withdrawal amt.']],
    ['credit', ['credit', 'deposit', 'cr', 'deposit amt', 'amount credited', 'deposit amt.']],
    ['balance', ['balance', 'closing', 'closing balance', 'available balance']],
    ['init', ['init', 'br', 'branch']],
    ['value_date', ['value dt', 'value date', 'valuedt']],
];

/**
 * Canonical header labels used for tables read from PDF statements.
 */
export const STANDARD_NAMES = {
    date: 'Date',
    narration: 'Narration',
    reference: 'Chq/Ref',
    debit: 'Debit',
    credit: 'Credit',
    balance: 'Balance',
    init: 'Init/Br',
    value_date: 'ValueDt',
} as const;

/**
 * Canonical header labels used for CSV/Excel exports.
 * Only the debit/credit labels differ from the PDF table.
 */
export const STANDARD_NAMES_TABULAR = {
    ...STANDARD_NAMES,
    debit: 'Withdrawal',
    credit: 'Deposit',
} as const;

/**
 * Substrings that mark a single delimited text line as the header line.
 * A line needs HEADER_DETECTION.MIN_INDICATORS of them.
 */
export const HEADER_INDICATORS = ['date', 'narration', 'withdrawal', 'deposit', 'balance'] as const;

/**
 * Header row detection thresholds.
 */
export const HEADER_DETECTION = {
    SCAN_ROWS: 10,
    FALLBACK_SCAN_ROWS: 5,
    MIN_NON_EMPTY_CELLS: 3,
    MIN_INDICATORS: 3,
    MIN_KNOWN_RATIO: 0.4,
} as const;

/**
 * Keywords identifying totals, disclaimers and pagination rows.
 */
export const FOOTER_KEYWORDS = [
    'total',
    'closing balance',
    'opening balance',
    'registered office',
    'page no',
    'generated on',
    'statement of',
    'legends',
    'branch address',
    'charge breakup',
    'contents of this statement',
    'unless the constituent',
    'deposit insurance',
    'transaction total',
    'end of statement',
] as const;

/**
 * Keywords marking the first transaction-table line when carving a leading
 * metadata block in the generic tabular reader.
 */
export const TRANSACTION_INDICATORS = ['date', 'narration', 'debit', 'credit'] as const;

/**
 * Default chunking parameters.
 */
export const CHUNKING = {
    DEFAULT_CHUNK_SIZE: 5,
    DEFAULT_OVERLAP: 0,
} as const;

/**
 * Character window used when a PDF has no recoverable table.
 */
export const TEXT_SPLITTER = {
    CHUNK_LENGTH: 1000,
    OVERLAP: 200,
    SOURCE: 'text_fallback',
    CONTENT_HEADER: 'Content',
} as const;

/**
 * Literal marker placed before the table in fallback chunks.
 */
export const FALLBACK_MARKER = 'Statement of account';

/**
 * Layout tolerances for PDF text-item grouping (PDF user-space units).
 */
export const PDF_LAYOUT = {
    ROW_Y_TOLERANCE: 3.0,
    SPACE_GAP: 2.5,
    COLUMN_GAP: 18,
    /** Header fragments closer than this belong to one header cell */
    HEADER_WORD_GAP: 5,
} as const;

/**
 * Name of the optional configuration file, looked up from the working directory upwards.
 */
export const CONFIG_FILENAME = 'statement-chunker.yaml';
