// Types (re-exported from shared)
export type {
    ColumnRole,
    ColumnMap,
    ChunkerOptions,
    ChunkerOptionsInput,
    Metadata,
    NormalizedTable,
    ProcessingResult,
    RawCell,
    RawGrid,
    Cell,
    Row,
    StatementFormat,
    TabularFormat,
} from './types/index.js';

export { ChunkerOptionsSchema, UnsupportedFormatError } from './types/index.js';

// Entry point
export { processStatement } from './processor/index.js';
export { detectFormat, getSupportedExtensions, fileExtension, baseName, isIgnoredFile } from './processor/index.js';
export type { ProcessorFn, FormatDetectionResult } from './processor/index.js';

// Columns
export { classifyColumn, normalizeText, isHeaderRow, locateHeader, normalizeHeaders, makeHeadersUnique } from './columns/index.js';
export type { HeaderLocation, HeaderVariant, NormalizedHeaders } from './columns/index.js';

// Rows
export {
    isTransactionRow,
    isContinuationRow,
    isFooterRow,
    splitMultilineCells,
    mergeContinuationRows,
    reconcileDebitCredit,
    parseAmount,
    cleanValue,
} from './rows/index.js';

// Tables
export { assembleTables, voteColumnCount } from './table/index.js';
export type { AssemblyResult, PageContent, TableSegment, ColumnVote } from './table/index.js';

// Paths
export { processPdf } from './pdf/index.js';
export { processTabular } from './tabular/index.js';

// Chunking
export { chunkNormal, chunkFallback, planWindows, splitText } from './chunker/index.js';
export type { ChunkSource, RowWindow, ChunkMode } from './chunker/index.js';

// Utils
export { emptyResult } from './utils/index.js';
