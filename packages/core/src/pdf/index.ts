/**
 * PDF module: positioned text extraction, page layout and the PDF processing path.
 */

export { processPdf, textSplitterFallback, documentText } from './process.js';
export { loadTextItems } from './extract.js';
export type { PdfTextContent } from './extract.js';
export { buildPageContents, isHeaderLayoutRow } from './pages.js';
export { buildPdfMetadata } from './metadata.js';
export {
    groupByRows,
    buildLineText,
    mergeHeaderFragments,
    detectColumnsFromHeader,
    mapRowToColumns,
} from './layout.js';
export type { TextItem, LayoutRow, ColumnBand } from './layout.js';
