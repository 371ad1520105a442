/**
 * Columns module: header detection, classification and normalization.
 */

export { classifyColumn, normalizeText } from './classify.js';
export { isHeaderRow, locateHeader, cleanHeaderCells, countNonEmpty } from './header.js';
export type { HeaderLocation } from './header.js';
export { normalizeHeaders, makeHeadersUnique } from './normalize.js';
export type { HeaderVariant, NormalizedHeaders } from './normalize.js';
