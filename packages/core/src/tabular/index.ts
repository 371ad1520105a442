/**
 * Tabular module: CSV / Excel reading and the tabular processing path.
 */

export { processTabular } from './process.js';
export { parseMixedLines, fitFields, unquoteField } from './mixed-lines.js';
export type { MixedLines } from './mixed-lines.js';
export { readGenericTable, carveMetadataRows } from './fallback.js';
export type { GenericTable } from './fallback.js';
export { extractMetadata } from './metadata.js';
export { readTextLines, readGrid, decodeText } from './read.js';
