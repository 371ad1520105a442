/**
 * Chunker module: window planning and chunk serialization.
 */

export { chunkNormal, chunkFallback } from './chunk.js';
export type { ChunkSource } from './chunk.js';
export { planWindows } from './window.js';
export type { RowWindow, ChunkMode } from './window.js';
export {
    formatMetadataText,
    formatTransactionText,
    createFallbackChunk,
    formatStructuredChunk,
} from './format.js';
export { splitText } from './text-splitter.js';
