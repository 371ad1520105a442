/**
 * Result helpers shared by the PDF and tabular paths.
 */

import type { ProcessingResult } from '../types/index.js';

/**
 * Nothing extractable: empty metadata and chunks, flagged as fallback.
 */
export function emptyResult(warnings: string[] = []): ProcessingResult {
    return {
        metadata: new Map(),
        chunks: [],
        fallback_used: true,
        warnings,
        table: null,
    };
}

/**
 * Message of a caught value, whatever was thrown.
 */
export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
