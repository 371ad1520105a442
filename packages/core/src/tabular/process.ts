/**
 * CSV / Excel path.
 *
 * Order of attempts:
 * 1. Line-oriented split with row classification (normal chunks)
 * 2. Generic grid, unfiltered (fallback chunks)
 * 3. After an unexpected failure: generic grid with raw headers (fallback chunks)
 * 4. Empty result
 *
 * ARCHITECTURAL NOTE: No console.* calls. Every step down is reported in `warnings`.
 */

import type { ChunkerOptions, Metadata, ProcessingResult, TabularFormat } from '../types/index.js';
import { normalizeHeaders } from '../columns/index.js';
import {
    cleanValue,
    isContinuationRow,
    isFooterRow,
    isTransactionRow,
    mergeContinuationRows,
    reconcileDebitCredit,
} from '../rows/index.js';
import { chunkFallback, chunkNormal } from '../chunker/index.js';
import { emptyResult, errorMessage } from '../utils/result.js';
import { readTextLines } from './read.js';
import { parseMixedLines } from './mixed-lines.js';
import { extractMetadata } from './metadata.js';
import { readGenericTable } from './fallback.js';

function structuredRead(data: ArrayBuffer, format: TabularFormat, options: ChunkerOptions, warnings: string[]): ProcessingResult {
    const parsed = parseMixedLines(readTextLines(data, format), format !== 'csv');

    if (parsed.rows.length === 0) {
        warnings.push('Line-oriented parsing found no transaction rows, using generic reader');
        return genericRead(data, format, options, warnings);
    }

    const metadata = extractMetadata(parsed.metadataLines);
    const { headers, columnMap } = normalizeHeaders(parsed.headers, 'tabular');

    const classified = parsed.rows
        .filter((row) => !isFooterRow(row))
        .filter((row) => isTransactionRow(row, columnMap) || isContinuationRow(row, columnMap));

    if (classified.length === 0) {
        warnings.push('No valid transaction rows found, using all rows as fallback');
        const rows = parsed.rows.map((row) => row.map(cleanValue));
        return {
            metadata,
            chunks: chunkFallback(metadata, { headers, rows }, options),
            fallback_used: true,
            warnings,
            table: { headers, columnMap, rows },
        };
    }

    const merged = mergeContinuationRows(classified, columnMap);
    const rows = reconcileDebitCredit(merged, columnMap).map((row) => row.map(cleanValue));

    return {
        metadata,
        chunks: chunkNormal(metadata, { headers, rows }, options),
        fallback_used: false,
        warnings,
        table: { headers, columnMap, rows },
    };
}

function genericRead(data: ArrayBuffer, format: TabularFormat, options: ChunkerOptions, warnings: string[]): ProcessingResult {
    const generic = readGenericTable(data, format);
    if (generic === null || generic.rows.length === 0) {
        warnings.push('Generic reader found no rows');
        return { ...emptyResult(warnings), metadata: generic?.metadata ?? new Map() };
    }

    const { headers, columnMap } = normalizeHeaders(generic.headers, 'tabular');
    const rows = generic.rows.map((row) => row.map(cleanValue));

    return {
        metadata: generic.metadata,
        chunks: chunkFallback(generic.metadata, { headers, rows }, options),
        fallback_used: true,
        warnings,
        table: { headers, columnMap, rows },
    };
}

/**
 * Raw re-read after a failure: no header normalization, no row filtering.
 */
function recoveryRead(data: ArrayBuffer, format: TabularFormat, options: ChunkerOptions, warnings: string[]): ProcessingResult {
    let metadata: Metadata = new Map();
    try {
        const generic = readGenericTable(data, format);
        if (generic !== null && generic.rows.length > 0) {
            const rows = generic.rows.map((row) => row.map(cleanValue));
            return {
                metadata: generic.metadata,
                chunks: chunkFallback(generic.metadata, { headers: generic.headers, rows }, options),
                fallback_used: true,
                warnings,
                table: { headers: generic.headers, columnMap: {}, rows },
            };
        }
        metadata = generic?.metadata ?? metadata;
    } catch (e) {
        warnings.push(`Recovery read failed: ${errorMessage(e)}`);
        return emptyResult(warnings);
    }
    warnings.push('Recovery read found no rows');
    return { ...emptyResult(warnings), metadata };
}

/**
 * Process a CSV or Excel statement.
 *
 * @param data - File contents
 */
export function processTabular(data: ArrayBuffer, format: TabularFormat, options: ChunkerOptions): ProcessingResult {
    const warnings: string[] = [];
    try {
        return structuredRead(data, format, options, warnings);
    } catch (e) {
        warnings.push(`Tabular processing failed (${errorMessage(e)}), re-reading without validation`);
        return recoveryRead(data, format, options, warnings);
    }
}
