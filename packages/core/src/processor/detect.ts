/**
 * Format detection from file name.
 *
 * Dispatch is by extension only, case-insensitive:
 * .pdf → PDF path, .csv / .xlsx / .xls → tabular path.
 */

import type { ChunkerOptions, ProcessingResult, StatementFormat } from '../types/index.js';
import { processPdf } from '../pdf/index.js';
import { processTabular } from '../tabular/index.js';

/**
 * Processor function signature.
 * Takes ArrayBuffer (not file path) to keep core headless.
 */
export type ProcessorFn = (data: ArrayBuffer, options: ChunkerOptions) => Promise<ProcessingResult>;

/**
 * Format registry entry.
 */
interface FormatEntry {
    /** Regex pattern to match filename */
    pattern: RegExp;
    extension: string;
    processor: ProcessorFn;
}

/**
 * Registry of supported formats, in dispatch order.
 */
const FORMATS: Record<StatementFormat, FormatEntry> = {
    pdf: {
        pattern: /\.pdf$/i,
        extension: '.pdf',
        processor: processPdf,
    },
    csv: {
        pattern: /\.csv$/i,
        extension: '.csv',
        processor: async (data, options) => processTabular(data, 'csv', options),
    },
    xlsx: {
        pattern: /\.xlsx$/i,
        extension: '.xlsx',
        processor: async (data, options) => processTabular(data, 'xlsx', options),
    },
    xls: {
        pattern: /\.xls$/i,
        extension: '.xls',
        processor: async (data, options) => processTabular(data, 'xls', options),
    },
};

function isStatementFormat(name: string): name is StatementFormat {
    return name in FORMATS;
}

/**
 * Detection result returned by detectFormat.
 */
export interface FormatDetectionResult {
    format: StatementFormat;
    processor: ProcessorFn;
}

/**
 * Base name of a path, for either separator.
 */
export function baseName(filePath: string): string {
    const parts = filePath.split(/[\\/]/);
    return parts[parts.length - 1] ?? filePath;
}

/**
 * Lower-cased extension including the dot, or '' when there is none.
 */
export function fileExtension(filePath: string): string {
    const name = baseName(filePath);
    const dot = name.lastIndexOf('.');
    return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

/**
 * Hidden (.) and temporary (~) files are skipped during discovery.
 */
export function isIgnoredFile(filePath: string): boolean {
    const name = baseName(filePath);
    return name.startsWith('.') || name.startsWith('~');
}

/**
 * Detect the format of a file from its name.
 *
 * @param filePath - File name or path
 * @returns Detection result or null if the extension is not supported
 */
export function detectFormat(filePath: string): FormatDetectionResult | null {
    const name = baseName(filePath);
    for (const [format, { pattern, processor }] of Object.entries(FORMATS)) {
        if (isStatementFormat(format) && pattern.test(name)) {
            return { format, processor };
        }
    }
    return null;
}

/**
 * Get list of supported extensions, e.g. ['.pdf', '.csv', '.xlsx', '.xls'].
 */
export function getSupportedExtensions(): string[] {
    return Object.values(FORMATS).map((entry) => entry.extension);
}
