/**
 * Single-document entry point.
 */

import { ChunkerOptionsSchema, UnsupportedFormatError } from '../types/index.js';
import type { ChunkerOptionsInput, ProcessingResult } from '../types/index.js';
import { emptyResult, errorMessage } from '../utils/result.js';
import { detectFormat, fileExtension, getSupportedExtensions } from './detect.js';

/**
 * Process one statement file.
 *
 * Only an unsupported extension (or invalid options) throws; for a supported
 * format every failure ends in fallback chunks or the empty result.
 *
 * @param data - File contents
 * @param fileName - Name or path of the file; only its extension is used
 * @param options - Chunk size and overlap, defaults applied
 * @throws UnsupportedFormatError if the extension is not .pdf/.csv/.xlsx/.xls
 */
export async function processStatement(
    data: ArrayBuffer,
    fileName: string,
    options: ChunkerOptionsInput = {}
): Promise<ProcessingResult> {
    const parsedOptions = ChunkerOptionsSchema.parse(options);
    const detection = detectFormat(fileName);
    if (detection === null) {
        throw new UnsupportedFormatError(fileExtension(fileName), getSupportedExtensions());
    }

    try {
        return await detection.processor(data, parsedOptions);
    } catch (e) {
        return emptyResult([`Processing ${detection.format} failed: ${errorMessage(e)}`]);
    }
}
