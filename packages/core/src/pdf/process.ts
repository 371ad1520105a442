/**
 * PDF path: extraction → table assembly → chunking, with the text splitter
 * as the last resort.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Every recovery is reported in `warnings`.
 */

import { TEXT_SPLITTER } from '../types/index.js';
import type { ChunkerOptions, Metadata, ProcessingResult } from '../types/index.js';
import { assembleTables } from '../table/index.js';
import type { PageContent } from '../table/index.js';
import { chunkNormal, createFallbackChunk, splitText } from '../chunker/index.js';
import { emptyResult, errorMessage } from '../utils/result.js';
import { loadTextItems } from './extract.js';
import { buildPageContents } from './pages.js';
import { buildPdfMetadata } from './metadata.js';

/**
 * Full document text: each page's lines, pages separated by a blank line.
 */
export function documentText(pages: readonly PageContent[]): string {
    return pages
        .map((page) => page.lines.join('\n'))
        .filter((text) => text !== '')
        .map((text) => `${text}\n\n`)
        .join('');
}

/**
 * Character-window chunks over the raw page text.
 * Blank text yields the empty result.
 */
export function textSplitterFallback(pages: readonly PageContent[], warnings: string[]): ProcessingResult {
    const text = documentText(pages);
    if (text.trim() === '') {
        warnings.push('No text could be extracted from PDF');
        return emptyResult(warnings);
    }

    const metadata: Metadata = new Map([['source', TEXT_SPLITTER.SOURCE]]);
    const chunks = splitText(text).map((piece) =>
        createFallbackChunk(metadata, [TEXT_SPLITTER.CONTENT_HEADER], [[piece]])
    );

    return { metadata, chunks, fallback_used: true, warnings, table: null };
}

/**
 * Process a PDF statement.
 *
 * @param data - PDF file contents
 */
export async function processPdf(data: ArrayBuffer, options: ChunkerOptions): Promise<ProcessingResult> {
    const warnings: string[] = [];

    let pages: PageContent[];
    try {
        const content = await loadTextItems(data);
        pages = buildPageContents(content.items, content.pageCount);
    } catch (e) {
        warnings.push(`PDF text extraction failed: ${errorMessage(e)}`);
        return emptyResult(warnings);
    }

    try {
        const metadata = buildPdfMetadata(pages);
        const assembled = assembleTables(pages);
        warnings.push(...assembled.warnings);

        if (assembled.table === null) {
            warnings.push('No transaction table found, using text splitter fallback');
            return textSplitterFallback(pages, warnings);
        }

        return {
            metadata,
            chunks: chunkNormal(metadata, assembled.table, options),
            fallback_used: false,
            warnings,
            table: assembled.table,
        };
    } catch (e) {
        warnings.push(`PDF table processing failed (${errorMessage(e)}), using text splitter fallback`);
        return textSplitterFallback(pages, warnings);
    }
}
