/**
 * Document metadata from the text outside the transaction table.
 */

import type { Metadata } from '../types/index.js';
import type { PageContent } from '../table/index.js';

/**
 * Build ordered metadata from each page's non-table text.
 *
 * Lines are first cut at column gaps (tabs). A segment with a colon after its
 * first character becomes `key → value`; the remaining segments of a page
 * are joined with " | " under `page_<n>`. A repeated key keeps its first
 * position and takes the later value.
 */
export function buildPdfMetadata(pages: readonly PageContent[]): Metadata {
    const metadata: Metadata = new Map();

    for (const page of pages) {
        const loose: string[] = [];

        for (const line of page.textLines) {
            for (const segment of line.split('\t')) {
                const text = segment.trim();
                if (text === '') {
                    continue;
                }
                const colon = text.indexOf(':');
                const key = colon > 0 ? text.slice(0, colon).trim() : '';
                if (key !== '') {
                    metadata.set(key, text.slice(colon + 1).trim());
                } else {
                    loose.push(text);
                }
            }
        }

        if (loose.length > 0) {
            metadata.set(`page_${page.pageNumber}`, loose.join(' | '));
        }
    }

    return metadata;
}
