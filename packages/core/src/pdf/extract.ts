/**
 * Positioned text extraction using pdfjs-dist.
 *
 * ARCHITECTURAL NOTE: Works on bytes only; reading the file is the caller's job.
 */

import type { TextItem } from './layout.js';

export interface PdfTextContent {
    items: TextItem[];
    pageCount: number;
}

interface PdfjsTextItemLike {
    str: string;
    transform: number[];
    width?: number;
    height?: number;
}

/**
 * Type guard: text items carry `str` and a transform; marked-content entries don't.
 */
function isTextItem(item: unknown): item is PdfjsTextItemLike {
    if (typeof item !== 'object' || item === null) {
        return false;
    }
    return 'str' in item && typeof item.str === 'string' &&
        'transform' in item && Array.isArray(item.transform);
}

/**
 * Extract every non-blank text item with its page position.
 *
 * The document is always destroyed before returning, including on failure.
 *
 * @param data - PDF file contents
 */
export async function loadTextItems(data: ArrayBuffer): Promise<PdfTextContent> {
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

    // pdfjs transfers the buffer it is given; hand it a copy.
    const loadingTask = pdfjs.getDocument({
        data: new Uint8Array(data.slice(0)),
        useSystemFonts: true,
        verbosity: 0,
    });

    try {
        const pdfDocument = await loadingTask.promise;
        const items: TextItem[] = [];

        for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
            const page = await pdfDocument.getPage(pageNum);
            const textContent = await page.getTextContent();

            for (const item of textContent.items) {
                if (!isTextItem(item)) continue;

                const str = item.str.trim();
                if (str.length === 0) continue;

                // transform = [scaleX, skewX, skewY, scaleY, translateX, translateY]
                const x = Number(item.transform[4]) || 0;
                const y = Number(item.transform[5]) || 0;
                const width = Number(item.width) || Math.abs(Number(item.transform[0]) || 1) * str.length * 0.6;
                const height = Number(item.height) || Math.abs(Number(item.transform[3]) || 12);

                items.push({ str, x, y, width, height, page: pageNum });
            }

            page.cleanup();
        }

        return { items, pageCount: pdfDocument.numPages };
    } finally {
        await loadingTask.destroy();
    }
}
