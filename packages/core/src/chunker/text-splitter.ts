import { TEXT_SPLITTER } from '../types/index.js';

/**
 * Cut text into fixed-length character windows that overlap by `overlap`
 * characters. The last window may be shorter and is never repeated.
 */
export function splitText(
    text: string,
    chunkLength: number = TEXT_SPLITTER.CHUNK_LENGTH,
    overlap: number = TEXT_SPLITTER.OVERLAP
): string[] {
    const pieces: string[] = [];
    let start = 0;

    while (start < text.length) {
        const end = Math.min(start + chunkLength, text.length);
        pieces.push(text.slice(start, end));
        if (end >= text.length) {
            break;
        }
        start = end - overlap > start ? end - overlap : end;
    }

    return pieces;
}
