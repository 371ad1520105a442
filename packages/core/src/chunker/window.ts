/**
 * Row window planning.
 */

/**
 * Half-open row range [start, end).
 */
export interface RowWindow {
    start: number;
    end: number;
}

export type ChunkMode = 'normal' | 'fallback';

/**
 * Plan the row windows for a table of `total` rows.
 *
 * Normal mode steps back by `overlap` rows after each window; fallback mode
 * always continues at the previous end and ignores overlap. Planning stops
 * once a window reaches the last row, so the final partial window appears once.
 *
 * @example
 * planWindows(5, 3, 1, 'normal') // [{start:0,end:3},{start:2,end:5}]
 */
export function planWindows(total: number, chunkSize: number, overlap: number, mode: ChunkMode): RowWindow[] {
    const windows: RowWindow[] = [];
    const size = Math.max(1, chunkSize);
    let start = 0;

    while (start < total) {
        const end = Math.min(start + size, total);
        windows.push({ start, end });
        if (end >= total) {
            break;
        }
        const next = mode === 'normal' && overlap > 0 ? end - overlap : end;
        // overlap >= chunkSize would never advance
        start = next > start ? next : end;
    }

    return windows;
}
