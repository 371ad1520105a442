import { describe, it, expect } from 'vitest';
import {
    buildLineText,
    detectColumnsFromHeader,
    groupByRows,
    mapRowToColumns,
    mergeHeaderFragments,
} from '../../src/pdf/layout.js';
import type { LayoutRow, TextItem } from '../../src/pdf/layout.js';

function item(str: string, x: number, width: number, y = 700, page = 1): TextItem {
    return { str, x, y, width, height: 10, page };
}

function row(items: TextItem[]): LayoutRow {
    return { y: 700, page: 1, items };
}

describe('groupByRows', () => {
    it('groups items within the tolerance and orders rows top to bottom', () => {
        const rows = groupByRows([
            item('Date', 10, 20, 700),
            item('Narration', 60, 40, 701),
            item('Coffee', 60, 30, 680),
            item('01/01/24', 10, 35, 680),
            item('Next', 10, 20, 750, 2),
        ]);
        expect(rows.map((r) => r.items.map((i) => i.str))).toEqual([
            ['Date', 'Narration'],
            ['01/01/24', 'Coffee'],
            ['Next'],
        ]);
        expect(rows.map((r) => r.page)).toEqual([1, 1, 2]);
        expect(rows[0].y).toBe(700.5);
    });

    it('starts a new row beyond the tolerance', () => {
        const rows = groupByRows([item('a', 0, 5, 700), item('b', 0, 5, 696)]);
        expect(rows).toHaveLength(2);
    });
});

describe('buildLineText', () => {
    it('uses a tab for wide gaps and a space for narrow ones', () => {
        expect(buildLineText([item('Date', 0, 20), item('Narration', 50, 40)])).toBe('Date\tNarration');
        expect(buildLineText([item('Opening', 0, 10), item('bal', 13, 10)])).toBe('Opening bal');
    });

    it('glues touching items', () => {
        expect(buildLineText([item('1,2', 0, 10), item('50', 11, 8)])).toBe('1,250');
    });

    it('sorts by x before joining', () => {
        expect(buildLineText([item('world', 23, 20), item('Hello', 0, 20)])).toBe('Hello world');
    });
});

describe('mergeHeaderFragments', () => {
    it('joins fragments within the header word gap', () => {
        const merged = mergeHeaderFragments([item('Value', 100, 25), item('Dt', 128, 10), item('Balance', 200, 30)]);
        expect(merged.map((m) => [m.str, m.x, m.width])).toEqual([
            ['Value Dt', 100, 38],
            ['Balance', 200, 30],
        ]);
    });
});

describe('detectColumnsFromHeader', () => {
    it('places boundaries halfway between header centres', () => {
        const bands = detectColumnsFromHeader(row([item('Date', 0, 20), item('Narration', 50, 40), item('Balance', 150, 30)]));
        expect(bands).toEqual([
            { name: 'Date', left: Number.NEGATIVE_INFINITY, right: 40 },
            { name: 'Narration', left: 40, right: 117.5 },
            { name: 'Balance', left: 117.5, right: Number.POSITIVE_INFINITY },
        ]);
    });
});

describe('mapRowToColumns', () => {
    it('assigns items by centre and joins items sharing a band', () => {
        const bands = detectColumnsFromHeader(row([item('Date', 0, 20), item('Narration', 50, 40), item('Balance', 150, 30)]));
        const cells = mapRowToColumns(
            row([item('01/01/24', 0, 30), item('Coffee', 50, 25), item('Shop', 80, 20), item('95.50', 150, 25)]),
            bands
        );
        expect(cells).toEqual(['01/01/24', 'Coffee Shop', '95.50']);
    });

    it('leaves empty bands blank', () => {
        const bands = detectColumnsFromHeader(row([item('Date', 0, 20), item('Narration', 50, 40), item('Balance', 150, 30)]));
        expect(mapRowToColumns(row([item('Total', 150, 20)]), bands)).toEqual(['', '', 'Total']);
    });
});
