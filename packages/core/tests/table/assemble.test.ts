import { describe, it, expect } from 'vitest';
import { alignRows, assembleTables, collectSegments, padRow, voteColumnCount } from '../../src/table/assemble.js';
import type { PageContent, TableSegment } from '../../src/table/types.js';
import type { RawGrid } from '../../src/types/index.js';

const HEADER = ['Date', 'Narration', 'Debit', 'Credit', 'Balance'];

function page(pageNumber: number, tables: RawGrid[], wordRows: RawGrid = []): PageContent {
    return { pageNumber, tables, wordRows, textLines: [], lines: [] };
}

function segment(columns: number, pageNumber: number): TableSegment {
    return {
        page: pageNumber,
        tableIndex: 0,
        headers: Array.from({ length: columns }, (_, i) => `H${i}`),
        columnMap: {},
        rows: [],
    };
}

describe('padRow', () => {
    it('pads with null and turns empty strings into null', () => {
        expect(padRow(['a', ''], 4)).toEqual(['a', null, null, null]);
    });

    it('truncates long rows', () => {
        expect(padRow(['a', 'b', 'c'], 2)).toEqual(['a', 'b']);
    });
});

describe('voteColumnCount', () => {
    it('keeps the majority column count', () => {
        const vote = voteColumnCount([segment(5, 1), segment(5, 2), segment(5, 3), segment(4, 4)]);
        expect(vote.columnCount).toBe(5);
        expect(vote.kept.map((s) => s.page)).toEqual([1, 2, 3]);
        expect(vote.discarded.map((s) => s.page)).toEqual([4]);
    });

    it('breaks ties by first appearance', () => {
        const vote = voteColumnCount([segment(4, 1), segment(5, 2)]);
        expect(vote.columnCount).toBe(4);
    });

    it('returns null for no segments', () => {
        expect(voteColumnCount([])).toEqual({ columnCount: null, kept: [], discarded: [] });
    });
});

describe('alignRows', () => {
    it('reorders by header name and fills missing columns with null', () => {
        const rows = alignRows([['n', 'd']], ['Narration', 'Date'], ['Date', 'Narration', 'Balance']);
        expect(rows).toEqual([['d', 'n', null]]);
    });
});

describe('collectSegments', () => {
    it('fixes the schema from the first table and drops footers', () => {
        const { segments, warnings } = collectSegments([
            page(1, [[
                HEADER,
                ['01/01/24', 'Coffee', '4.50', '', '95.50'],
                ['', 'at Cafe', '', '', ''],
                ['', 'Closing Balance', '', '', '95.50'],
            ]]),
        ]);
        expect(warnings).toEqual([]);
        expect(segments).toHaveLength(1);
        expect(segments[0].headers).toEqual(HEADER);
        expect(segments[0].columnMap).toEqual({ date: 0, narration: 1, debit: 2, credit: 3, balance: 4 });
        expect(segments[0].rows).toEqual([
            ['01/01/24', 'Coffee', '4.50', null, '95.50'],
            [null, 'at Cafe', null, null, null],
        ]);
    });

    it('warns when the first table has no data rows', () => {
        const { segments, warnings } = collectSegments([page(1, [[HEADER]])]);
        expect(segments).toEqual([]);
        expect(warnings).toEqual(['Page 1, table 0: no data rows after header']);
    });

    it('warns when a table has no valid rows', () => {
        const { warnings } = collectSegments([
            page(1, [[HEADER, ['01/01/24', 'Coffee', '4.50', '', '95.50']]]),
            page(2, [[['', 'Total', '', '', '100']]]),
        ]);
        expect(warnings).toEqual(['Page 2, table 0: no valid rows']);
    });

    it('does not use word rows before a schema exists', () => {
        const { segments, warnings } = collectSegments([
            page(1, [], [['01/01/24', 'Coffee', '4.50', '', '95.50']]),
        ]);
        expect(segments).toEqual([]);
        expect(warnings).toEqual([]);
    });
});

describe('assembleTables', () => {
    it('concatenates pages and skips a repeated header', () => {
        const result = assembleTables([
            page(1, [[HEADER, ['01/01/24', 'Coffee', '4.50', '', '95.50'], ['', 'at Cafe', '', '', '']]]),
            page(2, [[HEADER, ['02/01/24', 'Salary', '', '1000.00', '1095.50']]]),
        ]);
        expect(result.warnings).toEqual([]);
        expect(result.table).toEqual({
            headers: HEADER,
            columnMap: { date: 0, narration: 1, debit: 2, credit: 3, balance: 4 },
            rows: [
                ['01/01/24', 'Coffee at Cafe', '4.50', null, '95.50'],
                ['02/01/24', 'Salary', null, '1000.00', '1095.50'],
            ],
        });
    });

    it('reconstructs a table-less page from its word rows', () => {
        const result = assembleTables([
            page(1, [[HEADER, ['01/01/24', 'Coffee', '4.50', '', '95.50']]]),
            page(2, [], [['03/01/24', 'Rent', '500.00', '', '595.50'], ['Page', 'No', '2']]),
        ]);
        expect(result.warnings).toEqual(['Page 2: no table found, reconstructed 1 rows from words']);
        expect(result.table?.rows).toEqual([
            ['01/01/24', 'Coffee', '4.50', null, '95.50'],
            ['03/01/24', 'Rent', '500.00', null, '595.50'],
        ]);
    });

    it('splits multi-line cells and reconciles collisions', () => {
        const result = assembleTables([
            page(1, [[
                HEADER,
                ['01/01/24\n02/01/24', 'Coffee\nTea', '4.50\n3.00', '', '95.50\n92.50'],
                ['03/01/24', 'Reversal', '5.00', '20.00', '112.50'],
            ]]),
        ]);
        expect(result.table?.rows).toEqual([
            ['01/01/24', 'Coffee', '4.50', null, '95.50'],
            ['02/01/24', 'Tea', '3.00', null, '92.50'],
            ['03/01/24', 'Reversal', null, '20.00', '112.50'],
        ]);
    });

    it('reports missing tables', () => {
        const result = assembleTables([page(1, [])]);
        expect(result).toEqual({ table: null, warnings: ['No tables extracted'] });
    });
});
