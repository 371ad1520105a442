import { describe, it, expect } from 'vitest';
import { isContinuationRow, isTransactionRow } from '../../src/rows/classify.js';
import { mergeContinuationRows } from '../../src/rows/merge.js';
import { reconcileDebitCredit } from '../../src/rows/reconcile.js';
import { normalizeHeaders } from '../../src/columns/normalize.js';
import type { ColumnMap } from '../../src/types/index.js';

const columnMap: ColumnMap = { date: 0, narration: 1, debit: 3, credit: 2, balance: 4 };

describe('row pipeline properties', () => {
    it('a row without a date is never a transaction', () => {
        expect(isTransactionRow(['', 'Shop', '', '', '100.00'], columnMap)).toBe(false);
    });

    it('a row with a debit is never a continuation', () => {
        expect(isContinuationRow(['', 'extra info', '', '50.00', ''], columnMap)).toBe(false);
    });

    it('merges an invoice note into its payment', () => {
        const merged = mergeContinuationRows(
            [
                ['01/01', 'Payment to X', '', '', '100'],
                ['', 'for invoice 123', '', '', ''],
            ],
            columnMap
        );
        expect(merged).toEqual([['01/01', 'Payment to X for invoice 123', '', '', '100']]);
    });

    it('keeps the larger debit', () => {
        const [row] = reconcileDebitCredit([['01/01', 'x', '450.00', '500.00', '']], columnMap);
        expect(row[3]).toBe('500.00');
        expect(row[2]).toBeNull();
    });
});

describe('header normalization properties', () => {
    const samples = [
        ['Date', 'Date', 'Narration', 'Narration', 'Balance'],
        ['Txn Date', 'Value Date', 'Details', 'Debit', 'Credit', 'Closing Balance'],
        ['', '', 'Amount', 'Amount_1', 'Amount'],
    ];

    it('produces pairwise distinct headers', () => {
        for (const headers of samples) {
            const { headers: normalized } = normalizeHeaders(headers);
            expect(new Set(normalized).size).toBe(normalized.length);
        }
    });

    it('maps each role to one in-range index', () => {
        for (const headers of samples) {
            const { columnMap: map } = normalizeHeaders(headers);
            for (const idx of Object.values(map)) {
                expect(idx !== undefined && idx >= 0 && idx < headers.length).toBe(true);
            }
        }
    });
});
