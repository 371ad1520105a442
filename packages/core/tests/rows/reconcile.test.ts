import { describe, it, expect } from 'vitest';
import { reconcileDebitCredit } from '../../src/rows/reconcile.js';
import type { ColumnMap } from '../../src/types/index.js';

const columnMap: ColumnMap = { date: 0, narration: 1, debit: 2, credit: 3, balance: 4 };

describe('reconcileDebitCredit', () => {
    it('keeps the larger debit and clears credit', () => {
        const result = reconcileDebitCredit([['01/01/24', 'x', '100', '50', '']], columnMap);
        expect(result).toEqual([['01/01/24', 'x', '100', null, '']]);
    });

    it('keeps the larger credit and clears debit', () => {
        const result = reconcileDebitCredit([['01/01/24', 'x', '20', '1,030.00', '']], columnMap);
        expect(result).toEqual([['01/01/24', 'x', null, '1,030.00', '']]);
    });

    it('compares magnitudes and keeps debit on a tie', () => {
        const result = reconcileDebitCredit([['01/01/24', 'x', '10', '-10', '']], columnMap);
        expect(result).toEqual([['01/01/24', 'x', '10', null, '']]);
    });

    it('leaves rows with a zero or blank side alone', () => {
        const rows = [
            ['01/01/24', 'x', '0', '50', ''],
            ['01/01/24', 'y', '', '50', ''],
        ];
        expect(reconcileDebitCredit(rows, columnMap)).toEqual(rows);
    });

    it('is a no-op when debit or credit is unmapped', () => {
        const rows = [['01/01/24', 'x', '100', '50']];
        expect(reconcileDebitCredit(rows, { date: 0, narration: 1, debit: 2 })).toEqual(rows);
    });

    it('does not modify its input', () => {
        const rows = [['01/01/24', 'x', '100', '50', '']];
        reconcileDebitCredit(rows, columnMap);
        expect(rows[0][3]).toBe('50');
    });

    it('never leaves both sides non-zero', () => {
        const result = reconcileDebitCredit(
            [
                ['01/01/24', 'a', '3', '4', ''],
                ['01/01/24', 'b', '7', '2', ''],
            ],
            columnMap
        );
        for (const row of result) {
            expect(row[2] === null || row[3] === null).toBe(true);
        }
    });
});
