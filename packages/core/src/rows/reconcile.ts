/**
 * Debit/credit collision resolution.
 */

import type { ColumnMap, RawCell, Row } from '../types/index.js';
import { parseAmount } from './amount.js';

/**
 * Resolve rows where both debit and credit hold non-zero amounts.
 *
 * The larger magnitude is kept and the other column is cleared: credit wins
 * only when strictly larger, so equal magnitudes keep the debit.
 * No-op when either role is unmapped or the table is empty.
 */
export function reconcileDebitCredit(table: ReadonlyArray<ReadonlyArray<RawCell>>, columnMap: ColumnMap): Row[] {
    const rows: Row[] = table.map((row) => row.map((cell) => cell ?? null));
    const debitIdx = columnMap.debit;
    const creditIdx = columnMap.credit;
    if (rows.length === 0 || debitIdx === undefined || creditIdx === undefined) {
        return rows;
    }

    for (const row of rows) {
        const debit = parseAmount(row[debitIdx]);
        const credit = parseAmount(row[creditIdx]);
        if (debit === null || credit === null || debit.isZero() || credit.isZero()) {
            continue;
        }

        if (credit.abs().greaterThan(debit.abs())) {
            row[debitIdx] = null;
        } else {
            row[creditIdx] = null;
        }
    }

    return rows;
}
