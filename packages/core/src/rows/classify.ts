/**
 * Row classification: transaction, continuation or footer.
 */

import { FOOTER_KEYWORDS } from '../types/index.js';
import type { ColumnMap, RawCell } from '../types/index.js';
import { isNonZeroAmount } from './amount.js';
import { AMOUNT_ROLES, cellFor, isFilled, mappedCellFor } from './cells.js';

/**
 * A transaction row has a date and at least one populated amount column.
 *
 * Debit and credit only count when they parse to a non-zero amount; a
 * balance counts whenever it is populated, whatever its value.
 */
export function isTransactionRow(row: ReadonlyArray<RawCell>, columnMap: ColumnMap): boolean {
    if (row.length === 0 || !isFilled(cellFor(row, columnMap, 'date'))) {
        return false;
    }

    return AMOUNT_ROLES.some((role) => {
        const cell = mappedCellFor(row, columnMap, role);
        if (!isFilled(cell)) {
            return false;
        }
        return role === 'balance' ? true : isNonZeroAmount(cell);
    });
}

/**
 * A continuation row is overflow narration belonging to the previous
 * transaction: no date, some narration, and no amount columns populated.
 */
export function isContinuationRow(row: ReadonlyArray<RawCell>, columnMap: ColumnMap): boolean {
    if (row.length === 0) {
        return false;
    }
    if (isFilled(cellFor(row, columnMap, 'date'))) {
        return false;
    }
    if (!isFilled(cellFor(row, columnMap, 'narration'))) {
        return false;
    }
    return !AMOUNT_ROLES.some((role) => isFilled(mappedCellFor(row, columnMap, role)));
}

/**
 * Footer/summary rows: totals, opening/closing balances, disclaimers and pagination.
 */
export function isFooterRow(row: ReadonlyArray<RawCell>): boolean {
    const text = row
        .filter((cell): cell is string => typeof cell === 'string' && cell !== '')
        .map((cell) => cell.toLowerCase())
        .join(' ');
    return FOOTER_KEYWORDS.some((keyword) => text.includes(keyword));
}
