/**
 * Amount parsing for classification and debit/credit reconciliation.
 * Only thousands separators and whitespace are stripped; no locale handling.
 */

import { Decimal } from 'decimal.js';
import type { RawCell } from '../types/index.js';

// plain decimal notation; no 0x/0b/0o literals
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse an amount cell.
 *
 * @param value - Raw cell text, e.g. "1,250.00"
 * @returns Decimal value, or null if the cell is blank or not numeric
 */
export function parseAmount(value: RawCell): Decimal | null {
    if (value === null || value === undefined) {
        return null;
    }
    const cleaned = value.replace(/,/g, '').replace(/\s+/g, '');
    if (!DECIMAL_PATTERN.test(cleaned)) {
        return null;
    }

    let amount: Decimal;
    try {
        amount = new Decimal(cleaned);
    } catch {
        return null;
    }
    return amount.isFinite() ? amount : null;
}

/**
 * True when the cell parses to a non-zero amount.
 */
export function isNonZeroAmount(value: RawCell): boolean {
    const amount = parseAmount(value);
    return amount !== null && !amount.isZero();
}
