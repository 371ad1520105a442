/**
 * Role-addressed cell access.
 *
 * Rows are plain arrays aligned to the normalized header, but pipeline code
 * reads and writes them only through these lookups so no component depends on
 * another component's column positions.
 */

import type { ColumnMap, ColumnRole, RawCell } from '../types/index.js';

type KnownRole = Exclude<ColumnRole, 'unknown'>;

/**
 * Position assumed for a role the header did not map.
 * Statements almost always lead with the date and then the narration.
 */
const DEFAULT_ROLE_INDEX: Partial<Record<KnownRole, number>> = {
    date: 0,
    narration: 1,
};

/**
 * Amount-bearing roles checked by the row classifiers, in order.
 */
export const AMOUNT_ROLES: readonly KnownRole[] = ['debit', 'credit', 'balance'];

/**
 * Resolve the column index of a role, falling back to the default position.
 * Returns undefined when the role is neither mapped nor defaulted.
 */
export function roleIndex(columnMap: ColumnMap, role: KnownRole): number | undefined {
    return columnMap[role] ?? DEFAULT_ROLE_INDEX[role];
}

/**
 * Read the cell of a role. Out-of-range and unmapped roles read as undefined.
 */
export function cellFor(row: ReadonlyArray<RawCell>, columnMap: ColumnMap, role: KnownRole): RawCell {
    const idx = roleIndex(columnMap, role);
    if (idx === undefined || idx >= row.length) {
        return undefined;
    }
    return row[idx];
}

/**
 * Read the cell of a role only if the header mapped it (no default position).
 */
export function mappedCellFor(row: ReadonlyArray<RawCell>, columnMap: ColumnMap, role: KnownRole): RawCell {
    const idx = columnMap[role];
    if (idx === undefined || idx >= row.length) {
        return undefined;
    }
    return row[idx];
}

/**
 * True when the cell holds non-whitespace text.
 */
export function isFilled(cell: RawCell): cell is string {
    return typeof cell === 'string' && cell.trim() !== '';
}

/**
 * Clean a value for serialization: empty, whitespace-only or absent → null,
 * anything else → its trimmed string form.
 */
export function cleanValue(value: unknown): string | null {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === 'number' && Number.isNaN(value)) {
        return null;
    }
    const text = String(value).trim();
    return text === '' ? null : text;
}
