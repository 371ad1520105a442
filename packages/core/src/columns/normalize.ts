/**
 * Canonical header construction and column-role mapping.
 */

import { STANDARD_NAMES, STANDARD_NAMES_TABULAR } from '../types/index.js';
import type { ColumnMap } from '../types/index.js';
import { classifyColumn } from './classify.js';

/**
 * Which label table to use: PDF tables say Debit/Credit, CSV/Excel exports
 * say Withdrawal/Deposit.
 */
export type HeaderVariant = 'pdf' | 'tabular';

export interface NormalizedHeaders {
    headers: string[];
    columnMap: ColumnMap;
}

/**
 * Disambiguate repeated header text by appending _1, _2, ... in appearance order.
 * A suffix that is already taken is skipped, so the output is always pairwise distinct.
 */
export function makeHeadersUnique(headers: readonly string[]): string[] {
    const counts = new Map<string, number>();
    const taken = new Set<string>();
    const unique: string[] = [];

    for (const header of headers) {
        if (!taken.has(header)) {
            counts.set(header, 0);
            taken.add(header);
            unique.push(header);
            continue;
        }

        let n = counts.get(header) ?? 0;
        let candidate: string;
        do {
            n++;
            candidate = `${header}_${n}`;
        } while (taken.has(candidate));

        counts.set(header, n);
        taken.add(candidate);
        unique.push(candidate);
    }

    return unique;
}

/**
 * Build canonical headers and the role → index map.
 *
 * Known roles take the fixed label of the chosen variant; unknown headers keep
 * their trimmed text. Only the first column of each role is mapped; later
 * columns of the same role stay in the header list unmapped.
 */
export function normalizeHeaders(headers: readonly string[], variant: HeaderVariant = 'pdf'): NormalizedHeaders {
    const labels = variant === 'tabular' ? STANDARD_NAMES_TABULAR : STANDARD_NAMES;
    const columnMap: ColumnMap = {};
    const normalized: string[] = [];

    headers.forEach((header, idx) => {
        const role = classifyColumn(header);
        if (role === 'unknown') {
            normalized.push(header.trim());
            return;
        }
        if (columnMap[role] === undefined) {
            columnMap[role] = idx;
        }
        normalized.push(labels[role]);
    });

    return { headers: makeHeadersUnique(normalized), columnMap };
}
