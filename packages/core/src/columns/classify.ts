/**
 * Keyword-substring column classification.
 *
 * NOTE: First match in declaration order wins. Do not switch to best/longest
 * match; header normalization and the column map depend on this ordering.
 */

import { COLUMN_PATTERNS } from '../types/index.js';
import type { ColumnRole, RawCell } from '../types/index.js';

/**
 * Lowercase and trim a header or cell value. Absent values become ''.
 */
export function normalizeText(text: RawCell): string {
    if (text === null || text === undefined) {
        return '';
    }
    return text.toLowerCase().trim();
}

/**
 * Classify a header into a canonical column role.
 *
 * @param header - Raw header text
 * @returns The first role with a keyword contained in the header, or 'unknown'
 */
export function classifyColumn(header: RawCell): ColumnRole {
    const normalized = normalizeText(header);
    if (normalized === '') {
        return 'unknown';
    }

    for (const [role, keywords] of COLUMN_PATTERNS) {
        if (keywords.some((keyword) => normalized.includes(keyword))) {
            return role;
        }
    }

    return 'unknown';
}
