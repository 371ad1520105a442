import type { TextItem } from '../../src/pdf/layout.js';

function item(str: string, x: number, width: number, y: number, page = 1): TextItem {
    return { str, x, y, width, height: 10, page };
}

/**
 * Two-page statement: an account line, a header, one row on page 1 and one
 * header-less row on page 2.
 */
export const STATEMENT_ITEMS: TextItem[] = [
    item('Account No: 0001', 0, 80, 800),
    item('Date', 0, 20, 780),
    item('Narration', 50, 40, 780),
    item('Debit', 150, 25, 780),
    item('Credit', 200, 30, 780),
    item('Balance', 260, 35, 780),
    item('01/01/24', 0, 35, 760),
    item('Coffee', 50, 30, 760),
    item('4.50', 150, 20, 760),
    item('95.50', 260, 25, 760),
    item('02/01/24', 0, 35, 780, 2),
    item('Salary', 50, 30, 780, 2),
    item('1000.00', 200, 35, 780, 2),
    item('1095.50', 260, 35, 780, 2),
];

export const PROSE_ITEMS: TextItem[] = [
    item('Hello', 0, 20, 700),
    item('world', 23, 20, 700),
];
