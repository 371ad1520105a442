/**
 * Rows module: classification, multi-row reconstruction and amount reconciliation.
 */

export { isTransactionRow, isContinuationRow, isFooterRow } from './classify.js';
export { splitMultilineCells, mergeContinuationRows } from './merge.js';
export { reconcileDebitCredit } from './reconcile.js';
export { parseAmount, isNonZeroAmount } from './amount.js';
export { cellFor, mappedCellFor, roleIndex, isFilled, cleanValue, AMOUNT_ROLES } from './cells.js';
