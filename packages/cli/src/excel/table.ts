import type { Workbook } from 'exceljs';
import type { ProcessingResult } from '@statement-chunker/shared';
import { createWorkbook, formatHeaderRow, autoFitColumns, alignAmountColumn } from './utils.js';

const AMOUNT_ROLES = ['debit', 'credit', 'balance'] as const;

/**
 * Workbook of a processed statement.
 *
 * - Transactions: the normalized header and rows; without a table, one
 *   row per chunk under a single "Chunk" column.
 * - Metadata: key/value pairs in extraction order.
 */
export function generateTableExcel(result: ProcessingResult): Workbook {
    const workbook = createWorkbook();
    const sheet = workbook.addWorksheet('Transactions');

    if (result.table !== null) {
        const { headers, columnMap, rows } = result.table;
        sheet.addRow(headers);
        for (const row of rows) {
            sheet.addRow(row.map((cell) => cell ?? ''));
        }
        for (const role of AMOUNT_ROLES) {
            const idx = columnMap[role];
            if (idx !== undefined) {
                // exceljs columns are 1-indexed
                alignAmountColumn(sheet, idx + 1);
            }
        }
    } else {
        sheet.addRow(['Chunk']);
        for (const chunk of result.chunks) {
            sheet.addRow([chunk]);
        }
    }

    formatHeaderRow(sheet);
    autoFitColumns(sheet);

    const metaSheet = workbook.addWorksheet('Metadata');
    metaSheet.addRow(['Key', 'Value']);
    for (const [key, value] of result.metadata) {
        metaSheet.addRow([key, value]);
    }
    formatHeaderRow(metaSheet);
    autoFitColumns(metaSheet);

    return workbook;
}

/**
 * Serialize a workbook to xlsx bytes.
 */
export async function workbookToBytes(workbook: Workbook): Promise<Uint8Array> {
    return new Uint8Array(await workbook.xlsx.writeBuffer());
}
