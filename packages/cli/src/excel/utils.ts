import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Statement Chunker';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Fit column widths to the longest value, between 10 and 80 characters.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            const len = cell.text.length;
            if (len > maxLen) maxLen = len;
        });
        column.width = Math.min(maxLen + 2, 80);
    });
}

/**
 * Right-align a column holding amounts. Values stay text as extracted.
 */
export function alignAmountColumn(worksheet: Worksheet, col: number): void {
    worksheet.getColumn(col).alignment = { horizontal: 'right' };
}
