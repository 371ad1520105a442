import * as XLSX from 'xlsx';

/**
 * UTF-8 bytes of a CSV string, as a standalone ArrayBuffer.
 */
export function csvBuffer(text: string): ArrayBuffer {
    const bytes = new TextEncoder().encode(text);
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    return buffer;
}

/**
 * Single-sheet XLSX workbook from an array of rows.
 */
export function workbookBuffer(rows: (string | null)[][]): ArrayBuffer {
    const ws = XLSX.utils.aoa_to_sheet(rows);
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(wb, ws, 'Sheet1');
    return XLSX.write(wb, { type: 'array', bookType: 'xlsx' });
}

export const STATEMENT_CSV = [
    'Account Name: A Holder',
    'Account Number: 0001',
    '',
    'Date,Narration,Withdrawal Amt.,Deposit Amt.,Closing Balance',
    '01/01/24,Coffee,4.50,,95.50',
    ',at Cafe,,,',
    '02/01/24,"Transfer, savings",,100.00,195.50',
    ',Closing Balance,,,195.50',
    '',
].join('\n');
