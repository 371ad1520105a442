/**
 * Tabular source reading (CSV, XLSX, XLS) via the xlsx library.
 *
 * Two views of the same file: plain text lines for the line-oriented
 * strategy, and a cell grid for the generic fallback.
 */

import * as XLSX from 'xlsx';
import type { Cell, TabularFormat } from '../types/index.js';

const BOM = '\uFEFF';

/**
 * Decode bytes as UTF-8 (invalid sequences replaced) and drop a leading BOM.
 */
export function decodeText(data: ArrayBuffer): string {
    const text = new TextDecoder('utf-8').decode(data);
    return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

function firstSheet(workbook: XLSX.WorkBook): XLSX.WorkSheet | null {
    const name = workbook.SheetNames[0];
    if (name === undefined) {
        return null;
    }
    return workbook.Sheets[name] ?? null;
}

function readWorkbook(data: ArrayBuffer, format: TabularFormat): XLSX.WorkBook {
    if (format === 'csv') {
        // raw: keep every CSV value as written, no number/date coercion
        return XLSX.read(decodeText(data), { type: 'string', raw: true });
    }
    return XLSX.read(data, { type: 'array' });
}

/**
 * Text lines of the source. CSV is read as-is; a workbook's first sheet is
 * rendered as CSV with blank rows dropped.
 */
export function readTextLines(data: ArrayBuffer, format: TabularFormat): string[] {
    if (format === 'csv') {
        return decodeText(data).split(/\r?\n/);
    }
    const sheet = firstSheet(XLSX.read(data, { type: 'array' }));
    if (sheet === null) {
        return [];
    }
    return XLSX.utils.sheet_to_csv(sheet, { blankrows: false }).split('\n');
}

/**
 * First sheet as a grid of displayed cell text. Blank rows are dropped;
 * missing cells read as null.
 */
export function readGrid(data: ArrayBuffer, format: TabularFormat): Cell[][] {
    if (data.byteLength === 0) {
        return [];
    }
    const sheet = firstSheet(readWorkbook(data, format));
    if (sheet === null) {
        return [];
    }
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: false,
        defval: null,
        blankrows: false,
    });
    return rows.map((row) => row.map((cell) => (cell === null || cell === undefined ? null : String(cell))));
}
