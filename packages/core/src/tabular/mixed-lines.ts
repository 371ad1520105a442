/**
 * Line-oriented reading of statement exports that mix a metadata preamble
 * with a comma-delimited transaction table.
 */

import { isHeaderRow } from '../columns/index.js';

export interface MixedLines {
    /** Preamble lines: contain a colon, or no delimiter at all */
    metadataLines: string[];
    /** Header cells, trimmed; empty when no header line was found */
    headers: string[];
    /** Data rows, each exactly headers.length long */
    rows: string[][];
}

/**
 * Strip one pair of surrounding double quotes and unescape doubled quotes.
 */
export function unquoteField(field: string): string {
    const trimmed = field.trim();
    if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
        return trimmed.slice(1, -1).replace(/""/g, '"');
    }
    return trimmed;
}

/**
 * Fit a split line to the header width.
 *
 * NOTE: When a line splits into more fields than the header has, the extra
 * fields are assumed to come from commas inside the narration: the first
 * field is the date, the last (header length − 2) fields are the trailing
 * columns, and everything between is re-joined as the narration. Layouts
 * with more than one free-text column do not fit this assumption.
 *
 * @returns The row, or null when it cannot be fitted
 */
export function fitFields(parts: readonly string[], headerLength: number): string[] | null {
    if (parts.length === headerLength) {
        return [...parts];
    }
    if (parts.length < headerLength || headerLength < 2) {
        return null;
    }
    const trailing = headerLength - 2;
    const narration = parts.slice(1, parts.length - trailing).join(',');
    const merged = [parts[0], narration, ...parts.slice(parts.length - trailing)];
    return merged.length === headerLength ? merged : null;
}

function joinCells(line: string): string {
    return line
        .split(',')
        .map(unquoteField)
        .filter((field) => field !== '')
        .join(' ');
}

/**
 * Split source lines into metadata lines, a header and data rows.
 *
 * Any line passing the text-line header test becomes the header; a later
 * match replaces an earlier one. Before the first header, lines with a colon
 * or without a comma are metadata (trailing commas dropped); other lines
 * are ignored. After it, every
 * non-blank line is a data line. Lines with fewer fields than the header are
 * dropped.
 *
 * @param spreadsheet - Lines are rendered sheet rows; a metadata row's
 *   non-empty cells are joined with spaces, so `Account No:,1234` reads as
 *   `Account No: 1234`
 */
export function parseMixedLines(lines: readonly string[], spreadsheet: boolean = false): MixedLines {
    const metadataLines: string[] = [];
    const transactionLines: string[] = [];
    let headerLine: string | null = null;

    for (const raw of lines) {
        const line = raw.trim();
        if (line === '') {
            continue;
        }
        if (isHeaderRow(line)) {
            headerLine = line;
            continue;
        }
        if (headerLine !== null) {
            transactionLines.push(line);
        } else if (line.includes(':') || !line.includes(',')) {
            metadataLines.push(spreadsheet ? joinCells(line) : line.replace(/,+$/, ''));
        }
    }

    if (headerLine === null || transactionLines.length === 0) {
        return { metadataLines, headers: [], rows: [] };
    }

    const headers = headerLine.split(',').map(unquoteField);
    const rows: string[][] = [];
    for (const line of transactionLines) {
        const fitted = fitFields(line.split(','), headers.length);
        if (fitted !== null) {
            rows.push(fitted.map(unquoteField));
        }
    }

    return { metadataLines, headers, rows };
}
