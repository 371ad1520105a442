import { describe, it, expect } from 'vitest';
import { fitFields, parseMixedLines, unquoteField } from '../../src/tabular/mixed-lines.js';
import { extractMetadata } from '../../src/tabular/metadata.js';

describe('unquoteField', () => {
    it('strips surrounding quotes and unescapes doubled quotes', () => {
        expect(unquoteField(' "a ""b"" c" ')).toBe('a "b" c');
    });

    it('leaves unquoted and lone-quote fields alone', () => {
        expect(unquoteField(' plain ')).toBe('plain');
        expect(unquoteField('"')).toBe('"');
    });
});

describe('fitFields', () => {
    it('returns rows of the right width unchanged', () => {
        expect(fitFields(['a', 'b'], 2)).toEqual(['a', 'b']);
    });

    it('folds extra fields into the narration', () => {
        expect(fitFields(['01/01', 'x', 'y', '1', '2'], 3)).toEqual(['01/01', 'x,y,1', '2']);
        expect(fitFields(['01/01', 'A', ' B', '', '5', '10'], 5)).toEqual(['01/01', 'A, B', '', '5', '10']);
    });

    it('rejects short rows and single-column headers', () => {
        expect(fitFields(['a'], 3)).toBeNull();
        expect(fitFields(['a', 'b', 'c'], 1)).toBeNull();
    });
});

describe('parseMixedLines', () => {
    it('separates the preamble, header and rows', () => {
        const parsed = parseMixedLines([
            'Account Name: A Holder',
            'Account Number: 0001,,,,',
            'Statement Period',
            'Ref,Code',
            'Date,Narration,Withdrawal Amt.,Deposit Amt.,Closing Balance',
            '01/01/24,Coffee,4.50,,95.50',
            '02/01/24,"Transfer, savings",,100.00,195.50',
            'bad,line',
            '',
        ]);
        expect(parsed.metadataLines).toEqual(['Account Name: A Holder', 'Account Number: 0001', 'Statement Period']);
        expect(parsed.headers).toEqual(['Date', 'Narration', 'Withdrawal Amt.', 'Deposit Amt.', 'Closing Balance']);
        expect(parsed.rows).toEqual([
            ['01/01/24', 'Coffee', '4.50', '', '95.50'],
            ['02/01/24', 'Transfer, savings', '', '100.00', '195.50'],
        ]);
    });

    it('uses the last header line', () => {
        const parsed = parseMixedLines([
            'Date,Narration,Balance',
            '01/01/24,Coffee,1.00',
            'date,narration,balance,deposit',
            '02/01/24,Tea,2.00,3.00',
        ]);
        expect(parsed.headers).toEqual(['date', 'narration', 'balance', 'deposit']);
        expect(parsed.rows).toEqual([['02/01/24', 'Tea', '2.00', '3.00']]);
    });

    it('joins the cells of rendered sheet rows in the preamble', () => {
        const parsed = parseMixedLines(
            ['Account No:,1234,,', 'Statement', 'Date,Narration,Balance', '01/01/24,Coffee,1.00'],
            true
        );
        expect(parsed.metadataLines).toEqual(['Account No: 1234', 'Statement']);
        expect(parsed.rows).toEqual([['01/01/24', 'Coffee', '1.00']]);
    });

    it('returns no rows without a header line', () => {
        const parsed = parseMixedLines(['Posted,Memo,Amount', '2024-01-01,Coffee,4.50']);
        expect(parsed).toEqual({ metadataLines: [], headers: [], rows: [] });
    });
});

describe('extractMetadata', () => {
    it('splits at the first colon and skips keyless lines', () => {
        const metadata = extractMetadata(['A: 1', ': x', 'no colon', 'Time: 10:30']);
        expect([...metadata]).toEqual([['A', '1'], ['Time', '10:30']]);
    });
});
