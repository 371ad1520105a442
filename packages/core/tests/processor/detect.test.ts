import { describe, it, expect } from 'vitest';
import {
    baseName,
    detectFormat,
    fileExtension,
    getSupportedExtensions,
    isIgnoredFile,
} from '../../src/processor/detect.js';

describe('detectFormat', () => {
    it.each([
        ['statements/jan.pdf', 'pdf'],
        ['JAN.PDF', 'pdf'],
        ['export.csv', 'csv'],
        ['book.xlsx', 'xlsx'],
        ['legacy.XLS', 'xls'],
    ])('detects %s as %s', (path, format) => {
        expect(detectFormat(path)?.format).toBe(format);
    });

    it('returns null for unsupported names', () => {
        expect(detectFormat('notes.txt')).toBeNull();
        expect(detectFormat('README')).toBeNull();
        expect(detectFormat('archive.xlsx.bak')).toBeNull();
    });
});

describe('fileExtension', () => {
    it('returns the lowercased last extension', () => {
        expect(fileExtension('a/B.CSV')).toBe('.csv');
        expect(fileExtension('report.final.xlsx')).toBe('.xlsx');
    });

    it('is empty without an extension or for dotfiles', () => {
        expect(fileExtension('dir.v2/README')).toBe('');
        expect(fileExtension('.hidden')).toBe('');
    });
});

describe('baseName', () => {
    it('handles both separators', () => {
        expect(baseName('C:\\stmts\\jan.pdf')).toBe('jan.pdf');
        expect(baseName('/tmp/stmts/feb.csv')).toBe('feb.csv');
    });
});

describe('isIgnoredFile', () => {
    it('skips hidden and temporary files', () => {
        expect(isIgnoredFile('dir/.DS_Store')).toBe(true);
        expect(isIgnoredFile('~$book.xlsx')).toBe(true);
        expect(isIgnoredFile('book.xlsx')).toBe(false);
    });
});

describe('getSupportedExtensions', () => {
    it('lists every format', () => {
        expect(getSupportedExtensions()).toEqual(['.pdf', '.csv', '.xlsx', '.xls']);
    });
});
