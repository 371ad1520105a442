import { describe, it, expect, vi } from 'vitest';
import { processTabular } from '../../src/tabular/process.js';
import { csvBuffer } from './fixtures.js';

vi.mock('../../src/tabular/mixed-lines.js', async (importOriginal) => ({
    ...(await importOriginal<typeof import('../../src/tabular/mixed-lines.js')>()),
    parseMixedLines: vi.fn(() => {
        throw new Error('boom');
    }),
}));

describe('processTabular recovery', () => {
    it('re-reads with raw headers after an unexpected failure', () => {
        const result = processTabular(csvBuffer('Date,Narration,Amount\n01/01/24,Coffee,4.50\n'), 'csv', {
            chunkSize: 5,
            overlap: 0,
        });

        expect(result.warnings).toEqual(['Tabular processing failed (boom), re-reading without validation']);
        expect(result.fallback_used).toBe(true);
        expect(result.table).toEqual({
            headers: ['Date', 'Narration', 'Amount'],
            columnMap: {},
            rows: [['01/01/24', 'Coffee', '4.50']],
        });
        expect(result.chunks).toEqual(['Statement of account\nDate Narration Amount\n01/01/24 Coffee 4.50']);
    });
});
