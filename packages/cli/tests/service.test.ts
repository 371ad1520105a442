import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MissingFileError, UnsupportedFormatError } from '@statement-chunker/shared';
import { StatementService, isBatchErrorRecord } from '../src/service/statement-service.js';
import { createTempDir, removeTempDir, STATEMENT_CSV } from './helpers.js';

describe('StatementService', () => {
    let dir: string;
    let csvPath: string;

    beforeEach(async () => {
        dir = await createTempDir();
        csvPath = join(dir, 'jan.csv');
        await writeFile(csvPath, STATEMENT_CSV);
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    it('adds file info to the processing result', async () => {
        const result = await new StatementService().processFile(csvPath);

        expect(result.fallback_used).toBe(false);
        expect(result.file_info).toEqual({
            file_path: csvPath,
            file_size: Buffer.byteLength(STATEMENT_CSV),
            file_type: '.csv',
            num_chunks: 2,
        });
    });

    it('passes chunk options through', async () => {
        const chunks = await new StatementService({ chunkSize: 1 }).getChunksOnly(csvPath);
        expect(chunks).toHaveLength(3);
    });

    it('exposes metadata and the fallback flag', async () => {
        const service = new StatementService();
        expect([...(await service.getMetadata(csvPath))]).toEqual([['Account Number', '0001']]);
        expect(await service.isFallbackUsed(csvPath)).toBe(false);
    });

    it('throws MissingFileError for a missing path', async () => {
        const missing = join(dir, 'missing.csv');
        await expect(new StatementService().processFile(missing)).rejects.toThrow(MissingFileError);
        await expect(new StatementService().processFile(missing)).rejects.toThrow(`File not found: ${missing}`);
    });

    it('throws UnsupportedFormatError for an unsupported extension', async () => {
        const notes = join(dir, 'notes.txt');
        await writeFile(notes, 'hello');
        await expect(new StatementService().processFile(notes)).rejects.toThrow(UnsupportedFormatError);
    });

    it('rejects invalid options at construction', () => {
        expect(() => new StatementService({ chunkSize: 2, overlap: 2 })).toThrow();
    });

    it('isolates failures in a batch', async () => {
        const missing = join(dir, 'missing.csv');
        const items = await new StatementService().batchProcess([csvPath, missing]);

        expect(items).toHaveLength(2);
        expect(isBatchErrorRecord(items[0])).toBe(false);
        expect(items[1]).toEqual({
            error: `File not found: ${missing}`,
            file_path: missing,
            chunks: [],
            metadata: new Map(),
            fallback_used: true,
            file_info: { error: true },
        });
    });
});
