/**
 * Service wrapper around the headless core: reads files, adds file info,
 * and isolates per-file failures in batch runs.
 */

import { readFile } from 'node:fs/promises';
import { fileExtension, processStatement } from '@statement-chunker/core';
import {
    ChunkerOptionsSchema,
    MissingFileError,
    type BatchErrorRecord,
    type ChunkerOptions,
    type ChunkerOptionsInput,
    type Metadata,
    type ServiceResult,
} from '@statement-chunker/shared';
import { toArrayBuffer } from '../utils/buffer.js';

export type BatchItem = ServiceResult | BatchErrorRecord;

export function isBatchErrorRecord(item: BatchItem): item is BatchErrorRecord {
    return 'error' in item;
}

function isNotFound(e: unknown): boolean {
    return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

export class StatementService {
    readonly options: ChunkerOptions;

    /**
     * @throws ZodError if chunkSize < 1, overlap < 0 or overlap >= chunkSize
     */
    constructor(options: ChunkerOptionsInput = {}) {
        this.options = ChunkerOptionsSchema.parse(options);
    }

    /**
     * Process one statement file.
     *
     * @throws MissingFileError if the path does not exist
     * @throws UnsupportedFormatError if the extension is not supported
     */
    async processFile(filePath: string): Promise<ServiceResult> {
        let content: Buffer;
        try {
            content = await readFile(filePath);
        } catch (e) {
            if (isNotFound(e)) {
                throw new MissingFileError(filePath);
            }
            throw e;
        }

        const result = await processStatement(toArrayBuffer(content), filePath, this.options);

        return {
            ...result,
            file_info: {
                file_path: filePath,
                file_size: content.byteLength,
                file_type: fileExtension(filePath),
                num_chunks: result.chunks.length,
            },
        };
    }

    async getChunksOnly(filePath: string): Promise<string[]> {
        return (await this.processFile(filePath)).chunks;
    }

    async getMetadata(filePath: string): Promise<Metadata> {
        return (await this.processFile(filePath)).metadata;
    }

    async isFallbackUsed(filePath: string): Promise<boolean> {
        return (await this.processFile(filePath)).fallback_used;
    }

    /**
     * Process files one after another. A failing file becomes an error
     * record in its position; the run always completes.
     */
    async batchProcess(filePaths: readonly string[]): Promise<BatchItem[]> {
        const items: BatchItem[] = [];
        for (const filePath of filePaths) {
            try {
                items.push(await this.processFile(filePath));
            } catch (e) {
                items.push({
                    error: e instanceof Error ? e.message : String(e),
                    file_path: filePath,
                    chunks: [],
                    metadata: new Map(),
                    fallback_used: true,
                    file_info: { error: true },
                });
            }
        }
        return items;
    }
}
