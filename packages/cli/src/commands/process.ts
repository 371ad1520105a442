import { writeFile } from 'node:fs/promises';
import { MissingFileError, UnsupportedFormatError, type ServiceResult } from '@statement-chunker/shared';
import { StatementService } from '../service/statement-service.js';
import { resolveSettings } from '../workspace/config.js';
import { renderJson, renderMarkdown } from '../export/index.js';
import { generateTableExcel, workbookToBytes } from '../excel/table.js';
import { log, heading, success, warn, error, info, arrow, chunkBlock } from '../utils/console.js';
import { describeError } from '../utils/errors.js';
import type { ProcessCommandOptions } from '../types.js';

/**
 * `statement-chunker process <file>`
 *
 * @returns Process exit code
 */
export async function processCommand(file: string, options: ProcessCommandOptions): Promise<number> {
    heading(`Statement Chunker - Processing ${file}`);

    // 1. Settings
    let service: StatementService;
    try {
        const settings = resolveSettings({
            chunkSize: options.chunkSize,
            overlap: options.overlap,
            config: options.config
        });
        if (settings.configPath !== null) {
            info(`Config: ${settings.configPath}`);
        }
        service = new StatementService({ chunkSize: settings.chunkSize, overlap: settings.overlap });
    } catch (err) {
        error(`Invalid settings. ${describeError(err)}`);
        return 1;
    }

    // 2. Chunking
    let result: ServiceResult;
    try {
        result = await service.processFile(file);
    } catch (err) {
        if (err instanceof MissingFileError || err instanceof UnsupportedFormatError) {
            error(err.message);
            return 1;
        }
        throw err;
    }

    for (const w of result.warnings) {
        warn(w);
    }

    success(`Created ${result.file_info.num_chunks} chunks (${result.fallback_used ? 'fallback mode' : 'structured'})`);
    arrow(`Metadata entries: ${result.metadata.size}`);
    if (result.table !== null) {
        arrow(`Transactions: ${result.table.rows.length}`);
    }

    if (options.verbose) {
        result.chunks.forEach((chunk, i) => chunkBlock(i + 1, chunk));
    }

    // 3. Outputs
    if (options.out !== undefined) {
        await writeFile(options.out, renderJson(result));
        arrow(`JSON saved to: ${options.out}`);
    } else {
        log(renderJson(result));
    }

    if (options.md !== undefined) {
        await writeFile(options.md, renderMarkdown(result.chunks));
        arrow(`Markdown saved to: ${options.md}`);
    }

    if (options.xlsx !== undefined) {
        await writeFile(options.xlsx, await workbookToBytes(generateTableExcel(result)));
        arrow(`Excel saved to: ${options.xlsx}`);
    }

    return 0;
}
