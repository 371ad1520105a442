import { ChunkerOptionsSchema } from '@statement-chunker/shared';
import { runPipeline } from '../pipeline/runner.js';
import { isBatchErrorRecord } from '../service/statement-service.js';
import { resolveSettings } from '../workspace/config.js';
import { heading, success, warn, error, info, arrow } from '../utils/console.js';
import { describeError } from '../utils/errors.js';
import type { BatchCommandOptions, ResolvedSettings } from '../types.js';

/**
 * `statement-chunker batch <paths...>`
 *
 * @returns Process exit code
 */
export async function batchCommand(paths: string[], options: BatchCommandOptions): Promise<number> {
    heading(`Statement Chunker - Batch of ${paths.length} input(s)`);

    let settings: ResolvedSettings;
    try {
        settings = resolveSettings({
            chunkSize: options.chunkSize,
            overlap: options.overlap,
            outputDir: options.outDir,
            formats: options.format,
            config: options.config
        });
        ChunkerOptionsSchema.parse({ chunkSize: settings.chunkSize, overlap: settings.overlap });
    } catch (err) {
        error(`Invalid settings. ${describeError(err)}`);
        return 1;
    }
    if (settings.configPath !== null) {
        info(`Config: ${settings.configPath}`);
    }

    const state = await runPipeline(paths, {
        outputDir: settings.outputDir,
        formats: settings.formats,
        dryRun: options.dryRun,
        chunkSize: settings.chunkSize,
        overlap: settings.overlap
    });

    heading('--- Batch Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    for (const e of state.errors) {
        error(`ERROR [${e.step}]: ${e.message}`);
    }
    if (state.errors.some(e => e.fatal)) {
        heading('✖ Batch failed with fatal errors.');
        return 1;
    }

    const processed = state.outcomes.filter(o => !isBatchErrorRecord(o.result));
    const totalChunks = processed.reduce((acc, o) => acc + o.result.chunks.length, 0);

    success(`Processed ${processed.length}/${state.files.length} file(s).`);
    arrow(`Total chunks: ${totalChunks}`);

    if (!options.dryRun) {
        arrow(`Outputs saved to: ${settings.outputDir}`);
    } else {
        heading('[DRY RUN] No files were written.');
    }

    return 0;
}
