import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { BatchManifest, ManifestEntry } from '@statement-chunker/shared';
import type { FileOutcome, PipelineStep } from '../types.js';
import { isBatchErrorRecord } from '../../service/statement-service.js';
import { renderJson, renderMarkdown } from '../../export/index.js';
import { generateTableExcel, workbookToBytes } from '../../excel/table.js';

export const MANIFEST_FILENAME = 'manifest.json';
export const VERSION = '1.0.0';

/**
 * Output base name per input: the file name itself, with _2, _3, ... added
 * when two inputs from different directories share a name.
 */
export function outputStems(outcomes: readonly FileOutcome[]): string[] {
    const taken = new Set<string>();
    return outcomes.map(({ file }) => {
        let stem = file.filename;
        for (let n = 2; taken.has(stem); n++) {
            stem = `${file.filename}_${n}`;
        }
        taken.add(stem);
        return stem;
    });
}

function manifestEntry({ file, result }: FileOutcome): ManifestEntry {
    if (isBatchErrorRecord(result)) {
        return {
            file_path: file.path,
            hash: file.hash,
            file_type: file.format,
            num_chunks: 0,
            fallback_used: true,
            error: result.error
        };
    }
    return {
        file_path: file.path,
        hash: file.hash,
        file_type: file.format,
        num_chunks: result.file_info.num_chunks,
        fallback_used: result.fallback_used,
        error: null
    };
}

/**
 * Step 3: Export
 * Writes the requested formats per processed file, then the run manifest.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const { outputDir, formats } = state.options;

    try {
        await mkdir(outputDir, { recursive: true });

        const stems = outputStems(state.outcomes);
        for (let i = 0; i < state.outcomes.length; i++) {
            const { result } = state.outcomes[i];
            if (isBatchErrorRecord(result)) {
                continue;
            }

            if (formats.includes('json')) {
                const path = join(outputDir, `${stems[i]}.json`);
                await writeFile(path, renderJson(result));
                state.outputs.push(path);
            }
            if (formats.includes('md')) {
                const path = join(outputDir, `${stems[i]}.md`);
                await writeFile(path, renderMarkdown(result.chunks));
                state.outputs.push(path);
            }
            if (formats.includes('xlsx')) {
                const path = join(outputDir, `${stems[i]}.xlsx`);
                await writeFile(path, await workbookToBytes(generateTableExcel(result)));
                state.outputs.push(path);
            }
        }

        const manifest: BatchManifest = {
            run_timestamp: new Date().toISOString(),
            chunk_size: state.options.chunkSize,
            overlap: state.options.overlap,
            files: state.outcomes.map(manifestEntry),
            outputs: [...state.outputs],
            version: VERSION
        };

        const manifestPath = join(outputDir, MANIFEST_FILENAME);
        await writeFile(manifestPath, JSON.stringify(manifest, null, 2));
        state.outputs.push(manifestPath);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${outputDir}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
