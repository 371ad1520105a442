import type { PipelineStep } from '../types.js';
import { StatementService, isBatchErrorRecord } from '../../service/statement-service.js';

/**
 * Step 2: Chunking
 * Runs every discovered file through the service. A failing file is recorded
 * as a non-fatal error and the run moves on.
 */
export const chunkFiles: PipelineStep = async (state) => {
    const service = new StatementService({
        chunkSize: state.options.chunkSize,
        overlap: state.options.overlap
    });

    const items = await service.batchProcess(state.files.map(f => f.path));

    state.outcomes = state.files.map((file, i) => ({ file, result: items[i] }));

    for (const { file, result } of state.outcomes) {
        if (isBatchErrorRecord(result)) {
            state.errors.push({
                step: 'chunk',
                message: `Failed to process ${file.filename}: ${result.error}`,
                fatal: false
            });
            continue;
        }
        // Forward core warnings to pipeline state
        for (const warning of result.warnings) {
            state.warnings.push(`[${file.filename}] ${warning}`);
        }
    }

    return state;
};
