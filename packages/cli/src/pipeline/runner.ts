import type { BatchOptions, PipelineState, PipelineStep } from './types.js';
import { discoverFiles } from './steps/discover.js';
import { chunkFiles } from './steps/chunk.js';
import { exportResults } from './steps/export.js';
import { arrow, error } from '../utils/console.js';

/**
 * Initial state for a batch run.
 */
export function createPipelineState(inputs: string[], options: BatchOptions): PipelineState {
    return {
        inputs,
        options,
        files: [],
        outcomes: [],
        outputs: [],
        warnings: [],
        errors: [],
    };
}

/**
 * Orchestrates the execution of the batch pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(inputs: string[], options: BatchOptions): Promise<PipelineState> {
    let state = createPipelineState(inputs, options);

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'File Discovery', fn: discoverFiles },
        { name: 'Chunking', fn: chunkFiles },
        { name: 'Export Results', fn: exportResults },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
