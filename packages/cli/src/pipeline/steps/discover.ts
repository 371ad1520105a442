import type { Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { detectFormat, getSupportedExtensions, isIgnoredFile } from '@statement-chunker/core';
import type { PipelineState, PipelineStep, InputFile } from '../types.js';
import { hashFile } from '../../utils/hash.js';

/**
 * Expand one input into candidate file paths. Directories are listed one
 * level deep, in name order.
 */
async function expandInput(input: string, state: PipelineState): Promise<string[]> {
    let s: Stats;
    try {
        s = await stat(input);
    } catch (err) {
        state.errors.push({
            step: 'discover',
            message: `Input not found: ${input}`,
            fatal: false,
            error: err
        });
        return [];
    }

    if (!s.isDirectory()) {
        return [input];
    }

    const paths: string[] = [];
    for (const entry of (await readdir(input)).sort()) {
        const entryPath = join(input, entry);
        if ((await stat(entryPath)).isFile()) {
            paths.push(entryPath);
        }
    }
    return paths;
}

/**
 * Step 1: File Discovery
 * Expands directories, skips hidden/temporary/unsupported files, hashes the rest.
 */
export const discoverFiles: PipelineStep = async (state) => {
    const files: InputFile[] = [];
    const seen = new Set<string>();

    try {
        for (const input of state.inputs) {
            for (const filePath of await expandInput(input, state)) {
                const filename = basename(filePath);
                if (isIgnoredFile(filename) || seen.has(filePath)) {
                    continue;
                }
                seen.add(filePath);

                const detection = detectFormat(filename);
                if (detection === null) {
                    state.warnings.push(`File skipped (unsupported format): ${filename}`);
                    continue;
                }

                files.push({
                    path: filePath,
                    filename,
                    hash: await hashFile(filePath),
                    format: detection.format
                });
            }
        }
    } catch (err) {
        state.errors.push({
            step: 'discover',
            message: `Error scanning inputs: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err
        });
        return state;
    }

    state.files = files;

    if (files.length === 0) {
        state.errors.push({
            step: 'discover',
            message: `No statement files found. Supported: ${getSupportedExtensions().join(', ')}`,
            fatal: true
        });
    }

    return state;
};
