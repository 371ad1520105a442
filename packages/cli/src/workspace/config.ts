import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse } from 'yaml';
import {
    CHUNKING,
    CONFIG_FILENAME,
    ChunkerConfigSchema,
    type ChunkerConfig,
    type OutputFormat,
} from '@statement-chunker/shared';
import type { ResolvedSettings } from '../types.js';

export const DEFAULT_OUTPUT_DIR = 'chunks';
export const DEFAULT_FORMATS: readonly OutputFormat[] = ['json'];

/**
 * Searches for statement-chunker.yaml starting at startPath and bubbling up
 * to the file system root.
 */
export function findConfigFile(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, CONFIG_FILENAME);
        if (existsSync(configPath)) {
            return configPath;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}

/**
 * Loads and validates a config file. An empty file is an empty config.
 */
export function loadConfig(path: string): ChunkerConfig {
    if (!existsSync(path)) {
        throw new Error(`Config file not found: ${path}`);
    }
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    if (data === null || data === undefined) {
        return {};
    }
    return ChunkerConfigSchema.parse(data);
}

export interface SettingFlags {
    chunkSize?: number;
    overlap?: number;
    outputDir?: string;
    formats?: OutputFormat[];
    config?: string;
}

/**
 * Merge settings: flag > config file > default.
 *
 * An explicit --config must exist; otherwise the nearest config file above
 * startPath is used when there is one. A relative output_dir in the config
 * is resolved against the config file's directory.
 */
export function resolveSettings(flags: SettingFlags, startPath: string = process.cwd()): ResolvedSettings {
    const configPath = flags.config !== undefined ? resolve(startPath, flags.config) : findConfigFile(startPath);
    const config = configPath !== null ? loadConfig(configPath) : {};

    const configOutputDir = config.output_dir !== undefined && configPath !== null
        ? resolve(dirname(configPath), config.output_dir)
        : undefined;

    return {
        chunkSize: flags.chunkSize ?? config.chunk_size ?? CHUNKING.DEFAULT_CHUNK_SIZE,
        overlap: flags.overlap ?? config.overlap ?? CHUNKING.DEFAULT_OVERLAP,
        outputDir: flags.outputDir ?? configOutputDir ?? DEFAULT_OUTPUT_DIR,
        formats: flags.formats ?? config.formats ?? [...DEFAULT_FORMATS],
        configPath,
    };
}
