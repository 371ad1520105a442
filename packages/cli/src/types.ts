/**
 * Statement Chunker CLI - Core Types
 */

import type { OutputFormat } from '@statement-chunker/shared';

/**
 * Flags of `statement-chunker process <file>`, as commander hands them over.
 */
export interface ProcessCommandOptions {
    chunkSize?: number;
    overlap?: number;
    out?: string;
    md?: string;
    xlsx?: string;
    config?: string;
    verbose: boolean;
}

/**
 * Flags of `statement-chunker batch <paths...>`.
 */
export interface BatchCommandOptions {
    outDir?: string;
    format?: OutputFormat[];
    dryRun: boolean;
    chunkSize?: number;
    overlap?: number;
    config?: string;
}

/**
 * Effective settings after merging flags, config file and defaults.
 */
export interface ResolvedSettings {
    chunkSize: number;
    overlap: number;
    outputDir: string;
    formats: OutputFormat[];
    /** Config file that contributed, if any */
    configPath: string | null;
}
