import type { BatchErrorRecord, OutputFormat, ServiceResult } from '@statement-chunker/shared';
import type { StatementFormat } from '@statement-chunker/core';

/**
 * Settings of one batch run.
 */
export interface BatchOptions {
    outputDir: string;
    formats: OutputFormat[];
    dryRun: boolean;
    chunkSize: number;
    overlap: number;
}

/**
 * A statement file found during discovery.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash: string;
    format: StatementFormat;
}

/**
 * Outcome of chunking one input file.
 */
export interface FileOutcome {
    file: InputFile;
    result: ServiceResult | BatchErrorRecord;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the batch pipeline.
 */
export interface PipelineState {
    /** Paths given on the command line: files or directories */
    inputs: string[];
    options: BatchOptions;

    // Accumulated during pipeline execution
    files: InputFile[];
    outcomes: FileOutcome[];
    /** Paths written by the export step */
    outputs: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
