#!/usr/bin/env node
/**
 * Statement Chunker CLI
 *
 * - CLI handles all file I/O (uses node:fs)
 * - Core receives ArrayBuffer, returns ProcessingResult
 * - Core has no file system access, no console.* calls
 */

import { Command, InvalidArgumentError } from 'commander';
import { OutputFormatSchema, type OutputFormat } from '@statement-chunker/shared';
import { processCommand } from './commands/process.js';
import { batchCommand } from './commands/batch.js';
import { error } from './utils/console.js';
import { describeError } from './utils/errors.js';
import type { BatchCommandOptions, ProcessCommandOptions } from './types.js';

function parseInteger(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return n;
}

/**
 * Accepts repeated flags and comma lists: --format json --format md, --format json,md
 */
function parseFormats(value: string, previous: OutputFormat[] | undefined): OutputFormat[] {
    const formats = [...(previous ?? [])];
    for (const part of value.split(',')) {
        const parsed = OutputFormatSchema.safeParse(part.trim());
        if (!parsed.success) {
            throw new InvalidArgumentError(`Use one of: ${OutputFormatSchema.options.join(', ')}.`);
        }
        if (!formats.includes(parsed.data)) {
            formats.push(parsed.data);
        }
    }
    return formats;
}

const program = new Command();

program
    .name('statement-chunker')
    .description('Turn bank statements (PDF, CSV, Excel) into normalized transactions and text chunks')
    .version('1.0.0');

program
    .command('process')
    .description('Chunk a single statement file')
    .argument('<file>', 'Statement file (.pdf, .csv, .xlsx, .xls)')
    .option('-c, --chunk-size <n>', 'Transactions per chunk', parseInteger)
    .option('--overlap <n>', 'Transactions repeated between consecutive chunks', parseInteger)
    .option('-o, --out <file>', 'Write the JSON result here (default: stdout)')
    .option('--md <file>', 'Also write a Markdown rendering of the chunks')
    .option('--xlsx <file>', 'Also write the normalized table as an Excel workbook')
    .option('--config <file>', 'Config file (default: nearest statement-chunker.yaml)')
    .option('-v, --verbose', 'Print every chunk', false)
    .action(async (file: string, options: ProcessCommandOptions) => {
        process.exitCode = await processCommand(file, options);
    });

program
    .command('batch')
    .description('Chunk every statement in the given files and directories')
    .argument('<paths...>', 'Files or directories')
    .option('-d, --out-dir <dir>', 'Output directory')
    .option('-f, --format <formats>', 'Output formats: json, md, xlsx (repeatable or comma-separated)', parseFormats)
    .option('--dry-run', 'Process without writing any files', false)
    .option('-c, --chunk-size <n>', 'Transactions per chunk', parseInteger)
    .option('--overlap <n>', 'Transactions repeated between consecutive chunks', parseInteger)
    .option('--config <file>', 'Config file (default: nearest statement-chunker.yaml)')
    .action(async (paths: string[], options: BatchCommandOptions) => {
        process.exitCode = await batchCommand(paths, options);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    error(`Unexpected error: ${describeError(err)}`);
    process.exit(1);
});
