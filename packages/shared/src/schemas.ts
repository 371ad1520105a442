/**
 * Zod schemas for Statement Chunker data structures.
 *
 * Metadata is a Map: chunk serialization depends on the order keys were
 * first seen, and a Map keeps insertion order for every key shape.
 */

import { z } from 'zod';
import { CHUNKING } from './constants.js';

// ============================================================================
// Column roles
// ============================================================================

export const ColumnRoleSchema = z.enum([
    'date',
    'narration',
    'reference',
    'debit',
    'credit',
    'balance',
    'init',
    'value_date',
    'unknown',
]);

export type ColumnRole = z.infer<typeof ColumnRoleSchema>;

/**
 * Role → column index. At most one index per role; the first column wins.
 */
export const ColumnMapSchema = z.record(
    ColumnRoleSchema.exclude(['unknown']),
    z.number().int().min(0)
);

export type ColumnMap = Partial<Record<Exclude<ColumnRole, 'unknown'>, number>>;

// ============================================================================
// Options
// ============================================================================

export const ChunkerOptionsSchema = z
    .object({
        chunkSize: z.number().int().min(1).default(CHUNKING.DEFAULT_CHUNK_SIZE),
        overlap: z.number().int().min(0).default(CHUNKING.DEFAULT_OVERLAP),
    })
    .refine((opts) => opts.overlap < opts.chunkSize, {
        message: 'overlap must be smaller than chunkSize',
        path: ['overlap'],
    });

export type ChunkerOptions = z.infer<typeof ChunkerOptionsSchema>;
export type ChunkerOptionsInput = z.input<typeof ChunkerOptionsSchema>;

// ============================================================================
// Results
// ============================================================================

export const MetadataSchema = z.map(z.string(), z.string());

export type Metadata = z.infer<typeof MetadataSchema>;

const CellSchema = z.string().nullable();

/**
 * The normalized transaction table the chunks were cut from.
 */
export const NormalizedTableSchema = z.object({
    headers: z.array(z.string()),
    columnMap: ColumnMapSchema,
    rows: z.array(z.array(CellSchema)),
});

export type NormalizedTable = z.infer<typeof NormalizedTableSchema>;

export const ProcessingResultSchema = z.object({
    metadata: MetadataSchema,
    chunks: z.array(z.string()),
    fallback_used: z.boolean(),
    warnings: z.array(z.string()),
    table: NormalizedTableSchema.nullable(),
});

export type ProcessingResult = z.infer<typeof ProcessingResultSchema>;

export const FileInfoSchema = z.object({
    file_path: z.string(),
    file_size: z.number().int().min(0),
    file_type: z.string(),
    num_chunks: z.number().int().min(0),
});

export type FileInfo = z.infer<typeof FileInfoSchema>;

/**
 * Processing result wrapped with file information by the service layer.
 */
export const ServiceResultSchema = ProcessingResultSchema.extend({
    file_info: FileInfoSchema,
});

export type ServiceResult = z.infer<typeof ServiceResultSchema>;

/**
 * Per-item record produced by batch processing when a file fails.
 */
export const BatchErrorRecordSchema = z.object({
    error: z.string(),
    file_path: z.string(),
    chunks: z.array(z.string()).length(0),
    metadata: MetadataSchema,
    fallback_used: z.literal(true),
    file_info: z.object({ error: z.literal(true) }),
});

export type BatchErrorRecord = z.infer<typeof BatchErrorRecordSchema>;

// ============================================================================
// Configuration file
// ============================================================================

export const OutputFormatSchema = z.enum(['json', 'md', 'xlsx']);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * statement-chunker.yaml. Every key is optional; CLI flags take precedence.
 */
export const ChunkerConfigSchema = z.object({
    chunk_size: z.number().int().min(1).optional(),
    overlap: z.number().int().min(0).optional(),
    output_dir: z.string().min(1).optional(),
    formats: z.array(OutputFormatSchema).min(1).optional(),
});

export type ChunkerConfig = z.infer<typeof ChunkerConfigSchema>;

// ============================================================================
// Batch manifest
// ============================================================================

export const ManifestEntrySchema = z.object({
    file_path: z.string(),
    hash: z.string().regex(/^sha256:[0-9a-f]{64}$/),
    file_type: z.string(),
    num_chunks: z.number().int().min(0),
    fallback_used: z.boolean(),
    error: z.string().nullable(),
});

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

/**
 * manifest.json written next to the batch outputs.
 */
export const BatchManifestSchema = z.object({
    run_timestamp: z.string().datetime(),
    chunk_size: z.number().int().min(1),
    overlap: z.number().int().min(0),
    files: z.array(ManifestEntrySchema),
    outputs: z.array(z.string()),
    version: z.string(),
});

export type BatchManifest = z.infer<typeof BatchManifestSchema>;
