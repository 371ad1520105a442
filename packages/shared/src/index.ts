// Schemas
export {
    ColumnRoleSchema,
    ColumnMapSchema,
    ChunkerOptionsSchema,
    MetadataSchema,
    NormalizedTableSchema,
    ProcessingResultSchema,
    FileInfoSchema,
    ServiceResultSchema,
    BatchErrorRecordSchema,
    OutputFormatSchema,
    ChunkerConfigSchema,
    ManifestEntrySchema,
    BatchManifestSchema,
} from './schemas.js';

// Types
export type {
    ColumnRole,
    ColumnMap,
    ChunkerOptions,
    ChunkerOptionsInput,
    Metadata,
    NormalizedTable,
    ProcessingResult,
    FileInfo,
    ServiceResult,
    BatchErrorRecord,
    OutputFormat,
    ChunkerConfig,
    ManifestEntry,
    BatchManifest,
} from './schemas.js';

// Constants
export {
    COLUMN_PATTERNS,
    STANDARD_NAMES,
    STANDARD_NAMES_TABULAR,
    HEADER_INDICATORS,
    HEADER_DETECTION,
    FOOTER_KEYWORDS,
    TRANSACTION_INDICATORS,
    CHUNKING,
    TEXT_SPLITTER,
    FALLBACK_MARKER,
    PDF_LAYOUT,
    CONFIG_FILENAME,
} from './constants.js';

// Errors
export { UnsupportedFormatError, MissingFileError } from './errors.js';
