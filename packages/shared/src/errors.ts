/**
 * Errors that propagate out of single-file processing.
 * Everything else is recovered by a fallback and reported as a warning.
 */

export class UnsupportedFormatError extends Error {
    readonly extension: string;

    constructor(extension: string, supported: readonly string[]) {
        super(`Unsupported file type "${extension || '(none)'}". Use ${supported.join(', ')}`);
        this.name = 'UnsupportedFormatError';
        this.extension = extension;
    }
}

export class MissingFileError extends Error {
    readonly filePath: string;

    constructor(filePath: string) {
        super(`File not found: ${filePath}`);
        this.name = 'MissingFileError';
        this.filePath = filePath;
    }
}
