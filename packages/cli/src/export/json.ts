import type { Metadata, ServiceResult } from '@statement-chunker/shared';

/**
 * JSON shape of a processed file. Metadata becomes a plain object; its key
 * order is the extraction order.
 */
export interface JsonDocument {
    metadata: Record<string, string>;
    chunks: string[];
    fallback_used: boolean;
    file_info: ServiceResult['file_info'];
}

export function metadataToObject(metadata: Metadata): Record<string, string> {
    return Object.fromEntries(metadata);
}

export function toJsonDocument(result: ServiceResult): JsonDocument {
    return {
        metadata: metadataToObject(result.metadata),
        chunks: result.chunks,
        fallback_used: result.fallback_used,
        file_info: result.file_info,
    };
}

export function renderJson(result: ServiceResult): string {
    return JSON.stringify(toJsonDocument(result), null, 2);
}
