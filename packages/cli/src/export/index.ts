export { renderJson, toJsonDocument, metadataToObject } from './json.js';
export type { JsonDocument } from './json.js';
export { renderMarkdown } from './markdown.js';
