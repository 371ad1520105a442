export { processStatement } from './process.js';
export {
    detectFormat,
    getSupportedExtensions,
    fileExtension,
    baseName,
    isIgnoredFile,
} from './detect.js';
export type { ProcessorFn, FormatDetectionResult } from './detect.js';
