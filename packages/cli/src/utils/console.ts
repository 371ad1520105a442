/**
 * Formatted console output helpers
 */

export function log(message: string): void {
    console.log(message);
}

export function heading(title: string): void {
    console.log(`\n${title}`);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

/**
 * Print a chunk under a numbered rule, every line indented.
 */
export function chunkBlock(index: number, text: string, indent: string = '    '): void {
    console.log(`\n--- Chunk ${index} ---`);
    console.log(text.split('\n').map((line) => `${indent}${line}`).join('\n'));
}
