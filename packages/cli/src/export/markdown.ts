/**
 * Markdown rendering of a chunk list: title, chunk count, then one section
 * per chunk, each followed by a rule.
 */
export function renderMarkdown(chunks: readonly string[]): string {
    let out = `# Bank Statement\n\nTotal chunks: ${chunks.length}\n\n---\n\n`;
    chunks.forEach((chunk, i) => {
        out += `## Chunk ${i + 1}\n\n${chunk}\n\n---\n\n`;
    });
    return out;
}
