import type { PackedFileEntry } from './types';

/**
 * Serializes one entry: a heading with the root-relative path, then the raw content
 * in a fenced block.
 */
export function formatEntry(entry: PackedFileEntry): string {
  return `\n## File: \`${entry.relativePath}\`\n\n\`\`\`\n${entry.content}\n\`\`\`\n`;
}

/** Number of code points; astral characters count once. */
export function countCharacters(text: string): number {
  const surrogatePairs = text.match(/[\uD800-\uDBFF][\uDC00-\uDFFF]/g);
  return text.length - (surrogatePairs?.length ?? 0);
}
