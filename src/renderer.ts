import type { NavBook, NavEntry } from './types.js';
import type { SourceTree } from './loader.js';
import { NavOutputError } from './errors.js';

export const GENERATED_HEADER = [
  '// WARNING: This file is generated. DO NOT EDIT DIRECTLY.',
  ''
];

/**
 * Create a nav entry with its depth clamped into 1..maxDepth
 */
export function createNavEntry(
  depth: number,
  target: string,
  title: string,
  anchor: string,
  maxDepth: number
): NavEntry {
  return {
    depth: Math.max(1, Math.min(depth, maxDepth)),
    target,
    anchor,
    title
  };
}

/**
 * Format one entry as an Antora nav list item
 */
export function formatNavEntry(entry: NavEntry): string {
  const marker = '*'.repeat(entry.depth);
  const fragment = entry.anchor ? `#${entry.anchor}` : '';
  return `${marker} xref:${entry.target}${fragment}[${entry.title}]`;
}

/**
 * Render the full nav file: header, then each book's entries with a blank
 * line between books
 */
export function renderNav(books: readonly NavBook[]): string {
  const lines = [...GENERATED_HEADER];

  books.forEach((book, i) => {
    lines.push(...book.entries.map(formatNavEntry));
    if (i < books.length - 1) {
      lines.push('');
    }
  });

  return lines.join('\n') + '\n';
}

export function countEntries(books: readonly NavBook[]): number {
  return books.reduce((sum, book) => sum + book.entries.length, 0);
}

export function writeNavFile(tree: SourceTree, navFile: string, content: string): void {
  try {
    tree.writeText(navFile, content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new NavOutputError(`Could not write navigation file ${navFile}: ${reason}`);
  }
}
