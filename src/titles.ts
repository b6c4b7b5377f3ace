import type { ResolvedTitle } from './types.js';
import { scanHeadings, slugify } from './parser.js';

export const UNTITLED = 'Untitled';

const untitled = (): ResolvedTitle => ({ title: UNTITLED, anchor: '' });

/**
 * Title of a master (book) document: its first `= ` heading.
 * The anchor is only ever an explicit `[[id]]`; book entries link to the
 * page itself otherwise.
 */
export function resolveDocumentTitle(lines: readonly string[]): ResolvedTitle {
  const heading = scanHeadings(lines).find(h => h.level === 1);
  if (!heading) {
    return untitled();
  }
  return { title: heading.title, anchor: heading.explicitAnchor ?? '' };
}

/**
 * Title of an included page: its first heading of level 2 or deeper.
 * Falls back to a slug of the title when no `[[id]]` precedes it.
 */
export function resolvePageTitle(lines: readonly string[]): ResolvedTitle {
  const heading = scanHeadings(lines).find(h => h.level >= 2);
  if (!heading) {
    return untitled();
  }
  return { title: heading.title, anchor: heading.explicitAnchor ?? slugify(heading.title) };
}

export function isUntitled(resolved: ResolvedTitle): boolean {
  return !resolved.title || resolved.title.toLowerCase() === UNTITLED.toLowerCase();
}
