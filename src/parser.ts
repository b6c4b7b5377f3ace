import type { Heading } from './types.js';

/**
 * Regex patterns for the line-oriented AsciiDoc subset we recognise.
 * All patterns are matched against trimmed lines.
 */

// Heading: one or more `=` markers, whitespace, title text
// Group 1: the markers (level)
// Group 2: the title
const HEADING_PATTERN = /^(=+)\s+(.+)$/;

// Block anchor on its own line: [[id]] or [[id,reftext]]
const ANCHOR_PATTERN = /^\[\[([^\[\]]*)\]\]$/;

// Include directive with an empty attribute list: include::path/to/file.adoc[]
const INCLUDE_PATTERN = /^include::([^[\]]+)\[\]/;

// A depth-3 heading anywhere in the page makes it a content page
const IN_PAGE_SECTION_PATTERN = /^===\s+/;

/**
 * A heading together with the explicit anchor marker that preceded it, if any.
 */
export interface ScannedHeading {
  level: number;
  title: string;
  /** Identifier from a `[[id]]` line right before the heading */
  explicitAnchor: string | null;
  /** 1-based line number */
  line: number;
}

/**
 * Which in-page headings surface as sub-navigation
 */
export interface SectionOptions {
  sectionLevels: readonly number[];
  ignoredTitles: readonly string[];
}

/**
 * Derive an anchor id from heading text
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '') // Keep word chars, whitespace and hyphens
    .replace(/\s+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Split file content into lines, normalising Windows and old Mac line endings
 */
export function splitLines(content: string): string[] {
  if (content === '') {
    return [];
  }
  const lines = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  // A trailing newline does not start another line
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Lines that neither carry structure nor break an anchor/heading pair:
 * blanks, comments, attribute definitions and include directives.
 */
export function isSkippableLine(line: string): boolean {
  const trimmed = line.trim();
  return (
    trimmed === '' ||
    trimmed.startsWith('//') ||
    trimmed.startsWith(':') ||
    trimmed.startsWith('include::')
  );
}

/**
 * Parse a heading line - returns level and title, or null
 */
export function parseHeading(line: string): { level: number; title: string } | null {
  const match = line.trim().match(HEADING_PATTERN);
  if (!match) return null;

  const title = match[2].trim();
  if (!title) return null;

  return { level: match[1].length, title };
}

/**
 * Parse an anchor marker line - returns the id, or null.
 * For `[[id,reftext]]` only the id is returned.
 */
export function parseAnchor(line: string): string | null {
  const match = line.trim().match(ANCHOR_PATTERN);
  if (!match) return null;

  const id = match[1].split(',')[0].trim();
  return id || null;
}

/**
 * Targets of `include::target[]` lines, in source order, unresolved
 */
export function parseIncludeTargets(lines: readonly string[]): string[] {
  const targets: string[] = [];

  for (const line of lines) {
    const match = line.trim().match(INCLUDE_PATTERN);
    if (!match) continue;

    const target = match[1].trim();
    if (target) {
      targets.push(target);
    }
  }

  return targets;
}

/**
 * Find every heading in source order, pairing each with the anchor marker
 * that immediately precedes it. Skippable lines may sit between the two;
 * any other line drops the pending anchor.
 */
export function scanHeadings(lines: readonly string[]): ScannedHeading[] {
  const headings: ScannedHeading[] = [];
  let pendingAnchor: string | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (ANCHOR_PATTERN.test(line.trim())) {
      pendingAnchor = parseAnchor(line);
      continue;
    }

    if (isSkippableLine(line)) {
      continue;
    }

    const heading = parseHeading(line);
    if (heading) {
      headings.push({
        level: heading.level,
        title: heading.title,
        explicitAnchor: pendingAnchor,
        line: i + 1
      });
    }
    pendingAnchor = null;
  }

  return headings;
}

/**
 * Headings surfaced as in-page sub-navigation.
 * Boilerplate titles on the ignore list never make it out of here.
 */
export function extractSectionHeadings(lines: readonly string[], options: SectionOptions): Heading[] {
  const ignored = new Set(options.ignoredTitles.map(t => t.trim().toLowerCase()));
  const levels = new Set(options.sectionLevels);

  return scanHeadings(lines)
    .filter(h => levels.has(h.level) && !ignored.has(h.title.toLowerCase()))
    .map(h => ({
      level: h.level,
      anchor: h.explicitAnchor ?? slugify(h.title),
      title: h.title
    }));
}

/**
 * Whether the page carries its own `===` sections
 */
export function hasInPageSections(lines: readonly string[]): boolean {
  return lines.some(line => IN_PAGE_SECTION_PATTERN.test(line.trim()));
}
