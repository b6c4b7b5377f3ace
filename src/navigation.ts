import * as path from 'node:path';
import type { AliasStub, NavBook, NavConfig, NavEntry, NavResult } from './types.js';
import { extractSectionHeadings, hasInPageSections } from './parser.js';
import { isUntitled, resolveDocumentTitle, resolvePageTitle } from './titles.js';
import { resolveAlias, buildAliasStub, writeAliasStub } from './alias.js';
import {
  type Logger,
  type SourceTree,
  isInsideDir,
  logFileHead,
  readSourceLines,
  resolveIncludeFiles,
  toPosixPath
} from './loader.js';
import { countEntries, createNavEntry, renderNav, writeNavFile } from './renderer.js';
import { NavOutputError } from './errors.js';

/** Depth at which a master's direct includes are listed */
const FIRST_PAGE_DEPTH = 2;

/** Lines of a skipped page echoed to the log */
const DEBUG_HEAD_LINES = 15;

/**
 * Walk every master document and collect the navigation entries.
 * Nothing is written; alias pages to create are returned in `aliasStubs`.
 */
export function buildNavigation(config: NavConfig, tree: SourceTree, log: Logger = console.log): NavResult {
  const books: NavBook[] = [];
  const warnings: string[] = [];
  const aliasStubs = new Map<string, AliasStub>();

  // (file, master) pairs already expanded during this run
  const visited = new Set<string>();

  function warn(message: string): void {
    warnings.push(message);
    console.warn(message);
  }

  function markVisited(file: string, masterKey: string): boolean {
    const key = `${file}\u0000${masterKey}`;
    if (visited.has(key)) {
      return false;
    }
    visited.add(key);
    return true;
  }

  function entry(depth: number, target: string, title: string, anchor: string): NavEntry {
    return createNavEntry(depth, target, title, anchor, config.maxDepth);
  }

  function includesOf(file: string, lines: readonly string[]): string[] {
    return resolveIncludeFiles(tree, file, lines, { partialsDir: config.partialsDir, warn });
  }

  function processPage(file: string, masterKey: string, depth: number, entries: NavEntry[]): void {
    if (!isInsideDir(file, config.pagesDir)) {
      warn(`Warning: File outside pages dir: ${file}`);
      return;
    }

    const contentPath = toPosixPath(path.relative(config.pagesDir, file));
    const { path: target, aliasPath } = resolveAlias(config.aliases, masterKey, contentPath);
    if (aliasPath) {
      aliasStubs.set(aliasPath, buildAliasStub(config.pagesDir, aliasPath, contentPath));
    }

    const lines = readSourceLines(tree, file, warn);
    const page = resolvePageTitle(lines);
    if (isUntitled(page)) {
      warn(`Warning: Skipping file with problematic title '${page.title}': ${file}`);
      logFileHead(tree, file, DEBUG_HEAD_LINES, log);
      return;
    }

    entries.push(entry(depth, target, page.title, page.anchor));

    const includes = includesOf(file, lines);
    const isAggregator = includes.length > 0 && !hasInPageSections(lines);

    // Shared table-of-contents page: list its chapters as sections of the
    // alias page instead of linking into the shared files
    if (isAggregator && aliasPath) {
      for (const child of includes) {
        const chapter = resolvePageTitle(readSourceLines(tree, child, warn));
        if (isUntitled(chapter)) continue;
        entries.push(entry(depth + 1, target, chapter.title, chapter.anchor));
      }
      return;
    }

    for (const section of extractSectionHeadings(lines, config)) {
      // Skip "Introduction -> Introduction" style repeats of the page heading
      if (section.anchor === page.anchor || section.title.toLowerCase() === page.title.toLowerCase()) {
        continue;
      }
      const sectionDepth = depth + (section.level - 2);
      if (sectionDepth < 1 || sectionDepth > config.maxDepth) {
        continue;
      }
      entries.push(entry(sectionDepth, target, section.title, section.anchor));
    }

    if (isAggregator) {
      for (const child of includes) {
        if (!markVisited(child, masterKey)) continue;
        processPage(child, masterKey, Math.min(depth + 1, config.maxDepth), entries);
      }
    }
  }

  for (const master of config.masters) {
    const masterFile = path.join(config.pagesDir, master);

    if (!tree.exists(masterFile)) {
      warn(`Warning: Master file not found: ${masterFile}`);
      continue;
    }

    log(`Processing master: ${master}`);

    const masterKey = toPosixPath(path.relative(config.pagesDir, masterFile));
    const lines = readSourceLines(tree, masterFile, warn);
    const book = resolveDocumentTitle(lines);
    if (isUntitled(book)) {
      warn(`Warning: Master file has no document title: ${masterFile}`);
    }

    const entries: NavEntry[] = [entry(1, masterKey, book.title, book.anchor)];

    for (const include of includesOf(masterFile, lines)) {
      if (!markVisited(include, masterKey)) continue;
      processPage(include, masterKey, FIRST_PAGE_DEPTH, entries);
    }

    books.push({ master: masterKey, entries });
  }

  return { books, aliasStubs: Array.from(aliasStubs.values()), warnings };
}

/**
 * Generate alias pages and the nav file on disk.
 * An alias page that cannot be written becomes a warning; only a failed
 * nav file write throws.
 */
export function generateNavigation(config: NavConfig, tree: SourceTree, log: Logger = console.log): NavResult {
  const result = buildNavigation(config, tree, log);

  for (const stub of result.aliasStubs) {
    try {
      writeAliasStub(tree, config.pagesDir, stub, log);
    } catch (err) {
      if (!(err instanceof NavOutputError)) throw err;
      const message = `Warning: ${err.message}`;
      result.warnings.push(message);
      console.warn(message);
    }
  }

  writeNavFile(tree, config.navFile, renderNav(result.books));

  log(`Successfully generated navigation: ${config.navFile}`);
  log(`Total navigation entries: ${countEntries(result.books)}`);

  return result;
}
