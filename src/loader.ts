import fs from 'fs-extra';
import * as path from 'node:path';
import { parseIncludeTargets, splitLines } from './parser.js';

/**
 * File access used by the generator. Paths are absolute.
 */
export interface SourceTree {
  exists(filePath: string): boolean;
  /** Throws when the file cannot be read */
  readText(filePath: string): string;
  /** Creates missing parent directories, overwrites existing files */
  writeText(filePath: string, content: string): void;
}

export type WarningSink = (message: string) => void;

/** Progress output; stdout normally, stderr when stdout carries the nav */
export type Logger = (message: string) => void;

/**
 * SourceTree backed by the real filesystem
 */
export class DiskSourceTree implements SourceTree {
  exists(filePath: string): boolean {
    return fs.pathExistsSync(filePath);
  }

  readText(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  writeText(filePath: string, content: string): void {
    fs.outputFileSync(filePath, content, 'utf-8');
  }
}

/**
 * Options for resolving include directives
 */
export interface IncludeOptions {
  /** Includes under this directory are partials, never navigation pages */
  partialsDir: string;
  warn?: WarningSink;
}

/**
 * Convert a platform path to the `/`-separated form used in xrefs
 */
export function toPosixPath(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Whether `child` lies strictly inside directory `dir`
 */
export function isInsideDir(child: string, dir: string): boolean {
  const rel = path.relative(dir, child);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Read a source file as lines. Unreadable files read as empty.
 */
export function readSourceLines(tree: SourceTree, filePath: string, warn: WarningSink = console.warn): string[] {
  try {
    return splitLines(tree.readText(filePath));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    warn(`Warning: Could not read ${filePath}: ${reason}`);
    return [];
  }
}

/**
 * Print the first lines of a file to help diagnose why it was skipped
 */
export function logFileHead(tree: SourceTree, filePath: string, maxLines = 15, log: Logger = console.log): void {
  const lines = readSourceLines(tree, filePath, log);
  log(`DEBUG: First ${maxLines} lines of ${filePath}:`);
  lines.slice(0, maxLines).forEach((line, i) => {
    log(`  ${String(i + 1).padStart(2)}: ${JSON.stringify(line)}`);
  });
  if (lines.length > maxLines) {
    log(`  ... (${lines.length - maxLines} more lines)`);
  }
}

/**
 * Resolve the navigable includes of a file: absolute paths, in source order,
 * existing, and outside the partials directory.
 */
export function resolveIncludeFiles(
  tree: SourceTree,
  filePath: string,
  lines: readonly string[],
  options: IncludeOptions
): string[] {
  const { partialsDir, warn = console.warn } = options;
  const baseDir = path.dirname(filePath);
  const includes: string[] = [];

  for (const target of parseIncludeTargets(lines)) {
    const resolved = path.resolve(baseDir, target);

    if (isInsideDir(resolved, partialsDir)) {
      continue;
    }

    if (!tree.exists(resolved)) {
      warn(`Warning: Include file not found: ${resolved}`);
      continue;
    }

    includes.push(resolved);
  }

  return includes;
}
