import * as path from 'node:path';
import type { AliasStub, AliasTable } from './types.js';
import { type Logger, type SourceTree, toPosixPath } from './loader.js';
import { NavOutputError } from './errors.js';

/**
 * Where a page links to under a given master
 */
export interface AliasResolution {
  /** Link target: the alias page when a rule applies, else the page itself */
  path: string;
  /** Alias page path, or null when no rule applies */
  aliasPath: string | null;
}

/**
 * Look up the alias rule for a shared page under a master.
 * Rules keyed by the master's relative path take priority over rules keyed
 * by its bare file name.
 */
export function resolveAlias(table: AliasTable, masterKey: string, contentPath: string): AliasResolution {
  const keys = [masterKey, path.posix.basename(masterKey)];

  for (const key of keys) {
    const aliasPath = table[key]?.[contentPath];
    if (aliasPath) {
      return { path: aliasPath, aliasPath };
    }
  }

  return { path: contentPath, aliasPath: null };
}

/**
 * Build the alias page for `contentPath`: a page-alias attribute naming the
 * shared page, then an include of it relative to the alias page's directory.
 */
export function buildAliasStub(pagesDir: string, aliasPath: string, contentPath: string): AliasStub {
  const aliasAbs = path.join(pagesDir, aliasPath);
  const contentAbs = path.join(pagesDir, contentPath);
  const includePath = toPosixPath(path.relative(path.dirname(aliasAbs), contentAbs));

  return {
    path: aliasPath,
    content: `:page-alias: ${contentPath}\ninclude::${includePath}[]\n`
  };
}

/**
 * Write an alias page, replacing whatever is there
 */
export function writeAliasStub(tree: SourceTree, pagesDir: string, stub: AliasStub, log: Logger = console.log): void {
  const target = path.join(pagesDir, stub.path);
  try {
    tree.writeText(target, stub.content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new NavOutputError(`Could not write alias file ${target}: ${reason}`);
  }
  log(`  -> Generated alias file: ${stub.path}`);
}
