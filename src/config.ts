/**
 * Generator configuration.
 *
 * Loads an optional navgen.config.json and resolves it against the project
 * root. Every setting has a default, so a bare Antora component layout
 * (src/modules/ROOT/{pages,partials,nav.adoc}) needs no file at all.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { z } from 'zod';
import type { NavConfig } from './types.js';
import { NavConfigError } from './errors.js';
import type { Logger } from './loader.js';

export const DEFAULT_CONFIG_FILE = 'navgen.config.json';

const RelativePathSchema = z.string().min(1, 'Path must not be empty');

export const AliasTableSchema = z.record(z.string(), z.record(z.string(), RelativePathSchema));

export const NavConfigFileSchema = z.object({
  /** Antora module root, relative to the project root */
  moduleRoot: RelativePathSchema.optional(),
  /** The following three are relative to moduleRoot */
  pagesDir: RelativePathSchema.optional(),
  partialsDir: RelativePathSchema.optional(),
  navFile: RelativePathSchema.optional(),
  masters: z.array(RelativePathSchema).min(1, 'At least one master file is required').optional(),
  aliases: AliasTableSchema.optional(),
  maxDepth: z.number().int().min(1).max(6).optional(),
  sectionLevels: z.array(z.number().int().min(2).max(6)).optional(),
  ignoredTitles: z.array(z.string()).optional(),
}).strict();

export type NavConfigFile = z.infer<typeof NavConfigFileSchema>;

export const DEFAULTS = {
  moduleRoot: 'src/modules/ROOT',
  pagesDir: 'pages',
  partialsDir: 'partials',
  navFile: 'nav.adoc',
  masters: [
    'usersguide/usersguide.adoc',
    'installguide/installguide.adoc',
    'referenceguide/referenceguide.adoc',
  ],
  // Shared content presented under the reference guide's own pages
  aliases: {
    'referenceguide/referenceguide.adoc': {
      'perfdmf/book.adoc': 'referenceguide/taudb-alias.adoc',
      'newguide/introduction.adoc': 'referenceguide/installation-alias.adoc',
    },
  },
  maxDepth: 4,
  sectionLevels: [3],
  ignoredTitles: ['description', 'options', 'example', 'examples', 'notes', 'see also'],
} satisfies Required<NavConfigFile>;

/**
 * Validate raw config file content
 */
export function parseConfigFile(raw: unknown, source: string): NavConfigFile {
  const result = NavConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new NavConfigError(`Invalid configuration in ${source}:\n${problems}`);
  }
  return result.data;
}

/**
 * Apply defaults and make directory settings absolute
 */
export function resolveConfig(file: NavConfigFile, rootDir: string): NavConfig {
  const moduleRoot = path.resolve(rootDir, file.moduleRoot ?? DEFAULTS.moduleRoot);

  return {
    pagesDir: path.join(moduleRoot, file.pagesDir ?? DEFAULTS.pagesDir),
    partialsDir: path.join(moduleRoot, file.partialsDir ?? DEFAULTS.partialsDir),
    navFile: path.join(moduleRoot, file.navFile ?? DEFAULTS.navFile),
    masters: file.masters ?? [...DEFAULTS.masters],
    aliases: file.aliases ?? DEFAULTS.aliases,
    maxDepth: file.maxDepth ?? DEFAULTS.maxDepth,
    sectionLevels: file.sectionLevels ?? [...DEFAULTS.sectionLevels],
    ignoredTitles: file.ignoredTitles ?? [...DEFAULTS.ignoredTitles],
  };
}

/**
 * Load configuration for a project root. An explicit config path must exist;
 * the default one may be absent.
 */
export async function loadConfig(
  rootDir: string,
  configPath?: string,
  log: Logger = console.log
): Promise<NavConfig> {
  const filePath = path.resolve(rootDir, configPath ?? DEFAULT_CONFIG_FILE);

  if (!(await fs.pathExists(filePath))) {
    if (configPath) {
      throw new NavConfigError(`Config file not found: ${filePath}`);
    }
    log(`No ${DEFAULT_CONFIG_FILE} found, using defaults`);
    return resolveConfig({}, rootDir);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(filePath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new NavConfigError(`Could not parse ${filePath}: ${reason}`);
  }

  log(`Loaded config from ${path.relative(rootDir, filePath) || filePath}`);
  return resolveConfig(parseConfigFile(raw, filePath), rootDir);
}
