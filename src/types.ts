/**
 * A heading found in an AsciiDoc source file.
 */
export interface Heading {
  /** Number of leading `=` markers (1 = document title) */
  level: number;

  /** Explicit `[[id]]` anchor, or the slug of the title */
  anchor: string;

  /** Heading text, trimmed */
  title: string;
}

/**
 * Display title and anchor of a document or page.
 * An empty anchor means the link points at the page itself.
 */
export interface ResolvedTitle {
  title: string;
  anchor: string;
}

/**
 * One line of the navigation list.
 */
export interface NavEntry {
  /** Nesting depth, 1..maxDepth */
  depth: number;

  /** Page path relative to the pages directory */
  target: string;

  /** Anchor within the target page (empty for the page itself) */
  anchor: string;

  /** Link text */
  title: string;
}

/**
 * The entries generated for one master document.
 */
export interface NavBook {
  /** Master path relative to the pages directory */
  master: string;

  entries: NavEntry[];
}

/**
 * Alias rules: master identifier (relative path or bare file name)
 * -> shared content path -> alias page path. All paths are relative
 * to the pages directory.
 */
export type AliasTable = Record<string, Record<string, string>>;

/**
 * A generated alias page that includes a shared content file.
 */
export interface AliasStub {
  /** Alias page path relative to the pages directory */
  path: string;

  /** Full file content */
  content: string;
}

/**
 * Fully resolved generator settings. Directory fields are absolute.
 */
export interface NavConfig {
  pagesDir: string;
  partialsDir: string;
  navFile: string;

  /** Master documents, relative to pagesDir, in output order */
  masters: string[];

  aliases: AliasTable;

  /** Deepest nesting the nav list may use */
  maxDepth: number;

  /** Heading levels surfaced as in-page sections */
  sectionLevels: number[];

  /** Section titles never surfaced (compared case-insensitively) */
  ignoredTitles: string[];
}

/**
 * Result of one generator run.
 */
export interface NavResult {
  books: NavBook[];
  aliasStubs: AliasStub[];
  warnings: string[];
}
