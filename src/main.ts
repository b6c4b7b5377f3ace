import { loadConfig } from './config.js';
import { DiskSourceTree, type Logger, type SourceTree } from './loader.js';
import { buildNavigation, generateNavigation } from './navigation.js';
import { renderNav } from './renderer.js';
import { NavConfigError, NavOutputError } from './errors.js';
import { USAGE, parseArgs } from './options.js';

/**
 * What `run` touches outside itself; tests replace these
 */
export interface RunDeps {
  tree?: SourceTree;
  /** Progress lines (stdout) */
  log?: Logger;
  /** Fatal errors, and progress during a dry run (stderr) */
  error?: Logger;
  /** Raw nav text printed by a dry run */
  write?: (text: string) => void;
}

/**
 * Run the generator for a command line and return the process exit code.
 * Configuration and output failures are reported, anything else is rethrown.
 */
export async function run(args: string[], deps: RunDeps = {}): Promise<number> {
  const {
    tree = new DiskSourceTree(),
    log = console.log,
    error = console.error,
    write = (text: string) => { process.stdout.write(text); }
  } = deps;

  try {
    const options = parseArgs(args);
    if (options.help) {
      log(USAGE);
      return 0;
    }

    // A dry run prints the nav on stdout, so progress moves to stderr
    const progress = options.dryRun ? error : log;
    const config = await loadConfig(options.rootDir, options.configPath, progress);

    if (options.dryRun) {
      const result = buildNavigation(config, tree, progress);
      write(renderNav(result.books));
      for (const stub of result.aliasStubs) {
        progress(`  -> Would generate alias file: ${stub.path}`);
      }
      return 0;
    }

    log('=== Generating navigation from AsciiDoc source ===');
    generateNavigation(config, tree, log);
    return 0;
  } catch (err) {
    if (err instanceof NavConfigError || err instanceof NavOutputError) {
      error(`Error: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  }
}
