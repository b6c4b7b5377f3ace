import * as path from 'node:path';
import { NavConfigError } from './errors.js';

export const USAGE = `Usage: adoc-navgen [--root=<dir>] [--config=<file>] [--dry-run]

  --root=<dir>     Project root (default: current directory)
  --config=<file>  Config file, relative to the root (default: navgen.config.json)
  --dry-run        Print the navigation instead of writing files
  --help           Show this message`;

/**
 * Command line options
 */
export interface CliOptions {
  rootDir: string;
  configPath?: string;
  dryRun: boolean;
  help: boolean;
}

function flagValue(args: string[], name: string): string | undefined {
  const arg = args.find(a => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

export function parseArgs(args: string[], cwd: string = process.cwd()): CliOptions {
  const known = ['--dry-run', '--help', '-h'];
  const unknown = args.filter(a => !known.includes(a) && !/^--(root|config)=/.test(a));
  if (unknown.length > 0) {
    throw new NavConfigError(`Unknown argument: ${unknown[0]}\n${USAGE}`);
  }

  const root = flagValue(args, 'root');
  return {
    rootDir: root ? path.resolve(cwd, root) : cwd,
    configPath: flagValue(args, 'config'),
    dryRun: args.includes('--dry-run'),
    help: args.includes('--help') || args.includes('-h')
  };
}
