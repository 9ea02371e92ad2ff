/**
 * Command-line parsing for the export and fix-categories commands.
 */

import { env } from '../config/index.js';
import type { ExportOptions } from '../export/types.js';

const VALUE_FLAGS = ['--after', '--before', '--timezone', '--author', '--tag', '--csv', '--username'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];
const valueFlags: ReadonlySet<string> = new Set(VALUE_FLAGS);

export interface CliArgs {
  help: boolean;
  unsafe?: boolean;
  skipUnsupported: boolean;
  positional: string[];
  values: Partial<Record<ValueFlag, string>>;
}

function isValueFlag(arg: string): arg is ValueFlag {
  return valueFlags.has(arg);
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const parsed: CliArgs = { help: false, skipUnsupported: false, positional: [], values: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inline = eq > 0 ? arg.slice(eq + 1) : undefined;

    if (flag === '--help' || flag === '-h') {
      parsed.help = true;
    } else if (flag === '--unsafe') {
      parsed.unsafe = true;
    } else if (flag === '--no-unsafe') {
      parsed.unsafe = false;
    } else if (flag === '--skip-unsupported') {
      parsed.skipUnsupported = true;
    } else if (isValueFlag(flag)) {
      const value = inline ?? argv[++i];
      if (value === undefined) {
        throw new Error(`Missing value for ${flag}`);
      }
      parsed.values[flag] = value;
    } else if (flag.startsWith('-')) {
      throw new Error(`Unknown option ${flag}`);
    } else {
      parsed.positional.push(arg);
    }
  }

  return parsed;
}

/**
 * Command-line values first, then the environment.
 */
export function toExportOptions(args: CliArgs): ExportOptions {
  const [archivePath, outputPath] = args.positional;
  if (!archivePath || !outputPath) {
    throw new Error('Both <archive> and <output> are required');
  }

  return {
    archivePath,
    outputPath,
    after: args.values['--after'],
    before: args.values['--before'],
    timeZone: args.values['--timezone'] ?? env.EXPORT_TIMEZONE,
    author: args.values['--author'] ?? env.EXPORT_AUTHOR,
    tag: args.values['--tag'] ?? env.EXPORT_TAG,
    unsafeVideoEmbed: args.unsafe ?? env.EXPORT_UNSAFE_VIDEO,
    csvPath: args.values['--csv'],
    username: args.values['--username'] ?? env.EXPORT_USERNAME,
    failurePolicy: args.skipUnsupported ? 'skip' : env.EXPORT_FAILURE_POLICY,
    profileBaseUrl: env.PROFILE_BASE_URL,
    maxChainLength: env.MAX_CHAIN_LENGTH,
  };
}

export interface FixCategoriesArgs {
  help: boolean;
  apply: boolean;
  verbose: boolean;
  positional: string[];
}

export function parseFixCategoriesArgs(argv: readonly string[]): FixCategoriesArgs {
  const parsed: FixCategoriesArgs = { help: false, apply: false, verbose: false, positional: [] };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg === '--apply') {
      parsed.apply = true;
    } else if (arg === '--no-apply') {
      parsed.apply = false;
    } else if (arg === '--verbose') {
      parsed.verbose = true;
    } else if (arg === '--no-verbose') {
      parsed.verbose = false;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option ${arg}`);
    } else {
      parsed.positional.push(arg);
    }
  }

  return parsed;
}

export function toFixCategoriesPaths(args: FixCategoriesArgs): { postsPath: string; csvPath: string } {
  const [postsPath, csvPath] = args.positional;
  if (!postsPath || !csvPath) {
    throw new Error('Both <posts> and <csv> are required');
  }
  return { postsPath, csvPath };
}
