/**
 * Command-line option parsing
 */

import { ConfigError } from '../config/errors.js';
import type { SplitConfigInput } from '../config/schema.js';

export interface CliOptions {
  /** Non-option arguments after the command */
  positional: string[];
  configPath?: string;
  /** Values that override the config file */
  overrides: SplitConfigInput;
  jsonLogs: boolean;
  verbose: boolean;
}

function parseInteger(flag: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${flag} expects a non-negative integer, got "${value ?? ''}"`);
  }
  return parseInt(value, 10);
}

function parseSeconds(flag: string, value: string | undefined): number {
  const seconds = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigError(`${flag} expects a non-negative number of seconds, got "${value ?? ''}"`);
  }
  return seconds;
}

/**
 * Parse CLI options from arguments
 *
 * @throws ConfigError for unknown options and malformed values
 */
export function parseCliOptions(args: string[]): CliOptions {
  const options: CliOptions = {
    positional: [],
    overrides: {},
    jsonLogs: false,
    verbose: false,
  };
  const overrides = options.overrides;

  for (const arg of args) {
    if (!arg.startsWith('--')) {
      options.positional.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? undefined : arg.slice(eq + 1);

    switch (flag) {
      case '--config':
        if (!value) {
          throw new ConfigError('--config expects a file path');
        }
        options.configPath = value;
        break;
      case '--concurrency':
        overrides.concurrency = parseInteger(flag, value);
        break;
      case '--max-loc':
        overrides.maxLoc = parseInteger(flag, value);
        break;
      case '--max-dirs':
        overrides.maxDirs = parseInteger(flag, value);
        break;
      case '--min-diffs':
        overrides.minDiffs = parseInteger(flag, value);
        break;
      case '--group-root-files':
        overrides.groupRootFiles = true;
        break;
      case '--no-cache':
        overrides.cache = { ...overrides.cache, enabled: false };
        break;
      case '--cache-dir':
        if (!value) {
          throw new ConfigError('--cache-dir expects a directory');
        }
        overrides.cache = { ...overrides.cache, dir: value };
        break;
      case '--no-rate-limit':
        overrides.rateLimit = { ...overrides.rateLimit, enabled: false };
        break;
      case '--seconds-between-requests':
        overrides.rateLimit = { ...overrides.rateLimit, secondsBetweenRequests: parseSeconds(flag, value) };
        break;
      case '--json-logs':
        options.jsonLogs = true;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      default:
        throw new ConfigError(`Unknown option "${arg}"`);
    }
  }

  return options;
}
