#!/usr/bin/env node
/**
 * pr-atomizer - split merged pull requests into atomic diffs
 * Main Entry Point
 */

// Global error handlers - must be set up first to catch any errors during startup
process.on('uncaughtException', (error, origin) => {
  console.error(`[Atomize] Fatal: Uncaught exception from ${origin}:`, error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('[Atomize] Fatal: Unhandled promise rejection:', reason);
  process.exit(1);
});

import 'dotenv/config';
import { stringify as stringifyYaml } from 'yaml';
import { resolveConfig, maskToken, ConfigError, type SplitConfig } from './config/index.js';
import { createProgressPrinterWithMode } from './cli/index.js';
import { parseCliOptions, type CliOptions } from './cli/args.js';
import { runSplit } from './split/runner.js';

/**
 * Print usage information
 */
function printUsage(): void {
  console.log(`
Usage: atomize <command> [options]

Commands:
  split <input> <output>   Split every PR record of an NDJSON file into atomic diffs
  config                   Print the resolved configuration

Arguments (for split):
  input         NDJSON file, one {"pr_id", "repo", "diff_url", "body"} per line
  output        NDJSON file receiving {"pr_id", "repo", "original_diff", "atomic_diffs"}

Options:
  --config=<file>                   YAML or JSON config (default: ./atomize.config.yaml if present)
  --concurrency=<n>                 Records processed in parallel (default: 4)
  --max-loc=<n>                     Added lines per directory before it is split per file
  --max-dirs=<n>                    Directory count at which every directory is split per file
  --min-diffs=<n>                   Minimum atomic diffs for a PR to be kept
  --group-root-files                Keep root-level files as one "." group instead of dropping them
  --no-cache                        Do not read or write the diff cache
  --cache-dir=<dir>                 Diff cache directory (default: .cache/diffs)
  --no-rate-limit                   Disable request pacing and quota pauses
  --seconds-between-requests=<s>    Minimum spacing for hosts without their own interval
  --json-logs                       Emit progress as JSON lines on stderr
  --verbose                         Include debug messages and skipped records

Environment:
  ATOMIZE_GITHUB_TOKEN / GITHUB_TOKEN   Bearer token for diff requests
  ATOMIZE_CACHE_DIR                     Diff cache directory

Examples:
  atomize split data/raw/prs.ndjson data/split/prs.ndjson
  atomize split prs.ndjson out.ndjson --max-loc=200 --min-diffs=3 --concurrency=8
  atomize config --config=./atomize.config.yaml
`);
}

/**
 * Configuration with the token masked, for display
 */
function displayConfig(config: SplitConfig): SplitConfig {
  const token = config.github.token;
  return {
    ...config,
    github: token ? { token: maskToken(token) } : {},
  };
}

async function loadConfig(options: CliOptions): Promise<SplitConfig> {
  const { config } = await resolveConfig({
    configPath: options.configPath,
    overrides: options.overrides,
  });
  return config;
}

/**
 * Handle config command
 */
async function runConfigCommand(options: CliOptions): Promise<void> {
  const { config, source } = await resolveConfig({
    configPath: options.configPath,
    overrides: options.overrides,
  });
  console.log(`# Config file: ${source ?? '(none, defaults)'}`);
  process.stdout.write(stringifyYaml(displayConfig(config)));
}

/**
 * Run the split command
 */
async function runSplitCommand(options: CliOptions): Promise<void> {
  const [inputPath, outputPath] = options.positional;
  if (!inputPath || !outputPath) {
    console.error('Error: split command requires <input> <output>\n');
    printUsage();
    process.exit(1);
  }

  const config = await loadConfig(options);
  const progress = createProgressPrinterWithMode({
    mode: options.jsonLogs ? 'json' : 'auto',
    verbose: options.verbose,
  });

  if (!config.github.token) {
    progress.warn('No GitHub token found in environment - using unauthenticated requests');
  }

  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    progress.warn('Interrupted, finishing records in flight (press Ctrl+C again to force quit)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    await runSplit({
      inputPath,
      outputPath,
      config,
      progress,
      signal: controller.signal,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    progress.runFailed(message);
    throw error;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

/**
 * Main CLI function
 */
export async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return;
  }

  const command = args[0];
  let options: CliOptions;
  try {
    options = parseCliOptions(args.slice(1));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}\n`);
      printUsage();
      process.exit(1);
    }
    throw error;
  }

  try {
    if (command === 'split') {
      await runSplitCommand(options);
      return;
    }
    if (command === 'config') {
      await runConfigCommand(options);
      return;
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      process.exit(1);
    }
    if (error instanceof Error) {
      console.error(`\n❌ Run failed: ${error.message}`);
      if (options.verbose || process.env.DEBUG) {
        console.error('\nStack trace:');
        console.error(error.stack);
      } else {
        console.error('(Run with --verbose or DEBUG=1 to see stack trace)');
      }
    } else {
      console.error('\n❌ Unexpected error:', error);
    }
    process.exit(1);
  }

  console.error(`Error: Unknown command "${command}"\n`);
  printUsage();
  process.exit(1);
}

// Run CLI
main()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
