#!/usr/bin/env tsx
/**
 * parcel-watch CLI Entry Point
 *
 * Nightly parcel change detection plus read-only queries over its output.
 *
 * @module parcel-watch-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig } from '../src/config/config.js';
import { ConfigError, errorMessage } from '../src/core/errors.js';
import { setLogLevel } from '../src/core/utils/logger.js';
import { registerCommands } from '../src/cli/commands/index.js';
import { setGlobalContext } from '../src/cli/lib/context.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { consoleOutput } from '../src/cli/lib/output.js';

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly dryRun?: boolean;
  readonly config?: string;
  readonly current?: string;
  readonly baseline?: string;
  readonly summary?: string;
  readonly watchlist?: string;
  readonly sendWhenNoChanges?: boolean;
  readonly truncationLimit?: number;
}

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    consoleOutput.error(`Warning: could not read package version (${errorMessage(error)})`);
  }
  return '0.0.0';
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function initializeContext(options: GlobalOptions): void {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      current: options.current,
      baseline: options.baseline,
      summary: options.summary,
      watchlist: options.watchlist,
      sendWhenNoChanges: options.sendWhenNoChanges,
      truncationLimit: options.truncationLimit,
      verbose: options.verbose,
      json: options.json,
      dryRun: options.dryRun,
    },
  });

  if (config.verbose) {
    setLogLevel('debug');
  } else if (config.json) {
    // keep stdout parseable
    setLogLevel('warn');
  }

  setGlobalContext({ config, out: consoleOutput });
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('parcel-watch')
    .description('Detect parcel dataset changes between runs and report them')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--dry-run', 'Compare and render without writing or notifying')
    .option('--config <path>', 'Path to config file (default: .parcel-watchrc)')
    .option('--current <path>', 'Current dataset file')
    .option('--baseline <path>', 'Baseline dataset file')
    .option('--summary <path>', 'Summary output file')
    .option('--watchlist <path>', 'Watchlist file')
    .option('--send-when-no-changes', 'Notify even when nothing changed')
    .option('--truncation-limit <n>', 'Ids listed per category in messages', parsePositiveInt)
    .hook('preAction', (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      try {
        initializeContext(options);
      } catch (error) {
        const message = error instanceof ConfigError ? error.getSummary() : errorMessage(error);
        console.error(`Configuration error: ${message}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  });
