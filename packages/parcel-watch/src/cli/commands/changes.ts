/**
 * Changes Command
 *
 * Show the latest summary: status, counts and truncated id samples.
 *
 * Usage:
 *   parcel-watch changes
 */

import type { Command } from 'commander';
import type { ParcelWatchConfig } from '../../config/config.js';
import { describeSummary } from '../../query/changes.js';
import { readSummary } from '../../summary/schema.js';
import { runCommand } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, printError, type CommandOutput } from '../lib/output.js';

export function registerChangesCommand(program: Command): void {
  program
    .command('changes')
    .description('Show the latest change summary')
    .action(async () => {
      await runCommand(({ config, out }) => executeChanges(config, out));
    });
}

export async function executeChanges(
  config: ParcelWatchConfig,
  out: CommandOutput
): Promise<ExitCode> {
  const summary = await readSummary(config.paths.summary);
  if (summary === null) {
    printError(out, `No summary found at ${config.paths.summary}; run detect first`, config.json);
    return EXIT_CODES.NOT_FOUND;
  }

  if (config.json) {
    out.log(formatJson(summary));
  } else {
    for (const line of describeSummary(summary, config.notification.truncationLimit)) {
      out.log(line);
    }
  }
  return EXIT_CODES.SUCCESS;
}
