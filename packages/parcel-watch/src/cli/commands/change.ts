/**
 * Change Command
 *
 * Show the field diffs the latest summary recorded for one parcel.
 *
 * Usage:
 *   parcel-watch change <parcel-id>
 */

import type { Command } from 'commander';
import type { ParcelWatchConfig } from '../../config/config.js';
import { describeChange, findChange } from '../../query/changes.js';
import { readSummary } from '../../summary/schema.js';
import { runCommand } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, printError, type CommandOutput } from '../lib/output.js';

export function registerChangeCommand(program: Command): void {
  program
    .command('change')
    .description('Show recorded changes for one parcel')
    .argument('<parcel-id>', 'Parcel identifier')
    .action(async (parcelId: string) => {
      await runCommand(({ config, out }) => executeChange(config, out, parcelId));
    });
}

export async function executeChange(
  config: ParcelWatchConfig,
  out: CommandOutput,
  parcelId: string
): Promise<ExitCode> {
  const summary = await readSummary(config.paths.summary);
  if (summary === null) {
    printError(out, `No summary found at ${config.paths.summary}; run detect first`, config.json);
    return EXIT_CODES.NOT_FOUND;
  }

  const id = parcelId.trim();
  const status = findChange(summary, id);

  if (config.json) {
    out.log(formatJson({ id, generatedAt: summary.generatedAt, status }));
  } else {
    for (const line of describeChange(id, status)) {
      out.log(line);
    }
  }
  return status === null ? EXIT_CODES.NOT_FOUND : EXIT_CODES.SUCCESS;
}
