/**
 * Parcel Command
 *
 * Show one parcel from the current dataset, with its latest recorded change.
 *
 * Usage:
 *   parcel-watch parcel <parcel-id>
 */

import type { Command } from 'commander';
import { snapshotOptionsFor, type ParcelWatchConfig } from '../../config/config.js';
import { describeChange, findChange } from '../../query/changes.js';
import { findParcel, formatAttributes } from '../../query/parcels.js';
import { loadSnapshot } from '../../snapshot/loader.js';
import { readSummary } from '../../summary/schema.js';
import { runCommand } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, printError, type CommandOutput } from '../lib/output.js';

export function registerParcelCommand(program: Command): void {
  program
    .command('parcel')
    .description('Show a parcel from the current dataset')
    .argument('<parcel-id>', 'Parcel identifier')
    .action(async (parcelId: string) => {
      await runCommand(({ config, out }) => executeParcel(config, out, parcelId));
    });
}

export async function executeParcel(
  config: ParcelWatchConfig,
  out: CommandOutput,
  parcelId: string
): Promise<ExitCode> {
  const id = parcelId.trim();
  const snapshot = await loadSnapshot(config.paths.current, snapshotOptionsFor(config));
  const parcel = findParcel(snapshot, id);

  if (parcel === null) {
    printError(out, `Parcel ${id} not found in ${config.paths.current}`, config.json);
    return EXIT_CODES.NOT_FOUND;
  }

  const summary = await readSummary(config.paths.summary);
  const status = summary === null ? null : findChange(summary, id);

  if (config.json) {
    out.log(formatJson({ id, attributes: parcel.attributes, status }));
    return EXIT_CODES.SUCCESS;
  }

  out.log(`Parcel ${id}`);
  for (const line of formatAttributes(parcel)) {
    out.log(`  ${line}`);
  }
  if (summary !== null) {
    out.log('');
    for (const line of describeChange(id, status)) {
      out.log(line);
    }
  }
  return EXIT_CODES.SUCCESS;
}
