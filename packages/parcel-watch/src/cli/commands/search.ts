/**
 * Search Command
 *
 * Case-insensitive substring search over the configured search fields
 * (PROP_STREET by default).
 *
 * Usage:
 *   parcel-watch search <text...>
 */

import type { Command } from 'commander';
import { snapshotOptionsFor, type ParcelWatchConfig } from '../../config/config.js';
import type { ParcelRecord } from '../../core/types.js';
import { searchParcels } from '../../query/parcels.js';
import { loadSnapshot } from '../../snapshot/loader.js';
import { runCommand } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, formatTable, type CommandOutput, type TableColumn } from '../lib/output.js';

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search parcels in the current dataset')
    .argument('<text...>', 'Text to look for')
    .action(async (words: string[]) => {
      await runCommand(({ config, out }) => executeSearch(config, out, words.join(' ')));
    });
}

export async function executeSearch(
  config: ParcelWatchConfig,
  out: CommandOutput,
  query: string
): Promise<ExitCode> {
  const snapshot = await loadSnapshot(config.paths.current, snapshotOptionsFor(config));
  const result = searchParcels(snapshot, query, config.search);

  if (config.json) {
    out.log(
      formatJson({
        query: result.query,
        total: result.total,
        matches: result.matches.map((parcel) => ({ id: parcel.id, attributes: parcel.attributes })),
      })
    );
    return result.total === 0 ? EXIT_CODES.NOT_FOUND : EXIT_CODES.SUCCESS;
  }

  if (result.total === 0) {
    out.log(`No parcels match "${query.trim()}"`);
    return EXIT_CODES.NOT_FOUND;
  }

  const columns: TableColumn<ParcelRecord>[] = [
    { header: 'PARCEL', value: (parcel) => parcel.id },
    ...config.search.fields.map(
      (field): TableColumn<ParcelRecord> => ({
        header: field,
        value: (parcel) => String(parcel.attributes[field] ?? ''),
      })
    ),
  ];

  out.log(`${result.total} parcels match "${query.trim()}"`);
  out.log(formatTable(result.matches, columns));
  if (result.total > result.matches.length) {
    out.log(`(showing first ${result.matches.length})`);
  }
  return EXIT_CODES.SUCCESS;
}
