/**
 * Watched Command
 *
 * Preview the watchlist.
 *
 * Usage:
 *   parcel-watch watched
 */

import type { Command } from 'commander';
import type { ParcelWatchConfig } from '../../config/config.js';
import { loadWatchlist } from '../../diff/watchlist.js';
import { formatWatchlistPreview, previewWatchlist } from '../../query/watchlist.js';
import { runCommand } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, type CommandOutput } from '../lib/output.js';

export function registerWatchedCommand(program: Command): void {
  program
    .command('watched')
    .description('List watched parcels')
    .action(async () => {
      await runCommand(({ config, out }) => executeWatched(config, out));
    });
}

export async function executeWatched(
  config: ParcelWatchConfig,
  out: CommandOutput
): Promise<ExitCode> {
  const watchlist = await loadWatchlist(config.paths.watchlist);

  if (watchlist === null) {
    if (config.json) {
      out.log(formatJson({ enabled: false, path: config.paths.watchlist }));
    } else {
      out.log('Watchlist not configured; all parcels are reported');
    }
    return EXIT_CODES.SUCCESS;
  }

  const preview = previewWatchlist(watchlist.ids);
  if (config.json) {
    out.log(formatJson({ enabled: preview.total > 0, path: watchlist.path, ...preview }));
  } else {
    for (const line of formatWatchlistPreview(preview)) {
      out.log(line);
    }
  }
  return EXIT_CODES.SUCCESS;
}
