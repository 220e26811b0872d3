/**
 * Watchlist Filter
 *
 * Optional allowlist of parcel identifiers. When present and non-empty the
 * diff is narrowed to watched parcels, and the scope says so explicitly.
 *
 * File format: one identifier per line; blank lines and lines starting
 * with '#' are ignored; surrounding whitespace is trimmed.
 */

import { readFile } from 'node:fs/promises';
import { WatchlistError } from '../core/errors.js';
import { hasErrorCode, isNotFound } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import type {
  DiffResult,
  ScopedDiff,
  Snapshot,
  Watchlist,
  WatchlistDisabledReason,
  WatchScope,
} from '../core/types.js';

const log = createLogger({ module: 'watchlist' });

/**
 * Parse watchlist file content into an identifier set
 */
export function parseWatchlist(text: string): Set<string> {
  const ids = new Set<string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) continue;
    ids.add(line);
  }
  return ids;
}

/**
 * Load a watchlist file
 *
 * @returns null when no path is configured or the file does not exist
 * @throws WatchlistError when the file exists but cannot be read
 */
export async function loadWatchlist(path: string | null | undefined): Promise<Watchlist | null> {
  if (!path) return null;

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      log.debug('No watchlist file, watching all parcels', { path });
      return null;
    }
    const reason = hasErrorCode(error) ? error.code : String(error);
    throw new WatchlistError(path, `could not read file (${reason})`, { cause: error });
  }

  return { ids: parseWatchlist(text), path };
}

/**
 * Scope describing an unfiltered result
 */
export function disabledScope(
  reason: WatchlistDisabledReason,
  path: string | null = null
): WatchScope {
  return { enabled: false, size: 0, path, disabledReason: reason };
}

/**
 * Scope for a watchlist against the snapshots of one run
 *
 * `notFound` counts watched identifiers present in none of `snapshots`.
 */
export function resolveScope(
  watchlist: Watchlist | null,
  snapshots: readonly Snapshot[]
): WatchScope {
  if (watchlist === null) {
    return disabledScope('not-configured');
  }
  if (watchlist.ids.size === 0) {
    return disabledScope('empty', watchlist.path);
  }

  let notFound = 0;
  for (const id of watchlist.ids) {
    if (!snapshots.some((snapshot) => snapshot.parcels.has(id))) {
      notFound++;
    }
  }

  return { enabled: true, size: watchlist.ids.size, path: watchlist.path, notFound };
}

/**
 * Narrow a diff to a watchlist
 *
 * - null watchlist: unchanged result, scope disabled ('not-configured')
 * - empty watchlist: unchanged result, scope disabled ('empty')
 * - otherwise: added/removed/changed restricted to watched ids, and
 *   unchangedCount recounted over watched ids present in both snapshots
 */
export function applyWatchlist(diff: DiffResult, watchlist: Watchlist | null): ScopedDiff {
  const scope = resolveScope(watchlist, [diff.baseline, diff.current]);
  if (!scope.enabled || watchlist === null) {
    return { ...diff, scope };
  }

  const ids = watchlist.ids;
  const changed = diff.changed.filter((entry) => ids.has(entry.id));
  const changedIds = new Set(changed.map((entry) => entry.id));

  let unchangedCount = 0;
  for (const id of ids) {
    if (diff.baseline.parcels.has(id) && diff.current.parcels.has(id) && !changedIds.has(id)) {
      unchangedCount++;
    }
  }

  return {
    ...diff,
    added: diff.added.filter((parcel) => ids.has(parcel.id)),
    removed: diff.removed.filter((parcel) => ids.has(parcel.id)),
    changed,
    unchangedCount,
    scope,
  };
}
