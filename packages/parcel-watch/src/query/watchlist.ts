/**
 * Watchlist preview for the `watched` command
 */

export const WATCHLIST_PREVIEW_LIMIT = 30;

export interface WatchlistPreview {
  readonly total: number;
  /** First entries in file order */
  readonly shown: readonly string[];
  readonly remaining: number;
}

export function previewWatchlist(
  ids: ReadonlySet<string>,
  limit: number = WATCHLIST_PREVIEW_LIMIT
): WatchlistPreview {
  const shown = [...ids].slice(0, Math.max(0, limit));
  return { total: ids.size, shown, remaining: ids.size - shown.length };
}

export function formatWatchlistPreview(preview: WatchlistPreview): string[] {
  if (preview.total === 0) {
    return ['Watchlist is empty.'];
  }
  const lines = [`Watching ${preview.total} parcels:`, ...preview.shown.map((id) => `- ${id}`)];
  if (preview.remaining > 0) {
    lines.push(`... and ${preview.remaining} more`);
  }
  return lines;
}
