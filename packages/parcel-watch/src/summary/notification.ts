/**
 * Notification Renderer
 *
 * Decides whether a run warrants a message and renders it as plain text.
 * Delivery belongs to a Notifier; this module only says send or suppress.
 *
 * TRUNCATION:
 * Each id list keeps its first `truncationLimit` entries in summary order
 * (lexicographic by id) and ends with "+N more" when anything was cut.
 */

import type { SummaryChangedParcel, SummaryRecord } from '../core/types.js';
import { totalChanges } from './summarizer.js';

export interface NotificationOptions {
  /** Emit a message even when nothing changed */
  readonly sendWhenNoChanges: boolean;
  /** Maximum ids listed per category */
  readonly truncationLimit: number;
  readonly title: string;
  /** Closing line; null to omit */
  readonly footer: string | null;
}

export const DEFAULT_NOTIFICATION_OPTIONS: NotificationOptions = {
  sendWhenNoChanges: false,
  truncationLimit: 10,
  title: 'Parcel change summary',
  footer: 'Changes reflect dataset updates, not verified ownership changes.',
};

export type NotificationDecision =
  | { readonly send: true; readonly text: string }
  | { readonly send: false; readonly reason: 'no-changes' };

export interface TruncatedList<T> {
  readonly kept: readonly T[];
  readonly omitted: number;
}

/**
 * Keep the first `limit` items
 */
export function truncateList<T>(items: readonly T[], limit: number): TruncatedList<T> {
  const bound = Math.max(0, Math.floor(limit));
  if (items.length <= bound) {
    return { kept: items, omitted: 0 };
  }
  return { kept: items.slice(0, bound), omitted: items.length - bound };
}

function formatChangedEntry(entry: SummaryChangedParcel): string {
  const fields = entry.changes.map((change) => change.field);
  return fields.length > 0 ? `${entry.id} (${fields.join(', ')})` : entry.id;
}

function pushSection(
  lines: string[],
  label: string,
  entries: readonly string[],
  limit: number
): void {
  if (entries.length === 0) return;

  const { kept, omitted } = truncateList(entries, limit);
  lines.push('', `${label}:`);
  for (const entry of kept) {
    lines.push(`- ${entry}`);
  }
  if (omitted > 0) {
    lines.push(`+${omitted} more`);
  }
}

/**
 * Render the message text for a summary (regardless of the send decision)
 */
export function renderNotificationText(
  summary: SummaryRecord,
  options: NotificationOptions = DEFAULT_NOTIFICATION_OPTIONS
): string {
  const { stats } = summary;
  const lines: string[] = [options.title];

  if (summary.initialized) {
    lines.push(`Baseline initialized with ${stats.currentTotal} parcels`);
  } else {
    lines.push(`Current parcels: ${stats.currentTotal}`);
    lines.push(`Previous parcels: ${stats.baselineTotal ?? 0}`);
  }

  if (summary.watchlist.enabled) {
    lines.push(`Watchlist: ${summary.watchlist.size} parcels (changes filtered to watched parcels)`);
  }

  lines.push(`Added: ${stats.addedCount}`);
  lines.push(`Removed: ${stats.removedCount}`);
  lines.push(`Changed: ${stats.changedCount}`);

  if (!summary.initialized && totalChanges(summary) === 0) {
    lines.push('No changes detected.');
  }

  pushSection(lines, 'Added', summary.added, options.truncationLimit);
  pushSection(lines, 'Removed', summary.removed, options.truncationLimit);
  pushSection(
    lines,
    'Changed',
    summary.changed.map(formatChangedEntry),
    options.truncationLimit
  );

  if (options.footer) {
    lines.push('', options.footer);
  }

  return lines.join('\n');
}

/**
 * Decide whether to notify, and with what text
 *
 * Zero differences (including a first run) suppress the message unless
 * `sendWhenNoChanges` is set.
 */
export function renderNotification(
  summary: SummaryRecord,
  options: NotificationOptions = DEFAULT_NOTIFICATION_OPTIONS
): NotificationDecision {
  if (totalChanges(summary) === 0 && !options.sendWhenNoChanges) {
    return { send: false, reason: 'no-changes' };
  }
  return { send: true, text: renderNotificationText(summary, options) };
}
