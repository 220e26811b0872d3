/**
 * Change Queries
 *
 * Read-only views of the latest summary record, used by the `changes`,
 * `change` and `parcel` commands.
 */

import type { SummaryFieldChange, SummaryRecord } from '../core/types.js';
import { truncateList } from '../summary/notification.js';

/**
 * What the latest summary recorded for one parcel
 */
export type ParcelChangeStatus =
  | { readonly kind: 'added' }
  | { readonly kind: 'removed' }
  | { readonly kind: 'changed'; readonly changes: readonly SummaryFieldChange[] };

/**
 * Find one parcel in the latest summary
 *
 * @returns null when the summary records no difference for the id
 */
export function findChange(summary: SummaryRecord, id: string): ParcelChangeStatus | null {
  const wanted = id.trim();

  if (summary.added.includes(wanted)) {
    return { kind: 'added' };
  }
  if (summary.removed.includes(wanted)) {
    return { kind: 'removed' };
  }
  const entry = summary.changed.find((parcel) => parcel.id === wanted);
  return entry ? { kind: 'changed', changes: entry.changes } : null;
}

function formatValue(value: SummaryFieldChange['before']): string {
  if (value === null) return 'null';
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/**
 * One display line per field change
 */
export function formatFieldChange(change: SummaryFieldChange): string {
  switch (change.kind) {
    case 'added':
      return `${change.field}: (missing) -> ${formatValue(change.after)}`;
    case 'removed':
      return `${change.field}: ${formatValue(change.before)} -> (missing)`;
    default:
      return `${change.field}: ${formatValue(change.before)} -> ${formatValue(change.after)}`;
  }
}

/**
 * Display lines for a parcel's recorded status
 */
export function describeChange(id: string, status: ParcelChangeStatus | null): string[] {
  if (status === null) {
    return [`${id}: no change recorded in the latest run`];
  }
  if (status.kind === 'added') {
    return [`${id}: added`];
  }
  if (status.kind === 'removed') {
    return [`${id}: removed`];
  }
  return [`${id}: changed`, ...status.changes.map((change) => `  ${formatFieldChange(change)}`)];
}

function sampleLine(label: string, ids: readonly string[], limit: number): string | null {
  if (ids.length === 0) return null;
  const { kept, omitted } = truncateList(ids, limit);
  const suffix = omitted > 0 ? ` +${omitted} more` : '';
  return `${label}: ${kept.join(', ')}${suffix}`;
}

/**
 * Overview of the latest summary: run status, counts and id samples
 */
export function describeSummary(summary: SummaryRecord, sampleLimit: number): string[] {
  const { stats } = summary;
  const lines = [`Generated: ${summary.generatedAt}`, `Status: ${summary.status}`];

  lines.push(`Current parcels: ${stats.currentTotal}`);
  if (stats.baselineTotal !== null) {
    lines.push(`Previous parcels: ${stats.baselineTotal}`);
  }

  if (summary.watchlist.enabled) {
    lines.push(`Watchlist: ${summary.watchlist.size} parcels (${summary.watchlist.notFound} not found)`);
  } else {
    lines.push(`Watchlist: off (${summary.watchlist.disabledReason ?? 'not-configured'})`);
  }

  lines.push(
    `Added: ${stats.addedCount}`,
    `Removed: ${stats.removedCount}`,
    `Changed: ${stats.changedCount}`,
    `Unchanged: ${stats.unchangedCount}`
  );

  const samples = [
    sampleLine('Added ids', summary.added, sampleLimit),
    sampleLine('Removed ids', summary.removed, sampleLimit),
    sampleLine(
      'Changed ids',
      summary.changed.map((entry) => entry.id),
      sampleLimit
    ),
  ];
  for (const line of samples) {
    if (line !== null) lines.push(line);
  }

  return lines;
}
