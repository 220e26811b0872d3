/**
 * Summarizer
 *
 * Turns a (possibly watchlist-scoped) diff into the SummaryRecord written to
 * disk each run. Pure: the timestamp comes in through SummaryMeta, so the
 * same inputs always serialize to the same bytes.
 */

import {
  MISSING,
  type FieldChange,
  type FieldValue,
  type ScopedDiff,
  type Snapshot,
  type SummaryFieldChange,
  type SummaryMeta,
  type SummaryRecord,
  type SummarySourceStats,
  type SummaryWatchlist,
  type WatchScope,
} from '../core/types.js';

export const SUMMARY_SCHEMA_VERSION = 1;

function sourceStats(snapshot: Snapshot): SummarySourceStats {
  return {
    path: snapshot.source.path,
    featureCount: snapshot.source.featureCount,
    parcelCount: snapshot.source.parcelCount,
    skippedUnidentifiable: snapshot.source.skippedCount,
    duplicateIds: snapshot.source.duplicateCount,
  };
}

function watchlistStats(scope: WatchScope): SummaryWatchlist {
  if (scope.enabled) {
    return {
      enabled: true,
      size: scope.size,
      path: scope.path,
      notFound: scope.notFound,
      disabledReason: null,
    };
  }
  return {
    enabled: false,
    size: 0,
    path: scope.path,
    notFound: 0,
    disabledReason: scope.disabledReason,
  };
}

function toJsonValue(value: FieldValue): SummaryFieldChange['before'] {
  return value === MISSING ? null : value;
}

/**
 * Serialize a field change; `kind` records which side was missing
 */
export function serializeFieldChange(change: FieldChange): SummaryFieldChange {
  const kind: SummaryFieldChange['kind'] =
    change.before === MISSING ? 'added' : change.after === MISSING ? 'removed' : 'modified';

  return {
    field: change.field,
    kind,
    before: toJsonValue(change.before),
    after: toJsonValue(change.after),
  };
}

/**
 * Build the summary of a comparison run
 */
export function buildSummary(diff: ScopedDiff, meta: SummaryMeta): SummaryRecord {
  return {
    schemaVersion: SUMMARY_SCHEMA_VERSION,
    status: 'ok',
    initialized: false,
    generatedAt: meta.generatedAt,
    sources: {
      current: sourceStats(diff.current),
      baseline: sourceStats(diff.baseline),
    },
    watchlist: watchlistStats(diff.scope),
    stats: {
      currentTotal: diff.current.parcels.size,
      baselineTotal: diff.baseline.parcels.size,
      addedCount: diff.added.length,
      removedCount: diff.removed.length,
      changedCount: diff.changed.length,
      unchangedCount: diff.unchangedCount,
    },
    added: diff.added.map((parcel) => parcel.id),
    removed: diff.removed.map((parcel) => parcel.id),
    changed: diff.changed.map((entry) => ({
      id: entry.id,
      changes: entry.changes.map(serializeFieldChange),
    })),
  };
}

/**
 * Build the summary of a first run (no baseline yet)
 *
 * Nothing is reported as added: every count is zero and `initialized` is set.
 */
export function buildInitializationSummary(
  current: Snapshot,
  scope: WatchScope,
  meta: SummaryMeta
): SummaryRecord {
  return {
    schemaVersion: SUMMARY_SCHEMA_VERSION,
    status: 'initialized',
    initialized: true,
    generatedAt: meta.generatedAt,
    sources: {
      current: sourceStats(current),
      baseline: null,
    },
    watchlist: watchlistStats(scope),
    stats: {
      currentTotal: current.parcels.size,
      baselineTotal: null,
      addedCount: 0,
      removedCount: 0,
      changedCount: 0,
      unchangedCount: 0,
    },
    added: [],
    removed: [],
    changed: [],
  };
}

/**
 * Stable on-disk form of a summary
 */
export function serializeSummary(summary: SummaryRecord): string {
  return `${JSON.stringify(summary, null, 2)}\n`;
}

/**
 * Number of reported differences in a summary
 */
export function totalChanges(summary: SummaryRecord): number {
  return summary.stats.addedCount + summary.stats.removedCount + summary.stats.changedCount;
}
