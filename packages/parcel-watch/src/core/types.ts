/**
 * Core type definitions for parcel-watch
 *
 * A dataset file becomes a Snapshot (parcels keyed by identifier); two
 * snapshots become a DiffResult; a DiffResult (optionally narrowed by a
 * watchlist) becomes a SummaryRecord.
 */

import type { Geometry } from 'geojson';

/**
 * Scalar attribute value as found in a feature's attribute map
 */
export type AttributeValue = string | number | boolean | null;

export type AttributeMap = Readonly<Record<string, AttributeValue>>;

/**
 * One identified parcel within a snapshot
 */
export interface ParcelRecord {
  readonly id: string;
  readonly attributes: AttributeMap;
  /** Carried through untouched, never compared */
  readonly geometry: Geometry | null;
  /** Position of the feature in its source file */
  readonly index: number;
}

/**
 * A feature dropped because no identifier field resolved
 */
export interface SkippedRecord {
  readonly index: number;
  readonly reason: string;
}

/**
 * Where a snapshot came from and how much of it was usable
 */
export interface SnapshotSource {
  readonly path: string;
  readonly featureCount: number;
  readonly parcelCount: number;
  readonly skippedCount: number;
  readonly duplicateCount: number;
}

/**
 * Point-in-time indexed collection of parcels
 */
export interface Snapshot {
  readonly source: SnapshotSource;
  readonly parcels: ReadonlyMap<string, ParcelRecord>;
  readonly skipped: readonly SkippedRecord[];
  /** Identifiers seen more than once (last occurrence kept), sorted */
  readonly duplicateIds: readonly string[];
}

/**
 * Result of loading the optional baseline dataset
 */
export type BaselineLoadResult =
  | { readonly status: 'absent'; readonly path: string }
  | { readonly status: 'loaded'; readonly snapshot: Snapshot };

/**
 * Marker for an attribute absent from a record.
 * Distinct from null and from the empty string.
 */
export const MISSING: unique symbol = Symbol('parcel-watch.missing');

export type FieldValue = AttributeValue | typeof MISSING;

export interface FieldChange {
  readonly field: string;
  readonly before: FieldValue;
  readonly after: FieldValue;
}

export interface ChangedParcel {
  readonly id: string;
  /** Sorted by field name */
  readonly changes: readonly FieldChange[];
}

/**
 * Per-entity comparison of two snapshots.
 * All lists are ordered by identifier (see compareIds).
 */
export interface DiffResult {
  readonly baseline: Snapshot;
  readonly current: Snapshot;
  readonly added: readonly ParcelRecord[];
  readonly removed: readonly ParcelRecord[];
  readonly changed: readonly ChangedParcel[];
  readonly unchangedCount: number;
}

/**
 * Optional identifier allowlist
 */
export interface Watchlist {
  readonly ids: ReadonlySet<string>;
  readonly path: string | null;
}

export type WatchlistDisabledReason = 'not-configured' | 'empty' | 'unreadable';

/**
 * Whether a result was narrowed to a watchlist.
 * A filtered empty result must never read as "no watchlist configured".
 */
export type WatchScope =
  | {
      readonly enabled: false;
      readonly size: 0;
      readonly path: string | null;
      readonly disabledReason: WatchlistDisabledReason;
    }
  | {
      readonly enabled: true;
      readonly size: number;
      readonly path: string | null;
      /** Watched identifiers found in neither snapshot */
      readonly notFound: number;
    };

export type ScopedDiff = DiffResult & { readonly scope: WatchScope };

/**
 * Serialized field change; `kind` preserves the missing marker in JSON
 */
export interface SummaryFieldChange {
  readonly field: string;
  readonly kind: 'added' | 'removed' | 'modified';
  readonly before: AttributeValue;
  readonly after: AttributeValue;
}

export interface SummaryChangedParcel {
  readonly id: string;
  readonly changes: readonly SummaryFieldChange[];
}

export interface SummarySourceStats {
  readonly path: string;
  readonly featureCount: number;
  readonly parcelCount: number;
  readonly skippedUnidentifiable: number;
  readonly duplicateIds: number;
}

export interface SummaryWatchlist {
  readonly enabled: boolean;
  readonly size: number;
  readonly path: string | null;
  readonly notFound: number;
  readonly disabledReason: WatchlistDisabledReason | null;
}

export interface SummaryStats {
  readonly currentTotal: number;
  readonly baselineTotal: number | null;
  readonly addedCount: number;
  readonly removedCount: number;
  readonly changedCount: number;
  readonly unchangedCount: number;
}

export type SummaryStatus = 'ok' | 'initialized';

/**
 * Machine-readable run summary, overwritten every run
 */
export interface SummaryRecord {
  readonly schemaVersion: 1;
  readonly status: SummaryStatus;
  readonly initialized: boolean;
  readonly generatedAt: string;
  readonly sources: {
    readonly current: SummarySourceStats;
    readonly baseline: SummarySourceStats | null;
  };
  readonly watchlist: SummaryWatchlist;
  readonly stats: SummaryStats;
  readonly added: readonly string[];
  readonly removed: readonly string[];
  readonly changed: readonly SummaryChangedParcel[];
}

/**
 * Run metadata supplied by the caller
 */
export interface SummaryMeta {
  /** ISO timestamp; injected so identical inputs serialize identically */
  readonly generatedAt: string;
}
