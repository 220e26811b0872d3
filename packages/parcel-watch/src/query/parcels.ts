/**
 * Parcel Queries
 *
 * Read-only lookups over a loaded snapshot, used by the `parcel` and
 * `search` commands.
 */

import type { AttributeValue, ParcelRecord, Snapshot } from '../core/types.js';
import { sortIds } from '../diff/ordering.js';

export interface SearchOptions {
  /** Attribute fields matched against the query */
  readonly fields: readonly string[];
  /** Maximum matches returned */
  readonly limit: number;
}

export interface SearchResult {
  readonly query: string;
  /** First `limit` matches, ordered by identifier */
  readonly matches: readonly ParcelRecord[];
  /** Number of matches before the limit */
  readonly total: number;
}

/**
 * Look up one parcel by identifier (surrounding whitespace ignored)
 */
export function findParcel(snapshot: Snapshot, id: string): ParcelRecord | null {
  return snapshot.parcels.get(id.trim()) ?? null;
}

function searchableText(value: AttributeValue | undefined): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Case-insensitive substring search over the configured fields
 *
 * An empty or blank query matches nothing.
 */
export function searchParcels(
  snapshot: Snapshot,
  query: string,
  options: SearchOptions
): SearchResult {
  const needle = query.trim().toLowerCase();
  if (needle.length === 0) {
    return { query, matches: [], total: 0 };
  }

  const matches: ParcelRecord[] = [];
  let total = 0;

  for (const id of sortIds(snapshot.parcels.keys())) {
    const parcel = snapshot.parcels.get(id);
    if (!parcel) continue;

    const hit = options.fields.some((field) => {
      const text = searchableText(parcel.attributes[field]);
      return text !== null && text.toLowerCase().includes(needle);
    });
    if (!hit) continue;

    total++;
    if (matches.length < options.limit) {
      matches.push(parcel);
    }
  }

  return { query, matches, total };
}

/**
 * Attribute lines for display, ordered by field name
 */
export function formatAttributes(parcel: ParcelRecord): string[] {
  return sortIds(Object.keys(parcel.attributes)).map((field) => {
    const value = parcel.attributes[field];
    return `${field}: ${value === null || value === undefined ? '(null)' : String(value)}`;
  });
}
