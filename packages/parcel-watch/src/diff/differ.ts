/**
 * Snapshot Differ
 *
 * Classifies every parcel of two snapshots as added, removed, changed or
 * unchanged, with a field-level diff for the changed ones.
 *
 * EQUALITY:
 * - Absent fields compare as MISSING, which equals neither null nor ''
 * - Values compare with ===; 1 and '1' differ, no numeric tolerance
 * - Geometry is never compared
 */

import {
  MISSING,
  type AttributeMap,
  type ChangedParcel,
  type DiffResult,
  type FieldChange,
  type FieldValue,
  type ParcelRecord,
  type Snapshot,
} from '../core/types.js';
import { sortIds } from './ordering.js';

export { MISSING };

/**
 * Which attribute fields take part in the comparison
 */
export interface DiffOptions {
  /** Compare only these fields (default: every field of either version) */
  readonly compareFields?: readonly string[];
  /** Never compare these fields (applied after compareFields) */
  readonly ignoreFields?: readonly string[];
}

function readField(attributes: AttributeMap, field: string): FieldValue {
  if (!Object.prototype.hasOwnProperty.call(attributes, field)) {
    return MISSING;
  }
  return attributes[field] ?? null;
}

/**
 * Field-level diff of two versions of one parcel
 *
 * @returns Differing fields sorted by name; empty when the versions match
 */
export function diffAttributes(
  before: AttributeMap,
  after: AttributeMap,
  options: DiffOptions = {}
): FieldChange[] {
  const ignored = new Set(options.ignoreFields ?? []);
  const fields = options.compareFields
    ? new Set(options.compareFields)
    : new Set([...Object.keys(before), ...Object.keys(after)]);

  const changes: FieldChange[] = [];
  for (const field of sortIds(fields)) {
    if (ignored.has(field)) continue;

    const oldValue = readField(before, field);
    const newValue = readField(after, field);
    if (oldValue !== newValue) {
      changes.push({ field, before: oldValue, after: newValue });
    }
  }
  return changes;
}

/**
 * Compare two snapshots
 *
 * Output order is lexicographic by identifier regardless of the order
 * features appeared in either file.
 */
export function diffSnapshots(
  baseline: Snapshot,
  current: Snapshot,
  options: DiffOptions = {}
): DiffResult {
  const added: ParcelRecord[] = [];
  const removed: ParcelRecord[] = [];
  const changed: ChangedParcel[] = [];
  let unchangedCount = 0;

  for (const id of sortIds(current.parcels.keys())) {
    const next = current.parcels.get(id);
    if (!next) continue;

    const previous = baseline.parcels.get(id);
    if (!previous) {
      added.push(next);
      continue;
    }

    const changes = diffAttributes(previous.attributes, next.attributes, options);
    if (changes.length > 0) {
      changed.push({ id, changes });
    } else {
      unchangedCount++;
    }
  }

  for (const id of sortIds(baseline.parcels.keys())) {
    const previous = baseline.parcels.get(id);
    if (previous && !current.parcels.has(id)) {
      removed.push(previous);
    }
  }

  return { baseline, current, added, removed, changed, unchangedCount };
}

/**
 * Total number of reported differences (added + removed + changed)
 */
export function countChanges(diff: Pick<DiffResult, 'added' | 'removed' | 'changed'>): number {
  return diff.added.length + diff.removed.length + diff.changed.length;
}
