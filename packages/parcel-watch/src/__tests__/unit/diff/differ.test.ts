/**
 * Differ Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MISSING } from '../../../core/types.js';
import { countChanges, diffAttributes, diffSnapshots } from '../../../diff/differ.js';
import { compareIds, sortIds } from '../../../diff/ordering.js';
import { parcel, snapshotOf } from '../../utils/fixtures.js';

describe('compareIds', () => {
  it('orders by code unit, independent of locale', () => {
    expect(sortIds(['b', 'B', 'a', '10', '9', 'A'])).toEqual(['10', '9', 'A', 'B', 'a', 'b']);
    expect(compareIds('x', 'x')).toBe(0);
  });
});

describe('diffAttributes', () => {
  it('distinguishes a missing field from an empty string', () => {
    expect(diffAttributes({ PARCEL_ID: 'A' }, { PARCEL_ID: 'A', STREET: '' })).toEqual([
      { field: 'STREET', before: MISSING, after: '' },
    ]);
  });

  it('distinguishes a missing field from null', () => {
    expect(diffAttributes({ NOTE: null }, {})).toEqual([
      { field: 'NOTE', before: null, after: MISSING },
    ]);
  });

  it('does not report a field absent from both versions', () => {
    expect(
      diffAttributes({ PARCEL_ID: 'A', OWNER: 'X' }, { PARCEL_ID: 'A', OWNER: 'X' }, {
        compareFields: ['OWNER', 'PROP_STREET'],
      })
    ).toEqual([]);
  });

  it('treats 1 and "1" as different values', () => {
    expect(diffAttributes({ ZIPCODE: 84101 }, { ZIPCODE: '84101' })).toEqual([
      { field: 'ZIPCODE', before: 84101, after: '84101' },
    ]);
  });

  it('returns changes sorted by field name', () => {
    const changes = diffAttributes({ Z: 1, A: 1, M: 1 }, { Z: 2, A: 2, M: 1 });
    expect(changes.map((change) => change.field)).toEqual(['A', 'Z']);
  });

  it('restricts comparison to compareFields', () => {
    const changes = diffAttributes(
      { NAME_ONE: 'Old', OBJECTID: 1 },
      { NAME_ONE: 'New', OBJECTID: 2 },
      { compareFields: ['NAME_ONE'] }
    );
    expect(changes).toEqual([{ field: 'NAME_ONE', before: 'Old', after: 'New' }]);
  });

  it('skips ignoreFields', () => {
    expect(diffAttributes({ OBJECTID: 1 }, { OBJECTID: 2 }, { ignoreFields: ['OBJECTID'] })).toEqual([]);
  });
});

describe('diffSnapshots', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports nothing when a snapshot is compared with itself', () => {
    const snapshot = snapshotOf([parcel('A', { OWNER: 'X' }), parcel('B', { OWNER: 'Y' })]);

    const diff = diffSnapshots(snapshot, snapshot);

    expect(diff.added).toEqual([]);
    expect(diff.removed).toEqual([]);
    expect(diff.changed).toEqual([]);
    expect(diff.unchangedCount).toBe(2);
  });

  it('classifies added, removed, changed and unchanged parcels', () => {
    const baseline = snapshotOf([
      parcel('A', { OWNER: 'X' }),
      parcel('B', { OWNER: 'Y' }),
      parcel('C', { OWNER: 'Z' }),
    ]);
    const current = snapshotOf([
      parcel('D', { OWNER: 'W' }),
      parcel('B', { OWNER: 'Y2' }),
      parcel('C', { OWNER: 'Z' }),
    ]);

    const diff = diffSnapshots(baseline, current);

    expect(diff.added.map((p) => p.id)).toEqual(['D']);
    expect(diff.removed.map((p) => p.id)).toEqual(['A']);
    expect(diff.changed).toEqual([
      { id: 'B', changes: [{ field: 'OWNER', before: 'Y', after: 'Y2' }] },
    ]);
    expect(diff.unchangedCount).toBe(1);
    expect(countChanges(diff)).toBe(3);
  });

  it('is symmetric: swapping inputs swaps added and removed', () => {
    const a = snapshotOf([parcel('1', { V: 'a' }), parcel('2'), parcel('3', { V: 'x' })]);
    const b = snapshotOf([parcel('2'), parcel('3', { V: 'y' }), parcel('4')]);

    const forward = diffSnapshots(a, b);
    const backward = diffSnapshots(b, a);

    expect(backward.added.map((p) => p.id)).toEqual(forward.removed.map((p) => p.id));
    expect(backward.removed.map((p) => p.id)).toEqual(forward.added.map((p) => p.id));
    expect(backward.changed.map((c) => c.id)).toEqual(forward.changed.map((c) => c.id));
    expect(backward.changed[0]?.changes).toEqual([{ field: 'V', before: 'y', after: 'x' }]);
  });

  it('orders results by identifier regardless of input order', () => {
    const baseline = snapshotOf([]);
    const current = snapshotOf([parcel('c'), parcel('a'), parcel('b')]);

    expect(diffSnapshots(baseline, current).added.map((p) => p.id)).toEqual(['a', 'b', 'c']);
  });

  it('leaves a parcel unchanged when a field is missing on both sides', () => {
    const baseline = snapshotOf([parcel('A', { OWNER: 'X' }), parcel('B', { STREET: '' })]);
    const current = snapshotOf([parcel('A', { OWNER: 'X' }), parcel('B', { STREET: '' })]);

    const diff = diffSnapshots(baseline, current, { compareFields: ['OWNER', 'STREET', 'NOTE'] });

    expect(diff.changed).toEqual([]);
    expect(diff.unchangedCount).toBe(2);
  });

  it('ignores geometry', () => {
    const base = parcel('A', { OWNER: 'X' });
    const moved = { ...base, geometry: { type: 'Point' as const, coordinates: [1, 1] as const } };

    const diff = diffSnapshots(snapshotOf([base]), snapshotOf([moved]));

    expect(diff.changed).toEqual([]);
    expect(diff.unchangedCount).toBe(1);
  });
});
