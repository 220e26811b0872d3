/**
 * Snapshot Loader Tests
 *
 * A broken dataset must never be mistaken for an empty or absent one:
 * that would report every parcel as removed, or silently re-initialize
 * the baseline.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { DatasetError } from '../../../core/errors.js';
import { createResolution } from '../../../schemas/field-resolution.js';
import {
  buildSnapshot,
  loadBaseline,
  loadSnapshot,
  parseSnapshotText,
} from '../../../snapshot/loader.js';
import {
  createTempDir,
  dataset,
  parcel,
  removeTempDir,
  writeDataset,
  writeText,
} from '../../utils/fixtures.js';

describe('buildSnapshot', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('indexes parcels by identifier', () => {
    const snapshot = buildSnapshot(
      dataset([parcel('A', { OWNER: 'X' }), parcel('B', { OWNER: 'Y' })]),
      'current.geojson'
    );

    expect([...snapshot.parcels.keys()]).toEqual(['A', 'B']);
    expect(snapshot.parcels.get('B')?.attributes).toEqual({ PARCEL_ID: 'B', OWNER: 'Y' });
    expect(snapshot.parcels.get('B')?.index).toBe(1);
    expect(snapshot.source).toEqual({
      path: 'current.geojson',
      featureCount: 2,
      parcelCount: 2,
      skippedCount: 0,
      duplicateCount: 0,
    });
  });

  it('skips and counts features without a usable identifier', () => {
    const snapshot = buildSnapshot(
      {
        type: 'FeatureCollection',
        features: [
          parcel('A'),
          { type: 'Feature', properties: { PARCEL_ID: '', OWNER: 'Nobody' }, geometry: null },
          parcel('B'),
        ],
      },
      'current.geojson'
    );

    expect(snapshot.parcels.size).toBe(2);
    expect(snapshot.parcels.has('')).toBe(false);
    expect(snapshot.skipped).toEqual([
      {
        index: 1,
        reason: 'no usable parcelId field (tried PARCEL_ID, PARCELID, PARCEL_NUM, PIN, APN, SERIAL_NUM)',
      },
    ]);
    expect(snapshot.source.skippedCount).toBe(1);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('keeps the last occurrence of a duplicate identifier', () => {
    const snapshot = buildSnapshot(
      dataset([parcel('B', { V: 1 }), parcel('A'), parcel('B', { V: 2 })]),
      'current.geojson'
    );

    expect(snapshot.parcels.get('B')?.attributes.V).toBe(2);
    expect(snapshot.duplicateIds).toEqual(['B']);
    expect(snapshot.source).toMatchObject({ featureCount: 3, parcelCount: 2, duplicateCount: 1 });
  });

  it('honours a configured identifier field', () => {
    const snapshot = buildSnapshot(
      dataset([parcel('A', { OBJECTID: 7 })]),
      'current.geojson',
      { idResolution: createResolution('parcelId', ['OBJECTID']) }
    );

    expect([...snapshot.parcels.keys()]).toEqual(['7']);
  });

  it('rejects an invalid structure with the failing check', () => {
    expect(() => buildSnapshot({ features: 'nope' }, 'current.geojson')).toThrow(
      'Dataset invalid: current.geojson: features: expected a features array'
    );
  });
});

describe('parseSnapshotText', () => {
  it('rejects a dataset with a __proto__ attribute', () => {
    expect(() =>
      parseSnapshotText(
        '{"features": [{"properties": {"PARCEL_ID": "A", "__proto__": "y"}}]}',
        'current.geojson'
      )
    ).toThrow(
      'Dataset invalid: current.geojson: features[0].properties.__proto__: reserved attribute name "__proto__"'
    );
  });

  it('indexes ArcGIS attributes behind an empty properties map', () => {
    const snapshot = parseSnapshotText(
      '{"features": [{"properties": {}, "attributes": {"PARCEL_ID": "A"}}]}',
      'current.geojson'
    );

    expect([...snapshot.parcels.keys()]).toEqual(['A']);
    expect(snapshot.skipped).toEqual([]);
  });

  it('reports malformed JSON as invalid', () => {
    let caught: unknown;
    try {
      parseSnapshotText('{"features": [', 'current.geojson');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DatasetError);
    expect(caught instanceof DatasetError && caught.kind).toBe('invalid');
    expect(caught instanceof DatasetError && caught.reason.startsWith('malformed JSON (')).toBe(true);
  });
});

describe('loadSnapshot / loadBaseline', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('loads a dataset file', async () => {
    const path = await writeDataset(dir, 'current.geojson', [parcel('A'), parcel('B')]);

    const snapshot = await loadSnapshot(path);

    expect(snapshot.source.path).toBe(path);
    expect(snapshot.parcels.size).toBe(2);
  });

  it('reports a missing current file', async () => {
    const path = join(dir, 'absent.geojson');

    await expect(loadSnapshot(path)).rejects.toMatchObject({
      name: 'DatasetError',
      kind: 'missing',
      message: `Dataset missing: ${path}: file does not exist`,
    });
  });

  it('reports a directory as unreadable', async () => {
    const path = join(dir, 'folder.geojson');
    await mkdir(path);

    await expect(loadSnapshot(path)).rejects.toMatchObject({
      kind: 'unreadable',
      reason: 'could not read file (EISDIR)',
    });
  });

  it('treats a missing baseline as absent', async () => {
    const path = join(dir, 'baseline.geojson');

    await expect(loadBaseline(path)).resolves.toEqual({ status: 'absent', path });
  });

  it('fails on a corrupt baseline instead of treating it as absent', async () => {
    const path = await writeText(dir, 'baseline.geojson', 'not json');

    await expect(loadBaseline(path)).rejects.toMatchObject({ kind: 'invalid' });
  });

  it('fails on an empty baseline file', async () => {
    const path = await writeText(dir, 'baseline.geojson', '');

    await expect(loadBaseline(path)).rejects.toMatchObject({ kind: 'invalid' });
  });
});
