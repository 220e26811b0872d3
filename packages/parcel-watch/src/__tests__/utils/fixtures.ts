/**
 * Test builders for datasets, snapshots and temp directories
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AttributeMap, Snapshot } from '../../core/types.js';
import { buildSnapshot } from '../../snapshot/loader.js';

export interface TestFeature {
  readonly type: 'Feature';
  readonly properties: AttributeMap;
  readonly geometry: { readonly type: 'Point'; readonly coordinates: readonly [number, number] } | null;
}

export interface TestDataset {
  readonly type: 'FeatureCollection';
  readonly features: readonly TestFeature[];
}

/**
 * Feature with a PARCEL_ID and the given extra attributes
 */
export function parcel(id: string, attributes: AttributeMap = {}): TestFeature {
  return {
    type: 'Feature',
    properties: { PARCEL_ID: id, ...attributes },
    geometry: { type: 'Point', coordinates: [-111.9, 40.7] },
  };
}

export function dataset(features: readonly TestFeature[]): TestDataset {
  return { type: 'FeatureCollection', features };
}

export function snapshotOf(features: readonly TestFeature[], path = 'test.geojson'): Snapshot {
  return buildSnapshot(dataset(features), path);
}

/**
 * Per-test scratch directory under the OS temp dir
 */
export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'parcel-watch-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeDataset(
  dir: string,
  name: string,
  features: readonly TestFeature[]
): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, JSON.stringify(dataset(features)), 'utf-8');
  return path;
}

export async function writeText(dir: string, name: string, text: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, text, 'utf-8');
  return path;
}

/**
 * Fisher-Yates shuffle driven by a fixed seed
 */
export function seededShuffle<T>(items: readonly T[], seed: number): T[] {
  const out = [...items];
  let state = seed;
  const next = (): number => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(next() * (i + 1));
    const a = out[i];
    const b = out[j];
    if (a === undefined || b === undefined) continue;
    out[i] = b;
    out[j] = a;
  }
  return out;
}
