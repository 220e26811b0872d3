/**
 * Snapshot Loader
 *
 * Reads a dataset file and indexes its features by parcel identifier.
 *
 * FAILURE MODES:
 * - File missing          → DatasetError('missing'); loadBaseline() turns this into 'absent'
 * - File unreadable       → DatasetError('unreadable')
 * - Not JSON / bad shape  → DatasetError('invalid')
 * - Feature without an id → skipped and counted, never indexed under ''
 * - Duplicate id          → last occurrence wins, id recorded in duplicateIds
 */

import { readFile } from 'node:fs/promises';
import { DatasetError } from '../core/errors.js';
import { hasErrorCode, isNotFound } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import type {
  BaselineLoadResult,
  ParcelRecord,
  SkippedRecord,
  Snapshot,
} from '../core/types.js';
import { parseDataset } from '../schemas/dataset.js';
import {
  PARCEL_ID_RESOLUTION,
  describeResolution,
  resolveField,
  type FieldResolution,
} from '../schemas/field-resolution.js';
import { compareIds } from '../diff/ordering.js';

const log = createLogger({ module: 'snapshot' });

export interface SnapshotOptions {
  /** Identifier resolution (defaults to PARCEL_ID_RESOLUTION) */
  readonly idResolution?: FieldResolution;
}

/**
 * Index already-parsed JSON into a snapshot
 *
 * @param data - Parsed JSON content of a dataset file
 * @param path - Source path, used in diagnostics and summary metadata
 * @throws DatasetError('invalid') when the structure is not a feature collection
 */
export function buildSnapshot(
  data: unknown,
  path: string,
  options: SnapshotOptions = {}
): Snapshot {
  const parsed = parseDataset(data);
  if (!parsed.success) {
    throw new DatasetError('invalid', path, parsed.error);
  }

  const resolution = options.idResolution ?? PARCEL_ID_RESOLUTION;
  const parcels = new Map<string, ParcelRecord>();
  const skipped: SkippedRecord[] = [];
  const duplicates = new Set<string>();

  parsed.features.forEach((feature, index) => {
    const resolved = resolveField(feature.attributes, resolution);
    if (resolved === null) {
      skipped.push({ index, reason: describeResolution(resolution) });
      return;
    }

    if (parcels.has(resolved.value)) {
      duplicates.add(resolved.value);
    }

    parcels.set(resolved.value, {
      id: resolved.value,
      attributes: feature.attributes,
      geometry: feature.geometry,
      index,
    });
  });

  const duplicateIds = [...duplicates].sort(compareIds);

  if (skipped.length > 0) {
    log.warn('Skipped unidentifiable records', {
      path,
      skipped: skipped.length,
      firstIndex: skipped[0]?.index,
    });
  }
  if (duplicateIds.length > 0) {
    log.warn('Duplicate parcel identifiers (last occurrence kept)', {
      path,
      duplicates: duplicateIds.length,
      sample: duplicateIds.slice(0, 5),
    });
  }

  return {
    source: {
      path,
      featureCount: parsed.features.length,
      parcelCount: parcels.size,
      skippedCount: skipped.length,
      duplicateCount: duplicateIds.length,
    },
    parcels,
    skipped,
    duplicateIds,
  };
}

/**
 * Parse dataset file content
 *
 * @throws DatasetError('invalid') on malformed JSON or structure
 */
export function parseSnapshotText(
  text: string,
  path: string,
  options: SnapshotOptions = {}
): Snapshot {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DatasetError('invalid', path, `malformed JSON (${reason})`, { cause: error });
  }
  return buildSnapshot(data, path, options);
}

/**
 * Load and index a dataset file
 *
 * @throws DatasetError with kind 'missing', 'unreadable' or 'invalid'
 */
export async function loadSnapshot(
  path: string,
  options: SnapshotOptions = {}
): Promise<Snapshot> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new DatasetError('missing', path, 'file does not exist', { cause: error });
    }
    const reason = hasErrorCode(error) ? error.code : String(error);
    throw new DatasetError('unreadable', path, `could not read file (${reason})`, {
      cause: error,
    });
  }

  const snapshot = parseSnapshotText(text, path, options);
  log.debug('Loaded snapshot', { ...snapshot.source });
  return snapshot;
}

/**
 * Load the baseline dataset, treating a missing file as a first run
 *
 * @throws DatasetError('unreadable' | 'invalid'); an existing but broken
 *   baseline is fatal, never mistaken for a first run
 */
export async function loadBaseline(
  path: string,
  options: SnapshotOptions = {}
): Promise<BaselineLoadResult> {
  try {
    return { status: 'loaded', snapshot: await loadSnapshot(path, options) };
  } catch (error) {
    if (error instanceof DatasetError && error.kind === 'missing') {
      log.info('No baseline found, this run initializes it', { path });
      return { status: 'absent', path };
    }
    throw error;
  }
}
