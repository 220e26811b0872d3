/**
 * Field Resolution Schema
 *
 * Ordered fallback lookup for logical attributes whose source field name
 * drifts between dataset revisions.
 *
 * MOTIVATION:
 * County assessor layers rename fields between publications (PARCEL_ID,
 * ParcelID, PARCELID, PIN, APN...). Rather than reflecting over whatever
 * keys a feature happens to carry, each logical attribute declares an
 * explicit, versionable list of candidate field names tried in order.
 *
 * MATCHING:
 * - Candidates are tried in declaration order
 * - Within one candidate, an exact key match beats a case-insensitive one
 * - A value resolves only if it is a non-null string or number whose string
 *   form is non-empty after trimming
 */

import type { AttributeMap, AttributeValue } from '../core/types.js';

/**
 * Declarative resolution for one logical attribute
 */
export interface FieldResolution {
  /** Logical attribute name (for diagnostics) */
  readonly logicalName: string;

  /** Source field names, highest priority first */
  readonly candidates: readonly string[];
}

/**
 * Successful resolution
 */
export interface ResolvedField {
  /** Source field name as it appears in the feature */
  readonly field: string;
  readonly value: string;
}

/**
 * Default parcel identifier candidates, highest priority first
 */
export const DEFAULT_ID_FIELDS: readonly string[] = [
  'PARCEL_ID',
  'PARCELID',
  'PARCEL_NUM',
  'PIN',
  'APN',
  'SERIAL_NUM',
];

export const PARCEL_ID_RESOLUTION: FieldResolution = {
  logicalName: 'parcelId',
  candidates: DEFAULT_ID_FIELDS,
};

/**
 * Build a resolution from a configured candidate list
 */
export function createResolution(
  logicalName: string,
  candidates: readonly string[]
): FieldResolution {
  if (candidates.length === 0) {
    throw new Error(`Field resolution "${logicalName}" needs at least one candidate field`);
  }
  return { logicalName, candidates: [...candidates] };
}

/**
 * Normalize a raw attribute value into an identifier-like string,
 * or null when it cannot serve as one
 */
export function toResolvableString(value: AttributeValue | undefined): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * Find the key in `attributes` that matches `candidate`
 * (exact first, then case-insensitive)
 */
function matchKey(attributes: AttributeMap, candidate: string): string | null {
  if (Object.prototype.hasOwnProperty.call(attributes, candidate)) {
    return candidate;
  }

  const wanted = candidate.toUpperCase();
  for (const key of Object.keys(attributes)) {
    if (key.toUpperCase() === wanted) {
      return key;
    }
  }
  return null;
}

/**
 * Resolve a logical attribute against one feature's attributes
 *
 * @returns The first usable candidate, or null when none resolves
 */
export function resolveField(
  attributes: AttributeMap,
  resolution: FieldResolution
): ResolvedField | null {
  for (const candidate of resolution.candidates) {
    const key = matchKey(attributes, candidate);
    if (key === null) continue;

    const value = toResolvableString(attributes[key]);
    if (value !== null) {
      return { field: key, value };
    }
  }
  return null;
}

/**
 * Extract the parcel identifier from a feature's attributes
 */
export function extractParcelId(
  attributes: AttributeMap,
  resolution: FieldResolution = PARCEL_ID_RESOLUTION
): string | null {
  return resolveField(attributes, resolution)?.value ?? null;
}

/**
 * Human-readable candidate list for skip diagnostics
 */
export function describeResolution(resolution: FieldResolution): string {
  return `no usable ${resolution.logicalName} field (tried ${resolution.candidates.join(', ')})`;
}
