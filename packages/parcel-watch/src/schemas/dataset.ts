/**
 * Dataset Schema
 *
 * Zod schemas for the feature collection written by the fetcher.
 *
 * Accepted shapes:
 * - GeoJSON FeatureCollection: { type: 'FeatureCollection', features: [{ type: 'Feature', properties, geometry }] }
 * - ArcGIS query JSON: { features: [{ attributes, geometry }] }
 *
 * Geometry is carried through without validation; only the attribute map is
 * checked, and only for scalar values.
 */

import { z } from 'zod';
import type { Geometry } from 'geojson';
import type { AttributeValue } from '../core/types.js';

export const AttributeValueSchema = z.union(
  [z.string(), z.number(), z.boolean(), z.null()],
  { errorMap: () => ({ message: 'expected a string, number, boolean or null' }) }
);

// zod drops a `__proto__` key from records without an issue
const AttributeNameSchema = z.string().refine((name) => name !== '__proto__', {
  message: 'reserved attribute name "__proto__"',
});

export const AttributeMapSchema = z.record(AttributeNameSchema, AttributeValueSchema, {
  errorMap: () => ({ message: 'expected an object' }),
});

function isGeometryLike(value: unknown): value is Geometry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string'
  );
}

const GeometrySchema = z.custom<Geometry>(isGeometryLike, {
  message: 'expected a geometry object with a type',
});

export const FeatureSchema = z
  .object(
    {
      type: z.literal('Feature').optional(),
      properties: AttributeMapSchema.nullable().optional(),
      attributes: AttributeMapSchema.nullable().optional(),
      geometry: GeometrySchema.nullable().optional(),
    },
    { errorMap: () => ({ message: 'expected a feature object' }) }
  )
  .superRefine((feature, ctx) => {
    if (!feature.properties && !feature.attributes) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['properties'],
        message: 'feature has no attribute map (properties or attributes)',
      });
    }
  });

export const DatasetSchema = z.object(
  {
    type: z.literal('FeatureCollection').optional(),
    features: z.array(FeatureSchema, {
      errorMap: () => ({ message: 'expected a features array' }),
    }),
  },
  { errorMap: () => ({ message: 'expected a feature collection object' }) }
);

export type RawDataset = z.infer<typeof DatasetSchema>;

/**
 * Feature reduced to what the snapshot loader needs
 */
export interface ParsedFeature {
  readonly attributes: Readonly<Record<string, AttributeValue>>;
  readonly geometry: Geometry | null;
}

export type DatasetParseResult =
  | { readonly success: true; readonly features: readonly ParsedFeature[] }
  | { readonly success: false; readonly error: string };

/**
 * Render a zod issue path as `features[3].properties.NAME`
 */
export function formatIssuePath(path: readonly (string | number)[]): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out.length > 0 ? out : '(root)';
}

type RawAttributeMap = Readonly<Record<string, AttributeValue>> | null | undefined;

/**
 * Non-empty `properties` wins; an empty one falls back to `attributes`
 */
function selectAttributes(
  properties: RawAttributeMap,
  attributes: RawAttributeMap
): Readonly<Record<string, AttributeValue>> {
  if (properties && Object.keys(properties).length > 0) {
    return properties;
  }
  return attributes ?? properties ?? {};
}

/**
 * Validate raw JSON as a dataset
 *
 * Reports the first failing check only; one bad feature is enough to
 * reject the file.
 */
export function parseDataset(data: unknown): DatasetParseResult {
  const result = DatasetSchema.safeParse(data);

  if (!result.success) {
    const issue = result.error.issues[0];
    if (!issue) {
      return { success: false, error: 'dataset failed validation' };
    }
    return { success: false, error: `${formatIssuePath(issue.path)}: ${issue.message}` };
  }

  const features = result.data.features.map((feature): ParsedFeature => ({
    attributes: selectAttributes(feature.properties, feature.attributes),
    geometry: feature.geometry ?? null,
  }));

  return { success: true, features };
}
