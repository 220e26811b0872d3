/**
 * Summary Record Schema
 *
 * Validates a summary file read back from disk (query commands).
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { SummaryRecord } from '../core/types.js';
import { isNotFound } from '../core/utils/atomic-write.js';
import { AttributeValueSchema, formatIssuePath } from '../schemas/dataset.js';

const SourceStatsSchema = z.object({
  path: z.string(),
  featureCount: z.number().int().nonnegative(),
  parcelCount: z.number().int().nonnegative(),
  skippedUnidentifiable: z.number().int().nonnegative(),
  duplicateIds: z.number().int().nonnegative(),
});

const FieldChangeSchema = z.object({
  field: z.string(),
  kind: z.enum(['added', 'removed', 'modified']),
  before: AttributeValueSchema,
  after: AttributeValueSchema,
});

export const SummaryRecordSchema = z.object({
  schemaVersion: z.literal(1),
  status: z.enum(['ok', 'initialized']),
  initialized: z.boolean(),
  generatedAt: z.string(),
  sources: z.object({
    current: SourceStatsSchema,
    baseline: SourceStatsSchema.nullable(),
  }),
  watchlist: z.object({
    enabled: z.boolean(),
    size: z.number().int().nonnegative(),
    path: z.string().nullable(),
    notFound: z.number().int().nonnegative(),
    disabledReason: z.enum(['not-configured', 'empty', 'unreadable']).nullable(),
  }),
  stats: z.object({
    currentTotal: z.number().int().nonnegative(),
    baselineTotal: z.number().int().nonnegative().nullable(),
    addedCount: z.number().int().nonnegative(),
    removedCount: z.number().int().nonnegative(),
    changedCount: z.number().int().nonnegative(),
    unchangedCount: z.number().int().nonnegative(),
  }),
  added: z.array(z.string()),
  removed: z.array(z.string()),
  changed: z.array(
    z.object({
      id: z.string(),
      changes: z.array(FieldChangeSchema),
    })
  ),
}) satisfies z.ZodType<SummaryRecord>;

/**
 * Parse summary JSON text
 *
 * @throws Error naming the first failing field
 */
export function parseSummary(text: string, path: string): SummaryRecord {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new Error(`Summary ${path} is not valid JSON`, { cause: error });
  }

  const result = SummaryRecordSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${formatIssuePath(issue.path)}: ${issue.message}` : 'invalid';
    throw new Error(`Summary ${path} failed validation (${detail})`);
  }
  return result.data;
}

/**
 * Read the latest summary file
 *
 * @returns null when no summary has been written yet
 */
export async function readSummary(path: string): Promise<SummaryRecord | null> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
  return parseSummary(text, path);
}
