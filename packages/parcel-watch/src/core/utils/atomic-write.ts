/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so readers see either the old file or the new
 * one. Used for the summary record and for baseline promotion.
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('data/summary.json', serializeSummary(summary));
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent writers off each other's temp files
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    if (typeof data === 'string') {
      await writeFile(tempPath, data, encoding);
    } else {
      await writeFile(tempPath, data);
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isNotFound(cleanupError)) {
        throw new AggregateError([error, cleanupError], `Failed to write ${filePath}`);
      }
    });
    throw error;
  }
}

/**
 * Atomically replace `targetPath` with the bytes of `sourcePath`
 */
export async function atomicCopyFile(sourcePath: string, targetPath: string): Promise<void> {
  const bytes = await readFile(sourcePath);
  await atomicWriteFile(targetPath, bytes);
}

/**
 * True for ENOENT filesystem errors
 */
export function isNotFound(error: unknown): boolean {
  return hasErrorCode(error) && error.code === 'ENOENT';
}

export function hasErrorCode(error: unknown): error is Error & { code: string } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
