/**
 * Change Detection Run
 *
 * One batch: load, compare, summarize, notify, promote.
 *
 * ORDER:
 * 1. watchlist  2. current  3. baseline  4. diff + filter + summary
 * 5. summary write  6. notification  7. baseline promotion
 *
 * Any failure before step 5 writes nothing. A failed notification leaves
 * the baseline where it was, so the next run reports the same changes.
 */

import { WatchlistError } from '../core/errors.js';
import type { SummaryRecord, Watchlist, WatchScope } from '../core/types.js';
import { atomicCopyFile, atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { snapshotOptionsFor, type ParcelWatchConfig } from '../config/config.js';
import { diffSnapshots, type DiffOptions } from '../diff/differ.js';
import { applyWatchlist, disabledScope, loadWatchlist, resolveScope } from '../diff/watchlist.js';
import { deliver, type Notifier, type SendResult } from '../notify/notifier.js';
import { loadBaseline, loadSnapshot } from '../snapshot/loader.js';
import { renderNotification, type NotificationDecision } from '../summary/notification.js';
import {
  buildInitializationSummary,
  buildSummary,
  serializeSummary,
  totalChanges,
} from '../summary/summarizer.js';

const log = createLogger({ module: 'run' });

export type RunOptions = Pick<
  ParcelWatchConfig,
  'paths' | 'idFields' | 'diff' | 'notification' | 'watchlist' | 'dryRun'
>;

export interface RunDependencies {
  /** Receives the message when the run decides to send; null to only render */
  readonly notifier: Notifier | null;
  /** Clock for generatedAt (default: system time) */
  readonly now?: () => Date;
}

export interface RunResult {
  readonly summary: SummaryRecord;
  readonly notification: NotificationDecision;
  /** Delivery outcome; null when nothing was sent */
  readonly delivery: SendResult | null;
  /** Whether the current file became the new baseline */
  readonly promoted: boolean;
  /** Where the summary was written; null on a dry run */
  readonly summaryPath: string | null;
}

/**
 * Load the watchlist according to the configured failure policy
 */
async function loadWatchlistForRun(
  options: RunOptions
): Promise<{ watchlist: Watchlist | null; unreadable: boolean }> {
  try {
    return { watchlist: await loadWatchlist(options.paths.watchlist), unreadable: false };
  } catch (error) {
    if (error instanceof WatchlistError && options.watchlist.onInvalid === 'disable') {
      log.warn('Watchlist unreadable, reporting all parcels', {
        path: error.path,
        reason: error.reason,
      });
      return { watchlist: null, unreadable: true };
    }
    throw error;
  }
}

/**
 * Copy the current dataset over the baseline
 */
export async function promoteBaseline(currentPath: string, baselinePath: string): Promise<void> {
  await atomicCopyFile(currentPath, baselinePath);
  log.info('Baseline promoted', { from: currentPath, to: baselinePath });
}

/**
 * Execute one change-detection run
 *
 * @throws WatchlistError | DatasetError before anything is written
 * @throws NotificationError after the summary write, before promotion
 */
export async function runChangeDetection(
  options: RunOptions,
  deps: RunDependencies
): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());
  const snapshotOptions = snapshotOptionsFor(options);
  const diffOptions: DiffOptions = {
    ...(options.diff.compareFields ? { compareFields: options.diff.compareFields } : {}),
    ignoreFields: options.diff.ignoreFields,
  };

  // 1-3: inputs
  const { watchlist, unreadable } = await loadWatchlistForRun(options);
  const current = await loadSnapshot(options.paths.current, snapshotOptions);
  const baseline = await loadBaseline(options.paths.baseline, snapshotOptions);

  // 4: compare
  const meta = { generatedAt: now().toISOString() };
  let summary: SummaryRecord;
  if (baseline.status === 'absent') {
    const scope: WatchScope = unreadable
      ? disabledScope('unreadable', options.paths.watchlist)
      : resolveScope(watchlist, [current]);
    summary = buildInitializationSummary(current, scope, meta);
  } else {
    const scoped = applyWatchlist(
      diffSnapshots(baseline.snapshot, current, diffOptions),
      watchlist
    );
    summary = buildSummary(
      unreadable ? { ...scoped, scope: disabledScope('unreadable', options.paths.watchlist) } : scoped,
      meta
    );
  }

  const notification = renderNotification(summary, options.notification);

  log.info('Comparison complete', {
    status: summary.status,
    added: summary.stats.addedCount,
    removed: summary.stats.removedCount,
    changed: summary.stats.changedCount,
    watchlist: summary.watchlist.enabled,
  });

  if (options.dryRun) {
    log.info('Dry run, nothing written', { wouldNotify: notification.send });
    return { summary, notification, delivery: null, promoted: false, summaryPath: null };
  }

  // 5: summary
  await atomicWriteFile(options.paths.summary, serializeSummary(summary));
  log.info('Summary written', { path: options.paths.summary });

  // 6: notification
  let delivery: SendResult | null = null;
  if (notification.send && deps.notifier) {
    delivery = await deliver(deps.notifier, {
      text: notification.text,
      generatedAt: summary.generatedAt,
    });
    log.info('Notification sent', { channel: delivery.channel });
  } else if (!notification.send) {
    log.info('Notification suppressed', {
      reason: notification.reason,
      changes: totalChanges(summary),
    });
  }

  // 7: promotion
  await promoteBaseline(options.paths.current, options.paths.baseline);

  return {
    summary,
    notification,
    delivery,
    promoted: true,
    summaryPath: options.paths.summary,
  };
}
