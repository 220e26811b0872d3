/**
 * Detect Command
 *
 * Compare the current dataset with the baseline, write the summary, notify
 * and promote the baseline.
 *
 * Usage:
 *   parcel-watch detect [options]
 *
 * With --json the run result (summary, decision and message text) is the
 * output, and no separate console message is printed.
 */

import type { Command } from 'commander';
import type { ParcelWatchConfig } from '../../config/config.js';
import { ConsoleNotifier, type Notifier } from '../../notify/notifier.js';
import { runChangeDetection } from '../../pipeline/run.js';
import { totalChanges } from '../../summary/summarizer.js';
import { runCommand } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, type CommandOutput } from '../lib/output.js';

export interface DetectDependencies {
  readonly notifier: Notifier | null;
  readonly now?: () => Date;
}

export function registerDetectCommand(program: Command): void {
  program
    .command('detect')
    .description('Compare the current dataset with the baseline and report changes')
    .action(async () => {
      await runCommand(({ config, out }) =>
        executeDetect(config, out, {
          notifier: config.json ? null : new ConsoleNotifier(process.stdout),
        })
      );
    });
}

export async function executeDetect(
  config: ParcelWatchConfig,
  out: CommandOutput,
  deps: DetectDependencies
): Promise<ExitCode> {
  const result = await runChangeDetection(config, deps);
  const { summary, notification } = result;

  if (config.json) {
    out.log(
      formatJson({
        summary,
        notification: notification.send ? { send: true, text: notification.text } : notification,
        promoted: result.promoted,
        summaryPath: result.summaryPath,
      })
    );
    return EXIT_CODES.SUCCESS;
  }

  if (config.dryRun && notification.send) {
    out.log(notification.text);
  }

  if (summary.initialized) {
    out.log(`Baseline initialized with ${summary.stats.currentTotal} parcels`);
  } else {
    out.log(
      `${totalChanges(summary)} changes (added ${summary.stats.addedCount}, ` +
        `removed ${summary.stats.removedCount}, changed ${summary.stats.changedCount})`
    );
  }

  if (!notification.send) {
    out.log('Notification suppressed (no changes)');
  }

  if (result.summaryPath === null) {
    out.log('Dry run: summary and baseline left untouched');
  } else {
    out.log(`Summary written to ${result.summaryPath}`);
  }
  if (result.promoted) {
    out.log(`Baseline updated: ${config.paths.baseline}`);
  }

  return EXIT_CODES.SUCCESS;
}
