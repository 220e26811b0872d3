/**
 * parcel-watch Error Types
 *
 * Each fatal error names the file involved and the check that failed, so a
 * failed nightly run can be diagnosed from its log line alone.
 */

/**
 * Why a dataset could not be turned into a snapshot
 *
 * - missing: file does not exist (recoverable for the baseline only)
 * - unreadable: file exists but could not be read
 * - invalid: not JSON, or not a collection of features with attributes
 */
export type DatasetErrorKind = 'missing' | 'unreadable' | 'invalid';

/**
 * Error thrown when a current or baseline dataset cannot be loaded
 *
 * RECOVERY:
 * - missing baseline: handled by loadBaseline() as a first run
 * - missing/invalid current: re-run the fetcher, the previous summary and
 *   baseline are left untouched
 */
export class DatasetError extends Error {
  constructor(
    public readonly kind: DatasetErrorKind,
    public readonly path: string,
    public readonly reason: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`Dataset ${kind}: ${path}: ${reason}`, options);
    this.name = 'DatasetError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatasetError);
    }
  }
}

/**
 * Error thrown when a watchlist file exists but cannot be read
 */
export class WatchlistError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`Watchlist unreadable: ${path}: ${reason}`, options);
    this.name = 'WatchlistError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WatchlistError);
    }
  }
}

/**
 * Error thrown for configuration that fails validation
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    public readonly configPath: string | null = null
  ) {
    super(message);
    this.name = 'ConfigError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }

  /**
   * Get formatted list of configuration issues
   */
  getSummary(): string {
    const lines: string[] = [
      this.configPath ? `${this.message} (${this.configPath})` : this.message,
    ];

    for (const issue of this.issues.slice(0, 5)) {
      lines.push(`  - ${issue}`);
    }

    if (this.issues.length > 5) {
      lines.push(`  ... and ${this.issues.length - 5} more issues`);
    }

    return lines.join('\n');
  }
}

/**
 * Error thrown when the notifier rejects a message
 */
export class NotificationError extends Error {
  constructor(
    public readonly channel: string,
    message: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`Notification via ${channel} failed: ${message}`, options);
    this.name = 'NotificationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NotificationError);
    }
  }
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
