/**
 * parcel-watch
 *
 * Parcel dataset change detection: snapshot loading, diffing, watchlist
 * filtering, summaries and notification rendering.
 */

export * from './core/types.js';
export {
  ConfigError,
  DatasetError,
  NotificationError,
  WatchlistError,
  type DatasetErrorKind,
} from './core/errors.js';
export { Logger, createLogger, logger, setLogLevel, type LogLevel } from './core/utils/logger.js';
export { atomicCopyFile, atomicWriteFile } from './core/utils/atomic-write.js';

export {
  DEFAULT_ID_FIELDS,
  PARCEL_ID_RESOLUTION,
  createResolution,
  extractParcelId,
  resolveField,
  type FieldResolution,
  type ResolvedField,
} from './schemas/field-resolution.js';
export { DatasetSchema, FeatureSchema, parseDataset } from './schemas/dataset.js';

export {
  buildSnapshot,
  loadBaseline,
  loadSnapshot,
  parseSnapshotText,
  type SnapshotOptions,
} from './snapshot/loader.js';
export { countChanges, diffAttributes, diffSnapshots, type DiffOptions } from './diff/differ.js';
export { compareIds, sortIds } from './diff/ordering.js';
export {
  applyWatchlist,
  disabledScope,
  loadWatchlist,
  parseWatchlist,
  resolveScope,
} from './diff/watchlist.js';

export {
  SUMMARY_SCHEMA_VERSION,
  buildInitializationSummary,
  buildSummary,
  serializeSummary,
  totalChanges,
} from './summary/summarizer.js';
export { SummaryRecordSchema, parseSummary, readSummary } from './summary/schema.js';
export {
  DEFAULT_NOTIFICATION_OPTIONS,
  renderNotification,
  renderNotificationText,
  truncateList,
  type NotificationDecision,
  type NotificationOptions,
} from './summary/notification.js';

export {
  ConsoleNotifier,
  deliver,
  type NotificationMessage,
  type Notifier,
  type SendResult,
} from './notify/notifier.js';
export {
  promoteBaseline,
  runChangeDetection,
  type RunDependencies,
  type RunOptions,
  type RunResult,
} from './pipeline/run.js';

export { findParcel, searchParcels, type SearchOptions, type SearchResult } from './query/parcels.js';
export { findChange, type ParcelChangeStatus } from './query/changes.js';
export { previewWatchlist, type WatchlistPreview } from './query/watchlist.js';

export {
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  snapshotOptionsFor,
  validateConfig,
  type ConfigOverrides,
  type LoadConfigOptions,
  type ParcelWatchConfig,
} from './config/config.js';
