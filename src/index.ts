export { scanTrees, type ScanTreesOptions } from "./scan.js";

export {
  Aggregator,
  UNREADABLE_PREFIX,
  isUnreadableMarker,
  type AggregateReport,
  type FinalizeOptions,
} from "./aggregator.js";

export { Channel } from "./channel.js";

export {
  DRAINED,
  STOP,
  resolveParallelism,
  startWorkers,
  type ResultItem,
  type WorkItem,
  type WorkerPoolOptions,
} from "./worker-pool.js";

export {
  resolveRoot,
  walkRoot,
  type ResolvedRoot,
  type WalkOptions,
} from "./walker.js";

export { createIgnorer, type Ignorer } from "./ignore.js";

export { HashThreadPool, type HashThreadPoolOptions } from "./hash-worker.js";

export {
  createChunkedChecksum,
  defaultHashAlg,
  digestBuffer,
  listSupportedHashes,
  normalizeHashAlg,
  type ChunkedChecksumOptions,
  type HashAlg,
} from "./hash.js";

export {
  JsonSnapshotStore,
  SqliteSnapshotStore,
  openSnapshotStore,
  type SnapshotStore,
} from "./snapshot-store.js";

export { loadConfig, parseConfig, type ScanConfig } from "./config.js";

export {
  LogNotifier,
  SlackNotifier,
  WebhookNotifier,
  notifyIfChanged,
  type Notifier,
} from "./notify.js";

export {
  formatMessage,
  renderReportTable,
  toChangeReport,
} from "./report.js";

export { runCheck, type CheckCliOptions, type CheckDeps } from "./check.js";

export {
  ConfigError,
  NotifyError,
  PersistenceError,
  SumwatchError,
} from "./errors.js";

export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  fileSink,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";

export type {
  ChangeReport,
  ChecksumFunction,
  ChecksumOutcome,
  ChecksumResult,
  FileDescriptor,
  KeyBy,
  ScanError,
  ScanReport,
  ScanStats,
  Snapshot,
} from "./types.js";
