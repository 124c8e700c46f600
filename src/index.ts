// src/index.ts
export {
  DEFAULT_CONFIG,
  configFromEnv,
  loadSettingsFile,
  resolveConfig,
  validateConfig,
  type ConfigOverrides,
  type ReconcilerConfig,
} from "./config.js";
export {
  ConfigurationError,
  MalformedMetadataError,
  StoreWriteError,
  TransientMountError,
  describeError,
} from "./errors.js";
export {
  parseDescriptor,
  parseZurgInfo,
  parseZurgTorrent,
  type Descriptor,
} from "./descriptor.js";
export { parseTorrent, type TorrentMeta } from "./torrent-file.js";
export {
  ITEM_STATUSES,
  type Item,
  type ItemFile,
  type ItemSnapshot,
  type ItemStatus,
} from "./item.js";
export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  createLogger,
  type Logger,
  type LogLevel,
} from "./logger.js";
export {
  MetadataReader,
  type DescriptorBatch,
  type DescriptorResult,
  type MetadataReaderOptions,
} from "./metadata-reader.js";
export {
  scanMount,
  type HealthyScan,
  type MountScan,
  type ScanOptions,
  type UnknownScan,
} from "./mount-scan.js";
export { locateItem, similarity, type Observation } from "./name-match.js";
export {
  INITIAL_OUTAGE,
  nextOutageState,
  type OutagePolicy,
  type OutageState,
} from "./outage.js";
export {
  runPass,
  type PassContext,
  type PassReport,
  type TransitionEvent,
  type TransitionListener,
} from "./reconcile.js";
export {
  createScheduler,
  type Scheduler,
  type SchedulerOptions,
  type TickResult,
} from "./scheduler.js";
export { StateStore, type PassRecord, type StoredPass } from "./state-store.js";
export { decideTransition, visibilityOf } from "./transitions.js";
