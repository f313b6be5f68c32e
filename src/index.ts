export {
  runScan,
  emptyScanResult,
  type ScanOptions,
  type ScanResult,
  type ScanStatus,
  type FileFailure,
} from "./scan.js";
export {
  SqliteCatalogStore,
  UNASSIGNED,
  assignedId,
  type CatalogRecord,
  type CatalogStats,
  type CatalogStore,
  type PersistedRecord,
  type ProcessedMarker,
  type RecordId,
} from "./catalog-store.js";
export { BatchCommitter, type FlushResult } from "./batch.js";
export {
  Reconciler,
  withinSizeLimits,
  type Outcome,
  type OutcomeKind,
  type Probe,
} from "./reconcile.js";
export { checkRoot, discoverFiles, normalizeExtensions } from "./discover.js";
export {
  createHasher,
  fileDigest,
  listSupportedHashes,
  normalizeHashAlg,
  type HashAlg,
  type Hasher,
} from "./hash.js";
export {
  ImageMetadataExtractor,
  parseDateTaken,
  selectTags,
  type ExtractedMetadata,
  type MetadataExtractor,
} from "./metadata.js";
export {
  DEFAULT_SETTINGS,
  loadSettings,
  type ScannerSettings,
} from "./config.js";
export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  createLogger,
  type Logger,
  type LogLevel,
} from "./logger.js";
export {
  CancelledError,
  CatalogMismatchError,
  ConfigError,
  HashUnavailableError,
  ImgLedgerError,
  IoError,
  MetadataUnavailableError,
  StorageError,
} from "./errors.js";
export { formatScanSummary, formatCatalogStats } from "./summary.js";
