export {
  applyEnvOverrides,
  type Config,
  configDir,
  configPath,
  DEFAULT_SENTINEL,
  defaultConfig,
  type IndentMode,
  loadOrCreateConfig,
  parseConfigToml,
  resolveStateDir,
  stringifyConfigToml,
} from "./config.js";
export { ConfigError, IoError, ScanError, WeaveConflict, WeaveError, type WeaveErrorKind } from "./errors.js";
export { createLogger, type Logger, type LogLevel, parseLogLevel, silentLogger } from "./log.js";
export {
  findNearMisses,
  isInjectedLine,
  type MarkerKey,
  markerKeyId,
  type MarkerOccurrence,
  type NearMiss,
  parseMarkerLine,
  scanMarkers,
} from "./marker_scanner.js";
export {
  buildCatalog,
  type CatalogSource,
  type InsertionPolicy,
  loadCatalogFiles,
  parseCatalogDocument,
  type Snippet,
  SnippetCatalog,
} from "./snippet_catalog.js";
export { decodeSource, type DecodeResult, encodeSource, type EncodeResult } from "./source_text.js";
export { applyWeave, type MarkerResult, renderSnippet, type WeaveOptions, type WeaveResult } from "./weaver.js";
export { BackupManager, type BackupRecord, restoreBackup } from "./backup_manager.js";
export { createLedger, type Ledger, type LedgerRunRow } from "./ledger.js";
export { listEligibleFiles, restoreRun, weaveTree, type WeaveRunOptions } from "./run_coordinator.js";
export {
  type FileReport,
  formatRestoreReport,
  formatRunReport,
  type RestoreReport,
  type RunCounts,
  type RunReport,
} from "./report.js";
export { dumpCatalogYaml, extractCatalog, extractFromText, toCatalogDocument } from "./extract.js";
