export * from './types.js';
export {
  scanBackupDirectory,
  scanBackupRoot,
  parseBackupTimestamp,
  createBackupRecord,
  compareBackupRecords,
  toMegabytes,
  type ScanOptions
} from './backup/scanner.js';
export {
  checkFreshness,
  checkRetention,
  checkIntegrity,
  scoreBackupSize,
  summarizeStorage,
  INTEGRITY_SIZE_BREAKPOINTS
} from './backup/analyzers.js';
export {
  scoreHealth,
  classifyScore,
  maxPoints,
  DEFAULT_SCORING_POLICY,
  type ScoringPolicy,
  type HealthScore
} from './backup/scoring.js';
export {
  projectHealthReport,
  createMonitorErrorEvent,
  MISSING_AGE_SENTINEL_HOURS,
  DEFAULT_EVENT_TTL_SECONDS,
  type EventEnvelope
} from './backup/events.js';
export {
  RunState,
  MemoryRunStateStore,
  projectLiveness,
  type Liveness,
  type RunStateSnapshot,
  type RunStateStore
} from './backup/runState.js';
export {
  BackupMonitor,
  buildHealthReport,
  createFailedReport,
  type BackupMonitorOptions,
  type BackupScanner,
  type CollectionResult
} from './backup/monitor.js';
export { SqliteRunStateStore } from './db.js';
export { EventBus, type MetricEventListener } from './eventBus.js';
export {
  loadConfig,
  loadConfigFromFile,
  parseConfig,
  validateConfig,
  resolveMonitorConfig,
  type MonitorConfig,
  type BackupConfig
} from './config/index.js';
export { bootstrap, type Application } from './app.js';
