export type BackupType = 'daily' | 'weekly' | 'monthly';

export const BACKUP_TYPES: readonly BackupType[] = ['daily', 'weekly', 'monthly'];

export interface BackupRecord {
  readonly filename: string;
  readonly absolutePath: string;
  readonly type: BackupType;
  readonly sizeBytes: number;
  readonly lastModifiedAt: Date;
  /** Taken from the `YYYYMMDD_HHMMSS` part of the filename, never from file metadata. */
  readonly parsedTimestamp: Date | undefined;
  readonly ageHours: number;
  readonly healthy: boolean;
}

export type ScanIssue =
  | {
      kind: 'file-parse';
      type: BackupType;
      filename: string;
      reason: string;
    }
  | {
      kind: 'directory-unavailable';
      type: BackupType;
      directory: string;
      reason: string;
    };

export interface DirectoryScan {
  type: BackupType;
  directory: string;
  present: boolean;
  records: BackupRecord[];
  issues: ScanIssue[];
}

export type FreshnessStatus = 'healthy' | 'stale' | 'missing';

export interface FreshnessResult {
  status: FreshnessStatus;
  ageHours?: number;
  message: string;
}

export type RetentionStatus = 'critical' | 'warning' | 'healthy';

export interface RetentionResult {
  actualCount: number;
  expectedCount: number;
  healthyCount: number;
  status: RetentionStatus;
}

export type IntegrityStatus = 'healthy' | 'degraded' | 'missing' | 'error';

export interface IntegrityResult {
  status: IntegrityStatus;
  score: number;
  sizeMB: number;
  filename?: string;
  message?: string;
}

export interface StorageSummary {
  totalSizeMB: number;
  counts: Record<BackupType, number>;
}

export type OverallStatus = 'healthy' | 'warning' | 'critical';

export interface CompletedHealthReport {
  kind: 'completed';
  timestamp: number;
  freshness: FreshnessResult;
  retention: Record<BackupType, RetentionResult>;
  integrity: IntegrityResult;
  storage: StorageSummary;
  healthScore: number;
  overallStatus: OverallStatus;
}

export interface FailedHealthReport {
  kind: 'failed';
  timestamp: number;
  healthScore: 0;
  overallStatus: 'error';
  error: string;
}

export type HealthReport = CompletedHealthReport | FailedHealthReport;

export type MetricState =
  | 'ok'
  | 'warning'
  | 'critical'
  | 'healthy'
  | 'stale'
  | 'missing'
  | 'degraded'
  | 'error';

export interface MetricEvent {
  service: string;
  metric: number;
  state?: MetricState;
  description: string;
  /** Unix seconds. */
  time: number;
  host: string;
  ttl: number;
}
