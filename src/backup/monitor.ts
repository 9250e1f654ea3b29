import { performance } from 'node:perf_hooks';
import path from 'node:path';
import loggerModule, { type MonitorLogger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import eventBusModule, { type EventBus } from '../eventBus.js';
import type { BackupConfig } from '../config/index.js';
import type {
  BackupType,
  CompletedHealthReport,
  DirectoryScan,
  FailedHealthReport,
  HealthReport,
  MetricEvent,
  ScanIssue
} from '../types.js';
import { scanBackupRoot, type ScanOptions } from './scanner.js';
import { checkFreshness, checkIntegrity, checkRetention, summarizeStorage } from './analyzers.js';
import { DEFAULT_SCORING_POLICY, scoreHealth, type ScoringPolicy } from './scoring.js';
import { createMonitorErrorEvent, projectHealthReport, type EventEnvelope } from './events.js';
import { RunState, projectLiveness, type Liveness } from './runState.js';

export type BackupScanner = (
  backupRoot: string,
  options: ScanOptions
) => Promise<Record<BackupType, DirectoryScan>>;

export interface BackupMonitorOptions {
  backup: BackupConfig;
  host: string;
  ttlSeconds?: number;
  runState?: RunState;
  scoringPolicy?: ScoringPolicy;
  scanner?: BackupScanner;
  clock?: () => Date;
  logger?: MonitorLogger;
  metrics?: MetricsRegistry;
  eventBus?: EventBus;
}

export type CollectionResult = {
  report: HealthReport;
  events: MetricEvent[];
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function buildHealthReport(
  scans: Record<BackupType, DirectoryScan>,
  backup: Pick<BackupConfig, 'expectedIntervalHours' | 'retention'>,
  now: Date,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): CompletedHealthReport {
  const daily = scans.daily.records;
  const latestDaily = daily[0];

  const freshness = checkFreshness(latestDaily, backup.expectedIntervalHours);
  const retention = {
    daily: checkRetention(daily, backup.retention.daily),
    weekly: checkRetention(scans.weekly.records, backup.retention.weekly),
    monthly: checkRetention(scans.monthly.records, backup.retention.monthly)
  };
  const integrity = checkIntegrity(latestDaily);
  const storage = summarizeStorage({
    daily,
    weekly: scans.weekly.records,
    monthly: scans.monthly.records
  });
  const score = scoreHealth({ freshness, dailyRetention: retention.daily, integrity }, policy);

  return {
    kind: 'completed',
    timestamp: now.getTime(),
    freshness,
    retention,
    integrity,
    storage,
    healthScore: score.healthScore,
    overallStatus: score.overallStatus
  };
}

export function createFailedReport(error: unknown, now: Date): FailedHealthReport {
  return {
    kind: 'failed',
    timestamp: now.getTime(),
    healthScore: 0,
    overallStatus: 'error',
    error: describeError(error)
  };
}

export class BackupMonitor {
  private readonly backup: BackupConfig;
  private readonly envelope: EventEnvelope;
  private readonly runState: RunState;
  private readonly policy: ScoringPolicy;
  private readonly scanner: BackupScanner;
  private readonly clock: () => Date;
  private readonly logger: MonitorLogger;
  private readonly metrics: MetricsRegistry;
  private readonly eventBus: EventBus;

  constructor(options: BackupMonitorOptions) {
    this.backup = { ...options.backup, backupRoot: path.resolve(options.backup.backupRoot) };
    this.envelope = { host: options.host, ttl: options.ttlSeconds };
    this.runState = options.runState ?? new RunState();
    this.policy = options.scoringPolicy ?? DEFAULT_SCORING_POLICY;
    this.scanner = options.scanner ?? scanBackupRoot;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.eventBus = options.eventBus ?? eventBusModule;
  }

  /** Scans and scores the backup tree against a single evaluation instant. Never throws. */
  async evaluate(now: Date = this.clock()): Promise<HealthReport> {
    try {
      const scans = await this.metrics.time('collection.scan', () =>
        this.scanner(this.backup.backupRoot, {
          archiveExtension: this.backup.archiveExtension,
          minBackupSizeMB: this.backup.minBackupSizeMB,
          maxBackupAgeHours: this.backup.maxBackupAgeHours,
          now
        })
      );
      for (const scan of [scans.daily, scans.weekly, scans.monthly]) {
        this.reportScanIssues(scan.issues);
      }
      return buildHealthReport(scans, this.backup, now, this.policy);
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to calculate backup metrics');
      return createFailedReport(error, now);
    }
  }

  /** Projected events of one collection run; see `run`. */
  async collect(now: Date = this.clock()): Promise<MetricEvent[]> {
    const result = await this.run(now);
    return result.events;
  }

  /** Runs one collection, records it and publishes the projected events. Never throws. */
  async run(now: Date = this.clock()): Promise<CollectionResult> {
    const startedAt = performance.now();
    this.logger.info({ backupRoot: this.backup.backupRoot }, 'Starting backup metrics collection');

    const report = await this.evaluate(now);
    const events = this.project(report);

    if (report.kind === 'completed') {
      try {
        this.runState.recordSuccess(report);
      } catch (error) {
        this.logger.error({ err: error }, 'Failed to persist backup monitor run state');
        events.push(
          createMonitorErrorEvent(`run state not saved: ${describeError(error)}`, report.timestamp, this.envelope)
        );
      }
    }

    this.metrics.recordCollectionRun({
      report,
      eventCount: events.length,
      durationMs: performance.now() - startedAt
    });

    if (report.kind === 'completed') {
      this.logger.info(
        {
          healthScore: report.healthScore,
          overallStatus: report.overallStatus,
          events: events.length
        },
        `Collected ${events.length} backup events, health score: ${report.healthScore.toFixed(2)}`
      );
    }

    this.eventBus.publish(events);
    return { report, events };
  }

  forceCheck(): Promise<MetricEvent[]> {
    return this.collect();
  }

  /** Last successful report, or null when none has been recorded or the store is unreadable. */
  getCurrentStatus(): CompletedHealthReport | null {
    try {
      return this.runState.lastReport();
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to read backup monitor run state');
      return null;
    }
  }

  getLiveness(now: Date = this.clock()): Liveness {
    try {
      return this.runState.evaluateLiveness(now.getTime());
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to read backup monitor run state');
      return {
        status: 'critical',
        healthy: false,
        lastSuccessAt: null,
        minutesSinceLastRun: null,
        thresholdMinutes: this.runState.livenessThresholdMinutes
      };
    }
  }

  monitorHealth(now: Date = this.clock()): MetricEvent {
    return projectLiveness(this.getLiveness(now), now.getTime(), this.envelope);
  }

  private project(report: HealthReport): MetricEvent[] {
    try {
      return projectHealthReport(report, this.envelope);
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to project backup metrics');
      return [createMonitorErrorEvent(describeError(error), report.timestamp, this.envelope)];
    }
  }

  private reportScanIssues(issues: ScanIssue[]) {
    for (const issue of issues) {
      this.metrics.recordScanIssue(issue);
      if (issue.kind === 'directory-unavailable') {
        this.logger.warn(
          { directory: issue.directory, type: issue.type, reason: issue.reason },
          'Failed to read backup directory'
        );
      } else {
        this.logger.warn(
          { filename: issue.filename, type: issue.type, reason: issue.reason },
          'Backup file could not be fully parsed'
        );
      }
    }
  }
}
