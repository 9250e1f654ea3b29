import type {
  BackupType,
  CompletedHealthReport,
  HealthReport,
  MetricEvent,
  MetricState
} from '../types.js';
import { BACKUP_TYPES } from '../types.js';

/** Reported as `backup.freshness.age_hours` when no backup exists to measure. */
export const MISSING_AGE_SENTINEL_HOURS = 999;

export const DEFAULT_EVENT_TTL_SECONDS = 300;

export type EventEnvelope = {
  host: string;
  ttl?: number;
};

type EventBody = {
  service: string;
  metric: number;
  state?: MetricState;
  description: string;
};

const TIER_LABELS: Record<BackupType, string> = {
  daily: 'Daily',
  weekly: 'Weekly',
  monthly: 'Monthly'
};

export function toUnixSeconds(timestampMs: number): number {
  return Math.floor(timestampMs / 1000);
}

function createEventFactory(timestampMs: number, envelope: EventEnvelope) {
  const base = {
    time: toUnixSeconds(timestampMs),
    host: envelope.host,
    ttl: envelope.ttl ?? DEFAULT_EVENT_TTL_SECONDS
  };
  return (body: EventBody): MetricEvent => {
    const event: MetricEvent = {
      service: body.service,
      metric: body.metric,
      description: body.description,
      ...base
    };
    if (body.state) {
      event.state = body.state;
    }
    return event;
  };
}

function projectCompletedReport(report: CompletedHealthReport, envelope: EventEnvelope): MetricEvent[] {
  const event = createEventFactory(report.timestamp, envelope);
  const { freshness, retention, integrity, storage } = report;
  const events: MetricEvent[] = [];

  events.push(
    event({
      service: 'backup.health.score',
      metric: report.healthScore,
      state: report.overallStatus,
      description: `Overall backup health score: ${report.healthScore.toFixed(2)}`
    })
  );

  events.push(
    event({
      service: 'backup.freshness.age_hours',
      metric: freshness.ageHours ?? MISSING_AGE_SENTINEL_HOURS,
      state: freshness.status,
      description: freshness.message
    })
  );

  for (const type of BACKUP_TYPES) {
    events.push(
      event({
        service: `backup.retention.${type}.count`,
        metric: retention[type].actualCount,
        state: retention[type].status,
        description: `${TIER_LABELS[type]} backups: ${retention[type].actualCount}`
      })
    );
  }

  events.push(
    event({
      service: 'backup.retention.daily.healthy',
      metric: retention.daily.healthyCount,
      description: `Healthy daily backups: ${retention.daily.healthyCount}`
    })
  );

  events.push(
    event({
      service: 'backup.integrity.score',
      metric: integrity.score,
      state: integrity.status,
      description: `Backup integrity score: ${integrity.score.toFixed(2)}`
    })
  );

  events.push(
    event({
      service: 'backup.storage.total_size_mb',
      metric: storage.totalSizeMB,
      description: `Total backup storage: ${storage.totalSizeMB.toFixed(1)} MB`
    })
  );

  for (const type of BACKUP_TYPES) {
    events.push(
      event({
        service: `backup.storage.${type}_count`,
        metric: storage.counts[type],
        description: `Number of ${type} backups: ${storage.counts[type]}`
      })
    );
  }

  const succeeded = report.overallStatus === 'healthy';
  events.push(
    event({
      service: 'backup.process.last_success',
      metric: succeeded ? 1 : 0,
      state: succeeded ? 'ok' : 'critical',
      description: `Last backup process status: ${report.overallStatus}`
    })
  );

  return events;
}

export function createMonitorErrorEvent(
  message: string,
  timestampMs: number,
  envelope: EventEnvelope
): MetricEvent {
  return createEventFactory(timestampMs, envelope)({
    service: 'backup.monitor.error',
    metric: 0,
    state: 'critical',
    description: `Backup monitoring error: ${message}`
  });
}

export function projectHealthReport(report: HealthReport, envelope: EventEnvelope): MetricEvent[] {
  if (report.kind === 'failed') {
    return [createMonitorErrorEvent(report.error, report.timestamp, envelope)];
  }
  return projectCompletedReport(report, envelope);
}
