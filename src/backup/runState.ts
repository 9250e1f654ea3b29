import type { CompletedHealthReport, MetricEvent } from '../types.js';
import { DEFAULT_EVENT_TTL_SECONDS, toUnixSeconds, type EventEnvelope } from './events.js';

export type RunStateSnapshot = {
  lastSuccessAt: number;
  lastReport: CompletedHealthReport;
};

/**
 * Holds the outcome of the most recent successful run. `write` replaces the
 * whole snapshot at once; readers observe either the previous or the next one.
 */
export interface RunStateStore {
  read(): RunStateSnapshot | null;
  write(snapshot: RunStateSnapshot): void;
  close?(): void;
}

/** Copies on write and on read, so callers never share the stored report. */
export class MemoryRunStateStore implements RunStateStore {
  private snapshot: RunStateSnapshot | null = null;

  read(): RunStateSnapshot | null {
    return this.snapshot ? structuredClone(this.snapshot) : null;
  }

  write(snapshot: RunStateSnapshot): void {
    this.snapshot = structuredClone(snapshot);
  }
}

export type LivenessStatus = 'ok' | 'critical';

export type Liveness = {
  status: LivenessStatus;
  healthy: boolean;
  lastSuccessAt: number | null;
  minutesSinceLastRun: number | null;
  thresholdMinutes: number;
};

const MS_PER_MINUTE = 60 * 1000;

export class RunState {
  private readonly store: RunStateStore;
  readonly livenessThresholdMinutes: number;

  constructor(store: RunStateStore = new MemoryRunStateStore(), livenessThresholdMinutes = 10) {
    this.store = store;
    this.livenessThresholdMinutes = livenessThresholdMinutes;
  }

  recordSuccess(report: CompletedHealthReport, at: number = report.timestamp) {
    this.store.write({ lastSuccessAt: at, lastReport: report });
  }

  lastSuccessAt(): number | null {
    return this.store.read()?.lastSuccessAt ?? null;
  }

  lastReport(): CompletedHealthReport | null {
    return this.store.read()?.lastReport ?? null;
  }

  evaluateLiveness(now: number = Date.now()): Liveness {
    const lastSuccessAt = this.lastSuccessAt();
    if (lastSuccessAt === null) {
      return {
        status: 'critical',
        healthy: false,
        lastSuccessAt: null,
        minutesSinceLastRun: null,
        thresholdMinutes: this.livenessThresholdMinutes
      };
    }

    const minutesSinceLastRun = Math.max(0, now - lastSuccessAt) / MS_PER_MINUTE;
    const healthy = minutesSinceLastRun < this.livenessThresholdMinutes;
    return {
      status: healthy ? 'ok' : 'critical',
      healthy,
      lastSuccessAt,
      minutesSinceLastRun,
      thresholdMinutes: this.livenessThresholdMinutes
    };
  }
}

export function projectLiveness(liveness: Liveness, now: number, envelope: EventEnvelope): MetricEvent {
  const description =
    liveness.minutesSinceLastRun === null
      ? 'Backup monitor has not completed a run'
      : `Backup monitor last ran ${Math.trunc(liveness.minutesSinceLastRun)} minutes ago`;

  return {
    service: 'backup.monitor.health',
    metric: liveness.healthy ? 1 : 0,
    state: liveness.status,
    description,
    time: toUnixSeconds(now),
    host: envelope.host,
    ttl: envelope.ttl ?? DEFAULT_EVENT_TTL_SECONDS
  };
}
