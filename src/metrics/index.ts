import { performance } from 'node:perf_hooks';
import type { HealthReport, ScanIssue } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

export type CollectionRunContext = {
  report: HealthReport;
  eventCount: number;
  durationMs: number;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    lastLevelChangeAt: string | null;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  runs: {
    total: number;
    failures: number;
    lastRunAt: string | null;
    lastScore: number | null;
    lastStatus: HealthReport['overallStatus'] | null;
    lastEventCount: number | null;
    lastFailureMessage: string | null;
  };
  scan: {
    issues: number;
    byKind: CounterMap;
    byType: CounterMap;
    lastIssue: ScanIssue | null;
  };
  latencies: Record<string, LatencyStats>;
};

function mapFrom(map: Map<string, number>): CounterMap {
  return Object.fromEntries([...map.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private runs = 0;
  private runFailures = 0;
  private lastRunAt: number | null = null;
  private lastScore: number | null = null;
  private lastStatus: HealthReport['overallStatus'] | null = null;
  private lastEventCount: number | null = null;
  private lastFailureMessage: string | null = null;
  private scanIssues = 0;
  private readonly scanIssuesByKind = new Map<string, number>();
  private readonly scanIssuesByType = new Map<string, number>();
  private lastScanIssue: ScanIssue | null = null;
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logLevelCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.latencyStats.clear();
    this.runs = 0;
    this.runFailures = 0;
    this.lastRunAt = null;
    this.lastScore = null;
    this.lastStatus = null;
    this.lastEventCount = null;
    this.lastFailureMessage = null;
    this.scanIssues = 0;
    this.scanIssuesByKind.clear();
    this.scanIssuesByType.clear();
    this.lastScanIssue = null;
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (previousNormalized && previousNormalized !== normalized) {
      this.lastLogLevelChangeAt = Date.now();
    }
  }

  recordCollectionRun(context: CollectionRunContext) {
    this.runs += 1;
    this.lastRunAt = context.report.timestamp;
    this.lastScore = context.report.healthScore;
    this.lastStatus = context.report.overallStatus;
    this.lastEventCount = context.eventCount;
    if (context.report.kind === 'failed') {
      this.runFailures += 1;
      this.lastFailureMessage = context.report.error;
    }
    this.observeLatency('collection.run', context.durationMs);
  }

  recordScanIssue(issue: ScanIssue) {
    this.scanIssues += 1;
    this.scanIssuesByKind.set(issue.kind, (this.scanIssuesByKind.get(issue.kind) ?? 0) + 1);
    this.scanIssuesByType.set(issue.type, (this.scanIssuesByType.get(issue.type) ?? 0) + 1);
    this.lastScanIssue = issue;
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  snapshot(): MetricsSnapshot {
    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencyStats) {
      latencies[metric] = {
        count: stats.count,
        totalMs: stats.totalMs,
        minMs: stats.count > 0 ? stats.minMs : 0,
        maxMs: stats.maxMs,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapFrom(this.logLevelCounters),
        currentLevel: this.currentLogLevel,
        lastLevelChangeAt: this.lastLogLevelChangeAt
          ? new Date(this.lastLogLevelChangeAt).toISOString()
          : null,
        lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
        lastErrorMessage: this.lastErrorMessage
      },
      runs: {
        total: this.runs,
        failures: this.runFailures,
        lastRunAt: this.lastRunAt !== null ? new Date(this.lastRunAt).toISOString() : null,
        lastScore: this.lastScore,
        lastStatus: this.lastStatus,
        lastEventCount: this.lastEventCount,
        lastFailureMessage: this.lastFailureMessage
      },
      scan: {
        issues: this.scanIssues,
        byKind: mapFrom(this.scanIssuesByKind),
        byType: mapFrom(this.scanIssuesByType),
        lastIssue: this.lastScanIssue
      },
      latencies
    };
  }
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
