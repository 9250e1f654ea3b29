import { fileURLToPath } from 'node:url';
import logger, { onLogLevelChange, setLogLevel, type MonitorLogger } from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { loadConfig, type MonitorConfig } from './config/index.js';
import { BackupMonitor } from './backup/monitor.js';
import { MemoryRunStateStore, RunState, type RunStateStore } from './backup/runState.js';
import { SqliteRunStateStore } from './db.js';

export type HealthStatus = 'ok' | 'degraded';

export type HealthIndicatorContext = {
  now: Date;
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type HealthCheckResult = {
  name: string;
  status: HealthStatus;
  details?: Record<string, unknown>;
};

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

const healthIndicators: RegisteredIndicator[] = [];

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  const existingIndex = healthIndicators.findIndex(entry => entry.name === name);
  const entry: RegisteredIndicator = { name, indicator };
  if (existingIndex >= 0) {
    healthIndicators[existingIndex] = entry;
  } else {
    healthIndicators.push(entry);
  }

  return () => {
    const index = healthIndicators.findIndex(item => item.name === name);
    if (index >= 0) {
      healthIndicators.splice(index, 1);
    }
  };
}

export async function collectHealthChecks(context: HealthIndicatorContext): Promise<HealthCheckResult[]> {
  const results: HealthCheckResult[] = [];
  const metricsSnapshot = context.metrics ?? metrics.snapshot();
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: metricsSnapshot,
    metricsCreatedAt: metricsSnapshot.createdAt
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: {
          error: error instanceof Error ? error.message : String(error)
        }
      });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
}

export function createRunStateStore(config: MonitorConfig): RunStateStore {
  return config.database.path ? new SqliteRunStateStore(config.database.path) : new MemoryRunStateStore();
}

/** Child logger carrying `app.name`; follows later `setLogLevel` calls until detached. */
export function createAppLogger(config: MonitorConfig) {
  const child = logger.child({ name: config.app.name });
  const detach = onLogLevelChange(level => {
    child.level = level;
  });
  return { log: child, detach };
}

export function applyConfiguredLogLevel(level: string | null, log: MonitorLogger = logger) {
  if (level === null) {
    return;
  }
  try {
    setLogLevel(level);
  } catch (error) {
    log.warn({ err: error, level }, 'Failed to apply configured log level');
  }
}

export function createMonitor(config: MonitorConfig, store: RunStateStore, log: MonitorLogger = logger) {
  const runState = new RunState(store, config.monitor.livenessThresholdMinutes);
  return new BackupMonitor({
    backup: config.backup,
    host: config.app.host,
    ttlSeconds: config.events.ttlSeconds,
    runState,
    logger: log
  });
}

export function registerMonitorLiveness(monitor: BackupMonitor) {
  return registerHealthIndicator('backup-monitor', context => {
    const liveness = monitor.getLiveness(context.now);
    return {
      status: liveness.healthy ? 'ok' : 'degraded',
      details: {
        lastSuccessAt: liveness.lastSuccessAt !== null ? new Date(liveness.lastSuccessAt).toISOString() : null,
        minutesSinceLastRun: liveness.minutesSinceLastRun,
        thresholdMinutes: liveness.thresholdMinutes
      }
    };
  });
}

export type Application = {
  config: MonitorConfig;
  monitor: BackupMonitor;
  close: () => void;
};

export async function bootstrap(loaded: MonitorConfig = loadConfig()): Promise<Application> {
  applyConfiguredLogLevel(loaded.logging.level);
  const { log, detach } = createAppLogger(loaded);
  log.info('Backup monitor bootstrap starting');

  const store = createRunStateStore(loaded);
  const monitor = createMonitor(loaded, store, log);
  const unregister = registerMonitorLiveness(monitor);

  log.info(
    {
      backupRoot: loaded.backup.backupRoot,
      expectedIntervalHours: loaded.backup.expectedIntervalHours,
      retention: loaded.backup.retention
    },
    'Backup monitor initialized'
  );

  return {
    config: loaded,
    monitor,
    close() {
      unregister();
      detach();
      store.close?.();
    }
  };
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap()
    .then(async app => {
      await app.monitor.collect();
      app.close();
    })
    .catch(error => {
      logger.error({ err: error }, 'Bootstrap failed');
      process.exitCode = 1;
    });
}
