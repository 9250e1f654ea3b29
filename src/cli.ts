#!/usr/bin/env node
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { bootstrap, collectHealthChecks, type Application, type HealthCheckResult, type HealthStatus } from './app.js';
import { loadConfig, loadConfigFromFile, type MonitorConfig } from './config/index.js';
import type { CompletedHealthReport, HealthReport, MetricEvent } from './types.js';

type CliIo = {
  stdout: Pick<NodeJS.WritableStream, 'write'>;
  stderr: Pick<NodeJS.WritableStream, 'write'>;
};

type HealthPayload = {
  status: HealthStatus;
  timestamp: string;
  checks: HealthCheckResult[];
  liveness: MetricEvent;
  metrics: MetricsSnapshot;
};

type CommonArgs = {
  configPath: string | null;
  pretty: boolean;
  json: boolean;
  help: boolean;
  rest: string[];
  errors: string[];
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const HEALTH_EXIT_CODES: Record<HealthStatus, number> = {
  ok: 0,
  degraded: 1
};

const CHECK_EXIT_CODES: Record<HealthReport['overallStatus'], number> = {
  healthy: 0,
  warning: 1,
  critical: 2,
  error: 3
};

const USAGE_LINES = [
  'Backup monitor CLI',
  '',
  'Usage:',
  '  backup-monitor check [--pretty] [-c path]   Run one collection and print the metric events as JSON',
  '  backup-monitor status [--json] [-c path]    Print the last recorded backup health report',
  '  backup-monitor health [-c path]             Print monitor health JSON (exit 1 when degraded)',
  '  backup-monitor log-level [get|set <level>]  Get or set the active log level',
  '  backup-monitor help                         Show this help message',
  '',
  'Options:',
  '  -c, --config <path>  Load configuration from an alternate JSON file',
  '  -p, --pretty         Pretty-print JSON output',
  '  -j, --json           Print JSON instead of a text summary'
];

const LOG_LEVEL_USAGE = [
  'Backup monitor log level',
  '',
  'Usage:',
  '  backup-monitor log-level get          Print the active log level',
  '  backup-monitor log-level set <level>  Change the active log level'
].join('\n');

function parseCommonArgs(argv: string[]): CommonArgs {
  const parsed: CommonArgs = {
    configPath: null,
    pretty: false,
    json: false,
    help: false,
    rest: [],
    errors: []
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    if (token === '--config' || token === '-c') {
      const next = argv[index + 1];
      if (!next) {
        parsed.errors.push(`Missing value for ${token}`);
      } else {
        parsed.configPath = next;
        index += 1;
      }
      continue;
    }

    if (token.startsWith('--config=')) {
      const value = token.slice('--config='.length);
      if (value) {
        parsed.configPath = value;
      } else {
        parsed.errors.push('Missing value for --config');
      }
      continue;
    }

    switch (token) {
      case '--pretty':
      case '-p':
        parsed.pretty = true;
        break;
      case '--json':
      case '-j':
        parsed.json = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        if (token.startsWith('-')) {
          parsed.errors.push(`Unknown option: ${token}`);
        } else {
          parsed.rest.push(token);
        }
        break;
    }
  }

  return parsed;
}

function formatJson(value: unknown, pretty: boolean) {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

function resolveConfig(configPath: string | null): MonitorConfig {
  return configPath ? loadConfigFromFile(configPath) : loadConfig();
}

async function withApplication(
  args: CommonArgs,
  io: CliIo,
  action: (app: Application) => Promise<number> | number
): Promise<number> {
  let config: MonitorConfig;
  try {
    config = resolveConfig(args.configPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Failed to load configuration: ${message}\n`);
    return 1;
  }

  const app = await bootstrap(config);
  try {
    return await action(app);
  } finally {
    app.close();
  }
}

function reportArgErrors(args: CommonArgs, io: CliIo): boolean {
  if (args.errors.length === 0) {
    return false;
  }
  for (const error of args.errors) {
    io.stderr.write(`${error}\n`);
  }
  io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
  return true;
}

export function resolveCheckExitCode(status: HealthReport['overallStatus']) {
  return CHECK_EXIT_CODES[status];
}

export function resolveHealthExitCode(status: HealthStatus) {
  return HEALTH_EXIT_CODES[status];
}

export async function buildHealthPayload(app: Application, now: Date = new Date()): Promise<HealthPayload> {
  const snapshot = metrics.snapshot();
  const checks = await collectHealthChecks({ now, metrics: snapshot });
  const status: HealthStatus = checks.every(check => check.status === 'ok') ? 'ok' : 'degraded';
  return {
    status,
    timestamp: now.toISOString(),
    checks,
    liveness: app.monitor.monitorHealth(now),
    metrics: snapshot
  };
}

export function formatReportSummary(report: CompletedHealthReport): string {
  const lines = [
    `Backup health: ${report.overallStatus} (score ${report.healthScore.toFixed(2)})`,
    `Checked at: ${new Date(report.timestamp).toISOString()}`,
    `Freshness: ${report.freshness.status} - ${report.freshness.message}`,
    `Retention: daily ${report.retention.daily.actualCount}/${report.retention.daily.expectedCount} (${report.retention.daily.status}), ` +
      `weekly ${report.retention.weekly.actualCount}/${report.retention.weekly.expectedCount} (${report.retention.weekly.status}), ` +
      `monthly ${report.retention.monthly.actualCount}/${report.retention.monthly.expectedCount} (${report.retention.monthly.status})`,
    `Integrity: ${report.integrity.status} (score ${report.integrity.score.toFixed(2)})`,
    `Storage: ${report.storage.totalSizeMB.toFixed(1)} MB`
  ];
  return lines.join('\n');
}

async function runCheckCommand(args: CommonArgs, io: CliIo): Promise<number> {
  return withApplication(args, io, async app => {
    const result = await app.monitor.run();
    io.stdout.write(`${formatJson(result.events, args.pretty)}\n`);
    return resolveCheckExitCode(result.report.overallStatus);
  });
}

async function runStatusCommand(args: CommonArgs, io: CliIo): Promise<number> {
  return withApplication(args, io, app => {
    const report = app.monitor.getCurrentStatus();
    if (!report) {
      io.stderr.write('No completed backup check has been recorded\n');
      return 1;
    }
    if (args.json) {
      io.stdout.write(`${formatJson(report, args.pretty)}\n`);
    } else {
      io.stdout.write(`${formatReportSummary(report)}\n`);
    }
    return resolveCheckExitCode(report.overallStatus);
  });
}

async function runHealthCommand(args: CommonArgs, io: CliIo): Promise<number> {
  return withApplication(args, io, async app => {
    const payload = await buildHealthPayload(app);
    io.stdout.write(`${formatJson(payload, args.pretty)}\n`);
    return resolveHealthExitCode(payload.status);
  });
}

function runLogLevelCommand(args: string[], io: CliIo): number {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const [command = 'help', ...rest] = argv;

  if (command === 'log-level') {
    return runLogLevelCommand(rest, io);
  }

  if (command === 'help' || command === '--help' || command === '-h') {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return 0;
  }

  const args = parseCommonArgs(rest);
  if (args.help) {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return 0;
  }
  if (reportArgErrors(args, io)) {
    return 1;
  }

  switch (command) {
    case 'check':
      return runCheckCommand(args, io);
    case 'status':
      return runStatusCommand(args, io);
    case 'health':
      return runHealthCommand(args, io);
    default:
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exitCode = code;
    },
    error => {
      logger.error({ err: error }, 'Backup monitor CLI failed');
      process.exitCode = 1;
    }
  );
}
