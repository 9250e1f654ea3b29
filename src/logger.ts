import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'backup-monitor';

const AVAILABLE_LOG_LEVELS = new Set(
  [...Object.keys(pino.levels.values), 'silent'].map(entry => entry.toLowerCase())
);

const levelEvents = new EventEmitter();

function extractMessage(args: unknown[]): string | undefined {
  for (const value of args) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (value instanceof Error && value.message) {
      return value.message;
    }
  }
  return undefined;
}

// stdout carries the CLI's JSON output; logs go to stderr.
const logger = pino(
  {
    name,
    level,
    hooks: {
      logMethod(inputArgs, method, logLevel) {
        const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
        metrics.incrementLogLevel(resolvedLevel, { message: extractMessage(inputArgs) });
        return method.apply(this, inputArgs);
      }
    }
  },
  process.stderr
);

let currentLevel = logger.level;
metrics.recordLogLevelChange(currentLevel, currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel, currentLevel);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(candidate: string): asserts candidate is pino.LevelWithSilent {
  if (!AVAILABLE_LOG_LEVELS.has(candidate)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${candidate}" (available: ${available})`);
  }
}

export type MonitorLogger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  levelEvents.emit('change', currentLevel, previous);
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export function onLogLevelChange(listener: (level: string, previous: string | null) => void) {
  const wrapper = (next: string, previous: string | null) => {
    listener(next, previous);
  };
  levelEvents.on('change', wrapper);
  return () => {
    levelEvents.off('change', wrapper);
  };
}

export default logger;
