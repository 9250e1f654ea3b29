import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import { DEFAULT_EVENT_TTL_SECONDS } from '../backup/events.js';
import type { BackupType } from '../types.js';

export type RetentionCounts = Record<BackupType, number>;

export type AppConfig = {
  name: string;
  host: string;
};

export type LoggingConfig = {
  /** Null keeps the level the logger started with. */
  level: string | null;
};

export type DatabaseConfig = {
  path: string | null;
};

export type BackupConfig = {
  backupRoot: string;
  archiveExtension: string;
  expectedIntervalHours: number;
  retention: RetentionCounts;
  minBackupSizeMB: number;
  maxBackupAgeHours: number;
};

export type EventsConfig = {
  ttlSeconds: number;
};

export type MonitorSettings = {
  livenessThresholdMinutes: number;
};

export type MonitorConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  backup: BackupConfig;
  events: EventsConfig;
  monitor: MonitorSettings;
};

/** Shape accepted on disk; everything except `backup.backupRoot` falls back to a default. */
export type RawMonitorConfig = {
  app?: Partial<AppConfig>;
  logging?: Partial<LoggingConfig>;
  database?: { path?: string };
  backup: Partial<Omit<BackupConfig, 'retention'>> & {
    backupRoot: string;
    retention?: Partial<RetentionCounts>;
  };
  events?: Partial<EventsConfig>;
  monitor?: Partial<MonitorSettings>;
};

export const DEFAULT_BACKUP_CONFIG: Omit<BackupConfig, 'backupRoot'> = {
  archiveExtension: '.tar.gz',
  expectedIntervalHours: 25,
  retention: { daily: 7, weekly: 4, monthly: 6 },
  minBackupSizeMB: 1,
  maxBackupAgeHours: 168
};

export const DEFAULT_LIVENESS_THRESHOLD_MINUTES = 10;

type JsonType = 'object' | 'number' | 'string';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  minimum?: number;
};

const retentionSchema: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    daily: { type: 'number', minimum: 0 },
    weekly: { type: 'number', minimum: 0 },
    monthly: { type: 'number', minimum: 0 }
  }
};

const monitorConfigSchema: JsonSchema = {
  type: 'object',
  required: ['backup'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        host: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    database: {
      type: 'object',
      additionalProperties: false,
      properties: {
        path: { type: 'string' }
      }
    },
    backup: {
      type: 'object',
      required: ['backupRoot'],
      additionalProperties: false,
      properties: {
        backupRoot: { type: 'string' },
        archiveExtension: { type: 'string' },
        expectedIntervalHours: { type: 'number', minimum: 0 },
        retention: retentionSchema,
        minBackupSizeMB: { type: 'number', minimum: 0 },
        maxBackupAgeHours: { type: 'number', minimum: 0 }
      }
    },
    events: {
      type: 'object',
      additionalProperties: false,
      properties: {
        ttlSeconds: { type: 'number', minimum: 1 }
      }
    },
    monitor: {
      type: 'object',
      additionalProperties: false,
      properties: {
        livenessThresholdMinutes: { type: 'number', minimum: 0 }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const { type } = schema;
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    if (schema.additionalProperties === false) {
      const definedProperties = new Set(Object.keys(schema.properties ?? {}));
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
    }
    return errors;
  }

  return errors;
}

function validateLogicalConfig(raw: RawMonitorConfig) {
  const messages: string[] = [];

  if (raw.backup.backupRoot.trim().length === 0) {
    messages.push('config.backup.backupRoot must be a non-empty path');
  }

  const extension = raw.backup.archiveExtension;
  if (typeof extension === 'string' && !/^\.[^\s/\\]+$/.test(extension)) {
    messages.push('config.backup.archiveExtension must start with "." and contain no separators');
  }

  if (typeof raw.backup.expectedIntervalHours === 'number' && raw.backup.expectedIntervalHours <= 0) {
    messages.push('config.backup.expectedIntervalHours must be greater than 0');
  }

  const retention = raw.backup.retention ?? {};
  for (const [tier, count] of Object.entries(retention)) {
    if (typeof count === 'number' && (!Number.isInteger(count) || count <= 0)) {
      messages.push(`config.backup.retention.${tier} must be a positive integer`);
    }
  }

  const ttl = raw.events?.ttlSeconds;
  if (typeof ttl === 'number' && !Number.isInteger(ttl)) {
    messages.push('config.events.ttlSeconds must be an integer');
  }

  if (typeof raw.database?.path === 'string' && raw.database.path.trim().length === 0) {
    messages.push('config.database.path must be a non-empty string when provided');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function validateConfig(candidate: unknown): asserts candidate is RawMonitorConfig {
  const errors = validateAgainstSchema(monitorConfigSchema, candidate, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  // Schema passed, so the shape matches RawMonitorConfig.
  validateLogicalConfig(candidate as RawMonitorConfig);
}

export function resolveMonitorConfig(raw: RawMonitorConfig): MonitorConfig {
  const backup = raw.backup;
  return {
    app: {
      name: raw.app?.name ?? 'backup-monitor',
      host: raw.app?.host ?? 'backup-server'
    },
    logging: {
      level: raw.logging?.level ?? null
    },
    database: {
      path: raw.database?.path ?? null
    },
    backup: {
      backupRoot: path.resolve(backup.backupRoot),
      archiveExtension: backup.archiveExtension ?? DEFAULT_BACKUP_CONFIG.archiveExtension,
      expectedIntervalHours:
        backup.expectedIntervalHours ?? DEFAULT_BACKUP_CONFIG.expectedIntervalHours,
      retention: {
        daily: backup.retention?.daily ?? DEFAULT_BACKUP_CONFIG.retention.daily,
        weekly: backup.retention?.weekly ?? DEFAULT_BACKUP_CONFIG.retention.weekly,
        monthly: backup.retention?.monthly ?? DEFAULT_BACKUP_CONFIG.retention.monthly
      },
      minBackupSizeMB: backup.minBackupSizeMB ?? DEFAULT_BACKUP_CONFIG.minBackupSizeMB,
      maxBackupAgeHours: backup.maxBackupAgeHours ?? DEFAULT_BACKUP_CONFIG.maxBackupAgeHours
    },
    events: {
      ttlSeconds: raw.events?.ttlSeconds ?? DEFAULT_EVENT_TTL_SECONDS
    },
    monitor: {
      livenessThresholdMinutes:
        raw.monitor?.livenessThresholdMinutes ?? DEFAULT_LIVENESS_THRESHOLD_MINUTES
    }
  };
}

export function parseConfig(contents: string): MonitorConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return resolveMonitorConfig(parsed);
}

export function loadConfigFromFile(filePath: string): MonitorConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/** Reads the node-config hierarchy (config/default.json plus the NODE_ENV overlay). */
export function loadConfig(): MonitorConfig {
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return resolveMonitorConfig(loaded);
}

