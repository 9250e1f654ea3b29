import { toMegabytes } from './scanner.js';
import type {
  BackupRecord,
  BackupType,
  FreshnessResult,
  IntegrityResult,
  RetentionResult,
  StorageSummary
} from '../types.js';

/** Upper bounds are exclusive; a size at or above the last bound scores 1.0. */
export const INTEGRITY_SIZE_BREAKPOINTS: ReadonlyArray<{ belowMB: number; score: number }> = [
  { belowMB: 0.1, score: 0.0 },
  { belowMB: 1, score: 0.3 },
  { belowMB: 5, score: 0.7 },
  { belowMB: 50, score: 0.9 }
];

const HEALTHY_INTEGRITY_SCORE = 0.5;

export function checkFreshness(
  latest: BackupRecord | undefined,
  expectedIntervalHours: number
): FreshnessResult {
  if (!latest) {
    return { status: 'missing', message: 'No backups found' };
  }

  const { ageHours } = latest;
  if (ageHours < expectedIntervalHours) {
    return { status: 'healthy', ageHours, message: 'Recent backup available' };
  }

  return {
    status: 'stale',
    ageHours,
    message: `Latest backup is ${Math.trunc(ageHours)} hours old`
  };
}

export function checkRetention(
  records: readonly BackupRecord[],
  expectedCount: number
): RetentionResult {
  const actualCount = records.length;
  const healthyCount = records.filter(record => record.healthy).length;

  const status =
    actualCount < expectedCount / 2 ? 'critical' : actualCount < expectedCount ? 'warning' : 'healthy';

  return { actualCount, expectedCount, healthyCount, status };
}

export function scoreBackupSize(sizeMB: number): number {
  if (!Number.isFinite(sizeMB) || sizeMB < 0) {
    throw new RangeError(`Backup size must be a non-negative number, got ${sizeMB}`);
  }
  for (const breakpoint of INTEGRITY_SIZE_BREAKPOINTS) {
    if (sizeMB < breakpoint.belowMB) {
      return breakpoint.score;
    }
  }
  return 1.0;
}

/** Size-based proxy for "the newest backup probably completed"; no content is read. */
export function checkIntegrity(latestDaily: BackupRecord | undefined): IntegrityResult {
  if (!latestDaily) {
    return { status: 'missing', score: 0, sizeMB: 0, message: 'No backup files found' };
  }

  try {
    const sizeMB = toMegabytes(latestDaily.sizeBytes);
    const score = scoreBackupSize(sizeMB);
    return {
      status: score > HEALTHY_INTEGRITY_SCORE ? 'healthy' : 'degraded',
      score,
      sizeMB,
      filename: latestDaily.filename
    };
  } catch (error) {
    return {
      status: 'error',
      score: 0,
      sizeMB: 0,
      filename: latestDaily.filename,
      message: error instanceof Error ? error.message : String(error)
    };
  }
}

export function summarizeStorage(recordsByType: Record<BackupType, readonly BackupRecord[]>): StorageSummary {
  const all = [...recordsByType.daily, ...recordsByType.weekly, ...recordsByType.monthly];
  const totalSizeMB = all.reduce((sum, record) => sum + toMegabytes(record.sizeBytes), 0);

  return {
    totalSizeMB,
    counts: {
      daily: recordsByType.daily.length,
      weekly: recordsByType.weekly.length,
      monthly: recordsByType.monthly.length
    }
  };
}
