import type { Dirent, Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { BackupRecord, BackupType, DirectoryScan, ScanIssue } from '../types.js';

const BYTES_PER_MB = 1024 * 1024;
const MS_PER_HOUR = 60 * 60 * 1000;
const FILENAME_TIMESTAMP_PATTERN = /(\d{8})_(\d{6})/;

export type ScanOptions = {
  archiveExtension: string;
  minBackupSizeMB: number;
  maxBackupAgeHours: number;
  /** Evaluation instant shared by every record of a run. */
  now: Date;
};

export type TimestampParseResult =
  | { ok: true; timestamp: Date }
  | { ok: false; reason: string };

export function toMegabytes(bytes: number): number {
  return bytes / BYTES_PER_MB;
}

/**
 * Extracts the `YYYYMMDD_HHMMSS` part of a backup filename and reads it as
 * local wall-clock time. Calendar-invalid values (month 13, 31 February) are
 * rejected instead of rolling over into the next period.
 */
export function parseBackupTimestamp(filename: string): TimestampParseResult {
  const match = FILENAME_TIMESTAMP_PATTERN.exec(filename);
  if (!match) {
    return { ok: false, reason: 'no YYYYMMDD_HHMMSS timestamp in filename' };
  }

  const [, datePart = '', timePart = ''] = match;
  const year = Number(datePart.slice(0, 4));
  const month = Number(datePart.slice(4, 6));
  const day = Number(datePart.slice(6, 8));
  const hours = Number(timePart.slice(0, 2));
  const minutes = Number(timePart.slice(2, 4));
  const seconds = Number(timePart.slice(4, 6));

  const timestamp = new Date(year, month - 1, day, hours, minutes, seconds);
  const matchesComponents =
    timestamp.getFullYear() === year &&
    timestamp.getMonth() === month - 1 &&
    timestamp.getDate() === day &&
    timestamp.getHours() === hours &&
    timestamp.getMinutes() === minutes &&
    timestamp.getSeconds() === seconds;

  if (!matchesComponents) {
    return { ok: false, reason: `invalid timestamp "${datePart}_${timePart}"` };
  }

  return { ok: true, timestamp };
}

export function createBackupRecord(
  entry: {
    filename: string;
    absolutePath: string;
    type: BackupType;
    sizeBytes: number;
    lastModifiedAt: Date;
    parsedTimestamp: Date | undefined;
  },
  options: Omit<ScanOptions, 'archiveExtension'>
): BackupRecord {
  const ageHours = (options.now.getTime() - entry.lastModifiedAt.getTime()) / MS_PER_HOUR;
  const healthy =
    toMegabytes(entry.sizeBytes) > options.minBackupSizeMB && ageHours < options.maxBackupAgeHours;

  return Object.freeze({ ...entry, ageHours, healthy });
}

/**
 * Newest first. Records with a parsed filename timestamp always come before
 * records without one; the latter are ordered by modification time.
 */
export function compareBackupRecords(a: BackupRecord, b: BackupRecord): number {
  if (a.parsedTimestamp && b.parsedTimestamp) {
    return b.parsedTimestamp.getTime() - a.parsedTimestamp.getTime();
  }
  if (a.parsedTimestamp) {
    return -1;
  }
  if (b.parsedTimestamp) {
    return 1;
  }
  return b.lastModifiedAt.getTime() - a.lastModifiedAt.getTime();
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function scanBackupDirectory(
  directory: string,
  type: BackupType,
  options: ScanOptions
): Promise<DirectoryScan> {
  const resolved = path.resolve(directory);
  const issues: ScanIssue[] = [];

  let entries: Dirent[];
  try {
    entries = await fs.readdir(resolved, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      return { type, directory: resolved, present: false, records: [], issues };
    }
    issues.push({
      kind: 'directory-unavailable',
      type,
      directory: resolved,
      reason: describeError(error)
    });
    return { type, directory: resolved, present: false, records: [], issues };
  }

  // Symlinks are followed by the stat below; directories are dropped there.
  const candidates = entries.filter(entry => entry.name.endsWith(options.archiveExtension));

  const records: BackupRecord[] = [];
  for (const entry of candidates) {
    const absolutePath = path.join(resolved, entry.name);
    let stats: Stats;
    try {
      stats = await fs.stat(absolutePath);
    } catch (error) {
      // Removed between readdir and stat, or a dangling link.
      issues.push({ kind: 'file-parse', type, filename: entry.name, reason: describeError(error) });
      continue;
    }

    if (!stats.isFile()) {
      continue;
    }

    const parsed = parseBackupTimestamp(entry.name);
    if (!parsed.ok) {
      issues.push({ kind: 'file-parse', type, filename: entry.name, reason: parsed.reason });
    }

    records.push(
      createBackupRecord(
        {
          filename: entry.name,
          absolutePath,
          type,
          sizeBytes: stats.size,
          lastModifiedAt: stats.mtime,
          parsedTimestamp: parsed.ok ? parsed.timestamp : undefined
        },
        options
      )
    );
  }

  records.sort(compareBackupRecords);

  return { type, directory: resolved, present: true, records, issues };
}

export async function scanBackupRoot(
  backupRoot: string,
  options: ScanOptions
): Promise<Record<BackupType, DirectoryScan>> {
  const [daily, weekly, monthly] = await Promise.all([
    scanBackupDirectory(path.join(backupRoot, 'daily'), 'daily', options),
    scanBackupDirectory(path.join(backupRoot, 'weekly'), 'weekly', options),
    scanBackupDirectory(path.join(backupRoot, 'monthly'), 'monthly', options)
  ]);
  return { daily, weekly, monthly };
}
