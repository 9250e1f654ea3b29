import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import { createBackupRecord, parseBackupTimestamp } from '../../src/backup/scanner.js';
import type { BackupRecord, BackupType, DirectoryScan } from '../../src/types.js';
import type { BackupConfig } from '../../src/config/index.js';

export const MB = 1024 * 1024;
const HOUR = 60 * 60 * 1000;

export const TEST_BACKUP_CONFIG: BackupConfig = {
  backupRoot: '/srv/test-backups',
  archiveExtension: '.tar.gz',
  expectedIntervalHours: 25,
  retention: { daily: 7, weekly: 4, monthly: 6 },
  minBackupSizeMB: 1,
  maxBackupAgeHours: 168
};

export function makeRecord(options: {
  filename: string;
  sizeMB: number;
  ageHours: number;
  now: Date;
  type?: BackupType;
}): BackupRecord {
  const type = options.type ?? 'daily';
  const parsed = parseBackupTimestamp(options.filename);
  return createBackupRecord(
    {
      filename: options.filename,
      absolutePath: path.join(TEST_BACKUP_CONFIG.backupRoot, type, options.filename),
      type,
      sizeBytes: options.sizeMB * MB,
      lastModifiedAt: new Date(options.now.getTime() - options.ageHours * HOUR),
      parsedTimestamp: parsed.ok ? parsed.timestamp : undefined
    },
    {
      minBackupSizeMB: TEST_BACKUP_CONFIG.minBackupSizeMB,
      maxBackupAgeHours: TEST_BACKUP_CONFIG.maxBackupAgeHours,
      now: options.now
    }
  );
}

export function makeScans(
  records: Partial<Record<BackupType, BackupRecord[]>>
): Record<BackupType, DirectoryScan> {
  const scan = (type: BackupType): DirectoryScan => ({
    type,
    directory: path.join(TEST_BACKUP_CONFIG.backupRoot, type),
    present: true,
    records: records[type] ?? [],
    issues: []
  });
  return { daily: scan('daily'), weekly: scan('weekly'), monthly: scan('monthly') };
}

export function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

export function createTempDir(prefix = 'backup-monitor-') {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Writes a sparse archive of the given size with the given modification time. */
export function writeArchive(directory: string, filename: string, sizeMB: number, modifiedAt: Date) {
  fs.mkdirSync(directory, { recursive: true });
  const filePath = path.join(directory, filename);
  fs.writeFileSync(filePath, '');
  fs.truncateSync(filePath, Math.round(sizeMB * MB));
  fs.utimesSync(filePath, modifiedAt, modifiedAt);
  return filePath;
}
