import { describe, expect, it } from 'vitest';
import {
  checkFreshness,
  checkIntegrity,
  checkRetention,
  scoreBackupSize,
  summarizeStorage
} from '../src/backup/analyzers.js';
import { makeRecord } from './helpers/backups.js';

const NOW = new Date('2025-09-03T10:00:00Z');

function records(count: number) {
  return Array.from({ length: count }, (_, index) =>
    makeRecord({ filename: `alfresco_2025080${index}_000000.tar.gz`, sizeMB: 2, ageHours: index * 24, now: NOW })
  );
}

describe('checkFreshness', () => {
  it('reports missing when there is no backup', () => {
    expect(checkFreshness(undefined, 25)).toEqual({ status: 'missing', message: 'No backups found' });
  });

  it('is healthy below the expected interval', () => {
    const latest = makeRecord({ filename: 'a.tar.gz', sizeMB: 2, ageHours: 10, now: NOW });
    expect(checkFreshness(latest, 25)).toEqual({
      status: 'healthy',
      ageHours: 10,
      message: 'Recent backup available'
    });
  });

  it('is stale at or above the expected interval and truncates the hours', () => {
    const atInterval = makeRecord({ filename: 'a.tar.gz', sizeMB: 2, ageHours: 25, now: NOW });
    expect(checkFreshness(atInterval, 25)).toEqual({
      status: 'stale',
      ageHours: 25,
      message: 'Latest backup is 25 hours old'
    });

    const older = makeRecord({ filename: 'a.tar.gz', sizeMB: 2, ageHours: 30.75, now: NOW });
    expect(checkFreshness(older, 25).message).toBe('Latest backup is 30 hours old');
  });
});

describe('checkRetention', () => {
  it('grades the count against half of the expected number', () => {
    expect(checkRetention(records(3), 7).status).toBe('critical');
    expect(checkRetention(records(4), 7).status).toBe('warning');
    expect(checkRetention(records(5), 7).status).toBe('warning');
    expect(checkRetention(records(7), 7).status).toBe('healthy');
    expect(checkRetention(records(8), 7).status).toBe('healthy');
  });

  it('counts healthy records separately from the total', () => {
    const mixed = [
      makeRecord({ filename: 'a.tar.gz', sizeMB: 2, ageHours: 1, now: NOW }),
      makeRecord({ filename: 'b.tar.gz', sizeMB: 0.2, ageHours: 1, now: NOW }),
      makeRecord({ filename: 'c.tar.gz', sizeMB: 2, ageHours: 200, now: NOW })
    ];
    expect(checkRetention(mixed, 4)).toEqual({
      actualCount: 3,
      expectedCount: 4,
      healthyCount: 1,
      status: 'warning'
    });
  });

  it('is critical for an empty tier', () => {
    expect(checkRetention([], 6)).toEqual({
      actualCount: 0,
      expectedCount: 6,
      healthyCount: 0,
      status: 'critical'
    });
  });
});

describe('scoreBackupSize', () => {
  it('maps sizes onto the breakpoint scores', () => {
    expect(scoreBackupSize(0)).toBe(0);
    expect(scoreBackupSize(0.05)).toBe(0);
    expect(scoreBackupSize(0.1)).toBe(0.3);
    expect(scoreBackupSize(0.5)).toBe(0.3);
    expect(scoreBackupSize(1)).toBe(0.7);
    expect(scoreBackupSize(4.99)).toBe(0.7);
    expect(scoreBackupSize(5)).toBe(0.9);
    expect(scoreBackupSize(49)).toBe(0.9);
    expect(scoreBackupSize(50)).toBe(1);
    expect(scoreBackupSize(120)).toBe(1);
  });

  it('rejects negative and non-numeric sizes', () => {
    expect(() => scoreBackupSize(-1)).toThrow(RangeError);
    expect(() => scoreBackupSize(Number.NaN)).toThrow('Backup size must be a non-negative number, got NaN');
  });
});

describe('checkIntegrity', () => {
  it('reports missing without a daily backup', () => {
    expect(checkIntegrity(undefined)).toEqual({
      status: 'missing',
      score: 0,
      sizeMB: 0,
      message: 'No backup files found'
    });
  });

  it('is healthy only above a score of 0.5', () => {
    const large = makeRecord({ filename: 'large.tar.gz', sizeMB: 120, ageHours: 1, now: NOW });
    expect(checkIntegrity(large)).toEqual({
      status: 'healthy',
      score: 1,
      sizeMB: 120,
      filename: 'large.tar.gz'
    });

    const small = makeRecord({ filename: 'small.tar.gz', sizeMB: 0.5, ageHours: 1, now: NOW });
    expect(checkIntegrity(small)).toEqual({
      status: 'degraded',
      score: 0.3,
      sizeMB: 0.5,
      filename: 'small.tar.gz'
    });
  });

  it('turns an unmeasurable size into an error result', () => {
    const broken = makeRecord({ filename: 'broken.tar.gz', sizeMB: -1, ageHours: 1, now: NOW });
    expect(checkIntegrity(broken)).toEqual({
      status: 'error',
      score: 0,
      sizeMB: 0,
      filename: 'broken.tar.gz',
      message: 'Backup size must be a non-negative number, got -1'
    });
  });
});

describe('summarizeStorage', () => {
  it('adds up every tier', () => {
    const summary = summarizeStorage({
      daily: [
        makeRecord({ filename: 'a.tar.gz', sizeMB: 100, ageHours: 1, now: NOW }),
        makeRecord({ filename: 'b.tar.gz', sizeMB: 20, ageHours: 1, now: NOW })
      ],
      weekly: [makeRecord({ filename: 'c.tar.gz', sizeMB: 30, ageHours: 1, now: NOW, type: 'weekly' })],
      monthly: []
    });

    expect(summary).toEqual({ totalSizeMB: 150, counts: { daily: 2, weekly: 1, monthly: 0 } });
  });
});
