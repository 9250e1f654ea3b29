import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { RunStateSnapshot, RunStateStore } from './backup/runState.js';
import type { CompletedHealthReport } from './types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS run_state (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    last_success_at INTEGER NOT NULL,
    report TEXT NOT NULL
  );
`;

type RunStateRow = {
  last_success_at: number;
  report: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCompletedHealthReport(value: unknown): value is CompletedHealthReport {
  if (!isRecord(value) || value.kind !== 'completed') {
    return false;
  }
  const retention = value.retention;
  const storage = value.storage;
  return (
    typeof value.timestamp === 'number' &&
    typeof value.healthScore === 'number' &&
    typeof value.overallStatus === 'string' &&
    isRecord(value.freshness) &&
    isRecord(value.integrity) &&
    isRecord(retention) &&
    isRecord(retention.daily) &&
    isRecord(retention.weekly) &&
    isRecord(retention.monthly) &&
    isRecord(storage) &&
    typeof storage.totalSizeMB === 'number' &&
    isRecord(storage.counts)
  );
}

/**
 * Keeps the latest run in a single-row table. The upsert is one statement, so a
 * concurrent reader sees either the previous row or the new one.
 */
export class SqliteRunStateStore implements RunStateStore {
  private readonly db: Database.Database;
  private readonly selectStatement: Database.Statement<[], RunStateRow>;
  private readonly upsertStatement: Database.Statement<[number, string]>;

  constructor(databasePath: string) {
    if (databasePath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
    }
    this.db = new Database(databasePath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
    this.selectStatement = this.db.prepare<[], RunStateRow>(
      'SELECT last_success_at, report FROM run_state WHERE id = 1'
    );
    this.upsertStatement = this.db.prepare<[number, string]>(
      `INSERT INTO run_state (id, last_success_at, report) VALUES (1, ?, ?)
       ON CONFLICT(id) DO UPDATE SET last_success_at = excluded.last_success_at, report = excluded.report`
    );
  }

  read(): RunStateSnapshot | null {
    const row = this.selectStatement.get();
    if (!row) {
      return null;
    }

    let report: unknown;
    try {
      report = JSON.parse(row.report);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Stored run state is not valid JSON: ${message}`);
    }

    if (!isCompletedHealthReport(report)) {
      throw new Error('Stored run state does not contain a completed health report');
    }

    return { lastSuccessAt: row.last_success_at, lastReport: report };
  }

  write(snapshot: RunStateSnapshot): void {
    this.upsertStatement.run(snapshot.lastSuccessAt, JSON.stringify(snapshot.lastReport));
  }

  close() {
    this.db.close();
  }
}
