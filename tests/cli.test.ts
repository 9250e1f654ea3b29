import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Writable } from 'node:stream';
import fs from 'node:fs';
import path from 'node:path';
import { resetAppLifecycle } from '../src/app.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';
import { resolveCheckExitCode, resolveHealthExitCode, runCli } from '../src/cli.js';
import { createTempDir, writeArchive } from './helpers/backups.js';

type TestIo = {
  io: { stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream };
  stdout: () => string;
  stderr: () => string;
};

function createTestIo(): TestIo {
  let stdout = '';
  let stderr = '';

  const makeWritable = (setter: (value: string) => void) =>
    new Writable({
      write(chunk, _enc, callback) {
        setter(typeof chunk === 'string' ? chunk : String(chunk));
        callback();
      }
    });

  return {
    io: {
      stdout: makeWritable(value => {
        stdout += value;
      }),
      stderr: makeWritable(value => {
        stderr += value;
      })
    },
    stdout: () => stdout,
    stderr: () => stderr
  };
}

function parseJson(text: string): unknown {
  return JSON.parse(text);
}

describe('backup-monitor CLI', () => {
  let workspace: string;
  let configPath: string;

  beforeEach(() => {
    resetAppLifecycle();
    workspace = createTempDir();
    const backupRoot = path.join(workspace, 'backups');
    writeArchive(path.join(backupRoot, 'daily'), 'alfresco_20250902_235538.tar.gz', 60, new Date());
    configPath = path.join(workspace, 'monitor.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        app: { host: 'ecm-test' },
        backup: { backupRoot },
        database: { path: path.join(workspace, 'state', 'monitor.sqlite') }
      })
    );
  });

  afterEach(() => {
    resetAppLifecycle();
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it('prints usage for help', async () => {
    const capture = createTestIo();
    const code = await runCli(['help'], capture.io);
    expect(code).toBe(0);
    expect(capture.stdout().split('\n')[0]).toBe('Backup monitor CLI');
  });

  it('runs a check and exits with the warning code', async () => {
    const capture = createTestIo();

    const code = await runCli(['check', '--config', configPath], capture.io);

    expect(code).toBe(1);
    const events = parseJson(capture.stdout());
    expect(Array.isArray(events)).toBe(true);
    if (!Array.isArray(events)) {
      return;
    }
    expect(events).toHaveLength(12);
    expect(events[0]).toMatchObject({
      service: 'backup.health.score',
      metric: 0.75,
      state: 'warning',
      host: 'ecm-test',
      ttl: 300
    });
  });

  it('pretty-prints events on request', async () => {
    const capture = createTestIo();

    await runCli(['check', `--config=${configPath}`, '--pretty'], capture.io);

    expect(capture.stdout().startsWith('[\n  {\n    "service": "backup.health.score",')).toBe(true);
  });

  it('shows the recorded status after a check', async () => {
    const before = createTestIo();
    expect(await runCli(['status', '-c', configPath], before.io)).toBe(1);
    expect(before.stderr()).toBe('No completed backup check has been recorded\n');

    await runCli(['check', '-c', configPath], createTestIo().io);

    const summary = createTestIo();
    expect(await runCli(['status', '-c', configPath], summary.io)).toBe(1);
    const lines = summary.stdout().split('\n');
    expect(lines[0]).toBe('Backup health: warning (score 0.75)');
    expect(lines[2]).toBe('Freshness: healthy - Recent backup available');
    expect(lines[3]).toBe(
      'Retention: daily 1/7 (critical), weekly 0/4 (critical), monthly 0/6 (critical)'
    );
    expect(lines[4]).toBe('Integrity: healthy (score 1.00)');
    expect(lines[5]).toBe('Storage: 60.0 MB');

    const json = createTestIo();
    await runCli(['status', '-c', configPath, '--json'], json.io);
    expect(parseJson(json.stdout())).toMatchObject({ kind: 'completed', overallStatus: 'warning' });
  });

  it('reports monitor health with liveness', async () => {
    const idle = createTestIo();
    expect(await runCli(['health', '-c', configPath], idle.io)).toBe(1);
    expect(parseJson(idle.stdout())).toMatchObject({
      status: 'degraded',
      liveness: { service: 'backup.monitor.health', state: 'critical' }
    });

    await runCli(['check', '-c', configPath], createTestIo().io);

    const capture = createTestIo();
    expect(await runCli(['health', '-c', configPath], capture.io)).toBe(0);
    expect(parseJson(capture.stdout())).toMatchObject({
      status: 'ok',
      checks: [{ name: 'backup-monitor', status: 'ok', details: { thresholdMinutes: 10 } }],
      liveness: { service: 'backup.monitor.health', metric: 1, state: 'ok', host: 'ecm-test' }
    });
  });

  it('rejects an invalid configuration file', async () => {
    fs.writeFileSync(configPath, JSON.stringify({ backup: {} }));
    const capture = createTestIo();

    expect(await runCli(['check', '-c', configPath], capture.io)).toBe(1);
    expect(capture.stderr()).toBe('Failed to load configuration: config.backup.backupRoot is required\n');
  });

  it('rejects unknown options and commands', async () => {
    const option = createTestIo();
    expect(await runCli(['check', '--verbose'], option.io)).toBe(1);
    expect(option.stderr().split('\n')[0]).toBe('Unknown option: --verbose');

    const missing = createTestIo();
    expect(await runCli(['check', '--config'], missing.io)).toBe(1);
    expect(missing.stderr().split('\n')[0]).toBe('Missing value for --config');

    const command = createTestIo();
    expect(await runCli(['prune'], command.io)).toBe(1);
    expect(command.stderr()).toBe('Unknown command: prune\n');
  });

  describe('logging', () => {
    const initialLevel = getLogLevel();

    afterEach(() => {
      setLogLevel(initialLevel);
      vi.restoreAllMocks();
    });

    it('applies the log level from the configuration file', async () => {
      fs.writeFileSync(
        configPath,
        JSON.stringify({ logging: { level: 'error' }, backup: { backupRoot: path.join(workspace, 'backups') } })
      );

      expect(await runCli(['check', '-c', configPath], createTestIo().io)).toBe(1);
      expect(getLogLevel()).toBe('error');
    });

    it('writes logs to stderr and keeps stdout for the command output', async () => {
      const stderrWrite = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const stdoutWrite = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      setLogLevel('info');

      await runCli(['check', '-c', configPath], createTestIo().io);

      const mentionsBootstrap = (call: unknown[]) => String(call[0]).includes('Backup monitor bootstrap starting');
      expect(stderrWrite.mock.calls.filter(mentionsBootstrap)).toHaveLength(1);
      expect(stdoutWrite.mock.calls.filter(mentionsBootstrap)).toHaveLength(0);
    });
  });

  describe('log-level', () => {
    const initialLevel = getLogLevel();

    afterEach(() => {
      setLogLevel(initialLevel);
    });

    it('gets and sets the level', async () => {
      const get = createTestIo();
      expect(await runCli(['log-level', 'get'], get.io)).toBe(0);
      expect(get.stdout()).toBe(`${initialLevel}\n`);

      const set = createTestIo();
      expect(await runCli(['log-level', 'set', 'error'], set.io)).toBe(0);
      expect(set.stdout()).toBe('Log level set to error\n');
      expect(getLogLevel()).toBe('error');
    });

    it('rejects an unknown level', async () => {
      const capture = createTestIo();
      expect(await runCli(['log-level', 'loud'], capture.io)).toBe(1);
      expect(capture.stderr()).toBe(
        'Unknown log level "loud" (available: debug, error, fatal, info, silent, trace, warn)\n'
      );
    });
  });
});

describe('exit codes', () => {
  it('maps report and health statuses onto process exit codes', () => {
    expect(resolveCheckExitCode('healthy')).toBe(0);
    expect(resolveCheckExitCode('warning')).toBe(1);
    expect(resolveCheckExitCode('critical')).toBe(2);
    expect(resolveCheckExitCode('error')).toBe(3);
    expect(resolveHealthExitCode('ok')).toBe(0);
    expect(resolveHealthExitCode('degraded')).toBe(1);
  });
});
