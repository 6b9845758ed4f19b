/**
 * CLI Commands Integration Tests
 *
 * Runs migrun commands through bootstrap() against a migrations directory
 * and a JSON ledger in a temporary workspace.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { stripVTControlCharacters } from 'util';
import { bootstrap, type BootstrapSettings } from '../../src/cli/bootstrap.js';
import { DirMigrationsRegistry } from '../../src/migrations/dir-registry.js';
import { JsonFileExecutionRepository } from '../../src/executions/repositories/json-file.js';
import { renderStatsTable } from '../../src/cli/commands/stats.js';
import {
  RecordingMigration,
  TempWorkspace,
  createSilentLogger,
  type CallRecord,
  type RecordingMigrationOptions
} from '../helpers/index.js';

interface CliResult {
  code: number;
  out: string[];
  err: string[];
}

const NOW = 1712953077000;

describe('CLI Commands - Integration', () => {
  let workspace: TempWorkspace;
  let calls: CallRecord[];
  let failures: Record<number, RecordingMigrationOptions>;

  const ledgerVersions = () => {
    const ledger = workspace.readJSON('migrations/executions.json');
    if (typeof ledger !== 'object' || ledger === null || !('executions' in ledger) || !Array.isArray(ledger.executions)) {
      throw new Error('ledger has no executions');
    }
    return ledger.executions.map((e: { version: number }) => e.version);
  };

  const run = async (argv: string[], settings?: BootstrapSettings): Promise<CliResult> => {
    const out: string[] = [];
    const err: string[] = [];
    const registry = new DirMigrationsRegistry(workspace.resolve('migrations')).registerAll(
      [1, 2, 3].map(v => new RecordingMigration(v, calls, failures[v]))
    );

    const code = await bootstrap({
      argv,
      registry,
      repository: new JsonFileExecutionRepository(workspace.resolve('migrations/executions.json')),
      output: {
        log: line => out.push(stripVTControlCharacters(line)),
        error: line => err.push(stripVTControlCharacters(line))
      },
      spinner: false,
      settings,
      now: () => NOW,
      version: '0.0.0-test',
      logger: createSilentLogger()
    });

    return { code, out, err };
  };

  beforeEach(() => {
    workspace = new TempWorkspace();
    workspace.writeMigrationFiles('migrations', [1, 2, 3]);
    calls = [];
    failures = {};
  });

  afterEach(() => {
    workspace.cleanup();
  });

  describe('Up Command', () => {
    it('should apply every pending migration in order', async () => {
      const result = await run(['up']);

      expect(result).toEqual({
        code: 0,
        out: [
          '✓ up 1 test migration 1 (0ms)',
          '✓ up 2 test migration 2 (0ms)',
          '✓ up 3 test migration 3 (0ms)',
          '→ 3 migration(s) applied'
        ],
        err: []
      });
      expect(workspace.readJSON('migrations/executions.json')).toEqual({
        version: 1,
        executions: [1, 2, 3].map(version => ({ version, executedAtMs: NOW, finishedAtMs: NOW }))
      });
    });

    it('should stop after the requested number of steps', async () => {
      const result = await run(['up', '--steps', '2']);

      expect(result.code).toBe(0);
      expect(ledgerVersions()).toEqual([1, 2]);
    });

    it('should report when nothing is pending', async () => {
      await run(['up']);

      const result = await run(['up']);

      expect(result.out).toEqual(['Nothing to run']);
      expect(calls).toHaveLength(3);
    });

    it('should halt at the first failure and exit non-zero', async () => {
      failures[2] = { failUp: new Error('column already exists') };

      const result = await run(['up']);

      expect(result).toEqual({
        code: 1,
        out: ['✓ up 1 test migration 1 (0ms)'],
        err: [
          '✗ up 2 test migration 2: column already exists',
          'Run halted at migration 2 after 1 migration(s) applied'
        ]
      });
      expect(ledgerVersions()).toEqual([1]);
      expect(calls.map(c => c.version)).toEqual([1, 2]);
    });

    it('should reject an invalid step count before running anything', async () => {
      const result = await run(['up', '--steps', 'some']);

      expect(result.code).toBe(1);
      expect(result.err.join('\n')).toContain('Expected a non-negative integer or "all".');
      expect(calls).toEqual([]);
    });
  });

  describe('Down Command', () => {
    it('should revert only the latest migration by default', async () => {
      await run(['up']);

      const result = await run(['down']);

      expect(result.out).toEqual(['✓ down 3 test migration 3 (0ms)', '→ 1 migration(s) reverted']);
      expect(ledgerVersions()).toEqual([1, 2]);
    });

    it('should revert everything with --steps all', async () => {
      await run(['up']);

      const result = await run(['down', '-s', 'all']);

      expect(result.code).toBe(0);
      expect(result.out[result.out.length - 1]).toBe('→ 3 migration(s) reverted');
      expect(ledgerVersions()).toEqual([]);
      expect(calls.slice(3).map(c => c.version)).toEqual([3, 2, 1]);
    });
  });

  describe('Force Commands', () => {
    it('should re-apply an executed migration', async () => {
      await run(['up']);

      const result = await run(['force:up', '--version', '2']);

      expect(result).toEqual({
        code: 0,
        out: ['Forcing up for migration 2', '✓ up 2 test migration 2 (0ms)', '→ 1 migration(s) applied'],
        err: []
      });
      expect(calls.map(c => c.version)).toEqual([1, 2, 3, 2]);
    });

    it('should revert a migration that was never applied', async () => {
      const result = await run(['force:down', '-v', '3']);

      expect(result.code).toBe(0);
      expect(calls).toEqual([{ version: 3, direction: 'down' }]);
      expect(ledgerVersions()).toEqual([]);
    });

    it('should fail for an unknown version', async () => {
      const result = await run(['force:up', '--version', '99']);

      expect(result.code).toBe(1);
      expect(result.err).toEqual(['✗ Migration not found: 99']);
    });

    it('should require a version', async () => {
      const result = await run(['force:down']);

      expect(result.code).toBe(1);
      expect(result.err.join('\n')).toContain("required option '-v, --version <version>' not specified");
    });
  });

  describe('Stats Command', () => {
    it('should print counts for a partly applied set', async () => {
      await run(['up', '--steps', '1']);

      const result = await run(['stats']);

      expect(result.code).toBe(0);
      const table = result.out.join('\n');
      expect(table).toMatch(/│ Registered\s+│ 3\s+│/);
      expect(table).toMatch(/│ Executed\s+│ 1\s+│/);
      expect(table).toMatch(/│ Pending up\s+│ 2\s+│/);
      expect(table).toMatch(/│ Last executed\s+│ 1 at 2024-04-12T20:17:57.000Z\s+│/);
      expect(table).toMatch(/│ Consistent\s+│ yes\s+│/);
    });

    it('should flag executions without a registered migration', async () => {
      workspace.writeJSON('migrations/executions.json', {
        version: 1,
        executions: [
          { version: 1, executedAtMs: 5, finishedAtMs: 6 },
          { version: 9, executedAtMs: 7, finishedAtMs: 8 }
        ]
      });

      const stats = await run(['stats']);
      const up = await run(['up']);

      expect(stats.code).toBe(1);
      expect(stats.err).toEqual([
        'Executions without a registered migration: 9. Ordered up/down will refuse to run until this is resolved.'
      ]);
      expect(up).toEqual({
        code: 1,
        out: [],
        err: ['✗ Ledger has executions without a registered migration: 9. Register the missing migrations or use force:up / force:down']
      });
      expect(calls).toEqual([]);
    });
  });

  describe('Registry Validation', () => {
    it('should refuse to run while a migration file is unregistered', async () => {
      workspace.writeMigrationFiles('migrations', [4]);

      const result = await run(['up']);

      expect(result.err).toEqual([
        '✗ Registry has invalid state. You must register all migrations before running migrations. ' +
        'Not registered: version_4.ts. Extra migrations: none'
      ]);
      expect(result.code).toBe(1);
      expect(calls).toEqual([]);
    });
  });

  describe('Blank Command', () => {
    it('should create a migration file stamped with the current time', async () => {
      const result = await run(['blank']);

      expect(result).toEqual({
        code: 0,
        out: [
          `✓ Created ${workspace.resolve('migrations/version_1712953077.ts')}`,
          'Register Migration1712953077 in your registry before running migrations.'
        ],
        err: []
      });
      expect(workspace.exists('migrations/version_1712953077.ts')).toBe(true);
    });
  });

  describe('Exclusive Runs', () => {
    const settings = (): BootstrapSettings => ({
      runExclusively: true,
      lockDir: workspace.resolve('locks'),
      lockName: 'app'
    });

    it('should refuse to start while another process holds the lock', async () => {
      workspace.writeJSON('locks/app.lock', { pid: process.pid, acquiredAt: '2024-04-12T20:17:57.000Z' });

      const result = await run(['up'], settings());

      expect(result).toEqual({
        code: 1,
        out: [],
        err: [`✗ Migrations are already running (pid ${process.pid}). Lock file: ${workspace.resolve('locks/app.lock')}`]
      });
      expect(calls).toEqual([]);
    });

    it('should not touch the ledger before the lock is held', async () => {
      workspace.writeJSON('locks/app.lock', { pid: process.pid, acquiredAt: '2024-04-12T20:17:57.000Z' });

      const result = await run(['stats'], settings());

      expect(result.code).toBe(1);
      expect(workspace.exists('migrations/executions.json')).toBe(false);
    });

    it('should release the lock when the run ends', async () => {
      const result = await run(['up'], settings());

      expect(result.code).toBe(0);
      expect(workspace.exists('locks/app.lock')).toBe(false);
    });
  });

  describe('Help', () => {
    it('should print usage without a command', async () => {
      const result = await run([]);

      expect(result.code).toBe(0);
      expect(result.out[0]).toMatch(/^Usage: migrun \[options\] \[command\]\n/);
      expect(result.out.join('\n')).toContain('force:up [options]');
    });

    it('should print the version', async () => {
      const result = await run(['--version']);

      expect(result).toEqual({ code: 0, out: ['0.0.0-test'], err: [] });
    });
  });
});

describe('renderStatsTable', () => {
  it('should show none before anything ran', () => {
    const table = stripVTControlCharacters(renderStatsTable({
      registered: 0,
      executed: 0,
      pendingUp: 0,
      pendingDown: 0,
      consistent: true,
      orphaned: [],
      lastExecuted: null
    }));

    expect(table).toMatch(/│ Last executed\s+│ none\s+│/);
  });
});
