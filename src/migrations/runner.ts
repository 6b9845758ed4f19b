import type { Direction, Migration, MigrationContext, StepCount } from './types.js';
import type { MigrationRegistry } from './registry.js';
import type { ExecutionRepository, MigrationExecution } from '../executions/types.js';
import type { ProcessLock } from '../lock/process-lock.js';
import { reconcile, assertConsistent, type ReconciliationPlan } from './reconciler.js';
import {
  MigrunError,
  InvalidStepsError,
  MigrationNotFoundError,
  getErrorMessage
} from '../utils/errors.js';
import { logger as defaultLogger, type MigrunLogger } from '../utils/logger.js';

export type RunnerState =
  | { kind: 'idle' }
  | { kind: 'reconciling' }
  | { kind: 'applying'; index: number; version: number }
  | { kind: 'halted'; version: number };

export interface StepReport {
  version: number;
  direction: Direction;
  executedAtMs: number;
  finishedAtMs: number;
}

export interface StepFailure {
  version: number;
  direction: Direction;
  /** `migration` when up()/down() failed, `ledger` when persisting the result failed */
  phase: 'migration' | 'ledger';
  error: Error;
}

export interface RunReport {
  direction: Direction;
  forced: boolean;
  status: 'completed' | 'halted';
  /** Steps that finished and were persisted, in execution order */
  executed: StepReport[];
  failure?: StepFailure;
}

export interface MigrationStats {
  registered: number;
  executed: number;
  pendingUp: number;
  pendingDown: number;
  consistent: boolean;
  /** Ledger versions without a registered migration */
  orphaned: number[];
  /** Most recent execution by version, if any */
  lastExecuted: MigrationExecution | null;
}

export type StepEvent =
  | { type: 'start'; direction: Direction; migration: Migration; forced: boolean }
  | { type: 'success'; direction: Direction; migration: Migration; step: StepReport }
  | { type: 'failure'; direction: Direction; migration: Migration; failure: StepFailure };

export interface MigrationRunnerOptions {
  logger?: MigrunLogger;

  /** Forwarded to every migration; checked before each step */
  signal?: AbortSignal;

  /** Acquired around every operation when set */
  lock?: ProcessLock | null;

  /** Clock in ms since epoch */
  now?: () => number;

  /** Progress callback, e.g. for a spinner */
  onStep?: (event: StepEvent) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Translate a step count into a slice limit
 */
export function normalizeSteps(steps: StepCount): number {
  if (steps === 'all') return Infinity;
  if (!Number.isSafeInteger(steps) || steps < 0) {
    throw new InvalidStepsError(steps);
  }
  return steps;
}

/**
 * Migration runner
 * Applies and reverts migrations one at a time, persisting each result before
 * the next step starts. Stops at the first failure and never rolls back.
 */
export class MigrationRunner {
  private readonly registry: MigrationRegistry;
  private readonly repository: ExecutionRepository;
  private readonly logger: MigrunLogger;
  private readonly signal: AbortSignal | undefined;
  private readonly lock: ProcessLock | null;
  private readonly now: () => number;
  private readonly onStep: ((event: StepEvent) => void) | undefined;
  private currentState: RunnerState = { kind: 'idle' };

  constructor(
    registry: MigrationRegistry,
    repository: ExecutionRepository,
    options: MigrationRunnerOptions = {}
  ) {
    this.registry = registry;
    this.repository = repository;
    this.logger = options.logger ?? defaultLogger;
    this.signal = options.signal;
    this.lock = options.lock ?? null;
    this.now = options.now ?? Date.now;
    this.onStep = options.onStep;
  }

  get state(): RunnerState {
    return this.currentState;
  }

  /**
   * Apply up to `steps` pending migrations, lowest version first
   */
  async up(steps: StepCount = 'all'): Promise<RunReport> {
    const limit = normalizeSteps(steps);
    return this.guarded(async () => {
      const plan = await this.plan();
      assertConsistent(plan);
      this.logger.debug(`[MigrationRunner] ${plan.pendingUp.length} pending up, running ${Math.min(limit, plan.pendingUp.length)}`);
      return this.execute('up', plan.pendingUp.slice(0, limit), false);
    });
  }

  /**
   * Revert up to `steps` executed migrations, highest version first
   */
  async down(steps: StepCount = 'all'): Promise<RunReport> {
    const limit = normalizeSteps(steps);
    return this.guarded(async () => {
      const plan = await this.plan();
      assertConsistent(plan);
      this.logger.debug(`[MigrationRunner] ${plan.pendingDown.length} pending down, running ${Math.min(limit, plan.pendingDown.length)}`);
      return this.execute('down', plan.pendingDown.slice(0, limit), false);
    });
  }

  /**
   * Run up() for one version regardless of the ledger.
   * Destructive: can apply a migration twice.
   */
  async forceUp(version: number): Promise<RunReport> {
    return this.forced('up', version);
  }

  /**
   * Run down() for one version regardless of the ledger.
   * Destructive: can revert a migration that was never applied.
   */
  async forceDown(version: number): Promise<RunReport> {
    return this.forced('down', version);
  }

  /**
   * Counts and consistency of registry vs. ledger. Never writes.
   */
  async stats(): Promise<MigrationStats> {
    return this.guarded(async () => {
      const executions = await this.repository.loadExecutions();
      const plan = reconcile(this.registry.orderedMigrations(), executions);
      const lastExecuted = executions.reduce<MigrationExecution | null>(
        (last, e) => (last === null || e.version > last.version ? e : last),
        null
      );
      this.currentState = { kind: 'idle' };

      return {
        registered: this.registry.count(),
        executed: executions.length,
        pendingUp: plan.pendingUp.length,
        pendingDown: plan.pendingDown.length,
        consistent: plan.consistent,
        orphaned: plan.orphaned.map(e => e.version),
        lastExecuted
      };
    });
  }

  private async forced(direction: Direction, version: number): Promise<RunReport> {
    return this.guarded(async () => {
      const migration = this.registry.get(version);
      if (!migration) {
        throw new MigrationNotFoundError(version);
      }
      this.logger.warn(`Forcing ${direction} for migration ${version}; the ledger state is not checked`);
      return this.execute(direction, [migration], true);
    });
  }

  private async plan(): Promise<ReconciliationPlan> {
    this.currentState = { kind: 'reconciling' };
    const executions = await this.repository.loadExecutions();
    return reconcile(this.registry.orderedMigrations(), executions);
  }

  /**
   * Serialize operations on this runner and hold the process lock if configured
   */
  private async guarded<T>(operation: () => Promise<T>): Promise<T> {
    const { kind } = this.currentState;
    if (kind === 'reconciling' || kind === 'applying') {
      throw new MigrunError('Migration runner is already running an operation');
    }
    this.currentState = { kind: 'reconciling' };

    try {
      return this.lock ? await this.lock.withLock(operation) : await operation();
    } catch (error: unknown) {
      this.currentState = { kind: 'idle' };
      throw error;
    }
  }

  private async execute(direction: Direction, migrations: Migration[], forced: boolean): Promise<RunReport> {
    const executed: StepReport[] = [];

    for (const [index, migration] of migrations.entries()) {
      this.currentState = { kind: 'applying', index, version: migration.version };
      const outcome = await this.runStep(direction, migration, forced);

      if ('error' in outcome) {
        this.currentState = { kind: 'halted', version: migration.version };
        this.logger.debug(`[MigrationRunner] Halted at ${migration.version} after ${executed.length} step(s)`);
        return { direction, forced, status: 'halted', executed, failure: outcome };
      }
      executed.push(outcome);
    }

    this.currentState = { kind: 'idle' };
    this.logger.debug(`[MigrationRunner] ${direction} completed: ${executed.length} step(s)`);
    return { direction, forced, status: 'completed', executed };
  }

  private async runStep(
    direction: Direction,
    migration: Migration,
    forced: boolean
  ): Promise<StepReport | StepFailure> {
    const { version } = migration;
    const context: MigrationContext = { signal: this.signal, logger: this.logger };
    const executedAtMs = this.now();
    this.onStep?.({ type: 'start', direction, migration, forced });

    const fail = (phase: StepFailure['phase'], error: unknown): StepFailure => {
      const failure: StepFailure = { version, direction, phase, error: toError(error) };
      this.logger.debug(`[MigrationRunner] ${direction} ${version} failed (${phase}): ${failure.error.message}`);
      this.onStep?.({ type: 'failure', direction, migration, failure });
      return failure;
    };

    try {
      this.signal?.throwIfAborted();
      const result = await migration[direction](context);
      if (result && !result.success) {
        return fail('migration', new MigrunError(result.reason ?? `Migration ${version} reported failure`));
      }
    } catch (error: unknown) {
      return fail('migration', error);
    }

    const execution: MigrationExecution = {
      version,
      executedAtMs,
      finishedAtMs: Math.max(this.now(), executedAtMs)
    };

    try {
      if (direction === 'up') {
        await this.repository.save(execution);
      } else {
        await this.repository.remove(execution);
      }
    } catch (error: unknown) {
      return fail('ledger', error);
    }

    const step: StepReport = { ...execution, direction };
    this.onStep?.({ type: 'success', direction, migration, step });
    return step;
  }
}
