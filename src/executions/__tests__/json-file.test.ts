import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { JsonFileExecutionRepository } from '../repositories/json-file.js';
import { LedgerReadError } from '../../utils/errors.js';
import { TempWorkspace } from '../../../tests/helpers/temp-workspace.js';

describe('JsonFileExecutionRepository', () => {
  let workspace: TempWorkspace;
  let repository: JsonFileExecutionRepository;

  beforeEach(() => {
    workspace = new TempWorkspace();
    repository = new JsonFileExecutionRepository(workspace.resolve('state/executions.json'));
  });

  afterEach(() => {
    workspace.cleanup();
  });

  it('should create an empty ledger on init', async () => {
    await repository.init();

    expect(workspace.readJSON('state/executions.json')).toEqual({ version: 1, executions: [] });
  });

  it('should leave an existing ledger untouched on init', async () => {
    await repository.save({ version: 3, executedAtMs: 10, finishedAtMs: 12 });

    await repository.init();
    await repository.init();

    expect(await repository.loadExecutions()).toEqual([{ version: 3, executedAtMs: 10, finishedAtMs: 12 }]);
  });

  it('should return no executions before the file exists', async () => {
    expect(await repository.loadExecutions()).toEqual([]);
    expect(await repository.findOne(1)).toBeNull();
  });

  it('should insert and update by version', async () => {
    await repository.save({ version: 9, executedAtMs: 100, finishedAtMs: 110 });
    await repository.save({ version: 2, executedAtMs: 50, finishedAtMs: 60 });
    await repository.save({ version: 9, executedAtMs: 300, finishedAtMs: 320 });

    expect(workspace.readJSON('state/executions.json')).toEqual({
      version: 1,
      executions: [
        { version: 2, executedAtMs: 50, finishedAtMs: 60 },
        { version: 9, executedAtMs: 300, finishedAtMs: 320 }
      ]
    });
    expect(await repository.findOne(9)).toEqual({ version: 9, executedAtMs: 300, finishedAtMs: 320 });
  });

  it('should remove a record and ignore a missing one', async () => {
    await repository.save({ version: 1, executedAtMs: 1, finishedAtMs: 2 });
    await repository.save({ version: 2, executedAtMs: 3, finishedAtMs: 4 });

    await repository.remove({ version: 1, executedAtMs: 0, finishedAtMs: 0 });
    await repository.remove({ version: 42, executedAtMs: 0, finishedAtMs: 0 });

    expect(await repository.loadExecutions()).toEqual([{ version: 2, executedAtMs: 3, finishedAtMs: 4 }]);
  });

  it('should return the records decoded before a malformed one', async () => {
    workspace.writeJSON('state/executions.json', {
      version: 1,
      executions: [
        { version: 1, executedAtMs: 10, finishedAtMs: 11 },
        { version: 'two', executedAtMs: 20, finishedAtMs: 21 },
        { version: 3, executedAtMs: 30, finishedAtMs: 31 }
      ]
    });

    const error = await repository.loadExecutions().then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(LedgerReadError);
    expect(error).toMatchObject({ partial: [{ version: 1, executedAtMs: 10, finishedAtMs: 11 }] });
  });

  it('should not read a null version as version 0', async () => {
    workspace.writeJSON('state/executions.json', {
      version: 1,
      executions: [{ version: null, executedAtMs: 10, finishedAtMs: 11 }]
    });

    const error = await repository.loadExecutions().then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(LedgerReadError);
    expect(error).toMatchObject({ partial: [] });
    await expect(repository.findOne(0)).rejects.toThrow(LedgerReadError);
  });

  it('should reject a record that finishes before it starts', async () => {
    workspace.writeJSON('state/executions.json', {
      version: 1,
      executions: [{ version: 1, executedAtMs: 20, finishedAtMs: 10 }]
    });

    await expect(repository.loadExecutions()).rejects.toThrow('executedAtMs must not be after finishedAtMs');
  });

  it('should reject a file that is not JSON', async () => {
    workspace.writeFile('state/executions.json', '{ not json');

    await expect(repository.loadExecutions()).rejects.toThrow(LedgerReadError);
  });

  it('should reject a file without an executions list', async () => {
    workspace.writeJSON('state/executions.json', { version: 1 });

    await expect(repository.loadExecutions()).rejects.toThrow('has no executions list');
  });
});
