import { describe, it, expect } from 'vitest';
import { MigrationRegistry, isValidVersion } from '../registry.js';
import { DuplicateVersionError, InvalidVersionError } from '../../utils/errors.js';
import { RecordingMigration } from '../../../tests/helpers/migrations.js';

describe('MigrationRegistry', () => {
  it('should register and return a migration by version', () => {
    const migration = new RecordingMigration(1234);
    const registry = new MigrationRegistry().register(migration);

    expect(registry.get(1234)).toBe(migration);
    expect(registry.has(1234)).toBe(true);
    expect(registry.count()).toBe(1);
  });

  it('should reject a duplicate version and keep the first registration', () => {
    const first = new RecordingMigration(1234);
    const second = new RecordingMigration(1234);
    const registry = new MigrationRegistry().register(first);

    expect(() => registry.register(second)).toThrow(DuplicateVersionError);
    expect(() => registry.register(second)).toThrow('already registered');
    expect(registry.count()).toBe(1);
    expect(registry.get(1234)).toBe(first);
  });

  it('should return undefined for an unknown version', () => {
    const registry = new MigrationRegistry().register(new RecordingMigration(1));

    expect(registry.get(2)).toBeUndefined();
    expect(registry.has(2)).toBe(false);
  });

  it('should order versions ascending regardless of registration order', () => {
    const registry = new MigrationRegistry()
      .register(new RecordingMigration(124))
      .register(new RecordingMigration(9))
      .register(new RecordingMigration(1712953080))
      .register(new RecordingMigration(123));

    expect(registry.orderedVersions()).toEqual([9, 123, 124, 1712953080]);
  });

  it('should order migrations ascending by version', () => {
    const migrations = [new RecordingMigration(123), new RecordingMigration(124), new RecordingMigration(125)];
    const registry = new MigrationRegistry()
      .register(migrations[1])
      .register(migrations[0])
      .register(migrations[2]);

    expect(registry.orderedMigrations()).toEqual(migrations);
    expect(registry.orderedMigrations()[0]).toBe(migrations[0]);
  });

  it('should stop registerAll at the first duplicate', () => {
    const registry = new MigrationRegistry();

    expect(() => registry.registerAll([
      new RecordingMigration(1),
      new RecordingMigration(2),
      new RecordingMigration(1),
      new RecordingMigration(3)
    ])).toThrow(DuplicateVersionError);
    expect(registry.orderedVersions()).toEqual([1, 2]);
  });

  it('should reject versions that are not non-negative safe integers', () => {
    const registry = new MigrationRegistry();

    expect(() => registry.register(new RecordingMigration(-1))).toThrow(InvalidVersionError);
    expect(() => registry.register(new RecordingMigration(1.5))).toThrow(InvalidVersionError);
    expect(() => registry.register(new RecordingMigration(2 ** 53))).toThrow(InvalidVersionError);
    expect(registry.count()).toBe(0);
  });

  it('should start empty', () => {
    const registry = new MigrationRegistry();

    expect(registry.count()).toBe(0);
    expect(registry.orderedVersions()).toEqual([]);
    expect(registry.orderedMigrations()).toEqual([]);
  });
});

describe('isValidVersion', () => {
  it('should accept zero and unix timestamps', () => {
    expect(isValidVersion(0)).toBe(true);
    expect(isValidVersion(1712953077)).toBe(true);
  });

  it('should reject non-numbers', () => {
    expect(isValidVersion('1712953077')).toBe(false);
    expect(isValidVersion(Number.NaN)).toBe(false);
  });
});
