/**
 * Test Helpers - Exports
 */

export { TempWorkspace } from './temp-workspace.js';
export { RecordingMigration, createSilentLogger, sequenceClock } from './migrations.js';
export type { CallRecord, RecordingMigrationOptions } from './migrations.js';
