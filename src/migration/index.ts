// ============================================
// STRATA - Migration Module Exports
// ============================================

export { SchemaDiffer, diff } from './SchemaDiffer';
export { SqlGenerator, generate, validateSnapshot } from './SqlGenerator';
export { SnapshotStore, modelDir } from './SnapshotStore';
export { MigrationWriter, formatSequence, parseUnit } from './MigrationWriter';
export { MigrationRunner, HISTORY_TABLE } from './MigrationRunner';
export type { RunnerOptions, ModelApplyResult } from './MigrationRunner';
export { MigrationManager } from './MigrationManager';
export type {
  MigrationManagerOptions,
  GenerateOptions,
  GenerateResult,
  ApplyOptions,
  ApplyResult,
  ModelStatus,
  PendingMigration
} from './MigrationManager';
export { hookTemplate, loadHooks } from './hooks';
export type { Hook, HookContext, UnitHooks } from './hooks';
export { withModelLock } from './lock';
export {
  quoteIdent,
  uniqueConstraintName,
  indexName,
  indexKind,
  parseIndexSpec,
  parsePersisted
} from './snapshot';
