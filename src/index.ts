// ============================================
// STRATA - Main entry point
// ============================================

// Core exports
export { Schema, FieldBuilder, field, RESERVED_PREFIX } from './Schema';
export type { SchemaDefinition, SchemaField } from './Schema';
export { ModelRegistry } from './Model';
export type { ModelDefinition } from './Model';
export { connect } from './connection';

// Migration exports
export {
  SchemaDiffer,
  diff,
  SqlGenerator,
  generate,
  validateSnapshot,
  SnapshotStore,
  MigrationWriter,
  MigrationRunner,
  MigrationManager,
  HISTORY_TABLE,
  hookTemplate,
  loadHooks,
  withModelLock,
  quoteIdent,
  uniqueConstraintName,
  indexName,
  parseIndexSpec
} from './migration';

export type {
  RunnerOptions,
  ModelApplyResult,
  MigrationManagerOptions,
  GenerateOptions,
  GenerateResult,
  ApplyOptions,
  ApplyResult,
  ModelStatus,
  PendingMigration,
  Hook,
  HookContext,
  UnitHooks
} from './migration';

// Transaction exports
export { Transaction, TransactionManager, TransactionTimeoutError, withTransaction } from './Transaction';
export type { TransactionOptions, TransactionResult } from './Transaction';

// Errors
export {
  StrataError,
  DeclarationError,
  DiffError,
  GenerationError,
  ApplyError,
  HistoryConsistencyError,
  MigrationError
} from './errors';
export type { StrataErrorCode } from './errors';

// Config & logging
export { loadConfig, resolveConfig, DEFAULT_CONFIG } from './config';
export type { StrataConfig } from './config';
export { SchemaSnapshotSchema, ChangeSchema, MigrationUnitSchema } from './types/schemas';
export { ConsoleLogger, silentLogger } from './utils/logger';
export type { Logger } from './utils/logger';

// Type exports
export type {
  FieldDefinition,
  SchemaOptions,
  FieldSpec,
  IndexSpec,
  UniqueGroup,
  SchemaSnapshot,
  Change,
  ChangeKind,
  ChangeSet,
  MigrationUnit,
  UnitStatus,
  SnapshotRecord,
  SqlHandle,
  Row,
  IsolationLevel,
  ConnectionOptions
} from './types';

// Adapter exports (for advanced usage)
export { BaseAdapter, PostgreSQLAdapter } from './adapters';
export type { QueryClient } from './adapters';

// Version
export const version = '0.1.0';
