// ============================================
// STRATA - Type Definitions
// Schema snapshots, change sets and migration units
// ============================================

import type { z } from 'zod';
import type {
  ChangeSchema,
  FieldSpecSchema,
  IndexSpecSchema,
  MigrationUnitSchema,
  SchemaSnapshotSchema,
  SnapshotRecordSchema,
  UniqueGroupSchema,
  UnitStatusSchema
} from './schemas';

// Field declaration (input side)
export interface FieldDefinition {
  /** Raw DDL type, e.g. `varchar(65)` */
  type: string;
  /** DDL fragment used only when the column is added, e.g. `NOT NULL` */
  onAdd?: string;
  /** `ALTER COLUMN` fragments applied whenever the field is seen as modified */
  alter?: string[];
  /** Index kinds: `btree`, `gin:gin_trgm_ops`, `-hash` (removal) */
  index?: string[];
  unique?: boolean;
}

export interface SchemaOptions {
  /** Table name, defaults to the model name */
  table?: string;
  /** Primary key column, defaults to `id` */
  primaryKey?: string;
  /** Named composite unique constraints */
  uniqueGroups?: Record<string, string[]>;
}

// Snapshot (migration engine side)
export type IndexSpec = z.infer<typeof IndexSpecSchema>;
export type FieldSpec = z.infer<typeof FieldSpecSchema>;
export type UniqueGroup = z.infer<typeof UniqueGroupSchema>;
export type SchemaSnapshot = z.infer<typeof SchemaSnapshotSchema>;

// Change records
export type Change = z.infer<typeof ChangeSchema>;

export type ChangeKind = Change['kind'];

export type ChangeSet = readonly Change[];

// Migration units
export type UnitStatus = z.infer<typeof UnitStatusSchema>;

export type MigrationUnit = z.infer<typeof MigrationUnitSchema>;

export type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>;

// Execution layer
export type Row = Record<string, unknown>;

export interface SqlHandle {
  execute(sql: string, params?: unknown[]): Promise<void>;
  fetch(sql: string, params?: unknown[]): Promise<Row[]>;
  fetchval(sql: string, params?: unknown[]): Promise<unknown>;
}

export type IsolationLevel = 'READ UNCOMMITTED' | 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface ConnectionOptions {
  uri: string;
  options?: Record<string, unknown>;
}
