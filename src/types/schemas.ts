// ============================================
// STRATA - Persisted data schemas
// Snapshots, change records and migration units as written to disk
// ============================================

import { z } from 'zod';

export const IndexSpecSchema = z.object({
  method: z.string().min(1),
  opclass: z.string().min(1).optional(),
  /** Leading removal marker was present */
  remove: z.boolean()
});

export const FieldSpecSchema = z.object({
  name: z.string().min(1),
  sqlType: z.string().min(1),
  onAdd: z.string(),
  alterOps: z.array(z.string()),
  indexSpecs: z.array(IndexSpecSchema),
  unique: z.boolean()
});

export const UniqueGroupSchema = z.object({
  groupName: z.string().min(1),
  fieldNames: z.array(z.string())
});

export const SchemaSnapshotSchema = z.object({
  table: z.string().min(1),
  primaryKey: z.string().min(1),
  fields: z.record(FieldSpecSchema),
  uniqueGroups: z.record(UniqueGroupSchema)
});

export const ChangeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('CreateTable'), snapshot: SchemaSnapshotSchema }),
  z.object({ kind: z.literal('AddField'), field: FieldSpecSchema }),
  z.object({ kind: z.literal('DropField'), name: z.string() }),
  z.object({ kind: z.literal('AlterField'), name: z.string(), ops: z.array(z.string()) }),
  z.object({ kind: z.literal('AddIndex'), field: z.string(), index: IndexSpecSchema }),
  z.object({ kind: z.literal('DropIndex'), field: z.string(), index: IndexSpecSchema }),
  z.object({ kind: z.literal('AddUniqueGroup'), group: UniqueGroupSchema }),
  z.object({ kind: z.literal('DropUniqueGroup'), groupName: z.string() }),
  z.object({ kind: z.literal('ModifyUniqueGroup'), groupName: z.string(), newFields: z.array(z.string()) })
]);

export const UnitStatusSchema = z.enum(['queued', 'applied', 'failed']);

export const MigrationUnitSchema = z.object({
  model: z.string().min(1),
  table: z.string().min(1),
  sequence: z.number().int().positive(),
  status: UnitStatusSchema,
  changeSet: z.array(ChangeSchema),
  generatedSql: z.array(z.string()),
  /** Model state once this unit is applied */
  snapshot: SchemaSnapshotSchema,
  createdAt: z.string(),
  appliedAt: z.string().optional(),
  lastError: z.string().optional()
});

export const SnapshotRecordSchema = SchemaSnapshotSchema.extend({
  lastAppliedSequence: z.number().int().nonnegative()
});
