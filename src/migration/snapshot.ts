// ============================================
// STRATA - Schema Snapshot
// Identifiers, index kinds and persisted data
// ============================================

import type { z } from 'zod';
import type {
  FieldSpec,
  IndexSpec,
  SchemaSnapshot,
  UniqueGroup
} from '../types';
import { DeclarationError, HistoryConsistencyError } from '../errors';

export const REMOVAL_MARKER = '-';

/**
 * Double-quote an identifier, doubling embedded quotes
 */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function uniqueConstraintName(table: string, groupName: string): string {
  return `__UNQ_${table}_${groupName}__`;
}

/**
 * Index kind key: `btree`, `gin_gin_trgm_ops`, `unique`
 */
export function indexKind(index: IndexSpec): string {
  return index.opclass ? `${index.method}_${index.opclass}` : index.method;
}

export function indexName(table: string, field: string, index: IndexSpec): string {
  return `__IDX_${table}_${field}_${indexKind(index)}__`;
}

/**
 * `"-gin:gin_trgm_ops"` -> `{ method: 'gin', opclass: 'gin_trgm_ops', remove: true }`
 */
export function parseIndexSpec(raw: string): IndexSpec {
  let text = raw.trim();
  const remove = text.startsWith(REMOVAL_MARKER);
  if (remove) {
    text = text.slice(REMOVAL_MARKER.length).trim();
  }

  const [method, opclass] = text.split(':').map(part => part.trim());
  if (!method) {
    throw new DeclarationError(`Invalid index spec: '${raw}'`);
  }

  return opclass ? { method: method.toLowerCase(), opclass, remove } : { method: method.toLowerCase(), remove };
}

/** Synthetic kind for the single-column `unique` flag */
export const UNIQUE_INDEX: IndexSpec = { method: 'unique', remove: false };

/**
 * Index kinds present on a field, keyed by kind (removal-marked ones excluded)
 */
export function presentIndexes(field: FieldSpec): Map<string, IndexSpec> {
  const result = new Map<string, IndexSpec>();
  for (const index of field.indexSpecs) {
    if (!index.remove) result.set(indexKind(index), index);
  }
  if (field.unique) result.set(indexKind(UNIQUE_INDEX), UNIQUE_INDEX);
  return result;
}

export function removedIndexes(field: FieldSpec): IndexSpec[] {
  return field.indexSpecs.filter(index => index.remove);
}

export function cloneSnapshot(snapshot: SchemaSnapshot): SchemaSnapshot {
  const fields: Record<string, FieldSpec> = {};
  for (const [name, field] of Object.entries(snapshot.fields)) {
    fields[name] = {
      ...field,
      alterOps: [...field.alterOps],
      indexSpecs: field.indexSpecs.map(index => ({ ...index }))
    };
  }

  const uniqueGroups: Record<string, UniqueGroup> = {};
  for (const [name, group] of Object.entries(snapshot.uniqueGroups)) {
    uniqueGroups[name] = { groupName: group.groupName, fieldNames: [...group.fieldNames] };
  }

  return { table: snapshot.table, primaryKey: snapshot.primaryKey, fields, uniqueGroups };
}

// ============================================
// Parsing persisted JSON
// ============================================

/**
 * Validate data read back from disk against its schema
 */
export function parsePersisted<T>(schema: z.ZodType<T>, value: unknown, context: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.errors
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new HistoryConsistencyError(`Corrupt migration data (${context}): ${detail}`);
  }
  return result.data;
}
