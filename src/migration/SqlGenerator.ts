// ============================================
// STRATA - SQL Generator
// Change set -> ordered PostgreSQL DDL
// ============================================

import type { Change, ChangeKind, ChangeSet, FieldSpec, IndexSpec, SchemaSnapshot } from '../types';
import { DeclarationError, GenerationError } from '../errors';
import {
  indexName,
  presentIndexes,
  quoteIdent,
  uniqueConstraintName
} from './snapshot';

const SQL_WORD = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Emission phases; drops that reference columns run before the columns go,
 * additions that reference columns run after they exist.
 * A change split over two phases renders its first part, then its second.
 */
type Part = 'first' | 'second';

const PHASES: Array<{ kinds: ChangeKind[]; part?: Part }> = [
  { kinds: ['DropUniqueGroup', 'ModifyUniqueGroup'], part: 'first' },
  { kinds: ['DropIndex'] },
  { kinds: ['DropField'] },
  { kinds: ['AddField'], part: 'first' },
  { kinds: ['AddField', 'AlterField'], part: 'second' },
  { kinds: ['AddIndex'] },
  { kinds: ['AddUniqueGroup', 'ModifyUniqueGroup'], part: 'second' }
];

/**
 * SQL generator
 * Pure: the same change set always renders the same statements
 */
export class SqlGenerator {
  /**
   * Render a change set for `table`
   */
  generate(table: string, changeSet: ChangeSet): string[] {
    const create = changeSet.find(change => change.kind === 'CreateTable');
    if (create) {
      if (changeSet.length !== 1 || create.kind !== 'CreateTable') {
        throw new GenerationError(`A full create for '${table}' cannot be combined with other changes`, { table });
      }
      if (create.snapshot.table !== table) {
        throw new GenerationError(`Create change for '${create.snapshot.table}' passed for table '${table}'`, { table });
      }
      return this.createTable(create.snapshot);
    }

    const statements: string[] = [];
    for (const phase of PHASES) {
      for (const change of changeSet) {
        if (phase.kinds.includes(change.kind)) {
          statements.push(...this.render(table, change, phase.part));
        }
      }
    }
    return statements;
  }

  /**
   * CREATE TABLE, declared alter ops, one constraint per unique group, then declared indexes
   */
  createTable(snapshot: SchemaSnapshot): string[] {
    const { table } = snapshot;
    const fields = Object.values(snapshot.fields);
    if (fields.length === 0) {
      throw new GenerationError(`Table '${table}' has no fields`, { table });
    }

    const columns = fields.map(field => `    ${this.columnDefinition(field)}`);
    if (Object.hasOwn(snapshot.fields, snapshot.primaryKey)) {
      columns.push(`    PRIMARY KEY (${quoteIdent(snapshot.primaryKey)})`);
    }

    const statements = [`CREATE TABLE ${quoteIdent(table)} (\n${columns.join(',\n')}\n)`];

    for (const field of fields) {
      statements.push(...this.alterColumn(table, field.name, field.alterOps));
    }

    for (const group of Object.values(snapshot.uniqueGroups)) {
      statements.push(this.addConstraint(table, group.groupName, group.fieldNames));
    }

    for (const field of fields) {
      for (const index of presentIndexes(field).values()) {
        statements.push(this.createIndex(table, field.name, index));
      }
    }

    return statements;
  }

  private render(table: string, change: Change, part?: Part): string[] {
    const t = quoteIdent(table);

    switch (change.kind) {
      case 'DropUniqueGroup':
        return [this.dropConstraint(table, change.groupName)];
      case 'ModifyUniqueGroup':
        // Never an in-place ALTER CONSTRAINT: drop now, add back in the last phase
        return part === 'first'
          ? [this.dropConstraint(table, change.groupName)]
          : [this.addConstraint(table, change.groupName, change.newFields)];
      case 'AddUniqueGroup':
        return [this.addConstraint(table, change.group.groupName, change.group.fieldNames)];
      case 'DropIndex':
        this.checkIndex(table, change.field, change.index);
        return [`DROP INDEX IF EXISTS ${quoteIdent(indexName(table, change.field, change.index))}`];
      case 'AddIndex':
        return [this.createIndex(table, change.field, change.index)];
      case 'DropField':
        return [`ALTER TABLE ${t} DROP COLUMN IF EXISTS ${quoteIdent(change.name)}`];
      case 'AddField':
        // Alter ops also hold for a new column; they run with the other alters
        return part === 'second'
          ? this.alterColumn(table, change.field.name, change.field.alterOps)
          : [`ALTER TABLE ${t} ADD COLUMN ${this.columnDefinition(change.field)}`];
      case 'AlterField':
        if (change.ops.length === 0) {
          throw new GenerationError(`Alter of '${table}.${change.name}' carries no operations`, { table, field: change.name });
        }
        return this.alterColumn(table, change.name, change.ops);
      case 'CreateTable':
        return this.createTable(change.snapshot);
      default:
        return assertNever(change);
    }
  }

  private columnDefinition(field: FieldSpec): string {
    const parts = [quoteIdent(field.name), field.sqlType];
    if (field.onAdd) parts.push(field.onAdd);
    return parts.join(' ');
  }

  private alterColumn(table: string, column: string, ops: readonly string[]): string[] {
    return ops.map(op => `ALTER TABLE ${quoteIdent(table)} ALTER COLUMN ${quoteIdent(column)} ${op}`);
  }

  private dropConstraint(table: string, groupName: string): string {
    return `ALTER TABLE ${quoteIdent(table)} DROP CONSTRAINT IF EXISTS ${quoteIdent(uniqueConstraintName(table, groupName))}`;
  }

  private addConstraint(table: string, groupName: string, fieldNames: string[]): string {
    if (fieldNames.length === 0) {
      throw new GenerationError(`Unique group '${groupName}' on '${table}' has no fields`, { table, group: groupName });
    }
    const columns = fieldNames.map(quoteIdent).join(', ');
    return `ALTER TABLE ${quoteIdent(table)} ADD CONSTRAINT ${quoteIdent(uniqueConstraintName(table, groupName))} UNIQUE (${columns})`;
  }

  private createIndex(table: string, field: string, index: IndexSpec): string {
    this.checkIndex(table, field, index);
    const name = quoteIdent(indexName(table, field, index));

    if (index.method === 'unique') {
      return `CREATE UNIQUE INDEX IF NOT EXISTS ${name} ON ${quoteIdent(table)} (${quoteIdent(field)})`;
    }

    const column = index.opclass ? `${quoteIdent(field)} ${index.opclass}` : quoteIdent(field);
    return `CREATE INDEX IF NOT EXISTS ${name} ON ${quoteIdent(table)} USING ${index.method} (${column})`;
  }

  /**
   * Method and operator class are emitted unquoted
   */
  private checkIndex(table: string, field: string, index: IndexSpec): void {
    if (!SQL_WORD.test(index.method) || (index.opclass !== undefined && !SQL_WORD.test(index.opclass))) {
      throw new GenerationError(`Cannot render index '${index.method}' on '${table}.${field}'`, { table, field });
    }
  }
}

function assertNever(change: never): never {
  throw new GenerationError(`Unknown change: ${JSON.stringify(change)}`);
}

/**
 * Cross-reference checks run before a unit is written.
 * A group or index naming a field the model no longer declares is rejected here,
 * not left to fail at apply time.
 */
export function validateSnapshot(snapshot: SchemaSnapshot): void {
  const { table } = snapshot;

  if (!Object.hasOwn(snapshot.fields, snapshot.primaryKey)) {
    throw new DeclarationError(
      `Primary key '${snapshot.primaryKey}' is not a field of '${table}'`,
      { table, field: snapshot.primaryKey }
    );
  }

  for (const group of Object.values(snapshot.uniqueGroups)) {
    for (const name of group.fieldNames) {
      if (!Object.hasOwn(snapshot.fields, name)) {
        throw new DeclarationError(
          `Unique group '${group.groupName}' on '${table}' references missing field '${name}'`,
          { table, group: group.groupName, field: name }
        );
      }
    }
  }
}

export function generate(table: string, changeSet: ChangeSet): string[] {
  return new SqlGenerator().generate(table, changeSet);
}
