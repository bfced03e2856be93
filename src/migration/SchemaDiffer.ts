// ============================================
// STRATA - Schema Differ
// (old snapshot, new snapshot) -> ordered change set
// ============================================

import type { Change, ChangeSet, FieldSpec, IndexSpec, SchemaSnapshot } from '../types';
import { DiffError } from '../errors';
import { cloneSnapshot, indexKind, presentIndexes, removedIndexes } from './snapshot';

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/**
 * Schema differ
 * Pure and deterministic: fields and groups are visited in name order
 */
export class SchemaDiffer {
  /**
   * Diff two snapshots of the same table.
   * A missing baseline yields the single `CreateTable` change.
   */
  diff(oldSnapshot: SchemaSnapshot | null, newSnapshot: SchemaSnapshot): ChangeSet {
    if (!oldSnapshot) {
      const create: Change[] = [{ kind: 'CreateTable', snapshot: cloneSnapshot(newSnapshot) }];
      return Object.freeze(create);
    }

    if (oldSnapshot.table !== newSnapshot.table) {
      throw new DiffError(
        `Cannot diff table '${oldSnapshot.table}' against '${newSnapshot.table}'`,
        { oldTable: oldSnapshot.table, newTable: newSnapshot.table }
      );
    }
    if (oldSnapshot.primaryKey !== newSnapshot.primaryKey) {
      throw new DiffError(
        `Primary key of '${newSnapshot.table}' changed from '${oldSnapshot.primaryKey}' to '${newSnapshot.primaryKey}'`,
        { table: newSnapshot.table }
      );
    }

    const changes: Change[] = [
      ...this.diffFields(oldSnapshot, newSnapshot),
      ...this.diffUniqueGroups(oldSnapshot, newSnapshot)
    ];

    return Object.freeze(changes);
  }

  private diffFields(oldSnapshot: SchemaSnapshot, newSnapshot: SchemaSnapshot): Change[] {
    const changes: Change[] = [];
    const oldNames = Object.keys(oldSnapshot.fields).sort(byName);
    const newNames = Object.keys(newSnapshot.fields).sort(byName);

    // Removed fields
    for (const name of oldNames) {
      if (!Object.hasOwn(newSnapshot.fields, name)) {
        changes.push({ kind: 'DropField', name });
      }
    }

    for (const name of newNames) {
      const current = newSnapshot.fields[name];
      const previous = Object.hasOwn(oldSnapshot.fields, name) ? oldSnapshot.fields[name] : undefined;

      if (!previous) {
        changes.push({ kind: 'AddField', field: { ...current, alterOps: [...current.alterOps], indexSpecs: [...current.indexSpecs] } });
        changes.push(...this.diffIndexes(name, null, current));
        continue;
      }

      const ops = this.alterOps(previous, current);
      if (ops.length > 0) {
        changes.push({ kind: 'AlterField', name, ops });
      }
      changes.push(...this.diffIndexes(name, previous, current));
    }

    return changes;
  }

  /**
   * `TYPE ...` when the type changed, then newly declared alter ops
   */
  private alterOps(previous: FieldSpec, current: FieldSpec): string[] {
    const ops: string[] = [];
    if (previous.sqlType !== current.sqlType) {
      ops.push(`TYPE ${current.sqlType}`);
    }

    const known = new Set(previous.alterOps);
    for (const op of current.alterOps) {
      if (!known.has(op)) ops.push(op);
    }

    return ops;
  }

  private diffIndexes(field: string, previous: FieldSpec | null, current: FieldSpec): Change[] {
    const changes: Change[] = [];
    const before = previous ? presentIndexes(previous) : new Map<string, IndexSpec>();
    const after = presentIndexes(current);

    // A removal marker drops unconditionally, once: a marker already in the baseline is spent
    const removed = removedIndexes(current);
    const removedKinds = new Set(removed.map(indexKind));
    const spent = new Set(previous ? removedIndexes(previous).map(indexKind) : []);
    for (const index of removed) {
      if (!spent.has(indexKind(index))) {
        changes.push({ kind: 'DropIndex', field, index: { ...index, remove: false } });
      }
    }

    for (const kind of [...before.keys()].sort(byName)) {
      const index = before.get(kind);
      if (index && !after.has(kind) && !removedKinds.has(kind)) {
        changes.push({ kind: 'DropIndex', field, index: { ...index, remove: false } });
      }
    }

    for (const kind of [...after.keys()].sort(byName)) {
      const index = after.get(kind);
      if (index && !before.has(kind)) {
        changes.push({ kind: 'AddIndex', field, index: { ...index } });
      }
    }

    return changes;
  }

  private diffUniqueGroups(oldSnapshot: SchemaSnapshot, newSnapshot: SchemaSnapshot): Change[] {
    const changes: Change[] = [];

    for (const groupName of Object.keys(oldSnapshot.uniqueGroups).sort(byName)) {
      if (!Object.hasOwn(newSnapshot.uniqueGroups, groupName)) {
        changes.push({ kind: 'DropUniqueGroup', groupName });
      }
    }

    for (const groupName of Object.keys(newSnapshot.uniqueGroups).sort(byName)) {
      const group = newSnapshot.uniqueGroups[groupName];
      const previous = Object.hasOwn(oldSnapshot.uniqueGroups, groupName) ? oldSnapshot.uniqueGroups[groupName] : undefined;

      if (!previous) {
        changes.push({ kind: 'AddUniqueGroup', group: { groupName, fieldNames: [...group.fieldNames] } });
      } else if (!sameList(previous.fieldNames, group.fieldNames)) {
        changes.push({ kind: 'ModifyUniqueGroup', groupName, newFields: [...group.fieldNames] });
      }
    }

    return changes;
  }
}

export function diff(oldSnapshot: SchemaSnapshot | null, newSnapshot: SchemaSnapshot): ChangeSet {
  return new SchemaDiffer().diff(oldSnapshot, newSnapshot);
}
