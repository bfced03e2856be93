// ============================================
// STRATA - Snapshot Store
// Last applied snapshot + sequence per model
// ============================================

import * as path from 'path';
import type { SchemaSnapshot, SnapshotRecord } from '../types';
import { HistoryConsistencyError } from '../errors';
import { readJson, writeJsonAtomic } from '../utils/files';
import { SnapshotRecordSchema } from '../types/schemas';
import { cloneSnapshot, parsePersisted } from './snapshot';

export const SNAPSHOT_FILE = 'snapshot.json';

/**
 * Directory holding one table's snapshot, queue and trash
 */
export function modelDir(migrationsDir: string, table: string): string {
  return path.join(migrationsDir, table);
}

/**
 * SnapshotStore
 * Snapshot and last applied sequence share one file
 */
export class SnapshotStore {
  private migrationsDir: string;

  constructor(migrationsDir: string) {
    this.migrationsDir = migrationsDir;
  }

  filePath(table: string): string {
    return path.join(modelDir(this.migrationsDir, table), SNAPSHOT_FILE);
  }

  /**
   * Applied snapshot, or null before the first applied unit
   */
  async load(table: string): Promise<SchemaSnapshot | null> {
    const record = await this.loadRecord(table);
    if (!record) return null;
    return {
      table: record.table,
      primaryKey: record.primaryKey,
      fields: record.fields,
      uniqueGroups: record.uniqueGroups
    };
  }

  async loadRecord(table: string): Promise<SnapshotRecord | null> {
    const file = this.filePath(table);
    let raw: unknown;
    try {
      raw = await readJson(file);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new HistoryConsistencyError(`Corrupt snapshot file ${file}: ${error.message}`, { table });
      }
      throw error;
    }
    if (raw === null) return null;

    const record = parsePersisted(SnapshotRecordSchema, raw, file);
    if (record.table !== table) {
      throw new HistoryConsistencyError(`Snapshot file ${file} describes table '${record.table}'`, { table });
    }
    return record;
  }

  /**
   * Called once per applied unit, after its transaction committed
   */
  async save(snapshot: SchemaSnapshot, sequence: number): Promise<void> {
    const record: SnapshotRecord = {
      ...cloneSnapshot(snapshot),
      lastAppliedSequence: sequence
    };
    await writeJsonAtomic(this.filePath(snapshot.table), record);
  }
}
