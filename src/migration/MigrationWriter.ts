// ============================================
// STRATA - Migration Writer
// Numbered units + hook files in <table>/.queue
// ============================================

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ChangeSet, MigrationUnit, SchemaSnapshot } from '../types';
import { MigrationUnitSchema } from '../types/schemas';
import { HistoryConsistencyError, MigrationError } from '../errors';
import { ensureDir, isNotFound, listDir, readJson, writeFileAtomic, writeJsonAtomic } from '../utils/files';
import { cloneSnapshot, parsePersisted } from './snapshot';
import { SqlGenerator } from './SqlGenerator';
import { SnapshotStore, modelDir } from './SnapshotStore';
import { hookTemplate } from './hooks';

export const QUEUE_DIR = '.queue';
export const TRASH_DIR = '.trash';
export const SEQUENCE_FILE = '.sequence';

const SEQUENCE_WIDTH = 8;
export function formatSequence(sequence: number): string {
  return String(sequence).padStart(SEQUENCE_WIDTH, '0');
}

function unitPattern(table: string): RegExp {
  const escaped = table.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^${escaped}_(\\d{${SEQUENCE_WIDTH}})\\.json$`);
}

/**
 * Validate a unit read back from disk
 */
export function parseUnit(value: unknown, context: string): MigrationUnit {
  return parsePersisted(MigrationUnitSchema, value, context);
}

/**
 * MigrationWriter
 * Owns the queue of one migrations root. SQL is rendered once, at write time.
 */
export class MigrationWriter {
  private migrationsDir: string;
  private store: SnapshotStore;
  private generator: SqlGenerator;

  constructor(migrationsDir: string, store: SnapshotStore, generator: SqlGenerator = new SqlGenerator()) {
    this.migrationsDir = migrationsDir;
    this.store = store;
    this.generator = generator;
  }

  dir(table: string): string {
    return modelDir(this.migrationsDir, table);
  }

  unitFile(table: string, sequence: number): string {
    return path.join(this.dir(table), QUEUE_DIR, `${table}_${formatSequence(sequence)}.json`);
  }

  hookFile(table: string, sequence: number): string {
    return path.join(this.dir(table), QUEUE_DIR, `${table}_${formatSequence(sequence)}.hooks.cjs`);
  }

  /**
   * Queue a change set; an empty one queues nothing
   */
  async write(
    model: string,
    table: string,
    changeSet: ChangeSet,
    snapshot: SchemaSnapshot
  ): Promise<MigrationUnit | null> {
    if (changeSet.length === 0) return null;

    // Render before touching the disk; a GenerationError leaves no unit behind
    const generatedSql = this.generator.generate(table, changeSet);
    const sequence = await this.nextSequence(table);

    const unit: MigrationUnit = {
      model,
      table,
      sequence,
      status: 'queued',
      changeSet: [...changeSet],
      generatedSql,
      snapshot: cloneSnapshot(snapshot),
      createdAt: new Date().toISOString()
    };

    await ensureDir(path.join(this.dir(table), QUEUE_DIR));
    await writeFileAtomic(path.join(this.dir(table), SEQUENCE_FILE), `${sequence}\n`);
    await writeJsonAtomic(this.unitFile(table, sequence), unit);
    await writeFileAtomic(this.hookFile(table, sequence), hookTemplate(unit));

    return unit;
  }

  /**
   * Highest number ever handed out, plus one
   */
  async nextSequence(table: string): Promise<number> {
    const dir = this.dir(table);
    let highest = 0;

    const pattern = unitPattern(table);
    for (const sub of [QUEUE_DIR, TRASH_DIR]) {
      for (const name of await listDir(path.join(dir, sub))) {
        const match = pattern.exec(name);
        if (match) highest = Math.max(highest, Number(match[1]));
      }
    }

    highest = Math.max(highest, await this.readHighWater(table));

    const record = await this.store.loadRecord(table);
    if (record) highest = Math.max(highest, record.lastAppliedSequence);

    return highest + 1;
  }

  private async readHighWater(table: string): Promise<number> {
    const file = path.join(this.dir(table), SEQUENCE_FILE);
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw error;
    }

    const value = Number(content.trim());
    if (!Number.isInteger(value) || value < 0) {
      throw new HistoryConsistencyError(`Corrupt sequence file ${file}`, { table });
    }
    return value;
  }

  /**
   * Queued units of a table in ascending sequence order
   */
  async list(table: string): Promise<MigrationUnit[]> {
    const pattern = unitPattern(table);
    const units: MigrationUnit[] = [];

    for (const name of await listDir(path.join(this.dir(table), QUEUE_DIR))) {
      const match = pattern.exec(name);
      if (!match) continue;
      units.push(await this.readFile(table, Number(match[1])));
    }

    return units.sort((a, b) => a.sequence - b.sequence);
  }

  async read(table: string, sequence: number): Promise<MigrationUnit | null> {
    const file = this.unitFile(table, sequence);
    const raw = await readJson(file);
    return raw === null ? null : this.check(parseUnit(raw, file), table, sequence, file);
  }

  private async readFile(table: string, sequence: number): Promise<MigrationUnit> {
    const unit = await this.read(table, sequence);
    if (!unit) {
      throw new HistoryConsistencyError(`Migration file for ${table} #${sequence} disappeared`, { table, sequence });
    }
    return unit;
  }

  private check(unit: MigrationUnit, table: string, sequence: number, file: string): MigrationUnit {
    if (unit.table !== table || unit.sequence !== sequence) {
      throw new HistoryConsistencyError(
        `Migration file ${file} holds ${unit.table} #${unit.sequence}`,
        { table, sequence }
      );
    }
    return unit;
  }

  async markApplied(unit: MigrationUnit, appliedAt: Date = new Date()): Promise<MigrationUnit> {
    const applied: MigrationUnit = { ...unit, status: 'applied', appliedAt: appliedAt.toISOString() };
    delete applied.lastError;
    await writeJsonAtomic(this.unitFile(unit.table, unit.sequence), applied);
    return applied;
  }

  async markFailed(unit: MigrationUnit, message: string): Promise<MigrationUnit> {
    const failed: MigrationUnit = { ...unit, status: 'failed', lastError: message };
    await writeJsonAtomic(this.unitFile(unit.table, unit.sequence), failed);
    return failed;
  }

  /**
   * Move unapplied units `start..end` (inclusive) and their hook files to .trash
   */
  async deleteRange(table: string, start: number, end: number): Promise<number[]> {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < start) {
      throw new MigrationError(`Invalid range ${start}..${end}: expected 1 <= start <= end`, { table, start, end });
    }

    const units = (await this.list(table)).filter(unit => unit.sequence >= start && unit.sequence <= end);
    const applied = units.filter(unit => unit.status === 'applied');
    if (applied.length > 0) {
      throw new MigrationError(
        `Cannot delete applied migration(s) of ${table}: ${applied.map(unit => unit.sequence).join(', ')}`,
        { table, sequences: applied.map(unit => unit.sequence) }
      );
    }

    const trash = path.join(this.dir(table), TRASH_DIR);
    await ensureDir(trash);

    const deleted: number[] = [];
    for (const unit of units) {
      for (const file of [this.unitFile(table, unit.sequence), this.hookFile(table, unit.sequence)]) {
        try {
          await fs.rename(file, path.join(trash, path.basename(file)));
        } catch (error) {
          // Hook dosyası elle silinmiş olabilir
          if (!isNotFound(error)) throw error;
        }
      }
      deleted.push(unit.sequence);
    }

    return deleted;
  }
}
