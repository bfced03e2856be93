// ============================================
// STRATA - Migration Runner
// Applies one model's queue, one transaction per unit
// ============================================

import type { BaseAdapter } from '../adapters/base';
import type { ModelDefinition } from '../Model';
import type { IsolationLevel, MigrationUnit } from '../types';
import { ApplyError, HistoryConsistencyError, errorMessage } from '../errors';
import { TransactionManager } from '../Transaction';
import type { Transaction } from '../Transaction';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import type { MigrationWriter } from './MigrationWriter';
import type { SnapshotStore } from './SnapshotStore';
import { loadHooks } from './hooks';
import { quoteIdent } from './snapshot';

export const HISTORY_TABLE = '_strata_migrations';

export interface RunnerOptions {
  /** Per-unit timeout in ms; the unit is rolled back and marked failed when it expires */
  timeout?: number;
  isolationLevel?: IsolationLevel;
  logger?: Logger;
}

export interface ModelApplyResult {
  model: string;
  table: string;
  success: boolean;
  /** Sequences committed in this run */
  applied: number[];
  /** Committed earlier but not yet recorded on disk; marked applied now */
  recovered: number[];
  failed?: number;
  /** Left untouched */
  pending: number[];
  error?: Error;
}

/**
 * MigrationRunner
 * PENDING -> RUNNING -> APPLIED | FAILED, strictly in sequence order.
 * The first failure stops the model's queue.
 */
export class MigrationRunner {
  private adapter: BaseAdapter;
  private writer: MigrationWriter;
  private store: SnapshotStore;
  private transactions: TransactionManager;
  private options: RunnerOptions;
  private logger: Logger;

  constructor(adapter: BaseAdapter, writer: MigrationWriter, store: SnapshotStore, options: RunnerOptions = {}) {
    this.adapter = adapter;
    this.writer = writer;
    this.store = store;
    this.transactions = new TransactionManager(adapter);
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Migration history tablosunu oluştur
   */
  async ensureHistoryTable(): Promise<void> {
    await this.adapter.execute(
      `CREATE TABLE IF NOT EXISTS ${quoteIdent(HISTORY_TABLE)} (
    "table_name" varchar(255) NOT NULL,
    "sequence" integer NOT NULL,
    "model" varchar(255) NOT NULL,
    "applied_at" timestamptz NOT NULL DEFAULT now(),
    PRIMARY KEY ("table_name", "sequence")
)`
    );
  }

  /**
   * Sequences the database has committed for a table, ascending
   */
  async committedSequences(table: string, after: number = 0): Promise<number[]> {
    const rows = await this.adapter.fetch(
      `SELECT "sequence" FROM ${quoteIdent(HISTORY_TABLE)} WHERE "table_name" = $1 AND "sequence" > $2 ORDER BY "sequence"`,
      [table, after]
    );
    return rows.map(row => Number(row.sequence));
  }

  async apply(model: ModelDefinition): Promise<ModelApplyResult> {
    const result: ModelApplyResult = {
      model: model.name,
      table: model.table,
      success: true,
      applied: [],
      recovered: [],
      pending: []
    };

    let pending: MigrationUnit[];
    try {
      await this.ensureHistoryTable();
      pending = await this.reconcile(model, result);
    } catch (error) {
      result.success = false;
      result.error = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`${model.name}: ${result.error.message}`);
      return result;
    }

    result.pending = pending.map(unit => unit.sequence);
    if (pending.length === 0) {
      return result;
    }

    for (const unit of pending) {
      this.logger.log(`⏳ Running migration: ${model.name} #${unit.sequence}`);

      const outcome = await this.transactions.run(
        trx => this.runUnit(trx, model, unit),
        { timeout: this.options.timeout, isolationLevel: this.options.isolationLevel }
      );

      if (!outcome.success) {
        const failure = new ApplyError(model.name, unit.sequence, outcome.error);
        result.success = false;
        result.failed = unit.sequence;
        result.error = failure;
        result.pending = result.pending.filter(sequence => sequence > unit.sequence);
        this.logger.error(failure.message);

        try {
          await this.writer.markFailed(unit, failure.reason);
        } catch (markError) {
          this.logger.error(`Could not record failure of ${model.name} #${unit.sequence}: ${errorMessage(markError)}`);
        }
        break;
      }

      try {
        await this.record(unit);
      } catch (error) {
        // Commit yapıldı; kayıt bir sonraki çalıştırmada tamamlanır
        result.success = false;
        result.error = error instanceof Error ? error : new Error(String(error));
        result.applied.push(unit.sequence);
        result.pending = result.pending.filter(sequence => sequence > unit.sequence);
        this.logger.error(`${model.name} #${unit.sequence} committed but not recorded: ${result.error.message}`);
        break;
      }

      result.applied.push(unit.sequence);
      result.pending = result.pending.filter(sequence => sequence !== unit.sequence);
      this.logger.success(`Completed: ${model.name} #${unit.sequence}`);
    }

    return result;
  }

  /**
   * Everything inside the unit's transaction
   */
  private async runUnit(trx: Transaction, model: ModelDefinition, unit: MigrationUnit): Promise<void> {
    const hooks = await loadHooks(this.writer.hookFile(unit.table, unit.sequence));
    const ctx = { db: trx, model, unit };

    if (hooks.runBefore) {
      await hooks.runBefore(ctx);
    }

    for (const sql of unit.generatedSql) {
      await trx.execute(sql);
    }

    await trx.execute(
      `INSERT INTO ${quoteIdent(HISTORY_TABLE)} ("table_name", "sequence", "model") VALUES ($1, $2, $3)`,
      [unit.table, unit.sequence, model.name]
    );

    if (hooks.runAfter) {
      await hooks.runAfter(ctx);
    }
  }

  /**
   * After commit: unit file first, then the applied snapshot
   */
  private async record(unit: MigrationUnit): Promise<void> {
    if (unit.status !== 'applied') {
      await this.writer.markApplied(unit);
    }
    await this.store.save(unit.snapshot, unit.sequence);
  }

  /**
   * Check the store, the unit files and the database history against each other.
   * Units committed by an interrupted run are recorded; any other mismatch is fatal.
   * Returns the units still to apply.
   */
  private async reconcile(model: ModelDefinition, result: ModelApplyResult): Promise<MigrationUnit[]> {
    const { table } = model;
    const units = await this.writer.list(table);
    const bySequence = new Map<number, MigrationUnit>(units.map(unit => [unit.sequence, unit]));

    const record = await this.store.loadRecord(table);
    let lastApplied = record ? record.lastAppliedSequence : 0;

    if (lastApplied > 0) {
      const last = bySequence.get(lastApplied);
      if (!last || last.status !== 'applied') {
        throw new HistoryConsistencyError(
          `Snapshot store says ${table} #${lastApplied} is applied but the migration is ${last ? last.status : 'missing'}`,
          { table, sequence: lastApplied }
        );
      }
    }

    for (const unit of units) {
      if (unit.sequence < lastApplied && unit.status !== 'applied') {
        throw new HistoryConsistencyError(
          `${table} #${unit.sequence} is ${unit.status} below the applied sequence ${lastApplied}`,
          { table, sequence: unit.sequence }
        );
      }
    }

    const committed = await this.committedSequences(table);
    const dbMax = committed.length > 0 ? committed[committed.length - 1] : 0;
    if (dbMax < lastApplied) {
      throw new HistoryConsistencyError(
        `Database history for ${table} ends at #${dbMax} but the snapshot store is at #${lastApplied}`,
        { table, sequence: lastApplied }
      );
    }

    for (const sequence of committed.filter(value => value > lastApplied)) {
      const unit = bySequence.get(sequence);
      if (!unit) {
        throw new HistoryConsistencyError(
          `Database history has ${table} #${sequence} but no migration file exists for it`,
          { table, sequence }
        );
      }
      await this.record(unit);
      bySequence.set(sequence, { ...unit, status: 'applied' });
      lastApplied = sequence;
      result.recovered.push(sequence);
      this.logger.warn(`Recovered ${model.name} #${sequence}: committed by an interrupted run`);
    }

    const pending: MigrationUnit[] = [];
    for (const unit of bySequence.values()) {
      if (unit.sequence <= lastApplied) continue;
      if (unit.status === 'applied') {
        throw new HistoryConsistencyError(
          `${table} #${unit.sequence} is marked applied but the database never committed it`,
          { table, sequence: unit.sequence }
        );
      }
      pending.push(unit);
    }

    return pending.sort((a, b) => a.sequence - b.sequence);
  }
}
