// ============================================
// STRATA - Migration Manager
// generate / apply / delete / status over a model registry
// ============================================

import type { BaseAdapter } from '../adapters/base';
import type { ModelDefinition, ModelRegistry } from '../Model';
import type { ChangeSet, IsolationLevel, MigrationUnit, SchemaSnapshot } from '../types';
import { MigrationError } from '../errors';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { SchemaDiffer } from './SchemaDiffer';
import { SqlGenerator, validateSnapshot } from './SqlGenerator';
import { SnapshotStore } from './SnapshotStore';
import { MigrationWriter, formatSequence } from './MigrationWriter';
import { MigrationRunner } from './MigrationRunner';
import type { ModelApplyResult } from './MigrationRunner';
import { withModelLock } from './lock';
import { previewLines } from '../utils/prompt';

export interface MigrationManagerOptions {
  /** Root of the per-model migration directories */
  migrationsDir: string;
  registry: ModelRegistry;
  /** Required by `apply` only */
  adapter?: BaseAdapter;
  logger?: Logger;
  /** Per-unit transaction timeout in ms */
  timeout?: number;
  isolationLevel?: IsolationLevel;
}

export interface PendingMigration {
  model: ModelDefinition;
  changeSet: ChangeSet;
  statements: string[];
}

export interface GenerateOptions {
  /** Limit to these model names */
  models?: string[];
  /** Skip confirmation */
  yes?: boolean;
  /** Asked once per model with changes; `false` skips the model */
  confirm?: (pending: PendingMigration) => Promise<boolean>;
}

export interface GenerateResult {
  success: boolean;
  written: MigrationUnit[];
  unchanged: string[];
  /** Declined at confirmation */
  skipped: string[];
  error?: Error;
}

export interface ApplyOptions {
  models?: string[];
}

export interface ApplyResult {
  success: boolean;
  models: ModelApplyResult[];
}

export interface ModelStatus {
  model: string;
  table: string;
  lastAppliedSequence: number;
  applied: number[];
  queued: number[];
  failed: Array<{ sequence: number; error?: string }>;
}

/**
 * MigrationManager
 * Operator actions; each model's directory is only touched under its lock
 */
export class MigrationManager {
  private registry: ModelRegistry;
  private adapter: BaseAdapter | null;
  private logger: Logger;
  private options: MigrationManagerOptions;

  readonly store: SnapshotStore;
  readonly writer: MigrationWriter;
  private differ = new SchemaDiffer();
  private generator = new SqlGenerator();

  constructor(options: MigrationManagerOptions) {
    this.options = options;
    this.registry = options.registry;
    this.adapter = options.adapter ?? null;
    this.logger = options.logger ?? silentLogger;
    this.store = new SnapshotStore(options.migrationsDir);
    this.writer = new MigrationWriter(options.migrationsDir, this.store, this.generator);
  }

  /**
   * Diff every model against its baseline and queue a unit per changed model
   */
  async generate(options: GenerateOptions = {}): Promise<GenerateResult> {
    const result: GenerateResult = {
      success: true,
      written: [],
      unchanged: [],
      skipped: []
    };

    let models: ModelDefinition[];
    try {
      models = this.registry.select(options.models);
    } catch (error) {
      return this.fail(result, error);
    }

    for (const model of models) {
      try {
        await withModelLock(this.writer.dir(model.table), () => this.generateModel(model, options, result));
      } catch (error) {
        return this.fail(result, error);
      }
    }

    if (result.written.length === 0 && result.skipped.length === 0) {
      this.logger.info('No changes detected');
    }
    return result;
  }

  private async generateModel(model: ModelDefinition, options: GenerateOptions, result: GenerateResult): Promise<void> {
    const snapshot = model.describe();
    validateSnapshot(snapshot);

    const baseline = await this.baseline(model);
    const changeSet = this.differ.diff(baseline, snapshot);

    if (changeSet.length === 0) {
      result.unchanged.push(model.name);
      return;
    }

    const pending: PendingMigration = { model, changeSet, statements: this.generator.generate(model.table, changeSet) };

    // A confirm callback shows the statements itself
    if (!options.yes && options.confirm) {
      const accepted = await options.confirm(pending);
      if (!accepted) {
        result.skipped.push(model.name);
        this.logger.warn(`Skipped ${model.name}`);
        return;
      }
    } else {
      const [heading, ...lines] = previewLines(pending);
      this.logger.log(heading, 'cyan');
      for (const line of lines) {
        this.logger.log(line);
      }
    }

    const unit = await this.writer.write(model.name, model.table, changeSet, snapshot);
    if (unit) {
      result.written.push(unit);
      this.logger.success(`Created migration: ${model.table}_${formatSequence(unit.sequence)}`);
    }
  }

  /**
   * Target state of the newest unit, whatever its status; the store only when no unit exists.
   * A unit marked applied may be ahead of the store when a run stopped between the two writes.
   */
  async baseline(model: ModelDefinition): Promise<SchemaSnapshot | null> {
    const units = await this.writer.list(model.table);
    if (units.length > 0) {
      return units[units.length - 1].snapshot;
    }
    return this.store.load(model.table);
  }

  /**
   * Apply queued units; models run concurrently, each one strictly in order
   */
  async apply(options: ApplyOptions = {}): Promise<ApplyResult> {
    if (!this.adapter) {
      throw new MigrationError('A database adapter is required to apply migrations');
    }

    const runner = new MigrationRunner(this.adapter, this.writer, this.store, {
      timeout: this.options.timeout,
      isolationLevel: this.options.isolationLevel,
      logger: this.logger
    });

    const models = this.registry.select(options.models);
    const results = await Promise.all(models.map(async model => {
      try {
        return await withModelLock(this.writer.dir(model.table), () => runner.apply(model));
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`${model.name}: ${failure.message}`);
        const failed: ModelApplyResult = {
          model: model.name,
          table: model.table,
          success: false,
          applied: [],
          recovered: [],
          pending: [],
          error: failure
        };
        return failed;
      }
    }));

    if (results.every(item => item.applied.length === 0 && item.recovered.length === 0 && item.success)) {
      this.logger.info('No migrations to run');
    }

    return {
      success: results.every(item => item.success),
      models: results
    };
  }

  /**
   * Move queued units `start..end` of a model to its trash
   */
  async deleteRange(modelName: string, start: number, end: number): Promise<number[]> {
    const model = this.registry.require(modelName);
    const deleted = await withModelLock(
      this.writer.dir(model.table),
      () => this.writer.deleteRange(model.table, start, end)
    );

    if (deleted.length === 0) {
      this.logger.warn(`No queued migrations of ${model.name} in ${start}..${end}`);
    } else {
      this.logger.success(`Deleted ${model.name} migration(s): ${deleted.join(', ')}`);
    }
    return deleted;
  }

  async status(models?: string[]): Promise<ModelStatus[]> {
    const statuses: ModelStatus[] = [];

    for (const model of this.registry.select(models)) {
      const record = await this.store.loadRecord(model.table);
      const units = await this.writer.list(model.table);
      statuses.push({
        model: model.name,
        table: model.table,
        lastAppliedSequence: record ? record.lastAppliedSequence : 0,
        applied: units.filter(unit => unit.status === 'applied').map(unit => unit.sequence),
        queued: units.filter(unit => unit.status === 'queued').map(unit => unit.sequence),
        failed: units
          .filter(unit => unit.status === 'failed')
          .map(unit => ({ sequence: unit.sequence, error: unit.lastError }))
      });
    }

    return statuses;
  }

  private fail(result: GenerateResult, error: unknown): GenerateResult {
    result.success = false;
    result.error = error instanceof Error ? error : new Error(String(error));
    this.logger.error(result.error.message);
    return result;
  }
}
