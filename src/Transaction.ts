// ============================================
// STRATA - Transaction API
// One connection, one BEGIN ... COMMIT/ROLLBACK scope
// ============================================

import type { BaseAdapter, QueryClient } from './adapters/base';
import { firstValue } from './adapters/base';
import type { IsolationLevel, Row, SqlHandle } from './types';
import { errorMessage } from './errors';

export interface TransactionOptions {
  /** Isolation level */
  isolationLevel?: IsolationLevel;
  /** Timeout in milliseconds; the transaction is rolled back when it expires */
  timeout?: number;
  /** Auto-rollback when COMMIT fails */
  autoRollback?: boolean;
}

export interface TransactionResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: Error;
  duration: number;
}

type TransactionCallback<T> = (trx: Transaction) => Promise<T>;

export class TransactionTimeoutError extends Error {
  constructor(timeout: number) {
    super(`Transaction timed out after ${timeout}ms`);
    this.name = 'TransactionTimeoutError';
  }
}

/**
 * Transaction class
 * Statements run on a dedicated client between BEGIN and COMMIT/ROLLBACK
 */
export class Transaction implements SqlHandle {
  private adapter: BaseAdapter;
  private options: TransactionOptions;
  private _isActive: boolean = false;
  private _isCommitted: boolean = false;
  private _isRolledBack: boolean = false;
  private startTime: number = 0;
  private client: QueryClient | null = null;

  constructor(adapter: BaseAdapter, options: TransactionOptions = {}) {
    this.adapter = adapter;
    this.options = {
      autoRollback: true,
      ...options
    };
  }

  /** Transaction is active */
  get isActive(): boolean {
    return this._isActive && !this._isCommitted && !this._isRolledBack;
  }

  /** Transaction was committed */
  get isCommitted(): boolean {
    return this._isCommitted;
  }

  /** Transaction was rolled back */
  get isRolledBack(): boolean {
    return this._isRolledBack;
  }

  /** Transaction duration in ms */
  get duration(): number {
    return Date.now() - this.startTime;
  }

  /**
   * Begin transaction
   */
  async begin(): Promise<void> {
    if (this._isActive) {
      throw new Error('Transaction already started');
    }

    this.startTime = Date.now();

    let sql = 'BEGIN';
    if (this.options.isolationLevel) {
      sql += ` ISOLATION LEVEL ${this.options.isolationLevel}`;
    }

    try {
      this.client = await this.adapter.acquire();
      await this.client.query(sql);
      this._isActive = true;
    } catch (error) {
      this.releaseClient(error);
      throw new Error(`Failed to begin transaction: ${errorMessage(error)}`);
    }
  }

  /**
   * Commit transaction
   */
  async commit(): Promise<void> {
    if (this._isCommitted || this._isRolledBack) {
      throw new Error('Transaction already ended');
    }

    const client = this.requireClient('commit');

    try {
      await client.query('COMMIT');
      this._isCommitted = true;
      this._isActive = false;
      this.releaseClient();
    } catch (error) {
      if (this.options.autoRollback) {
        await this.rollback();
      }
      throw new Error(`Failed to commit transaction: ${errorMessage(error)}`);
    }
  }

  /**
   * Rollback transaction
   */
  async rollback(): Promise<void> {
    if (this._isCommitted) {
      throw new Error('Cannot rollback committed transaction');
    }

    if (this._isRolledBack) {
      return; // Already rolled back
    }

    const client = this.requireClient('rollback');

    try {
      await client.query('ROLLBACK');
      this._isRolledBack = true;
      this._isActive = false;
      this.releaseClient();
    } catch (error) {
      // Bağlantı bozuk; havuza geri verme
      this._isActive = false;
      this.releaseClient(error);
      throw new Error(`Failed to rollback transaction: ${errorMessage(error)}`);
    }
  }

  async execute(sql: string, params: unknown[] = []): Promise<void> {
    await this.requireClient('execute').query(sql, params);
  }

  async fetch(sql: string, params: unknown[] = []): Promise<Row[]> {
    const result = await this.requireClient('fetch').query(sql, params);
    return result.rows;
  }

  async fetchval(sql: string, params: unknown[] = []): Promise<unknown> {
    return firstValue(await this.fetch(sql, params));
  }

  private requireClient(action: string): QueryClient {
    if (!this._isActive || !this.client) {
      throw new Error(`No active transaction to ${action}`);
    }
    return this.client;
  }

  private releaseClient(error?: unknown): void {
    if (!this.client) return;
    this.client.release(error instanceof Error ? error : undefined);
    this.client = null;
  }
}

/**
 * TransactionManager - Factory for transactions
 */
export class TransactionManager {
  private adapter: BaseAdapter;

  constructor(adapter: BaseAdapter) {
    this.adapter = adapter;
  }

  /**
   * Create a new transaction
   */
  create(options?: TransactionOptions): Transaction {
    return new Transaction(this.adapter, options);
  }

  /**
   * Execute callback within transaction
   * Auto-commits on success, rolls back on error or timeout
   */
  async run<T>(
    callback: TransactionCallback<T>,
    options?: TransactionOptions
  ): Promise<TransactionResult<T>> {
    const trx = this.create(options);
    const startTime = Date.now();

    try {
      await trx.begin();
      const data = await withTimeout(callback(trx), options?.timeout);
      await trx.commit();

      return {
        success: true,
        data,
        duration: Date.now() - startTime
      };
    } catch (error) {
      let failure = error instanceof Error ? error : new Error(String(error));

      if (trx.isActive) {
        try {
          await trx.rollback();
        } catch (rollbackError) {
          failure = new Error(`${failure.message} (rollback failed: ${errorMessage(rollbackError)})`);
        }
      }

      return {
        success: false,
        error: failure,
        duration: Date.now() - startTime
      };
    }
  }
}

function withTimeout<T>(work: Promise<T>, timeout?: number): Promise<T> {
  if (!timeout || timeout <= 0) return work;

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TransactionTimeoutError(timeout)), timeout);
  });

  return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}

/**
 * Run callback in transaction (shorthand)
 */
export async function withTransaction<T>(
  adapter: BaseAdapter,
  callback: TransactionCallback<T>,
  options?: TransactionOptions
): Promise<TransactionResult<T>> {
  const manager = new TransactionManager(adapter);
  return manager.run(callback, options);
}
