// ============================================
// STRATA - PostgreSQL Adapter
// Node-postgres (pg) implementation
// ============================================

import { BaseAdapter } from './base';
import type { QueryClient } from './base';
import type { Row } from '../types';
import { errorMessage } from '../errors';

// PostgreSQL types
import type { Pool } from 'pg';

export class PostgreSQLAdapter extends BaseAdapter {
  name = 'postgres' as const;

  private pool: Pool | null = null;

  async connect(uri: string, options?: Record<string, unknown>): Promise<void> {
    try {
      const { Pool } = await import('pg');

      this.pool = new Pool({
        connectionString: uri,
        ...options
      });

      // Bağlantıyı test et
      const client = await this.pool.connect();
      client.release();
      this.connected = true;
    } catch (error) {
      throw new Error(`PostgreSQL connection failed: ${errorMessage(error)}`);
    }
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.connected = false;
    }
  }

  protected async query(sql: string, params: unknown[] = []): Promise<Row[]> {
    const pool = this.requirePool();
    const result = await pool.query(sql, params);
    return result.rows;
  }

  async acquire(): Promise<QueryClient> {
    const client = await this.requirePool().connect();

    return {
      async query(sql: string, params: unknown[] = []): Promise<{ rows: Row[] }> {
        const result = await client.query(sql, params);
        return { rows: result.rows };
      },
      release(error?: Error): void {
        client.release(error);
      }
    };
  }

  private requirePool(): Pool {
    this.ensureConnected();
    if (!this.pool) {
      throw new Error('PostgreSQL pool not available');
    }
    return this.pool;
  }
}
