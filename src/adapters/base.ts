// ============================================
// STRATA - Base Adapter
// Abstract base class for the SQL execution layer
// ============================================

import type { Row, SqlHandle } from '../types';

/**
 * A dedicated connection, used for one transaction at a time
 */
export interface QueryClient {
  query(sql: string, params?: unknown[]): Promise<{ rows: Row[] }>;
  release(error?: Error): void;
}

export abstract class BaseAdapter implements SqlHandle {
  abstract name: string;

  protected connected = false;

  abstract connect(uri: string, options?: Record<string, unknown>): Promise<void>;
  abstract disconnect(): Promise<void>;

  /** Run one statement on any pooled connection */
  protected abstract query(sql: string, params: unknown[]): Promise<Row[]>;

  /** Check out a connection for a transaction */
  abstract acquire(): Promise<QueryClient>;

  isConnected(): boolean {
    return this.connected;
  }

  async execute(sql: string, params: unknown[] = []): Promise<void> {
    this.ensureConnected();
    await this.query(sql, params);
  }

  async fetch(sql: string, params: unknown[] = []): Promise<Row[]> {
    this.ensureConnected();
    return this.query(sql, params);
  }

  /**
   * First column of the first row, or null
   */
  async fetchval(sql: string, params: unknown[] = []): Promise<unknown> {
    const rows = await this.fetch(sql, params);
    return firstValue(rows);
  }

  /**
   * Bağlantı durumunu kontrol et
   */
  protected ensureConnected(): void {
    if (!this.connected) {
      throw new Error(`${this.name} adapter is not connected`);
    }
  }
}

export function firstValue(rows: Row[]): unknown {
  if (rows.length === 0) return null;
  const values = Object.values(rows[0]);
  return values.length > 0 ? values[0] : null;
}
