// ============================================
// STRATA - Connection
// ============================================

import type { ConnectionOptions } from './types';
import { PostgreSQLAdapter } from './adapters';

/**
 * Veritabanına bağlan
 *
 * @example
 * ```ts
 * const db = await connect({ uri: 'postgres://localhost:5432/app' });
 * await db.fetchval('SELECT 1');
 * await db.disconnect();
 * ```
 */
export async function connect(options: ConnectionOptions): Promise<PostgreSQLAdapter> {
  const adapter = new PostgreSQLAdapter();
  await adapter.connect(options.uri, options.options);
  return adapter;
}
