// ============================================
// STRATA - Adapters Index
// ============================================

export { BaseAdapter, firstValue } from './base';
export type { QueryClient } from './base';
export { PostgreSQLAdapter } from './postgres';
