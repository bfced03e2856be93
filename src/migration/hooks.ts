// ============================================
// STRATA - Migration Hooks
// Editable runBefore / runAfter file written beside each unit
// ============================================

import { createRequire } from 'module';
import type { MigrationUnit, SqlHandle } from '../types';
import type { ModelDefinition } from '../Model';
import { pathExists } from '../utils/files';

export interface HookContext {
  /** Handle on the unit's own transaction */
  db: SqlHandle;
  model: ModelDefinition;
  unit: MigrationUnit;
}

export type Hook = (ctx: HookContext) => Promise<void> | void;

export interface UnitHooks {
  runBefore?: Hook;
  runAfter?: Hook;
}

/**
 * A `.cjs` file, so it loads with `require` whatever the host package's module type
 */
export function hookTemplate(unit: Pick<MigrationUnit, 'table' | 'sequence' | 'generatedSql'>): string {
  const statements = unit.generatedSql
    .map(sql => sql.split('\n').map(line => `//   ${line}`).join('\n'))
    .join('\n');

  return `// Migration hooks: ${unit.table} #${unit.sequence}
//
// Both functions run inside the migration's transaction. Throwing from
// either one rolls the whole unit back.
//
//   ctx.db     execute(sql, params) / fetch(sql, params) / fetchval(sql, params)
//   ctx.model  the model definition
//   ctx.unit   this migration unit
//
// Statements:
${statements}

exports.runBefore = async function runBefore(ctx) {
};

exports.runAfter = async function runAfter(ctx) {
};
`;
}

function isHook(value: unknown): value is Hook {
  return typeof value === 'function';
}

function isModule(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}

/**
 * Load a unit's hook file fresh from disk; a missing file means no hooks
 */
export async function loadHooks(file: string): Promise<UnitHooks> {
  if (!(await pathExists(file))) return {};

  const load = createRequire(__filename);
  const resolved = load.resolve(file);
  // Düzenlenmiş dosyanın eski hali kullanılmasın
  delete load.cache[resolved];

  const exported: unknown = load(resolved);
  if (!isModule(exported)) {
    throw new Error(`Hook file ${file} does not export an object`);
  }

  const hooks: UnitHooks = {};
  for (const name of ['runBefore', 'runAfter'] as const) {
    const value = exported[name];
    if (value === undefined) continue;
    if (!isHook(value)) {
      throw new Error(`Hook '${name}' in ${file} is not a function`);
    }
    hooks[name] = value;
  }
  return hooks;
}
