// ============================================
// STRATA - Migration Runner Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ApplyError, HistoryConsistencyError, MigrationError, ModelRegistry, MigrationManager } from '../src';
import type { SchemaDefinition } from '../src';
import { FakeDatabase } from './helpers/fake-db';
import { managerFor, removeDir, tempDir } from './helpers/project';

const versions: SchemaDefinition[] = [
  { id: 'SERIAL' },
  { id: 'SERIAL', a: 'text' },
  { id: 'SERIAL', a: 'text', b: 'text' },
  { id: 'SERIAL', a: 'text', b: 'text', c: 'text' },
  { id: 'SERIAL', a: 'text', b: 'text', c: 'text', d: 'text' }
];

describe('MigrationRunner', () => {
  let dir: string;
  let db: FakeDatabase;

  beforeEach(() => {
    dir = tempDir('strata-runner-');
    db = new FakeDatabase();
  });

  afterEach(() => {
    removeDir(dir);
  });

  async function queue(count: number): Promise<MigrationManager> {
    for (let i = 0; i < count; i++) {
      const result = await managerFor(dir, db, versions[i]).generate({ yes: true });
      expect(result.written.map(unit => unit.sequence)).toEqual([i + 1]);
    }
    return managerFor(dir, db, versions[count - 1]);
  }

  function writeHooks(sequence: number, body: string): void {
    const file = path.join(dir, 'M', '.queue', `M_${String(sequence).padStart(8, '0')}.hooks.cjs`);
    fs.writeFileSync(file, body);
  }

  it('should apply queued units in order', async () => {
    const manager = await queue(3);
    const result = await manager.apply();

    expect(result.success).toBe(true);
    expect(result.models[0]).toMatchObject({ model: 'M', applied: [1, 2, 3], pending: [], recovered: [] });
    expect(db.structure('M')?.columns).toEqual(['a', 'b', 'id']);
    expect(db.state.history.map(row => row.sequence)).toEqual([1, 2, 3]);
    expect((await manager.store.loadRecord('M'))?.lastAppliedSequence).toBe(3);
    expect((await manager.writer.list('M')).every(unit => unit.status === 'applied')).toBe(true);
  });

  it('should use one transaction per unit', async () => {
    const manager = await queue(2);
    await manager.apply();

    expect(db.log.filter(sql => sql === 'BEGIN')).toHaveLength(2);
    expect(db.log.filter(sql => sql === 'COMMIT')).toHaveLength(2);
    expect(db.released).toBe(2);
  });

  it('should stop the model at the first failure', async () => {
    const manager = await queue(5);
    db.failOn('ADD COLUMN "b"', 'column "b" violates something');

    const result = await manager.apply();
    const model = result.models[0];

    expect(result.success).toBe(false);
    expect(model.applied).toEqual([1, 2]);
    expect(model.failed).toBe(3);
    expect(model.pending).toEqual([4, 5]);
    expect(model.error).toBeInstanceOf(ApplyError);
    expect(model.error?.message).toBe('Migration M #3 failed: column "b" violates something');

    const units = await manager.writer.list('M');
    expect(units.map(unit => unit.status)).toEqual(['applied', 'applied', 'failed', 'queued', 'queued']);
    expect(units[2].lastError).toBe('column "b" violates something');
    expect(db.structure('M')?.columns).toEqual(['a', 'id']);
    expect(db.log.some(sql => sql.includes('ADD COLUMN "c"'))).toBe(false);
    expect((await manager.store.loadRecord('M'))?.lastAppliedSequence).toBe(2);
  });

  it('should retry a failed unit on the next apply', async () => {
    const manager = await queue(3);
    db.failOn('ADD COLUMN "b"');
    await manager.apply();

    db.clearFailures();
    const result = await manager.apply();

    expect(result.models[0].applied).toEqual([3]);
    expect((await manager.writer.read('M', 3))?.status).toBe('applied');
    expect((await manager.writer.read('M', 3))?.lastError).toBeUndefined();
  });

  it('should have nothing to do twice', async () => {
    const manager = await queue(1);
    await manager.apply();
    const result = await manager.apply();

    expect(result.success).toBe(true);
    expect(result.models[0].applied).toEqual([]);
  });

  describe('Hooks', () => {
    it('should run hooks inside the unit transaction', async () => {
      const manager = await queue(1);
      writeHooks(1, `
exports.runBefore = async function (ctx) {
  await ctx.db.execute("SELECT 'before ' || $1", [ctx.model.name]);
};
exports.runAfter = async function (ctx) {
  const count = await ctx.db.fetchval('SELECT 1');
  await ctx.db.execute("SELECT 'after " + ctx.unit.sequence + "'");
};
`);

      await manager.apply();

      const start = db.log.indexOf('BEGIN');
      expect(db.log.slice(start, start + 2)).toEqual(['BEGIN', "SELECT 'before ' || $1"]);
      expect(db.log[start + 2]).toMatch(/^CREATE TABLE "M"/);
      expect(db.log[start + 3]).toMatch(/^INSERT INTO "_strata_migrations"/);
      expect(db.log.slice(start + 4)).toEqual(['SELECT 1', "SELECT 'after 1'", 'COMMIT']);
    });

    it('should roll back when a hook throws', async () => {
      const manager = await queue(1);
      writeHooks(1, `
exports.runAfter = async function () {
  throw new Error('backfill failed');
};
`);

      const result = await manager.apply();

      expect(result.models[0].error?.message).toBe('Migration M #1 failed: backfill failed');
      expect(db.log).toContain('ROLLBACK');
      expect(db.table('M')).toBeUndefined();
      expect(db.state.history).toEqual([]);
      expect((await manager.writer.read('M', 1))?.status).toBe('failed');
      expect(await manager.store.load('M')).toBeNull();
    });

    it('should reject a hook that is not a function', async () => {
      const manager = await queue(1);
      writeHooks(1, 'exports.runBefore = 42;\n');

      const result = await manager.apply();
      expect(result.models[0].error?.message).toMatch(/Hook 'runBefore' .* is not a function/);
    });

    it('should run without a hook file', async () => {
      const manager = await queue(1);
      fs.rmSync(path.join(dir, 'M', '.queue', 'M_00000001.hooks.cjs'));

      const result = await manager.apply();
      expect(result.models[0].applied).toEqual([1]);
    });

    it('should roll back a unit that times out', async () => {
      const manager = await queue(1);
      writeHooks(1, `
exports.runBefore = function () {
  return new Promise(resolve => setTimeout(resolve, 200));
};
`);

      const slow = managerFor(dir, db, versions[0], undefined, { timeout: 10 });
      const result = await slow.apply();

      expect(result.models[0].error?.message).toBe('Migration M #1 failed: Transaction timed out after 10ms');
      expect(db.log).toContain('ROLLBACK');
      expect((await manager.writer.read('M', 1))?.status).toBe('failed');
    });
  });

  describe('History consistency', () => {
    it('should refuse when the store is ahead of the unit files', async () => {
      const manager = await queue(2);
      await manager.apply();

      const unit = await manager.writer.read('M', 2);
      if (!unit) throw new Error('unit missing');
      fs.writeFileSync(manager.writer.unitFile('M', 2), JSON.stringify({ ...unit, status: 'queued' }));

      const result = await manager.apply();
      expect(result.success).toBe(false);
      expect(result.models[0].error).toBeInstanceOf(HistoryConsistencyError);
      expect(result.models[0].error?.message).toBe('Snapshot store says M #2 is applied but the migration is queued');
    });

    it('should refuse when the database is behind the store', async () => {
      const manager = await queue(1);
      await manager.apply();
      db.state.history = [];

      const result = await manager.apply();
      expect(result.models[0].error).toBeInstanceOf(HistoryConsistencyError);
    });

    it('should record a unit committed by an interrupted run', async () => {
      const manager = await queue(2);
      await manager.apply();

      // Commit went through, the unit file and the store were never updated
      const first = await manager.writer.read('M', 1);
      const second = await manager.writer.read('M', 2);
      if (!first || !second) throw new Error('unit missing');
      await manager.store.save(first.snapshot, 1);
      fs.writeFileSync(manager.writer.unitFile('M', 2), JSON.stringify({ ...second, status: 'queued' }));
      const statements = db.ddl().length;

      const result = await manager.apply();

      expect(result.success).toBe(true);
      expect(result.models[0].recovered).toEqual([2]);
      expect(result.models[0].applied).toEqual([]);
      expect(db.ddl()).toHaveLength(statements);
      expect((await manager.store.loadRecord('M'))?.lastAppliedSequence).toBe(2);
      expect((await manager.writer.read('M', 2))?.status).toBe('applied');
    });
  });

  describe('Models', () => {
    it('should apply independent models and keep failures separate', async () => {
      const registry = new ModelRegistry();
      registry.define('User', { id: 'SERIAL', email: 'text' });
      registry.define('Post', { id: 'SERIAL', title: 'text' });
      const manager = new MigrationManager({ migrationsDir: dir, registry, adapter: db });
      await manager.generate({ yes: true });

      db.failOn('CREATE TABLE "Post"', 'permission denied');
      const result = await manager.apply();

      const user = result.models.find(item => item.model === 'User');
      const post = result.models.find(item => item.model === 'Post');
      expect(user?.applied).toEqual([1]);
      expect(post?.failed).toBe(1);
      expect(db.table('User')).toBeDefined();
      expect(db.table('Post')).toBeUndefined();
    });

    it('should refuse a model whose lock file is held', async () => {
      const manager = await queue(1);
      fs.writeFileSync(path.join(dir, 'M', '.lock'), '999\n');

      const result = await manager.apply();
      expect(result.models[0].error).toBeInstanceOf(MigrationError);
      expect(db.table('M')).toBeUndefined();
    });
  });
});
