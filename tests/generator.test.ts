// ============================================
// STRATA - SQL Generator Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { Schema, field, GenerationError, DeclarationError } from '../src';
import type { Change, SchemaDefinition, SchemaOptions, SchemaSnapshot } from '../src';
import { SchemaDiffer } from '../src/migration/SchemaDiffer';
import { SqlGenerator, validateSnapshot } from '../src/migration/SqlGenerator';

const differ = new SchemaDiffer();
const generator = new SqlGenerator();

function snap(definition: SchemaDefinition, options?: SchemaOptions): SchemaSnapshot {
  return new Schema(definition, options).describe('M');
}

describe('SqlGenerator', () => {
  describe('Full create', () => {
    it('should create the table with no constraint statements', () => {
      const current = snap({ id: 'SERIAL', name: 'varchar(255)' });
      const sql = generator.generate('M', differ.diff(null, current));

      expect(sql).toEqual([
        'CREATE TABLE "M" (\n    "id" SERIAL,\n    "name" varchar(255),\n    PRIMARY KEY ("id")\n)'
      ]);
    });

    it('should add groups after the table, then indexes', () => {
      const current = snap(
        {
          id: field('SERIAL').onAdd('NOT NULL'),
          email: field('text').unique(),
          name: field('text').index('gin:gin_trgm_ops')
        },
        { uniqueGroups: { ne: ['id', 'name'], en: ['email', 'name'] } }
      );

      expect(generator.createTable(current)).toEqual([
        'CREATE TABLE "M" (\n    "id" SERIAL NOT NULL,\n    "email" text,\n    "name" text,\n    PRIMARY KEY ("id")\n)',
        'ALTER TABLE "M" ADD CONSTRAINT "__UNQ_M_ne__" UNIQUE ("id", "name")',
        'ALTER TABLE "M" ADD CONSTRAINT "__UNQ_M_en__" UNIQUE ("email", "name")',
        'CREATE UNIQUE INDEX IF NOT EXISTS "__IDX_M_email_unique__" ON "M" ("email")',
        'CREATE INDEX IF NOT EXISTS "__IDX_M_name_gin_gin_trgm_ops__" ON "M" USING gin ("name" gin_trgm_ops)'
      ]);
    });

    it('should run declared alter ops right after the table exists', () => {
      const current = snap({
        id: 'SERIAL',
        profession: field('varchar(65)').alter("SET DEFAULT 'Guest'", 'SET NOT NULL')
      });

      expect(generator.generate('M', differ.diff(null, current))).toEqual([
        'CREATE TABLE "M" (\n    "id" SERIAL,\n    "profession" varchar(65),\n    PRIMARY KEY ("id")\n)',
        'ALTER TABLE "M" ALTER COLUMN "profession" SET DEFAULT \'Guest\'',
        'ALTER TABLE "M" ALTER COLUMN "profession" SET NOT NULL'
      ]);
    });

    it('should not combine a full create with other changes', () => {
      const current = snap({ id: 'SERIAL' });
      const changes: Change[] = [{ kind: 'CreateTable', snapshot: current }, { kind: 'DropField', name: 'x' }];

      expect(() => generator.generate('M', changes)).toThrow(GenerationError);
    });
  });

  describe('Unique groups', () => {
    it('should add a group', () => {
      const before = snap({ id: 'SERIAL', name: 'varchar(255)' });
      const after = snap({ id: 'SERIAL', name: 'varchar(255)' }, { uniqueGroups: { ne: ['id', 'name'] } });
      const changes = differ.diff(before, after);

      expect(changes).toEqual([{ kind: 'AddUniqueGroup', group: { groupName: 'ne', fieldNames: ['id', 'name'] } }]);
      expect(generator.generate('M', changes)).toEqual([
        'ALTER TABLE "M" ADD CONSTRAINT "__UNQ_M_ne__" UNIQUE ("id", "name")'
      ]);
    });

    it('should modify a group as one drop and one add', () => {
      const definition = { id: 'SERIAL', name: 'varchar(255)', extra: 'text' };
      const before = snap(definition, { uniqueGroups: { ne: ['id', 'name'] } });
      const after = snap(definition, { uniqueGroups: { ne: ['id', 'name', 'extra'] } });
      const changes = differ.diff(before, after);

      expect(changes).toEqual([{ kind: 'ModifyUniqueGroup', groupName: 'ne', newFields: ['id', 'name', 'extra'] }]);
      expect(generator.generate('M', changes)).toEqual([
        'ALTER TABLE "M" DROP CONSTRAINT IF EXISTS "__UNQ_M_ne__"',
        'ALTER TABLE "M" ADD CONSTRAINT "__UNQ_M_ne__" UNIQUE ("id", "name", "extra")'
      ]);
    });

    it('should reject a group left on a dropped field before anything is written', () => {
      const before = snap(
        { id: 'SERIAL', name: 'varchar(255)', extra: 'text' },
        { uniqueGroups: { ne: ['id', 'name', 'extra'] } }
      );
      const after = snap({ id: 'SERIAL', name: 'varchar(255)' }, { uniqueGroups: { ne: ['id', 'name', 'extra'] } });

      expect(differ.diff(before, after)).toContainEqual({ kind: 'DropField', name: 'extra' });
      expect(() => validateSnapshot(after)).toThrow(DeclarationError);
      expect(() => validateSnapshot(after)).toThrow(/missing field 'extra'/);
    });
  });

  describe('Incremental order', () => {
    it('should emit statements in dependency order', () => {
      const before = snap(
        { id: 'SERIAL', old: field('text').index('btree'), kept: field('varchar(10)') },
        { uniqueGroups: { g1: ['id', 'old'] } }
      );
      const after = snap(
        { id: 'SERIAL', kept: field('varchar(20)').alter('SET NOT NULL').index('hash'), added: field('integer').onAdd('DEFAULT 0') },
        { uniqueGroups: { g2: ['id', 'added'] } }
      );

      expect(generator.generate('M', differ.diff(before, after))).toEqual([
        'ALTER TABLE "M" DROP CONSTRAINT IF EXISTS "__UNQ_M_g1__"',
        'ALTER TABLE "M" DROP COLUMN IF EXISTS "old"',
        'ALTER TABLE "M" ADD COLUMN "added" integer DEFAULT 0',
        'ALTER TABLE "M" ALTER COLUMN "kept" TYPE varchar(20)',
        'ALTER TABLE "M" ALTER COLUMN "kept" SET NOT NULL',
        'CREATE INDEX IF NOT EXISTS "__IDX_M_kept_hash__" ON "M" USING hash ("kept")',
        'ALTER TABLE "M" ADD CONSTRAINT "__UNQ_M_g2__" UNIQUE ("id", "added")'
      ]);
    });

    it('should run alter ops of an added column with the other alters', () => {
      const changes: Change[] = [
        { kind: 'AlterField', name: 'name', ops: ['DROP DEFAULT'] },
        {
          kind: 'AddField',
          field: {
            name: 'profession',
            sqlType: 'varchar(65)',
            onAdd: '',
            alterOps: ["SET DEFAULT 'Guest'", 'SET NOT NULL'],
            indexSpecs: [{ method: 'btree', remove: false }],
            unique: false
          }
        },
        { kind: 'AddIndex', field: 'profession', index: { method: 'btree', remove: false } },
        { kind: 'DropField', name: 'legacy' }
      ];

      expect(generator.generate('M', changes)).toEqual([
        'ALTER TABLE "M" DROP COLUMN IF EXISTS "legacy"',
        'ALTER TABLE "M" ADD COLUMN "profession" varchar(65)',
        'ALTER TABLE "M" ALTER COLUMN "name" DROP DEFAULT',
        'ALTER TABLE "M" ALTER COLUMN "profession" SET DEFAULT \'Guest\'',
        'ALTER TABLE "M" ALTER COLUMN "profession" SET NOT NULL',
        'CREATE INDEX IF NOT EXISTS "__IDX_M_profession_btree__" ON "M" USING btree ("profession")'
      ]);
    });

    it('should reorder a change set by phase', () => {
      const changes: Change[] = [
        { kind: 'AddUniqueGroup', group: { groupName: 'g', fieldNames: ['a'] } },
        { kind: 'AddIndex', field: 'a', index: { method: 'btree', remove: false } },
        { kind: 'DropField', name: 'b' },
        { kind: 'DropIndex', field: 'b', index: { method: 'hash', remove: false } }
      ];

      expect(generator.generate('M', changes)).toEqual([
        'DROP INDEX IF EXISTS "__IDX_M_b_hash__"',
        'ALTER TABLE "M" DROP COLUMN IF EXISTS "b"',
        'CREATE INDEX IF NOT EXISTS "__IDX_M_a_btree__" ON "M" USING btree ("a")',
        'ALTER TABLE "M" ADD CONSTRAINT "__UNQ_M_g__" UNIQUE ("a")'
      ]);
    });

    it('should be pure', () => {
      const changes: Change[] = [{ kind: 'DropField', name: 'x' }, { kind: 'AlterField', name: 'y', ops: ['DROP DEFAULT'] }];
      expect(generator.generate('M', changes)).toEqual(generator.generate('M', changes));
    });
  });

  describe('Quoting', () => {
    it('should double embedded quotes', () => {
      const changes: Change[] = [{ kind: 'DropField', name: 'we"ird' }];
      expect(generator.generate('t"x', changes)).toEqual(['ALTER TABLE "t""x" DROP COLUMN IF EXISTS "we""ird"']);
    });
  });

  describe('Errors', () => {
    it('should reject an alter without operations', () => {
      const changes: Change[] = [{ kind: 'AlterField', name: 'name', ops: [] }];
      expect(() => generator.generate('M', changes)).toThrow(GenerationError);
    });

    it('should reject an index method it cannot emit', () => {
      const changes: Change[] = [{ kind: 'AddIndex', field: 'name', index: { method: 'gin; DROP', remove: false } }];
      expect(() => generator.generate('M', changes)).toThrow(/Cannot render index/);
    });

    it('should reject a group with no fields', () => {
      const changes: Change[] = [{ kind: 'AddUniqueGroup', group: { groupName: 'g', fieldNames: [] } }];
      expect(() => generator.generate('M', changes)).toThrow(GenerationError);
    });

    it('should reject an undeclared primary key', () => {
      const current = snap({ uid: 'uuid' });
      expect(() => validateSnapshot(current)).toThrow(/Primary key 'id'/);
    });

    it('should not take an object builtin for a declared field', () => {
      expect(() => validateSnapshot(snap({ uid: 'uuid' }, { primaryKey: 'toString' }))).toThrow(
        "Primary key 'toString' is not a field of 'M'"
      );
      expect(() => validateSnapshot(snap({ id: 'SERIAL' }, { uniqueGroups: { g: ['id', 'constructor'] } }))).toThrow(
        "Unique group 'g' on 'M' references missing field 'constructor'"
      );
    });
  });
});
