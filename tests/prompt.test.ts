// ============================================
// STRATA - Prompt Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { ModelRegistry } from '../src';
import { isAffirmative, previewLines } from '../src/utils/prompt';

describe('Prompts', () => {
  describe('isAffirmative', () => {
    it('should accept y and yes in any case', () => {
      expect(isAffirmative('y')).toBe(true);
      expect(isAffirmative(' YES ')).toBe(true);
      expect(isAffirmative('Yes', true)).toBe(true);
    });

    it('should refuse anything else', () => {
      expect(isAffirmative('n', true)).toBe(false);
      expect(isAffirmative('yep')).toBe(false);
    });

    it('should take the default for an empty answer', () => {
      expect(isAffirmative('', true)).toBe(true);
      expect(isAffirmative('   ', true)).toBe(true);
      expect(isAffirmative('')).toBe(false);
    });
  });

  describe('previewLines', () => {
    it('should put a heading before the indented statements', () => {
      const registry = new ModelRegistry();
      const model = registry.define('User', { id: 'SERIAL' });

      const lines = previewLines({
        model,
        changeSet: [{ kind: 'DropField', name: 'legacy' }],
        statements: ['ALTER TABLE "User" DROP COLUMN IF EXISTS "legacy"', 'CREATE TABLE "X" (\n    "id" SERIAL\n)']
      });

      expect(lines).toEqual([
        '\n📝 User (1 change(s))',
        '   ALTER TABLE "User" DROP COLUMN IF EXISTS "legacy"',
        '   CREATE TABLE "X" (\n       "id" SERIAL\n   )'
      ]);
    });
  });
});
