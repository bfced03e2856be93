// ============================================
// STRATA - Config & CLI Argument Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { CONFIG_FILE, DEFAULT_CONFIG, loadConfig, resolveConfig } from '../src/config';
import { parseArgs, parseSequence } from '../src/utils/args';
import { removeDir, tempDir } from './helpers/project';

describe('Config', () => {
  describe('resolveConfig', () => {
    it('should return defaults for an empty file', () => {
      expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
    });

    it('should merge known keys over the defaults', () => {
      const config = resolveConfig(
        {
          migrationsDir: './db/migrations',
          transactionTimeout: 5000,
          database: { url: 'postgres://app@db:5432/app', options: { max: 4 } },
          unknown: true
        },
        {}
      );

      expect(config).toEqual({
        migrationsDir: './db/migrations',
        modelsPath: './models',
        database: { url: 'postgres://app@db:5432/app', options: { max: 4 } },
        transactionTimeout: 5000
      });
    });

    it('should reject values of the wrong type', () => {
      expect(() => resolveConfig({ migrationsDir: 42 }, {})).toThrow(
        'Invalid strata.config.json: migrationsDir: Expected string, received number'
      );
    });

    it('should reject a negative transaction timeout', () => {
      expect(() => resolveConfig({ transactionTimeout: -1 }, {})).toThrow(
        /^Invalid strata\.config\.json: transactionTimeout: /
      );
    });

    it('should reject a file that is not an object', () => {
      expect(() => resolveConfig(['migrations'], {})).toThrow(
        'Invalid strata.config.json: (root): Expected object, received array'
      );
    });

    it('should keep pool options', () => {
      const config = resolveConfig({ database: { options: { max: 4 } } }, {});

      expect(config.database.options).toEqual({ max: 4 });
      expect(config.database.url).toBe(DEFAULT_CONFIG.database.url);
    });

    it('should let DATABASE_URL override the file', () => {
      const config = resolveConfig(
        { database: { url: 'postgres://file/db' } },
        { DATABASE_URL: 'postgres://env/db' }
      );

      expect(config.database.url).toBe('postgres://env/db');
    });

    it('should not mutate the defaults', () => {
      resolveConfig({ database: { url: 'postgres://other/db' } }, {});
      expect(DEFAULT_CONFIG.database.url).toBe('postgres://localhost:5432/postgres');
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = tempDir();
    });

    afterEach(() => {
      removeDir(dir);
    });

    it('should resolve paths against the working directory', () => {
      fs.writeFileSync(path.join(dir, CONFIG_FILE), JSON.stringify({ migrationsDir: 'schema' }));

      const config = loadConfig(dir, {});

      expect(config.migrationsDir).toBe(path.join(dir, 'schema'));
      expect(config.modelsPath).toBe(path.join(dir, 'models'));
    });

    it('should fall back to defaults without a config file', () => {
      expect(loadConfig(dir, {}).migrationsDir).toBe(path.join(dir, 'migrations'));
    });

    it('should throw on a malformed config file', () => {
      fs.writeFileSync(path.join(dir, CONFIG_FILE), '{ "migrationsDir": ');

      expect(() => loadConfig(dir, {})).toThrow(`Could not parse ${CONFIG_FILE}`);
    });
  });
});

describe('CLI arguments', () => {
  it('should split the command from its parameters', () => {
    expect(parseArgs(['delete', 'User', '3', '5', '-y'])).toEqual({
      command: 'delete',
      params: ['User', '3', '5'],
      yes: true,
      quiet: false,
      models: []
    });
  });

  it('should collect repeated model filters', () => {
    const args = parseArgs(['migrate', '--model', 'User', '-m', 'Post', '--model=Tag', '--quiet']);

    expect(args.command).toBe('migrate');
    expect(args.models).toEqual(['User', 'Post', 'Tag']);
    expect(args.quiet).toBe(true);
  });

  it('should require a value for --model', () => {
    expect(() => parseArgs(['migrate', '--model'])).toThrow('--model requires a model name');
    expect(() => parseArgs(['migrate', '-m', '-y'])).toThrow('-m requires a model name');
  });

  it('should leave the command undefined when none is given', () => {
    expect(parseArgs([]).command).toBeUndefined();
  });

  it('should parse positive sequence numbers only', () => {
    expect(parseSequence('3')).toBe(3);
    expect(parseSequence('00000012')).toBe(12);
    expect(parseSequence('0')).toBeNull();
    expect(parseSequence('-2')).toBeNull();
    expect(parseSequence('1.5')).toBeNull();
    expect(parseSequence(undefined)).toBeNull();
  });
});
