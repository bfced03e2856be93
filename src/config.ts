// ============================================
// STRATA - Configuration
// strata.config.json + environment overrides
// ============================================

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage } from './errors';

export const CONFIG_FILE = 'strata.config.json';

export interface StrataConfig {
  /** Root of the per-model migration directories */
  migrationsDir: string;
  /** Module that registers the models; exports `registry` or a default `ModelRegistry` */
  modelsPath: string;
  database: {
    url: string;
    /** Extra `pg` pool options */
    options?: Record<string, unknown>;
  };
  /** Per-unit transaction timeout in ms; 0 disables it */
  transactionTimeout: number;
}

export const DEFAULT_CONFIG: StrataConfig = {
  migrationsDir: './migrations',
  modelsPath: './models',
  database: {
    url: 'postgres://localhost:5432/postgres'
  },
  transactionTimeout: 0
};

const ConfigFileSchema = z.object({
  migrationsDir: z.string().min(1).optional(),
  modelsPath: z.string().min(1).optional(),
  database: z
    .object({
      url: z.string().min(1).optional(),
      options: z.record(z.unknown()).optional()
    })
    .optional(),
  transactionTimeout: z.number().int().nonnegative().optional()
});

/**
 * Validate a parsed config file and merge it over the defaults; unknown keys are ignored
 */
export function resolveConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): StrataConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.errors
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${CONFIG_FILE}: ${detail}`);
  }
  const file = result.data;

  const config: StrataConfig = {
    migrationsDir: file.migrationsDir ?? DEFAULT_CONFIG.migrationsDir,
    modelsPath: file.modelsPath ?? DEFAULT_CONFIG.modelsPath,
    database: {
      url: file.database?.url ?? DEFAULT_CONFIG.database.url
    },
    transactionTimeout: file.transactionTimeout ?? DEFAULT_CONFIG.transactionTimeout
  };
  if (file.database?.options) {
    config.database.options = { ...file.database.options };
  }

  if (env.DATABASE_URL) {
    config.database.url = env.DATABASE_URL;
  }

  return config;
}

/**
 * Load `strata.config.json` from `cwd`; a missing file means defaults
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): StrataConfig {
  const configPath = path.join(cwd, CONFIG_FILE);

  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    try {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new Error(`Could not parse ${CONFIG_FILE}: ${errorMessage(error)}`);
    }
  }

  const config = resolveConfig(raw, env);
  return {
    ...config,
    migrationsDir: path.resolve(cwd, config.migrationsDir),
    modelsPath: path.resolve(cwd, config.modelsPath)
  };
}
