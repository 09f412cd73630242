import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { InvalidArgumentError } from '../evolution-engine/errors';
import logger from './logger';
import { Config, ConfigOverrides } from './types';

const appSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  environment: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

const storeSchema = z.object({
  dbPath: z.string().min(1),
  populationSize: z.number().int().min(10),
  archiveSize: z.number().int().min(1),
});

const evolutionSchema = z.object({
  eliteRatio: z.number().min(0).max(1),
  explorationRatio: z.number().min(0).max(1),
});

const configSchema = z
  .object({ app: appSchema, store: storeSchema, evolution: evolutionSchema })
  .refine(c => c.store.archiveSize < c.store.populationSize, {
    message: 'store.archiveSize must be smaller than store.populationSize',
  })
  .refine(c => c.evolution.eliteRatio + c.evolution.explorationRatio <= 1, {
    message: 'evolution.eliteRatio + evolution.explorationRatio must be <= 1',
  });

const fileSchema = z.object({
  app: appSchema.partial().optional(),
  store: storeSchema.partial().optional(),
  evolution: evolutionSchema.partial().optional(),
});

const DEFAULT_CONFIG: Config = {
  app: {
    name: 'Strategy Evolve Store',
    version: '1.0.0',
    environment: 'development',
    logLevel: 'info',
  },
  store: {
    dbPath: './data/evolution.db',
    populationSize: 500,
    archiveSize: 50,
  },
  evolution: {
    eliteRatio: 0.1,
    explorationRatio: 0.2,
  },
};

/**
 * Layered configuration: defaults, then the JSON config file, then
 * environment variables (EVOLVE_*, LOG_LEVEL, NODE_ENV). Later layers win.
 */
export class ConfigManager {
  private config: Config;
  private configPath: string;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || path.join(__dirname, '../../config/config.json');
    this.config = this.loadConfig(env);
    logger.level = this.config.app.logLevel;
  }

  private loadConfig(env: NodeJS.ProcessEnv): Config {
    const fromFile = this.readConfigFile();
    const fromEnv = readEnvOverrides(env);

    const merged = {
      app: { ...DEFAULT_CONFIG.app, ...fromFile.app, ...fromEnv.app },
      store: { ...DEFAULT_CONFIG.store, ...fromFile.store, ...fromEnv.store },
      evolution: { ...DEFAULT_CONFIG.evolution, ...fromFile.evolution, ...fromEnv.evolution },
    };

    const parsed = configSchema.safeParse(merged);
    if (!parsed.success) {
      throw new InvalidArgumentError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  private readConfigFile(): ConfigOverrides {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
    } catch (error) {
      logger.warn(`[ConfigManager] Could not read ${this.configPath}, using defaults:`, error);
      return {};
    }

    const parsed = fileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidArgumentError(`Invalid configuration in ${this.configPath}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  public get(): Config {
    return this.config;
  }

  public getSection<K extends keyof Config>(section: K): Config[K] {
    return this.config[section];
  }
}

function readEnvOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: Required<ConfigOverrides> = { app: {}, store: {}, evolution: {} };

  const environment = appSchema.shape.environment.safeParse(env.NODE_ENV);
  if (environment.success) overrides.app.environment = environment.data;
  if (env.LOG_LEVEL !== undefined) {
    const level = appSchema.shape.logLevel.safeParse(env.LOG_LEVEL);
    if (!level.success) {
      throw new InvalidArgumentError(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
    }
    overrides.app.logLevel = level.data;
  }

  if (env.EVOLVE_DB_PATH) overrides.store.dbPath = env.EVOLVE_DB_PATH;
  if (env.EVOLVE_POPULATION_SIZE !== undefined) {
    overrides.store.populationSize = parseNumber('EVOLVE_POPULATION_SIZE', env.EVOLVE_POPULATION_SIZE);
  }
  if (env.EVOLVE_ARCHIVE_SIZE !== undefined) {
    overrides.store.archiveSize = parseNumber('EVOLVE_ARCHIVE_SIZE', env.EVOLVE_ARCHIVE_SIZE);
  }
  if (env.EVOLVE_ELITE_RATIO !== undefined) {
    overrides.evolution.eliteRatio = parseNumber('EVOLVE_ELITE_RATIO', env.EVOLVE_ELITE_RATIO);
  }
  if (env.EVOLVE_EXPLORATION_RATIO !== undefined) {
    overrides.evolution.explorationRatio = parseNumber('EVOLVE_EXPLORATION_RATIO', env.EVOLVE_EXPLORATION_RATIO);
  }

  return overrides;
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export default ConfigManager;
