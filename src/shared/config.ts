import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getFeedloomDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.feedloom/feedloom.db'),
    })
    .default({}),

  fetch: z
    .object({
      timeout_ms: z.number().int().positive().default(15000),
      user_agent: z.string().default('Feedloom/1.0'),
      backoff_factor: z.number().min(1).default(2),
    })
    .default({}),

  schedule: z
    .object({
      fetch_cron: z.string().default('* * * * *'),
      run_on_start: z.boolean().default(true),
    })
    .default({}),

  retention: z
    .object({
      days: z.number().int().positive().default(30),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type FetchConfig = Config['fetch'];

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('feedloom', {
    searchPlaces: ['feedloom.config.yaml', 'feedloom.config.yml', '.feedloomrc.yaml', '.feedloomrc.yml'],
  });

  const envConfigPath = process.env['FEEDLOOM_CONFIG'];
  const defaultConfigPath = path.join(getFeedloomDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    if (isPlainObject(result?.config)) rawConfig = result.config;
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    if (isPlainObject(result?.config)) rawConfig = result.config;
  } else {
    logger.debug('No config file found, using defaults');
  }

  const envDbPath = process.env['FEEDLOOM_DB_PATH'];
  if (envDbPath) {
    const db = isPlainObject(rawConfig['db']) ? rawConfig['db'] : {};
    db['path'] = envDbPath;
    rawConfig['db'] = db;
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
