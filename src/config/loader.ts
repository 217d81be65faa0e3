/**
 * Configuration loader
 *
 * Loads router defaults from a YAML file and environment variables,
 * merging them in order of precedence.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'js-yaml';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { wrapError, getErrorMessage } from '../utils/error-utils';
import type { PartialRouterConfig, RouterConfig } from './types';
import { getDefaultConfig, mergeConfig } from './defaults';

const log = createLogger('config');

/**
 * Configuration file names to search for
 */
const CONFIG_FILE_NAMES = ['ortho-connector.config.yaml', 'ortho-connector.config.yml'];

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'ORTHO_';

const CONFIG_KEYS = ['shapeMargin', 'globalBoundsMargin', 'bendPenalty', 'cacheSize'] as const satisfies ReadonlyArray<keyof RouterConfig>;

const ENV_KEYS: Record<keyof RouterConfig, string> = {
  shapeMargin: `${ENV_PREFIX}SHAPE_MARGIN`,
  globalBoundsMargin: `${ENV_PREFIX}GLOBAL_BOUNDS_MARGIN`,
  bendPenalty: `${ENV_PREFIX}BEND_PENALTY`,
  cacheSize: `${ENV_PREFIX}CACHE_SIZE`,
};

export const routerConfigSchema = z
  .object({
    shapeMargin: z.number().int().min(0),
    globalBoundsMargin: z.number().int().min(0),
    bendPenalty: z.number().finite().min(0),
    cacheSize: z.number().int().min(0),
  })
  .partial();

/**
 * Load configuration with the following precedence (highest to lowest):
 * 1. Explicit overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadRouterConfig(
  overrides?: PartialRouterConfig,
  configPath?: string
): Promise<RouterConfig> {
  let config = getDefaultConfig();

  const fileConfig = await loadConfigFile(configPath);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig());

  if (overrides) {
    config = mergeConfig(config, parseRouterConfig(overrides, 'overrides'));
  }

  return config;
}

/**
 * Synchronous loading without a config file (defaults, env, overrides)
 */
export function loadRouterConfigSync(overrides?: PartialRouterConfig): RouterConfig {
  let config = mergeConfig(getDefaultConfig(), loadEnvConfig());
  if (overrides) {
    config = mergeConfig(config, parseRouterConfig(overrides, 'overrides'));
  }
  return config;
}

/**
 * Load configuration from file
 */
async function loadConfigFile(configPath?: string): Promise<PartialRouterConfig | null> {
  if (configPath) {
    return loadConfigFromPath(configPath);
  }

  const cwd = process.cwd();
  for (const fileName of CONFIG_FILE_NAMES) {
    const configFilePath = path.join(cwd, fileName);
    if (fs.existsSync(configFilePath)) {
      return loadConfigFromPath(configFilePath);
    }
  }

  return null;
}

/**
 * Load configuration from a specific YAML file. Unreadable files are skipped with a warning;
 * a file that parses but holds invalid values is an error.
 */
async function loadConfigFromPath(filePath: string): Promise<PartialRouterConfig | null> {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    log.warn(`Config file not found: ${absolutePath}`);
    return null;
  }

  let content: unknown;
  try {
    content = YAML.load(await fs.promises.readFile(absolutePath, 'utf8'));
  } catch (error) {
    log.warn(wrapError(error, `Skipping unreadable config file ${absolutePath}`).message);
    return null;
  }

  if (content === undefined || content === null) return {};
  return parseRouterConfig(content, absolutePath);
}

/**
 * Validate a partial config. `source` names where it came from in the error message.
 */
export function parseRouterConfig(value: unknown, source: string): PartialRouterConfig {
  const result = routerConfigSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`).join('; ');
    throw new Error(`Invalid router configuration in ${source}: ${details}`);
  }
  return result.data;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(): PartialRouterConfig {
  const config: PartialRouterConfig = {};

  for (const key of CONFIG_KEYS) {
    const raw = process.env[ENV_KEYS[key]];
    if (raw === undefined || raw === '') continue;
    const value = Number(raw);
    try {
      Object.assign(config, parseRouterConfig({ [key]: value }, ENV_KEYS[key]));
    } catch (error) {
      log.warn(`Ignoring ${ENV_KEYS[key]}=${raw}: ${getErrorMessage(error)}`);
    }
  }

  return config;
}
