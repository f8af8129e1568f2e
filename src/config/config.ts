import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import JSON5 from 'json5';
import { configSchema } from './schema.js';
import type { SwitchyardConfig } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { logger } from '../utils/logger.js';

const GLOBAL_CONFIG_DIR = join(homedir(), '.switchyard');
const CONFIG_FILE_NAME = 'config.json';
const LOCAL_CONFIG_FILE = join('.switchyard', CONFIG_FILE_NAME);

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

async function loadJsonFile(path: string): Promise<Json | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (err) {
    throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError([`${path}: expected an object at the top level`]);
  }
  return parsed;
}

export function deepMerge(base: Json, override: Json): Json {
  const result: Json = { ...base };
  for (const key of Object.keys(override)) {
    const val = override[key];
    const current = result[key];
    if (isRecord(val)) {
      result[key] = deepMerge(isRecord(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Environment variables win over both config files */
export function envOverrides(env: NodeJS.ProcessEnv): Json {
  const overrides: Json = {};
  const service: Json = {};
  const classifier: Json = {};

  if (env.SWITCHYARD_LOG_LEVEL) overrides.logLevel = env.SWITCHYARD_LOG_LEVEL.toLowerCase();
  if (env.SWITCHYARD_STORE_DIR) overrides.storeDir = env.SWITCHYARD_STORE_DIR;
  if (env.SWITCHYARD_API_BASE) service.apiBase = env.SWITCHYARD_API_BASE;
  if (env.SWITCHYARD_TARGET_CHAT) service.targetChatId = env.SWITCHYARD_TARGET_CHAT;
  if (env.SWITCHYARD_THRESHOLD) classifier.threshold = Number(env.SWITCHYARD_THRESHOLD);

  if (Object.keys(service).length > 0) overrides.service = service;
  if (Object.keys(classifier).length > 0) overrides.classifier = classifier;
  return overrides;
}

export interface LoadConfigOptions {
  /** Directory containing .switchyard/config.json; defaults to cwd */
  repoRoot?: string;
  /** Overrides ~/.switchyard */
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

let cachedConfig: SwitchyardConfig | null = null;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<SwitchyardConfig> {
  if (cachedConfig) return cachedConfig;

  const globalDir = options.globalDir ?? GLOBAL_CONFIG_DIR;
  let merged: Json = { ...DEFAULT_CONFIG };

  const globalPath = join(globalDir, CONFIG_FILE_NAME);
  const globalConfig = await loadJsonFile(globalPath);
  if (globalConfig) {
    logger.debug('Loaded global config from ' + globalPath);
    merged = deepMerge(merged, globalConfig);
  }

  const localPath = options.repoRoot ? join(options.repoRoot, LOCAL_CONFIG_FILE) : LOCAL_CONFIG_FILE;
  const localConfig = await loadJsonFile(localPath);
  if (localConfig) {
    logger.debug('Loaded local config from ' + localPath);
    merged = deepMerge(merged, localConfig);
  }

  merged = deepMerge(merged, envOverrides(options.env ?? process.env));

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }

  const config = result.data;
  if (!config.storeDir) {
    config.storeDir = globalDir;
  }

  cachedConfig = config;
  return config;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}
