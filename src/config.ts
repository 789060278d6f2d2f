/**
 * Configuration system with YAML and JSON support
 */

import { existsSync, readFileSync } from 'fs';
import YAML from 'js-yaml';
import { normalizeAlgorithm, DEFAULT_ALGORITHM } from './fingerprint.js';
import { AppError, Logger, errorMessage } from './logger.js';
import { Policy, RunConfig } from './types.js';

const logger = new Logger({ context: 'ConfigManager' });

export const DEFAULT_CONFIG_PATH = './dupe-sweep.yaml';

/**
 * Settings accepted from a config file, the environment or the command line.
 * Every field is optional; later layers win.
 */
export interface RunConfigInput {
  algorithm?: string;
  scanRoots?: string[];
  deleteRoots?: string[];
  dryRun?: boolean;
  policy?: Policy;
  logDir?: string;
  hashConcurrency?: number;
  exclude?: string[];
}

export const DEFAULT_CONFIG: Required<Pick<RunConfigInput, 'algorithm' | 'logDir' | 'hashConcurrency' | 'exclude'>> = {
  algorithm: DEFAULT_ALGORITHM,
  logDir: '.',
  hashConcurrency: 4,
  exclude: []
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringList(raw: Record<string, unknown>, key: string, errors: string[]): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    errors.push(`${key} must be a list of strings`);
    return undefined;
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: string, errors: string[]): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push(`${key} must be a string`);
    return undefined;
  }
  return value;
}

function readBoolean(raw: Record<string, unknown>, key: string, errors: string[]): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    errors.push(`${key} must be true or false`);
    return undefined;
  }
  return value;
}

export function parsePolicy(value: string): Policy | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'manual') return 'manual';
  if (normalized === 'automatic' || normalized === 'auto') return 'automatic';
  return undefined;
}

/**
 * Validate a parsed config document
 */
export function parseConfigDocument(raw: unknown, source: string): RunConfigInput {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new AppError(`Config must be a mapping: ${source}`, 'INVALID_CONFIG', 400);
  }

  const errors: string[] = [];
  const config: RunConfigInput = {
    algorithm: readString(raw, 'algorithm', errors),
    scanRoots: readStringList(raw, 'directories', errors),
    deleteRoots: readStringList(raw, 'deleteFrom', errors),
    dryRun: readBoolean(raw, 'dryRun', errors),
    logDir: readString(raw, 'logDir', errors),
    exclude: readStringList(raw, 'exclude', errors)
  };

  const policy = readString(raw, 'policy', errors);
  if (policy !== undefined) {
    config.policy = parsePolicy(policy);
    if (!config.policy) errors.push(`policy must be "manual" or "automatic"`);
  }

  const concurrency = raw.hashConcurrency;
  if (concurrency !== undefined && concurrency !== null) {
    if (typeof concurrency === 'number') {
      config.hashConcurrency = concurrency;
    } else {
      errors.push('hashConcurrency must be a number');
    }
  }

  if (errors.length > 0) {
    throw new AppError(`Invalid config ${source}: ${errors.join('; ')}`, 'INVALID_CONFIG', 400, { errors });
  }
  return config;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: RunConfigInput;
  private configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH, private required = false) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file, or nothing when the file is absent
   */
  private loadConfig(): RunConfigInput {
    if (!existsSync(this.configPath)) {
      if (this.required) {
        throw new AppError(`Config file not found: ${this.configPath}`, 'INVALID_CONFIG', 400);
      }
      logger.debug(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return {};
    }

    let parsed: unknown;
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }
    } catch (error) {
      throw new AppError(`Failed to load config: ${errorMessage(error)}`, 'INVALID_CONFIG', 400, {
        path: this.configPath
      });
    }

    const config = parseConfigDocument(parsed, this.configPath);
    logger.debug(`Loaded configuration from ${this.configPath}`);
    return config;
  }

  get<K extends keyof RunConfigInput>(key: K): RunConfigInput[K] {
    return this.config[key];
  }

  getAll(): RunConfigInput {
    return { ...this.config };
  }

  getPath(): string {
    return this.configPath;
  }
}

/**
 * Settings taken from DUPE_* environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): RunConfigInput {
  const config: RunConfigInput = {};

  const algorithm = env.DUPE_ALGORITHM?.trim();
  if (algorithm) config.algorithm = algorithm;

  const logDir = env.DUPE_LOG_DIR?.trim();
  if (logDir) config.logDir = logDir;

  const concurrency = env.DUPE_HASH_CONCURRENCY?.trim();
  if (concurrency) config.hashConcurrency = Number(concurrency);

  return config;
}

/**
 * Merge layers; a defined value in a later layer replaces an earlier one
 */
export function mergeConfigs(...layers: RunConfigInput[]): RunConfigInput {
  const merged: RunConfigInput = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}

/**
 * Validate the merged settings and freeze them for the run. Throws an
 * AppError for anything that must stop the run before it starts.
 */
export function resolveRunConfig(input: RunConfigInput): RunConfig {
  const scanRoots = input.scanRoots ?? [];
  if (scanRoots.length === 0) {
    throw new AppError('At least one directory must be specified.', 'NO_DIRECTORIES', 400);
  }

  const algorithm = normalizeAlgorithm(input.algorithm ?? DEFAULT_CONFIG.algorithm);

  const hashConcurrency = input.hashConcurrency ?? DEFAULT_CONFIG.hashConcurrency;
  if (!Number.isInteger(hashConcurrency) || hashConcurrency < 1) {
    throw new AppError(`Hash concurrency must be a positive integer: ${hashConcurrency}`, 'INVALID_CONFIG', 400);
  }

  return Object.freeze({
    algorithm,
    scanRoots: Object.freeze([...scanRoots]),
    deleteRoots: Object.freeze([...(input.deleteRoots ?? [])]),
    dryRun: input.dryRun ?? true,
    policy: input.policy ?? 'manual',
    logDir: input.logDir ?? DEFAULT_CONFIG.logDir,
    hashConcurrency,
    exclude: Object.freeze([...(input.exclude ?? DEFAULT_CONFIG.exclude)])
  });
}
