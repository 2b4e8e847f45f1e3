/**
 * Configuration loader for Warnarr
 * Loads from YAML config file with environment variable expansion
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';

import { separatorOverlapsItself } from '../warnings/annotate.js';
import { ConfigError, isRecord, type WarnarrConfig } from './types.js';

export const DEFAULT_SEPARATOR = '\n\n———— Content Warnings (via DoesTheDogDie.com) ————';
export const DEFAULT_DTDD_URL = 'https://www.doesthedogdie.com';

const DEFAULT_TTL_SECONDS = 604_800;  // 7 days
const DEFAULT_DELAY_SECONDS = 1.0;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MIN_YES_VOTES = 3;
const DEFAULT_MIN_YES_RATIO = 0.6;

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
export function deepExpand(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(deepExpand);
  if (isRecord(obj)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v);
    }
    return out;
  }
  return expandEnv(obj);
}

/**
 * Deep merge two objects (secrets override config)
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== null && sourceValue !== '') {
      result[key] = sourceValue;
    }
  }

  return result;
}

function firstExisting(candidates: Array<string | undefined>): string | null {
  for (const candidate of candidates) {
    if (candidate && fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

function findConfigFile(baseDir: string, override?: string): string | null {
  return firstExisting([
    override,
    process.env.WARNARR_CONFIG,
    path.join(baseDir, 'config/config.yaml'),
    path.join(baseDir, 'config.yaml'),
    path.join(process.cwd(), 'warnarr.yaml'),
    path.join(process.cwd(), 'config/warnarr.yaml'),
  ]);
}

function findSecretsFile(baseDir: string): string | null {
  return firstExisting([
    process.env.WARNARR_SECRETS,
    path.join(baseDir, 'config/secrets.yaml'),
    path.join(process.cwd(), 'secrets.yaml'),
  ]);
}

function readYaml(filePath: string): Record<string, unknown> {
  const parsed = deepExpand(parse(fs.readFileSync(filePath, 'utf-8')));
  // An empty file parses to null
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${filePath}: expected a mapping at the top level`);
  }
  return parsed;
}

// ──────────────────────────────────────────────────────────────────
// Typed readers
// ──────────────────────────────────────────────────────────────────

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ConfigError(`${key} must be a mapping`);
  return value;
}

function str(obj: Record<string, unknown>, key: string, label: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined || value === null || value === '') return fallback;
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ConfigError(`${label} must be a string`);
  }
  return String(value);
}

function num(obj: Record<string, unknown>, key: string, label: string, fallback: number): number {
  const value = obj[key];
  if (value === undefined || value === null || value === '') return fallback;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) throw new ConfigError(`${label} must be a number (got ${String(value)})`);
  return n;
}

function bool(obj: Record<string, unknown>, key: string, label: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined || value === null || value === '') return fallback;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new ConfigError(`${label} must be true or false`);
}

function strList(obj: Record<string, unknown>, key: string, label: string): string[] {
  const value = obj[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new ConfigError(`${label} must be a list`);
  return value.map(String).filter(v => v.length > 0);
}

export interface ConfigOptions {
  /** Commands that never call DoesTheDogDie.com set this to false */
  requireDtddKey?: boolean;
}

/**
 * Build a validated config from an already-merged raw object.
 * Exported separately so tests need no files on disk.
 */
export function buildConfig(
  raw: Record<string, unknown>,
  baseDir: string,
  opts: ConfigOptions = {}
): WarnarrConfig {
  const dtdd = section(raw, 'dtdd');
  const cache = section(raw, 'cache');
  const jellyfin = section(raw, 'jellyfin');
  const warnings = section(raw, 'warnings');
  const runLog = section(raw, 'runLog');

  const apiKey = str(dtdd, 'apiKey', 'dtdd.apiKey', '').trim();
  if (!apiKey && opts.requireDtddKey !== false) {
    throw new ConfigError('dtdd.apiKey is required (get one from doesthedogdie.com/profile)');
  }

  const config: WarnarrConfig = {
    dtdd: {
      apiKey,
      baseUrl: str(dtdd, 'baseUrl', 'dtdd.baseUrl', DEFAULT_DTDD_URL).replace(/\/$/, ''),
      delaySeconds: num(dtdd, 'delaySeconds', 'dtdd.delaySeconds', DEFAULT_DELAY_SECONDS),
      timeoutMs: num(dtdd, 'timeoutMs', 'dtdd.timeoutMs', DEFAULT_TIMEOUT_MS),
    },
    cache: {
      dbPath: str(cache, 'dbPath', 'cache.dbPath', path.join(baseDir, 'data/warnarr-cache.sqlite')),
      ttlSeconds: num(cache, 'ttlSeconds', 'cache.ttlSeconds', DEFAULT_TTL_SECONDS),
    },
    jellyfin: {
      url: str(jellyfin, 'url', 'jellyfin.url', process.env.JELLYFIN_URL ?? '').replace(/\/$/, ''),
      apiKey: str(jellyfin, 'apiKey', 'jellyfin.apiKey', process.env.JELLYFIN_API_KEY ?? ''),
      userId: str(jellyfin, 'userId', 'jellyfin.userId', ''),
      libraries: strList(jellyfin, 'libraries', 'jellyfin.libraries'),
    },
    warnings: {
      minYesVotes: num(warnings, 'minYesVotes', 'warnings.minYesVotes', DEFAULT_MIN_YES_VOTES),
      minYesRatio: num(warnings, 'minYesRatio', 'warnings.minYesRatio', DEFAULT_MIN_YES_RATIO),
      includeSafeTopics: bool(warnings, 'includeSafeTopics', 'warnings.includeSafeTopics', false),
      separator: str(warnings, 'separator', 'warnings.separator', DEFAULT_SEPARATOR),
    },
    runLog: {
      enabled: bool(runLog, 'enabled', 'runLog.enabled', true),
      dir: str(runLog, 'dir', 'runLog.dir', path.join(baseDir, 'data')),
    },
    dryRun: bool(raw, 'dryRun', 'dryRun', false),
  };

  // Range checks
  if (config.dtdd.delaySeconds < 0) throw new ConfigError('dtdd.delaySeconds must be >= 0');
  if (config.cache.ttlSeconds < 0) throw new ConfigError('cache.ttlSeconds must be >= 0');
  if (!Number.isInteger(config.warnings.minYesVotes) || config.warnings.minYesVotes < 0) {
    throw new ConfigError('warnings.minYesVotes must be a non-negative integer');
  }
  if (config.warnings.minYesRatio < 0 || config.warnings.minYesRatio > 1) {
    throw new ConfigError('warnings.minYesRatio must be between 0 and 1');
  }
  if (!config.warnings.separator.trim()) {
    throw new ConfigError('warnings.separator must not be blank');
  }
  if (separatorOverlapsItself(config.warnings.separator)) {
    throw new ConfigError('warnings.separator must not begin with the same text it ends with');
  }

  return config;
}

/**
 * Load and validate configuration
 */
export function loadConfig(baseDir: string, override?: string, opts: ConfigOptions = {}): WarnarrConfig {
  const configPath = findConfigFile(baseDir, override);

  if (!configPath) {
    throw new ConfigError(
      'No config file found. Create config/config.yaml or set WARNARR_CONFIG env var.'
    );
  }

  let merged = readYaml(configPath);

  // Load secrets file if present and merge with config
  const secretsPath = findSecretsFile(baseDir);
  if (secretsPath) {
    merged = deepMerge(merged, readYaml(secretsPath));
  }

  return buildConfig(merged, baseDir, opts);
}
