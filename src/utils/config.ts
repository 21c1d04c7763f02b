import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError } from '../types/errors.js';

export interface NavidromeConfig {
  url: string;
  username: string;
  password: string;
  client: string;
  pageSize: number;
  maxWorkers: number;
  // Stop after the first album page (handy for trial runs)
  firstPageOnly: boolean;
}

export interface LastfmConfig {
  apiKey: string;
  apiSecret: string;
  username: string;
  password: string | null;
  passwordHash: string | null;
  sessionKey: string | null;
}

export interface SyncConfig {
  fuzzyThreshold: number; // 0..100
  maxScrobblesPerTrackPerRun: number;
  maxScrobblesPerTrackTotal: number;
  scrobbleDelaySeconds: number;
  maxConsecutiveFailures: number;
}

export interface RetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
}

export interface RetryConfig {
  lookup: RetryPolicy;
  scrobble: RetryPolicy;
  catalog: RetryPolicy;
}

export interface RateLimitBucketConfig {
  maxConcurrent: number;
  minTime: number;
}

export interface RateLimitConfig {
  lastfm: RateLimitBucketConfig;
}

export interface AppConfig {
  dryRun: boolean;
  navidrome: NavidromeConfig;
  lastfm: LastfmConfig;
  sync: SyncConfig;
  retry: RetryConfig;
  rateLimit: RateLimitConfig;
}

export const DEFAULT_SYNC: SyncConfig = {
  fuzzyThreshold: 85,
  maxScrobblesPerTrackPerRun: 5,
  maxScrobblesPerTrackTotal: 100,
  scrobbleDelaySeconds: 1,
  maxConsecutiveFailures: 3,
};

export const DEFAULT_RETRY: RetryConfig = {
  lookup: { maxRetries: 3, initialDelayMs: 1000, backoffFactor: 2 },
  scrobble: { maxRetries: 5, initialDelayMs: 2000, backoffFactor: 2 },
  catalog: { maxRetries: 3, initialDelayMs: 1000, backoffFactor: 2 },
};

type Mapping = Record<string, unknown>;

function isMapping(value: unknown): value is Mapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Mapping, key: string, required: boolean): Mapping {
  const value = root[key];
  if (value === undefined || value === null) {
    if (required) throw new ConfigError(`Invalid configuration: "${key}" section is required.`);
    return {};
  }
  if (!isMapping(value)) {
    throw new ConfigError(`Invalid configuration: "${key}" must be a mapping.`);
  }
  return value;
}

function requireString(m: Mapping, key: string, label: string): string {
  const value = m[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`Invalid configuration: "${label}" must be a non-empty string.`);
  }
  return value.trim();
}

function optionalString(m: Mapping, key: string, label: string): string | null {
  const value = m[key];
  if (value === undefined || value === null || value === '') return null;
  if (typeof value !== 'string') {
    throw new ConfigError(`Invalid configuration: "${label}" must be a string.`);
  }
  return value.trim();
}

function numberOr(m: Mapping, key: string, label: string, fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  const value = m[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || Number.isNaN(value) || value < min || value > max) {
    throw new ConfigError(`Invalid configuration: "${label}" must be a number between ${min} and ${max}.`);
  }
  return value;
}

function integerOr(m: Mapping, key: string, label: string, fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  const value = numberOr(m, key, label, fallback, min, max);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`Invalid configuration: "${label}" must be a whole number.`);
  }
  return value;
}

function booleanOr(m: Mapping, key: string, label: string, fallback: boolean): boolean {
  const value = m[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Invalid configuration: "${label}" must be a boolean.`);
  }
  return value;
}

function retryPolicy(m: Mapping, key: keyof RetryConfig): RetryPolicy {
  const raw = section(m, key, false);
  const fallback = DEFAULT_RETRY[key];
  return {
    maxRetries: integerOr(raw, 'maxRetries', `retry.${key}.maxRetries`, fallback.maxRetries, 1),
    initialDelayMs: numberOr(raw, 'initialDelayMs', `retry.${key}.initialDelayMs`, fallback.initialDelayMs),
    backoffFactor: numberOr(raw, 'backoffFactor', `retry.${key}.backoffFactor`, fallback.backoffFactor, 1),
  };
}

function envOverride(name: string): string | null {
  const v = process.env[name];
  return v && v.trim().length > 0 ? v.trim() : null;
}

// Validates a parsed YAML document and fills in defaults.
export function parseConfig(raw: unknown): AppConfig {
  // Basic runtime shape check to surface obvious issues early
  if (!isMapping(raw)) {
    throw new ConfigError('Invalid configuration: expected a YAML mapping at the root.');
  }

  const nd = section(raw, 'navidrome', true);
  const navidrome: NavidromeConfig = {
    url: requireString(nd, 'url', 'navidrome.url'),
    username: requireString(nd, 'username', 'navidrome.username'),
    password: envOverride('NAVIDROME_PASSWORD') ?? requireString(nd, 'password', 'navidrome.password'),
    client: optionalString(nd, 'client', 'navidrome.client') ?? 'playcount-sync',
    pageSize: integerOr(nd, 'pageSize', 'navidrome.pageSize', 500, 1),
    maxWorkers: integerOr(nd, 'maxWorkers', 'navidrome.maxWorkers', 5, 1),
    firstPageOnly: booleanOr(nd, 'firstPageOnly', 'navidrome.firstPageOnly', false),
  };

  const lf = section(raw, 'lastfm', true);
  const lastfm: LastfmConfig = {
    apiKey: envOverride('LASTFM_API_KEY') ?? requireString(lf, 'apiKey', 'lastfm.apiKey'),
    apiSecret: envOverride('LASTFM_API_SECRET') ?? requireString(lf, 'apiSecret', 'lastfm.apiSecret'),
    username: requireString(lf, 'username', 'lastfm.username'),
    password: optionalString(lf, 'password', 'lastfm.password'),
    passwordHash: optionalString(lf, 'passwordHash', 'lastfm.passwordHash'),
    sessionKey: optionalString(lf, 'sessionKey', 'lastfm.sessionKey'),
  };
  if (!lastfm.password && !lastfm.passwordHash && !lastfm.sessionKey) {
    throw new ConfigError('Invalid configuration: one of lastfm.password, lastfm.passwordHash or lastfm.sessionKey is required.');
  }

  const s = section(raw, 'sync', false);
  const sync: SyncConfig = {
    fuzzyThreshold: numberOr(s, 'fuzzyThreshold', 'sync.fuzzyThreshold', DEFAULT_SYNC.fuzzyThreshold, 0, 100),
    maxScrobblesPerTrackPerRun: integerOr(s, 'maxScrobblesPerTrackPerRun', 'sync.maxScrobblesPerTrackPerRun', DEFAULT_SYNC.maxScrobblesPerTrackPerRun),
    maxScrobblesPerTrackTotal: integerOr(s, 'maxScrobblesPerTrackTotal', 'sync.maxScrobblesPerTrackTotal', DEFAULT_SYNC.maxScrobblesPerTrackTotal),
    scrobbleDelaySeconds: numberOr(s, 'scrobbleDelaySeconds', 'sync.scrobbleDelaySeconds', DEFAULT_SYNC.scrobbleDelaySeconds),
    maxConsecutiveFailures: integerOr(s, 'maxConsecutiveFailures', 'sync.maxConsecutiveFailures', DEFAULT_SYNC.maxConsecutiveFailures, 1),
  };

  const r = section(raw, 'retry', false);
  const retry: RetryConfig = {
    lookup: retryPolicy(r, 'lookup'),
    scrobble: retryPolicy(r, 'scrobble'),
    catalog: retryPolicy(r, 'catalog'),
  };

  const rl = section(section(raw, 'rateLimit', false), 'lastfm', false);
  const rateLimit: RateLimitConfig = {
    lastfm: {
      maxConcurrent: integerOr(rl, 'maxConcurrent', 'rateLimit.lastfm.maxConcurrent', 1, 1),
      minTime: numberOr(rl, 'minTime', 'rateLimit.lastfm.minTime', 250),
    },
  };

  return {
    dryRun: booleanOr(raw, 'dryRun', 'dryRun', false),
    navidrome,
    lastfm,
    sync,
    retry,
    rateLimit,
  };
}

function resolveConfigPath(): string {
  const fromEnv = process.env.CONFIG_PATH;
  if (fromEnv && fromEnv.trim().length > 0) {
    return path.resolve(fromEnv);
  }
  // Assume the app is started from the project root
  return path.resolve(process.cwd(), 'config', 'config.yaml');
}

export function loadConfig(filePath?: string): AppConfig {
  const cfgPath = filePath ? path.resolve(filePath) : resolveConfigPath();
  if (!fs.existsSync(cfgPath)) {
    throw new ConfigError(`Configuration file not found at: ${cfgPath}`);
  }
  const file = fs.readFileSync(cfgPath, 'utf8');
  let raw: unknown;
  try {
    raw = yaml.load(file);
  } catch (err) {
    throw new ConfigError(`Configuration file is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(raw);
}
