// Node.js built-in modules
import fs from 'node:fs';
import path from 'node:path';

// Third-party dependencies
import yaml from 'js-yaml';

// Local imports
import { ConfigError, errorMessage } from './errors';

// Types
import type { AccountConfig, SyncConfig } from './types';

export const DEFAULT_CONFIG_PATH = '.config.json';
export const DEFAULT_CONCURRENCY = 10;
export const DEFAULT_MAX_RETRIES = 3;

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert snake_case keys to camelCase, leaving camelCase keys untouched
 */
function normalizeKeys(record: RawRecord): RawRecord {
  const normalized: RawRecord = {};
  for (const [key, value] of Object.entries(record)) {
    const camelKey = key.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
    normalized[camelKey] = isRecord(value) ? normalizeKeys(value) : value;
  }
  return normalized;
}

/**
 * Load and parse the sync configuration file
 * @param configPath Path to the configuration file (JSON or YAML)
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): SyncConfig {
  const resolvedPath = path.resolve(configPath);

  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigError(`Configuration file not found: ${resolvedPath}`);
  }

  const fileExt = path.extname(resolvedPath).toLowerCase();
  if (!['.json', '.yaml', '.yml'].includes(fileExt)) {
    throw new ConfigError(`Unsupported configuration file format: ${fileExt || '(none)'}`);
  }

  let raw: unknown;

  try {
    const fileContent = fs.readFileSync(resolvedPath, 'utf-8');
    raw = fileExt === '.json' ? JSON.parse(fileContent) : yaml.load(fileContent);
  } catch (error) {
    throw new ConfigError(`Failed to parse configuration file: ${errorMessage(error)}`, { cause: error });
  }

  return parseConfig(raw);
}

/**
 * Validate a parsed configuration document and apply defaults
 */
export function parseConfig(raw: unknown): SyncConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be an object');
  }

  const doc = normalizeKeys(raw);
  const destination = doc.destination ?? doc.target;

  const config: SyncConfig = {
    source: parseAccount(doc.source, 'Source'),
    destination: parseAccount(destination, 'Destination'),
    concurrency: positiveIntegerOr(doc.concurrency, DEFAULT_CONCURRENCY, 'Concurrency'),
    maxRetries: positiveIntegerOr(doc.maxRetries, DEFAULT_MAX_RETRIES, 'Max retries'),
    skipConfirmation: optionalBoolean(doc.skipConfirmation, 'Skip confirmation') ?? false,
    verbose: optionalBoolean(doc.verbose, 'Verbose') ?? false,
  };

  const prefix = optionalString(doc.prefix, 'Prefix');
  if (prefix) {
    config.prefix = prefix;
  }

  const logFile = optionalString(doc.logFile, 'Log file path');
  if (logFile) {
    config.logFile = logFile;
  }

  const include = optionalPatterns(doc.include, 'Include');
  if (include) {
    config.include = include;
  }

  const exclude = optionalPatterns(doc.exclude, 'Exclude');
  if (exclude) {
    config.exclude = exclude;
  }

  return config;
}

function parseAccount(value: unknown, label: string): AccountConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${label} configuration is missing`);
  }

  const requiredString = (field: 'accessKey' | 'secretKey' | 'region' | 'bucket'): string => {
    const fieldValue = value[field];
    if (typeof fieldValue !== 'string' || fieldValue.trim() === '') {
      throw new ConfigError(`${label} ${field} is missing`);
    }
    return fieldValue;
  };

  const account: AccountConfig = {
    accessKey: requiredString('accessKey'),
    secretKey: requiredString('secretKey'),
    region: requiredString('region'),
    bucket: requiredString('bucket'),
  };

  const endpoint = optionalString(value.endpoint, `${label} endpoint`);
  if (endpoint) {
    account.endpoint = endpoint;
  }

  const forcePathStyle = optionalBoolean(value.forcePathStyle, `${label} forcePathStyle`);
  if (forcePathStyle !== undefined) {
    account.forcePathStyle = forcePathStyle;
  }

  return account;
}

/**
 * Absent, zero or negative values fall back to the default
 */
function positiveIntegerOr(value: unknown, fallback: number, label: string): number {
  if (value === undefined || value === null) {
    return fallback;
  }

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${label} must be a number`);
  }

  // Fractions below one would leave no slot at all
  const whole = Math.floor(value);
  return whole >= 1 ? whole : fallback;
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${label} must be a string`);
  }
  return value;
}

function optionalBoolean(value: unknown, label: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${label} must be a boolean`);
  }
  return value;
}

function optionalPatterns(value: unknown, label: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${label} patterns must be an array of strings`);
  }

  for (const pattern of value) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new ConfigError(`Invalid ${label.toLowerCase()} pattern "${pattern}": ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  return value;
}
