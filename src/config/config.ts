// config.ts - diagnostic.config.json loading, defaults and validation
import * as fs from 'fs';
import { ConfigError, errorMessage } from '../common/errors';
import { LogLevel, parseLogLevel } from '../common/logger';
import { isRecord, JsonRecord } from '../monitoring/parse';
import { DEFAULT_QUICK_CATEGORIES, DEFAULT_TIMEOUTS_MS } from '../scan/scan-orchestrator';
import { DEFAULT_SAMPLE_WINDOW_MS, DEFAULT_TOP_PROCESSES } from '../collectors/process-collector';
import { CATEGORIES, Category, ScanMode, isCategory } from '../types';

export const DEFAULT_CONFIG_FILE = './diagnostic.config.json';

export type ReportFormat = 'json' | 'html' | 'text';
const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'html', 'text'];

export interface ScanConfig {
  mode: ScanMode;
  quickCategories: Category[];
  timeoutsMs: Record<Category, number>;
  processSampleWindowMs: number;
  processTopN: number;
  // 'auto' asks the OS; a boolean forces the flag
  elevated: 'auto' | boolean;
}

export interface LoggingConfig {
  dir: string;
  level: LogLevel;
  console: boolean;
}

export interface ReportsConfig {
  dir: string;
  formats: ReportFormat[];
}

export interface ServerConfig {
  enabled: boolean;
  url: string;
  apiKey: string;
  timeoutMs: number;
}

export interface DiagnosticConfig {
  scan: ScanConfig;
  logging: LoggingConfig;
  reports: ReportsConfig;
  server: ServerConfig;
}

export function defaultConfig(): DiagnosticConfig {
  return {
    scan: {
      mode: 'full',
      quickCategories: [...DEFAULT_QUICK_CATEGORIES],
      timeoutsMs: { ...DEFAULT_TIMEOUTS_MS },
      processSampleWindowMs: DEFAULT_SAMPLE_WINDOW_MS,
      processTopN: DEFAULT_TOP_PROCESSES,
      elevated: 'auto',
    },
    logging: {
      dir: './logs',
      level: LogLevel.INFO,
      console: false,
    },
    reports: {
      dir: './reports',
      formats: ['json', 'html'],
    },
    server: {
      enabled: false,
      url: 'http://localhost:8000',
      apiKey: '',
      timeoutMs: 30000,
    },
  };
}

// ============================
// FIELD VALIDATION
// ============================

function section(user: JsonRecord, key: string): JsonRecord {
  const value = user[key];
  if (value === undefined) return {};
  if (!isRecord(value)) throw new ConfigError(`"${key}" must be an object`);
  return value;
}

function str(obj: JsonRecord, key: string, path: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') throw new ConfigError(`${path}.${key} must be a string`);
  return value;
}

function bool(obj: JsonRecord, key: string, path: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw new ConfigError(`${path}.${key} must be true or false`);
  return value;
}

function positiveInt(value: unknown, name: string, allowZero = false): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
    throw new ConfigError(`${name} must be a ${allowZero ? 'non-negative' : 'positive'} integer`);
  }
  return value;
}

function parseMode(value: unknown, fallback: ScanMode): ScanMode {
  if (value === undefined) return fallback;
  if (value === 'quick' || value === 'full') return value;
  throw new ConfigError(`scan.mode must be "quick" or "full", got ${JSON.stringify(value)}`);
}

function parseCategories(value: unknown, fallback: Category[]): Category[] {
  if (value === undefined) return fallback;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError('scan.quickCategories must be a non-empty array');
  }
  const categories: Category[] = [];
  for (const item of value) {
    if (!isCategory(item)) {
      throw new ConfigError(`Unknown category in scan.quickCategories: ${JSON.stringify(item)} (expected one of ${CATEGORIES.join(', ')})`);
    }
    if (!categories.includes(item)) categories.push(item);
  }
  return categories;
}

function parseTimeouts(value: unknown, fallback: Record<Category, number>): Record<Category, number> {
  if (value === undefined) return fallback;
  if (!isRecord(value)) throw new ConfigError('scan.timeoutsMs must be an object');

  const timeouts = { ...fallback };
  for (const [key, ms] of Object.entries(value)) {
    if (!isCategory(key)) throw new ConfigError(`Unknown category in scan.timeoutsMs: ${key}`);
    timeouts[key] = positiveInt(ms, `scan.timeoutsMs.${key}`);
  }
  return timeouts;
}

function parseElevated(value: unknown, fallback: 'auto' | boolean): 'auto' | boolean {
  if (value === undefined) return fallback;
  if (value === 'auto' || typeof value === 'boolean') return value;
  throw new ConfigError('scan.elevated must be "auto", true or false');
}

function parseLevel(value: unknown, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  const level = typeof value === 'string' ? parseLogLevel(value) : undefined;
  if (level === undefined) throw new ConfigError(`logging.level must be one of debug, info, warn, error, critical`);
  return level;
}

function parseFormats(value: unknown, fallback: ReportFormat[]): ReportFormat[] {
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) throw new ConfigError('reports.formats must be an array');
  return value.map(item => {
    const format = REPORT_FORMATS.find(f => f === item);
    if (!format) throw new ConfigError(`Unknown report format: ${JSON.stringify(item)}`);
    return format;
  });
}

/** Merge a parsed config object over the defaults, validating every field it sets. */
export function resolveConfig(user: unknown): DiagnosticConfig {
  if (!isRecord(user)) throw new ConfigError('Configuration must be a JSON object');

  const defaults = defaultConfig();
  const scan = section(user, 'scan');
  const logging = section(user, 'logging');
  const reports = section(user, 'reports');
  const server = section(user, 'server');

  const config: DiagnosticConfig = {
    scan: {
      mode: parseMode(scan.mode, defaults.scan.mode),
      quickCategories: parseCategories(scan.quickCategories, defaults.scan.quickCategories),
      timeoutsMs: parseTimeouts(scan.timeoutsMs, defaults.scan.timeoutsMs),
      processSampleWindowMs: scan.processSampleWindowMs === undefined
        ? defaults.scan.processSampleWindowMs
        : positiveInt(scan.processSampleWindowMs, 'scan.processSampleWindowMs', true),
      processTopN: scan.processTopN === undefined
        ? defaults.scan.processTopN
        : positiveInt(scan.processTopN, 'scan.processTopN'),
      elevated: parseElevated(scan.elevated, defaults.scan.elevated),
    },
    logging: {
      dir: str(logging, 'dir', 'logging', defaults.logging.dir),
      level: parseLevel(logging.level, defaults.logging.level),
      console: bool(logging, 'console', 'logging', defaults.logging.console),
    },
    reports: {
      dir: str(reports, 'dir', 'reports', defaults.reports.dir),
      formats: parseFormats(reports.formats, defaults.reports.formats),
    },
    server: {
      enabled: bool(server, 'enabled', 'server', defaults.server.enabled),
      url: str(server, 'url', 'server', defaults.server.url),
      apiKey: str(server, 'apiKey', 'server', defaults.server.apiKey),
      timeoutMs: server.timeoutMs === undefined
        ? defaults.server.timeoutMs
        : positiveInt(server.timeoutMs, 'server.timeoutMs'),
    },
  };

  if (config.server.enabled && !config.server.url) {
    throw new ConfigError('server.url is required when report upload is enabled');
  }

  if (config.server.enabled && !config.server.apiKey) {
    console.warn('WARNING: Report upload is enabled but API key is empty. Uploads may be rejected.');
  }

  return config;
}

/**
 * Load the config file. A missing file means defaults; a file that exists
 * but cannot be parsed or validated is an error.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_FILE): DiagnosticConfig {
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(error)}`);
  }

  return resolveConfig(parsed);
}
