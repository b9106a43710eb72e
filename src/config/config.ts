/**
 * Governance Configuration
 *
 * Builds the single immutable GovernanceConfig of a process from, highest
 * precedence first: environment variables, local .env files, a YAML/JSON
 * config file, built-in defaults. Validation collects every problem and
 * reports them together in one ConfigError.
 *
 * @module config/config
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { isAbsolute, join } from 'path';
import * as yaml from 'yaml';
import { ConfigError, describeError } from '../errors.js';
import type { RetryPolicy } from '../retry/retry-executor.js';
import { parseTimeOfDay } from '../policy/policy-evaluator.js';
import {
  RESOURCE_TYPES,
  isResourceType,
  type AgeThreshold,
  type EnforcementMode,
  type PolicyThreshold,
  type ResourceType,
  type ScheduleThreshold,
  type Severity,
  type TimeWindow,
} from '../types.js';
import { loadEnvironment, type EnvSource } from './credentials.js';

// =============================================================================
// Types
// =============================================================================

export interface ServerConfig {
  url: string;
  tokenName: string;
  tokenSecret: string;
  /** Site content URL; "" audits every site */
  siteScope: string;
  apiVersion: string;
  requestTimeoutMs: number;
  sessionTtlMinutes: number;
}

export interface PolicyThresholds {
  users: AgeThreshold;
  workbooks: AgeThreshold;
  datasources: AgeThreshold;
  sites: AgeThreshold;
  extracts: ScheduleThreshold;
}

export interface PolicyConfig {
  logOnly: boolean;
  thresholds: PolicyThresholds;
}

export interface ScanConfig {
  resourceTypes: ResourceType[];
  pageSize: number;
  concurrency: number;
  deadlineMinutes: number;
  /** Extra passes over a scan whose page fetch exhausted its retries */
  resumeAttempts: number;
}

export interface LoggingConfig {
  dir: string;
  level: Severity;
  maxFileBytes: number;
  maxFiles: number;
}

export type NotificationChannel =
  | { type: 'slack'; webhookUrl: string; minSeverity: Severity }
  | { type: 'webhook'; url: string; minSeverity: Severity }
  | { type: 'log'; minSeverity: Severity };

export interface NotificationsConfig {
  channels: NotificationChannel[];
}

export interface GovernanceConfig {
  server: ServerConfig;
  policy: PolicyConfig;
  scan: ScanConfig;
  retry: RetryPolicy;
  logging: LoggingConfig;
  notifications: NotificationsConfig;
  /** Config file that was read, null when running on env + defaults */
  sourcePath: string | null;
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenConfig = DeepReadonly<GovernanceConfig>;

/** Command-line flags; applied above every other source */
export interface ConfigOverrides {
  siteScope?: string;
  resourceTypes?: readonly string[];
  logOnly?: boolean;
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_THRESHOLD_DAYS = 730;

export const DEFAULT_PEAK_WINDOW: TimeWindow = { start: '08:00', end: '19:00' };

export const CONFIG_FILE_CANDIDATES = ['governance.yaml', 'governance.yml', 'governance.json'];

/** Template values shipped in example files; never valid credentials */
const PLACEHOLDERS: Record<string, string> = {
  url: 'https://your-tableau-server',
  token_name: 'your-pat-name',
  token_secret: 'your-pat-secret',
};

const DEFAULTS = {
  apiVersion: '3.19',
  requestTimeoutMs: 30_000,
  sessionTtlMinutes: 240,
  pageSize: 100,
  concurrency: 4,
  deadlineMinutes: 60,
  resumeAttempts: 1,
  retry: { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30_000, jitterFraction: 0.25 },
  logDir: './logs',
  logLevel: 'info',
  maxFileBytes: 10 * 1024 * 1024,
  maxFiles: 5,
} as const;

// =============================================================================
// Field readers
// =============================================================================

type Raw = Record<string, unknown>;

function isRaw(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads typed fields out of one section, recording problems instead of
 * throwing so every issue is reported at once.
 */
class SectionReader {
  constructor(
    private readonly raw: Raw,
    private readonly path: string,
    private readonly issues: string[],
  ) {}

  section(key: string): SectionReader {
    const value = this.raw[key];
    if (value === undefined || value === null) {
      return new SectionReader({}, this.at(key), this.issues);
    }
    if (!isRaw(value)) {
      this.issues.push(`${this.at(key)} must be a mapping`);
      return new SectionReader({}, this.at(key), this.issues);
    }
    return new SectionReader(value, this.at(key), this.issues);
  }

  string(key: string): string | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    this.issues.push(`${this.at(key)} must be a string`);
    return undefined;
  }

  number(key: string, fallback: number, opts: { min?: number; max?: number; integer?: boolean } = {}): number {
    const value = this.raw[key];
    if (value === undefined || value === null) return fallback;
    return checkNumber(value, this.at(key), fallback, opts, this.issues);
  }

  boolean(key: string): boolean | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'boolean') return value;
    this.issues.push(`${this.at(key)} must be true or false`);
    return undefined;
  }

  list(key: string): unknown[] | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null) return undefined;
    if (Array.isArray(value)) return value;
    this.issues.push(`${this.at(key)} must be a list`);
    return undefined;
  }

  at(key: string): string {
    return this.path ? `${this.path}.${key}` : key;
  }
}

function checkNumber(
  value: unknown,
  path: string,
  fallback: number,
  opts: { min?: number; max?: number; integer?: boolean },
  issues: string[],
): number {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    issues.push(`${path} must be a number`);
    return fallback;
  }
  if (opts.integer && !Number.isInteger(n)) {
    issues.push(`${path} must be an integer`);
    return fallback;
  }
  if (opts.min !== undefined && n < opts.min) {
    issues.push(`${path} must be >= ${opts.min}`);
    return fallback;
  }
  if (opts.max !== undefined && n > opts.max) {
    issues.push(`${path} must be <= ${opts.max}`);
    return fallback;
  }
  return n;
}

export function parseBoolean(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return null;
}

/**
 * Accepts the usual spellings (INFO, Warning, warn).
 */
export function parseSeverity(value: string): Severity | null {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warn') return 'warning';
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warning' || normalized === 'error') {
    return normalized;
  }
  return null;
}

function parseMode(value: string | undefined, path: string, issues: string[]): EnforcementMode {
  if (value === undefined || value === 'log-only') return 'log-only';
  if (value === 'cleanup') return 'cleanup';
  issues.push(`${path} must be "log-only" or "cleanup"`);
  return 'log-only';
}

// =============================================================================
// Sections
// =============================================================================

function readThresholds(policy: SectionReader, issues: string[]): PolicyThresholds {
  const thresholds = policy.section('thresholds');

  const age = (type: AgeThreshold['type']): AgeThreshold => {
    const section = thresholds.section(type);
    return {
      kind: 'age',
      type,
      thresholdDays: section.number('days', DEFAULT_THRESHOLD_DAYS, { min: 1, integer: true }),
      mode: parseMode(section.string('mode'), section.at('mode'), issues),
    };
  };

  const extracts = thresholds.section('extracts');
  const windowSection = extracts.section('peak_window');
  const peakWindow: TimeWindow = {
    start: windowSection.string('start') ?? DEFAULT_PEAK_WINDOW.start,
    end: windowSection.string('end') ?? DEFAULT_PEAK_WINDOW.end,
  };
  for (const key of ['start', 'end'] as const) {
    if (parseTimeOfDay(peakWindow[key]) === null) {
      issues.push(`${windowSection.at(key)} must be a time of day (HH:MM)`);
    }
  }

  return {
    users: age('users'),
    workbooks: age('workbooks'),
    datasources: age('datasources'),
    sites: age('sites'),
    extracts: {
      kind: 'schedule',
      type: 'extracts',
      peakWindow,
      mode: parseMode(extracts.string('mode'), extracts.at('mode'), issues),
    },
  };
}

function readResourceTypes(
  scan: SectionReader,
  fromFlags: readonly string[] | undefined,
  issues: string[],
): ResourceType[] {
  const list = fromFlags ?? scan.list('resource_types');
  if (list === undefined) return [...RESOURCE_TYPES];

  const types: ResourceType[] = [];
  for (const item of list) {
    if (typeof item === 'string' && isResourceType(item)) {
      if (!types.includes(item)) types.push(item);
    } else {
      issues.push(`scan.resource_types: unknown resource type ${JSON.stringify(item)}`);
    }
  }
  if (list.length > 0 && types.length === 0) {
    issues.push('scan.resource_types must name at least one resource type');
  }
  return types.length > 0 ? types : [...RESOURCE_TYPES];
}

function readChannels(
  notifications: SectionReader,
  slackFromEnv: string | undefined,
  issues: string[],
): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  const list = notifications.list('channels') ?? [];

  list.forEach((item, index) => {
    const path = `notifications.channels[${index}]`;
    if (!isRaw(item)) {
      issues.push(`${path} must be a mapping`);
      return;
    }
    const reader = new SectionReader(item, path, issues);
    const severityText = reader.string('min_severity');
    const minSeverity = severityText === undefined ? 'info' : parseSeverity(severityText);
    if (minSeverity === null) {
      issues.push(`${path}.min_severity must be debug, info, warning or error`);
      return;
    }

    const type = reader.string('type');
    if (type === 'slack') {
      const webhookUrl = reader.string('webhook_url');
      if (!webhookUrl) issues.push(`${path}.webhook_url is required for slack channels`);
      else channels.push({ type: 'slack', webhookUrl, minSeverity });
    } else if (type === 'webhook') {
      const url = reader.string('url');
      if (!url) issues.push(`${path}.url is required for webhook channels`);
      else channels.push({ type: 'webhook', url, minSeverity });
    } else if (type === 'log') {
      channels.push({ type: 'log', minSeverity });
    } else {
      issues.push(`${path}.type must be slack, webhook or log`);
    }
  });

  if (slackFromEnv && !channels.some((c) => c.type === 'slack' && c.webhookUrl === slackFromEnv)) {
    channels.push({ type: 'slack', webhookUrl: slackFromEnv, minSeverity: 'info' });
  }
  if (channels.length === 0) {
    channels.push({ type: 'log', minSeverity: 'info' });
  }
  return channels;
}

// =============================================================================
// Build & load
// =============================================================================

export interface BuildConfigOptions {
  sourcePath?: string | null;
  cwd?: string;
  overrides?: ConfigOverrides;
  /** false for commands that only read local logs */
  requireCredentials?: boolean;
}

/**
 * Build a validated config from a parsed file body and merged environment.
 *
 * @throws ConfigError listing every problem found
 */
export function buildConfig(
  fileData: unknown,
  env: EnvSource,
  options: BuildConfigOptions = {},
): FrozenConfig {
  const overrides = options.overrides ?? {};
  const requireCredentials = options.requireCredentials ?? true;
  const issues: string[] = [];

  if (fileData !== undefined && fileData !== null && !isRaw(fileData)) {
    throw new ConfigError('Invalid configuration', ['config file must contain a mapping at the top level']);
  }
  const root = new SectionReader(isRaw(fileData) ? fileData : {}, '', issues);

  // -- server --
  const server = root.section('server');
  const required = (key: 'url' | 'token_name' | 'token_secret', envVar: string): string => {
    const value = env[envVar] ?? server.string(key);
    if (!requireCredentials && (!value || value === PLACEHOLDERS[key])) return '';
    if (!value || value.trim() === '') {
      issues.push(`${envVar} (or server.${key}) must be set`);
      return '';
    }
    if (value === PLACEHOLDERS[key]) {
      issues.push(`${envVar} (or server.${key}) still holds the placeholder "${value}"`);
      return '';
    }
    return value.trim();
  };

  const url = required('url', 'TABLEAU_SERVER_URL');
  if (url !== '' && !/^https?:\/\/[^\s/]+/.test(url)) {
    issues.push(`server.url must be an http(s) URL, got "${url}"`);
  }

  const serverConfig: ServerConfig = {
    url: url.replace(/\/+$/, ''),
    tokenName: required('token_name', 'TABLEAU_TOKEN_NAME'),
    tokenSecret: required('token_secret', 'TABLEAU_TOKEN_SECRET'),
    siteScope: (overrides.siteScope ?? env.TABLEAU_SITE_ID ?? server.string('site_scope') ?? '').trim(),
    apiVersion: server.string('api_version') ?? DEFAULTS.apiVersion,
    requestTimeoutMs: server.number('request_timeout_ms', DEFAULTS.requestTimeoutMs, { min: 1000, integer: true }),
    sessionTtlMinutes: server.number('session_ttl_minutes', DEFAULTS.sessionTtlMinutes, { min: 1, integer: true }),
  };

  // -- policy --
  const policy = root.section('policy');
  let logOnly = policy.boolean('log_only') ?? true;
  if (env.GOVERNANCE_LOG_ONLY !== undefined) {
    const parsed = parseBoolean(env.GOVERNANCE_LOG_ONLY);
    if (parsed === null) issues.push(`GOVERNANCE_LOG_ONLY must be true or false, got "${env.GOVERNANCE_LOG_ONLY}"`);
    else logOnly = parsed;
  }
  if (overrides.logOnly !== undefined) logOnly = overrides.logOnly;
  const policyConfig: PolicyConfig = { logOnly, thresholds: readThresholds(policy, issues) };

  // -- scan --
  const scan = root.section('scan');
  const scanConfig: ScanConfig = {
    resourceTypes: readResourceTypes(scan, overrides.resourceTypes, issues),
    pageSize: scan.number('page_size', DEFAULTS.pageSize, { min: 1, max: 1000, integer: true }),
    concurrency: scan.number('concurrency', DEFAULTS.concurrency, { min: 1, max: 64, integer: true }),
    deadlineMinutes: scan.number('deadline_minutes', DEFAULTS.deadlineMinutes, { min: 1 }),
    resumeAttempts: scan.number('resume_attempts', DEFAULTS.resumeAttempts, { min: 0, max: 10, integer: true }),
  };

  // -- retry --
  const retry = root.section('retry');
  const retryConfig: RetryPolicy = {
    maxAttempts: retry.number('max_attempts', DEFAULTS.retry.maxAttempts, { min: 1, max: 20, integer: true }),
    baseDelayMs: retry.number('base_delay_ms', DEFAULTS.retry.baseDelayMs, { min: 0 }),
    maxDelayMs: retry.number('max_delay_ms', DEFAULTS.retry.maxDelayMs, { min: 0 }),
    jitterFraction: retry.number('jitter', DEFAULTS.retry.jitterFraction, { min: 0, max: 1 }),
  };
  if (retryConfig.maxDelayMs < retryConfig.baseDelayMs) {
    issues.push('retry.max_delay_ms must be >= retry.base_delay_ms');
  }

  // -- logging --
  const logging = root.section('logging');
  const levelText = env.LOG_LEVEL ?? logging.string('level');
  let level: Severity = DEFAULTS.logLevel;
  if (levelText !== undefined) {
    const parsed = parseSeverity(levelText);
    if (parsed === null) issues.push(`LOG_LEVEL (or logging.level) must be debug, info, warning or error`);
    else level = parsed;
  }
  const dir = env.GOVERNANCE_LOG_DIR ?? logging.string('dir') ?? DEFAULTS.logDir;
  const cwd = options.cwd ?? process.cwd();
  const loggingConfig: LoggingConfig = {
    dir: isAbsolute(dir) ? dir : join(cwd, dir),
    level,
    maxFileBytes: logging.number('max_file_bytes', DEFAULTS.maxFileBytes, { min: 1024, integer: true }),
    maxFiles: logging.number('max_files', DEFAULTS.maxFiles, { min: 0, max: 100, integer: true }),
  };

  // -- notifications --
  const notifications: NotificationsConfig = {
    channels: readChannels(root.section('notifications'), env.SLACK_WEBHOOK_URL, issues),
  };

  if (issues.length > 0) {
    throw new ConfigError('Invalid configuration', issues);
  }

  return deepFreeze({
    server: serverConfig,
    policy: policyConfig,
    scan: scanConfig,
    retry: retryConfig,
    logging: loggingConfig,
    notifications,
    sourcePath: options.sourcePath ?? null,
  });
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  env?: EnvSource;
  cwd?: string;
  overrides?: ConfigOverrides;
  requireCredentials?: boolean;
}

/**
 * Load, merge and validate the configuration.
 *
 * @throws ConfigError when the file cannot be read or parsed, or fails validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<FrozenConfig> {
  const cwd = options.cwd ?? process.cwd();
  const { vars } = await loadEnvironment({ env: options.env, cwd });

  let sourcePath: string | null = null;
  if (options.configPath) {
    sourcePath = isAbsolute(options.configPath) ? options.configPath : join(cwd, options.configPath);
    if (!existsSync(sourcePath)) {
      throw new ConfigError(`Config file not found: ${sourcePath}`);
    }
  } else {
    sourcePath = CONFIG_FILE_CANDIDATES.map((name) => join(cwd, name)).find((path) => existsSync(path)) ?? null;
  }

  let fileData: unknown = undefined;
  if (sourcePath) {
    try {
      // YAML is a superset of JSON, one parser covers both
      fileData = yaml.parse(await readFile(sourcePath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Failed to read config file ${sourcePath}`, [describeError(error)]);
    }
  }

  return buildConfig(fileData, vars, {
    sourcePath,
    cwd,
    overrides: options.overrides,
    requireCredentials: options.requireCredentials,
  });
}

// =============================================================================
// Helpers
// =============================================================================

export function deepFreeze<T>(value: T): DeepReadonly<T>;
export function deepFreeze(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function maskSecret(value: string): string {
  if (value === '') return '';
  return value.length <= 4 ? '****' : `${value.slice(0, 2)}****`;
}

/** Mask the path and query of a webhook URL, keeping the host. */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/****`;
  } catch {
    return '****';
  }
}

/**
 * Copy of the config that is safe to print.
 */
export function redactConfig(config: FrozenConfig): Record<string, unknown> {
  return {
    ...config,
    server: { ...config.server, tokenSecret: maskSecret(config.server.tokenSecret) },
    notifications: {
      channels: config.notifications.channels.map((channel) => {
        switch (channel.type) {
          case 'slack':
            return { ...channel, webhookUrl: maskUrl(channel.webhookUrl) };
          case 'webhook':
            return { ...channel, url: maskUrl(channel.url) };
          case 'log':
            return { ...channel };
        }
      }),
    },
  };
}

export function thresholdFor(config: FrozenConfig, type: ResourceType): PolicyThreshold {
  return config.policy.thresholds[type];
}
