import type { FileConfig } from './fileConfig.js';

// ============================================================================
// Configuration
// ============================================================================
// Environment variables override the optional YAML file, which overrides
// the defaults below. Read once at startup by server.ts.
// ============================================================================

export type Toolset = 'full' | 'baseline';

export interface Config {
  arangoUrl: string;
  database: string;
  username: string;
  password: string;
  /** Driver request timeout in milliseconds */
  requestTimeoutMs: number;
  connectRetries: number;
  connectDelayMs: number;
  logLevel: LogLevel;
  /** Listing mode: 'baseline' truncates tools/list to the first baselineCount tools */
  toolset: Toolset;
  baselineCount: number;
}

const DEFAULTS = {
  arangoUrl: 'http://localhost:8529',
  database: '_system',
  username: 'root',
  password: '',
  timeoutSec: 30,
  connectRetries: 3,
  connectDelaySec: 1.0,
  toolset: 'full',
  baselineCount: 7,
} as const;

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn(`Config: ${name}="${raw}" is not a number, using ${fallback}`);
    return fallback;
  }
  return value;
}

function parseToolset(raw: string | undefined, fallback: Toolset): Toolset {
  if (raw === undefined || raw === '') return fallback;
  const value = raw.toLowerCase();
  if (value === 'full' || value === 'baseline') return value;
  logger.warn(`Config: unknown toolset "${raw}", using "full"`);
  return 'full';
}

export function getConfig(file: FileConfig = {}): Config {
  const timeoutSec = envNumber('ARANGO_TIMEOUT_SEC', file.arango?.timeout_sec ?? DEFAULTS.timeoutSec);
  const retries = envNumber('ARANGO_CONNECT_RETRIES', file.connection?.retries ?? DEFAULTS.connectRetries);
  const delaySec = envNumber('ARANGO_CONNECT_DELAY_SEC', file.connection?.delay_sec ?? DEFAULTS.connectDelaySec);
  const baselineCount = envNumber('MCP_BASELINE_TOOL_COUNT', file.tools?.baseline_count ?? DEFAULTS.baselineCount);

  return {
    arangoUrl: process.env.ARANGO_URL || file.arango?.url || DEFAULTS.arangoUrl,
    database: process.env.ARANGO_DB || file.arango?.database || DEFAULTS.database,
    username: process.env.ARANGO_USERNAME || file.arango?.username || DEFAULTS.username,
    password: process.env.ARANGO_PASSWORD ?? file.arango?.password ?? DEFAULTS.password,
    requestTimeoutMs: Math.max(0, timeoutSec) * 1000,
    connectRetries: Math.max(1, Math.floor(retries)),
    connectDelayMs: Math.max(0, delaySec) * 1000,
    logLevel: parseLogLevel(process.env.LOG_LEVEL ?? file.log_level),
    toolset: parseToolset(process.env.MCP_COMPAT_TOOLSET, parseToolset(file.tools?.toolset, DEFAULTS.toolset)),
    baselineCount: Math.max(0, Math.floor(baselineCount)),
  };
}

/**
 * Config summary safe to print: the password is never included.
 */
export function describeConfig(config: Config): Record<string, unknown> {
  const { password: _password, ...rest } = config;
  return { ...rest, passwordSet: config.password.length > 0 };
}

// ============================================================================
// Logging
// ============================================================================
// Everything goes to stderr: stdout carries the stdio MCP transport.
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw || 'info').toLowerCase();
  if (value === 'warning') return 'warn';
  return isLogLevel(value) ? value : 'info';
}

let configuredLevel: LogLevel | undefined;

/**
 * Pin the log threshold (server.ts applies Config.logLevel). Without it the
 * threshold follows LOG_LEVEL on every call.
 */
export function setLogLevel(level: LogLevel | undefined): void {
  configuredLevel = level;
}

function emit(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
  const threshold = configuredLevel ?? parseLogLevel(process.env.LOG_LEVEL);
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const stamp = new Date().toISOString();
  console.error(`[arangodb-mcp] ${stamp} ${level.toUpperCase()} ${message}`, ...args);
}

export const logger = {
  debug: (message: string, ...args: unknown[]): void => emit('debug', message, args),
  info: (message: string, ...args: unknown[]): void => emit('info', message, args),
  warn: (message: string, ...args: unknown[]): void => emit('warn', message, args),
  error: (message: string, ...args: unknown[]): void => emit('error', message, args),
};

export function log(message: string, ...args: unknown[]): void {
  emit('info', message, args);
}
