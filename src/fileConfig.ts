// ============================================================================
// File Config: optional YAML configuration
// ============================================================================
// Loads from $ARANGO_MCP_CONFIG or ~/.arangodb-mcp/config.yaml. Environment
// variables override file values (see config.ts); a missing or broken file
// means "no overrides".
// ============================================================================

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import YAML from 'yaml';
import { logger } from './config.js';

export interface FileConfig {
  arango?: {
    url?: string;
    database?: string;
    username?: string;
    password?: string;
    timeout_sec?: number;
  };
  connection?: {
    retries?: number;
    delay_sec?: number;
  };
  log_level?: string;
  tools?: {
    toolset?: string;
    baseline_count?: number;
  };
}

const DEFAULT_CONFIG_PATH = join(homedir(), '.arangodb-mcp', 'config.yaml');

export function getConfigPath(): string {
  return process.env.ARANGO_MCP_CONFIG || DEFAULT_CONFIG_PATH;
}

// ============================================================================
// Field Readers
// ============================================================================
// YAML gives us `unknown`; keep only values of the expected primitive type.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(section: Record<string, unknown>, key: string): string | undefined {
  const value = section[key];
  return typeof value === 'string' ? value : undefined;
}

function num(section: Record<string, unknown>, key: string): number | undefined {
  const value = section[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = root[key];
  return isRecord(value) ? value : {};
}

/**
 * Parse YAML text into a FileConfig, dropping anything of the wrong type.
 */
export function parseFileConfig(text: string): FileConfig {
  const parsed: unknown = YAML.parse(text);
  if (!isRecord(parsed)) return {};

  const arango = section(parsed, 'arango');
  const connection = section(parsed, 'connection');
  const tools = section(parsed, 'tools');

  return {
    arango: {
      url: str(arango, 'url'),
      database: str(arango, 'database'),
      username: str(arango, 'username'),
      password: str(arango, 'password'),
      timeout_sec: num(arango, 'timeout_sec'),
    },
    connection: {
      retries: num(connection, 'retries'),
      delay_sec: num(connection, 'delay_sec'),
    },
    log_level: str(parsed, 'log_level'),
    tools: {
      toolset: str(tools, 'toolset'),
      baseline_count: num(tools, 'baseline_count'),
    },
  };
}

/**
 * Load the config file. Returns {} if it doesn't exist or is invalid.
 */
export function loadFileConfig(configPath: string = getConfigPath()): FileConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const config = parseFileConfig(readFileSync(configPath, 'utf-8'));
    logger.debug(`Config: loaded ${configPath}`);
    return config;
  } catch (err) {
    logger.warn(`Config: Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
}
