/**
 * Configuration loader for the snippet server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  AppConfig,
  CorsConfig,
  LogLevel,
  RenderingConfig,
  ServerConfig,
  SnippetsConfig,
} from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Return empty string if no value and no default
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => substituteEnvVarsRecursive(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function requireRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', path, value);
  }
  return value;
}

/**
 * Environment substitution always yields strings, so numbers and booleans
 * written as `${PORT:-3001}` are accepted in their string form too.
 */
function toNumber(value: unknown): unknown {
  return typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value)) ? Number(value) : value;
}

function toBoolean(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// ============================================================================
// Section validators
// ============================================================================

function validateCorsConfig(config: unknown, path: string): Partial<CorsConfig> {
  const c = requireRecord(config, path);
  const result: Partial<CorsConfig> = {};

  const enabled = toBoolean(c.enabled);
  if (enabled !== undefined) {
    if (typeof enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.enabled`, c.enabled);
    }
    result.enabled = enabled;
  }

  if (c.origins !== undefined) {
    const origins = c.origins;
    if (!Array.isArray(origins) || !origins.every((origin): origin is string => typeof origin === 'string')) {
      throw new ConfigValidationError('origins must be an array of strings', `${path}.origins`, origins);
    }
    result.origins = origins;
  }

  return result;
}

function validateServerConfig(config: unknown, path = 'server'): Partial<ServerConfig> {
  const c = requireRecord(config, path);
  const result: Partial<ServerConfig> = {};

  const port = toNumber(c.port);
  if (port !== undefined) {
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, c.port);
    }
    result.port = port;
  }

  if (c.host !== undefined) {
    if (typeof c.host !== 'string') {
      throw new ConfigValidationError('host must be a string', `${path}.host`, c.host);
    }
    result.host = c.host;
  }

  if (c.logLevel !== undefined) {
    if (!isLogLevel(c.logLevel)) {
      throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.logLevel`, c.logLevel);
    }
    result.logLevel = c.logLevel;
  }

  if (c.cors !== undefined) {
    result.cors = { ...structuredClone(DEFAULT_CONFIG.server.cors), ...validateCorsConfig(c.cors, `${path}.cors`) };
  }

  return result;
}

function validateSnippetsConfig(config: unknown, path = 'snippets'): Partial<SnippetsConfig> {
  const c = requireRecord(config, path);
  const result: Partial<SnippetsConfig> = {};

  if (c.directory !== undefined) {
    if (typeof c.directory !== 'string' || c.directory === '') {
      throw new ConfigValidationError('directory must be a non-empty string', `${path}.directory`, c.directory);
    }
    result.directory = c.directory;
  }

  const recursive = toBoolean(c.recursive);
  if (recursive !== undefined) {
    if (typeof recursive !== 'boolean') {
      throw new ConfigValidationError('recursive must be a boolean', `${path}.recursive`, c.recursive);
    }
    result.recursive = recursive;
  }

  return result;
}

function validateRenderingConfig(config: unknown, path = 'rendering'): Partial<RenderingConfig> {
  const c = requireRecord(config, path);
  const result: Partial<RenderingConfig> = {};

  if (c.prefixes !== undefined) {
    const prefixes = requireRecord(c.prefixes, `${path}.prefixes`);
    const validated: Record<string, string> = {};
    for (const [prefix, namespace] of Object.entries(prefixes)) {
      if (!/^[A-Za-z][A-Za-z0-9_-]*$/.test(prefix)) {
        throw new ConfigValidationError('prefix must be a simple name', `${path}.prefixes.${prefix}`, prefix);
      }
      if (typeof namespace !== 'string' || namespace === '') {
        throw new ConfigValidationError('namespace must be a non-empty string', `${path}.prefixes.${prefix}`, namespace);
      }
      validated[prefix] = namespace;
    }
    result.prefixes = validated;
  }

  return result;
}

/**
 * Validate a parsed configuration document and merge it over the defaults.
 *
 * @throws ConfigValidationError naming the first offending path
 */
export function resolveConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (raw === null || raw === undefined) {
    return structuredClone(DEFAULT_CONFIG);
  }

  const c = requireRecord(substituteEnvVarsRecursive(raw, env), '');
  const server = c.server !== undefined ? validateServerConfig(c.server) : {};
  const snippets = c.snippets !== undefined ? validateSnippetsConfig(c.snippets) : {};
  const rendering = c.rendering !== undefined ? validateRenderingConfig(c.rendering) : {};

  const defaults = structuredClone(DEFAULT_CONFIG);
  return {
    server: {
      ...defaults.server,
      ...server,
      cors: { ...defaults.server.cors, ...server.cors },
    },
    snippets: { ...defaults.snippets, ...snippets },
    rendering: {
      prefixes: { ...defaults.rendering.prefixes, ...rendering.prefixes },
    },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return structuredClone(DEFAULT_CONFIG);
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  return resolveConfig(parsed);
}
