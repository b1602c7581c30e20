/**
 * Configuration types for the snippet server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

/**
 * Top-level server configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  snippets: SnippetsConfig;
  rendering: RenderingConfig;
}

/**
 * Log levels understood by Fastify's logger.
 */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Where snippet rule files are loaded from.
 */
export interface SnippetsConfig {
  /** Directory containing *.snippet.yaml files, relative to the base path (default: 'snippets') */
  directory: string;
  /** Whether to search subdirectories (default: true) */
  recursive: boolean;
}

/**
 * Rendering settings.
 */
export interface RenderingConfig {
  /** CURIE prefixes added to the built-in ones */
  prefixes: Record<string, string>;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  snippets: {
    directory: 'snippets',
    recursive: true,
  },
  rendering: {
    prefixes: {},
  },
};
