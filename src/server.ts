/**
 * Server entry point for the snippet rendering API.
 *
 * This module:
 * - Initializes all components (config, snippet rule sets, renderer)
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { loadAllSnippetSpecs } from './snippet/RuleSpecLoader.js';
import { RuleRegistry, createRuleRegistry } from './snippet/RuleRegistry.js';
import { SnippetRenderer, createSnippetRenderer } from './snippet/SnippetRenderer.js';
import { createSnippetHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ServerOptions } from './api/types.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  appConfig: AppConfig;
  configPath: string;
  registry: RuleRegistry;
  renderer: SnippetRenderer;
  /** Rule files loaded, relative to the snippet directory */
  snippetFiles: string[];
}

/**
 * Initialize all application components.
 *
 * Configuration errors (config.yaml or any rule file) are thrown; the
 * server never starts with a partial rule catalogue.
 */
export async function initializeApp(
  basePath: string,
  options: ServerOptions = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const configPath = process.env.CONFIG_PATH || resolve(basePath, 'config.yaml');
  const appConfig = await loadConfig({ configPath });

  const snippetDir = resolve(basePath, options.snippetsDir ?? appConfig.snippets.directory);
  console.log(`Loading snippet rule sets from: ${snippetDir}`);

  const loadResult = await loadAllSnippetSpecs({
    basePath: snippetDir,
    recursive: appConfig.snippets.recursive,
  });

  const registry = createRuleRegistry(loadResult.ruleSets);
  console.log(`Loaded ${loadResult.files.length} snippet files, ${registry.size} rule sets`);

  const renderer = createSnippetRenderer(registry, {
    prefixes: appConfig.rendering.prefixes,
  });

  console.log(`App initialized`);

  return {
    appConfig,
    configPath,
    registry,
    renderer,
    snippetFiles: loadResult.files,
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  options: ServerOptions = {}
): Promise<ReturnType<typeof Fastify>> {
  const serverConfig = ctx.appConfig.server;

  // Create Fastify instance
  const fastify = Fastify({
    logger: {
      level: options.logLevel ?? serverConfig.logLevel,
    },
  });

  // Register CORS if enabled
  if (options.cors ?? serverConfig.cors.enabled) {
    await fastify.register(cors, {
      origin: serverConfig.cors.origins.includes('*') ? true : serverConfig.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    });
  }

  // Create handlers
  const snippetHandlers = createSnippetHandlers(ctx.registry, ctx.renderer);

  registerRoutes(fastify, {
    snippetHandlers,
    snippetCount: () => ctx.registry.size,
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  options: ServerOptions = {}
): Promise<void> {
  try {
    // Initialize app
    const ctx = await initializeApp(basePath, options);

    // Create server
    const fastify = await createServer(ctx, options);

    const port = options.port ?? ctx.appConfig.server.port;
    const host = options.host ?? ctx.appConfig.server.host;

    // Start listening
    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);
    console.log(`Snippet rule sets loaded: ${ctx.registry.size}`);

    // Handle shutdown
    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env.APP_BASE_PATH || process.cwd();

  await startServer(basePath, {
    ...(process.env.PORT ? { port: parseInt(process.env.PORT, 10) } : {}),
    ...(process.env.HOST ? { host: process.env.HOST } : {}),
  });
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
