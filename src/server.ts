/**
 * Server entry point for the bead-array QC API.
 *
 * This module:
 * - Loads configuration
 * - Creates the Fastify server with QC routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';

import { loadConfig, mergeWithDefaults } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createLogger } from './logging/logger.js';
import { createQcHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ServerOptions } from './api/types.js';

/**
 * Application context shared by the handlers.
 */
export interface AppContext {
  config: AppConfig;
  configPath?: string | undefined;
}

/**
 * Options for building the application context.
 */
export interface InitializeOptions {
  /** Path to config.yaml (default: CONFIG_PATH or ./config.yaml) */
  configPath?: string;
  /** Use this configuration instead of reading a file */
  config?: AppConfig;
}

/**
 * Initialize the application context.
 */
export async function initializeApp(options: InitializeOptions = {}): Promise<AppContext> {
  if (options.config) {
    return { config: mergeWithDefaults(options.config) };
  }
  const logger = createLogger('info', 'bead-qc-config');
  const config = await loadConfig({
    ...(options.configPath !== undefined ? { configPath: options.configPath } : {}),
    logger,
  });
  return { config, configPath: options.configPath };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  options: ServerOptions = {}
): Promise<ReturnType<typeof Fastify>> {
  const server = ctx.config.server;
  const logLevel = options.logLevel ?? server.logLevel;
  const corsEnabled = options.cors ?? server.cors.enabled;
  const origins = options.origins ?? server.cors.origins;

  // Create Fastify instance
  const fastify = Fastify({
    logger: {
      level: logLevel,
    },
  });

  // Register CORS if enabled
  if (corsEnabled) {
    await fastify.register(cors, {
      origin: origins.includes('*') ? true : origins,
      methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  const qcHandlers = createQcHandlers(ctx);

  // Register API routes with /api prefix
  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      qcHandlers,
      qcStatus: () => ({
        configured: ctx.config.qc.backgroundAnalyte.length > 0,
        backgroundAnalyte: ctx.config.qc.backgroundAnalyte,
        standardAnalytes: ctx.config.qc.standardAnalytes.length,
      }),
    });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(options: InitializeOptions & ServerOptions = {}): Promise<void> {
  try {
    const ctx = await initializeApp(options);
    const fastify = await createServer(ctx, options);

    const port = options.port ?? ctx.config.server.port;
    const host = options.host ?? ctx.config.server.host;
    await fastify.listen({ port, host });

    fastify.log.info(`QC API listening on http://${host}:${port}/api`);

    // Handle shutdown
    const shutdown = async () => {
      fastify.log.info('Shutting down...');
      await fastify.close();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((err: unknown) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const port = process.env.PORT ? parseInt(process.env.PORT, 10) : undefined;
  const host = process.env.HOST;

  await startServer({
    ...(port !== undefined ? { port } : {}),
    ...(host !== undefined ? { host } : {}),
  });
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
