/**
 * Server entry point for the protocol generation API.
 *
 * This module:
 * - Loads configuration
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createGenerationHandlers } from './api/handlers/GenerationHandlers.js';
import { registerRoutes } from './api/routes.js';
import type { ServerOptions } from './api/types.js';

/**
 * Application context shared by handlers.
 */
export interface AppContext {
  config: AppConfig;
  configPath?: string | undefined;
}

/**
 * Load configuration and build the application context.
 */
export async function initializeApp(options: { configPath?: string; config?: AppConfig } = {}): Promise<AppContext> {
  if (options.config) {
    return { config: options.config };
  }

  const configPath = options.configPath ?? process.env['CONFIG_PATH'] ?? resolve('config.yaml');
  const config = await loadConfig({ configPath });
  console.log(`Template: ${config.generator.templatePath}`);
  console.log(`Iteration pattern: ${config.generator.iterationPattern}`);
  return { config, configPath };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  options: ServerOptions = {}
): Promise<ReturnType<typeof Fastify>> {
  const serverConfig = ctx.config.server;

  const fastify = Fastify({
    logger: {
      level: options.logLevel ?? serverConfig.logLevel,
    },
  });

  if (serverConfig.cors.enabled) {
    await fastify.register(cors, {
      origin: serverConfig.cors.origins.includes('*') ? true : serverConfig.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  const generationHandlers = createGenerationHandlers(ctx, fastify.log);

  registerRoutes(fastify, {
    generationHandlers,
    templateInfo: () => ({
      path: ctx.config.generator.templatePath,
      marker: ctx.config.generator.template.markerComment,
    }),
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(options: ServerOptions & { configPath?: string } = {}): Promise<void> {
  try {
    const ctx = await initializeApp(options.configPath !== undefined ? { configPath: options.configPath } : {});
    const fastify = await createServer(ctx, options);

    const port = options.port ?? ctx.config.server.port;
    const host = options.host ?? ctx.config.server.host;
    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);

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
