/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers around the generation service.
 */

import type { FastifyInstance } from 'fastify';
import type { GenerationHandlers } from './handlers/GenerationHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  generationHandlers: GenerationHandlers;
  templateInfo: () => HealthResponse['components']['template'];
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { generationHandlers, templateInfo } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    components: {
      template: templateInfo(),
    },
  }));

  // ============================================================================
  // Protocol Routes
  // ============================================================================

  fastify.post('/protocols/preview', generationHandlers.previewProtocol.bind(generationHandlers));
  fastify.post('/protocols/generate', generationHandlers.generateProtocol.bind(generationHandlers));
}
