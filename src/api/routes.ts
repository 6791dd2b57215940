/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers around the QC pipeline.
 */

import type { FastifyInstance } from 'fastify';
import type { QcHandlers } from './handlers/QcHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  qcHandlers: QcHandlers;
  qcStatus: () => NonNullable<HealthResponse['components']>['qc'];
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { qcHandlers, qcStatus } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    const qc = qcStatus();
    return {
      status: qc?.configured ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      components: qc ? { qc } : {},
    };
  });

  // ============================================================================
  // QC Routes
  // ============================================================================

  fastify.get('/qc/settings', qcHandlers.getSettings.bind(qcHandlers));
  fastify.post('/qc/plates', qcHandlers.runPlate.bind(qcHandlers));
  fastify.post('/qc/projects', qcHandlers.runProject.bind(qcHandlers));
}
