/**
 * QcHandlers: HTTP handlers for running plate and project QC.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';
import type { AppContext } from '../../server.js';
import type { ApiError, PlateQcResponse, ProjectQcResponse } from '../types.js';
import { resolveQcSettings, ConfigValidationError } from '../../config/loader.js';
import type { QcConfig } from '../../config/types.js';
import { QcError } from '../../qc/errors.js';
import { PlateProcessor } from '../../pipeline/PlateProcessor.js';
import { ProjectAggregator } from '../../pipeline/ProjectAggregator.js';
import { cleanedTableCsv } from '../../pipeline/ArtifactWriter.js';
import { plateQcRequestSchema, projectQcRequestSchema, toQcOverrides } from '../schemas.js';

function badRequest(reply: FastifyReply, error: ZodError): ApiError {
  reply.status(400);
  return {
    error: 'BAD_REQUEST',
    message: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
    details: error.issues,
  };
}

function failure(reply: FastifyReply, err: unknown): ApiError {
  if (err instanceof QcError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  if (err instanceof ConfigValidationError) {
    reply.status(400);
    return { error: 'CONFIG_ERROR', message: err.message, details: { path: err.path } };
  }
  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

export function createQcHandlers(ctx: AppContext) {
  return {
    /**
     * GET /qc/settings
     * Effective QC settings from configuration.
     */
    async getSettings(): Promise<{ settings: QcConfig }> {
      return { settings: ctx.config.qc };
    },

    /**
     * POST /qc/plates
     * Run QC over one export supplied as text.
     */
    async runPlate(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<PlateQcResponse | ApiError> {
      const parsed = plateQcRequestSchema.safeParse(request.body);
      if (!parsed.success) return badRequest(reply, parsed.error);
      const body = parsed.data;

      try {
        const settings = resolveQcSettings(ctx.config, toQcOverrides(body.settings));
        const processor = new PlateProcessor(settings, request.log);
        const result = processor.processText(body.content, body.plateId);
        const artifacts = body.write ? await processor.writeArtifacts(result) : undefined;
        return {
          plate: result.plate,
          fits: result.fits,
          lowBead: result.lowBead,
          strategy: result.strategy,
          cleanedCsv: cleanedTableCsv(result.cleaned),
          ...(artifacts ? { artifacts } : {}),
        };
      } catch (err) {
        return failure(reply, err);
      }
    },

    /**
     * POST /qc/projects
     * Run QC over every export in a server-side directory.
     */
    async runProject(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<ProjectQcResponse | ApiError> {
      const parsed = projectQcRequestSchema.safeParse(request.body);
      if (!parsed.success) return badRequest(reply, parsed.error);
      const body = parsed.data;

      try {
        const settings = resolveQcSettings(ctx.config, toQcOverrides(body.settings, body.strict));
        const summary = await new ProjectAggregator(settings, request.log).run(body.directory);
        return { summary };
      } catch (err) {
        return failure(reply, err);
      }
    },
  };
}

export type QcHandlers = ReturnType<typeof createQcHandlers>;
