/**
 * GenerationHandlers — HTTP handlers for iteration protocol generation.
 *
 * Provides endpoints:
 * - POST /protocols/preview - Patch a template and return the text
 * - POST /protocols/generate - Patch the configured template and write the file
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../../server.js';
import type { ApiError, GenerateResponse, PreviewResponse } from '../types.js';
import { normalizeCsv, normalizeTable } from '../../batch/BatchNormalizer.js';
import { GenerationError } from '../../generation/errors.js';
import { ProtocolGenerator, type GeneratorLogger } from '../../generation/ProtocolGenerator.js';
import { batchSize, type ExperimentBatch } from '../../types/batch.js';

const batchRequestSchema = z.object({
  rows: z.array(z.record(z.string(), z.unknown())).optional(),
  columns: z.record(z.string(), z.array(z.unknown())).optional(),
  csv: z.string().optional(),
  iteration: z.number().int().nonnegative().optional(),
  sourceName: z.string().min(1).optional(),
});

const previewRequestSchema = batchRequestSchema.extend({
  template: z.string().optional(),
});

type BatchRequest = z.infer<typeof batchRequestSchema>;

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new GenerationError('BAD_REQUEST', message, 400);
  }
  return result.data;
}

function batchFromRequest(body: BatchRequest): ExperimentBatch {
  const provided = [body.rows, body.columns, body.csv].filter((source) => source !== undefined);
  if (provided.length !== 1) {
    throw new GenerationError('BAD_REQUEST', 'Provide exactly one of rows, columns or csv', 400);
  }
  if (body.csv !== undefined) return normalizeCsv(body.csv);
  if (body.rows !== undefined) return normalizeTable(body.rows);
  return normalizeTable(body.columns ?? {});
}

function errorReply(err: unknown, reply: FastifyReply): ApiError {
  if (err instanceof GenerationError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

export function createGenerationHandlers(ctx: AppContext, logger?: GeneratorLogger) {
  const generator = new ProtocolGenerator(ctx.config.generator, logger);

  const iterationFor = (body: BatchRequest): number => {
    if (body.iteration !== undefined) return body.iteration;
    if (body.sourceName !== undefined) return generator.resolveIteration(body.sourceName);
    return 0;
  };

  return {
    /**
     * POST /protocols/preview
     * Patch the supplied (or configured) template without writing anything.
     */
    async previewProtocol(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<PreviewResponse | ApiError> {
      try {
        const body = parseBody(previewRequestSchema, request.body);
        const batch = batchFromRequest(body);
        const iteration = iterationFor(body);
        const templateText = body.template ?? (await generator.readTemplate());
        const result = generator.preview(templateText, batch, iteration);
        return {
          iteration,
          experiments: batchSize(batch),
          relabeled: result.relabeled,
          warnings: result.warnings,
          text: result.text,
        };
      } catch (err) {
        return errorReply(err, reply);
      }
    },

    /**
     * POST /protocols/generate
     * Write the iteration's protocol next to the configured template.
     */
    async generateProtocol(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<GenerateResponse | ApiError> {
      try {
        const body = parseBody(batchRequestSchema, request.body);
        const batch = batchFromRequest(body);
        const artifact = await generator.generateFromBatch(batch, iterationFor(body));
        reply.status(201);
        return { success: true, artifact };
      } catch (err) {
        return errorReply(err, reply);
      }
    },
  };
}

export type GenerationHandlers = ReturnType<typeof createGenerationHandlers>;
