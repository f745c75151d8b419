import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ComparisonService } from '../compare/index.js';
import { AppError } from '../errors/index.js';
import { sendError } from '../http/errorReply.js';

export interface ComparisonRouteOptions {
  comparisonService: ComparisonService;
  debug?: boolean;
}

const flagSchema = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase()));

const comparisonQuerySchema = z.object({
  refresh: flagSchema,
  mock: flagSchema,
});

export async function comparisonRoutes(fastify: FastifyInstance, options: ComparisonRouteOptions) {
  const { comparisonService, debug = false } = options;

  fastify.get('/comparison', async (request, reply) => {
    try {
      const query = comparisonQuerySchema.parse(request.query);
      const document = await comparisonService.compareProducts({
        refresh: query.refresh,
        useMock: query.mock,
      });
      if (!document) {
        throw AppError.comparisonUnavailable();
      }
      return document;
    } catch (error) {
      return sendError(request, reply, error, { debug });
    }
  });
}
