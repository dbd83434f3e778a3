/**
 * Health routes
 *
 * - GET /health/live  - the process is up
 * - GET /health/ready - the donation config and dataset files can be read (503 otherwise)
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

export const makeHealthRoutes = (deps: GetReadinessDeps): FastifyPluginAsync => {
  const startTime = Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok' });
      }
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const response = await getReadiness(deps, {
          uptime: Math.floor((Date.now() - startTime) / 1000),
          timestamp: new Date().toISOString(),
        });

        if (response.status === 'unhealthy') {
          request.log.warn({ files: response.files }, response.message ?? 'Not ready');
          return reply.status(503).send(response);
        }

        return reply.status(200).send(response);
      }
    );
  };
};
