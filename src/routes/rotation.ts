import type { FastifyInstance } from 'fastify';
import type { RotationDaemon } from '../services/daemon.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export function registerRotationRoutes(fastify: FastifyInstance, daemon: RotationDaemon) {
  const controller = daemon.controller;

  // Lets short-lived CLI invocations find the daemon that owns a catalog
  fastify.get('/api/v1/health', async () => {
    return { status: 'ok', catalog: controller.kind, uptime: process.uptime() };
  });

  fastify.get<{ Querystring: { history?: string } }>('/api/v1/status', async (request) => {
    const limit = Number(request.query.history ?? 10);
    return {
      ...controller.status(Number.isInteger(limit) && limit >= 0 ? limit : 10),
      daemon: daemon.getStatus(),
    };
  });

  fastify.post('/api/v1/next', async (_request, reply) => {
    try {
      return await daemon.advance();
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Rotation requested over control API failed');
      reply.status(500);
      return { error: errorMessage(err) };
    }
  });

  fastify.post('/api/v1/reset', async (_request, reply) => {
    try {
      const count = await daemon.reset();
      return { count };
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Rescan requested over control API failed');
      reply.status(500);
      return { error: errorMessage(err) };
    }
  });
}
