/**
 * Health and control endpoints for a worker process
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { WorkerService } from './service.js';

export interface ServerOptions {
  logger?: boolean;
}

export function buildServer(worker: WorkerService, options: ServerOptions = {}): FastifyInstance {
  const server = Fastify({ logger: options.logger ?? true });

  server.get('/health', async (_request, reply) => {
    const healthy = await worker.healthCheck();
    if (!healthy) {
      return reply.code(503).send({ status: 'unhealthy' });
    }
    return { status: 'healthy' };
  });

  server.get('/ready', async (_request, reply) => {
    if (!worker.running) {
      return reply.code(503).send({ status: 'stopped' });
    }
    return { status: 'ready' };
  });

  server.get('/stats', async () => {
    return worker.getStats();
  });

  // Pause/resume consumption
  server.post('/pause', async () => {
    await worker.pause();
    return { status: 'paused' };
  });

  server.post('/resume', async () => {
    await worker.resume();
    return { status: 'resumed' };
  });

  return server;
}
