import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';

export async function registerQueueRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/queue', async () => {
    const pending = await opts.queue.listPending();
    return { pending, count: pending.length };
  });
}
