import type { FastifyInstance } from 'fastify';
import { ConfigurationError } from '../../shared/errors.js';
import { isSupervisorAction, SUPERVISOR_ACTIONS } from '../../supervisor/supervisor.js';
import type { RouteOpts } from '../types.js';

export async function registerAgentRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/agents', async () => {
    return { agents: opts.supervisor.list() };
  });

  fastify.get<{ Params: { key: string } }>('/v1/agents/:key', async (req, reply) => {
    try {
      return opts.supervisor.snapshot(req.params.key);
    } catch (err) {
      if (err instanceof ConfigurationError) return reply.status(400).send({ error: err.message });
      throw err;
    }
  });

  fastify.post<{ Params: { key: string; action: string } }>(
    '/v1/agents/:key/:action',
    { config: { rateLimit: { max: 30, timeWindow: '1 minute' } } },
    async (req, reply) => {
      const { key, action } = req.params;
      if (!isSupervisorAction(action)) {
        return reply.status(400).send({ error: `Unknown action: ${action}`, allowed: SUPERVISOR_ACTIONS });
      }
      try {
        const result = opts.supervisor.control(key, action);
        return { ...opts.supervisor.snapshot(key), ok: result.ok, reason: result.reason ?? null };
      } catch (err) {
        if (err instanceof ConfigurationError) return reply.status(400).send({ error: err.message });
        throw err;
      }
    },
  );
}
