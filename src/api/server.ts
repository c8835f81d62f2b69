import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { isAbsolute, resolve } from 'node:path';
import { FileQueue } from '../queue/file-queue.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { ProcessSupervisor, type SupervisorOptions } from '../supervisor/supervisor.js';
import { loadSettings } from '../workspace/config.js';
import type { Settings } from '../workspace/types.js';
import { registerAgentRoutes } from './routes/agents.js';
import { registerQueueRoutes } from './routes/queue.js';

export const LOOPBACK_ORIGINS = ['http://localhost', 'http://127.0.0.1', 'http://[::1]'];

export interface ServerOptions {
  root?: string;
  settings?: Settings;
  host?: string;
  port?: number;
  /** Process options forwarded to the supervisor (spawn, control, commands). */
  supervisor?: Omit<SupervisorOptions, 'root' | 'settings'>;
}

export function isLoopbackHost(host: string): boolean {
  return host === '127.0.0.1' || host === 'localhost' || host === '::1';
}

export async function createServer(opts: ServerOptions = {}) {
  const root = resolve(opts.root ?? process.cwd());
  const settings = opts.settings ?? loadSettings(root);
  const host = opts.host ?? settings.api.host;
  const port = opts.port ?? settings.api.port;

  if (!isLoopbackHost(host)) {
    logger.warn('Non-loopback bind requested. The supervisor API has no authentication.', { host });
  }

  const supervisor = new ProcessSupervisor({ ...opts.supervisor, root, settings });
  const queueDir = settings.queueDir;
  const queue = new FileQueue(isAbsolute(queueDir) ? queueDir : resolve(root, queueDir));

  const fastify = Fastify({
    logger: false,
    trustProxy: false,
  });

  await fastify.register(cors, {
    origin: LOOPBACK_ORIGINS,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Referrer-Policy', 'no-referrer');
  });

  fastify.addHook('onClose', async () => {
    await supervisor.shutdown();
  });

  fastify.get('/v1/health', async () => {
    return { status: 'ok', pipeline_enabled: settings.pipelineEnabled };
  });

  const routeOpts = { supervisor, queue, settings };
  await registerAgentRoutes(fastify, routeOpts);
  await registerQueueRoutes(fastify, routeOpts);

  return { fastify, host, port, supervisor };
}

export async function startServer(opts: ServerOptions = {}): Promise<void> {
  const { fastify, host, port } = await createServer(opts);

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info('Shutting down API server', { signal });
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Error during shutdown', { error: errorMessage(err) });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await fastify.listen({ host, port });
    logger.info('reelforge API server listening', { host, port, url: `http://${host}:${port}/v1` });
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}
