import { fastify } from 'fastify';
import { loadConfig, type AppConfig } from '../config/index.js';
import { RepositoryError, SessionNotFoundError } from '../core/errors.js';
import { registry } from '../metrics/index.js';
import { SessionRepository } from '../repositories/sessionRepository.js';
import { getLogger } from '../utils/logging.js';
import { sessionRoutes } from './routes/sessions.js';

export interface ServerOptions {
  config?: AppConfig;
  store?: SessionRepository;
}

export async function buildServer(opts: ServerOptions = {}) {
  const config = opts.config ?? loadConfig();
  const store = opts.store ?? new SessionRepository(config.paths.sessionDir);
  const app = fastify({ logger: getLogger() });

  app.get('/healthz', async () => {
    const sessions = await store.list();
    const active = sessions.filter((s) => s.phase !== 'Done' && s.phase !== 'Failed');
    return {
      status: 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      sessions: {
        count: sessions.length,
        active: active.length,
        interrupted: active.filter((s) => s.interruptedAt).length,
      },
      workers: config.concurrency.workers,
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  await app.register(sessionRoutes(store));

  // Unified error handler (fallback)
  app.setErrorHandler((error, _req, reply) => {
    if (error instanceof SessionNotFoundError) {
      return reply.status(404).send({ error: { code: 'NOT_FOUND', message: error.message } });
    }
    if (error instanceof RepositoryError) {
      return reply
        .status(500)
        .send({ error: { code: 'REPOSITORY_ERROR', message: error.message } });
    }
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  return app;
}
