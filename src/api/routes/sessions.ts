import type { FastifyInstance } from 'fastify';
import type { SessionRepository } from '../../repositories/sessionRepository.js';
import { buildReport } from '../../reports/buildReport.js';
import {
  listSessionsQuerySchema,
  redactReport,
  reportQuerySchema,
  toPublicSession,
} from '../schemas/sessionSchemas.js';

export function sessionRoutes(store: SessionRepository) {
  return async function (app: FastifyInstance) {
    app.get('/v1/sessions', async (req, reply) => {
      const parsed = listSessionsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
      }
      const { phase, limit } = parsed.data;
      const all = await store.list();
      const sessions = (phase ? all.filter((s) => s.phase === phase) : all).slice(0, limit);
      return { sessions };
    });

    interface IdParams {
      id: string;
    }
    // SessionNotFoundError surfaces through the shared error handler as 404
    app.get<{ Params: IdParams }>('/v1/sessions/:id', async (req) => {
      const session = await store.get(req.params.id);
      return { session: toPublicSession(session) };
    });

    app.get<{ Params: IdParams }>('/v1/sessions/:id/report', async (req, reply) => {
      const parsed = reportQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
      }
      const report = buildReport(await store.get(req.params.id));
      return { report: parsed.data.includeSecrets ? report : redactReport(report) };
    });
  };
}
