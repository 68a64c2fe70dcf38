import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { HealthPayload, ReadyPayload } from '../services/healthService.js';

interface HealthRoutesOptions {
  app: FastifyInstance;
  getHealthPayload: () => HealthPayload;
  getReadyPayload: () => ReadyPayload;
}

function registerHealthRoutes(options: HealthRoutesOptions): void {
  const { app, getHealthPayload, getReadyPayload } = options;

  if (!app) {
    throw new Error('registerHealthRoutes requires app');
  }

  app.get('/healthz', (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send(getHealthPayload());
  });

  app.get('/readyz', async (_req: FastifyRequest, res: FastifyReply) => {
    try {
      const readyPayload = getReadyPayload();
      return res.code(readyPayload.statusCode).send(readyPayload.body);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Ready check failed: ${message}`);
      return res.code(503).send({
        ready: false,
        error: 'Ready check failed',
      });
    }
  });
}

export { registerHealthRoutes };
