import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { httpRequestDurationSeconds, httpRequestsTotal, metricsRegistry } from './metrics.js';
import { registerHealthRoutes } from './routes/healthRoutes.js';
import { registerMetricsRoutes } from './routes/metricsRoutes.js';
import { registerSnapshotRoutes } from './routes/snapshotRoutes.js';
import type { HealthPayload, ReadyPayload } from './services/healthService.js';
import type { SnapshotStore } from './services/snapshotStore.js';
import type { TokenStatus } from './services/tokenLifecycle.js';

export interface AppOptions {
  snapshotStore: Pick<SnapshotStore, 'latest' | 'ageMs'>;
  getTokenStatus: () => TokenStatus;
  getHealthPayload: () => HealthPayload;
  getReadyPayload: () => ReadyPayload;
}

/**
 * Read-only HTTP surface over the pipeline: health, readiness, the latest
 * snapshot, gamma levels, credential clocks and Prometheus metrics.
 */
export function buildApp(options: AppOptions): FastifyInstance {
  const app = Fastify({ logger: false });
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url ?? 'unmatched';
    const labels = { method: request.method, route, status_code: String(reply.statusCode) };
    httpRequestsTotal.inc(labels);
    httpRequestDurationSeconds.observe(labels, reply.elapsedTime / 1000);
    if (reply.statusCode >= 500) {
      console.warn(`[http] ${request.method} ${request.url} → ${reply.statusCode}`);
    }
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    if (statusCode >= 500) {
      console.error(`[http] ${request.method} ${request.url} failed: ${err.message}`);
      return reply.code(statusCode).send({ error: 'Internal server error' });
    }
    return reply.code(statusCode).send({ error: err.message });
  });

  registerHealthRoutes({
    app,
    getHealthPayload: options.getHealthPayload,
    getReadyPayload: options.getReadyPayload,
  });
  registerSnapshotRoutes(app, { snapshotStore: options.snapshotStore, getTokenStatus: options.getTokenStatus });
  registerMetricsRoutes(app, metricsRegistry);

  return app;
}
