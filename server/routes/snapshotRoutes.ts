import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';
import type { Snapshot } from '../services/exposureTypes.js';
import type { SnapshotStore } from '../services/snapshotStore.js';
import type { TokenStatus } from '../services/tokenLifecycle.js';
import { normalizeSymbol } from '../services/universe.js';

interface SnapshotRoutesOptions {
  snapshotStore: Pick<SnapshotStore, 'latest' | 'ageMs'>;
  getTokenStatus: () => TokenStatus;
}

const NO_DATA_BODY = { kind: 'no-data', error: 'No snapshot has been published yet' } as const;

/** Cells, ATM strikes, levels and alerts for one symbol; null when it is not in the snapshot. */
export function selectSymbolView(snapshot: Snapshot, symbol: string) {
  const cells = snapshot.cells.filter((cell) => cell.symbol === symbol);
  if (cells.length === 0) return null;
  return {
    kind: snapshot.kind,
    sequence: snapshot.sequence,
    generatedAt: snapshot.generatedAt,
    symbol,
    cells,
    atm: snapshot.atm.filter((atm) => atm.symbol === symbol),
    levels: snapshot.levels.find((level) => level.symbol === symbol) ?? null,
    alerts: snapshot.alerts.filter((alert) => alert.symbol === symbol),
  };
}

export function registerSnapshotRoutes(app: FastifyInstance, options: SnapshotRoutesOptions): void {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();
  const { snapshotStore, getTokenStatus } = options;

  typedApp.get('/api/snapshot', async (_request, reply) => {
    const snapshot = snapshotStore.latest();
    if (snapshot.kind === 'no-data') return reply.code(503).send(NO_DATA_BODY);
    reply.header('x-snapshot-age-ms', String(snapshotStore.ageMs() ?? 0));
    return reply.send(snapshot);
  });

  const symbolParamsSchema = z.object({
    symbol: z
      .string()
      .trim()
      .min(1)
      .max(11)
      .regex(/^\$?[A-Za-z][A-Za-z0-9.]*$/, 'Invalid symbol'),
  });

  typedApp.get(
    '/api/snapshot/:symbol',
    {
      schema: {
        params: symbolParamsSchema,
      },
    },
    async (request, reply) => {
      const snapshot = snapshotStore.latest();
      if (snapshot.kind === 'no-data') return reply.code(503).send(NO_DATA_BODY);
      const symbol = normalizeSymbol(request.params.symbol);
      const view = selectSymbolView(snapshot, symbol);
      if (!view) return reply.code(404).send({ error: `Symbol ${symbol} is not in the latest snapshot` });
      return reply.send(view);
    },
  );

  typedApp.get('/api/levels', async (_request, reply) => {
    const snapshot = snapshotStore.latest();
    if (snapshot.kind === 'no-data') return reply.code(503).send(NO_DATA_BODY);
    return reply.send({
      sequence: snapshot.sequence,
      generatedAt: snapshot.generatedAt,
      levels: snapshot.levels,
    });
  });

  typedApp.get('/api/alerts', async (_request, reply) => {
    const snapshot = snapshotStore.latest();
    if (snapshot.kind === 'no-data') return reply.code(503).send(NO_DATA_BODY);
    return reply.send({
      sequence: snapshot.sequence,
      generatedAt: snapshot.generatedAt,
      alerts: snapshot.alerts,
    });
  });

  typedApp.get('/api/token/status', async (_request, reply) => {
    return reply.send(getTokenStatus());
  });
}
