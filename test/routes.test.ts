import test from 'node:test';
import assert from 'node:assert/strict';

import { buildApp } from '../server/app.js';
import { normalizeExposure } from '../server/services/exposureNormalizer.js';
import type { ExposureAlert, ExposureCell } from '../server/services/exposureTypes.js';
import { buildHealthPayload, buildReadyPayload } from '../server/services/healthService.js';
import { SnapshotStore } from '../server/services/snapshotStore.js';
import type { TokenStatus } from '../server/services/tokenLifecycle.js';

const TOKEN_STATUS: TokenStatus = {
  loaded: true,
  accessIssuedAt: '2025-03-17T14:00:00.000Z',
  accessExpiresAt: '2025-03-17T14:30:00.000Z',
  accessRemainingMs: 600_000,
  refreshIssuedAt: '2025-03-16T14:00:00.000Z',
  refreshExpiresAt: '2025-03-23T14:00:00.000Z',
  refreshRemainingMs: 518_400_000,
  needsRefresh: false,
  canRefresh: true,
  refreshInFlight: false,
  lastRefreshAt: null,
  lastRefreshOutcome: null,
  lastError: null,
};

const CELLS: ExposureCell[] = [
  { instrument: { symbol: 'QQQ', expiry: '2025-03-21' }, strike: 480, gex: -200, vex: -4, spot: 482 },
  { instrument: { symbol: 'SPY', expiry: '2025-03-21' }, strike: 500, gex: 300, vex: 6, spot: 501 },
  { instrument: { symbol: 'SPY', expiry: '2025-03-21' }, strike: 505, gex: -100, vex: -2, spot: 501 },
];

const ALERTS: ExposureAlert[] = [
  {
    symbol: 'QQQ',
    type: 'gex-flip',
    severity: 'critical',
    message: 'QQQ: GEX flipped negative, dealers now amplify moves',
    details: 'Net GEX went from +150 to -200; expect wider ranges and trend acceleration',
  },
  {
    symbol: 'SPY',
    type: 'price-near-wall',
    severity: 'warning',
    message: 'SPY: spot $501.00 within 0.2% of the call wall $500.0',
    details: 'Dealer hedging near the call wall tends to add selling pressure',
  },
];

function setup(options: { publish?: boolean; ready?: boolean } = {}) {
  let nowMs = 1_000;
  const snapshotStore = new SnapshotStore({ now: () => nowMs });
  if (options.publish ?? true) {
    const snapshot = normalizeExposure(CELLS, { sequence: 3, generatedAt: new Date('2025-03-17T14:05:00.000Z') });
    snapshotStore.publish({ ...snapshot, alerts: ALERTS });
  }
  nowMs = 4_000;
  const app = buildApp({
    snapshotStore,
    getTokenStatus: () => TOKEN_STATUS,
    getHealthPayload: () =>
      buildHealthPayload({ isShuttingDown: false, nowIso: '2025-03-17T14:06:00.000Z', uptimeSeconds: 42 }),
    getReadyPayload: () =>
      buildReadyPayload({
        isShuttingDown: false,
        loopRunning: options.ready ?? true,
        loopExitReason: options.ready === false ? 'credential-expired' : null,
        marketOpen: true,
        snapshotSequence: 3,
        snapshotAgeMs: 3_000,
        snapshotStalenessMs: 120_000,
        circuitBreakerInfo: { state: 'CLOSED', consecutiveFailures: 0, cooldownRemainingMs: 0 },
        tokenStatus: TOKEN_STATUS,
        refreshExpiryWarnMs: 24 * 60 * 60 * 1000,
      }),
  });
  return { app, snapshotStore };
}

test('GET /healthz reports liveness', async () => {
  const { app } = setup();
  try {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), {
      status: 'ok',
      timestamp: '2025-03-17T14:06:00.000Z',
      uptimeSeconds: 42,
      shuttingDown: false,
    });
  } finally {
    await app.close();
  }
});

test('GET /readyz is 200 while the loop runs and 503 once it has exited', async () => {
  const running = setup();
  const exited = setup({ ready: false });
  try {
    const ok = await running.app.inject({ method: 'GET', url: '/readyz' });
    assert.equal(ok.statusCode, 200);
    assert.deepEqual(ok.json(), {
      ready: true,
      degraded: false,
      shuttingDown: false,
      loopRunning: true,
      loopExitReason: null,
      marketOpen: true,
      snapshotSequence: 3,
      snapshotAgeMs: 3_000,
      circuitBreaker: 'CLOSED',
      refreshExpiresAt: '2025-03-23T14:00:00.000Z',
    });

    const down = await exited.app.inject({ method: 'GET', url: '/readyz' });
    assert.equal(down.statusCode, 503);
    assert.equal(down.json().loopExitReason, 'credential-expired');
  } finally {
    await running.app.close();
    await exited.app.close();
  }
});

test('GET /api/snapshot is 503 before the first publish', async () => {
  const { app } = setup({ publish: false });
  try {
    const res = await app.inject({ method: 'GET', url: '/api/snapshot' });
    assert.equal(res.statusCode, 503);
    assert.deepEqual(res.json(), { kind: 'no-data', error: 'No snapshot has been published yet' });
  } finally {
    await app.close();
  }
});

test('GET /api/snapshot returns the latest snapshot with its age', async () => {
  const { app, snapshotStore } = setup();
  try {
    const res = await app.inject({ method: 'GET', url: '/api/snapshot' });
    assert.equal(res.statusCode, 200);
    assert.equal(res.headers['x-snapshot-age-ms'], '3000');
    assert.deepEqual(res.json(), JSON.parse(JSON.stringify(snapshotStore.latest())));
    assert.equal(res.json().sequence, 3);
  } finally {
    await app.close();
  }
});

test('GET /api/snapshot/:symbol narrows to one symbol and upper-cases the path', async () => {
  const { app } = setup();
  try {
    const res = await app.inject({ method: 'GET', url: '/api/snapshot/spy' });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.equal(body.symbol, 'SPY');
    assert.deepEqual(
      body.cells.map((cell: { key: string }) => cell.key),
      ['SPY|2025-03-21|500', 'SPY|2025-03-21|505'],
    );
    assert.deepEqual(body.atm, [
      { instrumentKey: 'SPY|2025-03-21', symbol: 'SPY', expiry: '2025-03-21', spot: 501, strike: 500 },
    ]);
    assert.equal(body.levels.maxPositiveGammaStrike, 500);
    assert.equal(body.levels.maxNegativeGammaStrike, 505);
    assert.deepEqual(
      body.alerts.map((alert: { type: string }) => alert.type),
      ['price-near-wall'],
    );
  } finally {
    await app.close();
  }
});

test('GET /api/snapshot/:symbol is 404 for a symbol outside the snapshot and 400 for a malformed one', async () => {
  const { app } = setup();
  try {
    const missing = await app.inject({ method: 'GET', url: '/api/snapshot/IWM' });
    assert.equal(missing.statusCode, 404);
    assert.deepEqual(missing.json(), { error: 'Symbol IWM is not in the latest snapshot' });

    const invalid = await app.inject({ method: 'GET', url: '/api/snapshot/1bad' });
    assert.equal(invalid.statusCode, 400);
    assert.deepEqual(Object.keys(invalid.json()), ['error']);
  } finally {
    await app.close();
  }
});

test('GET /api/levels lists gamma levels per symbol', async () => {
  const { app } = setup();
  try {
    const res = await app.inject({ method: 'GET', url: '/api/levels' });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.equal(body.sequence, 3);
    assert.equal(body.generatedAt, '2025-03-17T14:05:00.000Z');
    assert.deepEqual(
      body.levels.map((level: { symbol: string; netGex: number }) => [level.symbol, level.netGex]),
      [
        ['QQQ', -200],
        ['SPY', 200],
      ],
    );
  } finally {
    await app.close();
  }
});

test('GET /api/alerts lists the alerts of the latest snapshot', async () => {
  const { app } = setup();
  try {
    const res = await app.inject({ method: 'GET', url: '/api/alerts' });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { sequence: 3, generatedAt: '2025-03-17T14:05:00.000Z', alerts: ALERTS });
  } finally {
    await app.close();
  }
});

test('GET /api/alerts is 503 before the first publish', async () => {
  const { app } = setup({ publish: false });
  try {
    const res = await app.inject({ method: 'GET', url: '/api/alerts' });
    assert.equal(res.statusCode, 503);
    assert.deepEqual(res.json(), { kind: 'no-data', error: 'No snapshot has been published yet' });
  } finally {
    await app.close();
  }
});

test('a handler failure is answered with a generic 500', async () => {
  const app = buildApp({
    snapshotStore: {
      latest: () => {
        throw new Error('store unavailable');
      },
      ageMs: () => null,
    },
    getTokenStatus: () => TOKEN_STATUS,
    getHealthPayload: () =>
      buildHealthPayload({ isShuttingDown: false, nowIso: '2025-03-17T14:06:00.000Z', uptimeSeconds: 1 }),
    getReadyPayload: () =>
      buildReadyPayload({
        isShuttingDown: false,
        loopRunning: true,
        loopExitReason: null,
        marketOpen: true,
        snapshotSequence: null,
        snapshotAgeMs: null,
        snapshotStalenessMs: 120_000,
        circuitBreakerInfo: { state: 'CLOSED', consecutiveFailures: 0, cooldownRemainingMs: 0 },
        tokenStatus: TOKEN_STATUS,
        refreshExpiryWarnMs: 24 * 60 * 60 * 1000,
      }),
  });
  try {
    const res = await app.inject({ method: 'GET', url: '/api/snapshot' });
    assert.equal(res.statusCode, 500);
    assert.deepEqual(res.json(), { error: 'Internal server error' });
  } finally {
    await app.close();
  }
});

test('GET /api/token/status exposes both credential clocks', async () => {
  const { app } = setup();
  try {
    const res = await app.inject({ method: 'GET', url: '/api/token/status' });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), TOKEN_STATUS);
  } finally {
    await app.close();
  }
});

test('GET /metrics serves the Prometheus registry', async () => {
  const { app } = setup();
  try {
    await app.inject({ method: 'GET', url: '/healthz' });
    const res = await app.inject({ method: 'GET', url: '/metrics' });
    assert.equal(res.statusCode, 200);
    assert.match(String(res.headers['content-type']), /^text\/plain/);
    assert.match(res.body, /http_requests_total\{method="GET",route="\/healthz",status_code="200"\}/);
  } finally {
    await app.close();
  }
});
