import 'dotenv/config';
import { telemetry } from './server/telemetry.js';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import logger from './server/logger.js';
import {
  ACCESS_TOKEN_TTL_MS,
  ACTIVITY_LOG_PATH,
  ALERT_WALL_DISTANCE_PCT,
  ALERTS_ENABLED,
  BROKER_API_BASE,
  BROKER_APP_KEY,
  BROKER_APP_SECRET,
  BROKER_MAX_REQUESTS_PER_SECOND,
  BROKER_REQUEST_TIMEOUT_MS,
  FETCH_CONCURRENCY,
  FETCH_INTERVAL_MS,
  FETCH_MAX_DAYS_TO_EXPIRY,
  FETCH_RATE_LIMIT_PAUSE_MS,
  FETCH_RETRY_ATTEMPTS,
  FETCH_RETRY_BASE_MS,
  FETCH_STRIKE_COUNT,
  HOST,
  MARKET_CLOSE,
  MARKET_OPEN,
  MARKET_TIMEZONE,
  MAX_SYMBOLS_PER_CYCLE,
  PORT,
  REFRESH_EXPIRY_WARN_MS,
  REFRESH_TOKEN_TTL_MS,
  SNAPSHOT_STALENESS_MS,
  TOKEN_KEEPALIVE_INTERVAL_MS,
  TOKEN_PATH,
  TOKEN_REFRESH_BASE_BACKOFF_MS,
  TOKEN_REFRESH_MARGIN_MS,
  TOKEN_REFRESH_MAX_ATTEMPTS,
  UNIVERSE_FILE,
  UNIVERSE_SYMBOLS,
  validateStartupEnvironment,
} from './server/config.js';
import { buildApp } from './server/app.js';
import { errorMessage } from './server/lib/errors.js';
import { resolveFetchConcurrency } from './server/lib/mapWithConcurrency.js';
import {
  brokerRequestDurationSeconds,
  exposureAlertsTotal,
  exposureCycleDurationSeconds,
  exposureCyclesTotal,
  fetchFailuresTotal,
  recordCredentialExpiry,
  snapshotCellsGauge,
  snapshotSequenceGauge,
  tokenRefreshTotal,
} from './server/metrics.js';
import { startExposureLoop, type LoopExit } from './server/orchestrators/exposureCycleOrchestrator.js';
import { createFileActivityLog } from './server/services/activityLog.js';
import { createBrokerClient } from './server/services/brokerApi.js';
import { createFileCredentialStore } from './server/services/credentialStore.js';
import { buildHealthPayload, buildReadyPayload } from './server/services/healthService.js';
import { describeMarketSession, loadMarketCalendar } from './server/services/marketHours.js';
import { fetchCycle } from './server/services/optionChainFetcher.js';
import { SnapshotStore } from './server/services/snapshotStore.js';
import { startTokenKeepAlive } from './server/services/tokenKeepAlive.js';
import { TokenLifecycleManager } from './server/services/tokenLifecycle.js';
import { loadUniverse } from './server/services/universe.js';

validateStartupEnvironment();

const startedAtMs = Date.now();
let isShuttingDown = false;
let loopExit: LoopExit | null = null;

const calendar = loadMarketCalendar({ timeZone: MARKET_TIMEZONE, open: MARKET_OPEN, close: MARKET_CLOSE });
const universe = loadUniverse({
  symbolList: UNIVERSE_SYMBOLS,
  maxSymbols: MAX_SYMBOLS_PER_CYCLE,
  ...(UNIVERSE_FILE ? { fileUrl: pathToFileURL(path.resolve(UNIVERSE_FILE)) } : {}),
});
const activityLog = createFileActivityLog(ACTIVITY_LOG_PATH);
const snapshotStore = new SnapshotStore();

const broker = createBrokerClient({
  baseUrl: BROKER_API_BASE,
  appKey: BROKER_APP_KEY,
  appSecret: BROKER_APP_SECRET,
  timeoutMs: BROKER_REQUEST_TIMEOUT_MS,
  maxRequestsPerSecond: BROKER_MAX_REQUESTS_PER_SECOND,
  onRequest: (event) => {
    const outcome = event.ok ? 'ok' : event.rateLimited ? 'rate-limited' : event.timedOut ? 'timeout' : 'error';
    brokerRequestDurationSeconds.observe({ endpoint: event.endpoint, outcome }, event.latencyMs / 1000);
  },
});

const tokenManager = new TokenLifecycleManager({
  store: createFileCredentialStore(TOKEN_PATH),
  exchangeRefreshToken: (refreshToken) => broker.refreshAccessToken(refreshToken),
  activityLog,
  accessTtlMs: ACCESS_TOKEN_TTL_MS,
  refreshTtlMs: REFRESH_TOKEN_TTL_MS,
  refreshMarginMs: TOKEN_REFRESH_MARGIN_MS,
  maxAttempts: TOKEN_REFRESH_MAX_ATTEMPTS,
  baseBackoffMs: TOKEN_REFRESH_BASE_BACKOFF_MS,
  onRefresh: (outcome, trigger) => {
    tokenRefreshTotal.inc({ outcome, trigger });
    recordCredentialExpiry(tokenManager.getStatus());
  },
});

const fetchConcurrency = resolveFetchConcurrency(FETCH_CONCURRENCY, BROKER_MAX_REQUESTS_PER_SECOND);

const loop = startExposureLoop({
  intervalMs: FETCH_INTERVAL_MS,
  deps: {
    tokenManager,
    snapshotStore,
    calendar,
    activityLog,
    alerts: ALERTS_ENABLED ? { wallDistancePct: ALERT_WALL_DISTANCE_PCT } : null,
    getUniverse: () => universe,
    fetchChains: (entries, credential) =>
      fetchCycle(entries, credential, {
        client: broker,
        activityLog,
        timeZone: calendar.timeZone,
        concurrency: fetchConcurrency,
        retryAttempts: FETCH_RETRY_ATTEMPTS,
        retryBaseMs: FETCH_RETRY_BASE_MS,
        rateLimitPauseMs: FETCH_RATE_LIMIT_PAUSE_MS,
        strikeCount: FETCH_STRIKE_COUNT,
        maxDaysToExpiry: FETCH_MAX_DAYS_TO_EXPIRY,
        onFailure: (failure) => fetchFailuresTotal.inc({ kind: failure.kind }),
      }),
    onCycle: (outcome, durationMs) => {
      exposureCyclesTotal.inc({ outcome: outcome.status });
      if (outcome.status === 'market-closed') return;
      exposureCycleDurationSeconds.observe(durationMs / 1000);
      if (outcome.status === 'published') {
        snapshotCellsGauge.set(outcome.cellCount);
        snapshotSequenceGauge.set(outcome.sequence);
        for (const alert of outcome.alerts) exposureAlertsTotal.inc({ type: alert.type, severity: alert.severity });
      }
      recordCredentialExpiry(tokenManager.getStatus());
    },
  },
});

const keepAlive = startTokenKeepAlive({
  manager: tokenManager,
  intervalMs: TOKEN_KEEPALIVE_INTERVAL_MS,
  onFatal: (err) => {
    console.error(`[token] Credential can no longer be renewed: ${err.message}`);
    loop.stop(err);
  },
});

void loop.done.then(
  (exit) => {
    loopExit = exit;
    keepAlive.stop();
    if (exit.reason !== 'stopped') {
      console.error(`[cycle] Fetching halted (${exit.reason}); serving the last snapshot until restart`);
    }
  },
  (err: unknown) => {
    loopExit = { reason: 'crashed', cycles: 0, error: err instanceof Error ? err : new Error(String(err)) };
    keepAlive.stop();
    console.error(`[cycle] Loop crashed: ${errorMessage(err)}`);
  },
);

const app = buildApp({
  snapshotStore,
  getTokenStatus: () => tokenManager.getStatus(),
  getHealthPayload: () =>
    buildHealthPayload({
      isShuttingDown,
      nowIso: new Date().toISOString(),
      uptimeSeconds: Math.floor((Date.now() - startedAtMs) / 1000),
    }),
  getReadyPayload: () => {
    const latest = snapshotStore.latest();
    return buildReadyPayload({
      isShuttingDown,
      loopRunning: loop.isRunning(),
      loopExitReason: loopExit ? loopExit.reason : null,
      marketOpen: describeMarketSession(new Date(), calendar).open,
      snapshotSequence: latest.kind === 'snapshot' ? latest.sequence : null,
      snapshotAgeMs: snapshotStore.ageMs(),
      snapshotStalenessMs: SNAPSHOT_STALENESS_MS,
      circuitBreakerInfo: broker.getCircuitBreakerInfo(),
      tokenStatus: tokenManager.getStatus(),
      refreshExpiryWarnMs: REFRESH_EXPIRY_WARN_MS,
    });
  },
});

void (async function startServer() {
  try {
    await app.listen({ port: PORT, host: HOST });
    console.log(`Server running on ${HOST}:${PORT} — ${universe.length} symbols, cycle every ${FETCH_INTERVAL_MS}ms`);
  } catch (err: unknown) {
    console.error(`Fatal: HTTP server failed to start: ${errorMessage(err)}`);
    process.exit(1);
  }
})();

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled promise rejection:', reason);
});
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  void shutdownServer('uncaughtException');
});

async function shutdownServer(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;
  console.log(`Received ${signal}; shutting down gracefully...`);

  keepAlive.stop();
  loop.stop();

  const forceExitTimer = setTimeout(() => {
    console.error('Graceful shutdown timed out; forcing exit');
    process.exit(1);
  }, 15000);
  if (typeof forceExitTimer.unref === 'function') {
    forceExitTimer.unref();
  }

  try {
    // The loop finishes its current cycle before it exits.
    await Promise.allSettled([loop.done]);
    await app.close();
    console.log('HTTP server closed');
    if (telemetry) await telemetry.shutdown();
    console.log('Shutdown complete');
    clearTimeout(forceExitTimer);
    logger.flush();
    process.exit(0);
  } catch (err: unknown) {
    console.error(`Error during shutdown: ${errorMessage(err)}`);
    clearTimeout(forceExitTimer);
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdownServer('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdownServer('SIGINT');
});
