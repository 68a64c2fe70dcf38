import type { CircuitBreakerInfo } from '../lib/circuitBreaker.js';
import type { TokenStatus } from './tokenLifecycle.js';

interface HealthPayloadOptions {
  isShuttingDown: boolean;
  nowIso: string;
  uptimeSeconds: number;
}

function buildHealthPayload(options: HealthPayloadOptions) {
  const { isShuttingDown, nowIso, uptimeSeconds } = options;
  return {
    status: 'ok',
    timestamp: nowIso,
    uptimeSeconds,
    shuttingDown: isShuttingDown,
  };
}

interface ReadyPayloadOptions {
  isShuttingDown: boolean;
  loopRunning: boolean;
  loopExitReason: string | null;
  marketOpen: boolean;
  snapshotSequence: number | null;
  snapshotAgeMs: number | null;
  snapshotStalenessMs: number;
  circuitBreakerInfo?: CircuitBreakerInfo | null;
  tokenStatus: TokenStatus;
  refreshExpiryWarnMs: number;
}

function formatHours(ms: number): string {
  return `${Math.max(0, Math.floor(ms / (60 * 60 * 1000)))}h`;
}

function buildReadyPayload(options: ReadyPayloadOptions) {
  const {
    isShuttingDown,
    loopRunning,
    loopExitReason,
    marketOpen,
    snapshotSequence,
    snapshotAgeMs,
    snapshotStalenessMs,
    circuitBreakerInfo,
    tokenStatus,
    refreshExpiryWarnMs,
  } = options;

  const ready = !isShuttingDown && loopRunning;

  // Degraded checks — the loop is up but data or credentials need attention.
  const warnings: string[] = [];
  const cbState = circuitBreakerInfo?.state ?? 'CLOSED';
  if (cbState === 'OPEN') warnings.push('broker circuit breaker is OPEN — option-chain requests are failing');
  if (cbState === 'HALF_OPEN') warnings.push('broker circuit breaker is HALF_OPEN — option-chain requests are recovering');
  if (marketOpen) {
    if (snapshotAgeMs === null) {
      warnings.push('market is open but no snapshot has been published yet');
    } else if (snapshotAgeMs > snapshotStalenessMs) {
      warnings.push(`snapshot is stale — last published ${Math.floor(snapshotAgeMs / 1000)}s ago`);
    }
  }
  if (tokenStatus.refreshRemainingMs !== null && tokenStatus.refreshRemainingMs < refreshExpiryWarnMs) {
    warnings.push(
      `refresh token expires in ${formatHours(tokenStatus.refreshRemainingMs)} (${tokenStatus.refreshExpiresAt ?? 'unknown'})`,
    );
  }
  if (tokenStatus.lastRefreshOutcome && tokenStatus.lastRefreshOutcome !== 'success') {
    warnings.push(`last credential refresh ${tokenStatus.lastRefreshOutcome}: ${tokenStatus.lastError ?? 'unknown error'}`);
  }

  const degraded = warnings.length > 0;
  const statusCode = !ready ? 503 : 200;

  return {
    statusCode,
    body: {
      ready,
      degraded,
      shuttingDown: isShuttingDown,
      loopRunning,
      loopExitReason,
      marketOpen,
      snapshotSequence,
      snapshotAgeMs,
      circuitBreaker: cbState,
      refreshExpiresAt: tokenStatus.refreshExpiresAt,
      warnings: degraded ? warnings : undefined,
    },
  };
}

export type ReadyPayload = ReturnType<typeof buildReadyPayload>;
export type HealthPayload = ReturnType<typeof buildHealthPayload>;

export { buildHealthPayload, buildReadyPayload };
