/**
 * Broker HTTP client — token-bucket rate limiting, per-request timeouts,
 * error classification and a circuit breaker around market-data calls.
 *
 * Two endpoints are used: the OAuth token endpoint (refresh grant) and the
 * option-chain endpoint. Transport stays here; callers only see parsed
 * payloads and classified errors.
 */

import { CircuitBreaker, type CircuitBreakerInfo } from '../lib/circuitBreaker.js';
import { runWithAbortAndTimeout, sleepWithAbort } from '../lib/abort.js';
import {
  OptionChainResponseSchema,
  TokenErrorResponseSchema,
  TokenResponseSchema,
  parseApiResponse,
  type OptionChainResponse,
  type TokenResponse,
} from '../lib/apiSchemas.js';
import {
  buildGrantRejectedError,
  buildHttpError,
  buildMalformedPayloadError,
  buildRateLimitedError,
  buildRequestAbortError,
  isAbortError,
  isRateLimitedError,
  isTaskTimeoutError,
  isTransientError,
  isUnauthorizedError,
  isMalformedPayloadError,
} from '../lib/errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface BrokerRequestEvent {
  endpoint: 'token' | 'chains';
  latencyMs: number;
  ok: boolean;
  status?: number;
  rateLimited?: boolean;
  timedOut?: boolean;
}

export interface BrokerClientOptions {
  baseUrl: string;
  appKey: string;
  appSecret: string;
  timeoutMs?: number;
  maxRequestsPerSecond?: number;
  fetchImpl?: FetchLike;
  now?: () => number;
  onRequest?: (event: BrokerRequestEvent) => void;
}

export interface OptionChainQuery {
  symbol: string;
  strikeCount?: number;
  /** YYYY-MM-DD */
  fromDate?: string;
  /** YYYY-MM-DD */
  toDate?: string;
}

export interface BrokerClient {
  refreshAccessToken: (refreshToken: string, signal?: AbortSignal | null) => Promise<TokenResponse>;
  fetchOptionChain: (
    query: OptionChainQuery,
    accessToken: string,
    signal?: AbortSignal | null,
  ) => Promise<OptionChainResponse>;
  getCircuitBreakerInfo: () => CircuitBreakerInfo;
  resetCircuitBreaker: () => void;
}

// ---------------------------------------------------------------------------
// URL / payload helpers
// ---------------------------------------------------------------------------

export function buildBrokerUrl(
  baseUrl: string,
  path: string,
  params: Record<string, string | number | boolean | undefined | null> = {},
): string {
  const normalizedBase = String(baseUrl || '').replace(/\/+$/, '');
  const normalizedPath = String(path || '').replace(/^\/+/, '');
  const url = new URL(`${normalizedBase}/${normalizedPath}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export function parseJsonSafe(text: unknown): unknown {
  if (typeof text !== 'string' || !text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function extractErrorDetails(payload: unknown, text: string): string {
  if (payload && typeof payload === 'object') {
    const obj = payload as Record<string, unknown>;
    for (const value of [obj.error_description, obj.error, obj.message, obj.errors]) {
      if (typeof value === 'string' && value.trim()) return value.trim();
    }
  }
  return text.trim().slice(0, 180);
}

/**
 * Breaker-relevant failures: timeouts, 5xx, network errors. Rate limits,
 * 401s, malformed payloads and caller aborts come from a reachable upstream.
 */
export function isInfrastructureError(err: unknown): boolean {
  if (isRateLimitedError(err) || isUnauthorizedError(err) || isMalformedPayloadError(err)) return false;
  if (isAbortError(err) && !isTaskTimeoutError(err)) return false;
  return isTransientError(err);
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export function createBrokerClient(options: BrokerClientOptions): BrokerClient {
  const baseUrl = options.baseUrl;
  const timeoutMs = Math.max(1, options.timeoutMs ?? 15_000);
  const maxRps = Math.max(1, options.maxRequestsPerSecond ?? 2);
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const now = options.now ?? Date.now;
  const onRequest = options.onRequest ?? null;
  const basicAuth = Buffer.from(`${options.appKey}:${options.appSecret}`).toString('base64');

  // Token bucket — holds at most one second of burst.
  let rateTokens = maxRps;
  let rateLastRefillMs = now();

  function refillRateTokens(): void {
    const current = now();
    const elapsedMs = Math.max(0, current - rateLastRefillMs);
    if (elapsedMs <= 0) return;
    rateTokens = Math.min(maxRps, rateTokens + (elapsedMs * maxRps) / 1000);
    rateLastRefillMs = current;
  }

  async function acquireRateLimitSlot(signal?: AbortSignal | null): Promise<void> {
    while (true) {
      if (signal && signal.aborted) {
        throw buildRequestAbortError('Request aborted while waiting for broker rate-limit slot');
      }
      refillRateTokens();
      if (rateTokens >= 1) {
        rateTokens -= 1;
        return;
      }
      const waitMs = Math.ceil(((1 - rateTokens) * 1000) / maxRps);
      await sleepWithAbort(Math.max(1, waitMs), signal);
    }
  }

  const circuitBreaker = new CircuitBreaker({
    failureThreshold: 5,
    cooldownMs: 30_000,
    isInfraError: isInfrastructureError,
    now,
    onStateChange: (from, to) => {
      if (to === 'OPEN') {
        console.error(`[circuit-breaker] broker: ${from} → OPEN — option-chain requests blocked`);
      } else if (to === 'HALF_OPEN') {
        console.warn('[circuit-breaker] broker: OPEN → HALF_OPEN — probing recovery');
      } else {
        console.log(`[circuit-breaker] broker: ${from} → CLOSED — option-chain requests resumed`);
      }
    },
  });

  function report(event: BrokerRequestEvent): void {
    if (!onRequest) return;
    try {
      onRequest(event);
    } catch (err: unknown) {
      console.warn(`[broker] request hook failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async function requestJson(
    endpoint: BrokerRequestEvent['endpoint'],
    label: string,
    url: string,
    init: RequestInit,
    signal?: AbortSignal | null,
  ): Promise<{ status: number; ok: boolean; payload: unknown; text: string }> {
    const startedMs = now();
    try {
      const response = await runWithAbortAndTimeout(
        async (taskSignal) => {
          const resp = await fetchImpl(url, { ...init, signal: taskSignal });
          const text = await resp.text();
          return { status: resp.status, ok: resp.ok, payload: parseJsonSafe(text), text };
        },
        { label, signal, timeoutMs },
      );
      report({
        endpoint,
        latencyMs: now() - startedMs,
        ok: response.ok,
        status: response.status,
        rateLimited: response.status === 429,
      });
      return response;
    } catch (err: unknown) {
      report({ endpoint, latencyMs: now() - startedMs, ok: false, timedOut: isTaskTimeoutError(err) });
      throw err;
    }
  }

  async function refreshAccessToken(refreshToken: string, signal?: AbortSignal | null): Promise<TokenResponse> {
    const label = 'Token refresh';
    const url = buildBrokerUrl(baseUrl, '/v1/oauth/token');
    const { status, ok, payload, text } = await requestJson(
      'token',
      label,
      url,
      {
        method: 'POST',
        headers: {
          authorization: `Basic ${basicAuth}`,
          'content-type': 'application/x-www-form-urlencoded',
          accept: 'application/json',
        },
        body: new URLSearchParams({ grant_type: 'refresh_token', refresh_token: refreshToken }).toString(),
      },
      signal,
    );

    if (!ok) {
      const details = extractErrorDetails(payload, text);
      if (status === 429) throw buildRateLimitedError(`${label} request failed (429): ${details || 'Too Many Requests'}`);
      const oauthError = TokenErrorResponseSchema.safeParse(payload);
      const grantRejected =
        (status === 400 || status === 401) &&
        (!oauthError.success || /invalid_grant|unauthorized_client|invalid_token|expired/i.test(oauthError.data.error));
      if (grantRejected) throw buildGrantRejectedError(status, details);
      throw buildHttpError(label, status, details);
    }
    if (payload === null) {
      throw buildMalformedPayloadError(`${label}: response body is not JSON`);
    }
    return parseApiResponse(TokenResponseSchema, payload, label);
  }

  async function fetchOptionChain(
    query: OptionChainQuery,
    accessToken: string,
    signal?: AbortSignal | null,
  ): Promise<OptionChainResponse> {
    const label = `Option chain ${query.symbol}`;
    const url = buildBrokerUrl(baseUrl, '/marketdata/v1/chains', {
      symbol: query.symbol,
      contractType: 'ALL',
      strikeCount: query.strikeCount,
      includeUnderlyingQuote: true,
      fromDate: query.fromDate,
      toDate: query.toDate,
    });

    return circuitBreaker.call(async () => {
      await acquireRateLimitSlot(signal);
      const { status, ok, payload, text } = await requestJson(
        'chains',
        label,
        url,
        { method: 'GET', headers: { authorization: `Bearer ${accessToken}`, accept: 'application/json' } },
        signal,
      );

      if (!ok) {
        const details = extractErrorDetails(payload, text);
        if (status === 429) throw buildRateLimitedError(`${label} request failed (429): ${details || 'Too Many Requests'}`);
        throw buildHttpError(label, status, details);
      }
      if (payload === null) {
        throw buildMalformedPayloadError(`${label}: response body is not JSON`);
      }
      const chain = parseApiResponse(OptionChainResponseSchema, payload, label);
      const chainStatus = String(chain.status || 'SUCCESS').toUpperCase();
      if (chainStatus !== 'SUCCESS') {
        throw buildMalformedPayloadError(`${label}: chain status ${chainStatus}`);
      }
      return chain;
    });
  }

  return {
    refreshAccessToken,
    fetchOptionChain,
    getCircuitBreakerInfo: () => circuitBreaker.getInfo(),
    resetCircuitBreaker: () => circuitBreaker.reset(),
  };
}
