/**
 * Fetcher — pulls one option chain per universe entry through a bounded
 * worker pool and flattens it into validated contract records.
 *
 * Failures are per entry: a timeout, malformed payload, HTTP error or
 * exhausted retry budget excludes that symbol from the cycle and is recorded,
 * the rest of the cycle carries on. A 429 sets a shared pause that every
 * worker honours before its next request. A 401 stops further requests with
 * the rejected token and is reported back so the loop can force a refresh.
 */

import type { OptionChainResponse, OptionContract } from '../lib/apiSchemas.js';
import { addDaysToDateKey, dateKeyFromYmdParts, zonedDateTimeParts } from '../lib/dateUtils.js';
import {
  buildMalformedPayloadError,
  classifyFailure,
  errorMessage,
  isRateLimitedError,
  isTransientError,
  isUnauthorizedError,
} from '../lib/errors.js';
import { mapWithConcurrency } from '../lib/mapWithConcurrency.js';
import type { ActivityLog } from './activityLog.js';
import type { BrokerClient } from './brokerApi.js';
import {
  instrumentKey,
  type ContractRecord,
  type FetchCycleResult,
  type FetchFailure,
  type OptionSide,
  type RecordsByInstrument,
  type UniverseEntry,
} from './exposureTypes.js';

/** Provider placeholder for greeks it could not compute. */
const GREEK_SENTINEL = -999;
const DEFAULT_MULTIPLIER = 100;
const EXPIRY_KEY_PATTERN = /^(\d{4}-\d{2}-\d{2})(?::\d+)?$/;

export interface OptionChainFetcherOptions {
  client: Pick<BrokerClient, 'fetchOptionChain'>;
  activityLog?: ActivityLog | null;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  timeZone?: string;
  concurrency?: number;
  retryAttempts?: number;
  retryBaseMs?: number;
  rateLimitPauseMs?: number;
  strikeCount?: number;
  maxDaysToExpiry?: number;
  onFailure?: (failure: FetchFailure) => void;
}

export interface FetchCycleOutput {
  result: FetchCycleResult;
  records: RecordsByInstrument;
  /** True when the upstream rejected the access token during this cycle. */
  unauthorized: boolean;
}

export interface ExtractedContracts {
  records: ContractRecord[];
  skipped: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, Math.max(0, ms)));

function positiveFinite(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function usableGreek(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value !== GREEK_SENTINEL;
}

export function resolveUnderlyingSpot(chain: OptionChainResponse): number | null {
  const candidates = [chain.underlyingPrice, chain.underlying?.mark, chain.underlying?.last];
  for (const candidate of candidates) {
    if (positiveFinite(candidate)) return candidate;
  }
  return null;
}

/** `"2025-03-21:5"` → `"2025-03-21"`; null when the key is not a date. */
export function parseExpiryKey(key: string): string | null {
  const match = String(key || '').trim().match(EXPIRY_KEY_PATTERN);
  return match ? match[1] : null;
}

function toRecord(
  contract: OptionContract,
  side: OptionSide,
  symbol: string,
  expiry: string,
  spot: number,
  fallbackQuoteMs: number,
): ContractRecord | null {
  const strike = contract.strikePrice;
  const openInterest = contract.openInterest ?? 0;
  const multiplier = contract.multiplier ?? DEFAULT_MULTIPLIER;
  if (!positiveFinite(strike)) return null;
  if (!Number.isFinite(openInterest) || openInterest < 0) return null;
  if (!positiveFinite(multiplier)) return null;
  if (!usableGreek(contract.gamma) || !usableGreek(contract.vega)) return null;
  return {
    symbol,
    expiry,
    side: contract.putCall ?? side,
    strike,
    openInterest,
    gamma: contract.gamma,
    vega: contract.vega,
    multiplier,
    underlyingSpot: spot,
    quoteTimeMs: positiveFinite(contract.quoteTimeInLong) ? contract.quoteTimeInLong : fallbackQuoteMs,
  };
}

/**
 * Flatten a chain into records. Contracts failing validation are counted in
 * `skipped`; expiries outside `entry.expiries` (when given) are ignored.
 */
export function extractContractRecords(
  chain: OptionChainResponse,
  entry: UniverseEntry,
  nowMs: number,
): ExtractedContracts {
  const spot = resolveUnderlyingSpot(chain);
  if (spot === null) {
    throw buildMalformedPayloadError(`Option chain ${entry.symbol}: no usable underlying price`);
  }
  const wantedExpiries = entry.expiries && entry.expiries.length > 0 ? new Set(entry.expiries) : null;
  const underlyingQuoteMs = chain.underlying?.quoteTime;
  const fallbackQuoteMs = positiveFinite(underlyingQuoteMs) ? underlyingQuoteMs : nowMs;
  const records: ContractRecord[] = [];
  let skipped = 0;

  const maps: Array<[OptionSide, OptionChainResponse['callExpDateMap']]> = [
    ['CALL', chain.callExpDateMap],
    ['PUT', chain.putExpDateMap],
  ];
  for (const [side, expDateMap] of maps) {
    for (const [expiryKey, strikes] of Object.entries(expDateMap)) {
      const expiry = parseExpiryKey(expiryKey);
      const contracts = Object.values(strikes).flat();
      if (!expiry) {
        skipped += contracts.length;
        continue;
      }
      if (wantedExpiries && !wantedExpiries.has(expiry)) continue;
      for (const contract of contracts) {
        const record = toRecord(contract, side, entry.symbol, expiry, spot, fallbackQuoteMs);
        if (record) {
          records.push(record);
        } else {
          skipped += 1;
        }
      }
    }
  }
  return { records, skipped };
}

export async function fetchCycle(
  universe: readonly UniverseEntry[],
  credential: { accessToken: string },
  options: OptionChainFetcherOptions,
): Promise<FetchCycleOutput> {
  const {
    client,
    activityLog = null,
    now = Date.now,
    sleep = defaultSleep,
    timeZone = 'America/New_York',
    concurrency = 4,
    retryAttempts = 3,
    retryBaseMs = 2_000,
    rateLimitPauseMs = 5_000,
    strikeCount,
    maxDaysToExpiry = 60,
    onFailure,
  } = options;

  const startedMs = now();
  const todayParts = zonedDateTimeParts(new Date(startedMs), timeZone);
  const fromDate = dateKeyFromYmdParts(todayParts.year, todayParts.month, todayParts.day);
  const toDate = addDaysToDateKey(fromDate, Math.max(0, Math.floor(maxDaysToExpiry)));
  const maxAttempts = Math.max(1, Math.floor(retryAttempts));

  let pauseUntilMs = 0;
  let unauthorized = false;

  const waitForPause = async () => {
    const remainingMs = pauseUntilMs - now();
    if (remainingMs > 0) await sleep(remainingMs);
  };

  const fetchWithRetry = async (entry: UniverseEntry): Promise<OptionChainResponse> => {
    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        return await client.fetchOptionChain(
          { symbol: entry.symbol, strikeCount, fromDate, toDate },
          credential.accessToken,
        );
      } catch (err: unknown) {
        if (isRateLimitedError(err)) {
          pauseUntilMs = Math.max(pauseUntilMs, now() + rateLimitPauseMs);
          console.warn(`[fetcher] Rate limited on ${entry.symbol}; pausing requests for ${rateLimitPauseMs}ms`);
        }
        const circuitOpen = err instanceof Error && err.name === 'CircuitOpenError';
        if (circuitOpen || isUnauthorizedError(err) || !isTransientError(err) || attempt >= maxAttempts) {
          throw err;
        }
        await sleep(retryBaseMs * 2 ** (attempt - 1));
        await waitForPause();
      }
    }
  };

  const settled = await mapWithConcurrency(
    universe,
    concurrency,
    async (entry) => {
      const chain = await fetchWithRetry(entry);
      return extractContractRecords(chain, entry, now());
    },
    {
      beforeEach: waitForPause,
      shouldStop: () => unauthorized,
      onSettled: (result) => {
        if ('error' in result && isUnauthorizedError(result.error)) unauthorized = true;
      },
    },
  );

  const records: RecordsByInstrument = new Map();
  const succeeded: string[] = [];
  const failed: FetchFailure[] = [];
  let contractCount = 0;
  let skippedContracts = 0;

  for (let i = 0; i < universe.length; i++) {
    const entry = universe[i];
    const outcome = settled[i];
    if (outcome === undefined) {
      failed.push({
        symbol: entry.symbol,
        reason: 'Not requested: access token rejected earlier in the cycle',
        kind: 'unauthorized',
      });
      continue;
    }
    if ('error' in outcome) {
      failed.push({ symbol: entry.symbol, reason: errorMessage(outcome.error), kind: classifyFailure(outcome.error) });
      continue;
    }
    succeeded.push(entry.symbol);
    skippedContracts += outcome.skipped;
    contractCount += outcome.records.length;
    for (const record of outcome.records) {
      const instrument = { symbol: record.symbol, expiry: record.expiry };
      const key = instrumentKey(instrument);
      const group = records.get(key);
      if (group) {
        group.records.push(record);
      } else {
        records.set(key, { instrument, records: [record] });
      }
    }
  }

  const finishedMs = now();
  for (const failure of failed) {
    console.warn(`[fetcher] ${failure.symbol} failed (${failure.kind}): ${failure.reason}`);
    onFailure?.(failure);
    if (activityLog) {
      await activityLog.append({
        type: 'fetch-failure',
        at: new Date(finishedMs).toISOString(),
        symbol: failure.symbol,
        kind: failure.kind,
        reason: failure.reason,
      });
    }
  }

  return {
    result: {
      startedAt: new Date(startedMs).toISOString(),
      finishedAt: new Date(finishedMs).toISOString(),
      succeeded,
      failed,
      contractCount,
      skippedContracts,
    },
    records,
    unauthorized,
  };
}
