import test from 'node:test';
import assert from 'node:assert/strict';

import type { OptionChainResponse } from '../server/lib/apiSchemas.js';
import {
  CredentialExpiredError,
  CredentialPersistenceError,
  TokenRefreshError,
  buildMalformedPayloadError,
  buildRequestAbortError,
} from '../server/lib/errors.js';
import {
  runExposureCycle,
  startExposureLoop,
  type CycleOutcome,
  type ExposureCycleDeps,
  type ExposureLoopHandle,
} from '../server/orchestrators/exposureCycleOrchestrator.js';
import { createMemoryActivityLog } from '../server/services/activityLog.js';
import type { Credential } from '../server/services/credentialStore.js';
import type { ContractRecord, FetchCycleResult, FetchFailure, RecordsByInstrument } from '../server/services/exposureTypes.js';
import { buildMarketCalendar } from '../server/services/marketHours.js';
import { fetchCycle, type FetchCycleOutput } from '../server/services/optionChainFetcher.js';
import { SnapshotStore } from '../server/services/snapshotStore.js';

// Monday 2025-03-17, 12:00 UTC.
const T0 = Date.parse('2025-03-17T12:00:00.000Z');

const ALWAYS_OPEN = buildMarketCalendar({
  timeZone: 'UTC',
  open: '00:00',
  close: '23:59',
  weekdays: [0, 1, 2, 3, 4, 5, 6],
});
const SUNDAYS_ONLY = buildMarketCalendar({ timeZone: 'UTC', open: '09:30', close: '16:00', weekdays: [0] });

const CREDENTIAL: Credential = {
  accessToken: 'test-access',
  accessIssuedAtMs: T0,
  refreshToken: 'test-refresh',
  refreshIssuedAtMs: T0,
};

function cycleResult(succeeded: string[], failedSymbols: string[] = []): FetchCycleResult {
  return {
    startedAt: new Date(T0).toISOString(),
    finishedAt: new Date(T0).toISOString(),
    succeeded,
    failed: failedSymbols.map((symbol): FetchFailure => ({ symbol, kind: 'timeout', reason: `Option chain ${symbol} timed out after 15000ms` })),
    contractCount: succeeded.length,
    skippedContracts: 0,
  };
}

function spyRecords(side: ContractRecord['side'] = 'CALL'): RecordsByInstrument {
  const instrument = { symbol: 'SPY', expiry: '2025-03-21' };
  const record: ContractRecord = {
    ...instrument,
    side,
    strike: 500,
    openInterest: 10,
    gamma: 0.5,
    vega: 0.25,
    multiplier: 100,
    underlyingSpot: 500,
    quoteTimeMs: T0,
  };
  const records: RecordsByInstrument = new Map();
  records.set('SPY|2025-03-21', { instrument, records: [record] });
  return records;
}

function publishedOutput(unauthorized = false): FetchCycleOutput {
  return { result: cycleResult(['SPY'], unauthorized ? ['QQQ'] : []), records: spyRecords(), unauthorized };
}

interface Harness {
  deps: ExposureCycleDeps;
  store: SnapshotStore;
  activityLog: ReturnType<typeof createMemoryActivityLog>;
  events: string[];
  outcomes: CycleOutcome[];
  advance: (ms: number) => void;
}

function harness(overrides: Partial<ExposureCycleDeps> = {}): Harness {
  let nowMs = T0;
  const now = () => nowMs;
  const store = new SnapshotStore({ now });
  const activityLog = createMemoryActivityLog();
  const events: string[] = [];
  const outcomes: CycleOutcome[] = [];
  const deps: ExposureCycleDeps = {
    tokenManager: {
      getValidCredential: async () => {
        events.push('credential');
        return CREDENTIAL;
      },
      forceRefresh: async (trigger) => {
        const latest = store.latest();
        events.push(`refresh:${trigger}:${latest.kind === 'snapshot' ? latest.sequence : 'none'}`);
        return CREDENTIAL;
      },
    },
    snapshotStore: store,
    calendar: ALWAYS_OPEN,
    getUniverse: () => [{ symbol: 'SPY' }],
    fetchChains: async (universe, credential) => {
      events.push(`fetch:${universe.map((entry) => entry.symbol).join(',')}:${credential.accessToken}`);
      return publishedOutput();
    },
    activityLog,
    now,
    onCycle: (outcome) => outcomes.push(outcome),
    ...overrides,
  };
  return {
    deps,
    store,
    activityLog,
    events,
    outcomes,
    advance: (ms) => {
      nowMs += ms;
    },
  };
}

test('a closed market skips the cycle without touching the credential', async () => {
  const h = harness({ calendar: SUNDAYS_ONLY });

  const outcome = await runExposureCycle(h.deps);

  assert.equal(outcome.status, 'market-closed');
  assert.equal(outcome.status === 'market-closed' ? outcome.session.reason : null, 'weekend');
  assert.deepEqual(h.events, []);
  assert.deepEqual(h.activityLog.entries, []);
  assert.equal(h.store.latest().kind, 'no-data');
});

test('a successful cycle publishes a snapshot and records the cycle', async () => {
  const h = harness();

  const outcome = await runExposureCycle(h.deps);

  assert.deepEqual(h.events, ['credential', 'fetch:SPY:test-access']);
  assert.equal(outcome.status, 'published');
  assert.equal(outcome.status === 'published' ? outcome.sequence : null, 1);
  assert.equal(outcome.status === 'published' ? outcome.cellCount : null, 1);
  const latest = h.store.latest();
  assert.equal(latest.kind, 'snapshot');
  if (latest.kind === 'snapshot') {
    assert.equal(latest.sequence, 1);
    assert.equal(latest.cells[0].key, 'SPY|2025-03-21|500');
    assert.deepEqual(latest.cycle?.succeeded, ['SPY']);
  }
  assert.deepEqual(h.activityLog.entries, [
    {
      type: 'fetch-cycle',
      at: '2025-03-17T12:00:00.000Z',
      durationMs: 0,
      succeeded: 1,
      failed: 0,
      contractCount: 1,
      skippedContracts: 0,
      published: true,
      sequence: 1,
    },
  ]);
  assert.deepEqual(h.outcomes, [outcome]);
});

test('a cycle with no successful symbol keeps the previous snapshot', async () => {
  const h = harness();
  await runExposureCycle(h.deps);

  h.deps.fetchChains = async () => ({ result: cycleResult([], ['SPY']), records: new Map(), unauthorized: false });
  const outcome = await runExposureCycle(h.deps);

  assert.equal(outcome.status, 'empty');
  const latest = h.store.latest();
  assert.equal(latest.kind === 'snapshot' ? latest.sequence : null, 1);
  const last = h.activityLog.entries.at(-1);
  assert.equal(last?.type === 'fetch-cycle' ? last.published : null, false);
  assert.equal(last?.type === 'fetch-cycle' ? last.sequence : null, null);
});

test('an upstream 401 forces a refresh after the partial snapshot is published', async () => {
  const h = harness({
    fetchChains: async () => publishedOutput(true),
  });

  const outcome = await runExposureCycle(h.deps);

  assert.equal(outcome.status, 'published');
  assert.deepEqual(h.events, ['credential', 'refresh:unauthorized:1']);
});

test('a cycle with one failing symbol publishes only the symbols that succeeded', async () => {
  const chain: OptionChainResponse = {
    symbol: 'SPY',
    status: 'SUCCESS',
    underlyingPrice: 500,
    underlying: { quoteTime: T0 },
    callExpDateMap: {
      '2025-03-21:4': { '500.0': [{ putCall: 'CALL', strikePrice: 500, openInterest: 10, gamma: 0.5, vega: 0.25 }] },
    },
    putExpDateMap: {},
  };
  const h = harness({ getUniverse: () => [{ symbol: 'AAA' }, { symbol: 'SPY' }] });
  h.deps.fetchChains = (universe, credential) =>
    fetchCycle(universe, credential, {
      client: {
        fetchOptionChain: async (query) => {
          if (query.symbol === 'AAA') throw buildMalformedPayloadError('Option chain AAA: chain status FAILED');
          return chain;
        },
      },
      activityLog: h.activityLog,
      now: h.deps.now,
      sleep: async () => {},
      timeZone: 'UTC',
    });

  const outcome = await runExposureCycle(h.deps);

  assert.equal(outcome.status, 'published');
  const latest = h.store.latest();
  assert.equal(latest.kind, 'snapshot');
  if (latest.kind === 'snapshot') {
    assert.deepEqual(
      latest.cells.map((cell) => [cell.key, cell.gex.value, cell.vex.value]),
      [['SPY|2025-03-21|500', 1_250_000, 250]],
    );
    assert.deepEqual(
      latest.levels.map((level) => level.symbol),
      ['SPY'],
    );
    assert.deepEqual(latest.cycle?.succeeded, ['SPY']);
  }
  assert.deepEqual(
    h.activityLog.entries.filter((entry) => entry.type === 'fetch-failure'),
    [
      {
        type: 'fetch-failure',
        at: '2025-03-17T12:00:00.000Z',
        symbol: 'AAA',
        kind: 'malformed',
        reason: 'Option chain AAA: chain status FAILED',
      },
    ],
  );
});

test('published snapshots carry alerts raised against the previous snapshot', async () => {
  const h = harness({ alerts: { wallDistancePct: 1 } });

  const first = await runExposureCycle(h.deps);
  h.deps.fetchChains = async () => ({ result: cycleResult(['SPY']), records: spyRecords('PUT'), unauthorized: false });
  const second = await runExposureCycle(h.deps);

  assert.deepEqual(
    first.status === 'published' ? first.alerts.map((alert) => [alert.type, alert.severity]) : null,
    [['price-near-wall', 'warning']],
  );
  const latest = h.store.latest();
  assert.equal(second.status === 'published' ? second.sequence : null, 2);
  assert.deepEqual(
    latest.kind === 'snapshot' ? latest.alerts.map((alert) => alert.message) : null,
    ['SPY: GEX flipped negative, dealers now amplify moves', 'SPY: spot $500.00 within 0.0% of the put wall $500.0'],
  );
  assert.deepEqual(
    h.activityLog.entries.flatMap((entry) =>
      entry.type === 'alert' ? [[entry.sequence, entry.symbol, entry.alertType, entry.severity]] : [],
    ),
    [
      [1, 'SPY', 'price-near-wall', 'warning'],
      [2, 'SPY', 'gex-flip', 'critical'],
      [2, 'SPY', 'price-near-wall', 'warning'],
    ],
  );
});

test('alert detection stays off without alert options', async () => {
  const h = harness();

  const outcome = await runExposureCycle(h.deps);

  assert.deepEqual(outcome.status === 'published' ? outcome.alerts : null, []);
  assert.equal(
    h.activityLog.entries.some((entry) => entry.type === 'alert'),
    false,
  );
});

test('a transient credential failure fails the cycle without ending it fatally', async () => {
  const h = harness({
    tokenManager: {
      getValidCredential: async () => {
        throw new TokenRefreshError('Token refresh failed after 3 attempt(s): upstream 503', 3, null);
      },
      forceRefresh: async () => CREDENTIAL,
    },
  });

  const outcome = await runExposureCycle(h.deps);

  assert.deepEqual(outcome, { status: 'failed', error: 'Token refresh failed after 3 attempt(s): upstream 503' });
  assert.equal(h.store.latest().kind, 'no-data');
});

test('an expired credential propagates out of the cycle', async () => {
  const expired = new CredentialExpiredError('Refresh token expired');
  const h = harness({
    tokenManager: {
      getValidCredential: async () => {
        throw expired;
      },
      forceRefresh: async () => CREDENTIAL,
    },
  });

  await assert.rejects(runExposureCycle(h.deps), (err: unknown) => err === expired);
});

test('the loop keeps a start-to-start cadence', async () => {
  const h = harness();
  const sleeps: number[] = [];
  let handle: ExposureLoopHandle | null = null;
  h.deps.fetchChains = async () => {
    h.advance(300);
    return publishedOutput();
  };

  handle = startExposureLoop({
    deps: h.deps,
    intervalMs: 1_000,
    sleep: async (ms) => {
      sleeps.push(ms);
      if (sleeps.length === 2) handle?.stop();
    },
  });

  const exit = await handle.done;
  assert.deepEqual(sleeps, [700, 700]);
  assert.deepEqual(exit, { reason: 'stopped', cycles: 2 });
  assert.equal(handle.isRunning(), false);
  const latest = h.store.latest();
  assert.equal(latest.kind === 'snapshot' ? latest.sequence : null, 2);
});

test('an overrunning cycle is followed by a zero wait', async () => {
  const h = harness();
  const sleeps: number[] = [];
  let handle: ExposureLoopHandle | null = null;
  h.deps.fetchChains = async () => {
    h.advance(1_500);
    return publishedOutput();
  };

  handle = startExposureLoop({
    deps: h.deps,
    intervalMs: 1_000,
    sleep: async (ms) => {
      sleeps.push(ms);
      handle?.stop();
    },
  });

  await handle.done;
  assert.deepEqual(sleeps, [0]);
});

test('stop interrupts the wait between cycles', async () => {
  const h = harness();
  let firstCycle: () => void = () => {};
  const cycled = new Promise<void>((resolve) => {
    firstCycle = resolve;
  });
  h.deps.onCycle = () => firstCycle();

  const handle = startExposureLoop({
    deps: h.deps,
    intervalMs: 60_000,
    sleep: (_ms, signal) =>
      new Promise<void>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(buildRequestAbortError('Aborted while waiting')), { once: true });
      }),
  });

  await cycled;
  assert.equal(handle.isRunning(), true);
  handle.stop();
  const exit = await handle.done;

  assert.deepEqual(exit, { reason: 'stopped', cycles: 1 });
  assert.deepEqual(h.activityLog.entries.at(-1), { type: 'loop-exit', at: '2025-03-17T12:00:00.000Z', reason: 'stopped' });
});

test('an expired credential ends the loop', async () => {
  const h = harness({
    tokenManager: {
      getValidCredential: async () => {
        throw new CredentialExpiredError('Refresh token expired at 2025-03-24T12:00:00.000Z');
      },
      forceRefresh: async () => CREDENTIAL,
    },
  });

  const handle = startExposureLoop({ deps: h.deps, intervalMs: 1_000, sleep: async () => {} });
  const exit = await handle.done;

  assert.equal(exit.reason, 'credential-expired');
  assert.equal(exit.cycles, 1);
  assert.deepEqual(h.activityLog.entries, [
    {
      type: 'loop-exit',
      at: '2025-03-17T12:00:00.000Z',
      reason: 'credential-expired',
      error: 'Refresh token expired at 2025-03-24T12:00:00.000Z',
    },
  ]);
});

test('a credential that cannot be persisted ends the loop after publishing', async () => {
  const h = harness({
    fetchChains: async () => publishedOutput(true),
  });
  h.deps.tokenManager = {
    getValidCredential: async () => CREDENTIAL,
    forceRefresh: async () => {
      throw new CredentialPersistenceError('Refreshed credential could not be written to /tmp/token.json: EACCES', null);
    },
  };

  const handle = startExposureLoop({ deps: h.deps, intervalMs: 1_000, sleep: async () => {} });
  const exit = await handle.done;

  assert.equal(exit.reason, 'persistence-failed');
  const latest = h.store.latest();
  assert.equal(latest.kind === 'snapshot' ? latest.sequence : null, 1);
});

test('stopping with a fatal credential error reports it as the exit reason', async () => {
  const h = harness();
  const expired = new CredentialExpiredError('Refresh token expired');
  let handle: ExposureLoopHandle | null = null;

  handle = startExposureLoop({
    deps: h.deps,
    intervalMs: 1_000,
    sleep: async () => {
      handle?.stop(expired);
    },
  });
  const exit = await handle.done;

  assert.deepEqual(exit, { reason: 'credential-expired', cycles: 1, error: expired });
});
