/**
 * Cycle loop: market gate → credential → fetch → aggregate → normalize →
 * publish, on a fixed start-to-start cadence.
 *
 * A cycle with some failed symbols still publishes the rest. A cycle with no
 * successful symbol publishes nothing and the previous snapshot stays. A
 * credential that can no longer be refreshed, or a refreshed credential that
 * cannot be persisted, ends the loop; the last snapshot remains readable.
 * With alert options set, each published snapshot carries the alerts raised
 * against the one it replaces.
 */

import { sleepWithAbort } from '../lib/abort.js';
import { errorMessage, isAbortError, isFatalCredentialError } from '../lib/errors.js';
import type { ActivityLog, LoopExitEntry } from '../services/activityLog.js';
import { detectAlerts, type AlertDetectorOptions } from '../services/alertDetector.js';
import type { Credential } from '../services/credentialStore.js';
import { aggregateExposure } from '../services/exposureAggregator.js';
import { normalizeExposure } from '../services/exposureNormalizer.js';
import type { ExposureAlert, FetchCycleResult, UniverseEntry } from '../services/exposureTypes.js';
import { describeMarketSession, type MarketCalendar, type MarketSession } from '../services/marketHours.js';
import type { FetchCycleOutput } from '../services/optionChainFetcher.js';
import type { SnapshotStore } from '../services/snapshotStore.js';
import type { TokenLifecycleManager } from '../services/tokenLifecycle.js';

export type CycleOutcome =
  | { status: 'market-closed'; session: MarketSession }
  | { status: 'published'; sequence: number; cellCount: number; alerts: ExposureAlert[]; result: FetchCycleResult }
  | { status: 'empty'; result: FetchCycleResult }
  | { status: 'failed'; error: string };

export interface ExposureCycleDeps {
  tokenManager: Pick<TokenLifecycleManager, 'getValidCredential' | 'forceRefresh'>;
  snapshotStore: SnapshotStore;
  calendar: MarketCalendar;
  getUniverse: () => readonly UniverseEntry[];
  fetchChains: (universe: readonly UniverseEntry[], credential: Credential) => Promise<FetchCycleOutput>;
  activityLog?: ActivityLog | null;
  /** Alert detection is off when absent. */
  alerts?: AlertDetectorOptions | null;
  now?: () => number;
  onCycle?: (outcome: CycleOutcome, durationMs: number) => void;
}

export type LoopExitReason = LoopExitEntry['reason'];

export interface LoopExit {
  reason: LoopExitReason;
  cycles: number;
  error?: Error;
}

export interface ExposureLoopOptions {
  deps: ExposureCycleDeps;
  intervalMs: number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface ExposureLoopHandle {
  /**
   * Ask the loop to exit at the next cycle boundary. A fatal credential error
   * raised elsewhere (the keep-alive) becomes the exit reason.
   */
  stop: (cause?: Error) => void;
  isRunning: () => boolean;
  done: Promise<LoopExit>;
}

/**
 * Run one cycle. Fatal credential errors propagate; every other failure is
 * reported as a `failed` outcome.
 */
export async function runExposureCycle(deps: ExposureCycleDeps): Promise<CycleOutcome> {
  const now = deps.now ?? Date.now;
  const startedMs = now();
  const finish = (outcome: CycleOutcome): CycleOutcome => {
    deps.onCycle?.(outcome, now() - startedMs);
    return outcome;
  };

  const session = describeMarketSession(new Date(startedMs), deps.calendar);
  if (!session.open) {
    return finish({ status: 'market-closed', session });
  }

  let output: FetchCycleOutput;
  try {
    const credential = await deps.tokenManager.getValidCredential();
    output = await deps.fetchChains(deps.getUniverse(), credential);
  } catch (err: unknown) {
    if (isFatalCredentialError(err)) throw err;
    console.error(`[cycle] Cycle aborted: ${errorMessage(err)}`);
    return finish({ status: 'failed', error: errorMessage(err) });
  }

  const { result, records } = output;
  let outcome: CycleOutcome;
  if (result.succeeded.length === 0) {
    console.warn(`[cycle] No symbol succeeded (${result.failed.length} failed); keeping the previous snapshot`);
    outcome = { status: 'empty', result };
  } else {
    const cells = aggregateExposure(records);
    const normalized = normalizeExposure(cells, {
      sequence: deps.snapshotStore.nextSequence(),
      generatedAt: new Date(now()),
      cycle: result,
    });
    const previous = deps.snapshotStore.latest();
    const alerts = deps.alerts
      ? detectAlerts(normalized.levels, previous.kind === 'snapshot' ? previous.levels : null, deps.alerts)
      : [];
    const snapshot = { ...normalized, alerts };
    deps.snapshotStore.publish(snapshot);
    console.log(
      `[cycle] Published snapshot #${snapshot.sequence}: ${cells.length} cells, ${result.succeeded.length} ok, ${result.failed.length} failed, ${alerts.length} alert(s)`,
    );
    if (deps.activityLog) {
      for (const alert of alerts) {
        await deps.activityLog.append({
          type: 'alert',
          at: snapshot.generatedAt,
          sequence: snapshot.sequence,
          symbol: alert.symbol,
          alertType: alert.type,
          severity: alert.severity,
          message: alert.message,
        });
      }
    }
    outcome = {
      status: 'published',
      sequence: snapshot.sequence,
      cellCount: cells.length,
      alerts,
      result,
    };
  }

  if (deps.activityLog) {
    await deps.activityLog.append({
      type: 'fetch-cycle',
      at: new Date(now()).toISOString(),
      durationMs: now() - startedMs,
      succeeded: result.succeeded.length,
      failed: result.failed.length,
      contractCount: result.contractCount,
      skippedContracts: result.skippedContracts,
      published: outcome.status === 'published',
      sequence: outcome.status === 'published' ? outcome.sequence : null,
    });
  }

  if (output.unauthorized) {
    console.warn('[cycle] Access token rejected upstream; forcing a refresh before the next cycle');
    try {
      await deps.tokenManager.forceRefresh('unauthorized');
    } catch (err: unknown) {
      if (isFatalCredentialError(err)) throw err;
      console.error(`[cycle] Forced refresh failed: ${errorMessage(err)}`);
    }
  }

  return finish(outcome);
}

function exitReasonFor(err: unknown): LoopExitReason {
  return err instanceof Error && err.name === 'CredentialPersistenceError' ? 'persistence-failed' : 'credential-expired';
}

export function startExposureLoop(options: ExposureLoopOptions): ExposureLoopHandle {
  const { deps, intervalMs } = options;
  const now = deps.now ?? Date.now;
  const sleep = options.sleep ?? sleepWithAbort;
  const cadenceMs = Math.max(0, Math.floor(intervalMs));
  const stopController = new AbortController();
  let running = true;
  let stopCause: Error | null = null;

  const waitForNextCycle = async (ms: number) => {
    try {
      await sleep(ms, stopController.signal);
    } catch (err: unknown) {
      if (!isAbortError(err)) throw err;
    }
  };

  const recordExit = async (exit: LoopExit): Promise<LoopExit> => {
    running = false;
    if (exit.error) {
      console.error(`[cycle] Loop exited (${exit.reason}) after ${exit.cycles} cycle(s): ${exit.error.message}`);
    } else {
      console.log(`[cycle] Loop stopped after ${exit.cycles} cycle(s)`);
    }
    if (deps.activityLog) {
      await deps.activityLog.append({
        type: 'loop-exit',
        at: new Date(now()).toISOString(),
        reason: exit.reason,
        ...(exit.error ? { error: exit.error.message } : {}),
      });
    }
    return exit;
  };

  const run = async (): Promise<LoopExit> => {
    let cycles = 0;
    while (!stopController.signal.aborted) {
      const cycleStartedMs = now();
      try {
        await runExposureCycle(deps);
      } catch (err: unknown) {
        if (isFatalCredentialError(err)) {
          return recordExit({ reason: exitReasonFor(err), cycles: cycles + 1, error: err });
        }
        console.error(`[cycle] Unexpected cycle error: ${errorMessage(err)}`);
      }
      cycles += 1;
      if (stopController.signal.aborted) break;
      // An overrun cycle is followed immediately; a zero wait still yields to the event loop.
      await waitForNextCycle(Math.max(0, cadenceMs - (now() - cycleStartedMs)));
    }
    if (stopCause && isFatalCredentialError(stopCause)) {
      return recordExit({ reason: exitReasonFor(stopCause), cycles, error: stopCause });
    }
    return recordExit({ reason: 'stopped', cycles });
  };

  const done = run();

  return {
    stop: (cause?: Error) => {
      if (cause && !stopCause) stopCause = cause;
      stopController.abort();
    },
    isRunning: () => running,
    done,
  };
}
