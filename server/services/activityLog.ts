import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { FailureKind } from '../lib/errors.js';
import { errorMessage } from '../lib/errors.js';
import type { AlertSeverity, AlertType } from './exposureTypes.js';

export type RefreshTrigger = 'expiring' | 'forced' | 'keep-alive' | 'unauthorized';

export type RefreshOutcome = 'success' | 'expired' | 'failed' | 'persist-failed';

export interface TokenRefreshEntry {
  type: 'token-refresh';
  at: string;
  trigger: RefreshTrigger;
  outcome: RefreshOutcome;
  attempts: number;
  refreshRotated?: boolean;
  accessExpiresAt: string | null;
  refreshExpiresAt: string | null;
  error?: string;
}

export interface FetchFailureEntry {
  type: 'fetch-failure';
  at: string;
  symbol: string;
  kind: FailureKind;
  reason: string;
}

export interface FetchCycleEntry {
  type: 'fetch-cycle';
  at: string;
  durationMs: number;
  succeeded: number;
  failed: number;
  contractCount: number;
  skippedContracts: number;
  published: boolean;
  sequence: number | null;
}

export interface LoopExitEntry {
  type: 'loop-exit';
  at: string;
  reason: 'stopped' | 'credential-expired' | 'persistence-failed' | 'crashed';
  error?: string;
}

export interface AlertEntry {
  type: 'alert';
  at: string;
  sequence: number;
  symbol: string;
  alertType: AlertType;
  severity: AlertSeverity;
  message: string;
}

export type ActivityEntry = TokenRefreshEntry | FetchFailureEntry | FetchCycleEntry | LoopExitEntry | AlertEntry;

export interface ActivityLog {
  /** Never rejects; a failed write is reported through the logger. */
  append: (entry: ActivityEntry) => Promise<void>;
}

/**
 * Append-only JSON-lines file. Writes are chained so lines land in call order.
 */
export function createFileActivityLog(filePath: string): ActivityLog {
  const location = path.resolve(filePath);
  let dirReady: Promise<unknown> | null = null;
  let tail: Promise<void> = Promise.resolve();

  const writeLine = async (entry: ActivityEntry): Promise<void> => {
    if (!dirReady) dirReady = mkdir(path.dirname(location), { recursive: true });
    await dirReady;
    await appendFile(location, `${JSON.stringify(entry)}\n`, 'utf8');
  };

  const append = (entry: ActivityEntry): Promise<void> => {
    tail = tail
      .then(() => writeLine(entry))
      .catch((err: unknown) => {
        dirReady = null;
        console.error(`[activity] Failed to append ${entry.type} entry to ${location}: ${errorMessage(err)}`);
      });
    return tail;
  };

  return { append };
}

export interface MemoryActivityLog extends ActivityLog {
  readonly entries: ActivityEntry[];
}

export function createMemoryActivityLog(): MemoryActivityLog {
  const entries: ActivityEntry[] = [];
  return {
    entries,
    append: async (entry) => {
      entries.push(entry);
    },
  };
}
