import { errorMessage, isFatalCredentialError } from '../lib/errors.js';
import type { TokenLifecycleManager } from './tokenLifecycle.js';

interface TokenKeepAliveOptions {
  manager: Pick<TokenLifecycleManager, 'forceRefresh'>;
  intervalMs: number;
  /** Called once when a refresh fails with an unrecoverable credential error. */
  onFatal?: (err: Error) => void;
  log?: (message: string) => void;
  error?: (message: string) => void;
}

export interface TokenKeepAliveHandle {
  stop: () => void;
  refreshNow: () => Promise<void>;
}

/**
 * Force a refresh on a fixed interval regardless of market hours, so the
 * 7-day refresh clock keeps renewing over weekends and holidays. Stops itself
 * after a fatal credential error.
 */
export function startTokenKeepAlive(options: TokenKeepAliveOptions): TokenKeepAliveHandle {
  const {
    manager,
    intervalMs,
    onFatal,
    log = (message: string) => console.log(message),
    error = (message: string) => console.error(message),
  } = options;

  let intervalTimer: ReturnType<typeof setInterval> | null = null;

  const stop = () => {
    if (intervalTimer) {
      clearInterval(intervalTimer);
      intervalTimer = null;
    }
  };

  const refreshNow = async () => {
    try {
      await manager.forceRefresh('keep-alive');
      log('[token] Keep-alive refresh succeeded');
    } catch (err: unknown) {
      if (isFatalCredentialError(err)) {
        stop();
        error(`[token] Keep-alive stopped: ${err.message}`);
        onFatal?.(err);
        return;
      }
      error(`[token] Keep-alive refresh failed: ${errorMessage(err)}`);
    }
  };

  intervalTimer = setInterval(
    () => {
      refreshNow().catch((err: unknown) => error(`[token] Keep-alive tick failed: ${errorMessage(err)}`));
    },
    Math.max(1, Math.floor(intervalMs)),
  );
  if (typeof intervalTimer.unref === 'function') intervalTimer.unref();

  return { stop, refreshNow };
}
