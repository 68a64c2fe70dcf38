import { buildRequestAbortError, buildTaskTimeoutError } from './errors.js';

/**
 * Resolve after `ms`, or reject with an AbortError as soon as `signal` aborts.
 * A zero or negative delay resolves on the next macrotask.
 */
export function sleepWithAbort(ms: number, signal?: AbortSignal | null): Promise<void> {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  return new Promise((resolve, reject) => {
    let settled = false;
    const done = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      fn();
    };
    const onAbort = () => done(() => reject(buildRequestAbortError('Aborted while waiting')));
    const timer = setTimeout(() => done(resolve), waitMs);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

function linkAbortSignalToController(parentSignal: AbortSignal | null, controller: AbortController): () => void {
  if (!parentSignal) return () => {};
  const forwardAbort = () => controller.abort();
  if (parentSignal.aborted) {
    forwardAbort();
    return () => {};
  }
  parentSignal.addEventListener('abort', forwardAbort);
  return () => {
    parentSignal.removeEventListener('abort', forwardAbort);
  };
}

/**
 * Run `task` with a hard deadline. The task receives a signal that aborts on
 * timeout or when the parent signal aborts; the returned promise rejects with
 * a task-timeout error once the deadline passes even if the task ignores it.
 */
export async function runWithAbortAndTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: { label?: string; signal?: AbortSignal | null; timeoutMs: number },
): Promise<T> {
  const label = String(options.label || 'Task').trim() || 'Task';
  const parentSignal = options.signal || null;
  const timeoutMs = Math.max(1, Math.floor(Number(options.timeoutMs) || 0));
  if (parentSignal && parentSignal.aborted) {
    throw buildRequestAbortError(`${label} aborted`);
  }

  const controller = new AbortController();
  const unlinkAbort = linkAbortSignalToController(parentSignal, controller);

  let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutTimer = setTimeout(() => {
      controller.abort();
      reject(buildTaskTimeoutError(label, timeoutMs));
    }, timeoutMs);
    if (typeof timeoutTimer.unref === 'function') {
      timeoutTimer.unref();
    }
  });

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    if (timeoutTimer) clearTimeout(timeoutTimer);
    unlinkAbort();
  }
}
