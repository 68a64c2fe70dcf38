/**
 * Error taxonomy shared by the credential lifecycle, the broker client and the
 * fetch loop.
 *
 * Upstream HTTP failures are plain `Error`s carrying classification flags
 * (built by `build*Error`, tested by `is*Error`). Credential failures are
 * dedicated classes because callers branch on them to decide whether the
 * process can keep running.
 */

export interface BrokerApiError extends Error {
  httpStatus?: number;
  code?: string;
  isRateLimited?: boolean;
  isTaskTimeout?: boolean;
  isMalformedPayload?: boolean;
  isUnauthorized?: boolean;
  isGrantRejected?: boolean;
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted" /
 * "aborterror" (case-insensitive).
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const e = err as Record<string, unknown>;
  const name = String(e.name || '');
  const message = String(e.message || err || '');
  return name === 'AbortError' || Number(e.httpStatus) === 499 || /aborted|aborterror/i.test(message);
}

export function buildRequestAbortError(message?: string): BrokerApiError {
  const err: BrokerApiError = new Error(message || 'Request aborted');
  err.name = 'AbortError';
  err.httpStatus = 499;
  return err;
}

export function buildTaskTimeoutError(label: string, timeoutMs: number): BrokerApiError {
  const err: BrokerApiError = new Error(`${label || 'Task'} timed out after ${timeoutMs}ms`);
  err.httpStatus = 504;
  err.isTaskTimeout = true;
  return err;
}

export function buildRateLimitedError(message?: string): BrokerApiError {
  const err: BrokerApiError = new Error(message || 'Broker rate limit reached');
  err.httpStatus = 429;
  err.isRateLimited = true;
  return err;
}

export function buildMalformedPayloadError(message: string): BrokerApiError {
  const err: BrokerApiError = new Error(message);
  err.isMalformedPayload = true;
  return err;
}

export function buildHttpError(label: string, status: number, details: string): BrokerApiError {
  const err: BrokerApiError = new Error(`${label} request failed (${status}): ${details || `HTTP ${status}`}`);
  err.httpStatus = status;
  if (status === 401) err.isUnauthorized = true;
  return err;
}

/** The token endpoint refused the refresh token itself (revoked, expired, unknown). */
export function buildGrantRejectedError(status: number, details: string): BrokerApiError {
  const err: BrokerApiError = new Error(`Refresh token rejected (${status}): ${details || 'invalid_grant'}`);
  err.httpStatus = status;
  err.isGrantRejected = true;
  return err;
}

export function isGrantRejectedError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  return Boolean((err as Record<string, unknown>).isGrantRejected);
}

export function isRateLimitedError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const e = err as Record<string, unknown>;
  const message = String(e.message || '');
  return e.isRateLimited === true || Number(e.httpStatus) === 429 || /Too Many Requests|rate limit/i.test(message);
}

export function isTaskTimeoutError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  return Boolean((err as Record<string, unknown>).isTaskTimeout);
}

export function isMalformedPayloadError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  return Boolean((err as Record<string, unknown>).isMalformedPayload);
}

export function isUnauthorizedError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const e = err as Record<string, unknown>;
  return e.isUnauthorized === true || Number(e.httpStatus) === 401;
}

/**
 * Timeouts, network failures, 429 and 5xx. These are worth retrying within a
 * bounded budget; everything else fails fast.
 */
export function isTransientError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  if (isRateLimitedError(err) || isTaskTimeoutError(err)) return true;
  const e = err as Record<string, unknown>;
  if (e.name === 'CircuitOpenError') return true;
  if (Number(e.httpStatus) >= 500) return true;
  const code = typeof e.code === 'string' ? e.code : '';
  if (/^(ECONNRESET|ECONNREFUSED|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|ENETUNREACH|UND_ERR_CONNECT_TIMEOUT|UND_ERR_SOCKET)$/i.test(code)) {
    return true;
  }
  // fetch() reports network failures as TypeError('fetch failed') with the
  // socket error attached as `cause`.
  if (e.name === 'TypeError' && /fetch failed/i.test(String(e.message || ''))) return true;
  return /timed?\s*out/i.test(String(e.message || ''));
}

export type FailureKind = 'rate-limited' | 'timeout' | 'unauthorized' | 'malformed' | 'circuit-open' | 'http' | 'network' | 'unknown';

export function classifyFailure(err: unknown): FailureKind {
  if (isRateLimitedError(err)) return 'rate-limited';
  if (isTaskTimeoutError(err)) return 'timeout';
  if (isUnauthorizedError(err)) return 'unauthorized';
  if (isMalformedPayloadError(err)) return 'malformed';
  if (err instanceof Error && err.name === 'CircuitOpenError') return 'circuit-open';
  if (err && typeof err === 'object' && Number((err as Record<string, unknown>).httpStatus) > 0) return 'http';
  if (isTransientError(err)) return 'network';
  return 'unknown';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Credential failures
// ---------------------------------------------------------------------------

/**
 * The refresh clock has lapsed or the provider rejected the refresh token.
 * Only the external one-shot authorization flow can recover from this.
 */
export class CredentialExpiredError extends Error {
  readonly httpStatus = 401;
  readonly fatal = true;
  readonly refreshExpiredAt: string | null;

  constructor(message: string, refreshExpiredAt: string | null = null) {
    super(message);
    this.name = 'CredentialExpiredError';
    this.refreshExpiredAt = refreshExpiredAt;
  }
}

/** Refresh failed for a transient reason after the retry budget was spent. */
export class TokenRefreshError extends Error {
  readonly httpStatus = 503;
  readonly fatal = false;
  readonly attempts: number;

  constructor(message: string, attempts: number, cause: unknown) {
    super(message, { cause });
    this.name = 'TokenRefreshError';
    this.attempts = attempts;
  }
}

/**
 * The provider issued a new credential but it could not be written to disk.
 * Continuing would let a restart roll back to the superseded refresh token.
 */
export class CredentialPersistenceError extends Error {
  readonly httpStatus = 500;
  readonly fatal = true;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'CredentialPersistenceError';
  }
}

export function isFatalCredentialError(err: unknown): err is CredentialExpiredError | CredentialPersistenceError {
  return err instanceof CredentialExpiredError || err instanceof CredentialPersistenceError;
}
