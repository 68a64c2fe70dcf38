/**
 * Two-clock credential lifecycle.
 *
 * The access token lives 30 minutes and is renewed lazily whenever a caller
 * asks for a credential inside the refresh margin. The refresh token lives 7
 * days from its own issue instant; once that clock runs out nothing short of
 * the interactive authorization flow can recover.
 *
 * This manager is the only writer of the credential. Concurrent callers that
 * need a refresh share the single in-flight attempt.
 */

import type { TokenResponse } from '../lib/apiSchemas.js';
import {
  CredentialExpiredError,
  CredentialPersistenceError,
  TokenRefreshError,
  errorMessage,
  isGrantRejectedError,
  isTransientError,
} from '../lib/errors.js';
import type { ActivityLog, RefreshOutcome, RefreshTrigger } from './activityLog.js';
import type { Credential, CredentialStore } from './credentialStore.js';

export interface TokenLifecycleOptions {
  store: CredentialStore;
  exchangeRefreshToken: (refreshToken: string) => Promise<TokenResponse>;
  activityLog?: ActivityLog | null;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  accessTtlMs?: number;
  refreshTtlMs?: number;
  refreshMarginMs?: number;
  maxAttempts?: number;
  baseBackoffMs?: number;
  onRefresh?: (outcome: RefreshOutcome, trigger: RefreshTrigger) => void;
}

export interface TokenStatus {
  loaded: boolean;
  accessIssuedAt: string | null;
  accessExpiresAt: string | null;
  accessRemainingMs: number | null;
  refreshIssuedAt: string | null;
  refreshExpiresAt: string | null;
  refreshRemainingMs: number | null;
  needsRefresh: boolean;
  canRefresh: boolean;
  refreshInFlight: boolean;
  lastRefreshAt: string | null;
  lastRefreshOutcome: RefreshOutcome | null;
  lastError: string | null;
}

const DEFAULT_ACCESS_TTL_MS = 30 * 60 * 1000;
const DEFAULT_REFRESH_TTL_MS = 7 * 24 * 60 * 60 * 1000;
const DEFAULT_REFRESH_MARGIN_MS = 5 * 60 * 1000;

function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, Math.max(0, ms)));

export class TokenLifecycleManager {
  private credential: Credential | null = null;
  private loading: Promise<Credential> | null = null;
  private inFlight: Promise<Credential> | null = null;
  private lastRefreshAtMs: number | null = null;
  private lastRefreshOutcome: RefreshOutcome | null = null;
  private lastError: string | null = null;

  private readonly store: CredentialStore;
  private readonly exchangeRefreshToken: (refreshToken: string) => Promise<TokenResponse>;
  private readonly activityLog: ActivityLog | null;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly accessTtlMs: number;
  private readonly refreshTtlMs: number;
  private readonly refreshMarginMs: number;
  private readonly maxAttempts: number;
  private readonly baseBackoffMs: number;
  private readonly onRefresh: ((outcome: RefreshOutcome, trigger: RefreshTrigger) => void) | null;

  constructor(options: TokenLifecycleOptions) {
    this.store = options.store;
    this.exchangeRefreshToken = options.exchangeRefreshToken;
    this.activityLog = options.activityLog ?? null;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.accessTtlMs = Math.max(1, options.accessTtlMs ?? DEFAULT_ACCESS_TTL_MS);
    this.refreshTtlMs = Math.max(1, options.refreshTtlMs ?? DEFAULT_REFRESH_TTL_MS);
    this.refreshMarginMs = Math.max(0, Math.min(options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS, this.accessTtlMs));
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 3));
    this.baseBackoffMs = Math.max(0, options.baseBackoffMs ?? 2_000);
    this.onRefresh = options.onRefresh ?? null;
  }

  /**
   * A credential with at least the refresh margin left on its access clock.
   * No network call happens unless the access token is inside the margin.
   */
  async getValidCredential(): Promise<Credential> {
    const current = await this.ensureLoaded();
    if (!this.accessNeedsRefresh(current, this.now())) return current;
    return this.refresh('expiring');
  }

  /** Refresh regardless of the access clock (keep-alive, upstream 401). */
  async forceRefresh(trigger: RefreshTrigger = 'forced'): Promise<Credential> {
    await this.ensureLoaded();
    return this.refresh(trigger);
  }

  getStatus(): TokenStatus {
    const credential = this.credential;
    const nowMs = this.now();
    const base = {
      refreshInFlight: this.inFlight !== null,
      lastRefreshAt: this.lastRefreshAtMs === null ? null : toIso(this.lastRefreshAtMs),
      lastRefreshOutcome: this.lastRefreshOutcome,
      lastError: this.lastError,
    };
    if (!credential) {
      return {
        loaded: false,
        accessIssuedAt: null,
        accessExpiresAt: null,
        accessRemainingMs: null,
        refreshIssuedAt: null,
        refreshExpiresAt: null,
        refreshRemainingMs: null,
        needsRefresh: false,
        canRefresh: false,
        ...base,
      };
    }
    const accessExpiresMs = credential.accessIssuedAtMs + this.accessTtlMs;
    const refreshExpiresMs = credential.refreshIssuedAtMs + this.refreshTtlMs;
    return {
      loaded: true,
      accessIssuedAt: toIso(credential.accessIssuedAtMs),
      accessExpiresAt: toIso(accessExpiresMs),
      accessRemainingMs: accessExpiresMs - nowMs,
      refreshIssuedAt: toIso(credential.refreshIssuedAtMs),
      refreshExpiresAt: toIso(refreshExpiresMs),
      refreshRemainingMs: refreshExpiresMs - nowMs,
      needsRefresh: this.accessNeedsRefresh(credential, nowMs),
      canRefresh: nowMs - credential.refreshIssuedAtMs < this.refreshTtlMs,
      ...base,
    };
  }

  private accessNeedsRefresh(credential: Credential, nowMs: number): boolean {
    return nowMs - credential.accessIssuedAtMs > this.accessTtlMs - this.refreshMarginMs;
  }

  private ensureLoaded(): Promise<Credential> {
    if (this.credential) return Promise.resolve(this.credential);
    if (!this.loading) {
      this.loading = this.store.load().then(
        (credential) => {
          this.credential = credential;
          return credential;
        },
        (err: unknown) => {
          this.loading = null;
          this.lastError = errorMessage(err);
          throw err;
        },
      );
    }
    return this.loading;
  }

  private refresh(trigger: RefreshTrigger): Promise<Credential> {
    if (!this.inFlight) {
      this.inFlight = this.performRefresh(trigger).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async performRefresh(trigger: RefreshTrigger): Promise<Credential> {
    const current = await this.ensureLoaded();
    const refreshExpiresMs = current.refreshIssuedAtMs + this.refreshTtlMs;

    if (this.now() >= refreshExpiresMs) {
      const err = new CredentialExpiredError(
        `Refresh token expired at ${toIso(refreshExpiresMs)} — re-run the authorization flow`,
        toIso(refreshExpiresMs),
      );
      await this.record(trigger, 'expired', 0, current, err.message);
      throw err;
    }

    let response: TokenResponse | null = null;
    let lastErr: unknown = null;
    let attempts = 0;
    while (attempts < this.maxAttempts) {
      attempts += 1;
      try {
        response = await this.exchangeRefreshToken(current.refreshToken);
        break;
      } catch (err: unknown) {
        if (isGrantRejectedError(err)) {
          const expired = new CredentialExpiredError(
            `Provider rejected the refresh token: ${errorMessage(err)}`,
            toIso(refreshExpiresMs),
          );
          await this.record(trigger, 'expired', attempts, current, expired.message);
          throw expired;
        }
        lastErr = err;
        if (!isTransientError(err) || attempts >= this.maxAttempts) break;
        const delayMs = this.baseBackoffMs * 2 ** (attempts - 1);
        console.warn(
          `[token] Refresh attempt ${attempts}/${this.maxAttempts} failed (${errorMessage(err)}); retrying in ${delayMs}ms`,
        );
        await this.sleep(delayMs);
      }
    }

    if (!response) {
      const failure = new TokenRefreshError(
        `Token refresh failed after ${attempts} attempt(s): ${errorMessage(lastErr)}`,
        attempts,
        lastErr,
      );
      await this.record(trigger, 'failed', attempts, current, failure.message);
      throw failure;
    }

    const issuedMs = this.now();
    const rotated = typeof response.refresh_token === 'string' && response.refresh_token.length > 0;
    if (!rotated) {
      console.warn('[token] Token response carried no refresh_token; keeping the existing refresh token and its clock');
    }
    const tokenType = response.token_type ?? current.tokenType;
    const scope = response.scope ?? current.scope;
    const next: Credential = {
      accessToken: response.access_token,
      accessIssuedAtMs: issuedMs,
      refreshToken: rotated && response.refresh_token ? response.refresh_token : current.refreshToken,
      refreshIssuedAtMs: rotated ? issuedMs : current.refreshIssuedAtMs,
      ...(tokenType ? { tokenType } : {}),
      ...(scope ? { scope } : {}),
    };
    // The provider may already have invalidated the old refresh token, so the
    // new one is kept in memory even if the write below fails.
    this.credential = next;

    try {
      await this.store.save(next);
    } catch (err: unknown) {
      const failure = new CredentialPersistenceError(
        `Refreshed credential could not be written to ${this.store.location}: ${errorMessage(err)}`,
        err,
      );
      await this.record(trigger, 'persist-failed', attempts, next, failure.message, rotated);
      throw failure;
    }

    await this.record(trigger, 'success', attempts, next, undefined, rotated);
    console.log(
      `[token] Refreshed (${trigger}) — access valid until ${toIso(next.accessIssuedAtMs + this.accessTtlMs)}, refresh valid until ${toIso(next.refreshIssuedAtMs + this.refreshTtlMs)}`,
    );
    return next;
  }

  private async record(
    trigger: RefreshTrigger,
    outcome: RefreshOutcome,
    attempts: number,
    credential: Credential,
    error?: string,
    refreshRotated?: boolean,
  ): Promise<void> {
    const atMs = this.now();
    this.lastRefreshAtMs = atMs;
    this.lastRefreshOutcome = outcome;
    this.lastError = error ?? null;
    if (outcome !== 'success') {
      console.error(`[token] Refresh ${outcome} (${trigger}): ${error ?? 'unknown error'}`);
    }
    if (this.onRefresh) {
      try {
        this.onRefresh(outcome, trigger);
      } catch (hookErr: unknown) {
        console.warn(`[token] onRefresh hook failed: ${errorMessage(hookErr)}`);
      }
    }
    if (!this.activityLog) return;
    await this.activityLog.append({
      type: 'token-refresh',
      at: toIso(atMs),
      trigger,
      outcome,
      attempts,
      ...(refreshRotated === undefined ? {} : { refreshRotated }),
      accessExpiresAt: toIso(credential.accessIssuedAtMs + this.accessTtlMs),
      refreshExpiresAt: toIso(credential.refreshIssuedAtMs + this.refreshTtlMs),
      ...(error ? { error } : {}),
    });
  }
}
