import test from 'node:test';
import assert from 'node:assert/strict';

import { CredentialExpiredError, TokenRefreshError } from '../server/lib/errors.js';
import type { Credential } from '../server/services/credentialStore.js';
import type { RefreshTrigger } from '../server/services/activityLog.js';
import { startTokenKeepAlive } from '../server/services/tokenKeepAlive.js';

const CREDENTIAL: Credential = {
  accessToken: 'test-access',
  accessIssuedAtMs: 0,
  refreshToken: 'test-refresh',
  refreshIssuedAtMs: 0,
};

test('refreshNow forces a keep-alive refresh', async () => {
  const triggers: RefreshTrigger[] = [];
  const logs: string[] = [];
  const handle = startTokenKeepAlive({
    manager: {
      forceRefresh: async (trigger) => {
        triggers.push(trigger ?? 'forced');
        return CREDENTIAL;
      },
    },
    intervalMs: 60_000,
    log: (message) => logs.push(message),
  });

  await handle.refreshNow();
  handle.stop();

  assert.deepEqual(triggers, ['keep-alive']);
  assert.deepEqual(logs, ['[token] Keep-alive refresh succeeded']);
});

test('a transient failure is logged and the keep-alive carries on', async () => {
  const errors: string[] = [];
  let fatal = 0;
  const handle = startTokenKeepAlive({
    manager: {
      forceRefresh: async () => {
        throw new TokenRefreshError('Token refresh failed after 3 attempt(s): upstream 503', 3, null);
      },
    },
    intervalMs: 60_000,
    onFatal: () => fatal++,
    error: (message) => errors.push(message),
  });

  await handle.refreshNow();
  handle.stop();

  assert.equal(fatal, 0);
  assert.deepEqual(errors, ['[token] Keep-alive refresh failed: Token refresh failed after 3 attempt(s): upstream 503']);
});

test('a fatal credential error stops the keep-alive and reports once', async () => {
  const fatalErrors: Error[] = [];
  const errors: string[] = [];
  const expired = new CredentialExpiredError('Refresh token expired');
  const handle = startTokenKeepAlive({
    manager: {
      forceRefresh: async () => {
        throw expired;
      },
    },
    intervalMs: 60_000,
    onFatal: (err) => fatalErrors.push(err),
    error: (message) => errors.push(message),
  });

  await handle.refreshNow();

  assert.deepEqual(fatalErrors, [expired]);
  assert.deepEqual(errors, ['[token] Keep-alive stopped: Refresh token expired']);
});

test('the interval timer triggers refreshes on its own', async () => {
  let calls = 0;
  const handle = startTokenKeepAlive({
    manager: {
      forceRefresh: async () => {
        calls++;
        return CREDENTIAL;
      },
    },
    intervalMs: 5,
    log: () => {},
  });

  await new Promise((resolve) => setTimeout(resolve, 40));
  handle.stop();
  const seen = calls;
  await new Promise((resolve) => setTimeout(resolve, 20));

  assert.ok(seen >= 1);
  assert.equal(calls, seen);
});
