import { beforeEach, describe, expect, it } from 'vitest';
import { AuthInitializationError, TokenRefreshError } from '../errors.js';
import { FakeIdentityProvider } from '../test-support.js';
import { TokenProvider } from './token-provider.js';

/** Issued tokens live 300 s; the refresh threshold is 60 s. */
describe('TokenProvider', () => {
  let time: number;
  let identityProvider: FakeIdentityProvider;
  let tokens: TokenProvider;

  beforeEach(() => {
    time = 0;
    identityProvider = new FakeIdentityProvider(300);
    tokens = new TokenProvider(identityProvider, { now: () => time });
  });

  describe('initialization', () => {
    it('starts uninitialized without a lifetime', () => {
      expect(tokens.state).toBe('uninitialized');
      expect(tokens.remainingLifetime()).toBeNull();
    });

    it('obtains the first token lazily', async () => {
      expect(identityProvider.requestCount).toBe(0);
      await expect(tokens.authenticate()).resolves.toBe('token-1');
      expect(identityProvider.requestCount).toBe(1);
      expect(tokens.state).toBe('ready');
      expect(tokens.remainingLifetime()).toBe(300);
    });

    it('shares one initialization among concurrent callers', async () => {
      const release = identityProvider.hold();
      const pending = Array.from({ length: 10 }, () => tokens.authenticate());
      expect(tokens.state).toBe('initializing');
      release();

      const values = await Promise.all(pending);
      expect(values).toEqual(Array.from({ length: 10 }, () => 'token-1'));
      expect(identityProvider.requestCount).toBe(1);
    });

    it('raises AuthInitializationError and retries on the next call', async () => {
      identityProvider.failNext = new Error('invalid_grant');

      await expect(tokens.authenticate()).rejects.toThrow(AuthInitializationError);
      expect(tokens.state).toBe('uninitialized');

      await expect(tokens.authenticate()).resolves.toBe('token-1');
      expect(identityProvider.requestCount).toBe(2);
    });

    it('reports the identity provider failure in the message', async () => {
      identityProvider.failNext = new Error('invalid_grant');
      await expect(tokens.authenticate()).rejects.toThrow(
        'Failed to obtain an access token: invalid_grant'
      );
    });
  });

  describe('refresh', () => {
    beforeEach(async () => {
      await tokens.authenticate();
    });

    it('keeps the token while more than the threshold remains', async () => {
      time = 239_000; // 61 s left
      await expect(tokens.authenticate()).resolves.toBe('token-1');
      expect(identityProvider.refreshCount).toBe(0);
    });

    it('refreshes once the remaining lifetime reaches the threshold', async () => {
      time = 241_000; // 59 s left
      await expect(tokens.authenticate()).resolves.toBe('token-2');
      expect(identityProvider.refreshCount).toBe(1);
      expect(identityProvider.requestCount).toBe(1);
      expect(tokens.remainingLifetime()).toBe(300);
    });

    it('refreshes at exactly the threshold', async () => {
      time = 240_000;
      await expect(tokens.authenticate()).resolves.toBe('token-2');
    });

    it('shares one refresh among concurrent callers', async () => {
      time = 241_000;
      const release = identityProvider.hold();
      const pending = Array.from({ length: 5 }, () => tokens.authenticate());
      expect(tokens.state).toBe('refreshing');
      release();

      const values = await Promise.all(pending);
      expect(values).toEqual(['token-2', 'token-2', 'token-2', 'token-2', 'token-2']);
      expect(identityProvider.refreshCount).toBe(1);
    });

    it('raises TokenRefreshError, keeps the stale token and retries', async () => {
      time = 241_000;
      identityProvider.failNext = new Error('session expired');

      await expect(tokens.authenticate()).rejects.toThrow(TokenRefreshError);
      expect(tokens.state).toBe('ready');
      expect(tokens.remainingLifetime()).toBe(59);

      await expect(tokens.authenticate()).resolves.toBe('token-2');
      expect(identityProvider.refreshCount).toBe(2);
    });

    it('fails every waiter of a shared refresh together, then recovers once', async () => {
      time = 241_000;
      identityProvider.failNext = new Error('session expired');
      const release = identityProvider.hold();
      const failing = Array.from({ length: 4 }, () => tokens.authenticate());
      release();

      const results = await Promise.allSettled(failing);
      for (const result of results) {
        expect(result.status).toBe('rejected');
        if (result.status === 'rejected') {
          expect(result.reason).toBeInstanceOf(TokenRefreshError);
        }
      }
      expect(identityProvider.refreshCount).toBe(1);

      const retried = await Promise.all([tokens.authenticate(), tokens.authenticate()]);
      expect(retried).toEqual(['token-2', 'token-2']);
      expect(identityProvider.refreshCount).toBe(2);

      await expect(tokens.authenticate()).resolves.toBe('token-2');
      expect(identityProvider.refreshCount).toBe(2);
    });

    it('uses the password grant once the refresh session has expired', async () => {
      time = 1_900_000;
      await expect(tokens.authenticate()).resolves.toBe('token-2');
      expect(identityProvider.refreshCount).toBe(0);
      expect(identityProvider.requestCount).toBe(2);
    });
  });

  it('honours a custom threshold', async () => {
    tokens = new TokenProvider(identityProvider, { now: () => time, refreshThreshold: 10 });
    await tokens.authenticate();

    time = 241_000;
    await expect(tokens.authenticate()).resolves.toBe('token-1');
    time = 291_000;
    await expect(tokens.authenticate()).resolves.toBe('token-2');
  });
});
