/**
 * Token Provider
 *
 * Hands out a non-expired bearer token to any number of concurrent callers.
 * The token is obtained lazily on first use and refreshed once its remaining
 * lifetime drops to the threshold.
 */

import {
  AuthInitializationError,
  TokenRefreshError,
  describeError,
} from '../errors.js';
import type { Logger } from '../logger.js';
import type { IdentityProvider, TokenGrant } from './identity-provider.js';

/**
 * Anything that can supply a bearer token
 */
export interface TokenSource {
  authenticate(): Promise<string>;
}

export type TokenProviderState =
  | 'uninitialized'
  | 'initializing'
  | 'ready'
  | 'refreshing';

export interface TokenProviderOptions {
  /** Remaining lifetime in seconds at or below which the token is refreshed (default: 60) */
  refreshThreshold?: number;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  logger?: Logger;
}

interface AccessToken {
  value: string;
  /** Epoch milliseconds */
  expiresAt: number;
  refreshToken?: string;
  /** Epoch milliseconds */
  refreshExpiresAt?: number;
}

/**
 * Token provider with single-flight initialization and refresh
 *
 * All callers that find the token missing or stale while an acquisition is in
 * flight await that same acquisition; the check and the decision to start one
 * happen without yielding to the event loop, so two callers can never start
 * independent acquisitions for the same staleness window.
 *
 * @example
 * ```typescript
 * const tokens = new TokenProvider(new KeycloakIdentityProvider({ ... }));
 * const bearer = await tokens.authenticate();
 * ```
 */
export class TokenProvider implements TokenSource {
  private readonly identityProvider: IdentityProvider;
  private readonly thresholdMs: number;
  private readonly now: () => number;
  private readonly logger?: Logger;

  private token: AccessToken | null = null;
  private inFlight: Promise<AccessToken> | null = null;

  constructor(identityProvider: IdentityProvider, options: TokenProviderOptions = {}) {
    this.identityProvider = identityProvider;
    this.thresholdMs = (options.refreshThreshold ?? 60) * 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  get state(): TokenProviderState {
    if (this.inFlight) {
      return this.token ? 'refreshing' : 'initializing';
    }
    return this.token ? 'ready' : 'uninitialized';
  }

  /**
   * Remaining lifetime of the current token in seconds, or null before the
   * first token was obtained
   */
  remainingLifetime(): number | null {
    if (!this.token) {
      return null;
    }
    return Math.max(0, (this.token.expiresAt - this.now()) / 1000);
  }

  /**
   * Return a valid bearer token, obtaining or refreshing it first if needed
   *
   * @throws {AuthInitializationError} If the first token cannot be obtained
   * @throws {TokenRefreshError} If a stale token cannot be refreshed
   */
  async authenticate(): Promise<string> {
    const current = this.token;
    if (current && !this.isStale(current)) {
      return current.value;
    }

    if (!this.inFlight) {
      this.inFlight = this.acquire(current).finally(() => {
        this.inFlight = null;
      });
    }

    const token = await this.inFlight;
    return token.value;
  }

  private isStale(token: AccessToken): boolean {
    return token.expiresAt - this.now() <= this.thresholdMs;
  }

  private async acquire(current: AccessToken | null): Promise<AccessToken> {
    const next = current
      ? await this.refresh(current)
      : await this.initialize();
    this.token = next;
    return next;
  }

  private async initialize(): Promise<AccessToken> {
    this.logger?.debug('Requesting initial access token');
    try {
      return this.toAccessToken(await this.identityProvider.requestToken());
    } catch (error) {
      throw new AuthInitializationError(
        `Failed to obtain an access token: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private async refresh(current: AccessToken): Promise<AccessToken> {
    this.logger?.debug('Refreshing access token');
    const { refreshToken, refreshExpiresAt } = current;
    try {
      // An expired refresh session cannot be refreshed; start over with the password grant
      const grant =
        refreshToken !== undefined &&
        (refreshExpiresAt === undefined || refreshExpiresAt > this.now())
          ? await this.identityProvider.refreshToken(refreshToken)
          : await this.identityProvider.requestToken();
      const next = this.toAccessToken(grant);
      this.logger?.debug('Access token refreshed');
      return next;
    } catch (error) {
      throw new TokenRefreshError(
        `Failed to refresh the access token: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private toAccessToken(grant: TokenGrant): AccessToken {
    const issuedAt = this.now();
    return {
      value: grant.accessToken,
      expiresAt: issuedAt + grant.expiresIn * 1000,
      refreshToken: grant.refreshToken,
      refreshExpiresAt:
        grant.refreshExpiresIn !== undefined && grant.refreshExpiresIn > 0
          ? issuedAt + grant.refreshExpiresIn * 1000
          : undefined,
    };
  }
}
