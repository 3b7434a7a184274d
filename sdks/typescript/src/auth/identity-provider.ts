/**
 * Identity provider
 *
 * Obtains access tokens through the OAuth2 password grant. The token provider
 * only depends on the {@link IdentityProvider} interface; the Keycloak
 * implementation is the default.
 */

import { z } from 'zod';
import { IdentityProviderError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';

/**
 * Tokens issued by a grant, with lifetimes in seconds
 */
export interface TokenGrant {
  accessToken: string;
  expiresIn: number;
  refreshToken?: string;
  refreshExpiresIn?: number;
}

export interface IdentityProvider {
  /** Authenticate with the configured credentials */
  requestToken(): Promise<TokenGrant>;
  /** Exchange a refresh token for a new grant */
  refreshToken(refreshToken: string): Promise<TokenGrant>;
}

export interface KeycloakIdentityProviderOptions {
  /** Base URL of the Keycloak server */
  keycloakUrl: string;
  realm: string;
  clientId: string;
  clientSecret: string;
  userName: string;
  password: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Custom fetch implementation (for testing or custom environments) */
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
  refresh_expires_in: z.number().optional(),
  token_type: z.string().optional(),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Password-grant client for a Keycloak realm's token endpoint
 */
export class KeycloakIdentityProvider implements IdentityProvider {
  readonly tokenUrl: string;
  private readonly options: KeycloakIdentityProviderOptions;
  private readonly timeout: number;
  private readonly fetchFn: typeof globalThis.fetch;

  constructor(options: KeycloakIdentityProviderOptions) {
    this.options = options;
    this.tokenUrl = `${options.keycloakUrl.replace(/\/$/, '')}/realms/${encodeURIComponent(options.realm)}/protocol/openid-connect/token`;
    this.timeout = options.timeout ?? 30000;
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  async requestToken(): Promise<TokenGrant> {
    return this.grant(
      new URLSearchParams({
        grant_type: 'password',
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
        username: this.options.userName,
        password: this.options.password,
      })
    );
  }

  /**
   * Refresh the grant. When Keycloak rejects the refresh token as invalid
   * (its session expired), a new password grant is requested instead.
   */
  async refreshToken(refreshToken: string): Promise<TokenGrant> {
    try {
      return await this.grant(
        new URLSearchParams({
          grant_type: 'refresh_token',
          client_id: this.options.clientId,
          client_secret: this.options.clientSecret,
          refresh_token: refreshToken,
        })
      );
    } catch (error) {
      if (error instanceof IdentityProviderError && error.status === 400) {
        this.options.logger?.debug(
          { code: error.code },
          'Refresh token rejected, requesting a new password grant'
        );
        return this.requestToken();
      }
      throw error;
    }
  }

  private async grant(params: URLSearchParams): Promise<TokenGrant> {
    let response: Response;
    try {
      response = await this.fetchFn(this.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: params.toString(),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      throw new IdentityProviderError(
        `Token endpoint unreachable: ${describeError(error)}`,
        {},
        { cause: error }
      );
    }

    const payload: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      const parsed = tokenErrorSchema.safeParse(payload);
      const code = parsed.success ? parsed.data.error : undefined;
      const description = parsed.success
        ? parsed.data.error_description
        : undefined;
      throw new IdentityProviderError(
        `Token request failed: ${code ?? `HTTP ${response.status}`}` +
          (description ? ` - ${description}` : ''),
        { status: response.status, code }
      );
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new IdentityProviderError('Token endpoint returned a malformed response', {
        status: response.status,
      });
    }

    return {
      accessToken: parsed.data.access_token,
      expiresIn: parsed.data.expires_in,
      refreshToken: parsed.data.refresh_token,
      refreshExpiresIn: parsed.data.refresh_expires_in,
    };
  }
}
