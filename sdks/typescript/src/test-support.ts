/**
 * In-process stand-ins for the identity provider and the service, shared by
 * the test files
 */

import { pino } from 'pino';
import type { IdentityProvider, TokenGrant } from './auth/identity-provider.js';
import {
  PseudonymizationClient,
  type PseudonymizationClientOptions,
} from './client.js';

export interface RecordedRequest {
  method: string;
  url: string;
  /** Header names lower-cased */
  headers: Record<string, string>;
  body?: string;
}

export type FetchHandler = (request: RecordedRequest) => Response | Promise<Response>;

export interface MockFetch {
  fetch: typeof globalThis.fetch;
  requests: RecordedRequest[];
}

/**
 * A fetch implementation that records every request and answers through the
 * handler
 */
export function mockFetch(handler: FetchHandler): MockFetch {
  const requests: RecordedRequest[] = [];
  const fetch: typeof globalThis.fetch = async (input, init) => {
    const url =
      typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url,
      headers,
      body: typeof init?.body === 'string' ? init.body : undefined,
    };
    requests.push(request);
    return handler(request);
  };
  return { fetch, requests };
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(status: number, body: string): Response {
  return new Response(body, { status });
}

/** A response without body (required for 204) */
export function emptyResponse(status: number): Response {
  return new Response(null, { status });
}

/**
 * Identity provider that issues numbered tokens (`token-1`, `token-2`, ...)
 * without network access
 */
export class FakeIdentityProvider implements IdentityProvider {
  requestCount = 0;
  refreshCount = 0;
  /** Error thrown by the next grant, then cleared */
  failNext: Error | null = null;
  /** Lifetime in seconds of issued access tokens */
  expiresIn: number;
  /** Resolved by tests to release pending grants */
  private gate: Promise<void> = Promise.resolve();
  private issued = 0;

  constructor(expiresIn = 300) {
    this.expiresIn = expiresIn;
  }

  /**
   * Hold all grants until the returned function is called
   */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return release;
  }

  async requestToken(): Promise<TokenGrant> {
    this.requestCount++;
    return this.issue();
  }

  async refreshToken(refreshToken: string): Promise<TokenGrant> {
    this.refreshCount++;
    if (!refreshToken.startsWith('refresh-')) {
      throw new Error(`unknown refresh token ${refreshToken}`);
    }
    return this.issue();
  }

  private async issue(): Promise<TokenGrant> {
    await this.gate;
    const error = this.failNext;
    if (error) {
      this.failNext = null;
      throw error;
    }
    this.issued++;
    return {
      accessToken: `token-${this.issued}`,
      expiresIn: this.expiresIn,
      refreshToken: `refresh-${this.issued}`,
      refreshExpiresIn: 1800,
    };
  }
}

export const TEST_CONFIG = {
  serviceUrl: 'http://psn.test',
  keycloakUrl: 'http://auth.test',
  realm: 'test-realm',
  clientId: 'test-client',
  clientSecret: 'test-secret',
  userName: 'test-user',
  password: 'test-password',
} satisfies PseudonymizationClientOptions;

export const silentLogger = pino({ level: 'silent' });

/**
 * A client wired to a fake identity provider and a mock fetch
 */
export function createTestClient(
  handler: FetchHandler,
  overrides: Partial<PseudonymizationClientOptions> = {}
): MockFetch & { client: PseudonymizationClient; identityProvider: FakeIdentityProvider } {
  const mock = mockFetch(handler);
  const identityProvider = new FakeIdentityProvider();
  const client = new PseudonymizationClient({
    ...TEST_CONFIG,
    identityProvider,
    logger: silentLogger,
    fetch: mock.fetch,
    ...overrides,
  });
  return { ...mock, client, identityProvider };
}
