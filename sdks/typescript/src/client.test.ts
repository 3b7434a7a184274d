import { describe, expect, it } from 'vitest';
import {
  AuthInitializationError,
  ClientTransportError,
  ConfigurationError,
  ServiceResponseError,
} from './errors.js';
import { PseudonymizationClient } from './client.js';
import {
  TEST_CONFIG,
  createTestClient,
  emptyResponse,
  jsonResponse,
  silentLogger,
} from './test-support.js';

describe('PseudonymizationClient', () => {
  describe('ping', () => {
    it('returns true when the service answers 200', async () => {
      const { client, requests } = createTestClient(() => emptyResponse(200));

      await expect(client.ping()).resolves.toBe(true);
      expect(requests[0]).toMatchObject({ method: 'GET', url: 'http://psn.test/api/ping' });
    });

    it('raises unexpected-status for other statuses', async () => {
      const { client } = createTestClient(() => emptyResponse(503));
      await expect(client.ping()).rejects.toMatchObject({
        status: 503,
        reason: 'unexpected-status',
      });
    });

    it('distinguishes an unreachable service from a service error', async () => {
      const { client } = createTestClient(() => {
        throw new TypeError('fetch failed');
      });

      const error = await client.ping().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ClientTransportError);
      expect(error).not.toBeInstanceOf(ServiceResponseError);
      expect(error).toMatchObject({ message: 'Pinging service failed: fetch failed' });
    });
  });

  describe('authentication', () => {
    it('reuses one token across connectors', async () => {
      const { client, requests, identityProvider } = createTestClient(() =>
        jsonResponse(200, { name: 'TestDomain' })
      );

      await client.domains().get('TestDomain');
      await client.pseudonyms('TestDomain').get({ psn: 'TD-1' });

      expect(identityProvider.requestCount).toBe(1);
      expect(requests.map((request) => request.headers.authorization)).toEqual([
        'Bearer token-1',
        'Bearer token-1',
      ]);
    });

    it('refreshes the token on the injected clock', async () => {
      let time = 0;
      const { client, requests } = createTestClient(() => emptyResponse(200), {
        now: () => time,
      });

      await client.ping();
      time = 241_000;
      await client.ping();

      expect(requests[1].headers.authorization).toBe('Bearer token-2');
    });

    it('sends nothing when no token can be obtained', async () => {
      const { client, requests, identityProvider } = createTestClient(() => emptyResponse(200));
      identityProvider.failNext = new Error('invalid_grant');

      await expect(client.ping()).rejects.toThrow(AuthInitializationError);
      expect(requests).toHaveLength(0);
    });

    it('authenticates against Keycloak by default', async () => {
      const { client, requests } = createTestClient(
        (request) =>
          request.url.startsWith('http://auth.test/')
            ? jsonResponse(200, { access_token: 'kc-token', expires_in: 300 })
            : emptyResponse(200),
        { identityProvider: undefined }
      );

      await client.ping();

      expect(requests.map((request) => request.url)).toEqual([
        'http://auth.test/realms/test-realm/protocol/openid-connect/token',
        'http://psn.test/api/ping',
      ]);
      expect(requests[1].headers.authorization).toBe('Bearer kc-token');
    });
  });

  it('adds custom headers to service requests', async () => {
    const { client, requests } = createTestClient(() => emptyResponse(200), {
      headers: { 'X-Request-Source': 'tests' },
    });

    await client.ping();
    expect(requests[0].headers['x-request-source']).toBe('tests');
  });

  it('rejects an invalid configuration', () => {
    expect(
      () =>
        new PseudonymizationClient({
          ...TEST_CONFIG,
          serviceUrl: 'not a url',
          password: '',
          logger: silentLogger,
        })
    ).toThrow(ConfigurationError);
  });

  it('applies configuration defaults', () => {
    const { client } = createTestClient(() => emptyResponse(200));
    expect(client.config.timeout).toBe(30_000);
    expect(client.config.refreshThreshold).toBe(60);
  });
});
