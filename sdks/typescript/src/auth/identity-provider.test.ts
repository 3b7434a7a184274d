import { describe, expect, it } from 'vitest';
import { IdentityProviderError } from '../errors.js';
import { jsonResponse, mockFetch, textResponse, type FetchHandler } from '../test-support.js';
import { KeycloakIdentityProvider } from './identity-provider.js';

function provider(handler: FetchHandler) {
  const mock = mockFetch(handler);
  const identityProvider = new KeycloakIdentityProvider({
    keycloakUrl: 'http://auth.test/',
    realm: 'test-realm',
    clientId: 'test-client',
    clientSecret: 'test-secret',
    userName: 'test-user',
    password: 'test-password',
    fetch: mock.fetch,
  });
  return { identityProvider, requests: mock.requests };
}

const grant = {
  access_token: 'access-1',
  expires_in: 300,
  refresh_token: 'refresh-1',
  refresh_expires_in: 1800,
  token_type: 'Bearer',
};

describe('KeycloakIdentityProvider', () => {
  it('derives the realm token endpoint', () => {
    const { identityProvider } = provider(() => jsonResponse(200, grant));
    expect(identityProvider.tokenUrl).toBe(
      'http://auth.test/realms/test-realm/protocol/openid-connect/token'
    );
  });

  it('requests a password grant as a form post', async () => {
    const { identityProvider, requests } = provider(() => jsonResponse(200, grant));

    await expect(identityProvider.requestToken()).resolves.toEqual({
      accessToken: 'access-1',
      expiresIn: 300,
      refreshToken: 'refresh-1',
      refreshExpiresIn: 1800,
    });

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('POST');
    expect(requests[0].headers['content-type']).toBe('application/x-www-form-urlencoded');
    expect(requests[0].body).toBe(
      'grant_type=password&client_id=test-client&client_secret=test-secret&username=test-user&password=test-password'
    );
  });

  it('exchanges a refresh token', async () => {
    const { identityProvider, requests } = provider(() => jsonResponse(200, grant));

    await identityProvider.refreshToken('refresh-0');

    expect(requests[0].body).toBe(
      'grant_type=refresh_token&client_id=test-client&client_secret=test-secret&refresh_token=refresh-0'
    );
  });

  it('falls back to the password grant when the refresh token is rejected', async () => {
    const { identityProvider, requests } = provider((request) =>
      request.body?.startsWith('grant_type=refresh_token')
        ? jsonResponse(400, { error: 'invalid_grant', error_description: 'Session not active' })
        : jsonResponse(200, grant)
    );

    await expect(identityProvider.refreshToken('refresh-0')).resolves.toMatchObject({
      accessToken: 'access-1',
    });
    expect(requests).toHaveLength(2);
    expect(requests[1].body).toContain('grant_type=password');
  });

  it('reports the OAuth error of a rejected request', async () => {
    const { identityProvider } = provider(() =>
      jsonResponse(401, { error: 'invalid_client', error_description: 'Bad secret' })
    );

    const error = await identityProvider.requestToken().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(IdentityProviderError);
    expect(error).toMatchObject({
      message: 'Token request failed: invalid_client - Bad secret',
      status: 401,
      code: 'invalid_client',
    });
  });

  it('reports the status when the error body is not JSON', async () => {
    const { identityProvider } = provider(() => textResponse(503, 'unavailable'));

    await expect(identityProvider.requestToken()).rejects.toThrow(
      'Token request failed: HTTP 503'
    );
  });

  it('rejects a grant without an access token', async () => {
    const { identityProvider } = provider(() => jsonResponse(200, { expires_in: 300 }));

    await expect(identityProvider.requestToken()).rejects.toThrow(
      'Token endpoint returned a malformed response'
    );
  });

  it('wraps connection failures', async () => {
    const { identityProvider } = provider(() => {
      throw new TypeError('fetch failed');
    });

    await expect(identityProvider.requestToken()).rejects.toThrow(
      'Token endpoint unreachable: fetch failed'
    );
  });
});
