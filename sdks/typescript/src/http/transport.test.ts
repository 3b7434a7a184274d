import { describe, expect, it } from 'vitest';
import { mockFetch, textResponse } from '../test-support.js';
import { FetchTransport } from './transport.js';

describe('FetchTransport', () => {
  it('passes the request through and returns status and body text', async () => {
    const { fetch, requests } = mockFetch(() => textResponse(201, '{"ok":true}'));
    const transport = new FetchTransport({ fetch, timeout: 1000 });

    const response = await transport.send({
      method: 'PUT',
      url: 'http://psn.test/api/item',
      headers: { 'Content-Type': 'application/json' },
      body: '{"a":1}',
    });

    expect(response).toEqual({ status: 201, body: '{"ok":true}' });
    expect(requests).toEqual([
      {
        method: 'PUT',
        url: 'http://psn.test/api/item',
        headers: { 'content-type': 'application/json' },
        body: '{"a":1}',
      },
    ]);
  });

  it('returns non-success statuses without raising', async () => {
    const { fetch } = mockFetch(() => textResponse(500, 'boom'));
    const transport = new FetchTransport({ fetch });

    await expect(
      transport.send({ method: 'GET', url: 'http://psn.test/', headers: {} })
    ).resolves.toEqual({ status: 500, body: 'boom' });
  });

  it('rejects when the connection fails', async () => {
    const { fetch } = mockFetch(() => {
      throw new TypeError('fetch failed');
    });
    const transport = new FetchTransport({ fetch });

    await expect(
      transport.send({ method: 'GET', url: 'http://psn.test/', headers: {} })
    ).rejects.toThrow('fetch failed');
  });
});
