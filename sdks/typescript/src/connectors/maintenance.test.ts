import { describe, expect, it } from 'vitest';
import { createTestClient, emptyResponse, textResponse } from '../test-support.js';

const BASE = 'http://psn.test/api/pseudonymization';

describe('MaintenanceConnector', () => {
  it('clears the tables in order', async () => {
    const { client, requests } = createTestClient(() => emptyResponse(204));

    await client.maintenance().clearTables();

    expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
      `DELETE ${BASE}/table/pseudonym`,
      `DELETE ${BASE}/table/domain`,
      `DELETE ${BASE}/table/auditevent`,
    ]);
  });

  it('stops at the first table that cannot be cleared', async () => {
    const { client, requests } = createTestClient((request) =>
      request.url.endsWith('/domain') ? emptyResponse(403) : emptyResponse(200)
    );

    await expect(client.maintenance().clearTables()).rejects.toMatchObject({
      status: 403,
      reason: 'unexpected-status',
    });
    expect(requests).toHaveLength(2);
  });

  it('deletes the rights and roles of a domain', async () => {
    const { client, requests } = createTestClient(() => emptyResponse(200));

    await client.maintenance().deleteDomainRightsAndRoles('TestDomain');
    expect(requests[0]).toMatchObject({
      method: 'DELETE',
      url: `${BASE}/roles/TestDomain`,
    });
  });

  it('returns the storage report as text', async () => {
    const { client, requests } = createTestClient(() => textResponse(200, '8192 kB'));

    await expect(client.maintenance().getStorage('pseudonym')).resolves.toBe('8192 kB');
    expect(requests[0].url).toBe(`${BASE}/table/pseudonym/storage`);
  });
});
