import { describe, expect, it } from 'vitest';
import { ServiceUrl } from './service-url.js';

describe('ServiceUrl', () => {
  it('resolves the same URL with or without a trailing slash', () => {
    const withSlash = new ServiceUrl('http://psn.test/base/');
    const withoutSlash = new ServiceUrl('http://psn.test/base');

    expect(withSlash.resolve(['api', 'ping'])).toBe('http://psn.test/base/api/ping');
    expect(withoutSlash.resolve(['api', 'ping'])).toBe('http://psn.test/base/api/ping');
  });

  it('builds identical request URLs for both base URL forms', () => {
    const expected = 'http://host:8080/api/pseudonymization/domain?name=X';
    for (const base of ['http://host:8080', 'http://host:8080/']) {
      expect(
        new ServiceUrl(base).resolve(['api', 'pseudonymization', 'domain'], { name: 'X' })
      ).toBe(expected);
    }
  });

  it('encodes path segments', () => {
    const urls = new ServiceUrl('http://psn.test');
    expect(urls.resolve(['domains', 'study a/b', 'salt'])).toBe(
      'http://psn.test/domains/study%20a%2Fb/salt'
    );
  });

  it('encodes query values and skips absent ones', () => {
    const urls = new ServiceUrl('http://psn.test');
    expect(
      urls.resolve(['pseudonym'], {
        id: 'a&b=c',
        idType: undefined,
        psn: null,
        omitPrefix: true,
        limit: 5,
      })
    ).toBe('http://psn.test/pseudonym?id=a%26b%3Dc&omitPrefix=true&limit=5');
  });

  it('leaves out the question mark without query values', () => {
    const urls = new ServiceUrl('http://psn.test');
    expect(urls.resolve(['domain'], { name: null })).toBe('http://psn.test/domain');
  });
});
