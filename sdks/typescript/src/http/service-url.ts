export type QueryValue = string | number | boolean | null | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * Builds request URLs relative to the service's base URL
 *
 * The base URL may be given with or without a trailing slash. Path segments
 * and query values are percent-encoded; null and undefined query values are
 * left out.
 */
export class ServiceUrl {
  readonly base: string;

  constructor(serviceUrl: string) {
    this.base = serviceUrl.endsWith('/') ? serviceUrl : `${serviceUrl}/`;
  }

  resolve(segments: readonly string[], query: QueryParams = {}): string {
    const path = segments.map((segment) => encodeURIComponent(segment)).join('/');
    const search = Object.entries(query)
      .filter((entry): entry is [string, string | number | boolean] => {
        const value = entry[1];
        return value !== null && value !== undefined;
      })
      .map(
        ([key, value]) =>
          `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`
      )
      .join('&');

    return search ? `${this.base}${path}?${search}` : `${this.base}${path}`;
  }
}
