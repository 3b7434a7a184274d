/**
 * HTTP transport
 *
 * Sends one request and returns the raw status and body. Status codes are not
 * interpreted here.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  /**
   * @throws If the request could not complete (connection, timeout, body read)
   */
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Custom fetch implementation (for testing or custom environments) */
  fetch?: typeof globalThis.fetch;
}

/**
 * Transport backed by `fetch`. One instance is created per client and reused
 * for every request, so connections are pooled by the runtime.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;
  private readonly fetchFn: typeof globalThis.fetch;

  constructor(options: FetchTransportOptions = {}) {
    this.timeout = options.timeout ?? 30000;
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.fetchFn(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: AbortSignal.timeout(this.timeout),
    });

    return {
      status: response.status,
      body: await response.text(),
    };
  }
}
