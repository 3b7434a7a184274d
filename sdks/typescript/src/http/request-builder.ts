import type { TokenSource } from '../auth/token-provider.js';

/**
 * Headers and body of one outbound request
 */
export interface RequestEnvelope {
  headers: Record<string, string>;
  body?: string;
}

/**
 * Produces the headers (and optional JSON body) for each service request
 *
 * The token is fetched from the {@link TokenSource} on every call, so each
 * request may trigger a refresh. Token errors propagate unchanged.
 */
export class RequestBuilder {
  private readonly tokens: TokenSource;
  private readonly headers: Record<string, string>;

  /**
   * @param tokens - Source of the bearer token
   * @param headers - Extra headers sent with every request; they cannot
   *   override `Content-Type` or `Authorization`
   */
  constructor(tokens: TokenSource, headers: Record<string, string> = {}) {
    this.tokens = tokens;
    this.headers = headers;
  }

  async build(body?: unknown): Promise<RequestEnvelope> {
    const token = await this.tokens.authenticate();
    const envelope: RequestEnvelope = {
      headers: {
        ...this.headers,
        'Content-Type': 'application/json',
        Authorization: `Bearer ${token}`,
      },
    };

    if (body !== undefined) {
      envelope.body = JSON.stringify(body);
    }

    return envelope;
  }
}
