/**
 * Result mapping
 *
 * Every operation declares a status table. The executor sends the request
 * and maps the returned status through that table into one of three
 * outcomes:
 *
 * - **success**: the body is decoded and returned,
 * - **empty**: a documented "nothing to do" status; the caller returns its sentinel,
 * - **error**: a {@link ServiceResponseError} with the documented reason.
 *
 * Statuses missing from the table raise a `ServiceResponseError` with reason
 * `unexpected-status`. A request that cannot complete, or a success body that
 * cannot be decoded, raises a {@link ClientTransportError}.
 */

import {
  ClientTransportError,
  ServiceResponseError,
  describeError,
  type ServiceErrorReason,
} from '../errors.js';
import type { Logger } from '../logger.js';
import type { Decoder } from './decoders.js';
import type { RequestBuilder } from './request-builder.js';
import type { HttpMethod, HttpTransport, TransportResponse } from './transport.js';

export type StatusRule =
  | { readonly outcome: 'success'; readonly note?: string }
  | { readonly outcome: 'empty'; readonly note: string }
  | {
      readonly outcome: 'error';
      readonly reason: ServiceErrorReason;
      readonly message: string;
    };

export type StatusTable = Readonly<Partial<Record<number, StatusRule>>>;

export function success(note?: string): StatusRule {
  return { outcome: 'success', note };
}

export function empty(note: string): StatusRule {
  return { outcome: 'empty', note };
}

export function failure(reason: ServiceErrorReason, message: string): StatusRule {
  return { outcome: 'error', reason, message };
}

/**
 * One logical operation against the service
 */
export interface ServiceCall<T> {
  /** Human-readable name, used in logs and error messages (e.g. "Creating domain") */
  operation: string;
  method: HttpMethod;
  url: string;
  /** JSON body, omitted when undefined */
  body?: unknown;
  statuses: StatusTable;
  decode: Decoder<T>;
}

export type Outcome<T> =
  | { kind: 'success'; status: number; value: T }
  | { kind: 'empty'; status: number };

/**
 * Executes {@link ServiceCall}s: builds the authenticated request, sends it,
 * and applies the status table
 */
export class ServiceExecutor {
  private readonly requests: RequestBuilder;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(requests: RequestBuilder, transport: HttpTransport, logger: Logger) {
    this.requests = requests;
    this.transport = transport;
    this.logger = logger;
  }

  /**
   * @throws {AuthenticationError} If no token could be obtained
   * @throws {ClientTransportError} If the request or the body read failed
   * @throws {ServiceResponseError} For error and undocumented statuses
   */
  async execute<T>(call: ServiceCall<T>): Promise<Outcome<T>> {
    const envelope = await this.requests.build(call.body);

    let response: TransportResponse;
    try {
      response = await this.transport.send({
        method: call.method,
        url: call.url,
        headers: envelope.headers,
        body: envelope.body,
      });
    } catch (error) {
      throw new ClientTransportError(call.operation, describeError(error), {
        cause: error,
      });
    }

    const { status } = response;
    const rule = call.statuses[status];
    if (!rule) {
      throw new ServiceResponseError(
        call.operation,
        status,
        'unexpected-status',
        `${call.operation}: unexpected status code ${status} in response.`
      );
    }

    switch (rule.outcome) {
      case 'success':
        if (rule.note) {
          this.logger.debug({ operation: call.operation, status }, rule.note);
        }
        return { kind: 'success', status, value: this.decode(call, response) };
      case 'empty':
        this.logger.debug({ operation: call.operation, status }, rule.note);
        return { kind: 'empty', status };
      case 'error':
        throw new ServiceResponseError(call.operation, status, rule.reason, rule.message);
    }
  }

  /**
   * Execute a call whose status table has no `empty` rule and return the
   * decoded value directly
   */
  async fetchValue<T>(call: ServiceCall<T>): Promise<T> {
    const outcome = await this.execute(call);
    if (outcome.kind === 'empty') {
      throw new ServiceResponseError(
        call.operation,
        outcome.status,
        'unexpected-status',
        `${call.operation}: unexpected status code ${outcome.status} in response.`
      );
    }
    return outcome.value;
  }

  private decode<T>(call: ServiceCall<T>, response: TransportResponse): T {
    try {
      return call.decode(response.body);
    } catch (error) {
      throw new ClientTransportError(
        call.operation,
        `malformed response body (status ${response.status}): ${describeError(error)}`,
        { cause: error }
      );
    }
  }
}
