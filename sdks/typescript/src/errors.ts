/**
 * Error taxonomy
 *
 * Every error raised by the SDK extends {@link PseudonymizationError}. The
 * subclasses separate the places a call can fail:
 *
 * - the identity provider ({@link AuthenticationError} and its subclasses),
 * - the connection to the service ({@link ClientTransportError}),
 * - the service's answer ({@link ServiceResponseError}),
 * - the caller's input ({@link InvalidArgumentError}, {@link ConfigurationError}).
 */

/**
 * Documented meanings of non-success statuses returned by the service
 */
export type ServiceErrorReason =
  | 'not-found'
  | 'parent-not-found'
  | 'invalid-name'
  | 'invalid-salt'
  | 'insufficient-rights'
  | 'bad-request'
  | 'operation-failed'
  | 'pseudonymization-failed'
  | 'insufficient-pseudonym-space'
  | 'no-check-digit'
  | 'unexpected-status';

/**
 * Base class of all SDK errors
 */
export class PseudonymizationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PseudonymizationError';
  }
}

/**
 * Raised when no bearer token could be obtained
 */
export class AuthenticationError extends PseudonymizationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * The first token could not be obtained (bad credentials, unreachable
 * identity provider). The next call retries the initialization.
 */
export class AuthInitializationError extends AuthenticationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthInitializationError';
  }
}

/**
 * An expiring token could not be refreshed. The stale token is kept but never
 * handed out; the next call retries the refresh.
 */
export class TokenRefreshError extends AuthenticationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TokenRefreshError';
  }
}

/**
 * Error reported by the identity provider's token endpoint
 */
export class IdentityProviderError extends PseudonymizationError {
  /** HTTP status of the token endpoint, if it answered */
  readonly status?: number;
  /** OAuth error code (e.g. `invalid_grant`) */
  readonly code?: string;

  constructor(
    message: string,
    details: { status?: number; code?: string } = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'IdentityProviderError';
    this.status = details.status;
    this.code = details.code;
  }
}

/**
 * The request to the service could not complete: DNS failure, refused
 * connection, timeout, or a response body that could not be read.
 */
export class ClientTransportError extends PseudonymizationError {
  /** Operation that was being performed */
  readonly operation: string;

  constructor(operation: string, message: string, options?: ErrorOptions) {
    super(`${operation} failed: ${message}`, options);
    this.name = 'ClientTransportError';
    this.operation = operation;
  }
}

/**
 * The service answered with a status that is an error for the operation
 */
export class ServiceResponseError extends PseudonymizationError {
  /** HTTP status code returned by the service */
  readonly status: number;
  /** Documented meaning of the status for this operation */
  readonly reason: ServiceErrorReason;
  /** Operation that was being performed */
  readonly operation: string;

  constructor(
    operation: string,
    status: number,
    reason: ServiceErrorReason,
    message: string
  ) {
    super(message);
    this.name = 'ServiceResponseError';
    this.operation = operation;
    this.status = status;
    this.reason = reason;
  }
}

/**
 * A client-side precondition was violated; nothing was sent
 */
export class InvalidArgumentError extends PseudonymizationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The client configuration is incomplete or malformed
 */
export class ConfigurationError extends PseudonymizationError {
  /** One entry per violated constraint, formatted as `path: message` */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid client configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

// =============================================================================
// Type guards
// =============================================================================

export function isPseudonymizationError(
  error: unknown
): error is PseudonymizationError {
  return error instanceof PseudonymizationError;
}

/**
 * Check whether an error is a {@link ServiceResponseError}, optionally with a
 * specific reason
 *
 * @example
 * ```typescript
 * try {
 *   await client.domains().get('study-a');
 * } catch (error) {
 *   if (isServiceResponseError(error, 'not-found')) {
 *     // create it instead
 *   }
 * }
 * ```
 */
export function isServiceResponseError(
  error: unknown,
  reason?: ServiceErrorReason
): error is ServiceResponseError {
  return (
    error instanceof ServiceResponseError &&
    (reason === undefined || error.reason === reason)
  );
}

/**
 * Render an unknown thrown value as a message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
