/**
 * @psn-client/sdk - TypeScript client for a remote pseudonymization service
 *
 * The service replaces identifying data with pseudonyms, scoped by
 * hierarchically organized domains. This SDK authenticates against a Keycloak
 * realm, keeps the bearer token fresh, and maps every service endpoint to a
 * typed method.
 *
 * ## Core Concepts
 *
 * - **Domain**: a pseudonymization scope with its own prefix, alphabet,
 *   validity window and salt, optionally inheriting from a parent domain
 * - **Pseudonym**: the generated `psn` for an `(id, idType)` pair in a domain
 * - **Benign empty**: a documented "nothing to do" status, returned as `null`
 *   or `false` instead of an error
 *
 * ## Quick Start
 *
 * ```typescript
 * import { PseudonymizationClient, configFromEnv } from '@psn-client/sdk';
 *
 * const client = new PseudonymizationClient(configFromEnv());
 *
 * await client.domains().create({ name: 'study-a', prefix: 'SA-' });
 *
 * const created = await client
 *   .pseudonyms('study-a')
 *   .create({ identifier: '12345', idType: 'ANY' }, false);
 * console.log(`Pseudonym: ${created?.psn}`);
 * ```
 *
 * @module @psn-client/sdk
 */

// =============================================================================
// Types
// =============================================================================

export type {
  // Records
  Domain,
  Pseudonym,
  Person,
  Algorithm,
  // Keys
  IdentifierItem,
  PseudonymLookup,
  LinkedPseudonymSource,
  // Maintenance
  MaintenanceTable,
} from './types.js';

export {
  domainSchema,
  pseudonymSchema,
  personSchema,
  algorithmSchema,
} from './schemas.js';

// =============================================================================
// Client
// =============================================================================

export {
  PseudonymizationClient,
  type PseudonymizationClientOptions,
} from './client.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  ClientConfigBuilder,
  clientConfigSchema,
  configFromEnv,
  parseClientConfig,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_REFRESH_THRESHOLD_S,
  type ClientConfig,
  type ClientConfigInput,
} from './config.js';

// =============================================================================
// Connectors
// =============================================================================

export { DomainConnector } from './connectors/domains.js';
export { PseudonymConnector } from './connectors/pseudonyms.js';
export { PersonConnector } from './connectors/persons.js';
export { MaintenanceConnector } from './connectors/maintenance.js';
export {
  extractDomainAttribute,
  type DomainAttribute,
} from './connectors/domain-attributes.js';

// =============================================================================
// Authentication
// =============================================================================

export {
  KeycloakIdentityProvider,
  type IdentityProvider,
  type KeycloakIdentityProviderOptions,
  type TokenGrant,
} from './auth/identity-provider.js';

export {
  TokenProvider,
  type TokenSource,
  type TokenProviderOptions,
  type TokenProviderState,
} from './auth/token-provider.js';

// =============================================================================
// HTTP
// =============================================================================

export {
  FetchTransport,
  type FetchTransportOptions,
  type HttpMethod,
  type HttpTransport,
  type TransportRequest,
  type TransportResponse,
} from './http/transport.js';

export { RequestBuilder, type RequestEnvelope } from './http/request-builder.js';

// =============================================================================
// Errors
// =============================================================================

export {
  PseudonymizationError,
  AuthenticationError,
  AuthInitializationError,
  TokenRefreshError,
  IdentityProviderError,
  ClientTransportError,
  ServiceResponseError,
  InvalidArgumentError,
  ConfigurationError,
  isPseudonymizationError,
  isServiceResponseError,
  describeError,
  type ServiceErrorReason,
} from './errors.js';

// =============================================================================
// Logging
// =============================================================================

export { createLogger, type Logger, type LoggerOptions } from './logger.js';
