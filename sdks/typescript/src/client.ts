/**
 * Pseudonymization client
 *
 * Entry point of the SDK. One client holds one configuration, one token
 * provider and one transport; the connectors it hands out share them.
 */

import { parseClientConfig, type ClientConfig, type ClientConfigInput } from './config.js';
import { createLogger, type Logger } from './logger.js';
import {
  KeycloakIdentityProvider,
  type IdentityProvider,
} from './auth/identity-provider.js';
import { TokenProvider } from './auth/token-provider.js';
import { none } from './http/decoders.js';
import { RequestBuilder } from './http/request-builder.js';
import { ServiceExecutor, success } from './http/result-mapping.js';
import { ServiceUrl } from './http/service-url.js';
import { FetchTransport, type HttpTransport } from './http/transport.js';
import { DomainConnector } from './connectors/domains.js';
import { MaintenanceConnector } from './connectors/maintenance.js';
import { PersonConnector } from './connectors/persons.js';
import { PseudonymConnector } from './connectors/pseudonyms.js';

/**
 * Configuration options for the pseudonymization client
 */
export interface PseudonymizationClientOptions extends ClientConfigInput {
  /** Custom fetch implementation (for testing or custom environments) */
  fetch?: typeof globalThis.fetch;
  /** Transport used for service requests (default: fetch-based) */
  transport?: HttpTransport;
  /** Token source (default: Keycloak password grant) */
  identityProvider?: IdentityProvider;
  /** Logger (default: pino logger named `psn-client`) */
  logger?: Logger;
  /** Clock in epoch milliseconds, used for token expiry */
  now?: () => number;
  /** Custom headers to include in all service requests */
  headers?: Record<string, string>;
}

/**
 * Client for the pseudonymization service
 *
 * @example
 * ```typescript
 * const client = new PseudonymizationClient({
 *   serviceUrl: 'https://psn.example.org',
 *   keycloakUrl: 'https://auth.example.org',
 *   realm: 'research',
 *   clientId: 'psn-client',
 *   clientSecret: 'test-secret',
 *   userName: 'alice',
 *   password: 'test-password',
 * });
 *
 * const domain = await client.domains().create({ name: 'study-a', prefix: 'SA-' });
 * const psn = await client
 *   .pseudonyms('study-a')
 *   .create({ identifier: '12345', idType: 'ANY' }, false);
 * ```
 */
export class PseudonymizationClient {
  /** Validated configuration */
  readonly config: ClientConfig;
  readonly tokens: TokenProvider;

  private readonly urls: ServiceUrl;
  private readonly requests: RequestBuilder;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  /**
   * @throws {ConfigurationError} If the configuration is incomplete or malformed
   */
  constructor(options: PseudonymizationClientOptions) {
    this.config = parseClientConfig(options);
    this.logger = options.logger ?? createLogger();

    const identityProvider =
      options.identityProvider ??
      new KeycloakIdentityProvider({
        keycloakUrl: this.config.keycloakUrl,
        realm: this.config.realm,
        clientId: this.config.clientId,
        clientSecret: this.config.clientSecret,
        userName: this.config.userName,
        password: this.config.password,
        timeout: this.config.timeout,
        fetch: options.fetch,
        logger: this.logger.child({ component: 'identity-provider' }),
      });

    this.tokens = new TokenProvider(identityProvider, {
      refreshThreshold: this.config.refreshThreshold,
      now: options.now,
      logger: this.logger.child({ component: 'token-provider' }),
    });
    this.requests = new RequestBuilder(this.tokens, options.headers);
    this.transport =
      options.transport ??
      new FetchTransport({ timeout: this.config.timeout, fetch: options.fetch });
    this.urls = new ServiceUrl(this.config.serviceUrl);
  }

  // ===========================================================================
  // Connectors
  // ===========================================================================

  domains(): DomainConnector {
    return new DomainConnector(this.executor('domains'), this.urls);
  }

  /**
   * Pseudonym operations within one domain
   */
  pseudonyms(domainName: string): PseudonymConnector {
    return new PseudonymConnector(this.executor('pseudonyms'), this.urls, domainName);
  }

  persons(): PersonConnector {
    return new PersonConnector(this.executor('persons'), this.urls);
  }

  maintenance(): MaintenanceConnector {
    return new MaintenanceConnector(this.executor('maintenance'), this.urls);
  }

  // ===========================================================================
  // Health
  // ===========================================================================

  /**
   * Check that the service is reachable and accepts the client's token
   *
   * @returns `true` on success
   * @throws {ClientTransportError} If the service cannot be reached
   * @throws {ServiceResponseError} `unexpected-status` for any other status
   */
  async ping(): Promise<boolean> {
    await this.executor('client').fetchValue({
      operation: 'Pinging service',
      method: 'GET',
      url: this.urls.resolve(['api', 'ping']),
      statuses: { 200: success() },
      decode: none,
    });
    return true;
  }

  private executor(connector: string): ServiceExecutor {
    return new ServiceExecutor(
      this.requests,
      this.transport,
      this.logger.child({ connector })
    );
  }
}
