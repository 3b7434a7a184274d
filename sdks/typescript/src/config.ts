/**
 * Client configuration
 *
 * Validated once when the client is constructed and never mutated afterwards.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/** Default request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Remaining token lifetime (seconds) at or below which the token is refreshed */
export const DEFAULT_REFRESH_THRESHOLD_S = 60;

export const clientConfigSchema = z.object({
  /** Base URL of the pseudonymization service */
  serviceUrl: z.string().url(),
  /** Base URL of the Keycloak server issuing tokens */
  keycloakUrl: z.string().url(),
  realm: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  userName: z.string().min(1),
  password: z.string().min(1),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  refreshThreshold: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_REFRESH_THRESHOLD_S),
});

/** Configuration as accepted from callers (defaults not yet applied) */
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/** Validated configuration */
export type ClientConfig = z.output<typeof clientConfigSchema>;

/**
 * Validate a configuration object
 *
 * @throws {ConfigurationError} listing every violated constraint
 */
export function parseClientConfig(input: ClientConfigInput): ClientConfig {
  const result = clientConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      )
    );
  }
  return result.data;
}

function parseIntegerEnv(raw: string | undefined): number | undefined {
  return raw ? Number.parseInt(raw, 10) : undefined;
}

/**
 * Read the configuration from environment variables
 *
 * | Variable | Field |
 * |---|---|
 * | `PSN_SERVICE_URL` | serviceUrl |
 * | `PSN_KEYCLOAK_URL` | keycloakUrl |
 * | `PSN_REALM` | realm |
 * | `PSN_CLIENT_ID` | clientId |
 * | `PSN_CLIENT_SECRET` | clientSecret |
 * | `PSN_USERNAME` | userName |
 * | `PSN_PASSWORD` | password |
 * | `PSN_TIMEOUT_MS` | timeout |
 * | `PSN_REFRESH_THRESHOLD_S` | refreshThreshold |
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  return parseClientConfig({
    serviceUrl: env.PSN_SERVICE_URL ?? '',
    keycloakUrl: env.PSN_KEYCLOAK_URL ?? '',
    realm: env.PSN_REALM ?? '',
    clientId: env.PSN_CLIENT_ID ?? '',
    clientSecret: env.PSN_CLIENT_SECRET ?? '',
    userName: env.PSN_USERNAME ?? '',
    password: env.PSN_PASSWORD ?? '',
    timeout: parseIntegerEnv(env.PSN_TIMEOUT_MS),
    refreshThreshold: parseIntegerEnv(env.PSN_REFRESH_THRESHOLD_S),
  });
}

/**
 * Fluent builder for {@link ClientConfig}
 *
 * @example
 * ```typescript
 * const config = new ClientConfigBuilder()
 *   .serviceUrl('https://psn.example.org')
 *   .keycloakUrl('https://auth.example.org')
 *   .realm('research')
 *   .clientId('psn-client')
 *   .clientSecret('test-secret')
 *   .userName('alice')
 *   .password('test-password')
 *   .build();
 * ```
 */
export class ClientConfigBuilder {
  private readonly values: Partial<ClientConfigInput> = {};

  serviceUrl(serviceUrl: string): this {
    this.values.serviceUrl = serviceUrl;
    return this;
  }

  keycloakUrl(keycloakUrl: string): this {
    this.values.keycloakUrl = keycloakUrl;
    return this;
  }

  realm(realm: string): this {
    this.values.realm = realm;
    return this;
  }

  clientId(clientId: string): this {
    this.values.clientId = clientId;
    return this;
  }

  clientSecret(clientSecret: string): this {
    this.values.clientSecret = clientSecret;
    return this;
  }

  userName(userName: string): this {
    this.values.userName = userName;
    return this;
  }

  password(password: string): this {
    this.values.password = password;
    return this;
  }

  /**
   * @param timeout - Request timeout in milliseconds
   */
  timeout(timeout: number): this {
    this.values.timeout = timeout;
    return this;
  }

  /**
   * @param seconds - Remaining lifetime at which the token gets refreshed
   */
  refreshThreshold(seconds: number): this {
    this.values.refreshThreshold = seconds;
    return this;
  }

  /**
   * Validate and return the configuration
   *
   * @throws {ConfigurationError} If a required value is missing or malformed
   */
  build(): ClientConfig {
    return parseClientConfig({
      serviceUrl: this.values.serviceUrl ?? '',
      keycloakUrl: this.values.keycloakUrl ?? '',
      realm: this.values.realm ?? '',
      clientId: this.values.clientId ?? '',
      clientSecret: this.values.clientSecret ?? '',
      userName: this.values.userName ?? '',
      password: this.values.password ?? '',
      timeout: this.values.timeout,
      refreshThreshold: this.values.refreshThreshold,
    });
  }
}
