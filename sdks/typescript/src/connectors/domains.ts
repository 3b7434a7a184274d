/**
 * Domain connector
 *
 * Manages pseudonymization domains. Documented failures raise
 * {@link ServiceResponseError}; documented "nothing to do" statuses return
 * `null` or `false`.
 */

import { domainSchema } from '../schemas.js';
import type { Domain } from '../types.js';
import { json, jsonList, none } from '../http/decoders.js';
import {
  empty,
  failure,
  success,
  type ServiceExecutor,
} from '../http/result-mapping.js';
import type { ServiceUrl } from '../http/service-url.js';
import { extractDomainAttribute, type DomainAttribute } from './domain-attributes.js';

const BASE = ['api', 'pseudonymization'] as const;

const decodeDomain = json(domainSchema);

export class DomainConnector {
  private readonly executor: ServiceExecutor;
  private readonly urls: ServiceUrl;

  constructor(executor: ServiceExecutor, urls: ServiceUrl) {
    this.executor = executor;
    this.urls = urls;
  }

  /**
   * List all domains (with their hierarchy)
   */
  async getAll(): Promise<Domain[]> {
    return this.executor.fetchValue({
      operation: 'Retrieving all domains',
      method: 'GET',
      url: this.urls.resolve([...BASE, 'experimental', 'domains', 'hierarchy']),
      statuses: { 200: success() },
      decode: jsonList(domainSchema),
    });
  }

  /**
   * Get a domain by name, with its reduced attribute set
   *
   * @throws {ServiceResponseError} `not-found` if the domain does not exist
   */
  async get(domainName: string): Promise<Domain> {
    return this.fetchDomain('domain', domainName);
  }

  /**
   * Get a domain by name, with all attributes
   *
   * @throws {ServiceResponseError} `not-found` if the domain does not exist
   */
  async getComplete(domainName: string): Promise<Domain> {
    return this.fetchDomain('complete', domainName);
  }

  /**
   * Read a single attribute of a domain
   *
   * The attribute name is matched case-insensitively against the known domain
   * fields.
   *
   * @returns The attribute's string representation; `null` if the name is
   *   unknown, the value is absent, or the user may not read it
   * @throws {ServiceResponseError} `not-found` if the domain does not exist
   */
  async getAttribute(
    domainName: string,
    attributeName: DomainAttribute | (string & {})
  ): Promise<string | null> {
    const outcome = await this.executor.execute({
      operation: 'Retrieving domain attribute',
      method: 'GET',
      url: this.urls.resolve([...BASE, 'domains', domainName, attributeName]),
      statuses: {
        200: success(),
        403: empty(
          `Insufficient rights to read attribute "${attributeName}" from domain "${domainName}".`
        ),
        404: failure('not-found', `The domain "${domainName}" was not found.`),
      },
      decode: decodeDomain,
    });
    return outcome.kind === 'success'
      ? extractDomainAttribute(outcome.value, attributeName)
      : null;
  }

  /**
   * Create a domain from a reduced attribute set
   *
   * A domain that already exists is returned as if it had been created.
   *
   * @returns The stored domain, or `null` if the service could not create it
   * @throws {ServiceResponseError} `parent-not-found` or `invalid-name`
   */
  async create(domain: Domain): Promise<Domain | null> {
    return this.createDomain([...BASE, 'domain'], domain);
  }

  /**
   * Create a domain from a full attribute set
   *
   * @returns The stored domain, or `null` if the service could not create it
   * @throws {ServiceResponseError} `parent-not-found` or `invalid-name`
   */
  async createComplete(domain: Domain): Promise<Domain | null> {
    return this.createDomain([...BASE, 'domain', 'complete'], domain);
  }

  /**
   * Update a domain's reduced attribute set
   *
   * @returns The updated domain, or `null` if the update failed
   * @throws {ServiceResponseError} `not-found` if the domain does not exist
   */
  async update(domainName: string, domain: Domain): Promise<Domain | null> {
    const outcome = await this.executor.execute({
      operation: 'Updating domain',
      method: 'PUT',
      url: this.urls.resolve([...BASE, 'domain'], { name: domainName }),
      body: domain,
      statuses: {
        200: success(),
        404: failure(
          'not-found',
          `The domain that is to be updated (${domainName}) was not found.`
        ),
        422: empty('Updating the domain failed.'),
      },
      decode: decodeDomain,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * Update all attributes of a domain
   *
   * @param recursive - Apply inheritable changes to sub-domains as well
   * @returns The updated domain, or `null` if the update failed
   * @throws {ServiceResponseError} `invalid-salt`, `not-found` or `invalid-name`
   */
  async updateComplete(
    domainName: string,
    domain: Domain,
    recursive: boolean
  ): Promise<Domain | null> {
    const outcome = await this.executor.execute({
      operation: 'Updating domain',
      method: 'PUT',
      url: this.urls.resolve([...BASE, 'domain', 'complete'], {
        name: domainName,
        recursive,
      }),
      body: domain,
      statuses: {
        200: success(),
        400: failure('invalid-salt', 'The provided salt value was invalid.'),
        404: failure(
          'not-found',
          `The domain that is to be updated (${domainName}) was not found.`
        ),
        406: failure(
          'invalid-name',
          `The new domain name is violating the URI-validity: "${domain.name ?? domainName}".`
        ),
        422: empty('Updating the domain failed.'),
      },
      decode: decodeDomain,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * Delete a domain
   *
   * @param recursive - Delete sub-domains as well
   * @returns `true` if deleted, `false` if the service failed to delete it
   * @throws {ServiceResponseError} `not-found` if the domain does not exist
   */
  async delete(domainName: string, recursive: boolean): Promise<boolean> {
    const outcome = await this.executor.execute({
      operation: 'Deleting domain',
      method: 'DELETE',
      url: this.urls.resolve([...BASE, 'domain'], { name: domainName, recursive }),
      statuses: {
        204: success(),
        404: failure(
          'not-found',
          `The domain that is to be deleted (${domainName}) was not found.`
        ),
        500: empty('Deleting the domain failed.'),
      },
      decode: none,
    });
    return outcome.kind === 'success';
  }

  /**
   * Replace the salt value of a domain
   *
   * @param allowEmpty - Accept an empty salt
   * @returns The updated domain, or `null` if the update failed
   * @throws {ServiceResponseError} `invalid-salt` or `not-found`
   */
  async updateSalt(
    domainName: string,
    salt: string,
    allowEmpty: boolean
  ): Promise<Domain | null> {
    const outcome = await this.executor.execute({
      operation: 'Updating salt',
      method: 'PUT',
      url: this.urls.resolve([...BASE, 'domains', domainName, 'salt'], {
        salt,
        allowEmpty,
      }),
      statuses: {
        200: success(),
        400: failure('invalid-salt', 'The provided salt value was invalid.'),
        404: failure(
          'not-found',
          `The domain for which the updated salt-value was given (${domainName}) couldn't be found.`
        ),
        422: empty('Updating the salt failed.'),
      },
      decode: decodeDomain,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  // =========================================================================
  // Private helpers
  // =========================================================================

  private async fetchDomain(
    variant: 'domain' | 'complete',
    domainName: string
  ): Promise<Domain> {
    const segments =
      variant === 'domain' ? [...BASE, 'domain'] : [...BASE, 'domain', 'complete'];
    return this.executor.fetchValue({
      operation: 'Retrieving domain',
      method: 'GET',
      url: this.urls.resolve(segments, { name: domainName }),
      statuses: {
        200: success(),
        404: failure('not-found', `The domain "${domainName}" was not found.`),
      },
      decode: decodeDomain,
    });
  }

  private async createDomain(
    segments: readonly string[],
    domain: Domain
  ): Promise<Domain | null> {
    const outcome = await this.executor.execute({
      operation: 'Creating domain',
      method: 'POST',
      url: this.urls.resolve(segments),
      body: domain,
      statuses: {
        200: success('The domain that was to be inserted was already in the database.'),
        201: success(),
        404: failure(
          'parent-not-found',
          `The parent domain "${domain.superDomainName ?? ''}" was not found.`
        ),
        406: failure(
          'invalid-name',
          `The domain name is violating the URI-validity: "${domain.name ?? ''}".`
        ),
        422: empty('Creating the domain failed.'),
      },
      decode: decodeDomain,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }
}
