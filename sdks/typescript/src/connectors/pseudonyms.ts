/**
 * Pseudonym connector
 *
 * Operations on the pseudonyms of a single domain. Obtain one through
 * `client.pseudonyms(domainName)`.
 */

import { z } from 'zod';

import { InvalidArgumentError } from '../errors.js';
import { pseudonymSchema } from '../schemas.js';
import type {
  IdentifierItem,
  LinkedPseudonymSource,
  Pseudonym,
  PseudonymLookup,
} from '../types.js';
import { booleanLiteral, json, jsonList, none } from '../http/decoders.js';
import {
  empty,
  failure,
  success,
  type ServiceExecutor,
  type StatusTable,
} from '../http/result-mapping.js';
import type { QueryParams, ServiceUrl } from '../http/service-url.js';

const decodePseudonym = json(pseudonymSchema);
const decodePseudonymList = jsonList(pseudonymSchema);

// Statuses shared by single and batch creation
const CREATION_FAILURES: StatusTable = {
  422: failure('operation-failed', 'Creating the pseudonym failed.'),
  500: failure('pseudonymization-failed', 'The pseudonymization failed.'),
  507: failure(
    'insufficient-pseudonym-space',
    'The domain has no pseudonym space left to create new pseudonyms.'
  ),
};

export class PseudonymConnector {
  /** Name of the domain this connector is bound to */
  readonly domainName: string;

  private readonly executor: ServiceExecutor;
  private readonly urls: ServiceUrl;

  constructor(executor: ServiceExecutor, urls: ServiceUrl, domainName: string) {
    this.executor = executor;
    this.urls = urls;
    this.domainName = domainName;
  }

  // ===========================================================================
  // Creation
  // ===========================================================================

  /**
   * Create pseudonyms for a list of records
   *
   * @param omitPrefix - Leave out the domain's prefix in the generated pseudonyms
   * @returns The created pseudonyms, or `null` if the domain does not exist
   * @throws {ServiceResponseError} `operation-failed`, `pseudonymization-failed`
   *   or `insufficient-pseudonym-space`
   */
  async createBatch(
    pseudonyms: Pseudonym[],
    omitPrefix: boolean
  ): Promise<Pseudonym[] | null> {
    const outcome = await this.executor.execute({
      operation: 'Creating pseudonyms',
      method: 'POST',
      url: this.resolve(['pseudonyms'], { omitPrefix }),
      body: pseudonyms,
      statuses: {
        ...CREATION_FAILURES,
        201: success(),
        404: empty(`The domain "${this.domainName}" was not found.`),
      },
      decode: decodePseudonymList,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * Create a pseudonym for a record or an identifier
   *
   * An identifier item is sent as a pseudonym record with `id` and `idType`
   * set. If the record was already pseudonymized, the existing pseudonym is
   * returned.
   *
   * @example
   * ```typescript
   * const created = await client
   *   .pseudonyms('study-a')
   *   .create({ identifier: '12345', idType: 'ANY' }, true);
   * console.log(created?.psn);
   * ```
   *
   * @returns The pseudonym, or `null` if the domain does not exist
   */
  async create(
    record: Pseudonym | IdentifierItem,
    omitPrefix: boolean
  ): Promise<Pseudonym | null> {
    const outcome = await this.executor.execute({
      operation: 'Creating pseudonym',
      method: 'POST',
      url: this.resolve(['pseudonym'], { omitPrefix }),
      body: toPseudonym(record),
      statuses: {
        ...CREATION_FAILURES,
        200: success(
          'The pseudonym was already in the database; the existing record was returned.'
        ),
        201: success(),
        404: empty(`The domain "${this.domainName}" was not found.`),
      },
      decode: decodePseudonym,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  // ===========================================================================
  // Retrieval
  // ===========================================================================

  /**
   * Find the pseudonyms linked to a record of this domain in another domain
   * of the same tree
   *
   * @returns One list per path through the tree, or `null` if nothing was found
   * @throws {ServiceResponseError} `insufficient-rights`
   */
  async getLinked(
    targetDomain: string,
    source: LinkedPseudonymSource
  ): Promise<Pseudonym[][] | null> {
    const outcome = await this.executor.execute({
      operation: 'Retrieving linked pseudonyms',
      method: 'GET',
      url: this.urls.resolve(
        ['api', 'pseudonymization', 'domains', 'linked-pseudonyms'],
        {
          sourceDomain: this.domainName,
          targetDomain,
          sourceIdentifier: source.identifier,
          sourceIdType: source.idType,
          sourcePsn: source.psn,
        }
      ),
      statuses: {
        200: success(),
        403: failure(
          'insufficient-rights',
          'Insufficient rights to access the linked pseudonyms.'
        ),
        404: empty('No linked pseudonyms were found.'),
      },
      decode: json(z.array(z.array(pseudonymSchema))),
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * Get one pseudonym
   *
   * @returns The pseudonym, or `null` if it does not exist
   * @throws {InvalidArgumentError} If the lookup has neither `id`+`idType` nor `psn`
   */
  async get(lookup: PseudonymLookup): Promise<Pseudonym | null> {
    const query = lookupQuery(lookup);
    const outcome = await this.executor.execute({
      operation: 'Retrieving pseudonym',
      method: 'GET',
      url: this.resolve(['pseudonym'], query),
      statuses: {
        200: success(),
        404: empty('The pseudonym was not found.'),
      },
      decode: decodePseudonym,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * Get all pseudonyms of the domain
   *
   * @returns The pseudonyms, or `null` if the service could not list them
   * @throws {ServiceResponseError} `not-found` if the domain does not exist
   */
  async getBatch(): Promise<Pseudonym[] | null> {
    const outcome = await this.executor.execute({
      operation: 'Retrieving pseudonyms',
      method: 'GET',
      url: this.resolve(['pseudonyms']),
      statuses: {
        200: success(),
        404: failure('not-found', `The domain "${this.domainName}" was not found.`),
        422: empty('Retrieving the pseudonyms failed.'),
      },
      decode: decodePseudonymList,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  // ===========================================================================
  // Update
  // ===========================================================================

  /**
   * Update a list of pseudonym records
   *
   * @returns The updated records, or `null` if the update failed
   * @throws {ServiceResponseError} `not-found`
   */
  async updateBatch(pseudonyms: Pseudonym[]): Promise<Pseudonym[] | null> {
    const outcome = await this.executor.execute({
      operation: 'Updating pseudonyms',
      method: 'PUT',
      url: this.resolve(['pseudonyms']),
      body: pseudonyms,
      statuses: {
        200: success(),
        404: failure('not-found', 'A pseudonym that is to be updated was not found.'),
        422: empty('Updating the pseudonyms failed.'),
      },
      decode: decodePseudonymList,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * Update the reduced attribute set of one pseudonym
   *
   * @returns The updated record, or `null` if the update failed
   * @throws {InvalidArgumentError} If the lookup is incomplete
   * @throws {ServiceResponseError} `not-found`
   */
  async update(lookup: PseudonymLookup, pseudonym: Pseudonym): Promise<Pseudonym | null> {
    const query = lookupQuery(lookup);
    const outcome = await this.executor.execute({
      operation: 'Updating pseudonym',
      method: 'PUT',
      url: this.resolve(['pseudonym'], query),
      body: pseudonym,
      statuses: {
        200: success(),
        404: failure('not-found', 'The pseudonym that is to be updated was not found.'),
        422: empty('Updating the pseudonym failed.'),
      },
      decode: decodePseudonym,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * Update all attributes of one pseudonym
   *
   * @returns The updated record, or `null` if the update failed
   * @throws {InvalidArgumentError} If the lookup is incomplete
   * @throws {ServiceResponseError} `insufficient-rights` or `not-found`
   */
  async updateComplete(
    lookup: PseudonymLookup,
    pseudonym: Pseudonym
  ): Promise<Pseudonym | null> {
    const query = lookupQuery(lookup);
    const outcome = await this.executor.execute({
      operation: 'Updating pseudonym',
      method: 'PUT',
      url: this.resolve(['pseudonym', 'complete'], query),
      body: pseudonym,
      statuses: {
        200: success(),
        403: failure(
          'insufficient-rights',
          'Insufficient rights to update all attributes of the pseudonym.'
        ),
        404: failure('not-found', 'The pseudonym that is to be updated was not found.'),
        422: empty('Updating the pseudonym failed.'),
      },
      decode: decodePseudonym,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  // ===========================================================================
  // Deletion
  // ===========================================================================

  /**
   * Delete all pseudonyms of the domain
   *
   * @returns `true` if deleted, `false` if the service failed to delete them
   * @throws {ServiceResponseError} `not-found`
   */
  async deleteBatch(): Promise<boolean> {
    const outcome = await this.executor.execute({
      operation: 'Deleting pseudonyms',
      method: 'DELETE',
      url: this.resolve(['pseudonyms']),
      statuses: {
        204: success(),
        404: failure('not-found', `The domain "${this.domainName}" was not found.`),
        422: empty('Deleting the pseudonyms failed.'),
      },
      decode: none,
    });
    return outcome.kind === 'success';
  }

  /**
   * Delete one pseudonym
   *
   * @returns `true` if deleted, `false` if the service failed to delete it
   * @throws {InvalidArgumentError} If the lookup is incomplete
   * @throws {ServiceResponseError} `bad-request` or `not-found`
   */
  async delete(lookup: PseudonymLookup): Promise<boolean> {
    const query = lookupQuery(lookup);
    const outcome = await this.executor.execute({
      operation: 'Deleting pseudonym',
      method: 'DELETE',
      url: this.resolve(['pseudonym'], query),
      statuses: {
        204: success(),
        400: failure('bad-request', 'The request to delete the pseudonym was malformed.'),
        404: failure('not-found', 'The pseudonym that is to be deleted was not found.'),
        422: empty('Deleting the pseudonym failed.'),
      },
      decode: none,
    });
    return outcome.kind === 'success';
  }

  // ===========================================================================
  // Validation
  // ===========================================================================

  /**
   * Check a pseudonym's check digit
   *
   * @returns Whether the check digit is valid; `false` if the service
   *   rejected the pseudonym
   * @throws {ServiceResponseError} `not-found` or `no-check-digit`
   */
  async validate(psn: string): Promise<boolean> {
    const outcome = await this.executor.execute({
      operation: 'Validating pseudonym',
      method: 'GET',
      url: this.resolve(['pseudonym', 'validation'], { psn }),
      statuses: {
        200: success(),
        400: empty('The pseudonym could not be validated.'),
        404: failure('not-found', 'The pseudonym that is to be validated was not found.'),
        422: failure(
          'no-check-digit',
          `The domain "${this.domainName}" does not use check digits.`
        ),
      },
      decode: booleanLiteral,
    });
    return outcome.kind === 'success' && outcome.value;
  }

  private resolve(segments: string[], query: QueryParams = {}): string {
    return this.urls.resolve(
      ['api', 'pseudonymization', 'domains', this.domainName, ...segments],
      query
    );
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isIdentifierItem(record: Pseudonym | IdentifierItem): record is IdentifierItem {
  return 'identifier' in record && typeof record.identifier === 'string';
}

function toPseudonym(record: Pseudonym | IdentifierItem): Pseudonym {
  if (isIdentifierItem(record)) {
    return { id: record.identifier, idType: record.idType };
  }
  return record;
}

/**
 * Query parameters addressing one pseudonym. Every present key is sent.
 *
 * @throws {InvalidArgumentError} Without `id` and `idType`, or `psn`
 */
export function lookupQuery(lookup: PseudonymLookup): QueryParams {
  const hasIdentifier = Boolean(lookup.id) && Boolean(lookup.idType);
  if (!hasIdentifier && !lookup.psn) {
    throw new InvalidArgumentError(
      'A pseudonym lookup needs an id together with an idType, or a psn.'
    );
  }
  return { id: lookup.id, idType: lookup.idType, psn: lookup.psn };
}
