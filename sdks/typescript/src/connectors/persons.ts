import { personSchema } from '../schemas.js';
import type { IdentifierItem, Person } from '../types.js';
import { json, jsonList, none } from '../http/decoders.js';
import { empty, failure, success, type ServiceExecutor } from '../http/result-mapping.js';
import type { QueryParams, ServiceUrl } from '../http/service-url.js';

const PATH = ['api', 'registration', 'person'] as const;

const decodePerson = json(personSchema);

/**
 * Person registration: create, search, read, update and delete person records
 */
export class PersonConnector {
  private readonly executor: ServiceExecutor;
  private readonly urls: ServiceUrl;

  constructor(executor: ServiceExecutor, urls: ServiceUrl) {
    this.executor = executor;
    this.urls = urls;
  }

  /**
   * Register a person
   *
   * @returns The stored person, or `null` if the person already exists
   * @throws {ServiceResponseError} `bad-request` or `operation-failed`
   */
  async create(person: Person): Promise<Person | null> {
    const outcome = await this.executor.execute({
      operation: 'Creating person',
      method: 'POST',
      url: this.urls.resolve(PATH),
      body: person,
      statuses: {
        201: success(),
        400: failure('bad-request', 'The person record was rejected as malformed.'),
        409: empty('The person is already registered.'),
        422: failure('operation-failed', 'Creating the person failed.'),
      },
      decode: decodePerson,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * Search persons by a free-text query
   *
   * A truncated result (too many matches) is returned as-is.
   *
   * @returns Matching persons, or `null` if nothing matched
   */
  async search(query: string): Promise<Person[] | null> {
    const outcome = await this.executor.execute({
      operation: 'Searching persons',
      method: 'GET',
      url: this.urls.resolve(PATH, { q: query }),
      statuses: {
        200: success(),
        206: success('Too many persons matched the query; the result was truncated.'),
        404: empty('No person matched the query.'),
      },
      decode: jsonList(personSchema),
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * @returns The person, or `null` if not registered
   * @throws {ServiceResponseError} `bad-request`
   */
  async get(identifierItem: IdentifierItem): Promise<Person | null> {
    const outcome = await this.executor.execute({
      operation: 'Retrieving person',
      method: 'GET',
      url: this.urls.resolve(PATH, identifierQuery(identifierItem)),
      statuses: {
        200: success(),
        400: failure('bad-request', 'The person lookup was rejected as malformed.'),
        404: empty('The person was not found.'),
      },
      decode: decodePerson,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * @returns The updated person, or `null` if the update failed
   * @throws {ServiceResponseError} `not-found`
   */
  async update(identifierItem: IdentifierItem, person: Person): Promise<Person | null> {
    const outcome = await this.executor.execute({
      operation: 'Updating person',
      method: 'PUT',
      url: this.urls.resolve(PATH, identifierQuery(identifierItem)),
      body: person,
      statuses: {
        200: success(),
        404: failure('not-found', 'The person that is to be updated was not found.'),
        422: empty('Updating the person failed.'),
      },
      decode: decodePerson,
    });
    return outcome.kind === 'success' ? outcome.value : null;
  }

  /**
   * @returns `true` if deleted, `false` if the service failed to delete it
   * @throws {ServiceResponseError} `not-found`
   */
  async delete(identifierItem: IdentifierItem): Promise<boolean> {
    const outcome = await this.executor.execute({
      operation: 'Deleting person',
      method: 'DELETE',
      url: this.urls.resolve(PATH, identifierQuery(identifierItem)),
      statuses: {
        204: success(),
        404: failure('not-found', 'The person that is to be deleted was not found.'),
        422: empty('Deleting the person failed.'),
      },
      decode: none,
    });
    return outcome.kind === 'success';
  }
}

function identifierQuery(item: IdentifierItem): QueryParams {
  return { identifier: item.identifier, idType: item.idType };
}
