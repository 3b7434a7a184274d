/**
 * Maintenance connector
 *
 * Administrative operations for test and staging deployments. All of them are
 * destructive and require the service's admin rights.
 */

import type { MaintenanceTable } from '../types.js';
import { none, text } from '../http/decoders.js';
import { success, type ServiceExecutor } from '../http/result-mapping.js';
import type { ServiceUrl } from '../http/service-url.js';

/** Order in which {@link MaintenanceConnector.clearTables} empties the tables */
export const CLEARING_ORDER: readonly MaintenanceTable[] = [
  'pseudonym',
  'domain',
  'auditevent',
];

export class MaintenanceConnector {
  private readonly executor: ServiceExecutor;
  private readonly urls: ServiceUrl;

  constructor(executor: ServiceExecutor, urls: ServiceUrl) {
    this.executor = executor;
    this.urls = urls;
  }

  /**
   * Delete every row of one table
   *
   * @throws {ServiceResponseError} `unexpected-status` for any non-success status
   */
  async clearTable(table: MaintenanceTable): Promise<void> {
    await this.executor.fetchValue({
      operation: `Clearing table ${table}`,
      method: 'DELETE',
      url: this.urls.resolve(['api', 'pseudonymization', 'table', table]),
      statuses: { 200: success(), 204: success() },
      decode: none,
    });
  }

  /**
   * Empty the pseudonym, domain and audit-event tables, in that order
   *
   * Stops at the first table that cannot be cleared.
   */
  async clearTables(): Promise<void> {
    for (const table of CLEARING_ORDER) {
      await this.clearTable(table);
    }
  }

  /**
   * Remove the rights and roles that were created for a domain
   */
  async deleteDomainRightsAndRoles(domainName: string): Promise<void> {
    await this.executor.fetchValue({
      operation: 'Deleting domain rights and roles',
      method: 'DELETE',
      url: this.urls.resolve(['api', 'pseudonymization', 'roles', domainName]),
      statuses: { 200: success(), 204: success() },
      decode: none,
    });
  }

  /**
   * Storage statistics of a table, as reported by the service
   */
  async getStorage(table: MaintenanceTable): Promise<string> {
    return this.executor.fetchValue({
      operation: `Retrieving storage of table ${table}`,
      method: 'GET',
      url: this.urls.resolve(['api', 'pseudonymization', 'table', table, 'storage']),
      statuses: { 200: success() },
      decode: text,
    });
  }
}
