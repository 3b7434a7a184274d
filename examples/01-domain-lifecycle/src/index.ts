/**
 * Domain lifecycle walkthrough
 *
 * Runs once against a live pseudonymization service:
 * 1. Pings the service
 * 2. Creates a domain and reads it back
 * 3. Creates two pseudonyms in it, then deletes one of them and the domain
 * 4. Registers, searches, updates and deletes a person
 *
 * Connection settings come from `PSN_*` environment variables (a `.env` file
 * in the working directory is loaded first).
 */

import 'dotenv/config';
import {
  PseudonymizationClient,
  configFromEnv,
  createLogger,
  describeError,
  type IdentifierItem,
  type Person,
} from '@psn-client/sdk';

const logger = createLogger({ name: 'domain-lifecycle' });

// =============================================================================
// Domains and pseudonyms
// =============================================================================

async function pseudonymWalkthrough(client: PseudonymizationClient): Promise<void> {
  const domainName = `TestDomain-${Date.now()}`;

  const created = await client.domains().create({ name: domainName, prefix: 'TD-' });
  if (created) {
    logger.info({ domain: domainName }, 'Created domain');
  } else {
    logger.warn({ domain: domainName }, 'Failed creating domain');
  }

  const domain = await client.domains().get(domainName);
  logger.info({ domain }, 'Fetched the new domain');

  const pseudonyms = client.pseudonyms(domainName);
  const identifierItem: IdentifierItem = {
    identifier: `TestID-${Date.now()}`,
    idType: 'TestType',
  };
  const record = {
    id: `TestID-${Date.now() + 1}`,
    idType: 'TestType',
    validFrom: new Date().toISOString(),
    validityTime: '1 week',
  };

  const first = await pseudonyms.create(identifierItem, true);
  const second = await pseudonyms.create(record, true);
  if (first && second) {
    logger.info({ psns: [first.psn, second.psn], domain: domainName }, 'Created pseudonyms');
  } else {
    logger.warn({ domain: domainName }, 'Failed creating pseudonyms');
  }

  if (await pseudonyms.delete({ id: record.id, idType: record.idType })) {
    logger.info({ id: record.id, domain: domainName }, 'Deleted pseudonym');
  } else {
    logger.warn({ id: record.id, domain: domainName }, 'Failed deleting pseudonym');
  }

  if (await client.domains().delete(domainName, true)) {
    logger.info({ domain: domainName }, 'Deleted domain');
  } else {
    logger.warn({ domain: domainName }, 'Failed deleting domain');
  }
}

// =============================================================================
// Persons
// =============================================================================

async function personWalkthrough(client: PseudonymizationClient): Promise<void> {
  const key: IdentifierItem = {
    identifier: String(Date.now()),
    idType: 'personTestIdentifier',
  };
  const person: Person = {
    firstName: 'Max',
    lastName: 'Mustermann',
    administrativeGender: 'M',
    dateOfBirth: '1970-01-01',
    identifier: key.identifier,
    idType: key.idType,
    algorithm: { name: 'RANDOM_NUM' },
  };

  const created = await client.persons().create(person);
  if (created) {
    logger.info({ person: created }, 'Registered person');
  } else {
    logger.warn({ identifier: key.identifier }, 'Failed registering person');
  }

  const found = (await client.persons().search(key.identifier)) ?? [];
  if (found.some((candidate) => candidate.identifier === key.identifier)) {
    logger.info({ identifier: key.identifier }, 'Found person');
  } else {
    logger.warn({ identifier: key.identifier }, 'Failed finding person');
  }

  const updated = await client.persons().update(key, { ...person, firstName: 'Erika' });
  if (updated) {
    logger.info({ person: updated }, 'Updated person');
  } else {
    logger.warn({ identifier: key.identifier }, 'Failed updating person');
  }

  if (await client.persons().delete(key)) {
    logger.info({ identifier: key.identifier }, 'Deleted person');
  } else {
    logger.warn({ identifier: key.identifier }, 'Failed deleting person');
  }
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  logger.info('Starting domain lifecycle walkthrough');

  const client = new PseudonymizationClient({ ...configFromEnv(), logger });

  await client.ping();
  logger.info('Service is reachable');

  await pseudonymWalkthrough(client);
  await personWalkthrough(client);

  logger.info('Finished domain lifecycle walkthrough');
}

main().catch((error: unknown) => {
  logger.error({ err: error }, `Walkthrough failed: ${describeError(error)}`);
  process.exitCode = 1;
});
