/**
 * Types for the pseudonymization service SDK
 *
 * Records exchanged with the service are derived from the schemas in
 * `schemas.ts`; the remaining types describe how callers address them.
 */

import type { z } from 'zod';
import type {
  algorithmSchema,
  domainSchema,
  personSchema,
  pseudonymSchema,
} from './schemas.js';

// =============================================================================
// Records
// =============================================================================

/**
 * Pseudonymization policy scope, optionally inheriting from a parent domain
 * (`superDomainName`)
 */
export type Domain = z.infer<typeof domainSchema>;

/**
 * Pseudonym record: the generated `psn` bound to an `(id, idType)` pair
 * within a domain, with a validity window
 */
export type Pseudonym = z.infer<typeof pseudonymSchema>;

/**
 * Person record held by the registration service
 */
export type Person = z.infer<typeof personSchema>;

/**
 * Algorithm used to generate a person's identifier
 */
export type Algorithm = z.infer<typeof algorithmSchema>;

// =============================================================================
// Keys
// =============================================================================

/**
 * Identifier of a person, or of the record a pseudonym is created for
 */
export interface IdentifierItem {
  /** The identifying string */
  identifier: string;
  /** Type of the identifier (e.g. a health insurance number) */
  idType: string;
}

/**
 * Addresses a single pseudonym within a domain
 *
 * Usable only when it carries `id` and `idType` together, or `psn`.
 */
export interface PseudonymLookup {
  id?: string | null;
  idType?: string | null;
  psn?: string | null;
}

/**
 * Selects the source record for a linked-pseudonym query
 */
export interface LinkedPseudonymSource {
  identifier?: string | null;
  idType?: string | null;
  psn?: string | null;
}

// =============================================================================
// Maintenance
// =============================================================================

/**
 * Service tables that can be cleared or inspected
 */
export type MaintenanceTable = 'pseudonym' | 'domain' | 'auditevent';
