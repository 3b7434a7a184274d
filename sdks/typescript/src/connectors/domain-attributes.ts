import type { Domain } from '../types.js';

type AttributeAccessor = (domain: Domain) => unknown;

const ACCESSORS = {
  id: (domain) => domain.id,
  name: (domain) => domain.name,
  prefix: (domain) => domain.prefix,
  validFrom: (domain) => domain.validFrom,
  validFromInherited: (domain) => domain.validFromInherited,
  validTo: (domain) => domain.validTo,
  validToInherited: (domain) => domain.validToInherited,
  validityTime: (domain) => domain.validityTime,
  enforceStartDateValidity: (domain) => domain.enforceStartDateValidity,
  enforceStartDateValidityInherited: (domain) => domain.enforceStartDateValidityInherited,
  enforceEndDateValidity: (domain) => domain.enforceEndDateValidity,
  enforceEndDateValidityInherited: (domain) => domain.enforceEndDateValidityInherited,
  algorithm: (domain) => domain.algorithm,
  algorithmInherited: (domain) => domain.algorithmInherited,
  alphabet: (domain) => domain.alphabet,
  alphabetInherited: (domain) => domain.alphabetInherited,
  randomAlgorithmDesiredSize: (domain) => domain.randomAlgorithmDesiredSize,
  randomAlgorithmDesiredSizeInherited: (domain) => domain.randomAlgorithmDesiredSizeInherited,
  randomAlgorithmDesiredSuccessProbability: (domain) =>
    domain.randomAlgorithmDesiredSuccessProbability,
  randomAlgorithmDesiredSuccessProbabilityInherited: (domain) =>
    domain.randomAlgorithmDesiredSuccessProbabilityInherited,
  multiplePsnAllowed: (domain) => domain.multiplePsnAllowed,
  multiplePsnAllowedInherited: (domain) => domain.multiplePsnAllowedInherited,
  consecutiveValueCounter: (domain) => domain.consecutiveValueCounter,
  pseudonymLength: (domain) => domain.pseudonymLength,
  pseudonymLengthInherited: (domain) => domain.pseudonymLengthInherited,
  paddingCharacter: (domain) => domain.paddingCharacter,
  paddingCharacterInherited: (domain) => domain.paddingCharacterInherited,
  addCheckDigit: (domain) => domain.addCheckDigit,
  addCheckDigitInherited: (domain) => domain.addCheckDigitInherited,
  lengthIncludesCheckDigit: (domain) => domain.lengthIncludesCheckDigit,
  lengthIncludesCheckDigitInherited: (domain) => domain.lengthIncludesCheckDigitInherited,
  salt: (domain) => domain.salt,
  saltLength: (domain) => domain.saltLength,
  description: (domain) => domain.description,
  superDomainID: (domain) => domain.superDomainID,
  superDomainName: (domain) => domain.superDomainName,
} satisfies Record<string, AttributeAccessor>;

/**
 * Domain attributes readable through `DomainConnector.getAttribute`
 */
export type DomainAttribute = keyof typeof ACCESSORS;

// Keyed by lower-cased attribute name
const BY_LOWER_NAME: ReadonlyMap<string, AttributeAccessor> = new Map(
  Object.entries(ACCESSORS).map(([name, accessor]) => [name.toLowerCase(), accessor])
);

/**
 * Read one attribute of a domain as a string
 *
 * The name is matched case-insensitively. Unknown names and absent values
 * yield `null`.
 */
export function extractDomainAttribute(
  domain: Domain,
  attributeName: string
): string | null {
  const accessor = BY_LOWER_NAME.get(attributeName.toLowerCase());
  if (!accessor) {
    return null;
  }
  const value = accessor(domain);
  return value === null || value === undefined ? null : String(value);
}
