/**
 * Response body schemas
 *
 * The client does not interpret the records it forwards; these schemas only
 * establish that a body has the expected shape. Every field is optional and
 * unknown fields are kept.
 */

import { z } from 'zod';

const text = z.string().nullish();
const flag = z.boolean().nullish();
const integer = z.number().int().nullish();
const decimal = z.number().nullish();

export const algorithmSchema = z
  .object({
    id: integer,
    name: text,
    alphabet: text,
    randomAlgorithmDesiredSize: integer,
    randomAlgorithmDesiredSuccessProbability: decimal,
    consecutiveValueCounter: integer,
    pseudonymLength: integer,
    paddingCharacter: text,
    addCheckDigit: flag,
    lengthIncludesCheckDigit: flag,
    salt: text,
    saltLength: integer,
  })
  .passthrough();

export const domainSchema = z
  .object({
    id: integer,
    name: text,
    prefix: text,
    validFrom: text,
    validFromInherited: flag,
    validTo: text,
    validToInherited: flag,
    validityTime: text,
    enforceStartDateValidity: flag,
    enforceStartDateValidityInherited: flag,
    enforceEndDateValidity: flag,
    enforceEndDateValidityInherited: flag,
    algorithm: text,
    algorithmInherited: flag,
    alphabet: text,
    alphabetInherited: flag,
    randomAlgorithmDesiredSize: integer,
    randomAlgorithmDesiredSizeInherited: flag,
    randomAlgorithmDesiredSuccessProbability: decimal,
    randomAlgorithmDesiredSuccessProbabilityInherited: flag,
    multiplePsnAllowed: flag,
    multiplePsnAllowedInherited: flag,
    consecutiveValueCounter: integer,
    pseudonymLength: integer,
    pseudonymLengthInherited: flag,
    paddingCharacter: text,
    paddingCharacterInherited: flag,
    addCheckDigit: flag,
    addCheckDigitInherited: flag,
    lengthIncludesCheckDigit: flag,
    lengthIncludesCheckDigitInherited: flag,
    salt: text,
    saltLength: integer,
    description: text,
    superDomainID: integer,
    superDomainName: text,
  })
  .passthrough();

export const pseudonymSchema = z
  .object({
    id: text,
    idType: text,
    psn: text,
    validFrom: text,
    validFromInherited: flag,
    validTo: text,
    validToInherited: flag,
    validityTime: text,
    domainName: text,
  })
  .passthrough();

export const personSchema = z
  .object({
    id: integer,
    firstName: text,
    lastName: text,
    birthName: text,
    administrativeGender: text,
    dateOfBirth: text,
    street: text,
    postalCode: text,
    city: text,
    country: text,
    identifier: text,
    idType: text,
    algorithm: algorithmSchema.nullish(),
  })
  .passthrough();
