import { describe, expect, it } from 'vitest';
import {
  AuthInitializationError,
  AuthenticationError,
  ClientTransportError,
  PseudonymizationError,
  ServiceResponseError,
  isPseudonymizationError,
  isServiceResponseError,
} from './errors.js';

describe('errors', () => {
  const notFound = new ServiceResponseError('Retrieving domain', 404, 'not-found', 'missing');

  it('names every class', () => {
    expect(notFound.name).toBe('ServiceResponseError');
    expect(new AuthInitializationError('x').name).toBe('AuthInitializationError');
  });

  it('roots the hierarchy at PseudonymizationError', () => {
    const initialization = new AuthInitializationError('x');
    expect(initialization).toBeInstanceOf(AuthenticationError);
    expect(initialization).toBeInstanceOf(PseudonymizationError);
    expect(isPseudonymizationError(notFound)).toBe(true);
    expect(isPseudonymizationError(new Error('plain'))).toBe(false);
  });

  it('matches service errors by reason', () => {
    expect(isServiceResponseError(notFound)).toBe(true);
    expect(isServiceResponseError(notFound, 'not-found')).toBe(true);
    expect(isServiceResponseError(notFound, 'invalid-name')).toBe(false);
    expect(isServiceResponseError(new ClientTransportError('Pinging', 'refused'))).toBe(false);
  });

  it('keeps the cause of transport errors', () => {
    const cause = new TypeError('fetch failed');
    const error = new ClientTransportError('Pinging service', 'fetch failed', { cause });
    expect(error.message).toBe('Pinging service failed: fetch failed');
    expect(error.cause).toBe(cause);
  });
});
