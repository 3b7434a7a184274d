/**
 * Response body decoders
 *
 * A decoder turns the raw response text of a successful call into a typed
 * value. Throwing from a decoder marks the response as malformed.
 */

import { z } from 'zod';

export type Decoder<T> = (text: string) => T;

/**
 * Parse the body as JSON and validate it against a schema
 */
export function json<S extends z.ZodTypeAny>(schema: S): Decoder<z.output<S>> {
  return (text) => schema.parse(JSON.parse(text));
}

/**
 * Parse the body as a JSON array of records matching a schema
 */
export function jsonList<S extends z.ZodTypeAny>(
  schema: S
): Decoder<Array<z.output<S>>> {
  return json(z.array(schema));
}

/**
 * Use the body as-is
 */
export const text: Decoder<string> = (body) => body;

/**
 * Ignore the body
 */
export const none: Decoder<void> = () => undefined;

/**
 * Read the body as a boolean literal: `true` in any letter case is true,
 * anything else is false
 */
export const booleanLiteral: Decoder<boolean> = (body) =>
  body.trim().toLowerCase() === 'true';
