/**
 * Result envelope: the uniform container for every successful tool result
 */

export const JSON_MEDIA_TYPE = 'application/json';

export type ResultEnvelope<T = unknown> = Readonly<{
  type: typeof JSON_MEDIA_TYPE;
  data: T;
}>;

export function wrap<T>(payload: T): ResultEnvelope<T> {
  return Object.freeze({ type: JSON_MEDIA_TYPE, data: payload });
}
