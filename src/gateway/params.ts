/**
 * Parameter builder
 *
 * Provider requests are assembled from required fields plus optional
 * arguments that are copied only when present. Presence means "not
 * undefined and not null": false, 0 and "" are real values.
 */

import { MissingArgumentError } from './errors.js';

export function isPresent<V>(value: V | undefined | null): value is V {
  return value !== undefined && value !== null;
}

export class RequestBuilder<T extends object> {
  private readonly request: T;

  constructor(base: T) {
    this.request = { ...base };
  }

  /**
   * Copy an optional value into the request when present
   */
  set<K extends keyof T>(key: K, value: T[K] | undefined | null): this {
    if (isPresent(value)) {
      this.request[key] = value;
    }
    return this;
  }

  /**
   * Copy a value the request cannot do without
   */
  require<K extends keyof T>(key: K, value: T[K] | undefined | null, argument: string = String(key)): this {
    if (!isPresent(value)) {
      throw new MissingArgumentError(argument);
    }
    this.request[key] = value;
    return this;
  }

  build(): T {
    return { ...this.request };
  }
}

export function buildRequest<T extends object>(base: T): RequestBuilder<T> {
  return new RequestBuilder(base);
}

/**
 * Build a nested value (e.g. `{ Name: profile }`) only from a present source
 */
export function mapPresent<V, R>(value: V | undefined | null, transform: (value: V) => R): R | undefined {
  return isPresent(value) ? transform(value) : undefined;
}

export interface KeyValuePair {
  Key: string;
  Value: string;
}

export type StringMap = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

function isMap(map: StringMap): map is ReadonlyMap<string, string> {
  return map instanceof Map;
}

/**
 * Mapping to `[{ Key, Value }]` in insertion order. Plain objects list
 * integer-like keys first; pass a Map when that matters.
 */
export function keyValuePairs(map: StringMap): KeyValuePair[];
export function keyValuePairs(map: StringMap | undefined): KeyValuePair[] | undefined;
export function keyValuePairs(map: StringMap | undefined): KeyValuePair[] | undefined {
  if (map === undefined) {
    return undefined;
  }
  const entries = isMap(map) ? Array.from(map.entries()) : Object.entries(map);
  return entries.map(([Key, Value]) => ({ Key, Value }));
}

/**
 * Keep only the present fields; undefined when nothing is left
 */
export function compact<T extends object>(fields: { [K in keyof T]: T[K] | undefined | null }): Partial<T> | undefined {
  const result: Partial<T> = {};
  let present = false;
  for (const key in fields) {
    const value = fields[key];
    if (isPresent<T[typeof key]>(value)) {
      result[key] = value;
      present = true;
    }
  }
  return present ? result : undefined;
}
