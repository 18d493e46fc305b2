/**
 * Provider contract
 *
 * Each service describes its provider operations as a map from operation
 * name to request/response types. The SDK-backed client and the in-process
 * fake used by tests both implement ProviderClient over that map.
 */

import { logger } from '../logger.js';
import { classifyError, isRecord } from './normalizer.js';
import { success, ToolOutcome } from './outcome.js';

export interface Operation<Input, Output> {
  input: Input;
  output: Output;
}

export type OperationMap<Ops> = { [K in keyof Ops]: Operation<unknown, unknown> };

export type OperationName<Ops> = keyof Ops & string;

export type OperationTable<Ops extends OperationMap<Ops>> = {
  [K in keyof Ops]: (input: Ops[K]['input']) => Promise<Ops[K]['output']>;
};

/**
 * Calls exactly one provider operation. Rejects with the provider's own
 * error (structured service exception, or anything else for transport
 * failures).
 */
export interface ProviderClient<Ops extends OperationMap<Ops>> {
  call<K extends OperationName<Ops>>(operation: K, input: Ops[K]['input']): Promise<Ops[K]['output']>;
}

/**
 * ProviderClient backed by a table of SDK command senders
 */
export class SdkProvider<Ops extends OperationMap<Ops>> implements ProviderClient<Ops> {
  constructor(
    private readonly service: string,
    private readonly operations: OperationTable<Ops>
  ) {}

  call<K extends OperationName<Ops>>(operation: K, input: Ops[K]['input']): Promise<Ops[K]['output']> {
    logger.debug(`Calling ${this.service} ${operation}`);
    return this.operations[operation](input);
  }
}

/**
 * Run a provider call and capture a rejection as a classified failure.
 */
export async function attempt<T>(call: () => Promise<T>): Promise<ToolOutcome<T>> {
  try {
    return success(await call());
  } catch (error) {
    return classifyError(error);
  }
}

/**
 * Provider response without the SDK's transport metadata
 */
export function stripMetadata(output: unknown): Record<string, unknown> {
  if (!isRecord(output)) {
    return {};
  }
  return Object.fromEntries(Object.entries(output).filter(([key]) => key !== '$metadata'));
}

/**
 * Response body, or a status message when the provider returned nothing
 */
export function bodyOrStatus(output: unknown, message: string): Record<string, unknown> {
  const body = stripMetadata(output);
  return Object.keys(body).length > 0 ? body : { message };
}
