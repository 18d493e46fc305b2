/**
 * Tool outcomes
 *
 * Handlers report results as values. A failure is tagged with the category
 * the error normalizer needs; callers only ever see the normalized message.
 */

import {
  InvalidArgumentError,
  NotFoundError,
  ProviderError,
  ToolError,
  ValidationError,
} from './errors.js';

export interface Success<T> {
  kind: 'success';
  payload: T;
}

export type Failure =
  | { kind: 'validation'; error: ValidationError }
  | { kind: 'domain'; error: ToolError }
  | { kind: 'provider'; error: ProviderError }
  | { kind: 'transport'; error: Error };

export type ToolOutcome<T = unknown> = Success<T> | Failure;

export function success<T>(payload: T): Success<T> {
  return { kind: 'success', payload };
}

export function notFound(message: string): Failure {
  return { kind: 'domain', error: new NotFoundError(message) };
}

export function invalid(message: string, argument?: string): Failure {
  return { kind: 'validation', error: new InvalidArgumentError(message, argument) };
}

/**
 * Transform the payload of a successful outcome; failures pass through.
 */
export function mapOutcome<T, R>(outcome: ToolOutcome<T>, transform: (payload: T) => R): ToolOutcome<R> {
  return outcome.kind === 'success' ? success(transform(outcome.payload)) : outcome;
}

/**
 * Chain a step that may itself fail.
 */
export async function andThen<T, R>(
  outcome: ToolOutcome<T>,
  next: (payload: T) => ToolOutcome<R> | Promise<ToolOutcome<R>>
): Promise<ToolOutcome<R>> {
  return outcome.kind === 'success' ? next(outcome.payload) : outcome;
}

/**
 * First element, or a not-found failure when there is none.
 */
export function firstOrNotFound<T>(items: readonly T[] | undefined, message: string): ToolOutcome<T> {
  const first = items?.[0];
  return first === undefined ? notFound(message) : success(first);
}
