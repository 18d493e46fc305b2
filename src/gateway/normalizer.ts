/**
 * Error normalizer
 *
 * Turns whatever went wrong into exactly one caller-facing ToolError:
 * - validation and domain errors pass through untouched
 * - provider errors and thrown plain objects become their serialized diagnostic
 * - anything else becomes its text
 * Everything is logged here, once, with full detail.
 */

import { ProviderError, ToolError, ValidationError } from './errors.js';
import { Failure } from './outcome.js';
import { compact } from './params.js';
import { logger } from '../logger.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * AWS SDK v3 service exceptions carry $fault and $metadata; network and
 * client-side failures do not carry $fault.
 */
export function isServiceException(error: unknown): error is Error & { $fault: unknown; $metadata: unknown } {
  return error instanceof Error && '$fault' in error && '$metadata' in error;
}

export function providerErrorFromServiceException(
  error: Error & { $fault: unknown; $metadata: unknown }
): ProviderError {
  const metadata = isRecord(error.$metadata) ? error.$metadata : {};
  const diagnostic = compact<Record<string, unknown>>({
    code: error.name,
    message: error.message,
    fault: error.$fault,
    httpStatusCode: metadata.httpStatusCode,
    requestId: metadata.requestId,
  });
  return new ProviderError(error.name, error.message, diagnostic);
}

/**
 * A thrown plain object is a diagnostic already; it is kept whole.
 */
function providerErrorFromMapping(mapping: Record<string, unknown>): ProviderError {
  const code = typeof mapping.code === 'string' ? mapping.code : 'UnknownError';
  const message = typeof mapping.message === 'string' ? mapping.message : JSON.stringify(mapping);
  return new ProviderError(code, message, { ...mapping });
}

/**
 * Work out which kind of failure a raised value is.
 */
export function classifyError(error: unknown): Failure {
  if (error instanceof ValidationError) {
    return { kind: 'validation', error };
  }
  if (error instanceof ToolError) {
    return { kind: 'domain', error };
  }
  if (error instanceof ProviderError) {
    return { kind: 'provider', error };
  }
  if (isServiceException(error)) {
    return { kind: 'provider', error: providerErrorFromServiceException(error) };
  }
  if (error instanceof Error) {
    return { kind: 'transport', error };
  }
  if (isRecord(error)) {
    return { kind: 'provider', error: providerErrorFromMapping(error) };
  }
  return { kind: 'transport', error: new Error(String(error)) };
}

/**
 * Produce the caller-facing error for a failure and log it.
 */
export function normalizeFailure(failure: Failure, context: Record<string, unknown> = {}): ToolError {
  switch (failure.kind) {
    case 'validation':
      logger.warn(`Invalid tool arguments: ${failure.error.message}`, {
        ...context,
        argument: failure.error.argument,
      });
      return failure.error;

    case 'domain':
      logger.warn(`Tool failed: ${failure.error.message}`, context);
      return failure.error;

    case 'provider':
      logger.error(`Provider operation failed: ${failure.error.message}`, {
        ...context,
        diagnostic: failure.error.diagnostic,
        stack: failure.error.stack,
      });
      return new ToolError(JSON.stringify(failure.error.diagnostic));

    case 'transport': {
      logger.error(`Provider call failed: ${failure.error.message}`, {
        ...context,
        error: failure.error.name,
        stack: failure.error.stack,
      });
      return new ToolError(failure.error.message || failure.error.name);
    }
  }
}

export function normalizeError(error: unknown, context: Record<string, unknown> = {}): ToolError {
  return normalizeFailure(classifyError(error), context);
}
