import '../tests/setup.js';
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { classifyError, normalizeError, normalizeFailure } from './normalizer.js';
import {
  InvalidArgumentError,
  MissingArgumentError,
  NotFoundError,
  ProviderError,
  ToolError,
} from './errors.js';
import { serviceException } from '../tests/fake-provider.js';

describe('classifyError', () => {
  it('classifies validation errors', () => {
    const error = new MissingArgumentError('value');
    assert.deepEqual(classifyError(error), { kind: 'validation', error });
  });

  it('classifies other tool errors as domain failures', () => {
    const error = new NotFoundError('Instance i-1 not found');
    assert.deepEqual(classifyError(error), { kind: 'domain', error });
  });

  it('classifies SDK service exceptions as provider failures', () => {
    const failure = classifyError(serviceException('InvalidVpcID.NotFound', "The vpc ID 'vpc-1' does not exist"));

    assert.equal(failure.kind, 'provider');
    assert.ok(failure.error instanceof ProviderError);
    assert.equal(failure.error.code, 'InvalidVpcID.NotFound');
    assert.deepEqual(failure.error.diagnostic, {
      code: 'InvalidVpcID.NotFound',
      message: "The vpc ID 'vpc-1' does not exist",
      fault: 'client',
      httpStatusCode: 400,
      requestId: 'req-1',
    });
  });

  it('classifies anything else as a transport failure', () => {
    const error = new Error('socket hang up');
    assert.deepEqual(classifyError(error), { kind: 'transport', error });

    const wrapped = classifyError('plain text');
    assert.equal(wrapped.kind, 'transport');
    assert.equal(wrapped.error.message, 'plain text');
  });

  it('keeps a thrown plain object as the provider diagnostic', () => {
    const failure = classifyError({ code: 'Throttling', message: 'Rate exceeded', retryable: true });

    assert.ok(failure.kind === 'provider');
    assert.equal(failure.error.code, 'Throttling');
    assert.equal(failure.error.message, 'Rate exceeded');
    assert.deepEqual(failure.error.diagnostic, { code: 'Throttling', message: 'Rate exceeded', retryable: true });
  });
});

describe('normalizeFailure', () => {
  it('passes validation errors through unchanged', () => {
    const error = new InvalidArgumentError("Invalid argument 'port': Expected number, received string", 'port');
    assert.equal(normalizeFailure({ kind: 'validation', error }), error);
  });

  it('passes domain errors through unchanged', () => {
    const error = new NotFoundError('VPC vpc-1 not found');
    assert.equal(normalizeFailure({ kind: 'domain', error }), error);
  });

  it('serializes the provider diagnostic into the message', () => {
    const normalized = normalizeFailure({ kind: 'provider', error: new ProviderError('X', 'Y') });

    assert.ok(normalized instanceof ToolError);
    assert.deepEqual(JSON.parse(normalized.message), { code: 'X', message: 'Y' });
  });

  it('uses the text of a transport failure', () => {
    assert.equal(normalizeFailure({ kind: 'transport', error: new Error('boom') }).message, 'boom');
  });

  it('falls back to the error name when the message is empty', () => {
    const error = new TypeError('');
    assert.equal(normalizeFailure({ kind: 'transport', error }).message, 'TypeError');
  });
});

describe('normalizeError', () => {
  it('serializes a thrown plain object instead of its string form', () => {
    assert.equal(normalizeError({ code: 'X', message: 'Y' }).message, '{"code":"X","message":"Y"}');
  });

  it('names a thrown object without code or message by its content', () => {
    const failure = classifyError({ reason: 'closed' });

    assert.ok(failure.kind === 'provider');
    assert.equal(failure.error.code, 'UnknownError');
    assert.equal(failure.error.message, '{"reason":"closed"}');
  });

  it('serializes a service exception with every diagnostic field', () => {
    const normalized = normalizeError(serviceException('NoSuchBucket', 'The specified bucket does not exist', 404));

    assert.equal(
      normalized.message,
      '{"code":"NoSuchBucket","message":"The specified bucket does not exist","fault":"client","httpStatusCode":404,"requestId":"req-1"}'
    );
  });
});
