import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildRequest, compact, keyValuePairs, mapPresent } from './params.js';
import { MissingArgumentError } from './errors.js';

interface SampleRequest {
  Name: string;
  Force?: boolean;
  Count?: number;
  Description?: string;
  Tags?: string[];
}

describe('buildRequest', () => {
  it('copies false, 0 and empty strings but skips undefined and null', () => {
    const request = buildRequest<SampleRequest>({ Name: 'web' })
      .set('Force', false)
      .set('Count', 0)
      .set('Description', '')
      .set('Tags', undefined)
      .build();

    assert.deepEqual(request, { Name: 'web', Force: false, Count: 0, Description: '' });
  });

  it('skips null values', () => {
    const request = buildRequest<SampleRequest>({ Name: 'web' }).set('Description', null).build();
    assert.deepEqual(request, { Name: 'web' });
  });

  it('throws MissingArgumentError for an absent required value', () => {
    assert.throws(
      () => buildRequest<SampleRequest>({ Name: 'web' }).require('Count', undefined, 'count'),
      (error: unknown) =>
        error instanceof MissingArgumentError && error.message === 'Missing required argument: count'
    );
  });

  it('does not share state between built requests', () => {
    const builder = buildRequest<SampleRequest>({ Name: 'web' });
    const first = builder.build();
    builder.set('Count', 2);
    assert.deepEqual(first, { Name: 'web' });
    assert.deepEqual(builder.build(), { Name: 'web', Count: 2 });
  });
});

describe('keyValuePairs', () => {
  it('keeps map insertion order', () => {
    const tags = new Map([
      ['Name', 'web'],
      ['2', 'second'],
      ['Env', 'test'],
    ]);
    assert.deepEqual(keyValuePairs(tags), [
      { Key: 'Name', Value: 'web' },
      { Key: '2', Value: 'second' },
      { Key: 'Env', Value: 'test' },
    ]);
  });

  it('converts plain objects', () => {
    assert.deepEqual(keyValuePairs({ Name: 'web', Env: 'test' }), [
      { Key: 'Name', Value: 'web' },
      { Key: 'Env', Value: 'test' },
    ]);
  });

  it('passes undefined through', () => {
    assert.equal(keyValuePairs(undefined), undefined);
  });
});

describe('compact', () => {
  it('keeps present fields only', () => {
    assert.deepEqual(compact<{ a?: string; b?: boolean; c?: number }>({ a: 'x', b: false, c: undefined }), {
      a: 'x',
      b: false,
    });
  });

  it('drops null fields', () => {
    assert.deepEqual(compact<{ a?: string; b?: number }>({ a: null, b: 0 }), { b: 0 });
  });

  it('returns undefined when nothing is present', () => {
    assert.equal(compact<{ a?: string }>({ a: undefined }), undefined);
  });
});

describe('mapPresent', () => {
  it('builds a nested value from a present source', () => {
    assert.deepEqual(
      mapPresent('profile', (name) => ({ Name: name })),
      { Name: 'profile' }
    );
    assert.equal(
      mapPresent(undefined, (name: string) => ({ Name: name })),
      undefined
    );
  });
});
