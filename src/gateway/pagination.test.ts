import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { drainPages, Page } from './pagination.js';
import { invalid, success, ToolOutcome } from './outcome.js';
import { ProviderError } from './errors.js';

function pagesOf(pages: Array<ToolOutcome<Page<string>>>) {
  const cursors: Array<string | undefined> = [];
  const fetchPage = async (cursor: string | undefined): Promise<ToolOutcome<Page<string>>> => {
    cursors.push(cursor);
    const page = pages[cursors.length - 1];
    if (!page) {
      throw new Error('fetched past the last page');
    }
    return page;
  };
  return { cursors, fetchPage };
}

describe('drainPages', () => {
  it('concatenates pages in order, passing each token forward', async () => {
    const { cursors, fetchPage } = pagesOf([
      success({ items: ['a', 'b'], nextToken: 't1' }),
      success({ items: ['c'], nextToken: 't2' }),
      success({ items: ['d', 'e'] }),
    ]);

    const result = await drainPages(fetchPage);

    assert.deepEqual(result, success(['a', 'b', 'c', 'd', 'e']));
    assert.deepEqual(cursors, [undefined, 't1', 't2']);
  });

  it('treats an empty token as the last page', async () => {
    const { cursors, fetchPage } = pagesOf([success({ items: ['a'], nextToken: '' })]);

    const result = await drainPages(fetchPage);

    assert.deepEqual(result, success(['a']));
    assert.equal(cursors.length, 1);
  });

  it('treats a page without items as empty', async () => {
    const { fetchPage } = pagesOf([success({ nextToken: 't1' }), success({ items: ['b'] })]);

    assert.deepEqual(await drainPages(fetchPage), success(['b']));
  });

  it('returns the failure of a failed page and drops earlier pages', async () => {
    const failure: ToolOutcome<Page<string>> = {
      kind: 'provider',
      error: new ProviderError('Throttling', 'Rate exceeded'),
    };
    const { cursors, fetchPage } = pagesOf([success({ items: ['a'], nextToken: 't1' }), failure]);

    const result = await drainPages(fetchPage);

    assert.equal(result, failure);
    assert.deepEqual(cursors, [undefined, 't1']);
  });

  it('stops at a validation failure on the first page', async () => {
    const failure = invalid('bad cursor');
    const { fetchPage } = pagesOf([failure]);

    assert.equal(await drainPages(fetchPage), failure);
  });
});
