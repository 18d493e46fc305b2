/**
 * Pagination drain
 *
 * Pulls every page of a paged provider listing into one array. A failed
 * page fails the whole drain; pages already fetched are dropped.
 */

import { success, ToolOutcome } from './outcome.js';

export interface Page<T> {
  items?: readonly T[];
  /** Token for the following page; absent or empty on the last page */
  nextToken?: string;
}

export type PageFetcher<T> = (cursor: string | undefined) => Promise<ToolOutcome<Page<T>>>;

export async function drainPages<T>(fetchPage: PageFetcher<T>): Promise<ToolOutcome<T[]>> {
  const collected: T[] = [];
  let cursor: string | undefined;

  do {
    const page = await fetchPage(cursor);
    if (page.kind !== 'success') {
      return page;
    }
    collected.push(...(page.payload.items ?? []));
    cursor = page.payload.nextToken ? page.payload.nextToken : undefined;
  } while (cursor !== undefined);

  return success(collected);
}
