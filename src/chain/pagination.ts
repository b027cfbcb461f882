// Listing aggregation: page-number and opaque-cursor walks

import { throwIfAborted } from './abort.js';

export const DEFAULT_PAGE_SIZE = 100;

export interface PageWalkOptions {
  pageSize?: number;
  signal?: AbortSignal;
  operation: string;
  key: string;
}

/**
 * Fetch pages 1, 2, ... until a page shorter than `pageSize` arrives.
 * Items are appended in page order. `fetchPage` returns [] for a missing
 * first page.
 */
export async function walkPages<T>(
  fetchPage: (page: number, signal: AbortSignal | undefined) => Promise<readonly T[]>,
  options: PageWalkOptions
): Promise<T[]> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const items: T[] = [];

  for (let page = 1; ; page++) {
    throwIfAborted(options.signal, options.operation, options.key);
    const batch = await fetchPage(page, options.signal);
    items.push(...batch);
    if (batch.length < pageSize) {
      return items;
    }
  }
}

export interface CursorPage<T> {
  items: readonly T[];
  /** Absent, null or '' ends the walk */
  next?: string | null;
}

/**
 * Follow an opaque continuation token until the backend stops returning one.
 */
export async function walkCursor<T>(
  fetchPage: (cursor: string | undefined, signal: AbortSignal | undefined) => Promise<CursorPage<T>>,
  options: Omit<PageWalkOptions, 'pageSize'>
): Promise<T[]> {
  const items: T[] = [];
  let cursor: string | undefined;

  for (;;) {
    throwIfAborted(options.signal, options.operation, options.key);
    const page = await fetchPage(cursor, options.signal);
    items.push(...page.items);
    if (!page.next) {
      return items;
    }
    cursor = page.next;
  }
}
