/**
 * Offset/limit pagination
 */

import type { PageRequest, PaginationStrategy, QueryValue } from "../core/types.js";
import { CloudError } from "../core/errors.js";

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MAX_PAGES = 1000;

export class OffsetPaginationStrategy implements PaginationStrategy {
  private offsetQueryParam: string;
  private limitQueryParam: string;
  private pageSize: number;
  private startOffset: number;

  constructor(
    pageSize: number = DEFAULT_PAGE_SIZE,
    startOffset: number = 0,
    offsetQueryParam: string = "offset",
    limitQueryParam: string = "limit"
  ) {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw CloudError.configuration(`Page size must be a positive integer, got ${pageSize}`);
    }
    this.pageSize = pageSize;
    this.startOffset = Math.max(0, startOffset);
    this.offsetQueryParam = offsetQueryParam;
    this.limitQueryParam = limitQueryParam;
  }

  firstPage(): PageRequest {
    return { offset: this.startOffset, limit: this.pageSize };
  }

  /**
   * The API reports no total, so a full page is the only hint that more exist.
   */
  nextPage(current: PageRequest, itemsReturned: number): PageRequest | null {
    if (itemsReturned < current.limit || itemsReturned === 0) {
      return null;
    }
    return { offset: current.offset + itemsReturned, limit: current.limit };
  }

  toQuery(page: PageRequest): Record<string, QueryValue> {
    return {
      [this.offsetQueryParam]: page.offset,
      [this.limitQueryParam]: page.limit,
    };
  }
}

export interface PaginateOptions {
  maxPages?: number;
}

/**
 * Yields items across pages until a short page arrives.
 *
 * Stops after `maxPages`. Requesting an offset twice rejects with an
 * api_error, since the server's paging went backwards.
 */
export async function* paginate<T>(
  fetchPage: (query: Record<string, QueryValue>) => Promise<T[]>,
  strategy: PaginationStrategy,
  options: PaginateOptions = {}
): AsyncGenerator<T, void, undefined> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const seenOffsets = new Set<number>();
  let page: PageRequest | null = strategy.firstPage();
  let pageCount = 0;

  while (page !== null && pageCount < maxPages) {
    if (seenOffsets.has(page.offset)) {
      throw new CloudError(`Pagination cycle detected at offset ${page.offset}`, "api_error", {
        detail: "offset requested twice",
      });
    }
    seenOffsets.add(page.offset);
    pageCount++;

    const items = await fetchPage(strategy.toQuery(page));
    for (const item of items) {
      yield item;
    }

    page = strategy.nextPage(page, items.length);
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
