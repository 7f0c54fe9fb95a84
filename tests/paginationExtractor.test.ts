import { describe, expect, it, vi } from 'vitest';
import { MalformedItemError } from '../src/errors.js';
import type { Logger } from '../src/logger.js';
import { extract } from '../src/paginationExtractor.js';
import type { PageRequest } from '../src/types.js';
import { keywordTemplate, page, rawItem } from './fixtures.js';

type PageScript = unknown[] | 'fail';

/** Serves scripted pages by number; pages past the script are empty. */
function scriptedFetcher(pages: PageScript[]) {
  return vi.fn(async (request: PageRequest) => {
    const script = pages[request.pageNumber - 1];
    if (script === 'fail') {
      throw new Error('socket hang up');
    }
    return page(...(script ?? []));
  });
}

function recordingLogger() {
  return { info: vi.fn(), warn: vi.fn(), debug: vi.fn() } satisfies Logger;
}

const fast = { retryDelayMs: 0 };

describe('extract', () => {
  it('stops at the first empty page', async () => {
    const fetchPage = scriptedFetcher([[rawItem('A'), rawItem('B')], []]);

    const result = await extract(keywordTemplate(), fetchPage, fast);

    expect(result.records.map(record => record.itemId)).toEqual(['A', 'B']);
    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(result.pagesFetched).toBe(2);
    expect(result.warning).toBeNull();
  });

  it('deduplicates items repeated across pages in first-seen order', async () => {
    const fetchPage = scriptedFetcher([[rawItem('A'), rawItem('B')], [rawItem('B'), rawItem('C')], []]);

    const result = await extract(keywordTemplate(), fetchPage, fast);

    expect(result.records.map(record => record.itemId)).toEqual(['A', 'B', 'C']);
    expect(fetchPage).toHaveBeenCalledTimes(3);
  });

  it('skips malformed items and reports them', async () => {
    const fetchPage = scriptedFetcher([[{ id: 'X', priceU: 100 }, rawItem('A')], []]);
    const logger = recordingLogger();
    const onMalformedItem = vi.fn();

    const result = await extract(keywordTemplate(), fetchPage, { ...fast, logger, onMalformedItem });

    expect(result.records.map(record => record.itemId)).toEqual(['A']);
    expect(result.malformed).toHaveLength(1);
    expect(result.malformed[0]).toBeInstanceOf(MalformedItemError);
    expect(result.malformed[0].pageNumber).toBe(1);
    expect(onMalformedItem).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Skipped item X on page 1: Item X has no name');
  });

  it('returns earlier pages with a warning when a page keeps failing', async () => {
    const fetchPage = scriptedFetcher([[rawItem('A'), rawItem('B')], 'fail']);

    const result = await extract(keywordTemplate(), fetchPage, { ...fast, maxAttempts: 3 });

    expect(result.records.map(record => record.itemId)).toEqual(['A', 'B']);
    expect(fetchPage).toHaveBeenCalledTimes(4);
    expect(result.pagesFetched).toBe(1);
    expect(result.warning?.reason).toBe('fetch_failed');
    expect(result.warning?.lastPage).toBe(1);
    expect(result.warning?.message).toBe(
      'Page 2 failed after 3 attempt(s): socket hang up; keeping 2 record(s) from earlier pages'
    );
  });

  it('returns an empty result with a warning when the first page is unavailable', async () => {
    const fetchPage = scriptedFetcher(['fail']);

    const result = await extract(keywordTemplate(), fetchPage, { ...fast, maxAttempts: 2 });

    expect(result.records).toEqual([]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(result.warning?.reason).toBe('fetch_failed');
    expect(result.warning?.lastPage).toBe(0);
  });

  it('recovers from a transient failure', async () => {
    let calls = 0;
    const fetchPage = vi.fn(async (request: PageRequest) => {
      calls += 1;
      if (calls === 1) {
        throw new Error('timeout of 30000ms exceeded');
      }
      return request.pageNumber === 1 ? page(rawItem('A')) : page();
    });

    const result = await extract(keywordTemplate(), fetchPage, fast);

    expect(result.records.map(record => record.itemId)).toEqual(['A']);
    expect(result.warning).toBeNull();
    expect(fetchPage).toHaveBeenCalledTimes(3);
  });

  it('counts an undecodable body as a failed attempt', async () => {
    const bodies: unknown[] = ['<html>rate limited</html>', page(rawItem('A')), page()];
    const fetchPage = vi.fn(async () => bodies.shift());

    const result = await extract(keywordTemplate(), fetchPage, fast);

    expect(result.records.map(record => record.itemId)).toEqual(['A']);
    expect(result.warning).toBeNull();
  });

  it('stops when a page repeats the previous one', async () => {
    const fetchPage = scriptedFetcher([[rawItem('A'), rawItem('B')], [rawItem('B'), rawItem('A')], [rawItem('C')]]);

    const result = await extract(keywordTemplate(), fetchPage, fast);

    expect(result.records.map(record => record.itemId)).toEqual(['A', 'B']);
    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(result.warning).toBeNull();
  });

  it('stops at the page ceiling', async () => {
    const fetchPage = vi.fn(async (request: PageRequest) => page(rawItem(`item-${request.pageNumber}`)));

    const result = await extract(keywordTemplate(), fetchPage, { ...fast, maxPages: 3 });

    expect(fetchPage).toHaveBeenCalledTimes(3);
    expect(result.records).toHaveLength(3);
    expect(result.warning?.reason).toBe('page_limit');
    expect(result.warning?.lastPage).toBe(3);
    expect(result.warning?.message).toBe('Stopped at the 3-page limit; the end of results was not confirmed');
  });

  it('stops between pages once the signal is aborted', async () => {
    const controller = new AbortController();
    const fetchPage = scriptedFetcher([[rawItem('A')], [rawItem('B')], []]);

    const result = await extract(keywordTemplate(), fetchPage, {
      ...fast,
      signal: controller.signal,
      onPage: () => controller.abort()
    });

    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(result.records.map(record => record.itemId)).toEqual(['A']);
    expect(result.warning?.reason).toBe('interrupted');
    expect(result.warning?.lastPage).toBe(1);
  });

  it('reports an interruption when a page request is cancelled mid-flight', async () => {
    const controller = new AbortController();
    const fetchPage = vi.fn((request: PageRequest, signal?: AbortSignal) => {
      if (request.pageNumber === 1) {
        return Promise.resolve(page(rawItem('A')));
      }
      return new Promise<unknown>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('canceled')));
        controller.abort();
      });
    });

    const result = await extract(keywordTemplate(), fetchPage, { ...fast, maxAttempts: 3, signal: controller.signal });

    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(result.records.map(record => record.itemId)).toEqual(['A']);
    expect(result.pagesFetched).toBe(1);
    expect(result.warning?.reason).toBe('interrupted');
    expect(result.warning?.lastPage).toBe(1);
    expect(result.warning?.message).toBe('Interrupted during page 2; keeping 1 record(s)');
  });

  it('does not retry once interrupted during the backoff', async () => {
    const controller = new AbortController();
    const fetchPage = vi.fn(async () => {
      setTimeout(() => controller.abort(), 1);
      throw new Error('socket hang up');
    });

    const result = await extract(keywordTemplate(), fetchPage, {
      maxAttempts: 3,
      retryDelayMs: 30,
      signal: controller.signal
    });

    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(result.records).toEqual([]);
    expect(result.warning?.reason).toBe('interrupted');
    expect(result.warning?.lastPage).toBe(0);
  });

  it('requests consecutive page numbers from the template endpoint', async () => {
    const fetchPage = scriptedFetcher([[rawItem('A')], [rawItem('B')], []]);

    await extract(keywordTemplate('pen'), fetchPage, fast);

    const pages = fetchPage.mock.calls.map(([request]) => request.pageNumber);
    expect(pages).toEqual([1, 2, 3]);
    expect(fetchPage.mock.calls[1][0].endpoint).toContain('query=pen');
    expect(fetchPage.mock.calls[1][0].endpoint).toMatch(/&page=2$/);
  });

  it('reports page progress', async () => {
    const fetchPage = scriptedFetcher([[rawItem('A'), rawItem('B')], [rawItem('B'), rawItem('C')], []]);
    const onPage = vi.fn();

    await extract(keywordTemplate(), fetchPage, { ...fast, onPage });

    expect(onPage.mock.calls.map(([summary]) => summary)).toEqual([
      { pageNumber: 1, itemCount: 2, added: 2, total: 2 },
      { pageNumber: 2, itemCount: 2, added: 1, total: 3 }
    ]);
  });

  it('yields the same id set on repeated runs and keeps prices consistent', async () => {
    const pages: PageScript[] = [
      [rawItem('A'), rawItem('B', { salePriceU: 500000 })],
      [rawItem('C'), rawItem('A')],
      []
    ];

    const first = await extract(keywordTemplate(), scriptedFetcher(pages), fast);
    const second = await extract(keywordTemplate(), scriptedFetcher(pages), fast);

    const ids = (records: typeof first.records) => new Set(records.map(record => record.itemId));
    expect(ids(second.records)).toEqual(ids(first.records));
    expect(new Set(first.records.map(record => record.itemId)).size).toBe(first.records.length);
    for (const record of first.records) {
      expect(record.discountedPrice).toBeLessThanOrEqual(record.regularPrice);
    }
  });
});
