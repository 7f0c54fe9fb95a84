import { getErrorMessage, MalformedItemError, PageFetchError, PartialResultWarning } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { buildPageRequest } from './queryResolver.js';
import { decodeProductsPage, mapRawItem } from './scrapers/wildberries/mapper.js';
import { sleep } from './sleep.js';
import type { PageRequest, ProductRecord, RequestTemplate } from './types.js';

export type PageFetcher = (request: PageRequest, signal?: AbortSignal) => Promise<unknown>;

export interface PageSummary {
  pageNumber: number;
  itemCount: number;
  added: number;
  total: number;
}

export interface ExtractOptions {
  maxPages?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  requestDelayMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  decodePage?: (body: unknown) => unknown[];
  mapItem?: (raw: unknown) => ProductRecord;
  onPage?: (summary: PageSummary) => void;
  onMalformedItem?: (error: MalformedItemError) => void;
}

export interface ExtractionResult {
  records: ProductRecord[];
  pagesFetched: number;
  malformed: MalformedItemError[];
  warning: PartialResultWarning | null;
}

const DEFAULT_MAX_PAGES = 100;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;

async function fetchItemsWithRetry(
  request: PageRequest,
  fetchPage: PageFetcher,
  decodePage: (body: unknown) => unknown[],
  maxAttempts: number,
  retryDelayMs: number,
  logger: Logger,
  signal?: AbortSignal
): Promise<unknown[]> {
  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      const body = await fetchPage(request, signal);
      return decodePage(body);
    } catch (error) {
      if (attempt >= maxAttempts || signal?.aborted) {
        throw new PageFetchError(request.pageNumber, attempt, error);
      }
      logger.debug(`Page ${request.pageNumber} attempt ${attempt} failed: ${getErrorMessage(error)}`);
      if (retryDelayMs > 0) {
        await sleep(retryDelayMs * attempt);
      }
      if (signal?.aborted) {
        throw new PageFetchError(request.pageNumber, attempt, error);
      }
    }
  }
}

/**
 * Walks result pages from 1 until a page comes back empty or adds nothing
 * new. Records are deduplicated by item id and kept in first-seen order.
 * Fetch failures and interruptions end the walk early with a warning
 * instead of discarding what was collected.
 */
export async function extract(
  template: RequestTemplate,
  fetchPage: PageFetcher,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const requestDelayMs = options.requestDelayMs ?? 0;
  const logger = options.logger ?? silentLogger;
  const decodePage = options.decodePage ?? decodeProductsPage;
  const mapItem = options.mapItem ?? mapRawItem;
  const { signal } = options;

  const seen = new Set<string>();
  const records: ProductRecord[] = [];
  const malformed: MalformedItemError[] = [];
  let pagesFetched = 0;
  let warning: PartialResultWarning | null = null;

  for (let pageNumber = 1; ; pageNumber += 1) {
    if (signal?.aborted) {
      warning = new PartialResultWarning(
        'interrupted',
        pageNumber - 1,
        `Interrupted before page ${pageNumber}; keeping ${records.length} record(s)`
      );
      break;
    }
    if (pageNumber > maxPages) {
      warning = new PartialResultWarning(
        'page_limit',
        maxPages,
        `Stopped at the ${maxPages}-page limit; the end of results was not confirmed`
      );
      break;
    }
    if (pageNumber > 1 && requestDelayMs > 0) {
      await sleep(requestDelayMs);
    }

    const request = buildPageRequest(template, pageNumber);
    logger.debug(`Fetching page ${pageNumber}: ${request.endpoint}`);
    let items: unknown[];
    try {
      items = await fetchItemsWithRetry(request, fetchPage, decodePage, maxAttempts, retryDelayMs, logger, signal);
    } catch (error) {
      if (signal?.aborted) {
        warning = new PartialResultWarning(
          'interrupted',
          pageNumber - 1,
          `Interrupted during page ${pageNumber}; keeping ${records.length} record(s)`,
          error
        );
        break;
      }
      warning = new PartialResultWarning(
        'fetch_failed',
        pageNumber - 1,
        `${getErrorMessage(error)}; keeping ${records.length} record(s) from earlier pages`,
        error
      );
      break;
    }
    pagesFetched += 1;

    if (items.length === 0) {
      logger.debug(`Page ${pageNumber} is empty, done.`);
      break;
    }

    let added = 0;
    for (const raw of items) {
      let record: ProductRecord;
      try {
        record = mapItem(raw);
      } catch (error) {
        if (!(error instanceof MalformedItemError)) {
          throw error;
        }
        const report = error.onPage(pageNumber);
        malformed.push(report);
        logger.warn(`Skipped ${report.describeItem()} on page ${pageNumber}: ${report.message}`);
        options.onMalformedItem?.(report);
        continue;
      }
      if (seen.has(record.itemId)) {
        continue;
      }
      seen.add(record.itemId);
      records.push(record);
      added += 1;
    }

    options.onPage?.({ pageNumber, itemCount: items.length, added, total: records.length });
    if (added === 0) {
      logger.debug(`Page ${pageNumber} added no new items, done.`);
      break;
    }
  }

  return { records, pagesFetched, malformed, warning };
}
