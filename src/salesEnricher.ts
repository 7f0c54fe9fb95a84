import { getErrorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { sleep } from './sleep.js';
import type { ProductRecord } from './types.js';

export type SalesLookup = (itemId: string, signal?: AbortSignal) => Promise<number | null>;

export interface EnrichOptions {
  delayMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  onProgress?: (done: number, total: number) => void;
}

export interface EnrichResult {
  records: ProductRecord[];
  missing: number;
  interrupted: boolean;
}

/**
 * Adds the upstream sales estimate to each record. Lookups that fail or
 * return nothing leave `salesCount` null; once interrupted, the remaining
 * records are passed through untouched.
 */
export async function enrichSalesCounts(
  records: ProductRecord[],
  lookup: SalesLookup,
  options: EnrichOptions = {}
): Promise<EnrichResult> {
  const logger = options.logger ?? silentLogger;
  const delayMs = options.delayMs ?? 0;
  const enriched: ProductRecord[] = [];
  let missing = 0;
  let interrupted = false;

  for (const [index, record] of records.entries()) {
    if (options.signal?.aborted) {
      interrupted = true;
    }
    if (interrupted) {
      enriched.push(record);
      missing += record.salesCount === null ? 1 : 0;
      continue;
    }
    if (index > 0 && delayMs > 0) {
      await sleep(delayMs);
    }

    let salesCount: number | null = null;
    try {
      salesCount = await lookup(record.itemId, options.signal);
    } catch (error) {
      logger.debug(`No sales data for ${record.itemId}: ${getErrorMessage(error)}`);
    }
    if (salesCount === null) {
      missing += 1;
    }
    enriched.push(Object.freeze({ ...record, salesCount }));
    options.onProgress?.(index + 1, records.length);
  }

  return { records: enriched, missing, interrupted };
}
