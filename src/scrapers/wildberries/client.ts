import axios, { type AxiosInstance } from 'axios';
import type { PageRequest, ScraperConfig } from '../../types.js';
import { CATALOGUE_URL, ORDER_QUANTITY_URL } from './constants.js';
import { isRecord } from './mapper.js';

export type ClientConfig = Pick<ScraperConfig, 'userAgent' | 'requestTimeoutMs'>;

/**
 * Thin GET wrapper over the marketplace's public JSON endpoints. Non-2xx
 * responses and network errors surface as axios errors; retrying is left
 * to the caller.
 */
export class WildberriesClient {
  private http: AxiosInstance;

  constructor(config: ClientConfig, http?: AxiosInstance) {
    this.http = http ?? axios.create({
      timeout: config.requestTimeoutMs,
      headers: {
        Accept: '*/*',
        'User-Agent': config.userAgent
      }
    });
  }

  async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.http.get<unknown>(url, { responseType: 'json', signal });
    return response.data;
  }

  fetchPage(request: PageRequest, signal?: AbortSignal): Promise<unknown> {
    return this.getJson(request.endpoint, signal);
  }

  fetchCatalogue(): Promise<unknown> {
    return this.getJson(CATALOGUE_URL);
  }

  /** Units sold for one item, or null when upstream has no figure for it. */
  async fetchOrderQuantity(itemId: string, signal?: AbortSignal): Promise<number | null> {
    const url = new URL(ORDER_QUANTITY_URL);
    url.searchParams.set('nm', itemId);
    const body = await this.getJson(url.toString(), signal);
    if (!Array.isArray(body)) {
      return null;
    }
    const entries: unknown[] = body;
    const entry = entries.find(candidate => isRecord(candidate) && String(candidate.nmId) === itemId) ?? entries[0];
    if (!isRecord(entry)) {
      return null;
    }
    const quantity = entry.qnt;
    return typeof quantity === 'number' && Number.isSafeInteger(quantity) && quantity >= 0 ? quantity : null;
  }
}
