import axios, { AxiosError, type AxiosInstance } from 'axios';
import { resolveQuery, resolveRequestTemplate } from '../src/queryResolver.js';
import type { RawItem, RequestTemplate } from '../src/types.js';

export const templateOptions = { dest: '-1257786', sort: 'popular', locale: 'ru' };

export function keywordTemplate(keyword = 'notebook'): RequestTemplate {
  return resolveRequestTemplate(resolveQuery('keyword', keyword), templateOptions);
}

export function rawItem(id: string | number, overrides: RawItem = {}): RawItem {
  return {
    id,
    name: `Item ${id}`,
    brand: 'Acme',
    brandId: 42,
    priceU: 120000,
    salePriceU: 99900,
    reviewRating: 4.5,
    feedbacks: 10,
    ...overrides
  };
}

export function page(...items: unknown[]): { data: { products: unknown[] } } {
  return { data: { products: items } };
}

export interface StubResponse {
  status: number;
  data: unknown;
}

/** axios instance answered in-process by `handler`; non-2xx statuses reject like the real adapters do. */
export function stubHttp(handler: (url: string) => StubResponse): AxiosInstance {
  return axios.create({
    adapter: async config => {
      const { status, data } = handler(config.url ?? '');
      const response = { data, status, statusText: String(status), headers: {}, config };
      if (status < 200 || status >= 300) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    }
  });
}
