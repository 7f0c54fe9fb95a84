export type QueryMode = 'category' | 'keyword';

export const QUERY_MODES: readonly QueryMode[] = ['category', 'keyword'];

export interface Query {
  readonly mode: QueryMode;
  readonly value: string;
}

export interface RequestTemplate {
  readonly query: Query;
  readonly label: string;  // used for the output file name
  readonly baseUrl: string;
  readonly params: Readonly<Record<string, string>>;
}

export interface PageRequest {
  readonly endpoint: string;
  readonly pageNumber: number;
  readonly query: Query;
}

export type RawItem = Record<string, unknown>;

/** Integer number of minor currency units (kopecks). */
export type Money = number;

export interface ProductRecord {
  readonly itemId: string;
  readonly name: string;
  readonly brand: string;
  readonly brandId: string | null;
  readonly url: string;
  readonly regularPrice: Money;
  readonly discountedPrice: Money;
  readonly rating: number | null;
  readonly reviewCount: number;
  readonly salesCount: number | null;
}

export interface CatalogueEntry {
  name: string;
  url: string;
  shard: string;
  query: string;
}

export interface ScraperConfig {
  mode?: QueryMode;
  value?: string;
  maxPages: number;
  maxAttempts: number;
  retryDelayMs: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
  userAgent: string;
  dest: string;
  sort: string;
  locale: string;
  outputDir: string;
  cacheDir: string;
  fetchSales: boolean;
  salesDelayMs: number;
  verbose: boolean;
}
