import { InvalidInputError } from './errors.js';
import { findCategory } from './scrapers/wildberries/catalogue.js';
import { CATALOG_API_ORIGIN, SEARCH_API_ORIGIN } from './scrapers/wildberries/constants.js';
import type { CatalogueEntry, PageRequest, Query, QueryMode, RequestTemplate, ScraperConfig } from './types.js';
import { QUERY_MODES } from './types.js';

export type TemplateOptions = Pick<ScraperConfig, 'dest' | 'sort' | 'locale'> & {
  catalogue?: CatalogueEntry[];
};

function isQueryMode(value: string): value is QueryMode {
  return QUERY_MODES.some(mode => mode === value);
}

export function resolveQuery(mode: string, value: string): Query {
  if (!isQueryMode(mode)) {
    throw new InvalidInputError(`Unknown mode "${mode}". Use one of: ${QUERY_MODES.join(', ')}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidInputError(mode === 'category'
      ? 'Category name or link must not be empty'
      : 'Search keyword must not be empty');
  }
  return Object.freeze({ mode, value: trimmed });
}

function sharedParams(options: TemplateOptions): Record<string, string> {
  return {
    appType: '1',
    curr: 'rub',
    dest: options.dest,
    sort: options.sort,
    spp: '0'
  };
}

/**
 * Turns a query into the endpoint and fixed parameters every page request
 * of the run shares. Category mode needs the flattened catalogue.
 */
export function resolveRequestTemplate(query: Query, options: TemplateOptions): RequestTemplate {
  if (query.mode === 'keyword') {
    return Object.freeze({
      query,
      label: query.value,
      baseUrl: `${SEARCH_API_ORIGIN}/exactmatch/${options.locale}/common/v4/search`,
      params: Object.freeze({
        ...sharedParams(options),
        query: query.value.split(/\s+/).join(' '),
        resultset: 'catalog'
      })
    });
  }

  if (!options.catalogue) {
    throw new InvalidInputError('Category lookup needs the catalogue');
  }
  const category = findCategory(options.catalogue, query.value);
  if (!category) {
    throw new InvalidInputError(`Category not found: ${query.value}`);
  }
  const categoryParams: Record<string, string> = {};
  for (const [key, value] of new URLSearchParams(category.query)) {
    categoryParams[key] = value;
  }
  return Object.freeze({
    query,
    label: category.name,
    baseUrl: `${CATALOG_API_ORIGIN}/catalog/${category.shard}/catalog`,
    params: Object.freeze({ ...sharedParams(options), ...categoryParams })
  });
}

export function buildPageRequest(template: RequestTemplate, pageNumber: number): PageRequest {
  if (!Number.isInteger(pageNumber) || pageNumber < 1) {
    throw new InvalidInputError(`Page number must be a positive integer, got ${pageNumber}`);
  }
  const url = new URL(template.baseUrl);
  for (const [key, value] of Object.entries(template.params)) {
    url.searchParams.set(key, value);
  }
  url.searchParams.set('page', String(pageNumber));
  return Object.freeze({ endpoint: url.toString(), pageNumber, query: template.query });
}
