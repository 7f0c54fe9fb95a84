import { MalformedItemError, PageDecodeError } from '../../errors.js';
import { parseMinorUnits } from '../../money.js';
import type { Money, ProductRecord, RawItem } from '../../types.js';
import { SITE_ORIGIN } from './constants.js';

export function isRecord(value: unknown): value is RawItem {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls the item list out of a catalog or search response. Both
 * `{ data: { products } }` and a bare `{ products }` are accepted; a body
 * without a list is an empty page.
 */
export function decodeProductsPage(body: unknown): unknown[] {
  if (!isRecord(body)) {
    const preview = typeof body === 'string' ? body.slice(0, 120).replace(/\s+/g, ' ') : typeof body;
    throw new PageDecodeError(`Unexpected page body: ${preview}`);
  }
  const container = isRecord(body.data) ? body.data : body;
  const products = container.products;
  return Array.isArray(products) ? products : [];
}

export function buildProductUrl(itemId: string): string {
  return `${SITE_ORIGIN}/catalog/${encodeURIComponent(itemId)}/detail.aspx`;
}

function readItemId(value: unknown): string | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value > 0 ? String(value) : null;
  }
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  return null;
}

function readCount(value: unknown): number | null {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0 ? value : null;
}

function readRating(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return null;
  }
  return value >= 0 && value <= 5 ? value : null;
}

function readSizePrices(raw: RawItem): { basic: Money | null; product: Money | null } {
  const sizes = Array.isArray(raw.sizes) ? raw.sizes : [];
  for (const size of sizes) {
    if (isRecord(size) && isRecord(size.price)) {
      const basic = parseMinorUnits(size.price.basic);
      const product = parseMinorUnits(size.price.product);
      if (basic !== null || product !== null) {
        return { basic, product };
      }
    }
  }
  return { basic: null, product: null };
}

function readPrices(raw: RawItem): { regular: Money; discounted: Money } | null {
  let regular = parseMinorUnits(raw.priceU);
  let discounted = parseMinorUnits(raw.salePriceU);
  if (regular === null && discounted === null) {
    const fromSizes = readSizePrices(raw);
    regular = fromSizes.basic;
    discounted = fromSizes.product;
  }
  if (regular === null) {
    regular = discounted;
  }
  if (regular === null) {
    return null;
  }
  if (discounted === null) {
    discounted = regular;
  }
  // Upstream occasionally reports a sale price above the list price.
  return { regular, discounted: Math.min(discounted, regular) };
}

export function mapRawItem(raw: unknown): ProductRecord {
  if (!isRecord(raw)) {
    throw new MalformedItemError('Item is not an object', raw);
  }

  const itemId = readItemId(raw.id);
  if (!itemId) {
    throw new MalformedItemError('Item has no usable id', raw);
  }
  const name = typeof raw.name === 'string' ? raw.name.trim() : '';
  if (!name) {
    throw new MalformedItemError(`Item ${itemId} has no name`, raw);
  }
  const prices = readPrices(raw);
  if (!prices) {
    throw new MalformedItemError(`Item ${itemId} has no price`, raw);
  }

  const brandId = readCount(raw.brandId);

  return Object.freeze({
    itemId,
    name,
    brand: typeof raw.brand === 'string' ? raw.brand.trim() : '',
    brandId: brandId === null ? null : String(brandId),
    url: buildProductUrl(itemId),
    regularPrice: prices.regular,
    discountedPrice: prices.discounted,
    rating: readRating(raw.reviewRating) ?? readRating(raw.rating),
    reviewCount: readCount(raw.feedbacks) ?? readCount(raw.nmFeedbacks) ?? 0,
    salesCount: null
  });
}
