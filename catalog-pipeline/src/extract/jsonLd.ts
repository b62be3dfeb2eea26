import type { CheerioAPI } from 'cheerio';
import { ProductRecordSchema } from '../schemas/catalog.js';
import type { Availability, Breadcrumb, ProductRecord } from '../types/Catalog.js';
import type { ImageOptions } from './images.js';
import { buildProductImages, dedupeGallery } from './images.js';
import { isValidProductId } from './productId.js';

export type JsonLdNode = Record<string, unknown>;

export interface JsonLdBlocks {
  blocks: unknown[];
  invalidBlocks: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Reading
// ─────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is JsonLdNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (value == null) return [];
  return [value];
}

function typesOf(node: JsonLdNode): string[] {
  return toArray(node['@type']).map(type => String(type).toLowerCase());
}

export function readJsonLdBlocks($: CheerioAPI): JsonLdBlocks {
  const blocks: unknown[] = [];
  let invalidBlocks = 0;

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text().trim();
    if (!raw) return;
    try {
      blocks.push(JSON.parse(raw));
    } catch {
      invalidBlocks += 1;
    }
  });

  return { blocks, invalidBlocks };
}

/**
 * Product nodes reachable from a block: direct Products, ItemList entries,
 * and the item offered by a WebPage's main entity.
 */
export function collectProductNodes(value: unknown): JsonLdNode[] {
  if (Array.isArray(value)) return value.flatMap(item => collectProductNodes(item));
  if (!isRecord(value)) return [];
  const graph = value['@graph'];
  if (Array.isArray(graph)) return graph.flatMap(item => collectProductNodes(item));

  const types = typesOf(value);
  if (types.includes('product')) return [value];

  if (types.includes('itemlist')) {
    return toArray(value['itemListElement']).flatMap(element =>
      isRecord(element) && element['item'] !== undefined
        ? collectProductNodes(element['item'])
        : collectProductNodes(element)
    );
  }

  if (types.includes('webpage')) {
    return collectProductNodes(value['mainEntity']);
  }

  if (types.includes('offer') || types.includes('aggregateoffer')) {
    return collectProductNodes(value['itemOffered']);
  }

  // A mainEntity Offer without @type still wraps the product
  const offers = value['offers'];
  if (isRecord(offers) && offers['itemOffered'] !== undefined) {
    return collectProductNodes(offers['itemOffered']);
  }

  return [];
}

export function collectBreadcrumbs(value: unknown): Breadcrumb[] {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = collectBreadcrumbs(item);
      if (found.length > 0) return found;
    }
    return [];
  }
  if (!isRecord(value)) return [];
  const graph = value['@graph'];
  if (Array.isArray(graph)) return collectBreadcrumbs(graph);
  if (!typesOf(value).includes('breadcrumblist')) return [];

  const crumbs: Breadcrumb[] = [];
  for (const element of toArray(value['itemListElement'])) {
    if (!isRecord(element)) continue;
    const item = element['item'];
    const name = stringOf(element['name']) ?? (isRecord(item) ? stringOf(item['name']) : undefined);
    const url = typeof item === 'string' ? item : isRecord(item) ? stringOf(item['@id']) ?? stringOf(item['url']) : undefined;
    if (name) crumbs.push({ name, url: url ?? '' });
  }
  return crumbs;
}

// ─────────────────────────────────────────────────────────────────────────────
// Normalizing
// ─────────────────────────────────────────────────────────────────────────────

function stringOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed || undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function numberOf(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.replace(/[$,]/g, ''));
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function availabilityOf(value: unknown): Availability | undefined {
  const text = stringOf(value);
  if (!text) return undefined;
  if (/InStock/i.test(text)) return 'InStock';
  if (/OutOfStock|SoldOut/i.test(text)) return 'OutOfStock';
  if (/PreOrder|BackOrder/i.test(text)) return 'PreOrder';
  return 'Unknown';
}

function imageUrlsOf(value: unknown): string[] {
  return toArray(value).flatMap(item => {
    if (typeof item === 'string') return [item];
    if (isRecord(item)) {
      const url = stringOf(item['url']) ?? stringOf(item['contentUrl']);
      return url ? [url] : [];
    }
    return [];
  });
}

export function cleanTitle(title: string, suffixes: readonly string[]): string {
  let cleaned = title.replace(/\s+/g, ' ').trim();
  for (const suffix of suffixes) {
    if (cleaned.toLowerCase().endsWith(suffix.toLowerCase())) {
      cleaned = cleaned.slice(0, cleaned.length - suffix.length).trim();
    }
  }
  return cleaned;
}

export interface NormalizeOptions {
  images: ImageOptions;
  titleSuffixes: readonly string[];
}

/** Returns null when the node has no acceptable id or title. */
export function normalizeJsonLdProduct(node: JsonLdNode, options: NormalizeOptions): ProductRecord | null {
  const productId = [node['sku'], node['productID'], node['productId'], node['itemId']]
    .map(stringOf)
    .find((id): id is string => id !== undefined && isValidProductId(id));
  const rawTitle = stringOf(node['name']);
  if (!productId || !rawTitle) return null;

  const title = cleanTitle(rawTitle, options.titleSuffixes);
  const brandNode = node['brand'];
  const brand = isRecord(brandNode) ? stringOf(brandNode['name']) : stringOf(brandNode);

  const offer = toArray(node['offers']).find(isRecord);
  const priceValue = offer ? numberOf(offer['price']) ?? numberOf(offer['lowPrice']) : undefined;
  const currency = offer ? stringOf(offer['priceCurrency']) : undefined;

  const ratingNode = node['aggregateRating'];
  const ratingValue = isRecord(ratingNode) ? numberOf(ratingNode['ratingValue']) : undefined;
  const ratingCount = isRecord(ratingNode)
    ? numberOf(ratingNode['reviewCount']) ?? numberOf(ratingNode['ratingCount']) ?? 0
    : 0;

  const gallery = dedupeGallery(imageUrlsOf(node['image']), options.images.canonicalSize);

  const candidate: ProductRecord = {
    productId,
    title,
    description: stringOf(node['description']),
    brand,
    modelNumber: stringOf(node['mpn']) ?? stringOf(node['model']),
    price: priceValue !== undefined ? { current: priceValue, currency } : undefined,
    rating: ratingValue !== undefined ? { average: ratingValue, count: Math.round(ratingCount) } : undefined,
    availability: offer ? availabilityOf(offer['availability']) : undefined,
    images: buildProductImages(gallery),
    url: stringOf(node['url']),
  };

  const parsed = ProductRecordSchema.safeParse(dropUndefined(candidate));
  return parsed.success ? parsed.data : null;
}

function dropUndefined(record: ProductRecord): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}
