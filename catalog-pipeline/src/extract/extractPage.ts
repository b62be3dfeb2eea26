/**
 * Page Extractor
 *
 * Turns one saved page (markup + manifest) into product records or a
 * listing of product ids. Strategies run in a fixed order and the first one
 * that yields something valid wins:
 *
 *   1. structured-data   JSON-LD Product / ItemList / WebPage blocks
 *   2. dom-attributes    data-product-id / data-sku
 *   3. product-url       /p/<slug>/<id> in the page URL or its anchors
 *   4. script-variables  "productId": "..." style assignments in scripts
 *
 * On a product detail page (the manifest URL has the /p/<slug>/<id> shape)
 * every strategy produces that page's product; elsewhere strategies 2-4
 * produce a listing. Extraction never throws.
 */

import type { CheerioAPI } from 'cheerio';
import { load } from 'cheerio';
import { ProductRecordSchema } from '../schemas/catalog.js';
import type { Breadcrumb, PageManifest, ProductRecord } from '../types/Catalog.js';
import type { ImageOptions } from './images.js';
import { buildProductImages, dedupeGallery, DEFAULT_IMAGE_OPTIONS, findImageUrlsInMarkup } from './images.js';
import { cleanTitle, collectBreadcrumbs, collectProductNodes, normalizeJsonLdProduct, readJsonLdBlocks } from './jsonLd.js';
import { collectIds, productIdFromUrl, PRODUCT_URL_PATTERN } from './productId.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ScrapedPage {
  html: string;
  manifest: PageManifest;
  /** Where the page came from, for log lines. */
  source?: string;
}

export interface CategoryRecord {
  name?: string;
  productIds: string[];
  breadcrumbs: Breadcrumb[];
  sourceUrl: string;
  archiveTime?: string;
}

export type StrategyName = 'structured-data' | 'dom-attributes' | 'product-url' | 'script-variables';

export type PageExtraction =
  | { kind: 'products'; strategy: StrategyName; products: ProductRecord[]; warnings: string[] }
  | { kind: 'listing'; strategy: StrategyName; category: CategoryRecord; warnings: string[] }
  | { kind: 'none'; reason: string; warnings: string[] };

export interface ExtractorOptions {
  images: ImageOptions;
  /** Retailer suffixes stripped from page titles. */
  titleSuffixes: readonly string[];
  detectBrand?: (title: string) => string | null;
}

export const DEFAULT_EXTRACTOR_OPTIONS: ExtractorOptions = {
  images: DEFAULT_IMAGE_OPTIONS,
  titleSuffixes: [' - The Home Depot'],
};

interface PageContext {
  $: CheerioAPI;
  html: string;
  manifest: PageManifest;
  /** Set when the page itself is a product detail page. */
  pageProductId: string | null;
  jsonLd: unknown[];
  options: ExtractorOptions;
}

type StrategyResult =
  | { kind: 'products'; products: ProductRecord[] }
  | { kind: 'listing'; productIds: string[] }
  | null;

type Strategy = (ctx: PageContext) => StrategyResult;

const ID_ATTRIBUTES = ['data-product-id', 'data-sku'] as const;
const SCRIPT_ID_PATTERN = /"(?:productId|itemId|sku)"\s*:\s*"?(\d+)"?/g;

// ─────────────────────────────────────────────────────────────────────────────
// Strategies
// ─────────────────────────────────────────────────────────────────────────────

function structuredData(ctx: PageContext): StrategyResult {
  const normalizeOptions = { images: ctx.options.images, titleSuffixes: ctx.options.titleSuffixes };
  const products = uniqueById(
    ctx.jsonLd
      .flatMap(block => collectProductNodes(block))
      .map(node => normalizeJsonLdProduct(node, normalizeOptions))
      .filter((product): product is ProductRecord => product !== null)
  );
  if (products.length === 0) return null;

  if (ctx.pageProductId !== null) {
    // Structured data for some other product says nothing about this page
    const own = products.find(product => product.productId === ctx.pageProductId);
    return own ? { kind: 'products', products: [withPageDetails(own, ctx)] } : null;
  }
  return { kind: 'products', products };
}

function domAttributes(ctx: PageContext): StrategyResult {
  const candidates: string[] = [];
  for (const attribute of ID_ATTRIBUTES) {
    ctx.$(`[${attribute}]`).each((_, el) => {
      const value = ctx.$(el).attr(attribute);
      if (value) candidates.push(value);
    });
  }
  return idsResult(ctx, collectIds(candidates));
}

function productUrl(ctx: PageContext): StrategyResult {
  if (ctx.pageProductId !== null) {
    return pageProduct(ctx, ctx.pageProductId);
  }

  const candidates: string[] = [];
  ctx.$('a[href]').each((_, el) => {
    const href = ctx.$(el).attr('href');
    const id = href?.match(PRODUCT_URL_PATTERN)?.[2];
    if (id) candidates.push(id);
  });
  return idsResult(ctx, collectIds(candidates));
}

function scriptVariables(ctx: PageContext): StrategyResult {
  const candidates: string[] = [];
  ctx.$('script').each((_, el) => {
    const text = ctx.$(el).text();
    for (const match of text.matchAll(SCRIPT_ID_PATTERN)) {
      if (match[1]) candidates.push(match[1]);
    }
  });
  return idsResult(ctx, collectIds(candidates));
}

const STRATEGIES: ReadonlyArray<[StrategyName, Strategy]> = [
  ['structured-data', structuredData],
  ['dom-attributes', domAttributes],
  ['product-url', productUrl],
  ['script-variables', scriptVariables],
];

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function idsResult(ctx: PageContext, ids: string[]): StrategyResult {
  if (ids.length === 0) return null;
  if (ctx.pageProductId === null) return { kind: 'listing', productIds: ids };
  // A detail page also links other products; only its own id counts
  return ids.includes(ctx.pageProductId) ? pageProduct(ctx, ctx.pageProductId) : null;
}

function pageTitle(ctx: PageContext): string | undefined {
  const candidates = [ctx.manifest.title, ctx.$('h1').first().text(), ctx.$('title').first().text()];
  for (const candidate of candidates) {
    const cleaned = candidate ? cleanTitle(candidate, ctx.options.titleSuffixes) : '';
    if (cleaned) return cleaned;
  }
  return undefined;
}

function pageGallery(ctx: PageContext): string[] {
  const fromMarkup = findImageUrlsInMarkup(ctx.html, ctx.options.images);
  const fromResources = Object.values(ctx.manifest.resources ?? {}).filter(url => url.includes('productImages/'));
  return dedupeGallery([...fromMarkup, ...fromResources], ctx.options.images.canonicalSize);
}

function pageProduct(ctx: PageContext, productId: string): StrategyResult {
  const title = pageTitle(ctx);
  if (!title) return null;

  const brand = ctx.options.detectBrand?.(title) ?? undefined;
  const candidate: ProductRecord = {
    productId,
    title,
    url: ctx.manifest.originalUrl,
  };
  if (brand) candidate.brand = brand;
  const images = buildProductImages(pageGallery(ctx));
  if (images) candidate.images = images;

  const parsed = ProductRecordSchema.safeParse(candidate);
  return parsed.success ? { kind: 'products', products: [parsed.data] } : null;
}

/** Fill what structured data left out from the rest of the page. */
function withPageDetails(product: ProductRecord, ctx: PageContext): ProductRecord {
  const enriched: ProductRecord = { ...product };
  if (!enriched.images?.primary) {
    const images = buildProductImages(pageGallery(ctx));
    if (images) enriched.images = images;
  }
  if (!enriched.url) enriched.url = ctx.manifest.originalUrl;
  if (!enriched.brand) {
    const brand = ctx.options.detectBrand?.(enriched.title);
    if (brand) enriched.brand = brand;
  }
  return enriched;
}

function uniqueById(products: ProductRecord[]): ProductRecord[] {
  const seen = new Set<string>();
  return products.filter(product => {
    if (seen.has(product.productId)) return false;
    seen.add(product.productId);
    return true;
  });
}

function archiveTimeOf(value: PageManifest['archiveTime']): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
  }
  return undefined;
}

function listingRecord(ctx: PageContext, productIds: string[]): CategoryRecord {
  const name = cleanTitle(ctx.$('h1').first().text() || ctx.$('title').first().text(), ctx.options.titleSuffixes);
  const record: CategoryRecord = {
    productIds,
    breadcrumbs: collectBreadcrumbs(ctx.jsonLd),
    sourceUrl: ctx.manifest.originalUrl,
  };
  if (name) record.name = name;
  const archiveTime = archiveTimeOf(ctx.manifest.archiveTime);
  if (archiveTime) record.archiveTime = archiveTime;
  return record;
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────────────────────────────────────

export function extractPage(page: ScrapedPage, options: ExtractorOptions = DEFAULT_EXTRACTOR_OPTIONS): PageExtraction {
  const warnings: string[] = [];
  let $: CheerioAPI;
  try {
    $ = load(page.html);
  } catch (err) {
    return { kind: 'none', reason: `unparseable markup: ${String(err)}`, warnings };
  }

  const { blocks, invalidBlocks } = readJsonLdBlocks($);
  if (invalidBlocks > 0) warnings.push(`${invalidBlocks} invalid JSON-LD block(s) ignored`);

  const ctx: PageContext = {
    $,
    html: page.html,
    manifest: page.manifest,
    pageProductId: productIdFromUrl(page.manifest.originalUrl),
    jsonLd: blocks,
    options,
  };

  for (const [strategy, run] of STRATEGIES) {
    const result = run(ctx);
    if (!result) continue;
    if (result.kind === 'products') {
      return { kind: 'products', strategy, products: result.products, warnings };
    }
    return { kind: 'listing', strategy, category: listingRecord(ctx, result.productIds), warnings };
  }

  return { kind: 'none', reason: 'no strategy produced a product id', warnings };
}
