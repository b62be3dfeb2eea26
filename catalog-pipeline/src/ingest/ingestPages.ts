/**
 * Ingest
 *
 * Files freshly extracted products into the catalog: extract, skip ids the
 * store already holds, classify, place, append. Aggregates and the index are
 * left to the consolidator, which should run afterwards.
 */

import type { Classifier } from '../classify/classifier.js';
import type { ShapeLookup } from '../consolidate/placement.js';
import { defaultCategoryName, describeShapes, placeAtPath, PlannedShapes, resolveTargetPath } from '../consolidate/placement.js';
import type { ExtractorOptions, ScrapedPage } from '../extract/extractPage.js';
import { DEFAULT_EXTRACTOR_OPTIONS, extractPage } from '../extract/extractPage.js';
import type { CatalogStore } from '../store/catalogStore.js';
import { categoryFilePath, productDetailsPath } from '../store/catalogStore.js';
import type { CategoryMeta, CategoryNode, LeafNode, ProductDetails, ProductRecord } from '../types/Catalog.js';
import { buildBreadcrumbs, computeFeaturedBrands } from '../utils/catalogMeta.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { lastSegment, topLevel } from '../utils/slug.js';

export interface IngestOptions {
  apply: boolean;
  limit?: number;
  /** File every product under this path instead of classifying it. */
  category?: string;
  extractor?: ExtractorOptions;
  featuredBrandsLimit?: number;
  logger?: Logger;
}

export interface Placement {
  productId: string;
  path: string;
}

export interface ListingSummary {
  source: string;
  name?: string;
  productCount: number;
}

export interface IngestReport {
  dryRun: boolean;
  pages: number;
  extracted: number;
  added: number;
  skippedDuplicates: number;
  noRecordPages: string[];
  listings: ListingSummary[];
  placements: Placement[];
  writes: string[];
}

export function ingestPages(
  pages: readonly ScrapedPage[],
  store: CatalogStore,
  classifier: Classifier,
  options: IngestOptions
): IngestReport {
  const logger = options.logger ?? silentLogger;
  const extractorOptions: ExtractorOptions = {
    ...(options.extractor ?? DEFAULT_EXTRACTOR_OPTIONS),
    detectBrand: title => classifier.detectBrand(title),
  };

  const { nodes } = store.loadAll();
  const { shapeOf: storedShape } = describeShapes(nodes, store.list());
  const knownIds = store.allProductIds();

  const pending = new Map<string, ProductRecord[]>();
  const details: ProductDetails[] = [];
  const planned = new PlannedShapes(storedShape);

  const report: IngestReport = {
    dryRun: !options.apply,
    pages: 0,
    extracted: 0,
    added: 0,
    skippedDuplicates: 0,
    noRecordPages: [],
    listings: [],
    placements: [],
    writes: [],
  };

  const selected = options.limit !== undefined ? pages.slice(0, options.limit) : pages;
  for (const page of selected) {
    report.pages += 1;
    const source = page.source ?? page.manifest.originalUrl;
    const extraction = extractPage(page, extractorOptions);
    for (const warning of extraction.warnings) logger.warn(`${source}: ${warning}`);

    if (extraction.kind === 'none') {
      logger.info(`   ⏭️  ${source}: ${extraction.reason}`);
      report.noRecordPages.push(source);
      continue;
    }

    if (extraction.kind === 'listing') {
      const listing: ListingSummary = { source, productCount: extraction.category.productIds.length };
      if (extraction.category.name) listing.name = extraction.category.name;
      report.listings.push(listing);
      continue;
    }

    for (const product of extraction.products) {
      report.extracted += 1;
      if (knownIds.has(product.productId)) {
        report.skippedDuplicates += 1;
        continue;
      }
      knownIds.add(product.productId);

      const { path, record } = place(product, classifier, planned.shapeOf, options.category);
      planned.add(path);
      const list = pending.get(path) ?? [];
      list.push(record);
      pending.set(path, list);

      details.push({ ...record, categoryPath: path, sourceUrl: page.manifest.originalUrl });
      report.placements.push({ productId: record.productId, path });
      report.added += 1;
    }
  }

  const nameOf = (path: string) => nodes.get(path)?.meta.name ?? defaultCategoryName(path, classifier);
  const featuredLimit = options.featuredBrandsLimit ?? 6;

  for (const [path, added] of pending) {
    const node = appendToLeaf(path, nodes.get(path), added, nameOf, featuredLimit);
    report.writes.push(categoryFilePath(path));
    if (options.apply) store.put(path, node);
  }
  for (const record of details) {
    report.writes.push(productDetailsPath(record.productId));
    if (options.apply) store.putProductDetails(record);
  }

  logger.info(`📦 ${report.added} new product(s) across ${pending.size} category file(s)`);
  return report;
}

function place(
  product: ProductRecord,
  classifier: Classifier,
  shapeOf: ShapeLookup,
  override: string | undefined
): { path: string; record: ProductRecord } {
  const record: ProductRecord = { ...product };

  if (override) {
    const subcategory = classifier.suggestSubcategory(product.title, topLevel(override));
    if (subcategory) record.subcategory = subcategory;
    return { path: placeAtPath(override, shapeOf), record };
  }

  const verdict = classifier.classify(product.title, product.brand);
  if (verdict.subcategory) record.subcategory = verdict.subcategory;
  return { path: resolveTargetPath(verdict.category, verdict.subcategory, classifier, shapeOf), record };
}

function appendToLeaf(
  path: string,
  existing: CategoryNode | undefined,
  added: ProductRecord[],
  nameOf: (path: string) => string,
  featuredLimit: number
): LeafNode {
  const products = existing?.kind === 'leaf' ? [...existing.products, ...added] : added;
  const meta: CategoryMeta = existing?.meta ?? {
    categoryId: path,
    name: nameOf(path),
    slug: lastSegment(path),
    path,
    version: '1.0',
    breadcrumbs: buildBreadcrumbs(path, nameOf),
    featuredBrands: [],
  };
  return {
    kind: 'leaf',
    meta: { ...meta, featuredBrands: computeFeaturedBrands(products, featuredLimit) },
    products,
  };
}
