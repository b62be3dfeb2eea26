/**
 * Catalog Store
 *
 * The only component that knows the on-disk layout:
 *
 *   categories/<cat>[/<sub>[/<subsub>]].json   category files (leaf or branch)
 *   categories/<cat>/_all.json                 subtree aggregates
 *   categories/index.json                      root index
 *   products/<productId>/details.json          per-product details
 *   search-index.json                          keyword lookup for apps
 *   search-index-compact.json                  the same, minified and trimmed
 *
 * Every document is validated on read, so callers never see a half-shaped
 * category. Writes are whole-file and always stamp `lastUpdated`.
 */

import type { z, ZodTypeAny } from 'zod';
import {
  AggregateDocumentSchema,
  CategoryDocumentSchema,
  CategoryIndexSchema,
  ProductDetailsSchema,
  ProductRecordSchema,
  SearchIndexSchema,
} from '../schemas/catalog.js';
import type {
  AggregateDocument,
  CategoryIndex,
  CategoryMeta,
  CategoryNode,
  CompactSearchIndex,
  ProductDetails,
  ProductRecord,
  SearchIndex,
} from '../types/Catalog.js';
import { productCountOf } from '../types/Catalog.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { CatalogFileError } from './errors.js';
import type { StorageBackend } from './storage.js';

const CATEGORIES_DIR = 'categories';
const PRODUCTS_DIR = 'products';
const INDEX_FILE = `${CATEGORIES_DIR}/index.json`;
const AGGREGATE_NAME = '_all.json';
export const SEARCH_INDEX_FILE = 'search-index.json';
export const COMPACT_SEARCH_INDEX_FILE = 'search-index-compact.json';

export function categoryFilePath(path: string): string {
  return `${CATEGORIES_DIR}/${path}.json`;
}

export function aggregateFilePath(path: string): string {
  return `${CATEGORIES_DIR}/${path}/${AGGREGATE_NAME}`;
}

export function productDetailsPath(productId: string): string {
  return `${PRODUCTS_DIR}/${productId}/details.json`;
}

export interface CatalogStoreOptions {
  now?: () => Date;
  logger?: Logger;
}

export interface LoadAllResult {
  nodes: Map<string, CategoryNode>;
  errors: CatalogFileError[];
}

export type RawReadResult =
  | { ok: true; value: unknown }
  | { ok: false; error: CatalogFileError };

export class CatalogStore {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly backend: StorageBackend,
    options: CatalogStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Category files
  // ───────────────────────────────────────────────────────────────────────────

  get(path: string): CategoryNode | undefined {
    const filePath = categoryFilePath(path);
    const text = this.backend.read(filePath);
    if (text === undefined) return undefined;
    const doc = this.decode(filePath, text, CategoryDocumentSchema);

    const { products, subcategories, ...meta } = doc;
    if (products) {
      return { kind: 'leaf', meta, products };
    }
    return { kind: 'branch', meta, subcategories: subcategories ?? [] };
  }

  put(path: string, node: CategoryNode): void {
    this.writeJson(categoryFilePath(path), encodeCategory(node, this.timestamp()));
  }

  /** True when writing `node` would change anything besides `lastUpdated`. */
  differs(path: string, node: CategoryNode): boolean {
    return this.differsFrom(categoryFilePath(path), encodeCategory(node, undefined));
  }

  list(): string[] {
    const prefix = `${CATEGORIES_DIR}/`;
    return this.backend
      .list(CATEGORIES_DIR)
      .filter(file => file.endsWith('.json') && file !== INDEX_FILE)
      .filter(file => !basename(file).startsWith('_'))
      .map(file => file.slice(prefix.length, -'.json'.length))
      .sort();
  }

  loadAll(): LoadAllResult {
    const nodes = new Map<string, CategoryNode>();
    const errors: CatalogFileError[] = [];

    for (const path of this.list()) {
      try {
        const node = this.get(path);
        if (node) nodes.set(path, node);
      } catch (err) {
        const error = err instanceof CatalogFileError
          ? err
          : new CatalogFileError(categoryFilePath(path), String(err), { cause: err });
        this.logger.warn(`Skipping ${error.message}`);
        errors.push(error);
      }
    }

    return { nodes, errors };
  }

  /** Read fresh from storage on every call. */
  allProductIds(): Set<string> {
    const ids = new Set<string>();
    for (const node of this.loadAll().nodes.values()) {
      if (node.kind !== 'leaf') continue;
      for (const product of node.products) ids.add(product.productId);
    }
    return ids;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Aggregates and index
  // ───────────────────────────────────────────────────────────────────────────

  getAggregate(path: string): AggregateDocument | undefined {
    const filePath = aggregateFilePath(path);
    const text = this.backend.read(filePath);
    if (text === undefined) return undefined;
    return this.decode(filePath, text, AggregateDocumentSchema);
  }

  putAggregate(path: string, doc: AggregateDocument): void {
    this.writeJson(aggregateFilePath(path), encodeAggregate(doc, this.timestamp()));
  }

  aggregateDiffers(path: string, doc: AggregateDocument): boolean {
    return this.differsFrom(aggregateFilePath(path), encodeAggregate(doc, undefined));
  }

  getIndex(): CategoryIndex | undefined {
    const text = this.backend.read(INDEX_FILE);
    if (text === undefined) return undefined;
    return this.decode(INDEX_FILE, text, CategoryIndexSchema);
  }

  putIndex(index: CategoryIndex): void {
    this.writeJson(INDEX_FILE, encodeIndex(index, this.timestamp()));
  }

  indexDiffers(index: CategoryIndex): boolean {
    return this.differsFrom(INDEX_FILE, encodeIndex(index, undefined));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Product details
  // ───────────────────────────────────────────────────────────────────────────

  getProductDetails(productId: string): ProductDetails | undefined {
    const filePath = productDetailsPath(productId);
    const text = this.backend.read(filePath);
    if (text === undefined) return undefined;
    return this.decode(filePath, text, ProductDetailsSchema);
  }

  putProductDetails(details: ProductDetails): void {
    this.writeJson(productDetailsPath(details.productId), details);
  }

  listProductDetailIds(): string[] {
    return this.backend
      .list(PRODUCTS_DIR)
      .filter(file => file.endsWith('/details.json'))
      .map(file => file.split('/')[1] ?? '')
      .filter(Boolean);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Search index
  // ───────────────────────────────────────────────────────────────────────────

  getSearchIndex(): SearchIndex | undefined {
    const text = this.backend.read(SEARCH_INDEX_FILE);
    if (text === undefined) return undefined;
    return this.decode(SEARCH_INDEX_FILE, text, SearchIndexSchema);
  }

  /** Writes the full index, pretty-printed, and the compact one on a single line. */
  putSearchIndex(index: SearchIndex, compact: CompactSearchIndex): void {
    const generatedAt = this.timestamp();
    this.writeJson(SEARCH_INDEX_FILE, encodeSearchIndex(index, generatedAt));
    this.backend.write(COMPACT_SEARCH_INDEX_FILE, JSON.stringify(encodeCompactSearchIndex(compact, generatedAt)));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Untyped access (read-only checks)
  // ───────────────────────────────────────────────────────────────────────────

  readRawCategory(path: string): RawReadResult {
    return this.readRaw(categoryFilePath(path));
  }

  readRawProductDetails(productId: string): RawReadResult {
    return this.readRaw(productDetailsPath(productId));
  }

  private readRaw(filePath: string): RawReadResult {
    const text = this.backend.read(filePath);
    if (text === undefined) {
      return { ok: false, error: new CatalogFileError(filePath, 'file not found') };
    }
    try {
      return { ok: true, value: JSON.parse(text) };
    } catch (err) {
      return { ok: false, error: new CatalogFileError(filePath, 'invalid JSON', { cause: err }) };
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Helpers
  // ───────────────────────────────────────────────────────────────────────────

  private decode<S extends ZodTypeAny>(filePath: string, text: string, schema: S): z.output<S> {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new CatalogFileError(filePath, 'invalid JSON', { cause: err });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new CatalogFileError(filePath, `${issue?.message ?? 'invalid document'}${where}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private writeJson(filePath: string, doc: unknown): void {
    this.backend.write(filePath, serialize(doc));
  }

  private differsFrom(filePath: string, candidate: Record<string, unknown>): boolean {
    const text = this.backend.read(filePath);
    if (text === undefined) return true;

    let existing: unknown;
    try {
      existing = JSON.parse(text);
    } catch {
      return true;
    }
    if (!existing || typeof existing !== 'object' || Array.isArray(existing)) return true;

    const rest = Object.fromEntries(Object.entries(existing).filter(([key]) => key !== 'lastUpdated'));
    return serialize(rest) !== serialize(candidate);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Encoding (fixed key order keeps rewrites byte-stable)
// ─────────────────────────────────────────────────────────────────────────────

export function serialize(doc: unknown): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

function encodeMeta(meta: CategoryMeta, lastUpdated: string | undefined, totalResults: number) {
  return {
    categoryId: meta.categoryId,
    name: meta.name,
    slug: meta.slug,
    path: meta.path,
    version: meta.version,
    lastUpdated,
    breadcrumbs: meta.breadcrumbs,
    pageInfo: { totalResults },
    featuredBrands: meta.featuredBrands,
    filters: meta.filters,
  };
}

function encodeCategory(node: CategoryNode, lastUpdated: string | undefined): Record<string, unknown> {
  const meta = encodeMeta(node.meta, lastUpdated, productCountOf(node));
  return node.kind === 'leaf'
    ? dropUndefined({ ...meta, products: node.products.map(canonicalProduct) })
    : dropUndefined({ ...meta, subcategories: node.subcategories });
}

function encodeAggregate(doc: AggregateDocument, lastUpdated: string | undefined): Record<string, unknown> {
  return dropUndefined({
    ...encodeMeta(doc, lastUpdated, doc.products.length),
    filterOptions: doc.filterOptions,
    products: doc.products.map(canonicalProduct),
  });
}

function encodeIndex(index: CategoryIndex, lastUpdated: string | undefined): Record<string, unknown> {
  return dropUndefined({
    version: index.version,
    lastUpdated,
    totalCategories: index.totalCategories,
    totalProducts: index.totalProducts,
    categories: index.categories,
  });
}

function encodeSearchIndex(index: SearchIndex, generatedAt: string): Record<string, unknown> {
  return {
    version: index.version,
    generatedAt,
    totalProducts: index.totalProducts,
    totalKeywords: index.totalKeywords,
    products: index.products,
    keywords: index.keywords,
    categories: index.categories,
    brands: index.brands,
  };
}

function encodeCompactSearchIndex(index: CompactSearchIndex, generatedAt: string): Record<string, unknown> {
  return {
    version: index.version,
    generatedAt,
    totalProducts: index.totalProducts,
    keywords: index.keywords,
    categories: index.categories,
    brands: index.brands,
  };
}

/** Schema key order, so a record edited in memory serializes like one read back. */
function canonicalProduct(product: ProductRecord): ProductRecord {
  const parsed = ProductRecordSchema.safeParse(product);
  return parsed.success ? parsed.data : product;
}

/** Comparison and output must agree on which keys exist. */
function dropUndefined(doc: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(doc).filter(([, value]) => value !== undefined));
}

function basename(file: string): string {
  const idx = file.lastIndexOf('/');
  return idx === -1 ? file : file.slice(idx + 1);
}
