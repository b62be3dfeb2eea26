import type { CatalogStore } from '../store/catalogStore.js';
import { categoryFilePath, productDetailsPath } from '../store/catalogStore.js';
import { CatalogFileError } from '../store/errors.js';
import type { CategoryNode, LeafNode } from '../types/Catalog.js';
import { compareText } from '../utils/catalogMeta.js';

export interface ValidationIssue {
  file: string;
  message: string;
}

export interface TopCategory {
  path: string;
  name: string;
  productCount: number;
}

export interface ValidationReport {
  categoryFiles: number;
  errors: ValidationIssue[];
  stats: {
    categories: number;
    products: number;
    brands: number;
    categoriesWithFilters: number;
    productDetails: number;
  };
  topCategories: TopCategory[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasText(record: Record<string, unknown>, key: string): boolean {
  const value = record[key];
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Read-only consistency pass. Required fields are checked on the raw JSON so
 * a file that fails schema validation is still reported by name.
 */
export function validateCatalog(store: CatalogStore, options: { topN?: number } = {}): ValidationReport {
  const topN = options.topN ?? 10;
  const errors: ValidationIssue[] = [];
  const leaves: Array<{ path: string; node: LeafNode }> = [];
  const productIds = new Set<string>();
  const brands = new Set<string>();
  let categories = 0;
  let categoriesWithFilters = 0;

  const paths = store.list();
  for (const path of paths) {
    const file = categoryFilePath(path);
    const raw = store.readRawCategory(path);
    if (!raw.ok) {
      errors.push({ file, message: raw.error.reason });
      continue;
    }
    const doc = raw.value;
    if (!isRecord(doc)) {
      errors.push({ file, message: 'document is not an object' });
      continue;
    }

    const missing = ['categoryId', 'name'].filter(key => !hasText(doc, key));
    if (missing.length > 0) {
      errors.push({ file, message: `missing ${missing.join(', ')}` });
      continue;
    }

    let node: CategoryNode | undefined;
    try {
      node = store.get(path);
    } catch (err) {
      const reason = err instanceof CatalogFileError ? err.reason : String(err);
      errors.push({ file, message: reason });
      continue;
    }
    if (!node) continue;

    categories += 1;
    if ((node.meta.filters?.length ?? 0) > 0) categoriesWithFilters += 1;
    for (const brand of node.meta.featuredBrands) brands.add(brand.brandName);

    if (node.kind === 'leaf') {
      leaves.push({ path, node });
      for (const product of node.products) productIds.add(product.productId);
    }
  }

  const detailIds = store.listProductDetailIds();
  for (const productId of detailIds) {
    const raw = store.readRawProductDetails(productId);
    const file = productDetailsPath(productId);
    if (!raw.ok) {
      errors.push({ file, message: raw.error.reason });
    } else if (!isRecord(raw.value) || !hasText(raw.value, 'productId')) {
      errors.push({ file, message: 'missing productId' });
    }
  }

  const topCategories = leaves
    .map(({ path, node }) => ({ path, name: node.meta.name, productCount: node.products.length }))
    .sort((a, b) => b.productCount - a.productCount || compareText(a.path, b.path))
    .slice(0, topN);

  return {
    categoryFiles: paths.length,
    errors,
    stats: {
      categories,
      products: productIds.size,
      brands: brands.size,
      categoriesWithFilters,
      productDetails: detailIds.length,
    },
    topCategories,
  };
}
