/**
 * Fuzzy lookup over the catalog: categories by id or name, products by
 * title, brand, or id. Built once from a store snapshot.
 */

import Fuse from 'fuse.js';
import type { CatalogStore } from '../store/catalogStore.js';
import type { CategoryNode } from '../types/Catalog.js';
import { productCountOf } from '../types/Catalog.js';

export interface CategoryEntry {
  categoryId: string;
  name: string;
  productCount: number;
}

export interface ProductEntry {
  productId: string;
  title: string;
  brand?: string;
  path: string;
}

export interface SearchHit<T> {
  item: T;
  /** 0 is a perfect match. */
  score: number;
}

const THRESHOLD = 0.4;

export class CatalogSearch {
  private readonly categoryIndex: Fuse<CategoryEntry>;
  private readonly productIndex: Fuse<ProductEntry>;
  private readonly locations = new Map<string, string[]>();

  constructor(
    readonly categories: readonly CategoryEntry[],
    readonly products: readonly ProductEntry[]
  ) {
    this.categoryIndex = new Fuse([...categories], {
      keys: ['categoryId', 'name'],
      threshold: THRESHOLD,
      includeScore: true,
    });
    this.productIndex = new Fuse([...products], {
      keys: [
        { name: 'title', weight: 2 },
        { name: 'brand', weight: 1 },
        { name: 'productId', weight: 1 },
      ],
      threshold: THRESHOLD,
      includeScore: true,
    });

    for (const product of products) {
      const paths = this.locations.get(product.productId) ?? [];
      paths.push(product.path);
      this.locations.set(product.productId, paths);
    }
  }

  static fromNodes(nodes: ReadonlyMap<string, CategoryNode>): CatalogSearch {
    const categories: CategoryEntry[] = [];
    const products: ProductEntry[] = [];

    for (const [path, node] of nodes) {
      categories.push({ categoryId: path, name: node.meta.name, productCount: productCountOf(node) });
      if (node.kind !== 'leaf') continue;
      for (const product of node.products) {
        const entry: ProductEntry = { productId: product.productId, title: product.title, path };
        if (product.brand) entry.brand = product.brand;
        products.push(entry);
      }
    }

    return new CatalogSearch(categories, products);
  }

  static fromStore(store: CatalogStore): CatalogSearch {
    return CatalogSearch.fromNodes(store.loadAll().nodes);
  }

  searchCategories(query: string, limit = 10): Array<SearchHit<CategoryEntry>> {
    return this.categoryIndex
      .search(query, { limit })
      .map(result => ({ item: result.item, score: result.score ?? 0 }));
  }

  searchProducts(query: string, limit = 10): Array<SearchHit<ProductEntry>> {
    return this.productIndex
      .search(query, { limit })
      .map(result => ({ item: result.item, score: result.score ?? 0 }));
  }

  /** Every category path holding the id; more than one means a duplicate. */
  locateProduct(productId: string): string[] {
    return [...(this.locations.get(productId) ?? [])];
  }
}
