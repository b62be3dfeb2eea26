import type { CatalogStore } from '../store/catalogStore.js';
import { categoryFilePath } from '../store/catalogStore.js';
import type { LeafNode } from '../types/Catalog.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { isWithin } from '../utils/slug.js';
import { buildCategoryFilters, computeFilterAttributes } from './filterAttributes.js';
import type { FilterDefinitions } from './filterDefinitions.js';

export interface EnrichOptions {
  apply: boolean;
  /** Only leaves at or beneath this path. */
  category?: string;
  logger?: Logger;
}

export interface EnrichReport {
  dryRun: boolean;
  leavesScanned: number;
  productsEnriched: number;
  writes: string[];
  skippedFiles: string[];
}

export function enrichCatalog(
  store: CatalogStore,
  definitions: FilterDefinitions,
  options: EnrichOptions
): EnrichReport {
  const logger = options.logger ?? silentLogger;
  const { nodes, errors } = store.loadAll();
  const writes: string[] = [];
  let leavesScanned = 0;
  let productsEnriched = 0;

  for (const [path, node] of nodes) {
    if (node.kind !== 'leaf') continue;
    if (options.category && !isWithin(path, options.category)) continue;
    leavesScanned += 1;

    const products = node.products.map(product => {
      const filterAttributes = computeFilterAttributes(definitions, path, product);
      if (JSON.stringify(filterAttributes) !== JSON.stringify(product.filterAttributes ?? null)) {
        productsEnriched += 1;
      }
      return { ...product, filterAttributes };
    });

    const next: LeafNode = {
      kind: 'leaf',
      meta: { ...node.meta, filters: buildCategoryFilters(definitions, path, products) },
      products,
    };

    if (!store.differs(path, next)) continue;
    writes.push(categoryFilePath(path));
    if (options.apply) store.put(path, next);
  }

  logger.info(`🏷️  ${productsEnriched} product(s) in ${writes.length} leaf file(s) need filter updates`);

  return {
    dryRun: !options.apply,
    leavesScanned,
    productsEnriched,
    writes,
    skippedFiles: errors.map(error => error.path),
  };
}
