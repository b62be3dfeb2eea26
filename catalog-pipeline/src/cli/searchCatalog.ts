#!/usr/bin/env npx tsx
/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: searchCatalog.ts
 * PURPOSE: Fuzzy-find categories and products, locate a product id, or write
 *          the app-facing search-index.json / search-index-compact.json
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * RUN:
 *   npx tsx catalog-pipeline/src/cli/searchCatalog.ts --categories="french door"
 *   npx tsx catalog-pipeline/src/cli/searchCatalog.ts --products="kitchen cart" --limit=5
 *   npx tsx catalog-pipeline/src/cli/searchCatalog.ts --locate=312345678
 *   npx tsx catalog-pipeline/src/cli/searchCatalog.ts --build-index
 */

import 'dotenv/config';
import { loadPipelineConfig } from '../config/pipelineConfig.js';
import { CatalogSearch } from '../search/catalogSearch.js';
import { buildSearchIndex, compactSearchIndex } from '../search/searchIndex.js';
import { CatalogStore } from '../store/catalogStore.js';
import { FileSystemBackend } from '../store/storage.js';

const args = process.argv.slice(2);
const categoriesArg = args.find(a => a.startsWith('--categories='))?.split('=')[1];
const productsArg = args.find(a => a.startsWith('--products='))?.split('=')[1];
const locateArg = args.find(a => a.startsWith('--locate='))?.split('=')[1];
const buildIndex = args.includes('--build-index');
const limitArg = args.find(a => a.startsWith('--limit='))?.split('=')[1];
const limit = limitArg ? parseInt(limitArg, 10) || 10 : 10;

async function main(): Promise<void> {
  if (!categoriesArg && !productsArg && !locateArg && !buildIndex) {
    console.log('Usage: searchCatalog.ts --categories=<q> | --products=<q> | --locate=<id> | --build-index [--limit=N]');
    return;
  }

  const config = loadPipelineConfig();
  const store = new CatalogStore(new FileSystemBackend(config.catalogDataDir));
  const { nodes } = store.loadAll();

  if (buildIndex) {
    const index = buildSearchIndex(nodes);
    store.putSearchIndex(index, compactSearchIndex(index));
    console.log('✅ Search index written');
    console.log(`   Products:   ${index.totalProducts}`);
    console.log(`   Keywords:   ${index.totalKeywords}`);
    console.log(`   Categories: ${Object.keys(index.categories).length}`);
    console.log(`   Brands:     ${Object.keys(index.brands).length}`);
    console.log('═'.repeat(60));
    if (!categoriesArg && !productsArg && !locateArg) return;
  }

  const search = CatalogSearch.fromNodes(nodes);
  console.log(`📂 ${search.categories.length} categories, ${search.products.length} products indexed`);
  console.log('═'.repeat(60));

  if (categoriesArg) {
    console.log(`🔍 Categories matching "${categoriesArg}":`);
    for (const hit of search.searchCategories(categoriesArg, limit)) {
      console.log(`   ${hit.item.categoryId}  ${hit.item.name} (${hit.item.productCount})  score=${hit.score.toFixed(3)}`);
    }
  }

  if (productsArg) {
    console.log(`🔍 Products matching "${productsArg}":`);
    for (const hit of search.searchProducts(productsArg, limit)) {
      const brand = hit.item.brand ? ` [${hit.item.brand}]` : '';
      console.log(`   ${hit.item.productId}  ${hit.item.title}${brand}  → ${hit.item.path}`);
    }
  }

  if (locateArg) {
    const paths = search.locateProduct(locateArg);
    if (paths.length === 0) {
      console.log(`❌ ${locateArg} not found`);
    } else {
      console.log(`📍 ${locateArg}:`);
      for (const path of paths) console.log(`   ${path}`);
      if (paths.length > 1) console.log('⚠️  Listed in more than one category; run consolidateCatalog.ts');
    }
  }
  console.log('═'.repeat(60));
}

main().catch((err) => {
  console.error('[searchCatalog] Unhandled error:', err);
  process.exit(1);
});
