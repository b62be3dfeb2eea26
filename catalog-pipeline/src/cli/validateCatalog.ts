#!/usr/bin/env npx tsx
/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: validateCatalog.ts
 * PURPOSE: Read-only consistency check of the catalog data tree
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * Checks required fields on every category file and product details file,
 * then prints counts and the largest leaf categories. Never writes to the
 * catalog.
 *
 * RUN:
 *   npx tsx catalog-pipeline/src/cli/validateCatalog.ts
 *   npx tsx catalog-pipeline/src/cli/validateCatalog.ts --output=reports/validation.json
 */

import 'dotenv/config';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { validateCatalog } from '../audit/validateCatalog.js';
import { loadPipelineConfig } from '../config/pipelineConfig.js';
import { CatalogStore } from '../store/catalogStore.js';
import { FileSystemBackend } from '../store/storage.js';

const args = process.argv.slice(2);
const outputArg = args.find(a => a.startsWith('--output='))?.split('=')[1];

async function main(): Promise<void> {
  const config = loadPipelineConfig();
  console.log(`🔍 Validating ${config.catalogDataDir}`);

  const store = new CatalogStore(new FileSystemBackend(config.catalogDataDir));
  const report = validateCatalog(store, { topN: config.topCategoriesLimit });

  console.log('\n' + '═'.repeat(60));
  console.log('📊 CATALOG VALIDATION');
  console.log('═'.repeat(60));
  console.log(`   Category files:           ${report.categoryFiles}`);
  console.log(`   Valid categories:         ${report.stats.categories}`);
  console.log(`   Unique products:          ${report.stats.products}`);
  console.log(`   Featured brands:          ${report.stats.brands}`);
  console.log(`   Categories with filters:  ${report.stats.categoriesWithFilters}`);
  console.log(`   Product details files:    ${report.stats.productDetails}`);

  if (report.topCategories.length > 0) {
    console.log('\n🏆 Top categories:');
    report.topCategories.forEach((category, i) => {
      console.log(`   ${String(i + 1).padStart(2)}. ${category.path} (${category.productCount})`);
    });
  }

  if (report.errors.length > 0) {
    console.log(`\n⚠️  ${report.errors.length} issue(s):`);
    for (const issue of report.errors) console.log(`   ${issue.file}: ${issue.message}`);
  } else {
    console.log('\n✅ No issues found');
  }
  console.log('═'.repeat(60));

  if (outputArg) {
    const outputPath = resolve(process.cwd(), outputArg);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, JSON.stringify(report, null, 2));
    console.log(`📄 Report: ${outputPath}`);
  }
}

main().catch((err) => {
  console.error('[validateCatalog] Unhandled error:', err);
  process.exit(1);
});
