#!/usr/bin/env npx tsx
/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: addFilterAttributes.ts
 * PURPOSE: Set category filter groups and per-product filterAttributes
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * Filter groups come from rules/filter-definitions.json (nearest category
 * path wins, then "default"). Values are derived from price, rating,
 * availability and title keywords.
 *
 * RUN:
 *   npx tsx catalog-pipeline/src/cli/addFilterAttributes.ts
 *   npx tsx catalog-pipeline/src/cli/addFilterAttributes.ts --category=appliances --apply
 */

import 'dotenv/config';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { loadPipelineConfig } from '../config/pipelineConfig.js';
import { enrichCatalog } from '../filters/enrichCatalog.js';
import { loadFilterDefinitions } from '../filters/filterDefinitions.js';
import { CatalogStore } from '../store/catalogStore.js';
import { FileSystemBackend } from '../store/storage.js';
import { consoleLogger } from '../utils/logger.js';

const args = process.argv.slice(2);
const apply = args.includes('--apply');
const categoryArg = args.find(a => a.startsWith('--category='))?.split('=')[1];
const outputArg = args.find(a => a.startsWith('--output='))?.split('=')[1];

async function main(): Promise<void> {
  const config = loadPipelineConfig();
  console.log(`📂 Catalog: ${config.catalogDataDir}`);
  if (categoryArg) console.log(`   Limited to: ${categoryArg}`);

  const store = new CatalogStore(new FileSystemBackend(config.catalogDataDir), { logger: consoleLogger });
  const report = enrichCatalog(store, loadFilterDefinitions(), {
    apply,
    category: categoryArg,
    logger: consoleLogger,
  });

  console.log('\n' + '═'.repeat(60));
  console.log(report.dryRun ? '📋 FILTER ENRICHMENT (dry run)' : '✅ FILTER ENRICHMENT APPLIED');
  console.log('═'.repeat(60));
  console.log(`   Leaf categories scanned:  ${report.leavesScanned}`);
  console.log(`   Products enriched:        ${report.productsEnriched}`);
  console.log(`   File writes:              ${report.writes.length}`);
  console.log(`   Skipped files:            ${report.skippedFiles.length}`);
  console.log('═'.repeat(60));
  if (report.dryRun && report.writes.length > 0) {
    console.log('💡 Re-run with --apply to write these changes');
  }

  if (outputArg) {
    const outputPath = resolve(process.cwd(), outputArg);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, JSON.stringify(report, null, 2));
    console.log(`📄 Report: ${outputPath}`);
  }
}

main().catch((err) => {
  console.error('[addFilterAttributes] Unhandled error:', err);
  process.exit(1);
});
