#!/usr/bin/env npx tsx
/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: ingestScrapedPages.ts
 * PURPOSE: Extract products from saved pages and file them into the catalog
 *
 * ⚠️  DO NOT ADD: network fetching. Pages arrive already saved, one directory
 *     per page with manifest.json + markup.
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * Products whose id is already in the catalog are skipped. Aggregates and
 * the index are not touched here; run consolidateCatalog.ts afterwards.
 *
 * RUN:
 *   npx tsx catalog-pipeline/src/cli/ingestScrapedPages.ts --limit=50
 *   npx tsx catalog-pipeline/src/cli/ingestScrapedPages.ts --apply
 *   npx tsx catalog-pipeline/src/cli/ingestScrapedPages.ts --category=appliances/refrigerators/french-door --apply
 */

import 'dotenv/config';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { Classifier } from '../classify/classifier.js';
import { loadPipelineConfig } from '../config/pipelineConfig.js';
import type { ScrapedPage } from '../extract/extractPage.js';
import { DEFAULT_EXTRACTOR_OPTIONS } from '../extract/extractPage.js';
import { listPageDirectories, readScrapedPage } from '../extract/scrapedPages.js';
import { ingestPages } from '../ingest/ingestPages.js';
import { CatalogStore } from '../store/catalogStore.js';
import { FileSystemBackend } from '../store/storage.js';
import { consoleLogger } from '../utils/logger.js';

// ─────────────────────────────────────────────────────────────────────────────
// Args
// ─────────────────────────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const apply = args.includes('--apply');
const limitArg = args.find(a => a.startsWith('--limit='))?.split('=')[1];
const categoryArg = args.find(a => a.startsWith('--category='))?.split('=')[1];
const outputArg = args.find(a => a.startsWith('--output='))?.split('=')[1];
const limit = limitArg ? parseInt(limitArg, 10) : undefined;

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadPipelineConfig();
  console.log(`📂 Pages:   ${config.scrapedPagesDir}`);
  console.log(`📂 Catalog: ${config.catalogDataDir}`);

  const dirs = listPageDirectories(config.scrapedPagesDir);
  const selectedDirs = limit !== undefined && Number.isFinite(limit) ? dirs.slice(0, limit) : dirs;
  console.log(`   Found ${dirs.length} saved page(s), reading ${selectedDirs.length}`);

  const pages: ScrapedPage[] = [];
  for (const dir of selectedDirs) {
    const read = readScrapedPage(dir);
    if (read.ok) {
      pages.push(read.page);
    } else {
      consoleLogger.warn(`${read.source}: ${read.reason}`);
    }
  }

  const store = new CatalogStore(new FileSystemBackend(config.catalogDataDir), { logger: consoleLogger });
  const report = ingestPages(pages, store, Classifier.fromFile(), {
    apply,
    category: categoryArg,
    extractor: {
      ...DEFAULT_EXTRACTOR_OPTIONS,
      images: { cdnBase: config.imageCdnBase, canonicalSize: config.imageCanonicalSize },
    },
    featuredBrandsLimit: config.featuredBrandsLimit,
    logger: consoleLogger,
  });

  const byPath = new Map<string, number>();
  for (const placement of report.placements) {
    byPath.set(placement.path, (byPath.get(placement.path) ?? 0) + 1);
  }

  console.log('\n' + '═'.repeat(60));
  console.log(report.dryRun ? '📋 INGEST PLAN (dry run)' : '✅ INGEST APPLIED');
  console.log('═'.repeat(60));
  console.log(`   Pages processed:      ${report.pages}`);
  console.log(`   Products extracted:   ${report.extracted}`);
  console.log(`   Products added:       ${report.added}`);
  console.log(`   Already in catalog:   ${report.skippedDuplicates}`);
  console.log(`   Listing pages:        ${report.listings.length}`);
  console.log(`   No-record pages:      ${report.noRecordPages.length}`);

  if (byPath.size > 0) {
    console.log('\n📦 Placements:');
    for (const [path, count] of [...byPath.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      console.log(`   ${path}: ${count}`);
    }
  }
  console.log('═'.repeat(60));
  if (report.dryRun && report.added > 0) {
    console.log('💡 Re-run with --apply to write, then run consolidateCatalog.ts');
  }

  if (outputArg) {
    const outputPath = resolve(process.cwd(), outputArg);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, JSON.stringify(report, null, 2));
    console.log(`📄 Report: ${outputPath}`);
  }
}

main().catch((err) => {
  console.error('[ingestScrapedPages] Unhandled error:', err);
  process.exit(1);
});
