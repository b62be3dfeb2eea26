#!/usr/bin/env npx tsx
/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: consolidateCatalog.ts
 * PURPOSE: Dedupe, redistribute, regenerate aggregates and reindex the catalog
 *
 * ⚠️  DO NOT ADD: page extraction or filter enrichment (see ingestScrapedPages.ts,
 *     addFilterAttributes.ts)
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * Dry run by default: prints the exact relocations and file writes an
 * --apply run would perform. A lost product id marks the run as failed in
 * the summary but the exit code stays 0.
 *
 * OUTPUTS:
 *   - categories/**.json, categories/<path>/_all.json, categories/index.json (with --apply)
 *   - optional JSON report (--output=)
 *
 * RUN:
 *   npx tsx catalog-pipeline/src/cli/consolidateCatalog.ts --dry-run
 *   npx tsx catalog-pipeline/src/cli/consolidateCatalog.ts --apply --output=reports/consolidate.json
 */

import 'dotenv/config';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { Classifier } from '../classify/classifier.js';
import { loadPipelineConfig } from '../config/pipelineConfig.js';
import type { ConsolidationReport } from '../consolidate/consolidator.js';
import { CatalogConsolidator } from '../consolidate/consolidator.js';
import { CatalogStore } from '../store/catalogStore.js';
import { FileSystemBackend } from '../store/storage.js';
import { consoleLogger } from '../utils/logger.js';

// ─────────────────────────────────────────────────────────────────────────────
// Args
// ─────────────────────────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const apply = args.includes('--apply') && !args.includes('--dry-run');
const outputArg = args.find(a => a.startsWith('--output='))?.split('=')[1];

// ─────────────────────────────────────────────────────────────────────────────
// Summary
// ─────────────────────────────────────────────────────────────────────────────

function printSummary(report: ConsolidationReport): void {
  const byKind = (kind: string) => report.relocations.filter(r => r.kind === kind).length;

  console.log('\n' + '═'.repeat(60));
  console.log(report.dryRun ? '📋 CONSOLIDATION PLAN (dry run)' : '✅ CONSOLIDATION APPLIED');
  console.log('═'.repeat(60));
  console.log(`   Products before:      ${report.beforeCount}`);
  console.log(`   Products after:       ${report.afterCount}`);
  console.log(`   Merged duplicates:    ${report.mergedDuplicates}`);
  console.log(`   Moves:                ${byKind('move')}`);
  console.log(`   Split-parent moves:   ${byKind('split')}`);
  console.log(`   Subcategory fixes:    ${report.subcategoryFixes.length}`);
  console.log(`   File writes:          ${report.writes.length}`);
  console.log(`   Skipped files:        ${report.skippedFiles.length}`);

  const moves = report.relocations.filter(r => r.kind !== 'duplicate').slice(0, 15);
  if (moves.length > 0) {
    console.log('\n📦 Relocations:');
    for (const move of moves) {
      const rule = move.ruleId ? ` [${move.ruleId}]` : '';
      console.log(`   ${move.productId}  ${move.from} → ${move.to}${rule}`);
    }
  }

  for (const file of report.skippedFiles) {
    console.log(`   ⚠️  skipped ${file}`);
  }

  if (!report.ok) {
    console.log('\n' + '!'.repeat(60));
    console.log(`❌ LOST ${report.lostProductIds.length} PRODUCT ID(S):`);
    for (const id of report.lostProductIds.slice(0, 20)) console.log(`   ${id}`);
    console.log('!'.repeat(60));
  }

  console.log('═'.repeat(60));
  if (report.dryRun && report.writes.length > 0) {
    console.log('💡 Re-run with --apply to write these changes');
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadPipelineConfig();
  console.log(`📂 Catalog: ${config.catalogDataDir}`);

  const store = new CatalogStore(new FileSystemBackend(config.catalogDataDir), { logger: consoleLogger });
  const consolidator = new CatalogConsolidator(store, Classifier.fromFile(), {
    logger: consoleLogger,
    featuredBrandsLimit: config.featuredBrandsLimit,
  });

  const report = consolidator.run({ apply });
  printSummary(report);

  if (outputArg) {
    const outputPath = resolve(process.cwd(), outputArg);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, JSON.stringify(report, null, 2));
    console.log(`📄 Report: ${outputPath}`);
  }
}

main().catch((err) => {
  console.error('[consolidateCatalog] Unhandled error:', err);
  process.exit(1);
});
