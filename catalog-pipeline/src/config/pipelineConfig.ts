/**
 * Pipeline Configuration
 *
 * Centralized paths and limits for every stage. Values come from the
 * environment (loaded by `dotenv/config` in each CLI) with repo-relative
 * defaults, so a fresh checkout works without a .env file.
 */

import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = resolve(__dirname, '../../..');

export const RULES_DIR = resolve(__dirname, '../../rules');

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function pathFromEnv(name: string, fallback: string): string {
  const raw = process.env[name];
  return raw ? resolve(REPO_ROOT, raw) : resolve(REPO_ROOT, fallback);
}

export interface PipelineConfig {
  catalogDataDir: string;
  scrapedPagesDir: string;
  featuredBrandsLimit: number;
  topCategoriesLimit: number;
  imageCdnBase: string;
  imageCanonicalSize: number;
}

export function loadPipelineConfig(): PipelineConfig {
  return {
    catalogDataDir: pathFromEnv('CATALOG_DATA_DIR', 'production-data'),
    scrapedPagesDir: pathFromEnv('SCRAPED_PAGES_DIR', 'scraped-pages'),
    featuredBrandsLimit: numberFromEnv('FEATURED_BRANDS_LIMIT', 6),
    topCategoriesLimit: numberFromEnv('TOP_CATEGORIES_LIMIT', 10),
    imageCdnBase: process.env.IMAGE_CDN_BASE || 'https://images.thdstatic.com',
    imageCanonicalSize: numberFromEnv('IMAGE_CANONICAL_SIZE', 1000),
  };
}
