/**
 * Reads the scraping layer's output: one directory per saved page holding
 * the raw markup and a manifest.json sidecar.
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { PageManifestSchema } from '../schemas/catalog.js';
import type { ScrapedPage } from './extractPage.js';

export type ScrapedPageRead =
  | { ok: true; page: ScrapedPage }
  | { ok: false; source: string; reason: string };

const MANIFEST_FILE = 'manifest.json';
const MARKUP_CANDIDATES = ['index.html', 'page.html'];

export function listPageDirectories(root: string): string[] {
  if (!existsSync(root)) return [];

  const dirs: string[] = [];
  const walk = (dir: string) => {
    const entries = readdirSync(dir, { withFileTypes: true });
    if (entries.some(entry => entry.isFile() && entry.name === MANIFEST_FILE)) {
      dirs.push(dir);
      return;
    }
    for (const entry of entries) {
      if (entry.isDirectory()) walk(join(dir, entry.name));
    }
  };
  walk(root);
  return dirs.sort();
}

function findMarkup(dir: string): string | undefined {
  for (const name of MARKUP_CANDIDATES) {
    if (existsSync(join(dir, name))) return join(dir, name);
  }
  return readdirSync(dir)
    .filter(name => name.endsWith('.html') || name.endsWith('.htm'))
    .sort()
    .map(name => join(dir, name))[0];
}

export function readScrapedPage(dir: string): ScrapedPageRead {
  try {
    const raw: unknown = JSON.parse(readFileSync(join(dir, MANIFEST_FILE), 'utf-8'));
    const manifest = PageManifestSchema.safeParse(raw);
    if (!manifest.success) {
      return { ok: false, source: dir, reason: `invalid manifest: ${manifest.error.issues[0]?.message ?? 'unknown'}` };
    }

    const markupPath = findMarkup(dir);
    if (!markupPath) return { ok: false, source: dir, reason: 'no saved markup' };

    return {
      ok: true,
      page: { html: readFileSync(markupPath, 'utf-8'), manifest: manifest.data, source: dir },
    };
  } catch (err) {
    return { ok: false, source: dir, reason: err instanceof Error ? err.message : String(err) };
  }
}
