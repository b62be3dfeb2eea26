import { describe, expect, it } from 'vitest';
import type { ScrapedPage } from '../extract/extractPage.js';
import { ingestPages } from '../ingest/ingestPages.js';
import { ACCENT_CHAIR, GE_FRIDGE, leafFile, memoryStore, rulesClassifier } from './fixtures.js';

const FRENCH_DOOR = 'appliances/refrigerators/french-door';
const FRIDGE_LISTING_URL = 'https://shop.test/b/Appliances-Refrigerators';
const WORKBENCH_URL = 'https://shop.test/b/Garage-Workbenches';

function jsonLdPage(originalUrl: string, source: string, graph: unknown[]): ScrapedPage {
  const block = JSON.stringify({ '@context': 'https://schema.org', '@graph': graph });
  return { html: `<script type="application/ld+json">${block}</script>`, manifest: { originalUrl }, source };
}

function productNode(sku: string, name: string, brand: string) {
  return { '@type': 'Product', sku, name, brand: { '@type': 'Brand', name: brand } };
}

const fridgePage = jsonLdPage(FRIDGE_LISTING_URL, 'pages/fridges', [
  productNode('10000001', 'GE 27 cu. ft. French Door Refrigerator', 'GE'),
  productNode('50000001', 'Samsung 28 cu. ft. French Door Refrigerator', 'Samsung'),
  productNode('50000002', 'Sauder Walnut Writing Desk', 'Sauder'),
]);

const workbenchPage = jsonLdPage(WORKBENCH_URL, 'pages/workbenches', [
  productNode('50000003', 'Husky 52 in. Mobile Workbench', 'Husky'),
]);

const listingPage: ScrapedPage = {
  html: '<h1>Refrigerators</h1><div data-product-id="60000001"></div><div data-product-id="60000002"></div>',
  manifest: { originalUrl: FRIDGE_LISTING_URL },
  source: 'pages/listing',
};

const emptyPage: ScrapedPage = {
  html: '<html><body><p>Nothing here</p></body></html>',
  manifest: { originalUrl: 'https://shop.test/empty' },
  source: 'pages/empty',
};

const ALL_PAGES = [fridgePage, emptyPage, listingPage, workbenchPage];

function catalogFiles(): Record<string, string> {
  return {
    [`categories/${FRENCH_DOOR}.json`]: leafFile(FRENCH_DOOR, 'French Door Refrigerators', [GE_FRIDGE]),
    'categories/furniture.json': leafFile('furniture', 'Furniture', [ACCENT_CHAIR]),
  };
}

describe('ingestPages', () => {
  it('classifies new products and skips ids already in the catalog', () => {
    const { store } = memoryStore(catalogFiles());
    const report = ingestPages(ALL_PAGES, store, rulesClassifier(), { apply: true });

    expect(report).toEqual({
      dryRun: false,
      pages: 4,
      extracted: 4,
      added: 3,
      skippedDuplicates: 1,
      noRecordPages: ['pages/empty'],
      listings: [{ source: 'pages/listing', name: 'Refrigerators', productCount: 2 }],
      placements: [
        { productId: '50000001', path: FRENCH_DOOR },
        { productId: '50000002', path: 'furniture' },
        { productId: '50000003', path: 'garage/workbenches' },
      ],
      writes: [
        `categories/${FRENCH_DOOR}.json`,
        'categories/furniture.json',
        'categories/garage/workbenches.json',
        'products/50000001/details.json',
        'products/50000002/details.json',
        'products/50000003/details.json',
      ],
    });
  });

  it('appends to an existing leaf rather than creating a file beneath it', () => {
    const { store } = memoryStore(catalogFiles());
    ingestPages(ALL_PAGES, store, rulesClassifier(), { apply: true });

    const furniture = store.get('furniture');
    expect(furniture?.kind).toBe('leaf');
    if (furniture?.kind !== 'leaf') return;
    expect(furniture.products).toEqual([
      ACCENT_CHAIR,
      { productId: '50000002', title: 'Sauder Walnut Writing Desk', brand: 'Sauder', subcategory: 'office' },
    ]);
    expect(store.get('furniture/office')).toBeUndefined();
  });

  it('creates a new leaf with derived metadata and a details file', () => {
    const { store } = memoryStore(catalogFiles());
    ingestPages(ALL_PAGES, store, rulesClassifier(), { apply: true });

    const workbenches = store.get('garage/workbenches');
    expect(workbenches?.kind).toBe('leaf');
    if (workbenches?.kind !== 'leaf') return;
    expect(workbenches.meta.name).toBe('Workbenches');
    expect(workbenches.meta.breadcrumbs).toEqual([
      { name: 'Home', url: '/' },
      { name: 'Garage', url: '/garage' },
      { name: 'Workbenches', url: '/garage/workbenches' },
    ]);
    expect(workbenches.meta.featuredBrands).toEqual([
      { brandId: 'husky', brandName: 'Husky', logoUrl: 'images/brands/husky.svg', count: 1 },
    ]);

    expect(store.getProductDetails('50000003')).toEqual({
      productId: '50000003',
      title: 'Husky 52 in. Mobile Workbench',
      brand: 'Husky',
      subcategory: 'workbenches',
      categoryPath: 'garage/workbenches',
      sourceUrl: WORKBENCH_URL,
    });
  });

  it('adds nothing the second time', () => {
    const { backend, store } = memoryStore(catalogFiles());
    ingestPages(ALL_PAGES, store, rulesClassifier(), { apply: true });
    const after = backend.snapshot();

    const second = ingestPages(ALL_PAGES, store, rulesClassifier(), { apply: true });

    expect(second.added).toBe(0);
    expect(second.skippedDuplicates).toBe(4);
    expect(second.writes).toEqual([]);
    expect(backend.snapshot()).toEqual(after);
  });

  it('plans without writing in a dry run', () => {
    const files = catalogFiles();
    const { backend, store } = memoryStore(files);
    const report = ingestPages(ALL_PAGES, store, rulesClassifier(), { apply: false });

    expect(report.dryRun).toBe(true);
    expect(report.writes).toHaveLength(6);
    expect(backend.snapshot()).toEqual(memoryStore(files).backend.snapshot());
  });

  it('files everything under an explicit category when one is given', () => {
    const { store } = memoryStore(catalogFiles());
    const report = ingestPages([fridgePage], store, rulesClassifier(), { apply: true, category: 'clearance' });

    expect(report.placements).toEqual([
      { productId: '50000001', path: 'clearance' },
      { productId: '50000002', path: 'clearance' },
    ]);
    const clearance = store.get('clearance');
    expect(clearance?.kind).toBe('leaf');
    if (clearance?.kind !== 'leaf') return;
    expect(clearance.products[0]).toEqual({
      productId: '50000001',
      title: 'Samsung 28 cu. ft. French Door Refrigerator',
      brand: 'Samsung',
    });
  });

  it('stops after the page limit', () => {
    const { store } = memoryStore(catalogFiles());
    const report = ingestPages(ALL_PAGES, store, rulesClassifier(), { apply: false, limit: 1 });

    expect(report.pages).toBe(1);
    expect(report.added).toBe(2);
  });
});
