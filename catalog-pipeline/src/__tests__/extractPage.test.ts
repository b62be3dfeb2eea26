import { describe, expect, it } from 'vitest';
import { DEFAULT_EXTRACTOR_OPTIONS, extractPage } from '../extract/extractPage.js';
import { canonicalImageUrl, dedupeGallery, imageIdentity } from '../extract/images.js';
import { collectIds, productIdFromUrl } from '../extract/productId.js';
import { rulesClassifier } from './fixtures.js';

const CDN = 'https://images.thdstatic.com/productImages';
const FRIDGE_UUID = '0a1b2c3d-0000-4000-8000-000000000001';
const LISTING_URL = 'https://www.example-retailer.test/b/Appliances-Refrigerators/N-5yc1vZc3pi';

function jsonLd(value: unknown): string {
  return `<script type="application/ld+json">${JSON.stringify(value)}</script>`;
}

describe('image helpers', () => {
  it('collapses size variants of one image into a single canonical entry', () => {
    const gallery = dedupeGallery([
      `${CDN}/${FRIDGE_UUID}/svn/ge-refrigerator-gfe28_145.webp`,
      `${CDN}/${FRIDGE_UUID}/svn/ge-refrigerator-gfe28_600.jpg`,
      ` ${CDN}/${FRIDGE_UUID.toUpperCase()}/svn/ge-refrigerator-gfe28_1000.avif `,
    ]);
    expect(gallery).toEqual([`${CDN}/${FRIDGE_UUID}/svn/ge-refrigerator-gfe28_1000.jpg`]);
  });

  it('keys images by their uuid segment', () => {
    expect(imageIdentity(`${CDN}/${FRIDGE_UUID.toUpperCase()}/svn/x_65.jpg`)).toBe(FRIDGE_UUID);
    expect(canonicalImageUrl('https://cdn.test/a/b_400.png', 600)).toBe('https://cdn.test/a/b_600.jpg');
  });
});

describe('product ids', () => {
  it('accepts only numeric ids of at least eight digits', () => {
    expect(collectIds(['123', '12345678', ' 12345678 ', 'abc12345678', '987654321'])).toEqual([
      '12345678',
      '987654321',
    ]);
  });

  it('reads the id from a product detail URL', () => {
    expect(productIdFromUrl('https://www.example-retailer.test/p/Some-Cart/318765432?x=1')).toBe('318765432');
    expect(productIdFromUrl('https://www.example-retailer.test/p/Short/1234')).toBeNull();
  });
});

describe('extractPage', () => {
  it('normalizes a schema.org Product block', () => {
    const html = jsonLd({
      '@context': 'https://schema.org',
      '@type': 'Product',
      name: 'GE 27 cu. ft. French Door Refrigerator - The Home Depot',
      sku: '312345678',
      description: ' Fingerprint resistant finish with an external ice and water dispenser. ',
      brand: { '@type': 'Brand', name: 'GE' },
      mpn: 'GFE28GYNFS',
      image: [`${CDN}/${FRIDGE_UUID}/svn/ge_145.webp`, `${CDN}/${FRIDGE_UUID}/svn/ge_600.jpg`],
      offers: {
        '@type': 'Offer',
        price: '1899.00',
        priceCurrency: 'USD',
        availability: 'https://schema.org/InStock',
      },
      aggregateRating: { ratingValue: '4.5', reviewCount: '120' },
    });

    const result = extractPage({ html, manifest: { originalUrl: LISTING_URL } });

    expect(result.kind).toBe('products');
    if (result.kind !== 'products') return;
    expect(result.strategy).toBe('structured-data');
    expect(result.products).toEqual([
      {
        productId: '312345678',
        title: 'GE 27 cu. ft. French Door Refrigerator',
        description: 'Fingerprint resistant finish with an external ice and water dispenser.',
        brand: 'GE',
        modelNumber: 'GFE28GYNFS',
        price: { current: 1899, currency: 'USD' },
        rating: { average: 4.5, count: 120 },
        availability: 'InStock',
        images: {
          primary: `${CDN}/${FRIDGE_UUID}/svn/ge_1000.jpg`,
          thumbnail: `${CDN}/${FRIDGE_UUID}/svn/ge_100.jpg`,
          gallery: [`${CDN}/${FRIDGE_UUID}/svn/ge_1000.jpg`],
        },
      },
    ]);
  });

  it('skips an unparseable JSON-LD block and falls through to data attributes', () => {
    const html = [
      '<html><body>',
      '<script type="application/ld+json">{broken</script>',
      '<h1>Refrigerators</h1>',
      '<div data-product-id="312345678"></div>',
      '<div data-sku="1234"></div>',
      '<div data-product-id="312345679"></div>',
      '</body></html>',
    ].join('');

    const result = extractPage({ html, manifest: { originalUrl: LISTING_URL, archiveTime: 1700000000000 } });

    expect(result).toEqual({
      kind: 'listing',
      strategy: 'dom-attributes',
      category: {
        name: 'Refrigerators',
        productIds: ['312345678', '312345679'],
        breadcrumbs: [],
        sourceUrl: LISTING_URL,
        archiveTime: '2023-11-14T22:13:20.000Z',
      },
      warnings: ['1 invalid JSON-LD block(s) ignored'],
    });
  });

  it('builds the page product of a detail page from its URL and markup', () => {
    const url = 'https://www.example-retailer.test/p/StyleWell-Rolling-Kitchen-Cart/318765432';
    const imageUuid = 'aaaaaaaa-1111-4222-8333-444444444444';
    const html = [
      '<html><body>',
      `<img src="${CDN}/${imageUuid}/svn/stylewell-kitchen-carts-sw-01_600.jpg">`,
      '<a href="/p/Other-Thing/318000001">Related</a>',
      '</body></html>',
    ].join('');
    const classifier = rulesClassifier();

    const result = extractPage(
      { html, manifest: { originalUrl: url, title: 'StyleWell Rolling Kitchen Cart - The Home Depot' } },
      { ...DEFAULT_EXTRACTOR_OPTIONS, detectBrand: title => classifier.detectBrand(title) }
    );

    expect(result.kind).toBe('products');
    if (result.kind !== 'products') return;
    expect(result.strategy).toBe('product-url');
    expect(result.products).toEqual([
      {
        productId: '318765432',
        title: 'StyleWell Rolling Kitchen Cart',
        url,
        brand: 'StyleWell',
        images: {
          primary: `${CDN}/${imageUuid}/svn/stylewell-kitchen-carts-sw-01_1000.jpg`,
          thumbnail: `${CDN}/${imageUuid}/svn/stylewell-kitchen-carts-sw-01_100.jpg`,
          gallery: [`${CDN}/${imageUuid}/svn/stylewell-kitchen-carts-sw-01_1000.jpg`],
        },
      },
    ]);
  });

  it('ignores structured data for a different product on a detail page', () => {
    const url = 'https://www.example-retailer.test/p/Acme-Cordless-Drill/312340001';
    const html = [
      '<html><body>',
      jsonLd({ '@context': 'https://schema.org', '@type': 'Product', name: 'Some Other Drill', sku: '399990001' }),
      '<h1>Acme Cordless Drill</h1>',
      '</body></html>',
    ].join('');

    const result = extractPage({ html, manifest: { originalUrl: url } });

    expect(result).toEqual({
      kind: 'products',
      strategy: 'product-url',
      products: [{ productId: '312340001', title: 'Acme Cordless Drill', url }],
      warnings: [],
    });
  });

  it('falls back to ids assigned in inline scripts', () => {
    const html = '<script>window.__DATA__ = {"itemId":"205123456","productId": 205123457};</script>';
    const result = extractPage({ html, manifest: { originalUrl: LISTING_URL } });

    expect(result.kind).toBe('listing');
    if (result.kind !== 'listing') return;
    expect(result.strategy).toBe('script-variables');
    expect(result.category.productIds).toEqual(['205123456', '205123457']);
  });

  it('reports no record instead of throwing', () => {
    const result = extractPage({
      html: '<html><body><p>Nothing here</p></body></html>',
      manifest: { originalUrl: LISTING_URL },
    });
    expect(result).toEqual({ kind: 'none', reason: 'no strategy produced a product id', warnings: [] });
  });
});
