import { describe, expect, it } from 'vitest';
import { validateCatalog } from '../audit/validateCatalog.js';
import { ACCENT_CHAIR, leafFile, MAILBOX, memoryStore, STYLEWELL_CART } from './fixtures.js';

function brand(brandName: string) {
  return { brandId: brandName.toLowerCase(), brandName, logoUrl: `images/brands/${brandName.toLowerCase()}.svg`, count: 1 };
}

function catalogFiles(): Record<string, string> {
  return {
    'categories/furniture.json': JSON.stringify({
      categoryId: 'furniture',
      name: 'Furniture',
      featuredBrands: [brand('StyleWell')],
      filters: [{ filterGroupId: 'brand', filterGroupName: 'Brand', filterType: 'checkbox', values: ['StyleWell'] }],
      products: [STYLEWELL_CART, ACCENT_CHAIR],
    }),
    'categories/other.json': leafFile('other', 'Other', [MAILBOX]),
    'categories/tools.json': JSON.stringify({
      categoryId: 'tools',
      name: 'Tools',
      featuredBrands: [brand('RYOBI'), brand('StyleWell')],
      subcategories: [],
    }),
    'categories/nameless.json': JSON.stringify({ categoryId: 'nameless', products: [] }),
    'categories/list.json': '[]',
    'categories/broken.json': '{',
    'categories/bad-products.json': JSON.stringify({ categoryId: 'bad-products', name: 'Bad', products: [{ title: 'x' }] }),
    'products/10000002/details.json': JSON.stringify({ productId: '10000002', title: 'Cart' }),
    'products/10000009/details.json': JSON.stringify({ title: 'No id' }),
    'products/10000010/details.json': 'nope',
  };
}

describe('validateCatalog', () => {
  it('reports every bad file by name and keeps going', () => {
    const { store } = memoryStore(catalogFiles());
    const report = validateCatalog(store);

    expect(report.categoryFiles).toBe(7);
    expect(report.errors).toEqual([
      { file: 'categories/bad-products.json', message: 'Required at products.0.productId' },
      { file: 'categories/broken.json', message: 'invalid JSON' },
      { file: 'categories/list.json', message: 'document is not an object' },
      { file: 'categories/nameless.json', message: 'missing name' },
      { file: 'products/10000009/details.json', message: 'missing productId' },
      { file: 'products/10000010/details.json', message: 'invalid JSON' },
    ]);
  });

  it('counts categories, distinct products and brands', () => {
    const { store } = memoryStore(catalogFiles());

    expect(validateCatalog(store).stats).toEqual({
      categories: 3,
      products: 3,
      brands: 2,
      categoriesWithFilters: 1,
      productDetails: 3,
    });
  });

  it('ranks leaf categories by product count', () => {
    const { store } = memoryStore(catalogFiles());

    expect(validateCatalog(store).topCategories).toEqual([
      { path: 'furniture', name: 'Furniture', productCount: 2 },
      { path: 'other', name: 'Other', productCount: 1 },
    ]);
    expect(validateCatalog(store, { topN: 1 }).topCategories.map(top => top.path)).toEqual(['furniture']);
  });

  it('never writes', () => {
    const { backend, store } = memoryStore(catalogFiles());
    const before = backend.snapshot();
    validateCatalog(store);
    expect(backend.snapshot()).toEqual(before);
  });
});
