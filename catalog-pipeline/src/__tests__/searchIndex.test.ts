import { describe, expect, it } from 'vitest';
import { buildSearchIndex, compactSearchIndex, searchKeywords } from '../search/searchIndex.js';
import { COMPACT_SEARCH_INDEX_FILE } from '../store/catalogStore.js';
import { FIXED_NOW, memoryStore, messyCatalogFiles } from './fixtures.js';

const FRENCH_DOOR = 'appliances/refrigerators/french-door';

describe('searchKeywords', () => {
  it('keeps distinct words of three or more letters and drops stop words', () => {
    expect(searchKeywords('GE 27 cu. ft. French Door Refrigerator', 'GE', 'French Door Refrigerators')).toEqual([
      'door',
      'french',
      'refrigerator',
      'refrigerators',
    ]);
    expect(searchKeywords('Cart with the Wheels', undefined)).toEqual(['cart', 'wheels']);
  });
});

describe('buildSearchIndex', () => {
  const { store } = memoryStore(messyCatalogFiles());
  const index = buildSearchIndex(store.loadAll().nodes);

  it('lists every product entry sorted by name', () => {
    expect(index.totalProducts).toBe(5);
    expect(index.products.map(entry => [entry.id, entry.category])).toEqual([
      ['10000001', FRENCH_DOOR],
      ['10000001', 'furniture'],
      ['10000004', 'other'],
      ['10000002', FRENCH_DOOR],
      ['10000003', 'furniture'],
    ]);
    expect(index.products[0]).toEqual({
      id: '10000001',
      name: 'GE 27 cu. ft. French Door Refrigerator',
      brand: 'GE',
      category: FRENCH_DOOR,
      categoryName: 'French Door Refrigerators',
      price: 1899,
      keywords: ['door', 'french', 'refrigerator', 'refrigerators'],
    });
  });

  it('maps keywords, categories and brands to product ids', () => {
    expect(index.totalKeywords).toBe(19);
    expect(index.keywords['door']).toEqual(['10000001', '10000002']);
    expect(index.keywords['refrigerator']).toEqual(['10000001']);
    expect(index.categories).toEqual({
      [FRENCH_DOOR]: ['10000001', '10000002'],
      furniture: ['10000003', '10000001'],
      other: ['10000004'],
    });
    expect(index.brands).toEqual({
      GE: ['10000001'],
      'Mail Boss': ['10000004'],
      'Noble House': ['10000003'],
      StyleWell: ['10000002'],
    });
  });

  it('keeps only shared keywords in the compact form', () => {
    expect(compactSearchIndex(index)).toEqual({
      version: '1.0.0',
      totalProducts: 5,
      keywords: {
        door: ['10000001', '10000002'],
        french: ['10000001', '10000002'],
        furniture: ['10000003', '10000001'],
        refrigerators: ['10000001', '10000002'],
      },
      categories: [FRENCH_DOOR, 'furniture', 'other'],
      brands: ['GE', 'Mail Boss', 'Noble House', 'StyleWell'],
    });
  });
});

describe('CatalogStore search index files', () => {
  it('stamps both files and writes the compact one on a single line', () => {
    const { backend, store } = memoryStore(messyCatalogFiles());
    const index = buildSearchIndex(store.loadAll().nodes);

    store.putSearchIndex(index, compactSearchIndex(index));

    expect(store.getSearchIndex()).toEqual({ ...index, generatedAt: FIXED_NOW.toISOString() });
    expect(backend.read(COMPACT_SEARCH_INDEX_FILE)?.startsWith(
      `{"version":"1.0.0","generatedAt":"${FIXED_NOW.toISOString()}","totalProducts":5,`
    )).toBe(true);
  });
});
