import { describe, expect, it } from 'vitest';
import { CatalogSearch } from '../search/catalogSearch.js';
import { memoryStore, messyCatalogFiles } from './fixtures.js';

describe('CatalogSearch', () => {
  const { store } = memoryStore(messyCatalogFiles());
  const search = CatalogSearch.fromStore(store);

  it('indexes every loadable category and product', () => {
    expect(search.categories).toEqual([
      { categoryId: 'appliances/refrigerators/french-door', name: 'French Door Refrigerators', productCount: 2 },
      { categoryId: 'furniture', name: 'Furniture', productCount: 2 },
      { categoryId: 'other', name: 'Other', productCount: 1 },
    ]);
    expect(search.products).toHaveLength(5);
  });

  it('finds a category by name', () => {
    const [top] = search.searchCategories('furniture');
    expect(top?.item.categoryId).toBe('furniture');
  });

  it('finds a product by part of its title', () => {
    const [top] = search.searchProducts('kitchen cart');
    expect(top?.item).toEqual({
      productId: '10000002',
      title: 'StyleWell Rolling Kitchen Cart',
      brand: 'StyleWell',
      path: 'appliances/refrigerators/french-door',
    });
  });

  it('lists every path that holds a product id', () => {
    expect(search.locateProduct('10000001')).toEqual(['appliances/refrigerators/french-door', 'furniture']);
    expect(search.locateProduct('10000004')).toEqual(['other']);
    expect(search.locateProduct('99999999')).toEqual([]);
  });
});
