/**
 * App-facing search index: every product with its keywords, plus keyword,
 * category and brand maps to product ids. The compact form keeps only
 * keywords shared by two or more products and the category and brand names.
 */

import type { CategoryNode, CompactSearchIndex, SearchEntry, SearchIndex } from '../types/Catalog.js';
import { compareText } from '../utils/catalogMeta.js';

export const SEARCH_INDEX_VERSION = '1.0.0';

const STOP_WORDS = new Set(['the', 'and', 'or', 'for', 'with', 'in', 'on', 'at', 'to', 'a', 'an']);
const MIN_KEYWORD_LENGTH = 3;
const MIN_COMPACT_HITS = 2;

/** Lowercased words of three or more letters, stop words removed, sorted. */
export function searchKeywords(...texts: Array<string | undefined>): string[] {
  const words = new Set<string>();
  for (const text of texts) {
    if (!text) continue;
    const normalized = text
      .toLowerCase()
      .replace(/[^\w\s-]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
    for (const word of normalized.split(' ')) {
      if (word.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(word)) words.add(word);
    }
  }
  return [...words].sort(compareText);
}

export function buildSearchIndex(nodes: ReadonlyMap<string, CategoryNode>): SearchIndex {
  const products: SearchEntry[] = [];
  const keywords = new Map<string, string[]>();
  const categories = new Map<string, string[]>();
  const brands = new Map<string, string[]>();

  for (const path of [...nodes.keys()].sort(compareText)) {
    const node = nodes.get(path);
    if (node?.kind !== 'leaf') continue;

    for (const product of node.products) {
      const entry: SearchEntry = {
        id: product.productId,
        name: product.title,
        category: path,
        categoryName: node.meta.name,
        keywords: searchKeywords(product.title, product.brand, node.meta.name),
      };
      if (product.brand) entry.brand = product.brand;
      if (product.price) entry.price = product.price.current;
      if (product.rating) entry.rating = product.rating.average;
      if (product.images?.primary) entry.imageUrl = product.images.primary;
      products.push(entry);

      for (const keyword of entry.keywords) addId(keywords, keyword, entry.id);
      addId(categories, path, entry.id);
      if (entry.brand) addId(brands, entry.brand, entry.id);
    }
  }

  products.sort((a, b) => compareText(a.name.toLowerCase(), b.name.toLowerCase()) || compareText(a.id, b.id));

  return {
    version: SEARCH_INDEX_VERSION,
    totalProducts: products.length,
    totalKeywords: keywords.size,
    products,
    keywords: sortedRecord(keywords),
    categories: sortedRecord(categories),
    brands: sortedRecord(brands),
  };
}

export function compactSearchIndex(index: SearchIndex): CompactSearchIndex {
  return {
    version: index.version,
    totalProducts: index.totalProducts,
    keywords: Object.fromEntries(Object.entries(index.keywords).filter(([, ids]) => ids.length >= MIN_COMPACT_HITS)),
    categories: Object.keys(index.categories),
    brands: Object.keys(index.brands),
  };
}

function addId(map: Map<string, string[]>, key: string, id: string): void {
  const ids = map.get(key) ?? [];
  if (!ids.includes(id)) ids.push(id);
  map.set(key, ids);
}

function sortedRecord(map: Map<string, string[]>): Record<string, string[]> {
  return Object.fromEntries([...map.entries()].sort(([a], [b]) => compareText(a, b)));
}
