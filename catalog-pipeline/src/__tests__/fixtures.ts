import { Classifier } from '../classify/classifier.js';
import { CatalogStore } from '../store/catalogStore.js';
import { MemoryBackend } from '../store/storage.js';
import type { ProductRecord } from '../types/Catalog.js';

export const FIXED_NOW = new Date('2026-01-15T12:00:00.000Z');

let sharedClassifier: Classifier | undefined;

/** The shipped rule table, loaded once per test file. */
export function rulesClassifier(): Classifier {
  sharedClassifier ??= Classifier.fromFile();
  return sharedClassifier;
}

export function leafFile(categoryId: string, name: string, products: ProductRecord[]): string {
  return JSON.stringify({ categoryId, name, products });
}

export function memoryStore(files: Record<string, string>): { backend: MemoryBackend; store: CatalogStore } {
  const backend = new MemoryBackend(files);
  return { backend, store: new CatalogStore(backend, { now: () => FIXED_NOW }) };
}

export function parseFile(backend: MemoryBackend, file: string): unknown {
  const text = backend.read(file);
  if (text === undefined) throw new Error(`missing ${file}`);
  return JSON.parse(text);
}

// ─────────────────────────────────────────────────────────────────────────────
// A small catalog with one duplicate, one mis-filed product and one broken file
// ─────────────────────────────────────────────────────────────────────────────

export const GE_FRIDGE: ProductRecord = {
  productId: '10000001',
  title: 'GE 27 cu. ft. French Door Refrigerator',
  brand: 'GE',
  price: { current: 1899 },
  subcategory: 'French Door',
};

export const GE_FRIDGE_SPARSE: ProductRecord = {
  productId: '10000001',
  title: 'GE 27 cu. ft. French Door Refrigerator',
};

export const STYLEWELL_CART: ProductRecord = {
  productId: '10000002',
  title: 'StyleWell Rolling Kitchen Cart',
  brand: 'StyleWell',
};

export const ACCENT_CHAIR: ProductRecord = {
  productId: '10000003',
  title: 'Velvet Accent Chair',
  brand: 'Noble House',
  subcategory: 'living-room',
};

export const MAILBOX: ProductRecord = {
  productId: '10000004',
  title: 'Mail Boss Locking Mailbox',
  brand: 'Mail Boss',
  subcategory: 'mailboxes',
};

export function messyCatalogFiles(): Record<string, string> {
  return {
    'categories/appliances/refrigerators/french-door.json': leafFile(
      'appliances/refrigerators/french-door',
      'French Door Refrigerators',
      [GE_FRIDGE, STYLEWELL_CART]
    ),
    'categories/furniture.json': leafFile('furniture', 'Furniture', [ACCENT_CHAIR, GE_FRIDGE_SPARSE]),
    'categories/other.json': leafFile('other', 'Other', [MAILBOX]),
    'categories/broken.json': '{ "categoryId": "broken", ',
  };
}
