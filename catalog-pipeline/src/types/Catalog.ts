import type { z } from 'zod';
import type {
  AggregateDocumentSchema,
  AvailabilitySchema,
  BreadcrumbSchema,
  CategoryDocumentSchema,
  CategoryIndexSchema,
  CategoryMetaSchema,
  CompactSearchIndexSchema,
  FeaturedBrandSchema,
  FilterGroupSchema,
  FilterValueSchema,
  PageManifestSchema,
  ProductDetailsSchema,
  ProductImagesSchema,
  ProductRecordSchema,
  SearchEntrySchema,
  SearchIndexSchema,
  SubcategorySummarySchema,
} from '../schemas/catalog.js';

export type { IndexNode } from '../schemas/catalog.js';

export type Availability = z.infer<typeof AvailabilitySchema>;
export type ProductImages = z.infer<typeof ProductImagesSchema>;
export type ProductRecord = z.infer<typeof ProductRecordSchema>;
export type ProductDetails = z.infer<typeof ProductDetailsSchema>;
export type FilterValue = z.infer<typeof FilterValueSchema>;

export type Breadcrumb = z.infer<typeof BreadcrumbSchema>;
export type FeaturedBrand = z.infer<typeof FeaturedBrandSchema>;
export type FilterGroup = z.infer<typeof FilterGroupSchema>;
export type SubcategorySummary = z.infer<typeof SubcategorySummarySchema>;
export type CategoryMeta = z.infer<typeof CategoryMetaSchema>;
export type CategoryDocument = z.infer<typeof CategoryDocumentSchema>;
export type AggregateDocument = z.infer<typeof AggregateDocumentSchema>;
export type CategoryIndex = z.infer<typeof CategoryIndexSchema>;

export type SearchEntry = z.infer<typeof SearchEntrySchema>;
export type SearchIndex = z.infer<typeof SearchIndexSchema>;
export type CompactSearchIndex = z.infer<typeof CompactSearchIndexSchema>;

export type PageManifest = z.infer<typeof PageManifestSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Category node: a file either lists products or summarizes child files
// ─────────────────────────────────────────────────────────────────────────────

export interface LeafNode {
  kind: 'leaf';
  meta: CategoryMeta;
  products: ProductRecord[];
}

export interface BranchNode {
  kind: 'branch';
  meta: CategoryMeta;
  subcategories: SubcategorySummary[];
}

export type CategoryNode = LeafNode | BranchNode;

export function productCountOf(node: CategoryNode): number {
  return node.kind === 'leaf'
    ? node.products.length
    : node.subcategories.reduce((sum, sub) => sum + sub.productCount, 0);
}
