import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Product
// ─────────────────────────────────────────────────────────────────────────────

export const AvailabilitySchema = z.enum(['InStock', 'OutOfStock', 'PreOrder', 'Unknown']);

export const PriceSchema = z
  .object({
    current: z.number().nonnegative(),
    original: z.number().nonnegative().optional(),
    currency: z.string().optional(),
  })
  .passthrough();

export const RatingSchema = z
  .object({
    average: z.number().min(0),
    count: z.number().int().nonnegative().default(0),
  })
  .passthrough();

export const ProductImagesSchema = z
  .object({
    primary: z.string().optional(),
    thumbnail: z.string().optional(),
    gallery: z.array(z.string()).optional(),
  })
  .passthrough();

export const FilterValueSchema = z.union([z.string(), z.array(z.string())]);

/** Unknown product fields are kept so a rewrite never drops scraped data. */
export const ProductRecordSchema = z
  .object({
    productId: z.string().min(1),
    title: z.string(),
    description: z.string().optional(),
    brand: z.string().optional(),
    modelNumber: z.string().optional(),
    price: PriceSchema.optional(),
    rating: RatingSchema.optional(),
    availability: AvailabilitySchema.optional(),
    images: ProductImagesSchema.optional(),
    subcategory: z.string().optional(),
    url: z.string().optional(),
    filterAttributes: z.record(FilterValueSchema).optional(),
  })
  .passthrough();

export const ProductDetailsSchema = z
  .object({
    productId: z.string().min(1),
  })
  .passthrough();

// ─────────────────────────────────────────────────────────────────────────────
// Category
// ─────────────────────────────────────────────────────────────────────────────

export const BreadcrumbSchema = z.object({
  name: z.string(),
  url: z.string(),
});

export const FeaturedBrandSchema = z.object({
  brandId: z.string(),
  brandName: z.string(),
  logoUrl: z.string(),
  count: z.number().int().nonnegative(),
});

export const FilterTypeSchema = z.enum(['checkbox', 'radio', 'select', 'range', 'single', 'multi']);

export const FilterGroupSchema = z.object({
  filterGroupId: z.string().min(1),
  filterGroupName: z.string().min(1),
  filterType: FilterTypeSchema,
  values: z.array(z.string()).optional(),
});

export const SubcategorySummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  slug: z.string(),
  productCount: z.number().int().nonnegative(),
  path: z.string(),
});

export const CategoryMetaSchema = z.object({
  categoryId: z.string().min(1),
  name: z.string().min(1),
  slug: z.string().optional(),
  path: z.string().optional(),
  version: z.string().optional(),
  lastUpdated: z.string().optional(),
  breadcrumbs: z.array(BreadcrumbSchema).default([]),
  pageInfo: z.object({ totalResults: z.number().int().nonnegative() }).optional(),
  featuredBrands: z.array(FeaturedBrandSchema).default([]),
  filters: z.array(FilterGroupSchema).optional(),
});

export const CategoryDocumentSchema = CategoryMetaSchema.extend({
  products: z.array(ProductRecordSchema).optional(),
  subcategories: z.array(SubcategorySummarySchema).optional(),
});

export const AggregateDocumentSchema = CategoryMetaSchema.extend({
  filterOptions: z.object({
    subcategories: z.array(SubcategorySummarySchema),
  }),
  products: z.array(ProductRecordSchema),
});

// ─────────────────────────────────────────────────────────────────────────────
// Index
// ─────────────────────────────────────────────────────────────────────────────

export interface IndexNode {
  id: string;
  name: string;
  slug: string;
  productCount: number;
  path: string;
  subcategories: IndexNode[];
}

export const IndexNodeSchema: z.ZodType<IndexNode> = z.lazy(() =>
  z.object({
    id: z.string(),
    name: z.string(),
    slug: z.string(),
    productCount: z.number().int().nonnegative(),
    path: z.string(),
    subcategories: z.array(IndexNodeSchema),
  })
);

export const CategoryIndexSchema = z.object({
  version: z.string(),
  lastUpdated: z.string().optional(),
  totalCategories: z.number().int().nonnegative(),
  totalProducts: z.number().int().nonnegative(),
  categories: z.array(IndexNodeSchema),
});

// ─────────────────────────────────────────────────────────────────────────────
// Search index (app-facing keyword lookup)
// ─────────────────────────────────────────────────────────────────────────────

const IdListMapSchema = z.record(z.array(z.string()));

export const SearchEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  brand: z.string().optional(),
  category: z.string(),
  categoryName: z.string(),
  price: z.number().optional(),
  rating: z.number().optional(),
  keywords: z.array(z.string()),
  imageUrl: z.string().optional(),
});

export const SearchIndexSchema = z.object({
  version: z.string(),
  generatedAt: z.string().optional(),
  totalProducts: z.number().int().nonnegative(),
  totalKeywords: z.number().int().nonnegative(),
  products: z.array(SearchEntrySchema),
  keywords: IdListMapSchema,
  categories: IdListMapSchema,
  brands: IdListMapSchema,
});

export const CompactSearchIndexSchema = z.object({
  version: z.string(),
  generatedAt: z.string().optional(),
  totalProducts: z.number().int().nonnegative(),
  keywords: IdListMapSchema,
  categories: z.array(z.string()),
  brands: z.array(z.string()),
});

// ─────────────────────────────────────────────────────────────────────────────
// Scraped page sidecar
// ─────────────────────────────────────────────────────────────────────────────

export const PageManifestSchema = z
  .object({
    originalUrl: z.string(),
    archiveTime: z.union([z.string(), z.number()]).optional(),
    title: z.string().optional(),
    resources: z.record(z.string()).optional(),
  })
  .passthrough();
