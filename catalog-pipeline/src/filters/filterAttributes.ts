import type { FilterGroup, FilterValue, ProductRecord } from '../types/Catalog.js';
import { compareText } from '../utils/catalogMeta.js';
import type { FilterDefinitions } from './filterDefinitions.js';
import { groupsForPath } from './filterDefinitions.js';

// ─────────────────────────────────────────────────────────────────────────────
// Fixed buckets
// ─────────────────────────────────────────────────────────────────────────────

export const PRICE_BUCKETS = ['Under $50', '$50-$100', '$100-$250', '$250-$500', '$500-$1000', 'Over $1000'] as const;
export const RATING_BUCKETS = ['4 Stars & Up', '3 Stars & Up', '2 Stars & Up'] as const;
export const AVAILABILITY_VALUES = ['In Stock', 'Available for Order'] as const;
export const CAPACITY_BUCKETS = ['Under 20 cu. ft.', '20-25 cu. ft.', '25-30 cu. ft.', 'Over 30 cu. ft.'] as const;

const CAPACITY_PATTERN = /(\d+(?:\.\d+)?)\s*cu\.?\s*ft/i;

export function priceRange(price: number): string {
  if (price < 50) return 'Under $50';
  if (price < 100) return '$50-$100';
  if (price < 250) return '$100-$250';
  if (price < 500) return '$250-$500';
  if (price < 1000) return '$500-$1000';
  return 'Over $1000';
}

export function ratingBucket(average: number): string | undefined {
  if (average >= 4) return '4 Stars & Up';
  if (average >= 3) return '3 Stars & Up';
  if (average >= 2) return '2 Stars & Up';
  return undefined;
}

export function capacityBucket(title: string): string | undefined {
  const match = title.match(CAPACITY_PATTERN);
  if (!match?.[1]) return undefined;
  const cubicFeet = Number.parseFloat(match[1]);
  if (cubicFeet < 20) return 'Under 20 cu. ft.';
  if (cubicFeet < 25) return '20-25 cu. ft.';
  if (cubicFeet < 30) return '25-30 cu. ft.';
  return 'Over 30 cu. ft.';
}

function availabilityLabel(product: ProductRecord): string | undefined {
  if (!product.availability) return undefined;
  return product.availability === 'InStock' ? 'In Stock' : 'Available for Order';
}

// ─────────────────────────────────────────────────────────────────────────────
// Attribute extraction
// ─────────────────────────────────────────────────────────────────────────────

export function isMultiValued(group: FilterGroup): boolean {
  return group.filterType === 'checkbox' || group.filterType === 'multi';
}

function keywordValues(definitions: FilterDefinitions, groupId: string, title: string): string[] {
  const table = definitions.keywords.get(groupId) ?? [];
  return table
    .filter(entry => entry.patterns.some(pattern => pattern.test(title)))
    .map(entry => entry.value);
}

/** Every value a product matches for one group; empty when it says nothing. */
function valuesFor(definitions: FilterDefinitions, group: FilterGroup, product: ProductRecord): string[] {
  switch (group.filterGroupId) {
    case 'brand':
      return product.brand ? [product.brand] : [];
    case 'priceRange':
      return product.price ? [priceRange(product.price.current)] : [];
    case 'rating': {
      const bucket = product.rating ? ratingBucket(product.rating.average) : undefined;
      return bucket ? [bucket] : [];
    }
    case 'availability': {
      const label = availabilityLabel(product);
      return label ? [label] : [];
    }
    case 'capacity': {
      const bucket = capacityBucket(product.title);
      return bucket ? [bucket] : [];
    }
    default:
      return keywordValues(definitions, group.filterGroupId, product.title);
  }
}

/** Keyword groups declared multi-valued keep every hit; all others keep the first. */
function assignedValues(definitions: FilterDefinitions, group: FilterGroup, product: ProductRecord): string[] {
  const values = valuesFor(definitions, group, product);
  if (definitions.keywords.has(group.filterGroupId) && isMultiValued(group)) return values;
  return values.slice(0, 1);
}

export function computeFilterAttributes(
  definitions: FilterDefinitions,
  path: string,
  product: ProductRecord
): Record<string, FilterValue> {
  const attributes: Record<string, FilterValue> = {};
  for (const group of groupsForPath(definitions, path)) {
    const values = assignedValues(definitions, group, product);
    const first = values[0];
    if (first === undefined) continue;
    attributes[group.filterGroupId] =
      definitions.keywords.has(group.filterGroupId) && isMultiValued(group) ? values : first;
  }
  return attributes;
}

/** Category-level filter groups, with the values that actually occur. */
export function buildCategoryFilters(
  definitions: FilterDefinitions,
  path: string,
  products: readonly ProductRecord[]
): FilterGroup[] {
  const groups: FilterGroup[] = [];

  for (const group of groupsForPath(definitions, path)) {
    const seen = new Set<string>();
    for (const product of products) {
      for (const value of assignedValues(definitions, group, product)) seen.add(value);
    }
    if (seen.size === 0) continue;

    groups.push({
      filterGroupId: group.filterGroupId,
      filterGroupName: group.filterGroupName,
      filterType: group.filterType,
      values: orderedValues(definitions, group.filterGroupId, seen),
    });
  }

  return groups;
}

function orderedValues(definitions: FilterDefinitions, groupId: string, seen: Set<string>): string[] {
  const declared: readonly string[] | undefined =
    groupId === 'priceRange' ? PRICE_BUCKETS
    : groupId === 'rating' ? RATING_BUCKETS
    : groupId === 'availability' ? AVAILABILITY_VALUES
    : groupId === 'capacity' ? CAPACITY_BUCKETS
    : definitions.keywords.get(groupId)?.map(entry => entry.value);

  if (!declared) return [...seen].sort(compareText);
  return declared.filter(value => seen.has(value));
}
