/**
 * Derived category metadata: featured brands and breadcrumbs.
 */

import type { Breadcrumb, FeaturedBrand, ProductRecord } from '../types/Catalog.js';
import { slugify } from './slug.js';

/** Top brands by product count, ties broken by name. Unbranded products are ignored. */
export function computeFeaturedBrands(products: readonly ProductRecord[], limit: number): FeaturedBrand[] {
  const counts = new Map<string, number>();
  for (const product of products) {
    const brand = product.brand?.trim();
    if (!brand) continue;
    counts.set(brand, (counts.get(brand) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([nameA, countA], [nameB, countB]) => countB - countA || compareText(nameA, nameB))
    .slice(0, limit)
    .map(([brandName, count]) => {
      const brandId = slugify(brandName);
      return {
        brandId,
        brandName,
        logoUrl: `images/brands/${brandId}.svg`,
        count,
      };
    });
}

export function buildBreadcrumbs(path: string, nameOf: (prefix: string) => string): Breadcrumb[] {
  const segments = path.split('/');
  const crumbs: Breadcrumb[] = [{ name: 'Home', url: '/' }];
  for (let i = 1; i <= segments.length; i++) {
    const prefix = segments.slice(0, i).join('/');
    crumbs.push({ name: nameOf(prefix), url: `/${prefix}` });
  }
  return crumbs;
}

/** Plain code-unit ordering, so results never depend on the host locale. */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
