/**
 * Product Classifier
 *
 * Fresh classification walks the ordered category rules and takes the first
 * match. Re-classification of a product that is already filed is
 * conservative: it only proposes a move when a relocation rule fires, the
 * brand lists allow it, and the target would itself be stable.
 */

import type { ProductRecord } from '../types/Catalog.js';
import type { CategoryRule, RelocationRule, RuleTable } from './ruleTable.js';
import { APPLIANCES, loadRuleTable, normalizeBrandKey } from './ruleTable.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface Classification {
  category: string;
  subcategory: string | null;
}

export type Reclassification =
  | { change: false }
  | { change: true; category: string; subcategory: string | null; ruleId: string };

type ProductSignal = Pick<ProductRecord, 'title' | 'brand'>;

const NO_CHANGE: Reclassification = { change: false };

function matchesAny(patterns: readonly RegExp[], text: string): boolean {
  return patterns.some(pattern => pattern.test(text));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ─────────────────────────────────────────────────────────────────────────────
// Classifier
// ─────────────────────────────────────────────────────────────────────────────

export class Classifier {
  private readonly byCategory: Map<string, CategoryRule>;
  private readonly brandMatchers: Array<{ brand: string; pattern: RegExp }>;

  constructor(private readonly rules: RuleTable) {
    this.byCategory = new Map(rules.categories.map(rule => [rule.category, rule]));

    // Longest names first so "Home Decorators Collection" wins over a shorter prefix
    this.brandMatchers = rules.brandDetection
      .map((brand, order) => ({ brand, order }))
      .sort((a, b) => b.brand.length - a.brand.length || a.order - b.order)
      .map(({ brand }) => ({
        brand,
        pattern: new RegExp(`(^|[^a-z0-9])${escapeRegExp(brand)}($|[^a-z0-9])`, 'i'),
      }));
  }

  static fromFile(filePath?: string): Classifier {
    return new Classifier(loadRuleTable(filePath));
  }

  get overflowCategory(): string {
    return this.rules.overflowCategory;
  }

  categories(): string[] {
    return this.rules.categories.map(rule => rule.category);
  }

  categoryName(category: string): string | undefined {
    return this.byCategory.get(category)?.name;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Brand lists
  // ───────────────────────────────────────────────────────────────────────────

  isApplianceBrand(brand: string | undefined): boolean {
    return !!brand && this.rules.applianceBrands.has(normalizeBrandKey(brand));
  }

  isDeniedApplianceBrand(brand: string | undefined): boolean {
    return !!brand && this.rules.applianceDenyBrands.has(normalizeBrandKey(brand));
  }

  detectBrand(title: string): string | null {
    return this.brandMatchers.find(({ pattern }) => pattern.test(title))?.brand ?? null;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Fresh classification
  // ───────────────────────────────────────────────────────────────────────────

  classify(title: string, brand?: string | null): Classification {
    const category = this.pickCategory(title, brand ?? undefined);
    return { category, subcategory: this.suggestSubcategory(title, category) };
  }

  private pickCategory(title: string, brand: string | undefined): string {
    const appliances = this.byCategory.get(APPLIANCES);
    if (appliances && this.isApplianceBrand(brand) && matchesAny(appliances.include, title)) {
      return APPLIANCES;
    }

    const denied = this.isDeniedApplianceBrand(brand);
    for (const rule of this.rules.categories) {
      if (rule.category === APPLIANCES && denied) continue;
      if (rule.include.length === 0) continue;
      if (matchesAny(rule.include, title) && !matchesAny(rule.exclude, title)) {
        return rule.category;
      }
    }
    return this.rules.overflowCategory;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Subcategories
  // ───────────────────────────────────────────────────────────────────────────

  suggestSubcategory(title: string, category: string): string | null {
    const rule = this.byCategory.get(category);
    if (!rule) return null;
    const hit = rule.subcategories.find(
      sub => matchesAny(sub.include, title) && !matchesAny(sub.exclude, title)
    );
    return hit?.slug ?? null;
  }

  subcategoryMatches(title: string, category: string, slug: string): boolean {
    const sub = this.byCategory.get(category)?.subcategories.find(s => s.slug === slug);
    return !!sub && matchesAny(sub.include, title) && !matchesAny(sub.exclude, title);
  }

  validSubcategories(category: string): string[] {
    return this.byCategory.get(category)?.subcategories.map(sub => sub.slug) ?? [];
  }

  subcategoryPath(category: string, slug: string): string | null {
    return this.byCategory.get(category)?.subcategories.find(sub => sub.slug === slug)?.path ?? null;
  }

  subcategoryName(category: string, slug: string): string | null {
    return this.byCategory.get(category)?.subcategories.find(sub => sub.slug === slug)?.name ?? null;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Re-classification
  // ───────────────────────────────────────────────────────────────────────────

  reclassify(product: ProductSignal, currentCategory: string): Reclassification {
    const verdict = this.evaluate(product, currentCategory);
    if (!verdict.change) return NO_CHANGE;

    // Only accept targets that would not move the product again
    const next = this.evaluate(product, verdict.category);
    return next.change ? NO_CHANGE : verdict;
  }

  private evaluate(product: ProductSignal, current: string): Reclassification {
    const rule = this.rules.relocations.find(r => this.ruleApplies(r, product, current));
    if (!rule) return NO_CHANGE;

    const target = this.targetOf(rule, product);
    if (target === null) return NO_CHANGE;

    if (target === current) return NO_CHANGE;
    if (target === APPLIANCES && this.isDeniedApplianceBrand(product.brand)) return NO_CHANGE;
    if (current === APPLIANCES && this.isApplianceBrand(product.brand)) return NO_CHANGE;

    return {
      change: true,
      category: target,
      subcategory: this.suggestSubcategory(product.title, target),
      ruleId: rule.id,
    };
  }

  private targetOf(rule: RelocationRule, product: ProductSignal): string | null {
    switch (rule.action.kind) {
      case 'keep':
        return null;
      case 'move':
        return rule.action.target;
      case 'brandFallback':
        return this.denyFallback(product.brand) ?? this.rules.overflowCategory;
      case 'classify':
        return this.pickCategory(product.title, product.brand);
    }
  }

  private ruleApplies(rule: RelocationRule, product: ProductSignal, current: string): boolean {
    if (rule.current && !rule.current.includes(current)) return false;
    if (rule.notCurrent && rule.notCurrent.includes(current)) return false;

    switch (rule.brand) {
      case 'allow':
        if (!this.isApplianceBrand(product.brand)) return false;
        break;
      case 'deny':
        if (!this.isDeniedApplianceBrand(product.brand)) return false;
        break;
      case 'notAllow':
        if (this.isApplianceBrand(product.brand)) return false;
        break;
      case 'notDeny':
        if (this.isDeniedApplianceBrand(product.brand)) return false;
        break;
      case undefined:
        break;
    }

    if (rule.match.length > 0 && !matchesAny(rule.match, product.title)) return false;
    return !matchesAny(rule.unless, product.title);
  }

  private denyFallback(brand: string | undefined): string | undefined {
    return brand ? this.rules.applianceDenyBrands.get(normalizeBrandKey(brand)) : undefined;
  }
}
