/**
 * Classification rule table.
 *
 * Rules live in rules/category-rules.json as plain pattern strings so new
 * categories are data additions. This module validates the file and compiles
 * every pattern to a case-insensitive RegExp once.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { RULES_DIR } from '../config/pipelineConfig.js';

// ─────────────────────────────────────────────────────────────────────────────
// File format
// ─────────────────────────────────────────────────────────────────────────────

const PatternListSchema = z.array(z.string().min(1)).default([]);

const SubcategoryRuleSchema = z.object({
  slug: z.string().min(1),
  name: z.string().min(1),
  path: z.string().min(1),
  include: PatternListSchema,
  exclude: PatternListSchema,
});

const CategoryRuleSchema = z.object({
  category: z.string().min(1),
  name: z.string().min(1),
  include: PatternListSchema,
  exclude: PatternListSchema,
  subcategories: z.array(SubcategoryRuleSchema).default([]),
});

const RelocationActionSchema = z.union([
  z.object({ move: z.string().min(1) }).strict(),
  z.object({ keep: z.literal(true) }).strict(),
  z.object({ brandFallback: z.literal(true) }).strict(),
  z.object({ classify: z.literal(true) }).strict(),
]);

const RelocationRuleSchema = z.object({
  id: z.string().min(1),
  when: z
    .object({
      current: z.array(z.string()).optional(),
      notCurrent: z.array(z.string()).optional(),
      brand: z.enum(['allow', 'deny', 'notAllow', 'notDeny']).optional(),
    })
    .default({}),
  match: PatternListSchema,
  matchCategory: z.string().optional(),
  unless: PatternListSchema,
  action: RelocationActionSchema,
});

export const RuleFileSchema = z.object({
  version: z.string(),
  overflowCategory: z.string().min(1),
  categories: z.array(CategoryRuleSchema).min(1),
  applianceBrands: z.array(z.string()),
  applianceDenyBrands: z.record(z.string()),
  brandDetection: z.array(z.string()),
  relocations: z.array(RelocationRuleSchema),
});

export type RuleFile = z.infer<typeof RuleFileSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Compiled form
// ─────────────────────────────────────────────────────────────────────────────

export interface SubcategoryRule {
  slug: string;
  name: string;
  path: string;
  include: RegExp[];
  exclude: RegExp[];
}

export interface CategoryRule {
  category: string;
  name: string;
  include: RegExp[];
  exclude: RegExp[];
  subcategories: SubcategoryRule[];
}

export type BrandCondition = 'allow' | 'deny' | 'notAllow' | 'notDeny';

export type RelocationAction =
  | { kind: 'move'; target: string }
  | { kind: 'keep' }
  | { kind: 'brandFallback' }
  | { kind: 'classify' };

export interface RelocationRule {
  id: string;
  current?: string[];
  notCurrent?: string[];
  brand?: BrandCondition;
  /** Empty means the rule applies without a keyword match. */
  match: RegExp[];
  unless: RegExp[];
  action: RelocationAction;
}

export interface RuleTable {
  overflowCategory: string;
  categories: CategoryRule[];
  applianceBrands: Set<string>;
  applianceDenyBrands: Map<string, string>;
  brandDetection: string[];
  relocations: RelocationRule[];
}

export const APPLIANCES = 'appliances';

export const DEFAULT_RULES_FILE = resolve(RULES_DIR, 'category-rules.json');

export function normalizeBrandKey(brand: string): string {
  return brand.trim().toLowerCase();
}

function compile(patterns: readonly string[], where: string): RegExp[] {
  return patterns.map(pattern => {
    try {
      return new RegExp(pattern, 'i');
    } catch (err) {
      throw new Error(`Invalid pattern in ${where}: ${pattern}`, { cause: err });
    }
  });
}

function compileAction(action: z.infer<typeof RelocationActionSchema>): RelocationAction {
  if ('move' in action) return { kind: 'move', target: action.move };
  if ('keep' in action) return { kind: 'keep' };
  if ('brandFallback' in action) return { kind: 'brandFallback' };
  return { kind: 'classify' };
}

export function compileRuleTable(file: RuleFile): RuleTable {
  const categories: CategoryRule[] = file.categories.map(rule => ({
    category: rule.category,
    name: rule.name,
    include: compile(rule.include, rule.category),
    exclude: compile(rule.exclude, rule.category),
    subcategories: rule.subcategories.map(sub => ({
      slug: sub.slug,
      name: sub.name,
      path: sub.path,
      include: compile(sub.include, `${rule.category}/${sub.slug}`),
      exclude: compile(sub.exclude, `${rule.category}/${sub.slug}`),
    })),
  }));

  const known = new Set(categories.map(c => c.category));
  if (!known.has(file.overflowCategory)) {
    throw new Error(`Overflow category "${file.overflowCategory}" has no rule`);
  }

  const relocations: RelocationRule[] = file.relocations.map(rule => {
    let match = compile(rule.match, rule.id);
    if (rule.matchCategory) {
      const source = categories.find(c => c.category === rule.matchCategory);
      if (!source) throw new Error(`Relocation ${rule.id} references unknown category ${rule.matchCategory}`);
      match = [...match, ...source.include];
    }

    const action = compileAction(rule.action);
    if (action.kind === 'move' && !known.has(action.target)) {
      throw new Error(`Relocation ${rule.id} moves to unknown category ${action.target}`);
    }

    return {
      id: rule.id,
      current: rule.when.current,
      notCurrent: rule.when.notCurrent,
      brand: rule.when.brand,
      match,
      unless: compile(rule.unless, rule.id),
      action,
    };
  });

  const denyBrands = new Map<string, string>();
  for (const [brand, fallback] of Object.entries(file.applianceDenyBrands)) {
    if (!known.has(fallback)) {
      throw new Error(`Deny-listed brand ${brand} falls back to unknown category ${fallback}`);
    }
    denyBrands.set(normalizeBrandKey(brand), fallback);
  }

  return {
    overflowCategory: file.overflowCategory,
    categories,
    applianceBrands: new Set(file.applianceBrands.map(normalizeBrandKey)),
    applianceDenyBrands: denyBrands,
    brandDetection: file.brandDetection,
    relocations,
  };
}

export function loadRuleTable(filePath: string = DEFAULT_RULES_FILE): RuleTable {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return compileRuleTable(RuleFileSchema.parse(raw));
}
