/**
 * Catalog Consolidator
 *
 * Restores store-level invariants after ad hoc extraction runs:
 *
 *   A. deduplicate   one file per productId, richest record kept
 *   B. redistribute  conservative re-classification + split parents
 *   C. aggregates    branch summaries, featured brands, _all files
 *   D. reindex       root index totals, bottom-up
 *
 * The whole run is planned in memory first. A dry run returns that plan; an
 * apply run performs exactly the planned writes, so both produce the same
 * report. Documents that would only change `lastUpdated` are not rewritten,
 * which makes a second run a no-op.
 */

import type { Classifier } from '../classify/classifier.js';
import type { CatalogStore } from '../store/catalogStore.js';
import { aggregateFilePath, categoryFilePath } from '../store/catalogStore.js';
import type {
  AggregateDocument,
  BranchNode,
  CategoryIndex,
  CategoryMeta,
  CategoryNode,
  IndexNode,
  LeafNode,
  ProductRecord,
  SubcategorySummary,
} from '../types/Catalog.js';
import { buildBreadcrumbs, compareText, computeFeaturedBrands } from '../utils/catalogMeta.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { isWithin, lastSegment, parentPath, slugify, topLevel } from '../utils/slug.js';
import type { ShapeLookup } from './placement.js';
import { defaultCategoryName, describeShapes, OVERFLOW_CHILD, PlannedShapes, resolveTargetPath } from './placement.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type RelocationKind = 'duplicate' | 'move' | 'split';

export interface Relocation {
  kind: RelocationKind;
  productId: string;
  title: string;
  from: string;
  to: string;
  ruleId?: string;
}

export interface SubcategoryFix {
  productId: string;
  path: string;
  from: string | null;
  to: string | null;
}

export interface ConsolidationReport {
  dryRun: boolean;
  relocations: Relocation[];
  subcategoryFixes: SubcategoryFix[];
  /** Storage-relative files the run writes (or would write). */
  writes: string[];
  skippedFiles: string[];
  beforeCount: number;
  afterCount: number;
  mergedDuplicates: number;
  lostProductIds: string[];
  ok: boolean;
}

export interface ConsolidatorOptions {
  logger?: Logger;
  featuredBrandsLimit?: number;
}

interface PlannedWrite {
  file: string;
  apply: () => void;
}

export interface ConsolidationPlan {
  relocations: Relocation[];
  subcategoryFixes: SubcategoryFix[];
  writes: PlannedWrite[];
  skippedFiles: string[];
  beforeIds: Set<string>;
  afterIds: Set<string>;
  beforeCount: number;
  afterCount: number;
  mergedDuplicates: number;
}

interface Occurrence {
  path: string;
  index: number;
  product: ProductRecord;
}

/** Regenerated nodes plus the tree they were derived from. */
interface RegeneratedTree {
  nodes: Map<string, CategoryNode>;
  /** Every path, including ancestors that exist only through their children. */
  paths: string[];
  childrenOf: ReadonlyMap<string, string[]>;
  countOf: (path: string) => number;
  nameOf: (path: string) => string;
}

interface PendingMove {
  from: string;
  to: string;
  product: ProductRecord;
}

const INDEX_VERSION = '1.0';
const DEFAULT_VERSION = '1.0';

// ─────────────────────────────────────────────────────────────────────────────
// Consolidator
// ─────────────────────────────────────────────────────────────────────────────

export class CatalogConsolidator {
  private readonly logger: Logger;
  private readonly featuredBrandsLimit: number;

  constructor(
    private readonly store: CatalogStore,
    private readonly classifier: Classifier,
    options: ConsolidatorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.featuredBrandsLimit = options.featuredBrandsLimit ?? 6;
  }

  run(options: { apply: boolean }): ConsolidationReport {
    const plan = this.plan();
    let afterIds = plan.afterIds;

    if (options.apply) {
      for (const write of plan.writes) write.apply();
      afterIds = this.store.allProductIds();
      this.logger.info(`✅ Wrote ${plan.writes.length} file(s)`);
    }

    const lostProductIds = [...plan.beforeIds].filter(id => !afterIds.has(id)).sort();
    if (lostProductIds.length > 0) {
      this.logger.error(`${lostProductIds.length} product id(s) lost during consolidation`);
    }

    return {
      dryRun: !options.apply,
      relocations: plan.relocations,
      subcategoryFixes: plan.subcategoryFixes,
      writes: plan.writes.map(write => write.file),
      skippedFiles: plan.skippedFiles,
      beforeCount: plan.beforeCount,
      afterCount: plan.afterCount,
      mergedDuplicates: plan.mergedDuplicates,
      lostProductIds,
      ok: lostProductIds.length === 0,
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Planning
  // ───────────────────────────────────────────────────────────────────────────

  plan(): ConsolidationPlan {
    const { nodes, errors } = this.store.loadAll();
    const skippedFiles = errors.map(error => error.path);
    const { brokenPaths, splitParents, shapeOf } = describeShapes(nodes, this.store.list());

    const leaves = new Map<string, LeafNode>();
    const branches = new Map<string, BranchNode>();
    for (const [path, node] of nodes) {
      if (node.kind === 'leaf') {
        leaves.set(path, { ...node, products: [...node.products] });
      } else {
        branches.set(path, node);
      }
    }

    const beforeIds = new Set<string>();
    let beforeCount = 0;
    for (const leaf of leaves.values()) {
      for (const product of leaf.products) beforeIds.add(product.productId);
      beforeCount += leaf.products.length;
    }
    this.logger.info(`📂 Loaded ${nodes.size} category file(s), ${beforeCount} product(s)`);

    const relocations: Relocation[] = [];
    const subcategoryFixes: SubcategoryFix[] = [];

    const mergedDuplicates = this.deduplicate(leaves, shapeOf, relocations);
    this.redistribute(leaves, splitParents, shapeOf, relocations, subcategoryFixes);

    for (const path of splitParents) {
      const leaf = leaves.get(path);
      leaves.delete(path);
      if (leaf) branches.set(path, { kind: 'branch', meta: leaf.meta, subcategories: [] });
    }

    const tree = this.regenerate(leaves, branches, brokenPaths);
    const finalNodes = tree.nodes;
    const index = this.buildIndex(tree);
    const writes = this.planWrites(finalNodes, index, brokenPaths);

    const afterIds = new Set<string>();
    let afterCount = 0;
    for (const node of finalNodes.values()) {
      if (node.kind !== 'leaf') continue;
      for (const product of node.products) afterIds.add(product.productId);
      afterCount += node.products.length;
    }

    return {
      relocations,
      subcategoryFixes,
      writes,
      skippedFiles,
      beforeIds,
      afterIds,
      beforeCount,
      afterCount,
      mergedDuplicates,
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Step A: deduplicate
  // ───────────────────────────────────────────────────────────────────────────

  private deduplicate(
    leaves: Map<string, LeafNode>,
    shapeOf: ShapeLookup,
    relocations: Relocation[]
  ): number {
    const occurrences = new Map<string, Occurrence[]>();
    for (const [path, leaf] of leaves) {
      leaf.products.forEach((product, index) => {
        const list = occurrences.get(product.productId) ?? [];
        list.push({ path, index, product });
        occurrences.set(product.productId, list);
      });
    }

    const removals = new Map<string, Set<number>>();
    let merged = 0;

    for (const [productId, list] of occurrences) {
      if (list.length < 2) continue;

      const richest = pickRichest(list);
      const verdict = this.classifier.classify(richest.product.title, richest.product.brand);
      const target = resolveTargetPath(verdict.category, verdict.subcategory, this.classifier, shapeOf);
      const keep =
        list.find(o => o.path === target) ??
        list.find(o => topLevel(o.path) === verdict.category) ??
        list[0];
      if (!keep) continue;

      const keepLeaf = leaves.get(keep.path);
      if (keepLeaf) keepLeaf.products[keep.index] = richest.product;

      for (const other of list) {
        if (other === keep) continue;
        const set = removals.get(other.path) ?? new Set<number>();
        set.add(other.index);
        removals.set(other.path, set);
        merged += 1;
        relocations.push({
          kind: 'duplicate',
          productId,
          title: richest.product.title,
          from: other.path,
          to: keep.path,
        });
      }
    }

    for (const [path, indexes] of removals) {
      const leaf = leaves.get(path);
      if (leaf) leaf.products = leaf.products.filter((_, i) => !indexes.has(i));
    }

    if (merged > 0) this.logger.info(`🔁 Merged ${merged} duplicate product instance(s)`);
    return merged;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Step B: redistribute
  // ───────────────────────────────────────────────────────────────────────────

  private redistribute(
    leaves: Map<string, LeafNode>,
    splitParents: Set<string>,
    shapeOf: ShapeLookup,
    relocations: Relocation[],
    subcategoryFixes: SubcategoryFix[]
  ): void {
    const moves: PendingMove[] = [];
    const planned = new PlannedShapes(shapeOf);

    for (const [path, leaf] of leaves) {
      const category = topLevel(path);
      const kept: ProductRecord[] = [];

      for (const product of leaf.products) {
        const verdict = this.classifier.reclassify(product, category);

        if (verdict.change) {
          const to = resolveTargetPath(verdict.category, verdict.subcategory, this.classifier, planned.shapeOf);
          planned.add(to);
          moves.push({ from: path, to, product: withSubcategory(product, verdict.subcategory) });
          relocations.push({
            kind: 'move',
            productId: product.productId,
            title: product.title,
            from: path,
            to,
            ruleId: verdict.ruleId,
          });
          continue;
        }

        const fixed = this.fixSubcategory(product, category);
        if (fixed !== product) {
          subcategoryFixes.push({
            productId: product.productId,
            path,
            from: product.subcategory ?? null,
            to: fixed.subcategory ?? null,
          });
        }

        if (splitParents.has(path)) {
          const to = this.splitTarget(fixed, path, planned.shapeOf);
          planned.add(to);
          moves.push({ from: path, to, product: fixed });
          relocations.push({ kind: 'split', productId: fixed.productId, title: fixed.title, from: path, to });
          continue;
        }

        kept.push(fixed);
      }

      leaf.products = kept;
    }

    for (const move of moves) {
      const target = leaves.get(move.to);
      if (target) {
        target.products.push(move.product);
      } else {
        leaves.set(move.to, { kind: 'leaf', meta: this.newMeta(move.to), products: [move.product] });
      }
    }

    if (moves.length > 0) this.logger.info(`📦 Planned ${moves.length} relocation(s)`);
  }

  private fixSubcategory(product: ProductRecord, category: string): ProductRecord {
    const valid = this.classifier.validSubcategories(category);
    if (valid.length === 0) return product;

    const current = product.subcategory;
    const canonical = current !== undefined ? canonicalSlug(current, valid) : null;
    const suggestion = this.classifier.suggestSubcategory(product.title, category);

    let next: string | null;
    if (canonical !== null) {
      // Keep a valid tag unless the title clearly points at a different one
      next = suggestion !== null && !this.classifier.subcategoryMatches(product.title, category, canonical)
        ? suggestion
        : canonical;
    } else {
      next = suggestion;
    }

    return (next ?? undefined) === current ? product : withSubcategory(product, next);
  }

  private splitTarget(
    product: ProductRecord,
    parent: string,
    shapeOf: ShapeLookup
  ): string {
    const category = topLevel(parent);
    const slugs = [this.classifier.suggestSubcategory(product.title, category), product.subcategory ?? null];

    for (const slug of slugs) {
      if (!slug) continue;
      const subPath = this.classifier.subcategoryPath(category, slug);
      const candidates = [subPath ? `${category}/${subPath}` : null, `${parent}/${slug}`];
      for (const candidate of candidates) {
        if (candidate && candidate !== parent && isWithin(candidate, parent) && shapeOf(candidate) === 'leaf') {
          return candidate;
        }
      }
    }
    return `${parent}/${OVERFLOW_CHILD}`;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Step C: aggregates
  // ───────────────────────────────────────────────────────────────────────────

  private regenerate(
    leaves: Map<string, LeafNode>,
    branches: Map<string, BranchNode>,
    brokenPaths: Set<string>
  ): RegeneratedTree {
    const allPaths = new Set<string>([...leaves.keys(), ...branches.keys()]);
    for (const path of [...allPaths]) {
      for (let parent = parentPath(path); parent !== null; parent = parentPath(parent)) {
        allPaths.add(parent);
      }
    }

    const childrenOf = new Map<string, string[]>();
    for (const path of allPaths) {
      const parent = parentPath(path);
      if (parent === null) continue;
      const list = childrenOf.get(parent) ?? [];
      list.push(path);
      childrenOf.set(parent, list);
    }

    const metaOf = (path: string): CategoryMeta | undefined => leaves.get(path)?.meta ?? branches.get(path)?.meta;
    const names = new Map<string, string>();
    for (const path of allPaths) {
      names.set(path, metaOf(path)?.name ?? this.defaultName(path));
    }
    const nameOf = (path: string) => names.get(path) ?? this.defaultName(path);

    // Products under each path, gathered in lexicographic path order
    const sortedPaths = [...allPaths].sort(compareText);
    const subtreeProducts = (path: string): ProductRecord[] =>
      sortedPaths
        .filter(p => isWithin(p, path))
        .flatMap(p => leaves.get(p)?.products ?? []);

    const counts = new Map<string, number>();
    const countOf = (path: string): number => {
      const cached = counts.get(path);
      if (cached !== undefined) return cached;
      const leaf = leaves.get(path);
      const count = leaf && !childrenOf.has(path)
        ? leaf.products.length
        : (childrenOf.get(path) ?? []).reduce((sum, child) => sum + countOf(child), 0);
      counts.set(path, count);
      return count;
    };

    const finalNodes = new Map<string, CategoryNode>();
    for (const path of sortedPaths) {
      if (brokenPaths.has(path)) continue;
      const meta = this.refreshMeta(path, metaOf(path), nameOf);
      const children = childrenOf.get(path);
      const leaf = leaves.get(path);

      if (leaf && !children) {
        finalNodes.set(path, {
          kind: 'leaf',
          meta: { ...meta, featuredBrands: computeFeaturedBrands(leaf.products, this.featuredBrandsLimit) },
          products: leaf.products,
        });
        continue;
      }

      const subcategories: SubcategorySummary[] = (children ?? [])
        .map(child => ({
          id: child,
          name: nameOf(child),
          slug: lastSegment(child),
          productCount: countOf(child),
          path: child,
        }))
        .sort((a, b) => compareText(a.slug, b.slug));

      finalNodes.set(path, {
        kind: 'branch',
        meta: { ...meta, featuredBrands: computeFeaturedBrands(subtreeProducts(path), this.featuredBrandsLimit) },
        subcategories,
      });
    }

    return { nodes: finalNodes, paths: sortedPaths, childrenOf, countOf, nameOf };
  }

  private refreshMeta(
    path: string,
    existing: CategoryMeta | undefined,
    nameOf: (path: string) => string
  ): CategoryMeta {
    const meta: CategoryMeta = {
      categoryId: path,
      name: nameOf(path),
      slug: existing?.slug ?? lastSegment(path),
      path: existing?.path ?? path,
      version: existing?.version ?? DEFAULT_VERSION,
      breadcrumbs: buildBreadcrumbs(path, nameOf),
      featuredBrands: [],
    };
    if (existing?.filters) meta.filters = existing.filters;
    return meta;
  }

  private newMeta(path: string): CategoryMeta {
    return {
      categoryId: path,
      name: this.defaultName(path),
      breadcrumbs: [],
      featuredBrands: [],
    };
  }

  private defaultName(path: string): string {
    return defaultCategoryName(path, this.classifier);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Step D: reindex
  // ───────────────────────────────────────────────────────────────────────────

  private buildIndex(tree: RegeneratedTree): CategoryIndex {
    const toIndexNode = (path: string): IndexNode => ({
      id: path,
      name: tree.nameOf(path),
      slug: lastSegment(path),
      productCount: tree.countOf(path),
      path,
      subcategories: [...(tree.childrenOf.get(path) ?? [])]
        .sort((a, b) => compareText(lastSegment(a), lastSegment(b)))
        .map(toIndexNode),
    });

    const categories = tree.paths
      .filter(path => !path.includes('/'))
      .map(toIndexNode)
      .sort((a, b) => compareText(a.name, b.name) || compareText(a.path, b.path));

    return {
      version: INDEX_VERSION,
      totalCategories: tree.paths.length,
      totalProducts: categories.reduce((sum, node) => sum + node.productCount, 0),
      categories,
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Writes
  // ───────────────────────────────────────────────────────────────────────────

  private planWrites(
    nodes: Map<string, CategoryNode>,
    index: CategoryIndex,
    brokenPaths: Set<string>
  ): PlannedWrite[] {
    const writes: PlannedWrite[] = [];

    for (const [path, node] of nodes) {
      if (this.store.differs(path, node)) {
        writes.push({ file: categoryFilePath(path), apply: () => this.store.put(path, node) });
      }
    }

    for (const [path, node] of nodes) {
      if (node.kind !== 'branch' || brokenPaths.has(path)) continue;
      const aggregate = this.buildAggregate(path, node, nodes);
      if (this.store.aggregateDiffers(path, aggregate)) {
        writes.push({ file: aggregateFilePath(path), apply: () => this.store.putAggregate(path, aggregate) });
      }
    }

    if (this.store.indexDiffers(index)) {
      writes.push({ file: 'categories/index.json', apply: () => this.store.putIndex(index) });
    }

    return writes;
  }

  private buildAggregate(path: string, node: BranchNode, nodes: Map<string, CategoryNode>): AggregateDocument {
    const products = [...nodes.entries()]
      .filter(([p, n]) => n.kind === 'leaf' && isWithin(p, path))
      .sort(([a], [b]) => compareText(a, b))
      .flatMap(([, n]) => (n.kind === 'leaf' ? n.products : []));

    const filterSubcategories = [...node.subcategories].sort(
      (a, b) => b.productCount - a.productCount || compareText(a.slug, b.slug)
    );

    return {
      ...node.meta,
      filterOptions: { subcategories: filterSubcategories },
      products,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Longest serialized form wins; the first one seen wins a tie. */
function pickRichest(list: Occurrence[]): Occurrence {
  let best = list[0];
  let bestLength = best ? JSON.stringify(best.product).length : -1;
  for (const occurrence of list.slice(1)) {
    const length = JSON.stringify(occurrence.product).length;
    if (length > bestLength) {
      best = occurrence;
      bestLength = length;
    }
  }
  if (!best) throw new Error('pickRichest called with no occurrences');
  return best;
}

function canonicalSlug(value: string, valid: readonly string[]): string | null {
  const slug = slugify(value);
  return valid.includes(slug) ? slug : null;
}

function withSubcategory(product: ProductRecord, subcategory: string | null): ProductRecord {
  const next: ProductRecord = { ...product };
  if (subcategory) {
    next.subcategory = subcategory;
  } else {
    delete next.subcategory;
  }
  return next;
}
