import type { Classifier } from '../classify/classifier.js';
import type { CategoryNode } from '../types/Catalog.js';
import { lastSegment, parentPath, titleFromSlug } from '../utils/slug.js';

export type NodeShape = 'leaf' | 'branch';

export type ShapeLookup = (path: string) => NodeShape | undefined;

/** Bucket for products of a branch that no child claims. */
export const OVERFLOW_CHILD = 'other';

export interface CatalogShapes {
  /** Listed category files that failed to load. */
  brokenPaths: Set<string>;
  /** Leaf files that also have files beneath them. */
  splitParents: Set<string>;
  shapeOf: ShapeLookup;
}

function ancestorsOf(path: string): string[] {
  const ancestors: string[] = [];
  for (let parent = parentPath(path); parent !== null; parent = parentPath(parent)) ancestors.push(parent);
  return ancestors;
}

/**
 * Shapes as placement sees them. Broken files, split parents and paths that
 * only exist as the ancestor of other files count as branches, so nothing is
 * ever appended to them.
 */
export function describeShapes(nodes: ReadonlyMap<string, CategoryNode>, listedPaths: readonly string[]): CatalogShapes {
  const brokenPaths = new Set(listedPaths.filter(path => !nodes.has(path)));
  const ancestors = new Set(listedPaths.flatMap(ancestorsOf));
  const splitParents = new Set<string>();
  for (const [path, node] of nodes) {
    if (node.kind === 'leaf' && ancestors.has(path)) splitParents.add(path);
  }

  const shapeOf: ShapeLookup = path => {
    if (brokenPaths.has(path) || ancestors.has(path)) return 'branch';
    return nodes.get(path)?.kind;
  };
  return { brokenPaths, splitParents, shapeOf };
}

/** Stored shapes plus the leaves a run has decided to create. */
export class PlannedShapes {
  private readonly leaves = new Set<string>();
  private readonly ancestors = new Set<string>();

  constructor(private readonly stored: ShapeLookup) {}

  readonly shapeOf: ShapeLookup = path => {
    const shape = this.stored(path);
    if (shape !== undefined) return shape;
    if (this.ancestors.has(path)) return 'branch';
    return this.leaves.has(path) ? 'leaf' : undefined;
  };

  add(path: string): void {
    this.leaves.add(path);
    for (const ancestor of ancestorsOf(path)) this.ancestors.add(ancestor);
  }
}

/**
 * Where a product aimed at `full` actually lands. The deepest existing
 * prefix decides: a leaf takes the product (nothing is created under a
 * leaf), a branch lets the full path be created beneath it.
 */
export function placeAtPath(full: string, shapeOf: ShapeLookup): string {
  const segments = full.split('/');
  for (let depth = segments.length; depth >= 1; depth--) {
    const prefix = segments.slice(0, depth).join('/');
    const shape = shapeOf(prefix);
    if (shape === undefined) continue;
    if (shape === 'leaf') return prefix;
    return prefix === full ? `${full}/${OVERFLOW_CHILD}` : full;
  }
  return full;
}

/** Category file a classified product should land in. */
export function resolveTargetPath(
  category: string,
  subcategory: string | null,
  classifier: Classifier,
  shapeOf: ShapeLookup
): string {
  const subPath = subcategory ? classifier.subcategoryPath(category, subcategory) : null;
  return placeAtPath(subPath ? `${category}/${subPath}` : category, shapeOf);
}

/** Display name for a path that has no file yet. */
export function defaultCategoryName(path: string, classifier: Classifier): string {
  const segments = path.split('/');
  const category = segments[0] ?? path;
  const slug = lastSegment(path);
  if (segments.length === 1) return classifier.categoryName(category) ?? titleFromSlug(slug);
  return classifier.subcategoryName(category, slug) ?? titleFromSlug(slug);
}
