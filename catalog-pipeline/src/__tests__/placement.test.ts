import { describe, expect, it } from 'vitest';
import { describeShapes, placeAtPath, PlannedShapes } from '../consolidate/placement.js';
import type { CategoryNode } from '../types/Catalog.js';

function leaf(path: string): CategoryNode {
  return { kind: 'leaf', meta: { categoryId: path, name: path, breadcrumbs: [], featuredBrands: [] }, products: [] };
}

describe('describeShapes', () => {
  const nodes = new Map<string, CategoryNode>([
    ['furniture/outdoor', leaf('furniture/outdoor')],
    ['tools/drills', leaf('tools/drills')],
    ['tools/drills/hammer-drills', leaf('tools/drills/hammer-drills')],
  ]);
  const shapes = describeShapes(nodes, ['furniture/outdoor', 'garage', 'tools/drills', 'tools/drills/hammer-drills']);

  it('treats a path known only through its children as a branch', () => {
    expect(shapes.shapeOf('furniture')).toBe('branch');
    expect(placeAtPath('furniture', shapes.shapeOf)).toBe('furniture/other');
    expect(placeAtPath('furniture/bedroom', shapes.shapeOf)).toBe('furniture/bedroom');
  });

  it('never appends to split parents or malformed files', () => {
    expect([...shapes.splitParents]).toEqual(['tools/drills']);
    expect([...shapes.brokenPaths]).toEqual(['garage']);
    expect(placeAtPath('tools/drills', shapes.shapeOf)).toBe('tools/drills/other');
    expect(placeAtPath('garage', shapes.shapeOf)).toBe('garage/other');
  });

  it('lets an existing leaf take products aimed below it', () => {
    expect(placeAtPath('furniture/outdoor/chairs', shapes.shapeOf)).toBe('furniture/outdoor');
  });
});

describe('PlannedShapes', () => {
  it('sees leaves planned in this run and their ancestors', () => {
    const planned = new PlannedShapes(describeShapes(new Map<string, CategoryNode>(), []).shapeOf);
    expect(placeAtPath('garage', planned.shapeOf)).toBe('garage');

    planned.add('garage/workbenches');

    expect(planned.shapeOf('garage/workbenches')).toBe('leaf');
    expect(placeAtPath('garage', planned.shapeOf)).toBe('garage/other');
    expect(placeAtPath('garage/workbenches/heavy-duty', planned.shapeOf)).toBe('garage/workbenches');
  });
});
