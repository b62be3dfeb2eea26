/**
 * Filter definitions: which filter groups a category shows, and the keyword
 * tables behind the groups that are read off product titles.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { RULES_DIR } from '../config/pipelineConfig.js';
import { FilterGroupSchema } from '../schemas/catalog.js';
import type { FilterGroup } from '../types/Catalog.js';
import { parentPath } from '../utils/slug.js';

export const DEFAULT_FILTERS_FILE = resolve(RULES_DIR, 'filter-definitions.json');
export const DEFAULT_GROUP_KEY = 'default';

const FilterDefinitionsFileSchema = z.object({
  version: z.string(),
  groups: z.record(z.array(FilterGroupSchema)),
  keywords: z.record(z.record(z.array(z.string()))),
});

export type FilterDefinitionsFile = z.infer<typeof FilterDefinitionsFileSchema>;

export interface KeywordEntry {
  value: string;
  patterns: RegExp[];
}

export interface FilterDefinitions {
  groups: Map<string, FilterGroup[]>;
  keywords: Map<string, KeywordEntry[]>;
}

export function compileFilterDefinitions(file: FilterDefinitionsFile): FilterDefinitions {
  if (!file.groups[DEFAULT_GROUP_KEY]) {
    throw new Error(`Filter definitions need a "${DEFAULT_GROUP_KEY}" group list`);
  }

  const keywords = new Map<string, KeywordEntry[]>();
  for (const [groupId, table] of Object.entries(file.keywords)) {
    keywords.set(
      groupId,
      Object.entries(table).map(([value, patterns]) => ({
        value,
        patterns: patterns.map(pattern => new RegExp(pattern, 'i')),
      }))
    );
  }

  return { groups: new Map(Object.entries(file.groups)), keywords };
}

export function loadFilterDefinitions(filePath: string = DEFAULT_FILTERS_FILE): FilterDefinitions {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return compileFilterDefinitions(FilterDefinitionsFileSchema.parse(raw));
}

/** Nearest definition up the category path, else the default list. */
export function groupsForPath(definitions: FilterDefinitions, path: string): FilterGroup[] {
  for (let current: string | null = path; current !== null; current = parentPath(current)) {
    const groups = definitions.groups.get(current);
    if (groups) return groups;
  }
  return definitions.groups.get(DEFAULT_GROUP_KEY) ?? [];
}
