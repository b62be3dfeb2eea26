/**
 * Storage backends for the catalog store. Paths are always relative,
 * forward-slashed, and rooted at the catalog data directory.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join, relative, sep } from 'path';

export interface StorageBackend {
  read(relPath: string): string | undefined;
  write(relPath: string, text: string): void;
  exists(relPath: string): boolean;
  /** Every file under `prefix`, recursively, sorted lexicographically. */
  list(prefix: string): string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Filesystem
// ─────────────────────────────────────────────────────────────────────────────

export class FileSystemBackend implements StorageBackend {
  constructor(private readonly root: string) {}

  read(relPath: string): string | undefined {
    const full = join(this.root, relPath);
    if (!existsSync(full)) return undefined;
    return readFileSync(full, 'utf-8');
  }

  write(relPath: string, text: string): void {
    const full = join(this.root, relPath);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, text, 'utf-8');
  }

  exists(relPath: string): boolean {
    return existsSync(join(this.root, relPath));
  }

  list(prefix: string): string[] {
    const base = join(this.root, prefix);
    if (!existsSync(base)) return [];

    const files: string[] = [];
    const walk = (dir: string) => {
      for (const entry of readdirSync(dir, { withFileTypes: true })) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(full);
        } else if (entry.isFile()) {
          files.push(relative(this.root, full).split(sep).join('/'));
        }
      }
    };
    walk(base);
    return files.sort();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// In-memory (tests)
// ─────────────────────────────────────────────────────────────────────────────

export class MemoryBackend implements StorageBackend {
  readonly files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(initial)) {
      this.files.set(path, text);
    }
  }

  read(relPath: string): string | undefined {
    return this.files.get(relPath);
  }

  write(relPath: string, text: string): void {
    this.files.set(relPath, text);
  }

  exists(relPath: string): boolean {
    return this.files.has(relPath);
  }

  list(prefix: string): string[] {
    const normalized = prefix.endsWith('/') ? prefix : `${prefix}/`;
    return [...this.files.keys()].filter(path => path.startsWith(normalized)).sort();
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries([...this.files.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }
}
