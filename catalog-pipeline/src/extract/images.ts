/**
 * Image URL helpers.
 *
 * The CDN serves one image under many size suffixes and extensions
 * (`..._145.webp`, `..._600.jpg`, `..._1000.avif`). Every URL is reduced to a
 * canonical size, and gallery entries are keyed by the UUID segment after
 * `productImages/` so the same picture is only listed once.
 */

import type { ProductImages } from '../types/Catalog.js';

export interface ImageOptions {
  cdnBase: string;
  canonicalSize: number;
}

export const DEFAULT_IMAGE_OPTIONS: ImageOptions = {
  cdnBase: 'https://images.thdstatic.com',
  canonicalSize: 1000,
};

const THUMBNAIL_SIZE = 100;
const SIZE_SUFFIX = /_\d+\.(jpe?g|avif|webp|png)$/i;
const IMAGE_UUID = /productImages\/([a-f0-9-]+)\//i;
const IMAGE_PATH_IN_MARKUP = /productImages\/([a-f0-9-]+)\/svn\/([^"'<>\s\\]+?\.(?:jpe?g|avif|webp|png))/gi;

export function canonicalImageUrl(url: string, canonicalSize: number = DEFAULT_IMAGE_OPTIONS.canonicalSize): string {
  return url.replace(/\s+/g, '').replace(SIZE_SUFFIX, `_${canonicalSize}.jpg`);
}

export function imageIdentity(url: string): string {
  const match = url.match(IMAGE_UUID);
  return match?.[1] ? match[1].toLowerCase() : canonicalImageUrl(url);
}

/** Canonicalize and keep the first URL seen for each image identity. */
export function dedupeGallery(urls: readonly string[], canonicalSize?: number): string[] {
  const seen = new Set<string>();
  const gallery: string[] = [];
  for (const raw of urls) {
    const url = canonicalImageUrl(raw, canonicalSize);
    if (!url) continue;
    const identity = imageIdentity(url);
    if (seen.has(identity)) continue;
    seen.add(identity);
    gallery.push(url);
  }
  return gallery;
}

export function findImageUrlsInMarkup(text: string, options: ImageOptions = DEFAULT_IMAGE_OPTIONS): string[] {
  const urls: string[] = [];
  for (const match of text.matchAll(IMAGE_PATH_IN_MARKUP)) {
    urls.push(`${options.cdnBase}/productImages/${match[1]}/svn/${match[2]}`);
  }
  return urls;
}

export function thumbnailFor(url: string): string {
  return url.replace(SIZE_SUFFIX, `_${THUMBNAIL_SIZE}.jpg`);
}

export function buildProductImages(gallery: readonly string[]): ProductImages | undefined {
  const primary = gallery[0];
  if (!primary) return undefined;
  return {
    primary,
    thumbnail: thumbnailFor(primary),
    gallery: [...gallery],
  };
}
