/** External product ids are purely numeric with at least 8 digits. */
export function isValidProductId(id: string): boolean {
  return /^\d{8,}$/.test(id);
}

/** `/p/<slug>/<id>` as used by product detail pages. */
export const PRODUCT_URL_PATTERN = /\/p\/([^/?#]+)\/(\d+)/;

export function productIdFromUrl(url: string): string | null {
  const id = url.match(PRODUCT_URL_PATTERN)?.[2];
  return id && isValidProductId(id) ? id : null;
}

/** Order-preserving unique list of valid ids. */
export function collectIds(candidates: Iterable<string>): string[] {
  const ids: string[] = [];
  const seen = new Set<string>();
  for (const raw of candidates) {
    const id = raw.trim();
    if (!isValidProductId(id) || seen.has(id)) continue;
    seen.add(id);
    ids.push(id);
  }
  return ids;
}
