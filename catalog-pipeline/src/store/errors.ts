export class CatalogFileError extends Error {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`${path}: ${reason}`, options);
    this.name = 'CatalogFileError';
    this.path = path;
    this.reason = reason;
  }
}
