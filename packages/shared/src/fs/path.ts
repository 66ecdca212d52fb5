import path from 'node:path';

/**
 * Normalizes a path to use forward slashes. Manifests always store paths in
 * this form so they read the same on every platform.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins all given path segments together using the platform-specific separator as a delimiter,
 * then normalizes the resulting path to use forward slashes.
 *
 * @param paths A sequence of path segments.
 * @returns The normalized joined path.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

/**
 * A platform-agnostic version of `path.resolve`.
 */
export function resolve(...pathSegments: string[]): string {
  return normalizePath(path.resolve(...pathSegments));
}

/**
 * True for POSIX roots, UNC paths and drive-letter paths, on any platform.
 */
export function isAbsolutePath(p: string): boolean {
  const normalized = normalizePath(p);
  if (normalized.startsWith('/')) return true;
  return /^[a-zA-Z]:\//.test(normalized);
}
