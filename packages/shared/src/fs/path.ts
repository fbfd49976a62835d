/**
 * Normalizes a path to use forward slashes, the form leakscan uses for every
 * root-relative path it reports or matches against ignore rules.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Final component of a forward-slash path.
 */
export function basename(p: string): string {
  const trimmed = p.endsWith('/') ? p.slice(0, -1) : p;
  const idx = trimmed.lastIndexOf('/');
  return idx === -1 ? trimmed : trimmed.slice(idx + 1);
}

/**
 * Splits a forward-slash path into its non-empty components.
 */
export function splitPath(p: string): string[] {
  return p.split('/').filter((part) => part.length > 0 && part !== '.');
}
