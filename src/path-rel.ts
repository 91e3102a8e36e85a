// src/path-rel.ts
import path from "node:path";

// posix only; callers pass absolute, normalized paths.
export function toRel(abs: string, root: string): string {
  if (abs === root) return "";
  const prefix = root.endsWith("/") ? root : root + "/";
  if (abs.startsWith(prefix)) return abs.slice(prefix.length);
  // Fallback: resolve and slice, so callers don’t explode on odd inputs
  const r = path.posix.resolve(root);
  const a = path.posix.resolve(abs);
  return a.startsWith(r + "/") ? a.slice(r.length + 1) : a;
}

export function toAbs(rel: string, root: string): string {
  if (!rel) return root;
  return root.endsWith("/") ? `${root}${rel}` : `${root}/${rel}`;
}

/** Re-express a path under `from` as the same relative path under `to`. */
export function reroot(abs: string, from: string, to: string): string {
  if (from === to) return abs;
  return toAbs(toRel(abs, from), to);
}

export function isUnder(abs: string, root: string): boolean {
  if (abs === root) return true;
  return abs.startsWith(root.endsWith("/") ? root : root + "/");
}
