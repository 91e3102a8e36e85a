import ignore from "ignore";
import path from "node:path";

export type Ignorer = {
  /**
   * `candidates` are the entry's full paths (resolved and configured-root
   * identities); `rel` is its path relative to the root.
   */
  ignores: (candidates: readonly string[], rel: string, isDir: boolean) => boolean;
};

export function normalizeIgnoreEntry(entry: string): string | null {
  const trimmed = entry.trim();
  if (!trimmed) return null;
  return path.resolve(trimmed);
}

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

export function collectIgnoreOption(
  value: string,
  previous?: string[] | string,
): string[] {
  const acc = Array.isArray(previous)
    ? [...previous]
    : typeof previous === "string" && previous
      ? [previous]
      : [];
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  acc.push(...parts);
  return acc;
}

/**
 * Two kinds of rules:
 * - `entries`: exact full paths (no globbing); a match on a directory
 *   prunes the whole subtree because the walker never descends into it.
 * - `patterns`: gitignore-style rules matched against the root-relative path.
 */
export function createIgnorer({
  entries = [],
  patterns = [],
}: {
  entries?: readonly string[];
  patterns?: readonly string[];
} = {}): Ignorer {
  const exact = new Set<string>();
  for (const raw of entries) {
    const normalized = normalizeIgnoreEntry(raw);
    if (normalized) exact.add(normalized);
  }
  const cleaned = normalizeIgnorePatterns(patterns);
  const matcher = cleaned.length ? ignore().add(cleaned) : null;
  if (!exact.size && !matcher) {
    return { ignores: () => false };
  }
  return {
    ignores: (candidates, rel, isDir) => {
      if (candidates.some((c) => exact.has(c))) return true;
      if (!matcher || !rel) return false;
      return matcher.ignores(isDir ? `${rel}/` : rel);
    },
  };
}
