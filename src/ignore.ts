import ignore from "ignore";

export type Ignorer = {
  ignoresFile: (r: string) => boolean; // root-relative file path
  ignoresDir: (r: string) => boolean; // root-relative directory path
};

export function normalizeR(r: string): string {
  return r.replace(/\\/g, "/").replace(/^\/+/, "").replace(/^(\.\/)+/, "");
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

/**
 * gitignore semantics. Directory checks append a trailing slash so that
 * dir-only rules such as `cache/` match.
 */
export function createIgnorer(patterns: readonly string[] = []): Ignorer {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) {
    return {
      ignoresFile: () => false,
      ignoresDir: () => false,
    };
  }
  const matcher = ignore().add(cleaned);
  return {
    ignoresFile: (r) => {
      const rel = normalizeR(r);
      return rel !== "" && matcher.ignores(rel);
    },
    ignoresDir: (r) => {
      const rel = normalizeR(r).replace(/\/+$/, "");
      return rel !== "" && matcher.ignores(`${rel}/`);
    },
  };
}
