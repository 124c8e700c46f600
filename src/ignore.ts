// src/ignore.ts
import ignore from "ignore";

/** gitignore-style exclusion for mount-relative, "/"-separated paths. */
export interface Ignorer {
  ignoresFile(rel: string): boolean;
  ignoresDir(rel: string): boolean;
}

const NOTHING: Ignorer = {
  ignoresFile: () => false,
  ignoresDir: () => false,
};

const toPosix = (p: string) => p.replace(/\\/g, "/");

export function createIgnorer(patterns: readonly string[] = []): Ignorer {
  const rules = [...new Set(patterns.map((p) => toPosix(p.trim())).filter(Boolean))];
  if (!rules.length) return NOTHING;
  const ig = ignore().add(rules);
  const test = (rel: string, dir: boolean) => {
    const clean = toPosix(rel).replace(/^\/+/, "").replace(/\/+$/, "");
    if (!clean) return false;
    // "name/" rules only match when asked about a directory
    return ig.ignores(dir ? `${clean}/` : clean);
  };
  return {
    ignoresFile: (rel) => test(rel, false),
    ignoresDir: (rel) => test(rel, true),
  };
}

/** commander collector for a repeatable, comma-separable `--ignore` flag. */
export function collectIgnoreOption(value: string, previous: string[] = []): string[] {
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}
