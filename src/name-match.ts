// src/name-match.ts
import { ratio } from "fuzzball";
import type { ItemFile } from "./item.js";
import type { HealthyScan } from "./mount-scan.js";
import { depthOf, joinRel } from "./path-rel.js";

export function normalizeName(name: string): string {
  return name.normalize("NFC").trim().toLowerCase();
}

/**
 * fuzzywuzzy-style `ratio` in [0, 100] over the lowercased names, without the
 * library's punctuation stripping.  100 means identical after normalization.
 */
export function similarity(a: string, b: string): number {
  return ratio(normalizeName(a), normalizeName(b), { full_process: false });
}

export interface Observation {
  /** matched location relative to the mount root, or null */
  mountPath: string | null;
  declared: number;
  visible: number;
  matching: number;
  /** the matched location exists at all (used when nothing is declared) */
  exists: boolean;
  fuzzy: boolean;
}

export interface LocateOptions {
  /** 0-100; names scoring at least this are accepted when no exact match exists */
  matchThreshold?: number;
  /** fuzzy candidates are limited to this depth below the mount root */
  fuzzyMaxDepth?: number;
}

function observeAt(
  scan: HealthyScan,
  rel: string,
  files: readonly ItemFile[],
): Omit<Observation, "fuzzy"> {
  const entry = scan.entries.get(rel);
  if (!entry) {
    return { mountPath: null, declared: files.length, visible: 0, matching: 0, exists: false };
  }
  let visible = 0;
  let matching = 0;
  if (entry.kind === "f") {
    // the gateway may expose a single-file item as the file itself
    if (files.length === 1) {
      visible = 1;
      if (entry.size === files[0].size) matching = 1;
    }
  } else {
    for (const f of files) {
      const hit = scan.entries.get(joinRel(rel, f.path));
      if (!hit || hit.kind !== "f") continue;
      visible++;
      if (hit.size === f.size) matching++;
    }
  }
  return { mountPath: rel, declared: files.length, visible, matching, exists: true };
}

function better(a: Omit<Observation, "fuzzy">, b: Omit<Observation, "fuzzy">) {
  if (a.matching !== b.matching) return a.matching > b.matching;
  if (a.visible !== b.visible) return a.visible > b.visible;
  return (a.mountPath ?? "") < (b.mountPath ?? "");
}

/**
 * Finds where an item lives on the mount.  Every path whose basename equals
 * the item name is a candidate and the one showing the most declared files
 * wins; only when there is no exact candidate are names compared fuzzily.
 */
export function locateItem(
  scan: HealthyScan,
  name: string,
  files: readonly ItemFile[],
  { matchThreshold = 100, fuzzyMaxDepth = 2 }: LocateOptions = {},
): Observation {
  const none: Observation = {
    mountPath: null,
    declared: files.length,
    visible: 0,
    matching: 0,
    exists: false,
    fuzzy: false,
  };
  let best: Omit<Observation, "fuzzy"> | null = null;
  for (const rel of scan.byName.get(name) ?? []) {
    const obs = observeAt(scan, rel, files);
    if (!best || better(obs, best)) best = obs;
  }
  if (best) return { ...best, fuzzy: false };
  if (matchThreshold >= 100) return none;

  let bestScore = -1;
  for (const [candidate, rels] of scan.byName) {
    const shallow = rels.filter((r) => depthOf(r) <= fuzzyMaxDepth);
    if (!shallow.length) continue;
    const score = similarity(candidate, name);
    if (score < matchThreshold || score < bestScore) continue;
    for (const rel of shallow) {
      const obs = observeAt(scan, rel, files);
      if (score > bestScore || !best || better(obs, best)) {
        best = obs;
        bestScore = score;
      }
    }
  }
  return best ? { ...best, fuzzy: true } : none;
}
