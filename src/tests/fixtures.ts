import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { HealthyScan, MountEntry } from "../mount-scan.js";
import { basenameRel } from "../path-rel.js";
import type { Sink, LogEntry } from "../logger.js";

export const HASH_A = "a".repeat(40);
export const HASH_B = "b".repeat(40);
export const HASH_C = "c".repeat(40);

export function zurgInfo(
  hash: string,
  filename: string,
  files: { path: string; bytes: number; selected?: number }[],
  extra: Record<string, unknown> = {},
): string {
  return JSON.stringify({
    hash,
    filename,
    status: "downloaded",
    files: files.map((f) => ({ selected: 1, ...f })),
    ...extra,
  });
}

export async function tmpDir(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), `debrid-ledger-${prefix}-`));
}

export async function writeFileAt(root: string, rel: string, content: string | Buffer, mtimeMs?: number) {
  const abs = path.join(root, rel);
  await fsp.mkdir(path.dirname(abs), { recursive: true });
  await fsp.writeFile(abs, content);
  if (mtimeMs != null) {
    const t = new Date(mtimeMs);
    await fsp.utimes(abs, t, t);
  }
  return abs;
}

/** Writes a file of exactly `size` bytes. */
export async function writeSized(root: string, rel: string, size: number) {
  return writeFileAt(root, rel, Buffer.alloc(size, 0x61));
}

/**
 * Builds a healthy scan from a listing; a number is a file of that size,
 * "dir" a directory.  Parent directories are added automatically.
 */
export function healthyScan(listing: Record<string, number | "dir">): HealthyScan {
  const entries = new Map<string, MountEntry>();
  const add = (rel: string, entry: MountEntry) => {
    if (!entries.has(rel)) entries.set(rel, entry);
  };
  for (const [rel, v] of Object.entries(listing)) {
    const parts = rel.split("/");
    for (let i = 1; i < parts.length; i++) {
      add(parts.slice(0, i).join("/"), { kind: "d", size: 0, mtimeMs: 0 });
    }
    if (v === "dir") add(rel, { kind: "d", size: 0, mtimeMs: 0 });
    else entries.set(rel, { kind: "f", size: v, mtimeMs: 0 });
  }
  const byName = new Map<string, string[]>();
  let fileCount = 0;
  let dirCount = 0;
  for (const [rel, e] of entries) {
    if (e.kind === "f") fileCount++;
    else dirCount++;
    const name = basenameRel(rel);
    const list = byName.get(name);
    if (list) list.push(rel);
    else byName.set(name, [rel]);
  }
  return {
    state: "healthy",
    root: "/mnt",
    entries,
    byName,
    fileCount,
    dirCount,
    durationMs: 0,
    warnings: [],
  };
}

export function memorySink(): { sink: Sink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { sink: (e) => entries.push(e), entries };
}
