// src/metadata-reader.ts
import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import * as walk from "@nodelib/fs.walk";
import {
  descriptorKindOf,
  parseDescriptor,
  rawHashOf,
  type Descriptor,
} from "./descriptor.js";
import { describeError, errorCode } from "./errors.js";
import type { DescriptorKind } from "./item.js";
import { NullLogger, type Logger } from "./logger.js";
import { toRel } from "./path-rel.js";
import type { DescriptorIndexEntry } from "./state-store.js";

export type DescriptorResult =
  | { kind: "ok"; descriptor: Descriptor }
  | {
      kind: "unchanged";
      id: string;
      rawHash: string;
      descriptorPath: string;
      descriptorKind: DescriptorKind;
    }
  | {
      kind: "malformed";
      descriptorPath: string;
      rawHash: string | null;
      error: string;
    }
  | { kind: "unsettled"; descriptorPath: string; ageMs: number };

export interface ReaderWarning {
  descriptorPath: string;
  message: string;
}

export interface DescriptorBatch {
  ok: Descriptor[];
  unchanged: Extract<DescriptorResult, { kind: "unchanged" }>[];
  malformed: Extract<DescriptorResult, { kind: "malformed" }>[];
  unsettled: Extract<DescriptorResult, { kind: "unsettled" }>[];
  warnings: ReaderWarning[];
  directoryMissing: boolean;
}

export interface MetadataReaderOptions {
  logger?: Logger;
  /** descriptors modified more recently than this are left for the next pass */
  settleMs?: number;
  progressIntervalMs?: number;
  clock?: () => number;
}

type Candidate = { abs: string; rel: string; kind: DescriptorKind; mtimeMs: number };

function listCandidates(
  root: string,
  warnings: ReaderWarning[],
): Promise<Candidate[]> {
  return new Promise((resolve, reject) => {
    walk.walk(
      root,
      {
        stats: true,
        followSymbolicLinks: true,
        entryFilter: (e) =>
          !e.dirent.isDirectory() && descriptorKindOf(e.name) != null,
        errorFilter: (err) => {
          const code = errorCode(err);
          if (code === "ENOENT") return true;
          if (code === "EACCES" || code === "EPERM") {
            warnings.push({
              descriptorPath: err.path ? toRel(err.path, root) : "",
              message: `unreadable: ${describeError(err)}`,
            });
            return true;
          }
          return false;
        },
      },
      (err, entries) => {
        if (err) {
          reject(err);
          return;
        }
        const out: Candidate[] = [];
        for (const e of entries) {
          const kind = descriptorKindOf(e.name);
          if (!kind) continue;
          out.push({
            abs: e.path,
            rel: toRel(e.path, root),
            kind,
            mtimeMs: e.stats?.mtimeMs ?? 0,
          });
        }
        out.sort((a, b) => (a.rel < b.rel ? -1 : a.rel > b.rel ? 1 : 0));
        resolve(out);
      },
    );
  });
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Reads `.zurginfo` / `.zurgtorrent` descriptors from the info directory.
 * Every file is read and parsed on its own; one bad file only ever produces
 * a `malformed` result for itself.
 */
export class MetadataReader {
  private readonly logger: Logger;
  private readonly settleMs: number;
  private readonly progressIntervalMs: number;
  private readonly clock: () => number;
  private missingReported = false;

  constructor(
    private readonly infoDir: string,
    opts: MetadataReaderOptions = {},
  ) {
    this.logger = opts.logger ?? new NullLogger();
    this.settleMs = opts.settleMs ?? 2_000;
    this.progressIntervalMs = opts.progressIntervalMs ?? 30_000;
    this.clock = opts.clock ?? Date.now;
  }

  /**
   * Lazily yields one result per descriptor file.  `knownHashes` maps a
   * descriptor's relative path to the id and raw hash recorded for it; a
   * matching hash yields `unchanged` without parsing.
   */
  async *read(
    knownHashes: ReadonlyMap<string, DescriptorIndexEntry> = new Map(),
    warnings: ReaderWarning[] = [],
  ): AsyncGenerator<DescriptorResult> {
    const root = path.resolve(this.infoDir);
    const candidates = await listCandidates(root, warnings);
    let parsed = 0;
    const progress =
      this.progressIntervalMs > 0
        ? setInterval(() => {
            this.logger.info("descriptors parsed so far", {
              parsed,
              total: candidates.length,
            });
          }, this.progressIntervalMs).unref()
        : null;
    try {
      for (const c of candidates) {
        const ageMs = this.clock() - c.mtimeMs;
        if (this.settleMs > 0 && ageMs < this.settleMs) {
          yield { kind: "unsettled", descriptorPath: c.rel, ageMs };
          continue;
        }
        let buf: Buffer;
        try {
          buf = await readFile(c.abs);
        } catch (err) {
          if (errorCode(err) === "ENOENT") continue; // vanished since listing
          parsed++;
          yield {
            kind: "malformed",
            descriptorPath: c.rel,
            rawHash: null,
            error: `read failed: ${describeError(err)}`,
          };
          continue;
        }
        parsed++;
        const rawHash = rawHashOf(buf);
        const known = knownHashes.get(c.rel);
        if (known && known.hash === rawHash) {
          yield {
            kind: "unchanged",
            id: known.id,
            rawHash,
            descriptorPath: c.rel,
            descriptorKind: c.kind,
          };
          continue;
        }
        try {
          yield { kind: "ok", descriptor: parseDescriptor(buf, c.rel, c.kind) };
        } catch (err) {
          yield {
            kind: "malformed",
            descriptorPath: c.rel,
            rawHash,
            error: describeError(err),
          };
        }
      }
    } finally {
      if (progress) clearInterval(progress);
    }
  }

  /** Drains `read()` into a batch report. */
  async collect(
    knownHashes: ReadonlyMap<string, DescriptorIndexEntry> = new Map(),
  ): Promise<DescriptorBatch> {
    const batch: DescriptorBatch = {
      ok: [],
      unchanged: [],
      malformed: [],
      unsettled: [],
      warnings: [],
      directoryMissing: false,
    };
    if (!(await isDirectory(this.infoDir))) {
      batch.directoryMissing = true;
      if (!this.missingReported) {
        this.missingReported = true;
        this.logger.warn("info directory is missing; treating metadata as unconfirmed", {
          infoDir: this.infoDir,
        });
      }
      return batch;
    }
    if (this.missingReported) {
      this.missingReported = false;
      this.logger.info("info directory is back", { infoDir: this.infoDir });
    }
    try {
      for await (const result of this.read(knownHashes, batch.warnings)) {
        switch (result.kind) {
          case "ok":
            batch.ok.push(result.descriptor);
            break;
          case "unchanged":
            batch.unchanged.push(result);
            break;
          case "malformed":
            batch.malformed.push(result);
            batch.warnings.push({
              descriptorPath: result.descriptorPath,
              message: result.error,
            });
            this.logger.warn("skipping malformed descriptor", {
              descriptor: result.descriptorPath,
              error: result.error,
            });
            break;
          case "unsettled":
            batch.unsettled.push(result);
            this.logger.debug("descriptor still being written; deferring", {
              descriptor: result.descriptorPath,
              ageMs: result.ageMs,
            });
            break;
        }
      }
    } catch (err) {
      // the directory vanished or became unreadable mid-walk
      this.logger.warn("info directory walk failed; treating metadata as unconfirmed", {
        infoDir: this.infoDir,
        error: describeError(err),
      });
      return { ...batch, ok: [], unchanged: [], malformed: [], unsettled: [], directoryMissing: true };
    }
    this.logger.info("descriptors read", {
      parsed: batch.ok.length,
      unchanged: batch.unchanged.length,
      malformed: batch.malformed.length,
      unsettled: batch.unsettled.length,
    });
    return batch;
  }
}
