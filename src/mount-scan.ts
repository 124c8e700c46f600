// src/mount-scan.ts
import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import path from "node:path";
import * as walk from "@nodelib/fs.walk";
import { TransientMountError, describeError, errorCode } from "./errors.js";
import { createIgnorer, type Ignorer } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";
import { basenameRel, depthOf, toRel } from "./path-rel.js";
import { withTimeout } from "./util.js";

export interface MountEntry {
  kind: "f" | "d";
  size: number;
  mtimeMs: number;
}

export interface HealthyScan {
  state: "healthy";
  root: string;
  /** mount-relative path -> entry */
  entries: Map<string, MountEntry>;
  /** basename -> every relative path with that basename */
  byName: Map<string, string[]>;
  fileCount: number;
  dirCount: number;
  durationMs: number;
  warnings: string[];
}

export interface UnknownScan {
  state: "unknown";
  reason: string;
  code?: string;
  durationMs: number;
}

export type MountScan = HealthyScan | UnknownScan;

/** errno codes that mean "the bridge could not answer", not "absent" */
export const TRANSIENT_CODES = new Set([
  "EIO",
  "ETIMEDOUT",
  "ENOTCONN",
  "ESTALE",
  "EHOSTDOWN",
  "EHOSTUNREACH",
  "ECONNRESET",
  "ECONNABORTED",
  "EAGAIN",
  "EBUSY",
]);

export interface WalkedEntry {
  path: string;
  isDirectory: boolean;
  size: number;
  mtimeMs: number;
}

export interface WalkHandle {
  entries: AsyncIterable<WalkedEntry>;
  destroy(): void;
}

export interface WalkRequest {
  root: string;
  ignorer: Ignorer;
  maxDepth: number;
  onSkip: (abs: string, err: unknown) => void;
}

/** Produces the raw directory walk; swapped out in tests. */
export type WalkSource = (req: WalkRequest) => WalkHandle;

export const fsWalkSource: WalkSource = ({ root, ignorer, maxDepth, onSkip }) => {
  const stream = walk.walkStream(root, {
    stats: true,
    followSymbolicLinks: false,
    concurrency: 16,
    deepFilter: (e) => {
      const r = toRel(e.path, root);
      if (depthOf(r) >= maxDepth) return false;
      return !ignorer.ignoresDir(r);
    },
    entryFilter: (e) => {
      const r = toRel(e.path, root);
      return e.dirent.isDirectory() ? !ignorer.ignoresDir(r) : !ignorer.ignoresFile(r);
    },
    errorFilter: (err) => {
      const code = errorCode(err);
      // a subpath that vanished mid-walk is legitimately absent
      if (code === "ENOENT" || code === "EACCES" || code === "EPERM") {
        onSkip(err.path ?? root, err);
        return true;
      }
      return false;
    },
  });
  async function* entries(): AsyncIterable<WalkedEntry> {
    for await (const raw of stream) {
      const e: walk.Entry = raw;
      yield {
        path: e.path,
        isDirectory: e.dirent.isDirectory(),
        size: e.stats?.size ?? 0,
        mtimeMs: e.stats?.mtimeMs ?? 0,
      };
    }
  }
  return { entries: entries(), destroy: () => stream.destroy() };
};

export interface ScanOptions {
  logger?: Logger;
  timeoutMs?: number;
  ignore?: readonly string[];
  maxDepth?: number;
  /** an empty root is reported unknown unless this is set */
  allowEmpty?: boolean;
  source?: WalkSource;
}

function transientFrom(err: unknown, what: string): TransientMountError {
  if (err instanceof TransientMountError) return err;
  const code = errorCode(err);
  const kind = code && TRANSIENT_CODES.has(code) ? "transient I/O error" : "error";
  return new TransientMountError(
    `${what}: ${kind}${code ? ` (${code})` : ""}: ${describeError(err)}`,
    code,
    { cause: err },
  );
}

async function checkRoot(root: string) {
  let st: Stats;
  try {
    st = await stat(root);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new TransientMountError(`mount root ${root} does not exist`, "ENOENT", {
        cause: err,
      });
    }
    throw transientFrom(err, `stat ${root}`);
  }
  if (!st.isDirectory()) {
    throw new TransientMountError(`mount root ${root} is not a directory`, "ENOTDIR");
  }
}

/**
 * Lists the mount.  A listing is only returned when it is authoritative;
 * anything that prevents a complete answer (timeout, I/O error, missing or
 * empty root) yields `{ state: "unknown" }` instead of a partial set.
 */
export async function scanMount(
  root: string,
  opts: ScanOptions = {},
): Promise<MountScan> {
  const logger = opts.logger ?? new NullLogger();
  const timeoutMs = opts.timeoutMs ?? 120_000;
  const maxDepth = opts.maxDepth ?? Number.POSITIVE_INFINITY;
  const source = opts.source ?? fsWalkSource;
  const absRoot = path.resolve(root);
  const ignorer = createIgnorer(opts.ignore ?? []);
  const t0 = Date.now();
  const warnings: string[] = [];
  let handle: WalkHandle | null = null;

  const work = async (): Promise<HealthyScan> => {
    await checkRoot(absRoot);
    const entries = new Map<string, MountEntry>();
    const byName = new Map<string, string[]>();
    let fileCount = 0;
    let dirCount = 0;
    handle = source({
      root: absRoot,
      ignorer,
      maxDepth,
      onSkip: (abs, err) => {
        const message = `skipped ${toRel(abs, absRoot) || "."}: ${describeError(err)}`;
        warnings.push(message);
        logger.debug(message);
      },
    });
    try {
      for await (const e of handle.entries) {
        const rel = toRel(e.path, absRoot);
        if (!rel) continue;
        entries.set(rel, {
          kind: e.isDirectory ? "d" : "f",
          size: e.isDirectory ? 0 : e.size,
          mtimeMs: e.mtimeMs,
        });
        if (e.isDirectory) dirCount++;
        else fileCount++;
        const name = basenameRel(rel);
        const list = byName.get(name);
        if (list) list.push(rel);
        else byName.set(name, [rel]);
      }
    } catch (err) {
      throw transientFrom(err, `walking ${absRoot}`);
    }
    if (entries.size === 0 && !opts.allowEmpty) {
      throw new TransientMountError(
        `mount root ${absRoot} is empty; the bridge is probably not mounted`,
        "EMPTY",
      );
    }
    return {
      state: "healthy",
      root: absRoot,
      entries,
      byName,
      fileCount,
      dirCount,
      durationMs: Date.now() - t0,
      warnings,
    };
  };

  try {
    const result = await withTimeout(work(), timeoutMs, () => handle?.destroy());
    if (result.timedOut) {
      logger.warn("mount scan timed out", { root: absRoot, timeoutMs });
      return {
        state: "unknown",
        reason: `scan exceeded ${timeoutMs} ms`,
        code: "ETIMEDOUT",
        durationMs: Date.now() - t0,
      };
    }
    logger.debug("mount scan complete", {
      root: absRoot,
      files: result.value.fileCount,
      dirs: result.value.dirCount,
      ms: result.value.durationMs,
    });
    return result.value;
  } catch (err) {
    const transient = transientFrom(err, `scanning ${absRoot}`);
    logger.warn("mount scan inconclusive", {
      root: absRoot,
      code: transient.code ?? null,
      error: transient.message,
    });
    return {
      state: "unknown",
      reason: transient.message,
      code: transient.code,
      durationMs: Date.now() - t0,
    };
  }
}
