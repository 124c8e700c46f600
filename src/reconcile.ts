// src/reconcile.ts
import type { Descriptor } from "./descriptor.js";
import { malformedId } from "./descriptor.js";
import { StoreWriteError, describeError } from "./errors.js";
import type { DescriptorKind, Item, ItemStatus } from "./item.js";
import { NullLogger, type Logger } from "./logger.js";
import type { DescriptorBatch, MetadataReader, ReaderWarning } from "./metadata-reader.js";
import type { MountScan } from "./mount-scan.js";
import { locateItem, type LocateOptions } from "./name-match.js";
import type { StateStore } from "./state-store.js";
import {
  decideTransition,
  quarantineSnapshot,
  type DescriptorState,
  type ItemMetadata,
  type MountObservation,
  type TransitionPolicy,
} from "./transitions.js";

export interface ReconcilePolicy extends TransitionPolicy, LocateOptions {}

export const DEFAULT_POLICY: Required<ReconcilePolicy> = {
  debounceScans: 3,
  matchThreshold: 100,
  fuzzyMaxDepth: 2,
};

export interface TransitionEvent {
  id: string;
  name: string;
  from: ItemStatus | null;
  to: ItemStatus;
  reason: string;
  at: number;
}

export type TransitionListener = (event: TransitionEvent) => void | Promise<void>;

export interface PassContext {
  store: StateStore;
  reader: Pick<MetadataReader, "collect">;
  /** mount scan, including whatever retry the driver wants */
  scan: () => Promise<MountScan>;
  policy?: ReconcilePolicy;
  /**
   * Global pause of downgrades.  The driver may decide it from the scan
   * outcome, in which case it is called once both reads have finished.
   */
  paused: boolean | ((scan: MountScan) => boolean);
  logger?: Logger;
  clock?: () => number;
  shouldStop?: () => boolean;
  listeners?: readonly TransitionListener[];
  reason?: string;
}

export interface PassReport {
  startedAt: number;
  finishedAt: number;
  reason: string | null;
  mount: { state: MountScan["state"]; reason: string | null };
  paused: boolean;
  descriptors: number;
  warnings: ReaderWarning[];
  evaluated: number;
  skipped: number;
  transitions: TransitionEvent[];
  writeErrors: { id: string; error: string }[];
  interrupted: boolean;
  passId: number | null;
}

const KIND_RANK: Record<DescriptorKind, number> = { zurginfo: 0, zurgtorrent: 1 };

type Chosen = {
  kind: DescriptorKind;
  path: string;
  metadata?: ItemMetadata;
};

function preferred(a: Chosen, b: Chosen): boolean {
  if (KIND_RANK[a.kind] !== KIND_RANK[b.kind]) {
    return KIND_RANK[a.kind] < KIND_RANK[b.kind];
  }
  return a.path < b.path;
}

/** One descriptor per id; .zurginfo wins over .zurgtorrent, then path order. */
export function chooseDescriptors(
  batch: DescriptorBatch,
  logger: Logger = new NullLogger(),
): Map<string, Chosen> {
  const chosen = new Map<string, Chosen>();
  const offer = (id: string, candidate: Chosen) => {
    const current = chosen.get(id);
    if (!current) {
      chosen.set(id, candidate);
      return;
    }
    if (current.kind === candidate.kind) {
      logger.warn("duplicate descriptor for item", {
        id,
        kept: preferred(current, candidate) ? current.path : candidate.path,
        ignored: preferred(current, candidate) ? candidate.path : current.path,
      });
    }
    if (preferred(candidate, current)) chosen.set(id, candidate);
  };
  for (const d of batch.ok) {
    offer(d.id, { kind: d.descriptorKind, path: d.descriptorPath, metadata: toMetadata(d) });
  }
  for (const u of batch.unchanged) {
    offer(u.id, { kind: u.descriptorKind, path: u.descriptorPath });
  }
  return chosen;
}

function toMetadata(d: Descriptor): ItemMetadata {
  return {
    name: d.name,
    files: d.files,
    totalSize: d.totalSize,
    gatewayStatus: d.gatewayStatus,
    rawHash: d.rawHash,
    descriptorPath: d.descriptorPath,
    descriptorKind: d.descriptorKind,
  };
}

function isQuarantineId(id: string) {
  return id.startsWith("malformed:");
}

/**
 * One reconciliation pass: read descriptors and scan the mount concurrently,
 * then evaluate every known or newly described item, each in its own store
 * transaction.  A failure on one item is recorded and the pass moves on.
 */
export async function runPass(ctx: PassContext): Promise<PassReport> {
  const logger = ctx.logger ?? new NullLogger();
  const clock = ctx.clock ?? Date.now;
  const policy = { ...DEFAULT_POLICY, ...ctx.policy };
  const { store } = ctx;
  const startedAt = clock();

  const [batch, scan] = await Promise.all([
    ctx.reader.collect(store.descriptorIndex()),
    ctx.scan(),
  ]);
  const paused = typeof ctx.paused === "function" ? ctx.paused(scan) : ctx.paused;

  const chosen = chooseDescriptors(batch, logger);
  const unsettledPaths = new Set(batch.unsettled.map((u) => u.descriptorPath));
  const malformedPaths = new Set(batch.malformed.map((m) => m.descriptorPath));

  const known = new Map<string, Item>();
  for (const item of store.list()) known.set(item.id, item);

  const ids = new Set<string>();
  for (const id of known.keys()) if (!isQuarantineId(id)) ids.add(id);
  for (const id of chosen.keys()) ids.add(id);

  const report: PassReport = {
    startedAt,
    finishedAt: startedAt,
    reason: ctx.reason ?? null,
    mount: {
      state: scan.state,
      reason: scan.state === "unknown" ? scan.reason : null,
    },
    paused,
    descriptors: batch.ok.length + batch.unchanged.length + batch.malformed.length,
    warnings: batch.warnings,
    evaluated: 0,
    skipped: 0,
    transitions: [],
    writeErrors: [],
    interrupted: false,
    passId: null,
  };

  if (scan.state === "unknown") {
    logger.warn("mount state unknown; statuses left unchanged this pass", {
      reason: scan.reason,
    });
  } else if (paused) {
    logger.warn("mount outage escalation active; downgrades paused this pass");
  }

  const emit = async (event: TransitionEvent) => {
    report.transitions.push(event);
    logger.info(`status ${event.from ?? "new"} -> ${event.to}`, {
      id: event.id,
      name: event.name,
      reason: event.reason,
    });
    for (const listener of ctx.listeners ?? []) {
      try {
        await listener(event);
      } catch (err) {
        logger.error("transition listener failed", {
          id: event.id,
          error: describeError(err),
        });
      }
    }
  };

  const write = async (
    id: string,
    fn: () => { name: string; from: ItemStatus | null; to: ItemStatus; reason: string; changed: boolean },
  ): Promise<boolean> => {
    try {
      const res = fn();
      if (res.changed && res.from !== res.to) {
        await emit({ id, name: res.name, from: res.from, to: res.to, reason: res.reason, at: clock() });
      }
      return true;
    } catch (err) {
      const error = describeError(err);
      report.writeErrors.push({ id, error });
      logger.error(
        err instanceof StoreWriteError ? "item write failed; retrying next pass" : "item reconciliation failed",
        { id, error },
      );
      return false;
    }
  };

  const stopRequested = () => {
    if (ctx.shouldStop?.()) {
      report.interrupted = true;
      return true;
    }
    return false;
  };

  const sortedIds = Array.from(ids).sort();
  for (const id of sortedIds) {
    if (stopRequested()) break;
    const prev = known.get(id);
    const pick = chosen.get(id);
    let descriptor: DescriptorState;
    if (pick) descriptor = "present";
    else if (batch.directoryMissing) descriptor = "unconfirmed";
    else if (prev?.descriptorPath && unsettledPaths.has(prev.descriptorPath)) descriptor = "unsettled";
    else if (prev?.descriptorPath && malformedPaths.has(prev.descriptorPath)) descriptor = "unconfirmed";
    else descriptor = "absent";

    const name = pick?.metadata?.name ?? prev?.name ?? id;
    const files = pick?.metadata?.files ?? prev?.files ?? [];
    const mount: MountObservation =
      scan.state === "unknown"
        ? { kind: "unknown" }
        : { kind: "healthy", observation: locateItem(scan, name, files, policy) };

    await write(id, () => {
      const outcome = decideTransition(
        { id, prev, metadata: pick?.metadata, descriptor, mount, paused },
        policy,
      );
      if (outcome.evaluated) report.evaluated++;
      else report.skipped++;
      const now = clock();
      const res = store.upsert(outcome.next, now, {
        checkedAt: outcome.evaluated ? now : null,
      });
      return {
        name: outcome.next.name,
        from: outcome.from,
        to: outcome.to,
        reason: outcome.reason,
        changed: res.changed,
      };
    });
  }

  if (!report.interrupted) {
    await reconcileQuarantine(ctx, batch, known, unsettledPaths, write, stopRequested, clock);
  }

  report.finishedAt = clock();
  try {
    report.passId = store.recordPass({
      startedAt: report.startedAt,
      finishedAt: report.finishedAt,
      reason: report.reason,
      mountState: report.mount.state,
      mountReason: report.mount.reason,
      paused,
      descriptors: report.descriptors,
      warnings: report.warnings.length,
      evaluated: report.evaluated,
      transitions: report.transitions.length,
      writeErrors: report.writeErrors.length,
      skipped: report.skipped,
      interrupted: report.interrupted,
    });
  } catch (err) {
    logger.error("failed to record pass history", { error: describeError(err) });
  }

  logger.info("pass complete", {
    mount: report.mount.state,
    paused,
    descriptors: report.descriptors,
    evaluated: report.evaluated,
    skipped: report.skipped,
    transitions: report.transitions.length,
    writeErrors: report.writeErrors.length,
    warnings: report.warnings.length,
    interrupted: report.interrupted,
    ms: report.finishedAt - report.startedAt,
  });
  return report;
}

async function reconcileQuarantine(
  ctx: PassContext,
  batch: DescriptorBatch,
  known: Map<string, Item>,
  unsettledPaths: Set<string>,
  write: (
    id: string,
    fn: () => { name: string; from: ItemStatus | null; to: ItemStatus; reason: string; changed: boolean },
  ) => Promise<boolean>,
  stopRequested: () => boolean,
  clock: () => number,
) {
  const { store } = ctx;
  const flagged = new Set<string>();
  for (const m of batch.malformed) {
    if (stopRequested()) return;
    const id = malformedId(m.descriptorPath);
    flagged.add(id);
    const prev = known.get(id);
    await write(id, () => {
      const next = quarantineSnapshot(id, m.descriptorPath, m.rawHash, m.error, prev);
      const res = store.upsert(next, clock());
      if (res.created) {
        ctx.logger?.warn("descriptor flagged for manual inspection", {
          descriptor: m.descriptorPath,
          error: m.error,
        });
      }
      return {
        name: next.name,
        from: prev?.status ?? null,
        to: next.status,
        reason: "malformed descriptor",
        changed: res.changed,
      };
    });
  }
  if (batch.directoryMissing) return;
  for (const [id, item] of known) {
    if (!isQuarantineId(id) || flagged.has(id) || item.status === "REMOVED") continue;
    if (item.descriptorPath && unsettledPaths.has(item.descriptorPath)) continue;
    if (stopRequested()) return;
    await write(id, () => ({
      name: item.name,
      from: item.status,
      to: "REMOVED",
      reason: "descriptor no longer malformed",
      changed: store.markRemoved(id, clock()),
    }));
  }
}
