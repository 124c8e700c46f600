// src/transitions.ts
//
// Per-item state machine.  Pure: everything it needs (previous row, the
// descriptor, the mount observation and whether downgrades are paused) is
// passed in, so a pass can be replayed in tests without any I/O.
import type { Descriptor } from "./descriptor.js";
import type { ItemSnapshot, ItemStatus } from "./item.js";
import type { Observation } from "./name-match.js";

/**
 * present:     descriptor parsed (or unchanged) this pass
 * absent:      info directory listed and the descriptor is not there
 * unconfirmed: info directory missing or unreadable this pass
 * unsettled:   descriptor exists but is still being written
 */
export type DescriptorState = "present" | "absent" | "unconfirmed" | "unsettled";

export type MountObservation =
  | { kind: "unknown" }
  | { kind: "healthy"; observation: Observation };

export type Visibility = "complete" | "partial" | "absent";

export interface TransitionPolicy {
  /** consecutive healthy scans an item must be absent before MISSING */
  debounceScans: number;
}

export type ItemMetadata = Pick<
  Descriptor,
  | "name"
  | "files"
  | "totalSize"
  | "gatewayStatus"
  | "rawHash"
  | "descriptorPath"
  | "descriptorKind"
>;

export interface TransitionInput {
  id: string;
  prev?: ItemSnapshot;
  /** fresh metadata when the descriptor was parsed this pass */
  metadata?: ItemMetadata;
  descriptor: DescriptorState;
  mount: MountObservation;
  paused: boolean;
}

export interface TransitionOutcome {
  next: ItemSnapshot;
  from: ItemStatus | null;
  to: ItemStatus;
  /** false when the mount was unknown and status was left alone */
  evaluated: boolean;
  reason: string;
}

export function visibilityOf(obs: Observation): Visibility {
  if (obs.declared === 0) return obs.exists ? "complete" : "absent";
  if (obs.matching === obs.declared) return "complete";
  if (obs.visible > 0) return "partial";
  return "absent";
}

function fresh(id: string, metadata: ItemMetadata | undefined): ItemSnapshot {
  return {
    id,
    name: metadata?.name ?? id,
    files: [],
    status: "PENDING",
    descriptorPath: null,
    descriptorKind: null,
    descriptorPresent: true,
    sourceMetadataHash: null,
    gatewayStatus: null,
    totalSize: 0,
    missingStreak: 0,
    visibleFiles: 0,
    matchedFiles: 0,
    mountPath: null,
    needsInspection: false,
    lastError: null,
  };
}

function withMetadata(
  base: ItemSnapshot,
  metadata: ItemMetadata | undefined,
  descriptor: DescriptorState,
): ItemSnapshot {
  const next: ItemSnapshot = { ...base, files: base.files };
  if (metadata) {
    next.name = metadata.name;
    next.files = metadata.files.map((f) => ({ path: f.path, size: f.size }));
    next.totalSize = metadata.totalSize;
    next.gatewayStatus = metadata.gatewayStatus;
    next.sourceMetadataHash = metadata.rawHash;
    next.descriptorPath = metadata.descriptorPath;
    next.descriptorKind = metadata.descriptorKind;
    next.needsInspection = false;
    next.lastError = null;
  }
  if (descriptor === "present") next.descriptorPresent = true;
  else if (descriptor === "absent") next.descriptorPresent = false;
  return next;
}

export function decideTransition(
  input: TransitionInput,
  policy: TransitionPolicy,
): TransitionOutcome {
  const { id, prev, metadata, descriptor, mount, paused } = input;
  const from = prev?.status ?? null;
  const limit = Math.max(1, Math.floor(policy.debounceScans));
  const next = withMetadata(prev ?? fresh(id, metadata), metadata, descriptor);

  // status is frozen while the mount cannot answer; metadata still refreshes
  if (mount.kind === "unknown") {
    return {
      next,
      from,
      to: next.status,
      evaluated: false,
      reason: "mount unknown",
    };
  }

  if (next.status === "REMOVED" && descriptor === "present") {
    // the source brought the item back
    next.status = "PENDING";
    next.missingStreak = 0;
  }

  const obs = mount.observation;
  const visibility = visibilityOf(obs);
  next.visibleFiles = obs.visible;
  next.matchedFiles = obs.matching;
  next.mountPath = obs.mountPath;

  let reason: string;
  if (visibility === "complete") {
    next.status = "AVAILABLE";
    next.missingStreak = 0;
    reason = "all files visible";
  } else if (visibility === "partial") {
    next.status = "PARTIAL";
    next.missingStreak = 0;
    reason = `${obs.matching}/${obs.declared} files visible with matching size`;
  } else if (paused) {
    reason = "absent; downgrades paused";
  } else {
    next.missingStreak = Math.min(next.missingStreak + 1, limit);
    const debounced = next.missingStreak >= limit;
    if (debounced && (next.status === "AVAILABLE" || next.status === "PARTIAL")) {
      next.status = "MISSING";
      reason = `absent for ${next.missingStreak} healthy scans`;
    } else if (
      debounced &&
      (next.status === "MISSING" || next.status === "PENDING") &&
      descriptor === "absent"
    ) {
      next.status = "REMOVED";
      reason = "descriptor and mount files both gone";
    } else {
      reason = `absent (${next.missingStreak}/${limit})`;
    }
  }

  return { next, from, to: next.status, evaluated: true, reason };
}

/**
 * Row recorded for a descriptor that could not be parsed: PENDING with no
 * files and flagged for a human to look at.
 */
export function quarantineSnapshot(
  id: string,
  descriptorPath: string,
  rawHash: string | null,
  error: string,
  prev?: ItemSnapshot,
): ItemSnapshot {
  const base = prev ?? fresh(id, undefined);
  return {
    ...base,
    name: descriptorPath,
    files: [],
    status: "PENDING",
    descriptorPath,
    descriptorKind: null,
    descriptorPresent: true,
    sourceMetadataHash: rawHash,
    gatewayStatus: null,
    totalSize: 0,
    missingStreak: 0,
    visibleFiles: 0,
    matchedFiles: 0,
    mountPath: null,
    needsInspection: true,
    lastError: error,
  };
}
