// src/item.ts

export const ITEM_STATUSES = [
  "PENDING",
  "AVAILABLE",
  "PARTIAL",
  "MISSING",
  "REMOVED",
] as const;

export type ItemStatus = (typeof ITEM_STATUSES)[number];

export type DescriptorKind = "zurginfo" | "zurgtorrent";

export interface ItemFile {
  /** relative to the item's directory, "/"-separated */
  path: string;
  size: number;
}

/** What the reconciler decides for an item; the store fills in timestamps. */
export interface ItemSnapshot {
  id: string;
  name: string;
  files: ItemFile[];
  status: ItemStatus;
  descriptorPath: string | null;
  descriptorKind: DescriptorKind | null;
  descriptorPresent: boolean;
  sourceMetadataHash: string | null;
  gatewayStatus: string | null;
  totalSize: number;
  missingStreak: number;
  visibleFiles: number;
  matchedFiles: number;
  mountPath: string | null;
  needsInspection: boolean;
  lastError: string | null;
}

export interface Item extends ItemSnapshot {
  createdAt: number;
  lastSeenAt: number;
  lastCheckedAt: number | null;
  statusChangedAt: number;
  removedAt: number | null;
}

export function isItemStatus(value: unknown): value is ItemStatus {
  return ITEM_STATUSES.some((s) => s === value);
}

export function parseItemStatus(raw: string): ItemStatus {
  const upper = raw.trim().toUpperCase();
  if (!isItemStatus(upper)) {
    throw new Error(
      `invalid status '${raw}' (expected one of ${ITEM_STATUSES.join(", ")})`,
    );
  }
  return upper;
}

export function sameFiles(a: readonly ItemFile[], b: readonly ItemFile[]) {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i].path !== b[i].path || a[i].size !== b[i].size) return false;
  }
  return true;
}

/** Content equality; timestamps are bookkeeping and never compared. */
export function sameContent(a: ItemSnapshot, b: ItemSnapshot): boolean {
  return (
    a.id === b.id &&
    a.name === b.name &&
    a.status === b.status &&
    a.descriptorPath === b.descriptorPath &&
    a.descriptorKind === b.descriptorKind &&
    a.descriptorPresent === b.descriptorPresent &&
    a.sourceMetadataHash === b.sourceMetadataHash &&
    a.gatewayStatus === b.gatewayStatus &&
    a.totalSize === b.totalSize &&
    a.missingStreak === b.missingStreak &&
    a.visibleFiles === b.visibleFiles &&
    a.matchedFiles === b.matchedFiles &&
    a.mountPath === b.mountPath &&
    a.needsInspection === b.needsInspection &&
    a.lastError === b.lastError &&
    sameFiles(a.files, b.files)
  );
}

export function toSnapshot(item: Item): ItemSnapshot {
  const {
    createdAt: _c,
    lastSeenAt: _s,
    lastCheckedAt: _k,
    statusChangedAt: _t,
    removedAt: _r,
    ...snapshot
  } = item;
  return snapshot;
}
