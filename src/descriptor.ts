// src/descriptor.ts
import { createHash } from "node:crypto";
import { MalformedMetadataError, describeError } from "./errors.js";
import type { DescriptorKind, ItemFile } from "./item.js";
import { parseTorrent } from "./torrent-file.js";

/** One parsed metadata file from the info directory. */
export interface Descriptor {
  id: string;
  name: string;
  files: ItemFile[];
  totalSize: number;
  gatewayStatus: string | null;
  rawHash: string;
  descriptorPath: string;
  descriptorKind: DescriptorKind;
}

const INFOHASH_RE = /^[0-9a-fA-F]{40}$/;

export function descriptorKindOf(fileName: string): DescriptorKind | null {
  const lower = fileName.toLowerCase();
  if (lower.endsWith(".zurginfo")) return "zurginfo";
  if (lower.endsWith(".zurgtorrent")) return "zurgtorrent";
  return null;
}

export function rawHashOf(buf: Buffer): string {
  return createHash("sha1").update(buf).digest("hex");
}

export function normalizeId(hash: string): string {
  return hash.trim().toLowerCase();
}

/** Synthetic id for a descriptor file that could not be parsed. */
export function malformedId(descriptorPath: string): string {
  return `malformed:${descriptorPath}`;
}

function normalizeFilePath(raw: string): string {
  return raw.replace(/\\/g, "/").replace(/^\/+/, "");
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
}

function firstString(
  record: Record<string, unknown>,
  keys: string[],
): string | undefined {
  for (const key of keys) {
    const v = record[key];
    if (typeof v === "string" && v.trim()) return v;
  }
  return undefined;
}

/**
 * A .zurginfo file is the debrid gateway's JSON torrent info: `hash`,
 * `filename` and a `files` array of `{path, bytes, selected}`.  Files with
 * `selected: 0` are not part of the served content.
 */
export function parseZurgInfo(
  buf: Buffer,
): Omit<Descriptor, "rawHash" | "descriptorPath" | "descriptorKind"> {
  let data: unknown;
  try {
    data = JSON.parse(buf.toString("utf8"));
  } catch (err) {
    throw new Error(`invalid JSON: ${describeError(err)}`);
  }
  const record = asRecord(data);
  if (!record) throw new Error("descriptor is not a JSON object");
  const hash = record.hash;
  if (typeof hash !== "string" || !INFOHASH_RE.test(hash.trim())) {
    throw new Error("missing or invalid 'hash'");
  }
  const name = firstString(record, ["filename", "name", "original_filename"]);
  if (!name) throw new Error("missing 'filename'");

  const files: ItemFile[] = [];
  const rawFiles = record.files;
  if (rawFiles != null) {
    if (!Array.isArray(rawFiles)) throw new Error("'files' is not an array");
    for (const entry of rawFiles) {
      const file = asRecord(entry);
      if (!file) throw new Error("file entry is not an object");
      if (file.selected === 0) continue;
      const path = file.path;
      const bytes = file.bytes ?? file.size;
      if (typeof path !== "string" || !normalizeFilePath(path)) {
        throw new Error("file entry has no 'path'");
      }
      if (typeof bytes !== "number" || !Number.isFinite(bytes) || bytes < 0) {
        throw new Error(`file entry '${path}' has no valid 'bytes'`);
      }
      files.push({ path: normalizeFilePath(path), size: bytes });
    }
  }
  const declaredTotal = record.bytes;
  const totalSize =
    typeof declaredTotal === "number" && Number.isFinite(declaredTotal)
      ? declaredTotal
      : files.reduce((acc, f) => acc + f.size, 0);
  const status = record.status;
  return {
    id: normalizeId(hash),
    name,
    files,
    totalSize,
    gatewayStatus: typeof status === "string" ? status : null,
  };
}

export function parseZurgTorrent(
  buf: Buffer,
): Omit<Descriptor, "rawHash" | "descriptorPath" | "descriptorKind"> {
  const meta = parseTorrent(buf);
  return {
    id: normalizeId(meta.infoHash),
    name: meta.name,
    files: meta.files.map((f) => ({ path: normalizeFilePath(f.path), size: f.size })),
    totalSize: meta.totalSize,
    gatewayStatus: null,
  };
}

/** Parses one descriptor; failures become MalformedMetadataError. */
export function parseDescriptor(
  buf: Buffer,
  descriptorPath: string,
  kind: DescriptorKind,
): Descriptor {
  const rawHash = rawHashOf(buf);
  if (buf.length === 0) {
    throw new MalformedMetadataError("descriptor is empty", descriptorPath);
  }
  try {
    const parsed =
      kind === "zurginfo" ? parseZurgInfo(buf) : parseZurgTorrent(buf);
    return { ...parsed, rawHash, descriptorPath, descriptorKind: kind };
  } catch (err) {
    throw new MalformedMetadataError(
      `${descriptorPath}: ${describeError(err)}`,
      descriptorPath,
      { cause: err },
    );
  }
}
