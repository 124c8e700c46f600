// src/torrent-file.ts
import { createHash } from "node:crypto";
import { decode, encode } from "bencode";

export type BDict = Record<string, unknown>;

function isDict(v: unknown): v is BDict {
  return typeof v === "object" && v !== null && !Array.isArray(v) && !Buffer.isBuffer(v);
}

function text(v: unknown): string | undefined {
  if (Buffer.isBuffer(v)) return v.toString("utf8");
  return typeof v === "string" ? v : undefined;
}

export interface TorrentFileEntry {
  path: string;
  size: number;
}

export interface TorrentMeta {
  infoHash: string; // lowercase hex sha1
  name: string;
  files: TorrentFileEntry[];
  totalSize: number;
}

/** sha1 over the bencoded `info` dictionary (keys in sorted order). */
export function infoHashOf(info: BDict): string {
  return createHash("sha1").update(encode(info)).digest("hex");
}

function fileEntry(entry: unknown): TorrentFileEntry {
  if (!isDict(entry)) throw new Error("file entry is not a dictionary");
  const length = entry.length;
  const parts = entry["path.utf-8"] ?? entry.path;
  if (typeof length !== "number" || !Array.isArray(parts)) {
    throw new Error("file entry missing 'length' or 'path'");
  }
  const segments = parts.map((p: unknown) => text(p) ?? "");
  if (!segments.length || segments.some((s) => !s)) {
    throw new Error("file entry has an empty path segment");
  }
  return { path: segments.join("/"), size: length };
}

/**
 * Reads the name, file list and infohash out of a bencoded torrent.  Throws
 * when the payload does not decode or required keys are missing.
 */
export function parseTorrent(buf: Buffer): TorrentMeta {
  const root: unknown = decode(buf);
  if (!isDict(root)) throw new Error("torrent root is not a dictionary");
  const info = root.info;
  if (!isDict(info)) throw new Error("missing 'info' dictionary");

  const name = text(info["name.utf-8"]) ?? text(info.name);
  if (!name) throw new Error("missing 'name' in 'info' dictionary");

  let files: TorrentFileEntry[];
  if (Array.isArray(info.files)) {
    files = info.files.map(fileEntry);
  } else if (typeof info.length === "number") {
    files = [{ path: name, size: info.length }];
  } else {
    throw new Error("single-file torrent missing 'length'");
  }
  const totalSize = files.reduce((acc, f) => acc + f.size, 0);
  return { infoHash: infoHashOf(info), name, files, totalSize };
}
