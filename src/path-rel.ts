// src/path-rel.ts
import path from "node:path";

/** Relative, "/"-separated path of `abs` under `root` ("" for the root itself). */
export function toRel(abs: string, root: string): string {
  if (abs === root) return "";
  const rel = path.relative(root, abs);
  if (!rel || rel === ".") return "";
  return rel.split(path.sep).join("/");
}

export function joinRel(...parts: string[]): string {
  return parts.filter(Boolean).join("/");
}

export function basenameRel(rel: string): string {
  const i = rel.lastIndexOf("/");
  return i < 0 ? rel : rel.slice(i + 1);
}

export function depthOf(rel: string): number {
  return rel ? rel.split("/").length : 0;
}
