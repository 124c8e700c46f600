import fsp from "node:fs/promises";
import path from "node:path";
import { scanMount, type WalkSource, type WalkedEntry } from "../mount-scan.js";
import { tmpDir, writeSized } from "./fixtures.js";

function failingSource(code: string): WalkSource {
  return () => ({
    entries: (async function* (): AsyncGenerator<WalkedEntry> {
      const err = Object.assign(new Error(`${code}: input/output error, scandir`), { code });
      throw err;
    })(),
    destroy: () => {},
  });
}

function hangingSource(onDestroy: () => void): WalkSource {
  return () => ({
    entries: (async function* (): AsyncGenerator<WalkedEntry> {
      await new Promise<void>(() => {});
    })(),
    destroy: onDestroy,
  });
}

describe("scanMount", () => {
  let root: string;

  beforeEach(async () => {
    root = await tmpDir("mount");
  });

  afterEach(async () => {
    await fsp.rm(root, { recursive: true, force: true });
  });

  test("healthy scan lists files with sizes and indexes basenames", async () => {
    await writeSized(root, "X/a.mkv", 100);
    await writeSized(root, "X/b.srt", 1);
    await writeSized(root, "Y/X/c.mkv", 3);

    const scan = await scanMount(root);
    expect(scan.state).toBe("healthy");
    if (scan.state !== "healthy") return;
    expect(scan.entries.get("X/a.mkv")).toMatchObject({ kind: "f", size: 100 });
    expect(scan.entries.get("X/b.srt")).toMatchObject({ kind: "f", size: 1 });
    expect(scan.entries.get("X")).toMatchObject({ kind: "d" });
    expect([...(scan.byName.get("X") ?? [])].sort()).toEqual(["X", "Y/X"]);
    expect(scan.fileCount).toBe(3);
    expect(scan.dirCount).toBe(3);
  });

  test("ignore patterns and maxDepth limit the walk", async () => {
    await writeSized(root, "X/a.mkv", 100);
    await writeSized(root, "X/deep/d.mkv", 4);
    await writeSized(root, "junk/z.tmp", 1);

    const scan = await scanMount(root, { ignore: ["junk/"], maxDepth: 2 });
    expect(scan.state).toBe("healthy");
    if (scan.state !== "healthy") return;
    expect(scan.entries.has("junk")).toBe(false);
    expect(scan.entries.has("X/a.mkv")).toBe(true);
    expect(scan.entries.has("X/deep")).toBe(true);
    expect(scan.entries.has("X/deep/d.mkv")).toBe(false);
  });

  test("a missing root is unknown, never an empty listing", async () => {
    const scan = await scanMount(path.join(root, "gone"));
    expect(scan).toMatchObject({ state: "unknown", code: "ENOENT" });
  });

  test("an empty root is unknown unless allowed", async () => {
    expect(await scanMount(root)).toMatchObject({ state: "unknown", code: "EMPTY" });
    const allowed = await scanMount(root, { allowEmpty: true });
    expect(allowed.state).toBe("healthy");
  });

  test("an I/O error during the walk is unknown", async () => {
    const scan = await scanMount(root, { source: failingSource("EIO") });
    expect(scan.state).toBe("unknown");
    if (scan.state !== "unknown") return;
    expect(scan.code).toBe("EIO");
    expect(scan.reason).toContain("transient I/O error (EIO)");
  });

  test("a hanging walk times out as unknown and is torn down", async () => {
    let destroyed = false;
    const scan = await scanMount(root, {
      timeoutMs: 20,
      source: hangingSource(() => {
        destroyed = true;
      }),
    });
    expect(scan).toMatchObject({
      state: "unknown",
      code: "ETIMEDOUT",
      reason: "scan exceeded 20 ms",
    });
    expect(destroyed).toBe(true);
  });
});
