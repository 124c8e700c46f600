import { encode } from "bencode";
import fsp from "node:fs/promises";
import path from "node:path";
import { getDb } from "../db.js";
import { StoreWriteError } from "../errors.js";
import type { Item, ItemSnapshot } from "../item.js";
import { MetadataReader } from "../metadata-reader.js";
import type { MountScan } from "../mount-scan.js";
import { runPass, type PassContext, type TransitionEvent } from "../reconcile.js";
import { StateStore, type UpsertResult } from "../state-store.js";
import { HASH_A, HASH_B, healthyScan, tmpDir, writeFileAt, zurgInfo } from "./fixtures.js";

const X_FILES = [
  { path: "a.mkv", bytes: 100 },
  { path: "b.srt", bytes: 1 },
];

const UNKNOWN: MountScan = {
  state: "unknown",
  reason: "scan exceeded 10 ms",
  code: "ETIMEDOUT",
  durationMs: 10,
};

function withoutCheckedAt(items: Item[]) {
  return items.map(({ lastCheckedAt: _, ...rest }) => rest);
}

describe("runPass", () => {
  let infoDir: string;
  let store: StateStore;
  let scan: MountScan;
  let now: number;

  function ctx(over: Partial<PassContext> = {}): PassContext {
    return {
      store,
      reader: new MetadataReader(infoDir, { settleMs: 0 }),
      scan: async () => scan,
      policy: { debounceScans: 3 },
      paused: false,
      clock: () => now,
      ...over,
    };
  }

  async function pass(over: Partial<PassContext> = {}) {
    now += 1000;
    return runPass(ctx(over));
  }

  beforeEach(async () => {
    infoDir = await tmpDir("info");
    store = StateStore.open(":memory:");
    now = 1_000_000;
    await writeFileAt(infoDir, "X.zurginfo", zurgInfo(HASH_A, "X", X_FILES));
    scan = healthyScan({ "X/a.mkv": 100, "X/b.srt": 1 });
  });

  afterEach(async () => {
    store.close();
    await fsp.rm(infoDir, { recursive: true, force: true });
  });

  test("AVAILABLE, PARTIAL, MISSING, then REMOVED once the descriptor goes too", async () => {
    const first = await pass();
    expect(first.transitions.map((t) => [t.id, t.from, t.to])).toEqual([
      [HASH_A, null, "AVAILABLE"],
    ]);
    expect(store.get(HASH_A)).toMatchObject({
      status: "AVAILABLE",
      mountPath: "X",
      matchedFiles: 2,
      files: [
        { path: "a.mkv", size: 100 },
        { path: "b.srt", size: 1 },
      ],
    });

    scan = healthyScan({ "X/a.mkv": 100 });
    await pass();
    expect(store.get(HASH_A)?.status).toBe("PARTIAL");

    scan = healthyScan({ "Y/other.mkv": 5 });
    await pass();
    await pass();
    expect(store.get(HASH_A)?.status).toBe("PARTIAL");
    const third = await pass();
    expect(third.transitions.map((t) => t.to)).toEqual(["MISSING"]);
    expect(store.get(HASH_A)).toMatchObject({ status: "MISSING", missingStreak: 3 });

    await fsp.rm(path.join(infoDir, "X.zurginfo"));
    await pass();
    expect(store.get(HASH_A)).toMatchObject({ status: "REMOVED", descriptorPresent: false });
  });

  test("a returning descriptor revives a REMOVED item only on a healthy scan", async () => {
    await pass();
    scan = healthyScan({ "Y/other.mkv": 5 });
    await pass();
    await pass();
    await pass();
    await fsp.rm(path.join(infoDir, "X.zurginfo"));
    await pass();
    expect(store.get(HASH_A)?.status).toBe("REMOVED");

    await writeFileAt(infoDir, "X.zurginfo", zurgInfo(HASH_A, "X", X_FILES));
    scan = UNKNOWN;
    const blind = await pass();
    expect(blind.transitions).toEqual([]);
    expect(blind.skipped).toBe(1);
    expect(store.get(HASH_A)).toMatchObject({ status: "REMOVED", descriptorPresent: true });

    scan = healthyScan({ "Y/other.mkv": 5 });
    const healthy = await pass();
    expect(healthy.transitions.map((t) => [t.from, t.to])).toEqual([["REMOVED", "PENDING"]]);
    expect(store.get(HASH_A)?.status).toBe("PENDING");
  });

  test("re-running with nothing changed leaves the store identical", async () => {
    await pass();
    const seenAt = store.get(HASH_A)?.lastSeenAt;
    const before = withoutCheckedAt(store.list());
    const again = await pass();
    expect(again.transitions).toEqual([]);
    expect(withoutCheckedAt(store.list())).toEqual(before);
    expect(store.get(HASH_A)?.lastSeenAt).toBe(seenAt);
    expect(store.get(HASH_A)?.lastCheckedAt).toBe(now);
  });

  test("an unknown mount skips every item without touching status or last_checked_at", async () => {
    await pass();
    const checkedAt = store.get(HASH_A)?.lastCheckedAt;
    await fsp.rm(path.join(infoDir, "X.zurginfo"));
    scan = UNKNOWN;
    for (let k = 0; k < 4; k++) {
      const report = await pass();
      expect(report).toMatchObject({ evaluated: 0, skipped: 1, transitions: [] });
      expect(report.mount).toEqual({ state: "unknown", reason: "scan exceeded 10 ms" });
    }
    expect(store.get(HASH_A)).toMatchObject({
      status: "AVAILABLE",
      missingStreak: 0,
      lastCheckedAt: checkedAt,
    });
  });

  test("a paused pass never downgrades", async () => {
    await pass();
    scan = healthyScan({ "Y/other.mkv": 5 });
    for (let k = 0; k < 5; k++) await pass({ paused: true });
    expect(store.get(HASH_A)).toMatchObject({ status: "AVAILABLE", missingStreak: 0 });
  });

  test("the pause may be decided from the scan outcome", async () => {
    const decided: string[] = [];
    const report = await pass({
      paused: (s) => {
        decided.push(s.state);
        return true;
      },
    });
    expect(decided).toEqual(["healthy"]);
    expect(report.paused).toBe(true);
  });

  test("a malformed descriptor is quarantined and the rest proceed", async () => {
    await writeFileAt(infoDir, "broken.zurginfo", '{"hash": ');
    const report = await pass();
    expect(store.get(HASH_A)?.status).toBe("AVAILABLE");
    expect(store.get("malformed:broken.zurginfo")).toMatchObject({
      status: "PENDING",
      needsInspection: true,
      files: [],
      descriptorPath: "broken.zurginfo",
    });
    expect(report.warnings.map((w) => w.descriptorPath)).toEqual(["broken.zurginfo"]);

    // once fixed, the quarantine row retires and the real item appears
    await writeFileAt(infoDir, "broken.zurginfo", zurgInfo(HASH_B, "B", [{ path: "b.mkv", bytes: 9 }]));
    await pass();
    expect(store.get("malformed:broken.zurginfo")?.status).toBe("REMOVED");
    expect(store.get(HASH_B)).toMatchObject({ status: "PENDING", name: "B", needsInspection: false });
  });

  test("a missing info directory never confirms removal", async () => {
    await pass();
    scan = healthyScan({ "Y/other.mkv": 5 });
    for (let k = 0; k < 3; k++) await pass();
    expect(store.get(HASH_A)?.status).toBe("MISSING");
    await fsp.rm(infoDir, { recursive: true, force: true });
    for (let k = 0; k < 3; k++) await pass();
    expect(store.get(HASH_A)).toMatchObject({ status: "MISSING", descriptorPresent: true });
  });

  test(".zurginfo wins over .zurgtorrent for the same id", async () => {
    const torrentHash = "88c2a8dd705885780635c00dac9f4edc23d8fb0c";
    await writeFileAt(
      infoDir,
      "A.zurgtorrent",
      encode({ info: { length: 100, name: "a.mkv", "piece length": 16384, pieces: "" } }),
    );
    await writeFileAt(infoDir, "Z.zurginfo", zurgInfo(torrentHash, "From Info", []));
    await pass();
    expect(store.get(torrentHash)).toMatchObject({
      name: "From Info",
      descriptorKind: "zurginfo",
      descriptorPath: "Z.zurginfo",
    });
  });

  test("one failing item write does not abort the others", async () => {
    class FlakyStore extends StateStore {
      override upsert(snapshot: ItemSnapshot, at?: number, opts?: { checkedAt?: number | null }): UpsertResult {
        if (snapshot.id === HASH_A) {
          throw new StoreWriteError("failed to write item: database is locked", snapshot.id);
        }
        return super.upsert(snapshot, at, opts);
      }
    }
    store.close();
    store = new FlakyStore(getDb(":memory:"));
    await writeFileAt(infoDir, "B.zurginfo", zurgInfo(HASH_B, "B", [{ path: "b.mkv", bytes: 9 }]));
    const report = await pass();
    expect(report.writeErrors).toEqual([
      { id: HASH_A, error: "failed to write item: database is locked" },
    ]);
    expect(store.get(HASH_A)).toBeUndefined();
    expect(store.get(HASH_B)?.status).toBe("PENDING");
    expect(store.listPasses()[0]).toMatchObject({ writeErrors: 1, evaluated: 2 });
  });

  test("listener failures are contained", async () => {
    const events: TransitionEvent[] = [];
    const report = await pass({
      listeners: [
        () => {
          throw new Error("listener boom");
        },
        (e) => {
          events.push(e);
        },
      ],
    });
    expect(report.transitions).toHaveLength(1);
    expect(events.map((e) => e.to)).toEqual(["AVAILABLE"]);
  });

  test("a stop request ends the pass after the current item", async () => {
    await writeFileAt(infoDir, "B.zurginfo", zurgInfo(HASH_B, "B", [{ path: "b.mkv", bytes: 9 }]));
    let checks = 0;
    const report = await pass({ shouldStop: () => checks++ >= 1 });
    expect(report.interrupted).toBe(true);
    expect(store.get(HASH_A)).toBeDefined();
    expect(store.get(HASH_B)).toBeUndefined();
    expect(store.listPasses()[0]).toMatchObject({ interrupted: true });
  });
});
