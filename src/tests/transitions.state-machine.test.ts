import type { ItemSnapshot } from "../item.js";
import type { Observation } from "../name-match.js";
import {
  decideTransition,
  quarantineSnapshot,
  visibilityOf,
  type ItemMetadata,
  type MountObservation,
  type TransitionInput,
} from "../transitions.js";
import { HASH_A } from "./fixtures.js";

const policy = { debounceScans: 3 };

const metadata: ItemMetadata = {
  name: "X",
  files: [
    { path: "a.mkv", size: 100 },
    { path: "b.srt", size: 1 },
  ],
  totalSize: 101,
  gatewayStatus: "downloaded",
  rawHash: "h1",
  descriptorPath: "X.zurginfo",
  descriptorKind: "zurginfo",
};

function seen(visible: number, matching = visible): MountObservation {
  const observation: Observation = {
    mountPath: visible ? "X" : null,
    declared: 2,
    visible,
    matching,
    exists: visible > 0,
    fuzzy: false,
  };
  return { kind: "healthy", observation };
}

function step(prev: ItemSnapshot | undefined, over: Partial<TransitionInput>) {
  return decideTransition(
    { id: HASH_A, prev, metadata, descriptor: "present", mount: seen(2), paused: false, ...over },
    policy,
  );
}

describe("visibilityOf", () => {
  test("classifies observations", () => {
    expect(visibilityOf({ mountPath: "X", declared: 2, visible: 2, matching: 2, exists: true, fuzzy: false })).toBe("complete");
    expect(visibilityOf({ mountPath: "X", declared: 2, visible: 2, matching: 1, exists: true, fuzzy: false })).toBe("partial");
    expect(visibilityOf({ mountPath: null, declared: 2, visible: 0, matching: 0, exists: false, fuzzy: false })).toBe("absent");
    expect(visibilityOf({ mountPath: "E", declared: 0, visible: 0, matching: 0, exists: true, fuzzy: false })).toBe("complete");
  });
});

describe("decideTransition", () => {
  test("walks the AVAILABLE -> PARTIAL -> MISSING -> REMOVED scenario", () => {
    let s = step(undefined, {});
    expect([s.from, s.to]).toEqual([null, "AVAILABLE"]);

    s = step(s.next, { mount: seen(1) });
    expect(s.to).toBe("PARTIAL");

    for (let i = 1; i < 3; i++) {
      s = step(s.next, { mount: seen(0) });
      expect(s.to).toBe("PARTIAL");
      expect(s.reason).toBe(`absent (${i}/3)`);
    }
    s = step(s.next, { mount: seen(0) });
    expect(s.to).toBe("MISSING");
    expect(s.next.missingStreak).toBe(3);

    s = step(s.next, { mount: seen(0), metadata: undefined, descriptor: "absent" });
    expect(s.to).toBe("REMOVED");
    expect(s.next.descriptorPresent).toBe(false);
  });

  test("an unknown mount never changes status", () => {
    const available = step(undefined, {}).next;
    for (let k = 0; k < 5; k++) {
      const s = step(available, { mount: { kind: "unknown" }, descriptor: "absent" });
      expect(s.evaluated).toBe(false);
      expect(s.to).toBe("AVAILABLE");
      expect(s.next.missingStreak).toBe(0);
    }
  });

  test("MISSING with the descriptor still present stays MISSING", () => {
    let s = step(undefined, {});
    for (let i = 0; i < 6; i++) s = step(s.next, { mount: seen(0) });
    expect(s.to).toBe("MISSING");
    expect(s.next.missingStreak).toBe(3);
  });

  test("a missing info directory cannot confirm removal", () => {
    let s = step(undefined, {});
    for (let i = 0; i < 3; i++) s = step(s.next, { mount: seen(0) });
    s = step(s.next, { mount: seen(0), metadata: undefined, descriptor: "unconfirmed" });
    expect(s.to).toBe("MISSING");
    expect(s.next.descriptorPresent).toBe(true);
  });

  test("recovery resets the debounce counter", () => {
    let s = step(undefined, {});
    for (let i = 0; i < 3; i++) s = step(s.next, { mount: seen(0) });
    expect(s.to).toBe("MISSING");
    s = step(s.next, {});
    expect(s.to).toBe("AVAILABLE");
    expect(s.next.missingStreak).toBe(0);
  });

  test("paused downgrades leave status and streak alone", () => {
    const available = step(undefined, {}).next;
    const s = step(available, { mount: seen(0), paused: true });
    expect(s.to).toBe("AVAILABLE");
    expect(s.next.missingStreak).toBe(0);
    expect(s.reason).toBe("absent; downgrades paused");
  });

  test("a PENDING item whose descriptor and files are gone is removed after debounce", () => {
    let s = step(undefined, { mount: seen(0) });
    expect(s.to).toBe("PENDING");
    s = step(s.next, { mount: seen(0), metadata: undefined, descriptor: "absent" });
    expect(s.to).toBe("PENDING");
    s = step(s.next, { mount: seen(0), metadata: undefined, descriptor: "absent" });
    expect(s.to).toBe("REMOVED");
  });

  test("a REMOVED item whose descriptor returns stays REMOVED until the mount answers", () => {
    const removed: ItemSnapshot = {
      ...step(undefined, {}).next,
      status: "REMOVED",
      missingStreak: 3,
      descriptorPresent: false,
    };
    const blind = step(removed, { mount: { kind: "unknown" } });
    expect(blind.to).toBe("REMOVED");
    expect(blind.evaluated).toBe(false);
    expect(blind.next.descriptorPresent).toBe(true);
    expect(blind.next.missingStreak).toBe(3);

    const back = step(blind.next, { mount: seen(0) });
    expect(back.from).toBe("REMOVED");
    expect(back.to).toBe("PENDING");
    expect(back.next.missingStreak).toBe(1);
  });

  test("a returning REMOVED item with its files visible goes straight to AVAILABLE", () => {
    const removed: ItemSnapshot = { ...step(undefined, {}).next, status: "REMOVED", missingStreak: 3 };
    const s = step(removed, { mount: seen(2) });
    expect(s.to).toBe("AVAILABLE");
    expect(s.next.missingStreak).toBe(0);
  });

  test("metadata refreshes name and files even when the mount is unknown", () => {
    const prev = step(undefined, {}).next;
    const s = step(prev, {
      mount: { kind: "unknown" },
      metadata: { ...metadata, name: "X (2020)", rawHash: "h2" },
    });
    expect(s.next.name).toBe("X (2020)");
    expect(s.next.sourceMetadataHash).toBe("h2");
    expect(s.to).toBe("AVAILABLE");
  });
});

describe("quarantineSnapshot", () => {
  test("flags a PENDING row with no files", () => {
    const q = quarantineSnapshot("malformed:bad.zurginfo", "bad.zurginfo", "deadbeef", "invalid JSON");
    expect(q).toMatchObject({
      id: "malformed:bad.zurginfo",
      name: "bad.zurginfo",
      status: "PENDING",
      files: [],
      needsInspection: true,
      lastError: "invalid JSON",
      sourceMetadataHash: "deadbeef",
    });
  });
});
