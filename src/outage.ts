// src/outage.ts
//
// Global downgrade pause.  A mount that keeps answering "unknown" for longer
// than the threshold may come back with a partial view (gateway half up), so
// downgrades stay paused until enough healthy scans have been seen again.

export interface OutageState {
  consecutiveUnknown: number;
  /** start of the current run of unknown scans (ms), or null */
  unknownSince: number | null;
  paused: boolean;
  /** healthy scans seen since the pause began */
  healthySinceOutage: number;
}

export interface OutagePolicy {
  outageThresholdMs: number;
  recoveryScans: number;
}

export const INITIAL_OUTAGE: OutageState = {
  consecutiveUnknown: 0,
  unknownSince: null,
  paused: false,
  healthySinceOutage: 0,
};

export function nextOutageState(
  prev: OutageState,
  outcome: "healthy" | "unknown",
  now: number,
  policy: OutagePolicy,
): OutageState {
  if (outcome === "unknown") {
    const unknownSince = prev.unknownSince ?? now;
    return {
      consecutiveUnknown: prev.consecutiveUnknown + 1,
      unknownSince,
      paused: prev.paused || now - unknownSince >= policy.outageThresholdMs,
      // an unknown scan interrupts recovery
      healthySinceOutage: 0,
    };
  }
  if (prev.paused) {
    const healthy = prev.healthySinceOutage + 1;
    if (healthy < Math.max(1, policy.recoveryScans)) {
      return {
        consecutiveUnknown: 0,
        unknownSince: null,
        paused: true,
        healthySinceOutage: healthy,
      };
    }
  }
  return { ...INITIAL_OUTAGE };
}

/**
 * Whether the pass run on this outcome must leave downgrades alone.  Healthy
 * scans that count toward recovery still run paused; the pause takes effect
 * from the first pass after recovery completes.
 */
export function pausedForPass(prev: OutageState, next: OutageState): boolean {
  return prev.paused || next.paused;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/** Decodes the persisted form; anything unreadable starts fresh. */
export function parseOutageState(raw: string | null): OutageState {
  if (!raw) return { ...INITIAL_OUTAGE };
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ...INITIAL_OUTAGE };
  }
  if (!isRecord(parsed)) return { ...INITIAL_OUTAGE };
  const since = parsed.unknownSince;
  return {
    consecutiveUnknown: numberOr(parsed.consecutiveUnknown, 0),
    unknownSince: typeof since === "number" && Number.isFinite(since) ? since : null,
    paused: parsed.paused === true,
    healthySinceOutage: numberOr(parsed.healthySinceOutage, 0),
  };
}
