// src/scheduler.ts
//
// Drives passes on an interval and on triggers (descriptor changes under the
// info directory, SIGHUP).  At most one pass is ever in flight; a trigger that
// arrives meanwhile is dropped rather than queued.

import { watch, type FSWatcher } from "chokidar";
import { describeError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import type { MetadataReader } from "./metadata-reader.js";
import type { MountScan } from "./mount-scan.js";
import {
  INITIAL_OUTAGE,
  nextOutageState,
  pausedForPass,
  type OutageState,
} from "./outage.js";
import {
  runPass,
  type PassReport,
  type ReconcilePolicy,
  type TransitionListener,
} from "./reconcile.js";
import type { StateStore } from "./state-store.js";
import { clamp, wait } from "./util.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const SCHEDULER_DEFAULTS = {
  intervalMs: DAY_MS,
  minIntervalMs: 60_000,
  maxBackoffMs: 60 * 60 * 1000,
  scanRetries: 2,
  retryBaseMs: 1_000,
  outageThresholdMs: 15 * 60 * 1000,
  recoveryScans: 1,
  triggerDebounceMs: 5_000,
};

export type SchedulerOptions = {
  store: StateStore;
  reader: Pick<MetadataReader, "collect">;
  /** one scan attempt; retries are the scheduler's business */
  scan: () => Promise<MountScan>;
  policy?: ReconcilePolicy;
  logger?: Logger;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;

  intervalMs?: number;
  minIntervalMs?: number;
  maxBackoffMs?: number;
  scanRetries?: number;
  retryBaseMs?: number;
  outageThresholdMs?: number;
  recoveryScans?: number;

  /** watch this directory and tick when descriptors change */
  watchDir?: string;
  triggerDebounceMs?: number;
  /**
   * install SIGHUP / SIGINT / SIGTERM handlers while started; a single
   * `once` pass gets SIGINT / SIGTERM only
   */
  handleSignals?: boolean;
  onTransition?: TransitionListener | TransitionListener[];
};

export type TickResult =
  | { skipped: true }
  | { skipped: false; ok: true; report: PassReport }
  | { skipped: false; ok: false; error: string };

export interface SchedulerState {
  running: boolean;
  inFlight: boolean;
  stopping: boolean;
  passes: number;
  failures: number;
  backoffMs: number;
  nextRunAt: number | null;
  lastReport: PassReport | null;
  lastError: string | null;
  outage: OutageState;
}

export interface Scheduler {
  tick(reason?: string): Promise<TickResult>;
  /** with `once`, runs a single pass and resolves with its result */
  start(opts?: { once?: boolean }): Promise<TickResult | null>;
  stop(): Promise<void>;
  state(): SchedulerState;
  onTransition(listener: TransitionListener): void;
}

export function createScheduler(opts: SchedulerOptions): Scheduler {
  const logger = (opts.logger ?? new NullLogger()).child("scheduler");
  const clock = opts.clock ?? Date.now;
  const sleep = opts.sleep ?? wait;
  const cfg = {
    intervalMs: opts.intervalMs ?? SCHEDULER_DEFAULTS.intervalMs,
    minIntervalMs: opts.minIntervalMs ?? SCHEDULER_DEFAULTS.minIntervalMs,
    maxBackoffMs: opts.maxBackoffMs ?? SCHEDULER_DEFAULTS.maxBackoffMs,
    scanRetries: opts.scanRetries ?? SCHEDULER_DEFAULTS.scanRetries,
    retryBaseMs: opts.retryBaseMs ?? SCHEDULER_DEFAULTS.retryBaseMs,
    outageThresholdMs:
      opts.outageThresholdMs ?? SCHEDULER_DEFAULTS.outageThresholdMs,
    recoveryScans: opts.recoveryScans ?? SCHEDULER_DEFAULTS.recoveryScans,
    triggerDebounceMs:
      opts.triggerDebounceMs ?? SCHEDULER_DEFAULTS.triggerDebounceMs,
  };
  const { store } = opts;
  const listeners: TransitionListener[] = Array.isArray(opts.onTransition)
    ? [...opts.onTransition]
    : opts.onTransition
      ? [opts.onTransition]
      : [];

  let running = false;
  let stopping = false;
  let inFlight: Promise<TickResult> | null = null;
  let passes = 0;
  let failures = 0;
  let backoffMs = 0;
  let nextRunAt: number | null = null;
  let lastReport: PassReport | null = null;
  let lastError: string | null = null;
  let outage: OutageState = { ...INITIAL_OUTAGE };

  let watcher: FSWatcher | null = null;
  let triggerTimer: NodeJS.Timeout | null = null;
  let idleTimer: NodeJS.Timeout | null = null;
  let wakeIdle: (() => void) | null = null;
  let loopDone: Promise<void> | null = null;

  function readOutage(): OutageState {
    try {
      outage = store.readOutageState();
    } catch (err) {
      logger.warn("could not read outage state; using last known", {
        error: describeError(err),
      });
    }
    return outage;
  }

  function saveOutage(next: OutageState) {
    outage = next;
    try {
      store.writeOutageState(next);
    } catch (err) {
      logger.warn("could not persist outage state", {
        error: describeError(err),
      });
    }
  }

  async function scanWithRetry(): Promise<MountScan> {
    let attempt = 0;
    while (true) {
      const result = await opts.scan();
      if (result.state === "healthy" || attempt >= cfg.scanRetries || stopping) {
        return result;
      }
      const delay = cfg.retryBaseMs * 2 ** attempt;
      attempt++;
      logger.info(`mount scan inconclusive; retry ${attempt}/${cfg.scanRetries} in ${delay} ms`, {
        reason: result.reason,
      });
      await sleep(delay);
    }
  }

  // decides the pause for this pass from the final scan outcome
  function pauseFor(scan: MountScan): boolean {
    const prev = readOutage();
    const next = nextOutageState(prev, scan.state, clock(), cfg);
    if (next.paused && !prev.paused) {
      logger.warn("mount unreachable beyond outage threshold; pausing downgrades", {
        unknownSince: next.unknownSince,
        thresholdMs: cfg.outageThresholdMs,
      });
    } else if (prev.paused && !next.paused) {
      logger.info("mount recovered; downgrades resume next pass");
    }
    saveOutage(next);
    return pausedForPass(prev, next);
  }

  async function execute(reason: string): Promise<TickResult> {
    try {
      const report = await runPass({
        store,
        reader: opts.reader,
        scan: scanWithRetry,
        policy: opts.policy,
        paused: pauseFor,
        logger,
        clock,
        shouldStop: () => stopping,
        listeners,
        reason,
      });
      passes++;
      backoffMs = 0;
      lastReport = report;
      lastError = null;
      return { skipped: false, ok: true, report };
    } catch (err) {
      failures++;
      lastError = describeError(err);
      backoffMs = clamp(
        backoffMs ? backoffMs * 2 : cfg.minIntervalMs,
        cfg.minIntervalMs,
        cfg.maxBackoffMs,
      );
      logger.error("pass failed; stored state left untouched", {
        reason,
        error: lastError,
        backoffMs,
      });
      return { skipped: false, ok: false, error: lastError };
    }
  }

  async function tick(reason = "manual"): Promise<TickResult> {
    if (inFlight) {
      logger.debug("pass already in flight; trigger skipped", { reason });
      return { skipped: true };
    }
    if (stopping) return { skipped: true };
    logger.debug("pass starting", { reason });
    const current = execute(reason);
    inFlight = current;
    try {
      return await current;
    } finally {
      inFlight = null;
    }
  }

  function fire(reason: string) {
    tick(reason).catch((err) => {
      logger.error("triggered pass failed", { reason, error: describeError(err) });
    });
  }

  function scheduleTrigger(reason: string) {
    if (triggerTimer) clearTimeout(triggerTimer);
    triggerTimer = setTimeout(() => {
      triggerTimer = null;
      fire(reason);
    }, cfg.triggerDebounceMs);
  }

  const onHup = () => {
    logger.info("SIGHUP received; running a pass");
    fire("SIGHUP");
  };
  const onTerm = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received; stopping after the current item`);
    stop().catch((err) => {
      logger.error("shutdown failed", { error: describeError(err) });
    });
  };

  function startWatcher(dir: string) {
    watcher = watch(dir, {
      persistent: true,
      ignoreInitial: true,
      followSymlinks: false,
      awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
    });
    watcher.on("all", (event, p) => {
      if (!/\.(zurginfo|zurgtorrent)$/i.test(p)) return;
      logger.debug("descriptor change", { event, path: p });
      scheduleTrigger("descriptor change");
    });
    watcher.on("error", (err) => {
      logger.warn("info directory watcher error", { error: describeError(err) });
    });
  }

  function idle(ms: number): Promise<void> {
    return new Promise((resolve) => {
      wakeIdle = () => {
        if (idleTimer) clearTimeout(idleTimer);
        idleTimer = null;
        wakeIdle = null;
        resolve();
      };
      idleTimer = setTimeout(() => wakeIdle?.(), ms);
    });
  }

  async function loop() {
    while (!stopping) {
      await tick("interval");
      if (stopping) break;
      const delay = Math.max(backoffMs || cfg.intervalMs, cfg.minIntervalMs);
      nextRunAt = clock() + delay;
      logger.info(`next pass in ${delay} ms`);
      await idle(delay);
      nextRunAt = null;
    }
  }

  function installSignals(withHup: boolean) {
    if (!opts.handleSignals) return;
    if (withHup) process.on("SIGHUP", onHup);
    process.once("SIGINT", onTerm);
    process.once("SIGTERM", onTerm);
  }

  function removeSignals() {
    if (!opts.handleSignals) return;
    process.off("SIGHUP", onHup);
    process.off("SIGINT", onTerm);
    process.off("SIGTERM", onTerm);
  }

  async function start({ once = false }: { once?: boolean } = {}) {
    if (once) {
      // SIGINT / SIGTERM still end a single pass after its current item
      installSignals(false);
      try {
        return await tick("once");
      } finally {
        removeSignals();
      }
    }
    if (running) return null;
    running = true;
    stopping = false;
    readOutage();
    if (opts.watchDir) startWatcher(opts.watchDir);
    installSignals(true);
    logger.info("scheduler started", {
      intervalMs: cfg.intervalMs,
      outageThresholdMs: cfg.outageThresholdMs,
      watchDir: opts.watchDir ?? null,
    });
    loopDone = loop();
    try {
      await loopDone;
    } finally {
      loopDone = null;
    }
    return null;
  }

  async function stop() {
    stopping = true;
    if (triggerTimer) {
      clearTimeout(triggerTimer);
      triggerTimer = null;
    }
    wakeIdle?.();
    if (inFlight) await inFlight;
    if (loopDone) await loopDone;
    if (watcher) {
      await watcher.close();
      watcher = null;
    }
    removeSignals();
    if (running) logger.info("scheduler stopped", { passes, failures });
    running = false;
  }

  return {
    tick,
    start,
    stop,
    state: () => ({
      running,
      inFlight: inFlight !== null,
      stopping,
      passes,
      failures,
      backoffMs,
      nextRunAt,
      lastReport,
      lastError,
      outage: { ...outage },
    }),
    onTransition: (listener) => {
      listeners.push(listener);
    },
  };
}
