#!/usr/bin/env node
// src/cli.ts
import { readFileSync } from "node:fs";
import path from "node:path";
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { Command, Option } from "commander";
import { EXIT_FAILURE, fmtBytes, fmtTime, guarded, numberOption } from "./cli-util.js";
import {
  DEFAULT_SETTINGS_FILE,
  resolveConfig,
  validateConfig,
  type ReconcilerConfig,
} from "./config.js";
import { CLI_NAME } from "./constants.js";
import { normalizeId } from "./descriptor.js";
import { collectIgnoreOption } from "./ignore.js";
import { ITEM_STATUSES, parseItemStatus, type Item, type ItemStatus } from "./item.js";
import { LOG_LEVELS, createLogger, type Logger } from "./logger.js";
import { MetadataReader } from "./metadata-reader.js";
import { scanMount } from "./mount-scan.js";
import { createScheduler } from "./scheduler.js";
import { StateStore } from "./state-store.js";

type GlobalFlags = { logLevel?: string };

type PathFlags = {
  infoDir?: string;
  mount?: string;
  db?: string;
  settings?: string;
};

type RunFlags = PathFlags & {
  once?: boolean;
  intervalMs?: number;
  debounceScans?: number;
  outageThresholdMs?: number;
  recoveryScans?: number;
  scanRetries?: number;
  scanTimeoutMs?: number;
  settleMs?: number;
  matchThreshold?: number;
  maxDepth?: number;
  ignore?: string[];
  allowEmptyMount?: boolean;
  watch?: boolean;
  logFile?: string;
};

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (typeof raw === "object" && raw !== null && "version" in raw) {
      const { version } = raw;
      if (typeof version === "string") return version;
    }
  } catch {
    // running from an unusual layout; fall through
  }
  return "0.0.0";
}

function configFor(flags: RunFlags, command: Command): ReconcilerConfig {
  const globals = command.optsWithGlobals<GlobalFlags>();
  return resolveConfig({
    settingsFile: flags.settings,
    flags: {
      infoDir: flags.infoDir,
      mountRoot: flags.mount,
      dbPath: flags.db,
      intervalMs: flags.intervalMs,
      debounceScans: flags.debounceScans,
      outageThresholdMs: flags.outageThresholdMs,
      recoveryScans: flags.recoveryScans,
      scanRetries: flags.scanRetries,
      scanTimeoutMs: flags.scanTimeoutMs,
      settleMs: flags.settleMs,
      matchThreshold: flags.matchThreshold,
      maxDepth: flags.maxDepth,
      ignore: flags.ignore,
      allowEmptyMount: flags.allowEmptyMount,
      watch: flags.watch,
      logFile: flags.logFile,
      logLevel: globals.logLevel,
    },
  });
}

function loggerFor(cfg: ReconcilerConfig): Logger {
  return createLogger({
    level: cfg.logLevel,
    logFile: cfg.logFile ?? undefined,
  });
}

function withPathOptions(cmd: Command, { mount = true }: { mount?: boolean } = {}): Command {
  cmd
    .option("--info-dir <dir>", "directory of .zurginfo/.zurgtorrent descriptors")
    .option("--db <file>", "sqlite database file")
    .option(
      "--settings <file>",
      `JSON settings file (default: ./${DEFAULT_SETTINGS_FILE} when present)`,
    );
  if (mount) cmd.option("--mount <dir>", "mount root of the remote filesystem");
  return cmd;
}

function statusCell(item: Item): string {
  return item.needsInspection ? `${item.status}*` : item.status;
}

export async function runDaemon(cfg: ReconcilerConfig, { once }: { once: boolean }): Promise<number> {
  const logger = loggerFor(cfg);
  const store = StateStore.open(cfg.dbPath);
  try {
    const reader = new MetadataReader(cfg.infoDir, {
      logger: logger.child("reader"),
      settleMs: cfg.settleMs,
    });
    const scanLogger = logger.child("mount");
    const scheduler = createScheduler({
      store,
      reader,
      scan: () =>
        scanMount(cfg.mountRoot, {
          logger: scanLogger,
          timeoutMs: cfg.scanTimeoutMs,
          ignore: cfg.ignore,
          maxDepth: cfg.maxDepth ?? undefined,
          allowEmpty: cfg.allowEmptyMount,
        }),
      policy: {
        debounceScans: cfg.debounceScans,
        matchThreshold: cfg.matchThreshold,
        fuzzyMaxDepth: cfg.fuzzyMaxDepth,
      },
      logger,
      intervalMs: cfg.intervalMs,
      minIntervalMs: cfg.minIntervalMs,
      maxBackoffMs: cfg.maxBackoffMs,
      scanRetries: cfg.scanRetries,
      retryBaseMs: cfg.retryBaseMs,
      outageThresholdMs: cfg.outageThresholdMs,
      recoveryScans: cfg.recoveryScans,
      triggerDebounceMs: cfg.triggerDebounceMs,
      watchDir: once || !cfg.watch ? undefined : cfg.infoDir,
      handleSignals: true,
    });
    logger.info("starting", {
      infoDir: cfg.infoDir,
      mountRoot: cfg.mountRoot,
      db: cfg.dbPath,
      once,
    });
    const result = await scheduler.start({ once });
    if (once) {
      return result && !result.skipped && result.ok ? 0 : EXIT_FAILURE;
    }
    return 0;
  } finally {
    store.close();
  }
}

export function buildProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Keeps a SQLite ledger of debrid-hosted items in step with their descriptors and the mounted remote",
    )
    .version(packageVersion())
    .option("--log-level <level>", `log verbosity (${LOG_LEVELS.join(", ")})`);

  withPathOptions(
    program
      .command("run")
      .description("reconcile on an interval (or once with --once)")
      .option("--once", "run a single pass and exit", false),
  )
    .option("--interval-ms <ms>", "time between passes", numberOption("--interval-ms", { min: 1 }))
    .option(
      "--debounce-scans <n>",
      "healthy scans an item must be absent before MISSING",
      numberOption("--debounce-scans", { integer: true, min: 1 }),
    )
    .option(
      "--outage-threshold-ms <ms>",
      "unknown mount duration that pauses all downgrades",
      numberOption("--outage-threshold-ms", { min: 0 }),
    )
    .option(
      "--recovery-scans <n>",
      "healthy scans before an outage pause lifts",
      numberOption("--recovery-scans", { integer: true, min: 1 }),
    )
    .option(
      "--scan-retries <n>",
      "retries of an inconclusive mount scan",
      numberOption("--scan-retries", { integer: true, min: 0 }),
    )
    .option("--scan-timeout-ms <ms>", "mount scan time limit", numberOption("--scan-timeout-ms", { min: 1 }))
    .option(
      "--settle-ms <ms>",
      "skip descriptors modified more recently than this",
      numberOption("--settle-ms", { min: 0 }),
    )
    .option(
      "--match-threshold <0-100>",
      "fuzzy name match threshold (100 disables fuzzy matching)",
      numberOption("--match-threshold", { min: 0 }),
    )
    .option(
      "--max-depth <n>",
      "maximum mount scan depth",
      numberOption("--max-depth", { integer: true, min: 1 }),
    )
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style pattern excluded from the mount scan (repeat or comma-separate)",
      collectIgnoreOption,
    )
    .option("--allow-empty-mount", "treat an empty mount root as authoritative")
    .option("--no-watch", "do not watch the info directory for changes")
    .option("--log-file <file>", "also append log lines to this file")
    .action(
      guarded("run", async (flags: RunFlags, command: Command) => {
        const cfg = validateConfig(configFor(flags, command));
        return runDaemon(cfg, { once: Boolean(flags.once) });
      }),
    );

  withPathOptions(program.command("status").description("list items"), { mount: false })
    .addOption(
      new Option("--status <status>", "only items with this status").choices([...ITEM_STATUSES]),
    )
    .option("--inspect", "only items flagged for manual inspection", false)
    .option("--limit <n>", "maximum rows", numberOption("--limit", { integer: true, min: 1 }))
    .option("--json", "output JSON", false)
    .action(
      guarded(
        "status",
        async (
          flags: PathFlags & { status?: string; inspect?: boolean; limit?: number; json?: boolean },
          command: Command,
        ) => {
          const cfg = validateConfig(configFor(flags, command), { paths: "db" });
          const store = StateStore.open(cfg.dbPath);
          try {
            const status: ItemStatus | undefined = flags.status
              ? parseItemStatus(flags.status)
              : undefined;
            const items = store.list({
              status,
              needsInspection: flags.inspect ? true : undefined,
              limit: flags.limit,
            });
            if (flags.json) {
              console.log(JSON.stringify(items, null, 2));
              return;
            }
            const counts = store.counts();
            console.log(ITEM_STATUSES.map((s) => `${s}: ${counts[s]}`).join("  "));
            if (!items.length) {
              console.log("no items");
              return;
            }
            const table = new AsciiTable3("Items")
              .setHeading("ID", "Name", "Status", "Files", "Size", "Last Seen", "Last Checked")
              .setStyle("unicode-round");
            // ascii-table3 columns are 1-based
            for (let col = 1; col <= 7; col++) table.setAlign(col, AlignmentEnum.LEFT);
            for (const item of items) {
              table.addRow(
                item.id,
                item.name,
                statusCell(item),
                `${item.matchedFiles}/${item.files.length}`,
                fmtBytes(item.totalSize),
                fmtTime(item.lastSeenAt),
                fmtTime(item.lastCheckedAt),
              );
            }
            console.log(table.toString());
            if (items.some((i) => i.needsInspection)) {
              console.log("* flagged for manual inspection; see `show <id>`");
            }
          } finally {
            store.close();
          }
        },
      ),
    );

  withPathOptions(program.command("show").description("print one item as JSON"), { mount: false })
    .argument("<id>", "item id (info hash) or malformed:<path>")
    .action(
      guarded("show", async (id: string, flags: PathFlags, command: Command) => {
        const cfg = validateConfig(configFor(flags, command), { paths: "db" });
        const store = StateStore.open(cfg.dbPath);
        try {
          const item = store.get(id.startsWith("malformed:") ? id : normalizeId(id));
          if (!item) {
            console.error(`no item with id ${id}`);
            return EXIT_FAILURE;
          }
          console.log(JSON.stringify(item, null, 2));
        } finally {
          store.close();
        }
      }),
    );

  withPathOptions(program.command("passes").description("show recent reconciliation passes"), {
    mount: false,
  })
    .option("--limit <n>", "maximum rows", numberOption("--limit", { integer: true, min: 1 }), 20)
    .option("--json", "output JSON", false)
    .action(
      guarded("passes", async (flags: PathFlags & { limit: number; json?: boolean }, command: Command) => {
        const cfg = validateConfig(configFor(flags, command), { paths: "db" });
        const store = StateStore.open(cfg.dbPath);
        try {
          const rows = store.listPasses(flags.limit);
          if (flags.json) {
            console.log(JSON.stringify(rows, null, 2));
            return;
          }
          if (!rows.length) {
            console.log("no passes recorded");
            return;
          }
          const table = new AsciiTable3("Passes")
            .setHeading("ID", "Started", "ms", "Mount", "Paused", "Evaluated", "Skipped", "Changes", "Errors")
            .setStyle("unicode-round");
          for (const p of rows) {
            table.addRow(
              String(p.id),
              fmtTime(p.startedAt),
              String(p.finishedAt - p.startedAt),
              p.mountState,
              p.paused ? "yes" : "no",
              String(p.evaluated),
              String(p.skipped),
              String(p.transitions),
              String(p.writeErrors),
            );
          }
          console.log(table.toString());
        } finally {
          store.close();
        }
      }),
    );

  withPathOptions(program.command("purge").description("hard-delete REMOVED rows"), {
    mount: false,
  })
    .requiredOption(
      "--older-than <ms>",
      "only rows removed at least this long ago",
      numberOption("--older-than", { min: 0 }),
    )
    .action(
      guarded("purge", async (flags: PathFlags & { olderThan: number }, command: Command) => {
        const cfg = validateConfig(configFor(flags, command), { paths: "db" });
        const logger = loggerFor(cfg);
        const store = StateStore.open(cfg.dbPath);
        try {
          const n = store.purgeRemoved(flags.olderThan);
          logger.info(`purged ${n} removed item(s)`, { olderThanMs: flags.olderThan });
          console.log(String(n));
        } finally {
          store.close();
        }
      }),
    );

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_FAILURE;
    });
}
