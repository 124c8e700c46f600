// src/config.ts
//
// Resolution order, lowest first: defaults, settings.json, environment,
// command-line flags.

import { accessSync, constants, existsSync, mkdirSync, readFileSync, statSync } from "node:fs";
import path from "node:path";
import { ENV_PREFIX } from "./constants.js";
import { ConfigurationError, describeError } from "./errors.js";
import { LOG_LEVELS, parseLogLevel, type LogLevel } from "./logger.js";
import { SCHEDULER_DEFAULTS } from "./scheduler.js";

export interface ReconcilerConfig {
  infoDir: string;
  mountRoot: string;
  dbPath: string;

  intervalMs: number;
  minIntervalMs: number;
  maxBackoffMs: number;
  scanRetries: number;
  retryBaseMs: number;
  outageThresholdMs: number;
  recoveryScans: number;
  triggerDebounceMs: number;
  watch: boolean;

  debounceScans: number;
  matchThreshold: number;
  fuzzyMaxDepth: number;

  scanTimeoutMs: number;
  maxDepth: number | null;
  ignore: string[];
  allowEmptyMount: boolean;
  settleMs: number;

  logLevel: LogLevel;
  logFile: string | null;
}

export type ConfigOverrides = Partial<ReconcilerConfig>;

export const DEFAULT_CONFIG: ReconcilerConfig = {
  infoDir: "",
  mountRoot: "",
  dbPath: "torrents.db",
  ...SCHEDULER_DEFAULTS,
  watch: true,
  debounceScans: 3,
  matchThreshold: 85,
  fuzzyMaxDepth: 2,
  scanTimeoutMs: 120_000,
  maxDepth: null,
  ignore: [],
  allowEmptyMount: false,
  settleMs: 2_000,
  logLevel: "info",
  logFile: null,
};

export const DEFAULT_SETTINGS_FILE = "settings.json";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function settingString(
  settings: Record<string, unknown>,
  key: string,
  file: string,
): string | undefined {
  const v = settings[key];
  if (v == null) return undefined;
  if (typeof v !== "string") {
    throw new ConfigurationError(`${file}: ${key} must be a string`, key);
  }
  return v;
}

function settingNumber(
  settings: Record<string, unknown>,
  key: string,
  file: string,
): number | undefined {
  const v = settings[key];
  if (v == null) return undefined;
  const n = typeof v === "string" ? Number(v) : v;
  if (typeof n !== "number" || !Number.isFinite(n)) {
    throw new ConfigurationError(`${file}: ${key} must be a number`, key);
  }
  return n;
}

/**
 * Reads the JSON settings file.  Keys the ledger has no use for (API keys,
 * request delays) are ignored.
 */
export function loadSettingsFile(file: string): ConfigOverrides {
  let raw: string;
  try {
    raw = readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigurationError(`cannot read settings file ${file}: ${describeError(err)}`, "settings", {
      cause: err,
    });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`settings file ${file} is not valid JSON: ${describeError(err)}`, "settings", {
      cause: err,
    });
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`settings file ${file} must contain a JSON object`, "settings");
  }
  const out: ConfigOverrides = {};
  const infoDir = settingString(parsed, "ZURGINFOS_DIR", file);
  if (infoDir) out.infoDir = infoDir;
  const mountRoot = settingString(parsed, "MOUNTED_PATH", file);
  if (mountRoot) out.mountRoot = mountRoot;
  const dbPath = settingString(parsed, "DB_FILE", file);
  if (dbPath) out.dbPath = dbPath;
  const cycle = settingNumber(parsed, "EXECUTION_CYCLE", file);
  if (cycle != null) out.intervalMs = cycle * 1000;
  const threshold = settingNumber(parsed, "MATCH_THRESHOLD", file);
  if (threshold != null) out.matchThreshold = threshold;
  return out;
}

// garbage stays NaN so validateConfig can name the variable
const envNum = (env: NodeJS.ProcessEnv, k: string) =>
  env[k] ? Number(env[k]) : undefined;

const ENV_KNOBS: [string, keyof ReconcilerConfig][] = [
  ["INTERVAL_MS", "intervalMs"],
  ["MIN_INTERVAL_MS", "minIntervalMs"],
  ["MAX_BACKOFF_MS", "maxBackoffMs"],
  ["DEBOUNCE_SCANS", "debounceScans"],
  ["OUTAGE_THRESHOLD_MS", "outageThresholdMs"],
  ["RECOVERY_SCANS", "recoveryScans"],
  ["SCAN_RETRIES", "scanRetries"],
  ["SCAN_TIMEOUT_MS", "scanTimeoutMs"],
  ["SETTLE_MS", "settleMs"],
  ["MATCH_THRESHOLD", "matchThreshold"],
];

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const out: Record<string, unknown> = {};
  if (env.ZURGINFODIR) out.infoDir = env.ZURGINFODIR;
  if (env.RCLONE_REMOTE_PATH) out.mountRoot = env.RCLONE_REMOTE_PATH;
  if (env.DB_FILE) out.dbPath = env.DB_FILE;
  for (const [suffix, key] of ENV_KNOBS) {
    const n = envNum(env, `${ENV_PREFIX}${suffix}`);
    if (n !== undefined) out[key] = n;
  }
  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level) out.logLevel = level;
  const logFile = env[`${ENV_PREFIX}LOG_FILE`];
  if (logFile) out.logFile = logFile;
  return narrowOverrides(out, "environment");
}

const STRING_KEYS = ["infoDir", "mountRoot", "dbPath"] as const;
const NUMBER_KEYS = [
  "intervalMs",
  "minIntervalMs",
  "maxBackoffMs",
  "scanRetries",
  "retryBaseMs",
  "outageThresholdMs",
  "recoveryScans",
  "triggerDebounceMs",
  "debounceScans",
  "matchThreshold",
  "fuzzyMaxDepth",
  "scanTimeoutMs",
  "settleMs",
] as const;
const BOOLEAN_KEYS = ["watch", "allowEmptyMount"] as const;

/** Type-checks a loosely built override object, key by key. */
function narrowOverrides(raw: Record<string, unknown>, origin: string): ConfigOverrides {
  const out: ConfigOverrides = {};
  for (const key of STRING_KEYS) {
    const v = raw[key];
    if (typeof v === "string") out[key] = v;
  }
  for (const key of NUMBER_KEYS) {
    const v = raw[key];
    if (typeof v === "number") out[key] = v;
  }
  for (const key of BOOLEAN_KEYS) {
    const v = raw[key];
    if (typeof v === "boolean") out[key] = v;
  }
  if (typeof raw.maxDepth === "number" || raw.maxDepth === null) out.maxDepth = raw.maxDepth;
  if (typeof raw.logFile === "string" || raw.logFile === null) out.logFile = raw.logFile;
  if (Array.isArray(raw.ignore)) {
    out.ignore = raw.ignore.filter((v): v is string => typeof v === "string");
  }
  if (typeof raw.logLevel === "string") {
    const level = parseLogLevel(raw.logLevel);
    if (!level) {
      throw new ConfigurationError(
        `${origin}: log level '${raw.logLevel}' is not one of ${LOG_LEVELS.join(", ")}`,
        "logLevel",
      );
    }
    out.logLevel = level;
  }
  return out;
}

export interface ResolveOptions {
  /** values from command-line flags; undefined entries do not override */
  flags?: Record<string, unknown>;
  env?: NodeJS.ProcessEnv;
  /** explicit settings file; must exist when given */
  settingsFile?: string;
  cwd?: string;
}

export function resolveConfig({
  flags = {},
  env = process.env,
  settingsFile,
  cwd = process.cwd(),
}: ResolveOptions = {}): ReconcilerConfig {
  let fromFile: ConfigOverrides = {};
  if (settingsFile) {
    fromFile = loadSettingsFile(path.resolve(cwd, settingsFile));
  } else {
    const implicit = path.join(cwd, DEFAULT_SETTINGS_FILE);
    if (existsSync(implicit)) fromFile = loadSettingsFile(implicit);
  }
  const cfg: ReconcilerConfig = {
    ...DEFAULT_CONFIG,
    ...fromFile,
    ...configFromEnv(env),
    ...narrowOverrides(flags, "command line"),
  };
  return {
    ...cfg,
    infoDir: cfg.infoDir ? path.resolve(cwd, cfg.infoDir) : "",
    mountRoot: cfg.mountRoot ? path.resolve(cwd, cfg.mountRoot) : "",
    dbPath: cfg.dbPath === ":memory:" ? cfg.dbPath : path.resolve(cwd, cfg.dbPath),
    logFile: cfg.logFile ? path.resolve(cwd, cfg.logFile) : null,
  };
}

type Range = { key: keyof ReconcilerConfig; value: number; min: number; max?: number; integer?: boolean };

function checkRange({ key, value, min, max, integer }: Range) {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a finite number (got ${value})`, key);
  }
  if (integer && !Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer (got ${value})`, key);
  }
  if (value < min || (max != null && value > max)) {
    const bound = max != null ? `between ${min} and ${max}` : `at least ${min}`;
    throw new ConfigurationError(`${key} must be ${bound} (got ${value})`, key);
  }
}

function requireDirectory(key: keyof ReconcilerConfig, dir: string, label: string) {
  if (!dir) {
    throw new ConfigurationError(`${label} is not configured`, key);
  }
  let isDir: boolean;
  try {
    isDir = statSync(dir).isDirectory();
  } catch (err) {
    throw new ConfigurationError(`${label} ${dir} does not exist`, key, { cause: err });
  }
  if (!isDir) {
    throw new ConfigurationError(`${label} ${dir} is not a directory`, key);
  }
}

/**
 * Throws ConfigurationError on the first problem.  `paths: "all"` also checks
 * the info directory and mount root (the daemon); `paths: "db"` only the
 * database location (the inspection commands).
 */
export function validateConfig(
  cfg: ReconcilerConfig,
  { paths = "all" }: { paths?: "all" | "db" | "none" } = {},
): ReconcilerConfig {
  const ranges: Range[] = [
    { key: "intervalMs", value: cfg.intervalMs, min: 1 },
    { key: "minIntervalMs", value: cfg.minIntervalMs, min: 0 },
    { key: "maxBackoffMs", value: cfg.maxBackoffMs, min: 0 },
    { key: "scanRetries", value: cfg.scanRetries, min: 0, integer: true },
    { key: "retryBaseMs", value: cfg.retryBaseMs, min: 0 },
    { key: "outageThresholdMs", value: cfg.outageThresholdMs, min: 0 },
    { key: "recoveryScans", value: cfg.recoveryScans, min: 1, integer: true },
    { key: "triggerDebounceMs", value: cfg.triggerDebounceMs, min: 0 },
    { key: "debounceScans", value: cfg.debounceScans, min: 1, integer: true },
    { key: "matchThreshold", value: cfg.matchThreshold, min: 0, max: 100 },
    { key: "fuzzyMaxDepth", value: cfg.fuzzyMaxDepth, min: 1, integer: true },
    { key: "scanTimeoutMs", value: cfg.scanTimeoutMs, min: 1 },
    { key: "settleMs", value: cfg.settleMs, min: 0 },
  ];
  if (cfg.maxDepth != null) {
    ranges.push({ key: "maxDepth", value: cfg.maxDepth, min: 1, integer: true });
  }
  for (const r of ranges) checkRange(r);

  if (paths === "all") {
    requireDirectory("infoDir", cfg.infoDir, "info directory");
    requireDirectory("mountRoot", cfg.mountRoot, "mount root");
  }
  if (paths !== "none" && cfg.dbPath !== ":memory:") {
    const dir = path.dirname(cfg.dbPath);
    try {
      mkdirSync(dir, { recursive: true });
      accessSync(dir, constants.W_OK);
    } catch (err) {
      throw new ConfigurationError(
        `database directory ${dir} is not writable: ${describeError(err)}`,
        "dbPath",
        { cause: err },
      );
    }
  }
  return cfg;
}
