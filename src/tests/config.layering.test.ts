import fsp from "node:fs/promises";
import path from "node:path";
import {
  DEFAULT_CONFIG,
  configFromEnv,
  loadSettingsFile,
  resolveConfig,
  validateConfig,
} from "../config.js";
import { ConfigurationError } from "../errors.js";
import { tmpDir, writeFileAt } from "./fixtures.js";

describe("config", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await tmpDir("config");
  });

  afterEach(async () => {
    await fsp.rm(cwd, { recursive: true, force: true });
  });

  test("defaults apply without a settings file", () => {
    const cfg = resolveConfig({ env: {}, cwd });
    expect(cfg.intervalMs).toBe(24 * 60 * 60 * 1000);
    expect(cfg.matchThreshold).toBe(85);
    expect(cfg.debounceScans).toBe(3);
    expect(cfg.infoDir).toBe("");
    expect(cfg.dbPath).toBe(path.join(cwd, "torrents.db"));
  });

  test("settings.json in the working directory is picked up", async () => {
    await writeFileAt(
      cwd,
      "settings.json",
      JSON.stringify({
        ZURGINFOS_DIR: "info",
        MOUNTED_PATH: "/mnt/zurg",
        EXECUTION_CYCLE: 600,
        MATCH_THRESHOLD: "90",
        API_KEY: "test-secret",
      }),
    );
    const cfg = resolveConfig({ env: {}, cwd });
    expect(cfg.infoDir).toBe(path.join(cwd, "info"));
    expect(cfg.mountRoot).toBe("/mnt/zurg");
    expect(cfg.intervalMs).toBe(600_000);
    expect(cfg.matchThreshold).toBe(90);
  });

  test("environment beats the file and flags beat the environment", async () => {
    await writeFileAt(cwd, "settings.json", JSON.stringify({ ZURGINFOS_DIR: "info", EXECUTION_CYCLE: 60 }));
    const cfg = resolveConfig({
      env: { ZURGINFODIR: "/env/info", DEBRID_LEDGER_INTERVAL_MS: "5000" },
      flags: { intervalMs: 7000, infoDir: undefined, dbPath: ":memory:" },
      cwd,
    });
    expect(cfg.infoDir).toBe("/env/info");
    expect(cfg.intervalMs).toBe(7000);
    expect(cfg.dbPath).toBe(":memory:");
  });

  test("an explicit settings file must exist", () => {
    expect(() => resolveConfig({ env: {}, cwd, settingsFile: "nope.json" })).toThrow(ConfigurationError);
  });

  test("a malformed settings file is a configuration error", async () => {
    const file = await writeFileAt(cwd, "bad.json", "{ nope");
    expect(() => loadSettingsFile(file)).toThrow(/is not valid JSON/);
    const arr = await writeFileAt(cwd, "arr.json", "[]");
    expect(() => loadSettingsFile(arr)).toThrow(`settings file ${arr} must contain a JSON object`);
    const wrong = await writeFileAt(cwd, "wrong.json", JSON.stringify({ EXECUTION_CYCLE: "soon" }));
    expect(() => loadSettingsFile(wrong)).toThrow(`${wrong}: EXECUTION_CYCLE must be a number`);
  });

  test("numeric garbage in the environment is caught by validation", () => {
    const env = configFromEnv({ DEBRID_LEDGER_DEBOUNCE_SCANS: "abc" });
    expect(Number.isNaN(env.debounceScans)).toBe(true);
    const cfg = { ...DEFAULT_CONFIG, ...env };
    expect(() => validateConfig(cfg, { paths: "none" })).toThrow(
      "debounceScans must be a finite number (got NaN)",
    );
  });

  test("an unknown log level is rejected", () => {
    expect(() => configFromEnv({ DEBRID_LEDGER_LOG_LEVEL: "loud" })).toThrow(
      "environment: log level 'loud' is not one of debug, info, warn, error",
    );
    expect(configFromEnv({ DEBRID_LEDGER_LOG_LEVEL: " WARN " }).logLevel).toBe("warn");
  });

  test("range checks name the offending key", () => {
    expect(() => validateConfig({ ...DEFAULT_CONFIG, matchThreshold: 101 }, { paths: "none" })).toThrow(
      "matchThreshold must be between 0 and 100 (got 101)",
    );
    expect(() => validateConfig({ ...DEFAULT_CONFIG, recoveryScans: 1.5 }, { paths: "none" })).toThrow(
      "recoveryScans must be an integer (got 1.5)",
    );
    expect(() => validateConfig({ ...DEFAULT_CONFIG, maxDepth: 0 }, { paths: "none" })).toThrow(
      "maxDepth must be at least 1 (got 0)",
    );
  });

  test("the daemon needs both directories", async () => {
    const info = path.join(cwd, "info");
    await fsp.mkdir(info);
    const file = await writeFileAt(cwd, "plain.txt", "x");
    const base = { ...DEFAULT_CONFIG, dbPath: ":memory:" };
    expect(() => validateConfig(base)).toThrow("info directory is not configured");
    expect(() => validateConfig({ ...base, infoDir: info, mountRoot: path.join(cwd, "gone") })).toThrow(
      `mount root ${path.join(cwd, "gone")} does not exist`,
    );
    expect(() => validateConfig({ ...base, infoDir: info, mountRoot: file })).toThrow(
      `mount root ${file} is not a directory`,
    );
    expect(validateConfig({ ...base, infoDir: info, mountRoot: cwd }).mountRoot).toBe(cwd);
  });

  test("the database directory is created when missing", async () => {
    const dbPath = path.join(cwd, "state", "nested", "torrents.db");
    validateConfig({ ...DEFAULT_CONFIG, dbPath }, { paths: "db" });
    const st = await fsp.stat(path.dirname(dbPath));
    expect(st.isDirectory()).toBe(true);
  });
});
