// src/cli-util.ts
import { Command, InvalidArgumentError } from "commander";
import { ConfigurationError, describeError } from "./errors.js";

export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

/** commander argParser for numeric flags */
export function numberOption(
  label: string,
  { integer = false, min }: { integer?: boolean; min?: number } = {},
) {
  return (value: string): number => {
    const n = Number(value);
    if (!value.trim() || !Number.isFinite(n)) {
      throw new InvalidArgumentError(`${label} must be a number`);
    }
    if (integer && !Number.isInteger(n)) {
      throw new InvalidArgumentError(`${label} must be an integer`);
    }
    if (min != null && n < min) {
      throw new InvalidArgumentError(`${label} must be at least ${min}`);
    }
    return n;
  };
}

export function exitCodeFor(err: unknown): number {
  return err instanceof ConfigurationError ? EXIT_CONFIG : EXIT_FAILURE;
}

/**
 * Wraps a command action: a ConfigurationError is reported once and exits 2,
 * anything else exits 1.  A returned number becomes the exit code.
 */
export function guarded<A extends unknown[]>(
  label: string,
  action: (...args: A) => Promise<number | void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      const code = await action(...args);
      if (typeof code === "number") process.exitCode = code;
    } catch (err) {
      if (err instanceof ConfigurationError) {
        console.error(`configuration error: ${err.message}`);
      } else {
        console.error(`${label} failed: ${describeError(err)}`);
      }
      process.exitCode = exitCodeFor(err);
    }
  };
}

/** Runs a program against custom argv; used by tests. */
export async function parseAndRun(
  buildProgram: () => Command,
  argv: string[],
): Promise<void> {
  const program = buildProgram();
  program.exitOverride();
  await program.parseAsync(argv, { from: "user" });
}

export function fmtTime(ms: number | null | undefined): string {
  if (ms == null) return "-";
  return new Date(ms).toISOString().replace("T", " ").replace(/\.\d+Z$/, "Z");
}

const UNITS = ["B", "KiB", "MiB", "GiB", "TiB"];

export function fmtBytes(n: number): string {
  let value = n;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${n} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}
