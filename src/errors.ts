// src/errors.ts

/** Required path missing or unusable at startup. Fatal, reported once. */
export class ConfigurationError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly key?: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "ConfigurationError";
    this.cause = options?.cause;
  }
}

/** Scan timeout or I/O failure on the mount; becomes an "unknown" scan. */
export class TransientMountError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "TransientMountError";
    this.cause = options?.cause;
  }
}

export class MalformedMetadataError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly descriptorPath: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "MalformedMetadataError";
    this.cause = options?.cause;
  }
}

export class StoreWriteError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly itemId: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "StoreWriteError";
    this.cause = options?.cause;
  }
}

export function describeError(err: unknown): string {
  if (!err) return "";
  if (err instanceof Error) {
    return err.message || err.toString();
  }
  if (typeof err === "object" && err !== null && "message" in err) {
    const maybeMessage = err.message;
    if (typeof maybeMessage === "string" && maybeMessage) return maybeMessage;
  }
  return String(err);
}

/** errno-style `code` of a thrown value, if it has one. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    if (typeof code === "string") return code;
  }
  return undefined;
}
