export type PyvmErrorKind =
  | "network"
  | "validation"
  | "filesystem"
  | "unsupported-platform"
  | "command-failure"
  | "fetch-failed"
  | "invalid-scheme"
  | "timeout"
  | "interrupted";

/**
 * Base error class for everything pyvm reports.
 * `kind` lets callers switch on the failure without instanceof chains.
 */
export class PyvmError extends Error {
  constructor(
    readonly kind: PyvmErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PyvmError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** Timeouts and connection failures; the only kind the fetcher retries. */
export class NetworkError extends PyvmError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("network", message, options);
    this.name = "NetworkError";
  }
}

/** Malformed version string, from any source. */
export class ValidationError extends PyvmError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("validation", message, options);
    this.name = "ValidationError";
  }
}

export class FileSystemError extends PyvmError {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super("filesystem", message, options);
    this.name = "FileSystemError";
  }
}

export class UnsupportedPlatformError extends PyvmError {
  constructor(readonly platform: string) {
    super("unsupported-platform", `Unsupported operating system: ${platform}`);
    this.name = "UnsupportedPlatformError";
  }
}

/** Non-zero exit, or a process that could not be started. */
export class CommandFailureError extends PyvmError {
  constructor(
    message: string,
    readonly command: string,
    readonly exitCode: number | null,
    options?: { cause?: unknown },
  ) {
    super("command-failure", message, options);
    this.name = "CommandFailureError";
  }
}

export class FetchFailedError extends PyvmError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("fetch-failed", message, options);
    this.name = "FetchFailedError";
  }
}

export class InvalidSchemeError extends PyvmError {
  constructor(readonly url: string) {
    super("invalid-scheme", `Invalid URL scheme: ${url}`);
    this.name = "InvalidSchemeError";
  }
}

export class DownloadTimeoutError extends PyvmError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("timeout", message, options);
    this.name = "DownloadTimeoutError";
  }
}

export class InterruptedError extends PyvmError {
  constructor() {
    super("interrupted", "Operation cancelled by user.");
    this.name = "InterruptedError";
  }
}

/** Render any thrown value as a one-line message. */
export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

/** Narrow an unknown error to a Node errno error (fs, child_process). */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}
