import { describe, it, expect } from "vitest";
import {
  PyvmError,
  NetworkError,
  ValidationError,
  FileSystemError,
  UnsupportedPlatformError,
  CommandFailureError,
  InvalidSchemeError,
  InterruptedError,
  formatError,
  isErrnoException,
} from "./errors.js";
import { ok, err } from "./result.js";
import { getReleasePageUrl, getWindowsInstallerUrl } from "./endpoints.js";

describe("PyvmError subclasses", () => {
  it("carry their kind and name", () => {
    const error = new NetworkError("timed out");
    expect(error).toBeInstanceOf(PyvmError);
    expect(error.kind).toBe("network");
    expect(error.name).toBe("NetworkError");
    expect(error.message).toBe("timed out");
  });

  it("keep the cause", () => {
    const cause = new Error("socket hang up");
    const error = new ValidationError("bad", { cause });
    expect(error.cause).toBe(cause);
  });

  it("record extra context", () => {
    expect(new FileSystemError("cannot write", "/tmp/x").path).toBe("/tmp/x");
    const failure = new CommandFailureError("failed", "brew", 1);
    expect(failure.command).toBe("brew");
    expect(failure.exitCode).toBe(1);
  });

  it("build fixed messages", () => {
    expect(new UnsupportedPlatformError("aix").message).toBe("Unsupported operating system: aix");
    expect(new InvalidSchemeError("ftp://example.com/a").message).toBe(
      "Invalid URL scheme: ftp://example.com/a",
    );
    expect(new InterruptedError().message).toBe("Operation cancelled by user.");
  });
});

describe("formatError", () => {
  it("uses the message of an Error", () => {
    expect(formatError(new Error("boom"))).toBe("boom");
  });

  it("passes strings through", () => {
    expect(formatError("plain")).toBe("plain");
  });

  it("stringifies anything else", () => {
    expect(formatError(42)).toBe("42");
  });
});

describe("isErrnoException", () => {
  it("accepts errors with a string code", () => {
    const error = Object.assign(new Error("missing"), { code: "ENOENT" });
    expect(isErrnoException(error)).toBe(true);
  });

  it("rejects plain errors", () => {
    expect(isErrnoException(new Error("nope"))).toBe(false);
  });
});

describe("Result helpers", () => {
  it("wrap values and errors", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    const error = new NetworkError("down");
    expect(err(error)).toEqual({ ok: false, error });
  });
});

describe("endpoints", () => {
  it("builds the Windows installer URL", () => {
    expect(getWindowsInstallerUrl("3.12.1", "amd64")).toBe(
      "https://www.python.org/ftp/python/3.12.1/python-3.12.1-amd64.exe",
    );
  });

  it("hyphenates the release page version", () => {
    expect(getReleasePageUrl("3.11.5")).toBe(
      "https://www.python.org/downloads/release/python-3-11-5/",
    );
  });
});
