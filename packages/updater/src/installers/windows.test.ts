import { describe, it, expect, vi } from "vitest";
import { CommandFailureError, NetworkError, ValidationError, err } from "@pyvm/core";
import type { InstallTarget } from "@pyvm/core";
import { installWindows, selectInstallerSuffix, supportsArm64Installer } from "./windows.js";
import { FakeRunner, createTestContext } from "../test-fixtures.js";

vi.mock("@pyvm/logger", () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const INSTALLER_PATH = "/tmp/pyvm-test/python-3.12.1-installer.exe";

function target(version: string, arch: InstallTarget["arch"] = "amd64"): InstallTarget {
  return { os: "windows", arch, version };
}

describe("selectInstallerSuffix", () => {
  it("uses amd64 on 64-bit x86", () => {
    expect(selectInstallerSuffix("amd64", "3.12.1")).toBe("amd64");
  });

  it("falls back to amd64 on ARM64 before 3.11", () => {
    expect(selectInstallerSuffix("arm64", "3.10.0")).toBe("amd64");
  });

  it("uses arm64 from 3.11 on", () => {
    expect(selectInstallerSuffix("arm64", "3.11.0")).toBe("arm64");
    expect(selectInstallerSuffix("arm64", "4.0.0")).toBe("arm64");
  });

  it("uses win32 for anything else", () => {
    expect(selectInstallerSuffix("x86", "3.12.1")).toBe("win32");
  });
});

describe("supportsArm64Installer", () => {
  it("compares major and minor only", () => {
    expect(supportsArm64Installer("3.11.9")).toBe(true);
    expect(supportsArm64Installer("3.10.99")).toBe(false);
    expect(supportsArm64Installer("2.7.18")).toBe(false);
  });
});

describe("installWindows", () => {
  it("downloads, runs and removes the installer", async () => {
    const runner = new FakeRunner();
    const { ctx, download, removeFile } = createTestContext({ runner });

    const result = await installWindows(target("3.12.1"), ctx);

    expect(result).toEqual({ ok: true, value: undefined });
    expect(download).toHaveBeenCalledWith(
      "https://www.python.org/ftp/python/3.12.1/python-3.12.1-amd64.exe",
      INSTALLER_PATH,
      { timeoutMs: 120_000, onProgress: undefined },
    );
    expect(runner.calls).toEqual([{ command: INSTALLER_PATH, args: [], options: undefined }]);
    expect(removeFile).toHaveBeenCalledWith(INSTALLER_PATH);
  });

  it("requires exactly three version components", async () => {
    const { ctx, download } = createTestContext();
    const result = await installWindows(target("3.12"), ctx);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe("Version string must have major.minor.patch format: 3.12");
    }
    expect(download).not.toHaveBeenCalled();
  });

  it("announces the amd64 fallback on ARM64", async () => {
    const { ctx, lines, download } = createTestContext();
    await installWindows(target("3.10.0", "arm64"), ctx);
    expect(lines).toContain("Falling back to AMD64 installer for Python 3.10.0");
    expect(download.mock.calls[0]?.[0]).toBe(
      "https://www.python.org/ftp/python/3.10.0/python-3.10.0-amd64.exe",
    );
  });

  it("treats a non-zero installer exit as success", async () => {
    const runner = new FakeRunner({}, () => ({ exitCode: 1602 }));
    const { ctx, removeFile } = createTestContext({ runner });
    const result = await installWindows(target("3.12.1"), ctx);
    expect(result.ok).toBe(true);
    expect(removeFile).toHaveBeenCalledTimes(1);
  });

  it("fails when the installer cannot be started, still cleaning up", async () => {
    const runner = new FakeRunner({}, () => ({ exitCode: null, error: new Error("EACCES") }));
    const { ctx, removeFile } = createTestContext({ runner });
    const result = await installWindows(target("3.12.1"), ctx);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(CommandFailureError);
    expect(removeFile).toHaveBeenCalledWith(INSTALLER_PATH);
  });

  it("returns the download failure without running anything", async () => {
    const runner = new FakeRunner();
    const failure = new NetworkError("Download failed: HTTP 404 Not Found");
    const { ctx } = createTestContext({ runner, download: vi.fn(async () => err(failure)) });
    const result = await installWindows(target("3.12.1"), ctx);
    expect(result).toEqual({ ok: false, error: failure });
    expect(runner.calls).toHaveLength(0);
  });

  it("only warns when the temporary file cannot be removed", async () => {
    const { ctx, lines } = createTestContext({
      removeFile: vi.fn(async () => {
        throw new Error("EBUSY");
      }),
    });
    const result = await installWindows(target("3.12.1"), ctx);
    expect(result.ok).toBe(true);
    expect(lines).not.toContain("Cleaned up temporary installer file");
  });
});
