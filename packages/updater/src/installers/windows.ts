import { join } from "node:path";
import {
  CommandFailureError,
  ValidationError,
  err,
  formatError,
  getWindowsInstallerUrl,
  ok,
} from "@pyvm/core";
import type { Arch, InstallTarget, Result } from "@pyvm/core";
import { createLogger } from "@pyvm/logger";
import type { InstallContext } from "../types.js";
import { compareVersions, parseVersion, toChannel } from "../version.js";

const log = createLogger("updater:installer:windows");

export type InstallerSuffix = "amd64" | "arm64" | "win32";

/** ARM64 installers are published from this release line on. */
export const FIRST_ARM64_CHANNEL = "3.11";

export function supportsArm64Installer(version: string): boolean {
  return compareVersions(toChannel(version), FIRST_ARM64_CHANNEL) >= 0;
}

/**
 * Pick the installer flavour for an architecture. ARM64 machines fall back
 * to the amd64 installer (run under emulation) before 3.11.
 */
export function selectInstallerSuffix(arch: Arch, version: string): InstallerSuffix {
  switch (arch) {
    case "amd64":
      return "amd64";
    case "arm64":
      return supportsArm64Installer(version) ? "arm64" : "amd64";
    case "x86":
      return "win32";
  }
}

function requireFullVersion(version: string): void {
  if (parseVersion(version).parts.length !== 3) {
    throw new ValidationError(
      `Version string must have major.minor.patch format: ${version}`,
    );
  }
}

/**
 * Download the official installer and run it in the foreground.
 *
 * The installer is interactive, so its exit code is only reported, never
 * used to decide success. The downloaded file is removed afterwards.
 */
export async function installWindows(
  target: InstallTarget,
  ctx: InstallContext,
): Promise<Result<void>> {
  const { version, arch } = target;
  ctx.out("Windows detected - Downloading Python installer...");

  try {
    requireFullVersion(version);
  } catch (e) {
    return err(e instanceof ValidationError ? e : new ValidationError(formatError(e)));
  }

  const suffix = selectInstallerSuffix(arch, version);
  if (arch === "arm64" && suffix !== "arm64") {
    ctx.out("ARM64 installers are only available for Python 3.11+");
    ctx.out(`Falling back to AMD64 installer for Python ${version}`);
  }

  const installerUrl = getWindowsInstallerUrl(version, suffix);
  const installerPath = join(ctx.tempDir, `python-${version}-installer.exe`);

  ctx.out(`Downloading from: ${installerUrl}`);
  const downloaded = await ctx.download(installerUrl, installerPath, {
    timeoutMs: ctx.config.downloadTimeoutMs,
    onProgress: ctx.onProgress,
  });
  if (!downloaded.ok) return downloaded;

  ctx.out("Starting installer...");
  ctx.out("Please follow the installer prompts.");
  ctx.out("Recommendation: Check 'Add Python to PATH'");

  try {
    const result = await ctx.runner.run(installerPath, []);
    if (result.error) {
      return err(
        new CommandFailureError(
          `Could not run installer at ${installerPath}: ${result.error.message}`,
          installerPath,
          null,
          { cause: result.error },
        ),
      );
    }
    // TODO: decide whether a non-zero installer exit (user cancelled the wizard) should fail the update
    if (result.exitCode !== 0) {
      log.warn(`Installer exited with code ${result.exitCode}`);
    }
    return ok(undefined);
  } finally {
    await removeInstaller(installerPath, ctx);
  }
}

async function removeInstaller(installerPath: string, ctx: InstallContext): Promise<void> {
  try {
    if (await ctx.pathExists(installerPath)) {
      await ctx.removeFile(installerPath);
      ctx.out("Cleaned up temporary installer file");
    }
  } catch (e) {
    log.warn(`Could not delete temporary file ${installerPath}: ${formatError(e)}`);
  }
}
