import { access, unlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import { PyvmError, err, formatError } from "@pyvm/core";
import type { InstallTarget, OsName, PyvmConfig, Result } from "@pyvm/core";
import { createLogger } from "@pyvm/logger";
import { createCommandRunner } from "../command-runner.js";
import { downloadFile } from "../downloader.js";
import type { CommandRunner, DownloadProgress, InstallContext, Installer } from "../types.js";
import { installLinux } from "./linux.js";
import { installMacOS } from "./macos.js";
import { installWindows } from "./windows.js";

const log = createLogger("updater:installer");

const INSTALLERS: Record<OsName, Installer> = {
  windows: installWindows,
  linux: installLinux,
  darwin: installMacOS,
};

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export interface InstallContextOptions {
  config: PyvmConfig;
  out: (line: string) => void;
  onProgress?: (progress: DownloadProgress) => void;
  runner?: CommandRunner;
  tempDir?: string;
}

/** An install context backed by the real file system, network and processes. */
export function createInstallContext(options: InstallContextOptions): InstallContext {
  return {
    config: options.config,
    out: options.out,
    onProgress: options.onProgress,
    runner: options.runner ?? createCommandRunner(),
    download: downloadFile,
    pathExists,
    removeFile: unlink,
    tempDir: options.tempDir ?? tmpdir(),
  };
}

/**
 * Install `target.version` side-by-side using the branch for `target.os`.
 * Never throws; unexpected errors come back as a failed result.
 */
export async function installPython(
  target: InstallTarget,
  ctx: InstallContext,
): Promise<Result<void>> {
  log.info(`Installing Python ${target.version} on ${target.os} (${target.arch})`);
  try {
    return await INSTALLERS[target.os](target, ctx);
  } catch (e) {
    log.error(`Installation failed: ${formatError(e)}`);
    return err(
      e instanceof PyvmError ? e : new PyvmError("command-failure", formatError(e), { cause: e }),
    );
  }
}

export { installWindows, selectInstallerSuffix, supportsArm64Installer } from "./windows.js";
export type { InstallerSuffix } from "./windows.js";
export {
  installLinux,
  aptInstallSteps,
  detectLinuxPackageManager,
  expectedBinaryPath,
} from "./linux.js";
export type { LinuxPackageManager } from "./linux.js";
export { installMacOS, homebrewFormula } from "./macos.js";
