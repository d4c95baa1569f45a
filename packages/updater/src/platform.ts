import { machine } from "node:os";
import type { Arch, OsName } from "@pyvm/core";
import { createLogger } from "@pyvm/logger";
import type { CommandRunner, LocalPython } from "./types.js";
import { normalizeInterpreterVersion } from "./version.js";

const log = createLogger("updater:platform");

export interface PlatformInfo {
  /** Null when there is no installer branch for this OS */
  os: OsName | null;
  arch: Arch;
  /** Raw `process.platform`, kept for messages */
  platform: string;
}

export function normalizeOs(platform: string): OsName | null {
  switch (platform) {
    case "win32":
      return "windows";
    case "linux":
      return "linux";
    case "darwin":
      return "darwin";
    default:
      return null;
  }
}

export function normalizeArch(machineName: string): Arch {
  switch (machineName.toLowerCase()) {
    case "amd64":
    case "x86_64":
      return "amd64";
    case "arm64":
    case "aarch64":
      return "arm64";
    default:
      return "x86";
  }
}

export function detectPlatform(
  platform: string = process.platform,
  machineName: string = machine(),
): PlatformInfo {
  return { os: normalizeOs(platform), arch: normalizeArch(machineName), platform };
}

/**
 * Whether pyvm runs elevated: Administrator on Windows (`net session`
 * only succeeds there), root elsewhere.
 */
export async function isAdmin(
  runner: CommandRunner,
  platform: string = process.platform,
): Promise<boolean> {
  if (platform === "win32") {
    const result = await runner.run("net", ["session"], { capture: true });
    return result.exitCode === 0;
  }
  return process.geteuid?.() === 0;
}

const PYTHON_PROBE = "import platform, sys; print(platform.python_version()); print(sys.executable)";

export function pythonCandidates(platform: string = process.platform): string[] {
  return platform === "win32" ? ["py", "python"] : ["python3", "python"];
}

/**
 * Find the Python interpreter on PATH and ask it for its version and
 * executable path. Returns null when no candidate answers.
 */
export async function detectLocalPython(
  runner: CommandRunner,
  platform: string = process.platform,
): Promise<LocalPython | null> {
  for (const candidate of pythonCandidates(platform)) {
    const result = await runner.run(candidate, ["-c", PYTHON_PROBE], { capture: true });
    if (result.exitCode !== 0) continue;

    const [rawVersion = "", executable = ""] = result.stdout.trim().split(/\r?\n/);
    const version = normalizeInterpreterVersion(rawVersion);
    if (version) {
      log.debug(`Found Python ${version} at ${executable} via ${candidate}`);
      return { version, executable: executable.trim() };
    }
  }
  return null;
}
