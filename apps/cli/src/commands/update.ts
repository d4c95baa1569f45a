import { UnsupportedPlatformError } from "@pyvm/core";
import { usageInstructions, validateVersionString } from "@pyvm/updater";
import type { CliDeps } from "../deps.js";
import { NOT_INSTALLED, titleCase } from "../format.js";

export interface UpdateOptions {
  auto?: boolean;
  version?: string;
}

type TargetResolution =
  | { kind: "install"; version: string }
  | { kind: "exit"; code: number };

/** Installer downloads are addressed by a full major.minor.patch version. */
export function isInstallableVersion(version: string): boolean {
  return validateVersionString(version) && version.split(".").length >= 3;
}

async function resolveTarget(options: UpdateOptions, deps: CliDeps): Promise<TargetResolution> {
  const local = await deps.detectLocalPython();
  const localLabel = local?.version ?? NOT_INSTALLED;

  if (options.version !== undefined) {
    if (!isInstallableVersion(options.version)) {
      deps.out(`Error: Invalid version format: ${options.version}`);
      deps.out("Version must be in format: X.Y.Z (e.g., 3.11.5)");
      return { kind: "exit", code: 1 };
    }
    deps.out(`Target version specified: ${options.version}`);
    deps.out(`Current version: ${localLabel}`);
    return { kind: "install", version: options.version };
  }

  deps.out("Checking for updates...");
  const report = await deps.checkVersion(local?.version ?? null);
  if (!report.ok) {
    deps.out(`Error: ${report.error.message}`);
    deps.out("Could not fetch latest version information.");
    return { kind: "exit", code: 1 };
  }

  const { latestVersion, needsUpdate } = report.value;
  deps.out("");
  deps.out(`Current version: ${localLabel}`);
  deps.out(`Latest version:  ${latestVersion}`);

  if (!needsUpdate) {
    deps.out("");
    deps.out("You already have the latest version!");
    return { kind: "exit", code: 0 };
  }

  deps.out("");
  deps.out(`Update available: ${localLabel} -> ${latestVersion}`);
  return { kind: "install", version: latestVersion };
}

/**
 * Install the requested (or latest) release next to the system Python.
 * Exit 0 on success, when already current or when the user declines.
 */
export async function runUpdate(options: UpdateOptions, deps: CliDeps): Promise<number> {
  const target = await resolveTarget(options, deps);
  if (target.kind === "exit") return target.code;
  const { version } = target;

  if (!options.auto) {
    const proceed = await deps.confirm(`Do you want to proceed with installing Python ${version}?`);
    if (!proceed) {
      deps.out("Installation cancelled.");
      return 0;
    }
  }

  const { os, arch, platform } = deps.platform();
  if (os === null) {
    deps.out(`Error: ${new UnsupportedPlatformError(platform).message}`);
    return 1;
  }
  deps.out("");
  deps.out(`Detected: ${titleCase(os)} (${arch})`);

  const result = await deps.install({ os, arch, version });
  if (!result.ok) {
    deps.out("");
    deps.out(`Error: ${result.error.message}`);
    deps.out("Installation process encountered issues.");
    deps.out("    Please check the messages above.");
    return 1;
  }

  for (const line of usageInstructions(version, os)) deps.out(line);
  return 0;
}
