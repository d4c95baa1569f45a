import {
  CommandFailureError,
  PYENV_DOCS_URL,
  PYENV_INSTALLER_URL,
  ValidationError,
  err,
  formatError,
  ok,
} from "@pyvm/core";
import type { InstallTarget, Result } from "@pyvm/core";
import { createLogger } from "@pyvm/logger";
import { formatCommand, runSteps } from "../command-runner.js";
import type { CommandStep, InstallContext } from "../types.js";
import { toChannel } from "../version.js";

const log = createLogger("updater:installer:linux");

/** Probed in this order; only apt is driven automatically. */
export const LINUX_PACKAGE_MANAGERS = ["apt", "dnf", "yum"] as const;

export type LinuxPackageManager = (typeof LINUX_PACKAGE_MANAGERS)[number];

export const DEADSNAKES_PPA = "ppa:deadsnakes/ppa";

export async function detectLinuxPackageManager(
  ctx: InstallContext,
): Promise<LinuxPackageManager | null> {
  for (const manager of LINUX_PACKAGE_MANAGERS) {
    if (await ctx.runner.which(manager)) return manager;
  }
  return null;
}

/** Every step only warns on failure; the binary check afterwards decides. */
export function aptInstallSteps(channel: string): CommandStep[] {
  const step = (...args: string[]): CommandStep => ({
    command: "sudo",
    args,
    onFailure: "warn",
  });
  return [
    step("apt", "update"),
    step("apt", "install", "-y", "software-properties-common"),
    step("add-apt-repository", "-y", DEADSNAKES_PPA),
    step("apt", "update"),
    step("apt", "install", "-y", `python${channel}`),
    step("apt", "install", "-y", `python${channel}-venv`, `python${channel}-distutils`),
  ];
}

export function expectedBinaryPath(channel: string): string {
  return `/usr/bin/python${channel}`;
}

async function installWithApt(
  channel: string,
  ctx: InstallContext,
): Promise<Result<void>> {
  ctx.out("Using apt package manager...");
  ctx.out("This requires sudo privileges to install Python.");
  ctx.out("This will add the deadsnakes PPA (third-party repository).");
  ctx.out("IMPORTANT: This will NOT modify your system's default Python.");
  ctx.out("Your existing Python will remain unchanged.");

  const { completed, outcomes } = await runSteps(ctx.runner, aptInstallSteps(channel), ctx.out);
  if (!completed) {
    const last = outcomes.at(-1);
    return err(
      new CommandFailureError(
        `Error running command: ${last ? formatCommand(last.step.command, last.step.args) : "sudo"}`,
        "sudo",
        last?.result.exitCode ?? null,
        { cause: last?.result.error },
      ),
    );
  }

  const pythonPath = expectedBinaryPath(channel);
  if (!(await ctx.pathExists(pythonPath))) {
    log.warn(`${pythonPath} not found after installation`);
    return err(
      new CommandFailureError(`${pythonPath} not found after installation`, "apt", null),
    );
  }

  ctx.out(`Python ${channel} installed successfully at ${pythonPath}`);
  ctx.out(`Your system Python remains unchanged. Use 'python${channel}' to access the new version.`);
  return ok(undefined);
}

function printManualInstructions(
  manager: LinuxPackageManager,
  version: string,
  ctx: InstallContext,
): Result<void> {
  ctx.out(`Using ${manager} package manager...`);
  ctx.out("This requires sudo privileges.");
  ctx.out("Please run manually:");
  ctx.out(`  sudo ${manager} install python3`);
  ctx.out(`Note: Specific version ${version} may not be available via ${manager}`);
  ctx.out("Consider using pyenv for version-specific installations.");
  return err(
    new CommandFailureError(`Automatic installation is not supported with ${manager}`, manager, null),
  );
}

function recommendPyenv(version: string, ctx: InstallContext): Result<void> {
  ctx.out("No supported package manager found (apt, yum, or dnf).");
  ctx.out("Recommended: Install pyenv for easy Python version management");
  ctx.out(`Visit: ${PYENV_DOCS_URL}`);
  ctx.out("Pyenv installation (quick):");
  ctx.out(`  curl ${PYENV_INSTALLER_URL} | bash`);
  ctx.out(`  pyenv install ${version}`);
  return err(new CommandFailureError("No supported package manager found", "apt", null));
}

/**
 * Install `python{major.minor}` next to the system Python.
 * Only apt (via the deadsnakes PPA) is automated; dnf and yum get manual
 * instructions and anything else a pyenv recommendation.
 */
export async function installLinux(
  target: InstallTarget,
  ctx: InstallContext,
): Promise<Result<void>> {
  ctx.out("Linux detected");

  let channel: string;
  try {
    channel = toChannel(target.version);
  } catch (e) {
    return err(e instanceof ValidationError ? e : new ValidationError(formatError(e)));
  }

  const manager = await detectLinuxPackageManager(ctx);
  switch (manager) {
    case "apt":
      return installWithApt(channel, ctx);
    case "dnf":
    case "yum":
      return printManualInstructions(manager, target.version, ctx);
    case null:
      return recommendPyenv(target.version, ctx);
  }
}
