import {
  CommandFailureError,
  HOMEBREW_INSTALL_SCRIPT_URL,
  ValidationError,
  err,
  formatError,
  getReleasePageUrl,
  ok,
} from "@pyvm/core";
import type { InstallTarget, Result } from "@pyvm/core";
import { createLogger } from "@pyvm/logger";
import { runSteps } from "../command-runner.js";
import type { InstallContext } from "../types.js";
import { toChannel } from "../version.js";

const log = createLogger("updater:installer:macos");

/** Homebrew tracks the newest patch of a line as `python@3.12`. */
export function homebrewFormula(channel: string): string {
  return `python@${channel}`;
}

async function installWithHomebrew(
  version: string,
  channel: string,
  ctx: InstallContext,
): Promise<Result<void>> {
  ctx.out("Using Homebrew...");
  ctx.out("Updating Homebrew...");
  const update = await runSteps(
    ctx.runner,
    [{ command: "brew", args: ["update"], onFailure: "warn", options: { capture: true } }],
    ctx.out,
  );
  const updateResult = update.outcomes[0]?.result;
  if (!update.completed) {
    return err(
      new CommandFailureError("Error running Homebrew: brew update could not start", "brew", null, {
        cause: updateResult?.error,
      }),
    );
  }
  if (updateResult && updateResult.exitCode !== 0 && updateResult.stderr.trim()) {
    log.warn(`brew update failed: ${updateResult.stderr.trim()}`);
  }

  const formula = homebrewFormula(channel);
  ctx.out(`Installing Python ${version} via Homebrew (formula: ${formula})...`);
  const result = await ctx.runner.run("brew", ["install", formula], { capture: true });

  if (result.exitCode === 0) {
    ctx.out(`Python ${version} installed successfully via Homebrew`);
    ctx.out(`Note: Homebrew installs the latest patch version of ${channel}.`);
    ctx.out(`The exact version ${version} may differ slightly.`);
    return ok(undefined);
  }

  ctx.out(`Homebrew formula '${formula}' may not be available.`);
  ctx.out(`Homebrew typically installs the latest patch version of ${channel}.`);
  ctx.out("Alternative: Install via official installer from python.org");
  ctx.out(`  ${getReleasePageUrl(version)}`);
  return err(
    new CommandFailureError(
      result.error
        ? `Error running Homebrew: ${result.error.message}`
        : `brew install ${formula} failed with exit code ${result.exitCode}`,
      "brew",
      result.exitCode,
      { cause: result.error ?? result.stderr.trim() },
    ),
  );
}

function printManualInstructions(version: string, channel: string, ctx: InstallContext): Result<void> {
  ctx.out("Homebrew not found.");
  ctx.out("Option 1: Install via official installer");
  ctx.out(`  ${getReleasePageUrl(version)}`);
  ctx.out("Option 2: Install Homebrew first");
  ctx.out(`  /bin/bash -c "$(curl -fsSL ${HOMEBREW_INSTALL_SCRIPT_URL})"`);
  ctx.out(`  Then run: brew install ${homebrewFormula(channel)}`);
  return err(new CommandFailureError("Homebrew not found", "brew", null));
}

/**
 * Install through Homebrew when it is present; `brew install`'s exit code
 * alone decides success. Otherwise point at the python.org release page.
 */
export async function installMacOS(
  target: InstallTarget,
  ctx: InstallContext,
): Promise<Result<void>> {
  ctx.out("macOS detected");

  let channel: string;
  try {
    channel = toChannel(target.version);
  } catch (e) {
    return err(e instanceof ValidationError ? e : new ValidationError(formatError(e)));
  }

  if (await ctx.runner.which("brew")) {
    return installWithHomebrew(target.version, channel, ctx);
  }
  return printManualInstructions(target.version, channel, ctx);
}
