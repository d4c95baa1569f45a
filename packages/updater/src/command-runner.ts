import { spawn } from "node:child_process";
import { access, constants } from "node:fs/promises";
import { delimiter, join } from "node:path";
import { createLogger } from "@pyvm/logger";
import type {
  CommandResult,
  CommandRunner,
  CommandStep,
  RunOptions,
  StepOutcome,
  StepsResult,
} from "./types.js";

const log = createLogger("updater:command-runner");

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}

/** Candidate file names for `name` in one PATH directory. */
function executableCandidates(dir: string, name: string, platform: NodeJS.Platform): string[] {
  if (platform !== "win32") return [join(dir, name)];
  const extensions = (process.env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM")
    .split(";")
    .filter((ext) => ext.length > 0);
  return [join(dir, name), ...extensions.map((ext) => join(dir, name + ext.toLowerCase()))];
}

/**
 * Locate an executable on PATH, honouring PATHEXT on Windows.
 */
export async function findExecutable(
  name: string,
  pathValue: string = process.env.PATH ?? "",
  platform: NodeJS.Platform = process.platform,
): Promise<string | null> {
  const mode = platform === "win32" ? constants.F_OK : constants.X_OK;
  for (const dir of pathValue.split(delimiter)) {
    if (!dir) continue;
    for (const candidate of executableCandidates(dir, name, platform)) {
      try {
        await access(candidate, mode);
        return candidate;
      } catch {
        // not in this directory
      }
    }
  }
  return null;
}

/**
 * Run an external program with an argument list (never through a shell).
 * Resolves once the child exits; a spawn failure is reported in `error`.
 */
export function runCommand(
  command: string,
  args: readonly string[],
  options: RunOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    const child = spawn(command, args, {
      stdio: options.capture ? ["ignore", "pipe", "pipe"] : "inherit",
    });

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      log.debug(`Could not start ${command}: ${error.message}`);
      resolve({ exitCode: null, stdout, stderr, error });
    });
    child.on("close", (code) => {
      resolve({ exitCode: code, stdout, stderr });
    });
  });
}

export function createCommandRunner(): CommandRunner {
  return {
    run: runCommand,
    which: (name) => findExecutable(name),
  };
}

/**
 * Run steps in order. A non-zero exit is handled by the step's own policy:
 * "ignore" and "warn" continue, "abort" stops. A step whose process cannot
 * be started always stops the sequence.
 */
export async function runSteps(
  runner: CommandRunner,
  steps: readonly CommandStep[],
  out: (line: string) => void,
): Promise<StepsResult> {
  const outcomes: StepOutcome[] = [];

  for (const step of steps) {
    const display = formatCommand(step.command, step.args);
    out(`Running: ${display}`);
    const result = await runner.run(step.command, step.args, step.options);
    outcomes.push({ step, result });

    if (result.error) {
      log.error(`Command not found or could not start: ${step.command} (${result.error.message})`);
      return { completed: false, outcomes };
    }
    if (result.exitCode === 0) continue;

    switch (step.onFailure) {
      case "ignore":
        break;
      case "warn":
        log.warn(`Command failed with exit code ${result.exitCode}: ${display}`);
        out("Continuing anyway...");
        break;
      case "abort":
        log.error(`Command failed with exit code ${result.exitCode}: ${display}`);
        return { completed: false, outcomes };
    }
  }

  return { completed: true, outcomes };
}
