import { Command, CommanderError } from "commander";
import { InterruptedError, formatError } from "@pyvm/core";
import { createLogger } from "@pyvm/logger";
import { runCheck } from "./commands/check.js";
import { runInfo } from "./commands/info.js";
import { runUpdate } from "./commands/update.js";
import type { UpdateOptions } from "./commands/update.js";
import type { CliDeps } from "./deps.js";

export const TOOL_VERSION = "1.2.2";

/** Conventional exit status for SIGINT */
export const EXIT_INTERRUPTED = 130;

const log = createLogger("cli");

/**
 * Build the `pyvm` program. Commands report their exit code through
 * `setExitCode`; commander's own exits surface as CommanderError.
 */
export function createProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const write = (text: string) => deps.out(text.replace(/\n$/, ""));
  const program = new Command();

  program
    .name("pyvm")
    .description("Python Version Manager - Check and install Python (does NOT modify system defaults)")
    .version(`Python Version Manager v${TOOL_VERSION}`, "-v, --version", "Show tool version")
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({ writeOut: write, writeErr: write });

  program
    .command("check", { isDefault: true })
    .description("Check current Python version against latest stable release")
    .allowExcessArguments(false)
    .action(async () => {
      setExitCode(await runCheck(deps));
    });

  program
    .command("update")
    .description("Download and install Python version (does NOT modify system defaults)")
    .option("--auto", "Automatically proceed without confirmation")
    .option("--version <version>", "Specify a target Python version (e.g., 3.11.5)")
    .action(async (options: UpdateOptions) => {
      setExitCode(await runUpdate(options, deps));
    });

  program
    .command("info")
    .description("Show detailed system and Python information")
    .action(async () => {
      setExitCode(await runInfo(deps));
    });

  return program;
}

/** Run `pyvm` with user arguments and resolve to the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
    return exitCode;
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    if (e instanceof InterruptedError) {
      deps.out("");
      deps.out(e.message);
      return EXIT_INTERRUPTED;
    }
    log.debug(e);
    deps.out("");
    deps.out(`Error: ${formatError(e)}`);
    return 1;
  }
}
