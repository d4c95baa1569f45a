#!/usr/bin/env node
import { InterruptedError, formatError, loadConfig } from "@pyvm/core";
import type { PyvmConfig } from "@pyvm/core";
import { createDefaultDeps } from "./deps.js";
import { EXIT_INTERRUPTED, runCli } from "./program.js";

process.on("SIGINT", () => {
  console.log(`\n\n${new InterruptedError().message}`);
  process.exit(EXIT_INTERRUPTED);
});

async function main(): Promise<number> {
  let config: PyvmConfig;
  try {
    config = loadConfig();
  } catch (e) {
    console.error(`Error: Invalid configuration: ${formatError(e)}`);
    return 1;
  }
  return runCli(process.argv.slice(2), createDefaultDeps(config));
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(`Unexpected error: ${formatError(e)}`);
    process.exitCode = 1;
  },
);
