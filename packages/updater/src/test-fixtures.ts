import { vi } from "vitest";
import { DEFAULT_CONFIG, ok } from "@pyvm/core";
import type { CommandResult, CommandRunner, Downloader, InstallContext, RunOptions } from "./types.js";

export interface RecordedCall {
  command: string;
  args: string[];
  options?: RunOptions;
}

type Responder = (command: string, args: readonly string[]) => Partial<CommandResult> | undefined;

/**
 * In-process CommandRunner. Every command exits 0 unless `respond`
 * returns something else for it.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly onPath: Record<string, string> = {},
    private readonly respond: Responder = () => undefined,
  ) {}

  async run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult> {
    this.calls.push({ command, args: [...args], options });
    return { exitCode: 0, stdout: "", stderr: "", ...this.respond(command, args) };
  }

  async which(name: string): Promise<string | null> {
    return this.onPath[name] ?? null;
  }

  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(" "));
  }
}

export function createTestContext(overrides: Partial<InstallContext> = {}) {
  const lines: string[] = [];
  const download = vi.fn<Downloader>(async (_url, destPath) =>
    ok({ filePath: destPath, bytesWritten: 1, sizeMismatch: false }),
  );
  const pathExists = vi.fn(async (_path: string) => true);
  const removeFile = vi.fn(async (_path: string) => undefined);

  const ctx: InstallContext = {
    config: DEFAULT_CONFIG,
    runner: new FakeRunner(),
    download,
    out: (line) => lines.push(line),
    pathExists,
    removeFile,
    tempDir: "/tmp/pyvm-test",
    ...overrides,
  };
  return { ctx, lines, download, pathExists, removeFile };
}
