import { release, type as osType } from "node:os";
import type { InstallTarget, PyvmConfig, Result } from "@pyvm/core";
import {
  checkPythonVersion,
  createCommandRunner,
  createInstallContext,
  detectLocalPython,
  detectPlatform,
  installPython,
  isAdmin,
} from "@pyvm/updater";
import type { LocalPython, PlatformInfo, VersionReport } from "@pyvm/updater";
import { createConsoleOutput } from "./output.js";
import { confirm } from "./prompt.js";

/** Everything the commands reach outside the process. */
export interface CliDeps {
  out: (line: string) => void;
  platform: () => PlatformInfo;
  /** `os.type() os.release()`, e.g. "Linux 6.5.0" */
  systemDescription: () => string;
  isAdmin: () => Promise<boolean>;
  which: (name: string) => Promise<string | null>;
  detectLocalPython: () => Promise<LocalPython | null>;
  checkVersion: (localVersion: string | null) => Promise<Result<VersionReport>>;
  install: (target: InstallTarget) => Promise<Result<void>>;
  confirm: (question: string) => Promise<boolean>;
}

export function createDefaultDeps(config: PyvmConfig): CliDeps {
  const runner = createCommandRunner();
  const output = createConsoleOutput();

  return {
    out: output.out,
    platform: () => detectPlatform(),
    systemDescription: () => `${osType()} ${release()}`,
    isAdmin: () => isAdmin(runner),
    which: (name) => runner.which(name),
    detectLocalPython: () => detectLocalPython(runner),
    checkVersion: (localVersion) => checkPythonVersion(localVersion, config),
    install: (target) =>
      installPython(
        target,
        createInstallContext({ config, runner, out: output.out, onProgress: output.onProgress }),
      ),
    confirm: (question) => confirm(question),
  };
}
