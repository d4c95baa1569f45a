import type { InstallTarget, PyvmConfig, Result } from "@pyvm/core";

/** What the python.org download button advertises. */
export interface LatestRelease {
  /** Latest stable version, e.g. "3.12.1" */
  version: string;
  /** Absolute installer URL, or null when the button carries no href */
  downloadUrl: string | null;
}

/** The interpreter found on PATH. */
export interface LocalPython {
  version: string;
  executable: string;
}

export interface VersionReport {
  /** Local version, or null when no interpreter is installed */
  localVersion: string | null;
  latestVersion: string;
  downloadUrl: string | null;
  needsUpdate: boolean;
}

/** Download progress event data */
export interface DownloadProgress {
  /** Bytes downloaded so far */
  downloaded: number;
  /** Advertised size in bytes, null without a content-length header */
  total: number | null;
  /** Progress percentage (0-100), null when the total is unknown */
  percent: number | null;
}

export interface DownloadOptions {
  timeoutMs: number;
  onProgress?: (progress: DownloadProgress) => void;
}

export interface DownloadResult {
  filePath: string;
  bytesWritten: number;
  /** True when the written size differs from the advertised one */
  sizeMismatch: boolean;
}

export type Downloader = (
  url: string,
  destPath: string,
  options: DownloadOptions,
) => Promise<Result<DownloadResult>>;

export interface CommandResult {
  /** Exit code, or null when the process could not be started or was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Spawn failure such as ENOENT */
  error?: Error;
}

export interface RunOptions {
  /** Collect stdout/stderr instead of inheriting the terminal */
  capture?: boolean;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
  /** Absolute path of an executable on PATH, or null */
  which(name: string): Promise<string | null>;
}

export type FailurePolicy = "ignore" | "warn" | "abort";

export interface CommandStep {
  command: string;
  args: readonly string[];
  /** What a non-zero exit means for the rest of the sequence */
  onFailure: FailurePolicy;
  options?: RunOptions;
}

export interface StepOutcome {
  step: CommandStep;
  result: CommandResult;
}

export interface StepsResult {
  /** False when an abort-policy step failed or a process could not start */
  completed: boolean;
  outcomes: StepOutcome[];
}

/** Everything an installer branch touches outside its own logic. */
export interface InstallContext {
  config: PyvmConfig;
  runner: CommandRunner;
  download: Downloader;
  /** User-facing output, one line per call */
  out: (line: string) => void;
  pathExists: (path: string) => Promise<boolean>;
  removeFile: (path: string) => Promise<void>;
  tempDir: string;
  onProgress?: (progress: DownloadProgress) => void;
}

export type Installer = (target: InstallTarget, ctx: InstallContext) => Promise<Result<void>>;
