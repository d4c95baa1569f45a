export type {
  LatestRelease,
  LocalPython,
  VersionReport,
  DownloadProgress,
  DownloadOptions,
  DownloadResult,
  Downloader,
  CommandResult,
  RunOptions,
  CommandRunner,
  FailurePolicy,
  CommandStep,
  StepOutcome,
  StepsResult,
  InstallContext,
  Installer,
} from "./types.js";
export type { Version, Ordering } from "./version.js";
export {
  validateVersionString,
  parseVersion,
  compareVersions,
  isNewerVersion,
  toChannel,
  normalizeInterpreterVersion,
} from "./version.js";
export type { Sleep } from "./checker.js";
export {
  DOWNLOAD_BUTTON_SELECTOR,
  resolveDownloadUrl,
  parseDownloadsPage,
  fetchLatestRelease,
  fetchLatestReleaseWithRetry,
  checkPythonVersion,
} from "./checker.js";
export { DOWNLOAD_CHUNK_SIZE, downloadFile } from "./downloader.js";
export {
  formatCommand,
  findExecutable,
  runCommand,
  createCommandRunner,
  runSteps,
} from "./command-runner.js";
export type { PlatformInfo } from "./platform.js";
export {
  normalizeOs,
  normalizeArch,
  detectPlatform,
  isAdmin,
  pythonCandidates,
  detectLocalPython,
} from "./platform.js";
export type { InstallContextOptions, InstallerSuffix, LinuxPackageManager } from "./installers/index.js";
export {
  createInstallContext,
  installPython,
  installWindows,
  selectInstallerSuffix,
  supportsArm64Installer,
  installLinux,
  aptInstallSteps,
  detectLinuxPackageManager,
  expectedBinaryPath,
  installMacOS,
  homebrewFormula,
} from "./installers/index.js";
export { usageInstructions } from "./usage.js";
