export type { PyvmConfig, OsName, Arch, InstallTarget } from "./types/index.js";
export { pyvmConfigSchema, DEFAULT_CONFIG, loadConfig } from "./types/index.js";

export type { PyvmErrorKind } from "./errors.js";
export {
  PyvmError,
  NetworkError,
  ValidationError,
  FileSystemError,
  UnsupportedPlatformError,
  CommandFailureError,
  FetchFailedError,
  InvalidSchemeError,
  DownloadTimeoutError,
  InterruptedError,
  formatError,
  isErrnoException,
} from "./errors.js";

export type { Result } from "./result.js";
export { ok, err } from "./result.js";

export {
  PYTHON_ORG_ORIGIN,
  DOWNLOADS_PAGE_URL,
  FTP_BASE_URL,
  PYENV_DOCS_URL,
  PYENV_INSTALLER_URL,
  HOMEBREW_INSTALL_SCRIPT_URL,
  getWindowsInstallerUrl,
  getReleasePageUrl,
} from "./endpoints.js";
