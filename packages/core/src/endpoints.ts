// python.org locations
export const PYTHON_ORG_ORIGIN = "https://www.python.org";
export const DOWNLOADS_PAGE_URL = `${PYTHON_ORG_ORIGIN}/downloads/`;
export const FTP_BASE_URL = `${PYTHON_ORG_ORIGIN}/ftp/python`;

// Third-party installers recommended when no supported package manager exists
export const PYENV_DOCS_URL = "https://github.com/pyenv/pyenv#installation";
export const PYENV_INSTALLER_URL = "https://pyenv.run";
export const HOMEBREW_INSTALL_SCRIPT_URL =
  "https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh";

/** Return the Windows installer URL for a release, e.g. `python-3.12.1-amd64.exe`. */
export function getWindowsInstallerUrl(version: string, suffix: string): string {
  return `${FTP_BASE_URL}/${version}/python-${version}-${suffix}.exe`;
}

/** Return the python.org release page, which spells `3.12.1` as `3-12-1`. */
export function getReleasePageUrl(version: string): string {
  return `${PYTHON_ORG_ORIGIN}/downloads/release/python-${version.replaceAll(".", "-")}/`;
}
