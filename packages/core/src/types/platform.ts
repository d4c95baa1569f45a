/** Operating systems with an installer branch. */
export type OsName = "windows" | "linux" | "darwin";

export type Arch = "amd64" | "arm64" | "x86";

/** The resolved triple an installer branch works from. */
export interface InstallTarget {
  os: OsName;
  arch: Arch;
  version: string;
}
