export { pyvmConfigSchema, DEFAULT_CONFIG, loadConfig } from "./config.js";
export type { PyvmConfig } from "./config.js";
export type { OsName, Arch, InstallTarget } from "./platform.js";
