export type { CLIOptions, CliCommand, InstallerConfig } from "./config.js";
export { DEFAULT_CONFIG } from "./config.js";
export { exitStatusOf } from "./exec-helpers.js";
