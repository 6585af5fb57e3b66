export { parseCLIArgs, USAGE_TEXT } from "./cli.js";
export { loadInstallerConfig, normalizeConfig, resolveConfigPath } from "./loader.js";
