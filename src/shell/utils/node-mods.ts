/**
 * Shared re-exports of Node built-ins used by the shell layer.
 *
 * Invariant: re-export objects/functions through constants, never `export *`,
 * since node:path and node:fs use `export =`.
 */
import * as fsNS from "node:fs";
import * as osNS from "node:os";
import * as pathNS from "node:path";

export { execFile, spawnSync } from "node:child_process";
export { promisify } from "node:util";

export const fs = fsNS;
export const os = osNS;
export const path = pathNS;
