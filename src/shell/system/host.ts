// PURITY: SHELL (process, filesystem and PATH access)
// INVARIANT: every relative path is resolved against HostSystem.cwd
// COMPLEXITY: O(p) per PATH lookup where p = number of PATH entries

import { Effect } from "effect";

import { type ExecError, FSError } from "../../core/errors.js";
import type { CommandSpec, PlatformProbe } from "../../core/models.js";
import { captureCommand, runCommand } from "../utils/exec.js";
import { fs, os, path } from "../utils/node-mods.js";

/**
 * Everything the installer touches outside its own process.
 *
 * Tests replace this with an in-process fake that records commands.
 */
export interface HostSystem {
	readonly cwd: string;
	readonly env: Readonly<Record<string, string | undefined>>;
	/** `os.platform()` value */
	readonly osName: string;
	readonly commandExists: (name: string) => boolean;
	/** True when the path exists, following symlinks */
	readonly pathExists: (target: string) => boolean;
	/** True when a directory entry exists, even a dangling symlink */
	readonly entryExists: (target: string) => boolean;
	readonly capture: (spec: CommandSpec) => Effect.Effect<string, ExecError>;
	readonly run: (spec: CommandSpec) => Effect.Effect<void, ExecError>;
	readonly symlink: (
		target: string,
		link: string,
	) => Effect.Effect<void, FSError>;
}

export interface NodeHostOptions {
	readonly cwd?: string;
	readonly env?: Readonly<Record<string, string | undefined>>;
	readonly osName?: string;
}

function isExecutable(file: string): boolean {
	try {
		fs.accessSync(file, fs.constants.X_OK);
		return fs.statSync(file).isFile();
	} catch {
		return false;
	}
}

/**
 * Finds a command on PATH the way `type name` would for a plain executable.
 *
 * @pure false (reads filesystem)
 * @complexity O(p) where p = number of PATH entries
 */
export function isOnPath(name: string, searchPath: string | undefined): boolean {
	if (searchPath === undefined || searchPath.length === 0) return false;
	return searchPath
		.split(path.delimiter)
		.filter((dir) => dir.length > 0)
		.some((dir) => isExecutable(path.join(dir, name)));
}

/**
 * Host backed by the real process, filesystem and child processes.
 *
 * @pure false
 */
export function createNodeHost(options: NodeHostOptions = {}): HostSystem {
	const cwd = options.cwd ?? process.cwd();
	const env = options.env ?? process.env;
	const resolve = (target: string): string => path.resolve(cwd, target);
	const execOptions = { cwd, env };

	return {
		cwd,
		env,
		osName: options.osName ?? os.platform(),
		commandExists: (name) => isOnPath(name, env["PATH"]),
		pathExists: (target) => fs.existsSync(resolve(target)),
		entryExists: (target) => {
			try {
				fs.lstatSync(resolve(target));
				return true;
			} catch {
				return false;
			}
		},
		capture: (spec) => captureCommand(spec, execOptions),
		run: (spec) => runCommand(spec, execOptions),
		symlink: (target, link) =>
			Effect.try({
				try: () => fs.symlinkSync(target, resolve(link)),
				catch: (error) =>
					new FSError({
						detail: error instanceof Error ? error.message : String(error),
						path: resolve(link),
					}),
			}),
	};
}

/**
 * Collects the facts detectPlatform classifies.
 *
 * @pure false (PATH lookups)
 */
export function probePlatform(host: HostSystem): PlatformProbe {
	return {
		osName: host.osName,
		hasAptGet: host.commandExists("apt-get"),
		hasDnf: host.commandExists("dnf"),
		hasYum: host.commandExists("yum"),
	};
}
