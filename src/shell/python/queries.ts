// PURITY: SHELL (runs the interpreter and poetry)
// EFFECT: Effect<T, ExecError | VersionResolutionError>
// INVARIANT: queries run one at a time; stdout is parsed by CORE functions

import { Effect, Option } from "effect";

import { type ExecError, VersionResolutionError } from "../../core/errors.js";
import type { PinnedRequirement, PythonVersion } from "../../core/models.js";
import type { InstallerConfig } from "../../core/types/config.js";
import {
	parsePoetryVersion,
	parsePythonVersion,
	pinRequirement,
} from "../../core/version.js";
import type { HostSystem } from "../system/host.js";
import { path } from "../utils/node-mods.js";

const VERSION_SCRIPT =
	'import sys; print(f"python{sys.version_info.major}.{sys.version_info.minor}")';

/**
 * Asks the active interpreter for its `python<major>.<minor>` label.
 *
 * @pure false (spawns python)
 * @effect Effect<PythonVersion, ExecError | VersionResolutionError>
 */
export function queryPythonVersion(
	host: HostSystem,
): Effect.Effect<PythonVersion, ExecError | VersionResolutionError> {
	return host.capture({ command: "python", args: ["-c", VERSION_SCRIPT] }).pipe(
		Effect.flatMap((output) =>
			Option.match(parsePythonVersion(output), {
				onNone: () =>
					Effect.fail(new VersionResolutionError({ subject: "python", output })),
				onSome: Effect.succeed,
			}),
		),
	);
}

/**
 * Raw `poetry show` output together with the pin built from it.
 */
export interface ResolvedRequirement {
	readonly poetryOutput: string;
	readonly version: string;
	readonly requirement: PinnedRequirement;
}

/**
 * Resolves the package version from the declared requirements via poetry.
 *
 * The installed copy, if any, is not consulted.
 *
 * @pure false (spawns poetry)
 * @effect Effect<ResolvedRequirement, ExecError | VersionResolutionError>
 * @invariant success → version.length > 0
 */
export function queryPinnedRequirement(
	host: HostSystem,
	config: InstallerConfig,
): Effect.Effect<ResolvedRequirement, ExecError | VersionResolutionError> {
	return host
		.capture({
			command: config.poetryPath,
			args: ["show", "--no-ansi", "--no-interaction", config.packageName],
		})
		.pipe(
			Effect.flatMap((poetryOutput) =>
				Option.match(parsePoetryVersion(poetryOutput), {
					onNone: () =>
						Effect.fail(
							new VersionResolutionError({
								subject: config.packageName,
								output: poetryOutput,
							}),
						),
					onSome: (version) =>
						Effect.succeed({
							poetryOutput,
							version,
							requirement: pinRequirement(config.packageName, version),
						}),
				}),
			),
		);
}

/**
 * Path where the compiled client must sit beside the installed package.
 *
 * @pure false (spawns python)
 * @effect Effect<string, ExecError>
 */
export function queryClientPath(
	host: HostSystem,
	config: InstallerConfig,
): Effect.Effect<string, ExecError> {
	const pkg = config.packageName;
	return host
		.capture({
			command: "python",
			args: ["-c", `import pathlib, ${pkg}; print(pathlib.Path(${pkg}.__file__).parent)`],
		})
		.pipe(Effect.map((output) => path.join(output.trim(), config.clientBinary)));
}
