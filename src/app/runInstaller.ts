// CHANGE: Application layer composing the planning CORE with the host SHELL
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, InstallerError>
// INVARIANT: Returns ExitCode as value; no termination side effects
// COMPLEXITY: O(s) where s = number of planned steps

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import { computeExitStatus } from "../core/decision.js";
import {
	type ExecError,
	type FSError,
	type InstallerError,
	MissingVirtualEnv,
} from "../core/errors.js";
import type { CommandSpec, ExitCode, InstallStep } from "../core/models.js";
import { benchmarkHint, formatCommand, planInstall } from "../core/plan.js";
import { detectPlatform, platformBanner } from "../core/platform.js";
import type { CLIOptions, InstallerConfig } from "../core/types/index.js";
import { loadInstallerConfig, parseCLIArgs, USAGE_TEXT } from "../shell/config/index.js";
import { linkBenchmark } from "../shell/fs/benchmark-link.js";
import {
	reportCommand,
	reportFailure,
	reportInfo,
	reportUsageError,
	reportWarning,
} from "../shell/output/reporter.js";
import {
	queryClientPath,
	queryPinnedRequirement,
	queryPythonVersion,
} from "../shell/python/queries.js";
import {
	createNodeHost,
	type HostSystem,
	probePlatform,
} from "../shell/system/host.js";

export const VIRTUAL_ENV_MARKER = "VIRTUAL_ENV";

function runEchoed(
	host: HostSystem,
	command: CommandSpec,
): Effect.Effect<void, ExecError> {
	return Effect.sync(() => reportCommand(formatCommand(command))).pipe(
		Effect.zipRight(host.run(command)),
	);
}

/**
 * Executes one planned step.
 *
 * @pure false (console output, external commands, filesystem)
 * @effect Effect<void, ExecError | FSError>
 */
function executeStep(
	host: HostSystem,
	config: InstallerConfig,
	step: InstallStep,
): Effect.Effect<void, ExecError | FSError> {
	return match(step)
		.returnType<Effect.Effect<void, ExecError | FSError>>()
		.with({ _tag: "Notice", level: "warn" }, ({ message }) =>
			Effect.sync(() => reportWarning(message)),
		)
		.with({ _tag: "Notice" }, ({ message }) =>
			Effect.sync(() => reportInfo(message)),
		)
		.with({ _tag: "SystemPackages" }, { _tag: "ForceReinstall" }, ({ command }) =>
			runEchoed(host, command),
		)
		.with({ _tag: "LinkBenchmark" }, ({ pythonVersion }) =>
			linkBenchmark(host, config, pythonVersion).pipe(
				Effect.map(() => undefined),
			),
		)
		.exhaustive();
}

/**
 * Builds the VDF extension from source unless its client binary is already present.
 *
 * @param options - parsed command-line options
 * @param host - process, filesystem and PATH access
 * @param config - package names and locations
 * @returns Effect<ExitCode, InstallerError>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant the platform is detected before any package installation
 * @invariant client binary present → no external command beyond the three queries
 * @postcondition success → 0
 */
export function runInstaller(
	options: CLIOptions,
	host: HostSystem,
	config: InstallerConfig,
): Effect.Effect<ExitCode, InstallerError> {
	return Effect.gen(function* () {
		const marker = host.env[VIRTUAL_ENV_MARKER];
		if (marker === undefined || marker.length === 0) {
			return yield* Effect.fail(
				new MissingVirtualEnv({ variable: VIRTUAL_ENV_MARKER }),
			);
		}

		reportInfo(`Timelord requires CMake 3.14+ to compile ${config.clientBinary}.`);

		const pythonVersion = yield* queryPythonVersion(host);
		reportInfo(`Python version: ${pythonVersion}`);

		const resolved = yield* queryPinnedRequirement(host, config);
		reportInfo(resolved.poetryOutput.trimEnd());
		reportInfo(resolved.version);
		reportInfo(resolved.requirement);

		const platform = detectPlatform(probePlatform(host));
		const banner = platformBanner(platform);
		if (banner !== null) reportInfo(banner);

		const clientPath = yield* queryClientPath(host, config);
		if (host.pathExists(clientPath)) {
			reportInfo(clientPath);
			reportInfo(`${config.clientBinary} already exists, no action taken`);
		} else {
			const steps = planInstall({
				platform,
				hasVenvPython: host.pathExists(`${config.venvDir}/bin/python`),
				installPythonDev: options.installPythonDev,
				pythonVersion,
				requirement: resolved.requirement,
				config,
			});
			yield* Effect.forEach(steps, (step) => executeStep(host, config, step), {
				discard: true,
			});
		}

		reportInfo(benchmarkHint(config));
		return 0 as const;
	});
}

/**
 * Parses arguments, runs the installer and folds every failure into a process status.
 *
 * @param argv - arguments after the script name
 * @param host - defaults to the real Node host
 * @returns Effect<number, never>; 0 on success or help
 *
 * @pure false (coordinates effects)
 * @invariant usage error → 1; InstallerError e → computeExitStatus(e)
 */
export function main(
	argv: ReadonlyArray<string> = process.argv.slice(2),
	host: HostSystem = createNodeHost(),
): Effect.Effect<number> {
	return Either.match(parseCLIArgs(argv), {
		onLeft: (error) =>
			Effect.sync(() => {
				reportUsageError(error, USAGE_TEXT);
				return 1;
			}),
		onRight: (command) =>
			match(command)
				.returnType<Effect.Effect<number>>()
				.with({ _tag: "Help" }, () =>
					Effect.sync(() => {
						reportInfo(USAGE_TEXT);
						return 0;
					}),
				)
				.with({ _tag: "Run" }, ({ options }) =>
					runInstaller(
						options,
						host,
						loadInstallerConfig(host.cwd, host.env),
					).pipe(
						Effect.catchAll((error) =>
							Effect.sync(() => {
								reportFailure(error);
								return computeExitStatus(error);
							}),
						),
					),
				)
				.exhaustive(),
	});
}
