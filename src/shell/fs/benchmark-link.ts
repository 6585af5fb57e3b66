// PURITY: SHELL (filesystem)
// EFFECT: Effect<LinkOutcome, FSError>
// INVARIANT: at most one symlink is created per call; repeated calls are no-ops

import { Effect } from "effect";
import { match } from "ts-pattern";

import { benchmarkPaths, decideBenchmarkLink } from "../../core/benchmark.js";
import type { FSError } from "../../core/errors.js";
import type { LinkOutcome, PythonVersion } from "../../core/models.js";
import type { InstallerConfig } from "../../core/types/config.js";
import { reportCommand, reportError, reportInfo } from "../output/reporter.js";
import type { HostSystem } from "../system/host.js";

/**
 * Links the benchmark executable from the virtual environment into the working directory.
 *
 * @param host - filesystem access, rooted at the working directory
 * @param config - venv directory and benchmark name
 * @param pythonVersion - `python<major>.<minor>` segment of the site-packages path
 * @returns what happened; a missing benchmark is reported, not failed
 *
 * @pure false (creates a symlink, console output)
 * @effect Effect<LinkOutcome, FSError>
 * @complexity O(1)
 */
export function linkBenchmark(
	host: HostSystem,
	config: InstallerConfig,
	pythonVersion: PythonVersion,
): Effect.Effect<LinkOutcome, FSError> {
	const { target, link } = benchmarkPaths(config, pythonVersion);
	return Effect.suspend(() =>
		match(decideBenchmarkLink(host.entryExists(link), host.pathExists(target)))
			.returnType<Effect.Effect<LinkOutcome, FSError>>()
			.with("create", () => {
				reportCommand(`ln -s ${target} .`);
				return host
					.symlink(target, link)
					.pipe(Effect.as<LinkOutcome>({ _tag: "Created", target, link }));
			})
			.with("missing", () => {
				reportError(`ERROR: Could not find ${target}`);
				return Effect.succeed<LinkOutcome>({ _tag: "BenchmarkMissing", target });
			})
			.with("exists", () => {
				reportInfo(`./${link} link exists.`);
				return Effect.succeed<LinkOutcome>({ _tag: "AlreadyLinked", link });
			})
			.exhaustive(),
	);
}
