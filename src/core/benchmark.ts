// PURITY: CORE
// INVARIANT: the link is created only when it is absent and its target exists
// COMPLEXITY: O(1)

import type { PythonVersion } from "./models.js";
import type { InstallerConfig } from "./types/config.js";

/**
 * Relative locations of the benchmark executable and its link.
 */
export interface BenchmarkPaths {
	/** Executable inside the virtual environment's site-packages */
	readonly target: string;
	/** Link created in the working directory */
	readonly link: string;
}

/**
 * @pure true
 * @invariant target = <venvDir>/lib/<pythonVersion>/site-packages/<benchBinary>
 * @complexity O(1)
 */
export function benchmarkPaths(
	config: InstallerConfig,
	pythonVersion: PythonVersion,
): BenchmarkPaths {
	return {
		target: `${config.venvDir}/lib/${pythonVersion}/site-packages/${config.benchBinary}`,
		link: config.benchBinary,
	};
}

export type LinkDecision = "create" | "missing" | "exists";

/**
 * Chooses the symlink action from what is on disk.
 *
 * @pure true
 * @invariant ¬linkPresent ∧ targetPresent → create; ¬targetPresent → missing; otherwise exists
 * @complexity O(1)
 */
export function decideBenchmarkLink(
	linkPresent: boolean,
	targetPresent: boolean,
): LinkDecision {
	if (!linkPresent && targetPresent) return "create";
	if (!targetPresent) return "missing";
	return "exists";
}
