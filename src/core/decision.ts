// FORMAT THEOREM: ∀e ∈ InstallerError: e._tag = "Exec" → status(e) = e.exitCode, otherwise status(e) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping InstallerError → process status
// COMPLEXITY: O(1) time / O(1) space

import { match } from "ts-pattern";

import type { InstallerError } from "./errors.js";

/**
 * Process status for a failed run.
 *
 * @param error - typed failure from the installer
 * @returns the failing command's own status for ExecError, 1 for every other error
 *
 * @pure true
 * @invariant result ≥ 1
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitStatus(new ExecError({ command: "sudo apt-get", exitCode: 100, detail: "" })); // 100
 * ```
 */
export const computeExitStatus = (error: InstallerError): number =>
	match(error)
		.with({ _tag: "Exec" }, (e) => e.exitCode)
		.with({ _tag: "MissingVirtualEnv" }, () => 1)
		.with({ _tag: "VersionResolutionError" }, () => 1)
		.with({ _tag: "FS" }, () => 1)
		.exhaustive();
