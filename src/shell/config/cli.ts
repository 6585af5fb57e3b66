// PURITY: SHELL (reads process.argv by default)
// INVARIANT: parsing stops at the first non-option argument or at "--"
// COMPLEXITY: O(n) where n = total length of the option arguments

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type { CliCommand } from "../../core/types/index.js";

export const USAGE_TEXT = `Usage: install-timelord [-n] [-h]

  -n                          do not install Python development package, Python.h etc
  -h                          display this help and exit
`;

/**
 * Parses command-line flags with getopts semantics (`-n`, `-h`, clusters like `-nh`).
 *
 * @param args Arguments after the script name
 * @returns Run/Help command, or UsageError for the first unknown flag
 *
 * @example
 * ```ts
 * parseCLIArgs(["-n"]);
 * // Either.right({ _tag: "Run", options: { installPythonDev: false } })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Either.Either<CliCommand, UsageError> {
	let installPythonDev = true;

	for (const arg of args) {
		if (arg === "--" || arg === "-" || !arg.startsWith("-")) break;

		for (const flag of arg.slice(1)) {
			switch (flag) {
				case "n": {
					installPythonDev = false;
					break;
				}
				case "h": {
					return Either.right<CliCommand>({ _tag: "Help" });
				}
				default: {
					return Either.left(new UsageError({ flag }));
				}
			}
		}
	}

	return Either.right<CliCommand>({ _tag: "Run", options: { installPythonDev } });
}
