// PURITY: CORE
// INVARIANT: every returned label is non-empty
// COMPLEXITY: O(n) where n = length of the tool output

import { Option } from "effect";

import type { PinnedRequirement, PythonVersion } from "./models.js";

const PYTHON_VERSION_PATTERN = /^python\d+\.\d+$/u;
const POETRY_VERSION_LINE = /^\s*version\s*:\s*(.*)$/u;

/**
 * @pure true
 * @complexity O(n)
 */
function isPythonVersion(value: string): value is PythonVersion {
	return PYTHON_VERSION_PATTERN.test(value);
}

/**
 * Reads the interpreter label printed by the version query.
 *
 * @param output - stdout of `python -c 'print(f"python{major}.{minor}")'`
 * @returns Some("python3.11") or None when the output has another shape
 *
 * @pure true
 * @invariant Some(v) → v matches python<major>.<minor>
 * @complexity O(n)
 */
export function parsePythonVersion(output: string): Option.Option<PythonVersion> {
	const candidate = output.trim();
	return isPythonVersion(candidate) ? Option.some(candidate) : Option.none();
}

/**
 * Extracts the resolved version from `poetry show <package>` output.
 *
 * Every line matching `version :` contributes; the first non-empty value is
 * taken. Dependency lines (` - name >=1.0`) never match.
 *
 * @pure true
 * @invariant Some(v) → v.trim() === v ∧ v.length > 0
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parsePoetryVersion("name         : chiavdf\nversion      : 1.1.4\n");
 * // Option.some("1.1.4")
 * ```
 */
export function parsePoetryVersion(output: string): Option.Option<string> {
	for (const line of output.split(/\r?\n/u)) {
		const found = POETRY_VERSION_LINE.exec(line);
		const value = found?.[1]?.trim() ?? "";
		if (value.length > 0) {
			return Option.some(value);
		}
	}
	return Option.none();
}

/**
 * Builds the pinned pip specifier.
 *
 * @pure true
 * @precondition version.length > 0
 * @complexity O(1)
 */
export function pinRequirement(
	packageName: string,
	version: string,
): PinnedRequirement {
	return `${packageName}==${version}`;
}
