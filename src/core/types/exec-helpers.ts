// CHANGE: Exit status extraction shared by every command runner
// PURITY: CORE
// INVARIANT: result > 0

/**
 * Status a POSIX shell reports when a command cannot be found.
 */
export const COMMAND_NOT_FOUND = 127;

/**
 * Derives a process exit status from a child_process failure.
 *
 * @param error Rejection value of execFile/spawnSync
 * @returns numeric `code` when present, 127 for ENOENT, 1 otherwise
 *
 * @pure true
 * @invariant result ≥ 1
 * @complexity O(1)
 */
export function exitStatusOf(error: unknown): number {
	if (typeof error !== "object" || error === null || !("code" in error)) {
		return 1;
	}
	const { code } = error;
	if (typeof code === "number" && code > 0) {
		return code;
	}
	if (code === "ENOENT") {
		return COMMAND_NOT_FOUND;
	}
	return 1;
}
