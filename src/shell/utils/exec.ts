// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string | void, ExecError, never>
// INVARIANT: ∀ command: exit status ≠ 0 → ExecError carrying that status
// COMPLEXITY: O(1) time, O(n) space where n = stdout length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import type { CommandSpec } from "../../core/models.js";
import { formatCommand } from "../../core/plan.js";
import { exitStatusOf } from "../../core/types/exec-helpers.js";
import { execFile, os, promisify, spawnSync } from "./node-mods.js";

const execFileAsync = promisify(execFile);

// Shells report death by signal N as 128 + N.
const SIGNAL_STATUS_BASE = 128;

/**
 * Options shared by both runners.
 */
export interface ExecOptions {
	readonly cwd: string;
	readonly env: Readonly<Record<string, string | undefined>>;
}

function isSignalName(value: unknown): value is NodeJS.Signals {
	return typeof value === "string" && Object.hasOwn(os.constants.signals, value);
}

function signalStatus(signal: NodeJS.Signals): number {
	return SIGNAL_STATUS_BASE + os.constants.signals[signal];
}

// execFile rejects with `code: null` and the signal name when the child is killed.
function failureStatus(error: unknown): number {
	if (
		typeof error === "object" &&
		error !== null &&
		"signal" in error &&
		isSignalName(error.signal)
	) {
		return signalStatus(error.signal);
	}
	return exitStatusOf(error);
}

function describeFailure(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}

/**
 * Runs a query and returns its stdout.
 *
 * @param spec - command, arguments and extra environment
 * @param options - working directory and base environment
 * @returns Effect with stdout or ExecError
 *
 * @pure false (executes external command)
 * @effect Effect<string, ExecError, never>
 * @invariant exit status 0 → stdout; status ≠ 0 → ExecError(status); signal N → ExecError(128 + N)
 * @complexity O(n) where n = command execution time
 */
export function captureCommand(
	spec: CommandSpec,
	options: ExecOptions,
): Effect.Effect<string, ExecError> {
	return Effect.tryPromise({
		try: () =>
			execFileAsync(spec.command, [...spec.args], {
				cwd: options.cwd,
				env: { ...options.env, ...spec.env },
				encoding: "utf8",
			}),
		catch: (error) =>
			new ExecError({
				command: formatCommand(spec),
				exitCode: failureStatus(error),
				detail: describeFailure(error),
			}),
	}).pipe(Effect.map(({ stdout }) => stdout));
}

/**
 * Runs a command in the foreground with inherited stdio, blocking until it exits.
 *
 * @pure false (spawns a process sharing the terminal)
 * @effect Effect<void, ExecError, never>
 * @invariant spawn failure → ExecError(127); status ≠ 0 → ExecError(status); signal N → ExecError(128 + N)
 * @complexity O(n) where n = command execution time
 */
export function runCommand(
	spec: CommandSpec,
	options: ExecOptions,
): Effect.Effect<void, ExecError> {
	return Effect.suspend(() => {
		const result = spawnSync(spec.command, [...spec.args], {
			cwd: options.cwd,
			env: { ...options.env, ...spec.env },
			stdio: "inherit",
		});
		if (result.error !== undefined) {
			return Effect.fail(
				new ExecError({
					command: formatCommand(spec),
					exitCode: exitStatusOf(result.error),
					detail: result.error.message,
				}),
			);
		}
		if (result.signal !== null) {
			return Effect.fail(
				new ExecError({
					command: formatCommand(spec),
					exitCode: signalStatus(result.signal),
					detail: `terminated by ${result.signal}`,
				}),
			);
		}
		if (result.status !== null && result.status !== 0) {
			return Effect.fail(
				new ExecError({
					command: formatCommand(spec),
					exitCode: result.status,
					detail: `exited with status ${String(result.status)}`,
				}),
			);
		}
		return Effect.void;
	});
}
