// PURITY: SHELL (console output)
// INVARIANT: info and command echoes go to stdout; warnings and errors go to stderr

import { match } from "ts-pattern";

import type { InstallerError, UsageError } from "../../core/errors.js";

/**
 * Prints a progress line.
 */
export function reportInfo(message: string): void {
	console.log(message);
}

/**
 * Prints a non-fatal warning.
 */
export function reportWarning(message: string): void {
	console.warn(message);
}

export function reportError(message: string): void {
	console.error(message);
}

/**
 * Echoes a command before it runs, prefixed with `$ `.
 */
export function reportCommand(rendered: string): void {
	console.log(`$ ${rendered}`);
}

/**
 * Prints the diagnostic for an unknown flag followed by the usage text.
 */
export function reportUsageError(error: UsageError, usage: string): void {
	console.error(`illegal option -- ${error.flag}`);
	console.error("");
	console.error(usage);
}

/**
 * Prints the diagnostic for a failed run.
 *
 * @invariant exactly one variant-specific block per error
 */
export function reportFailure(error: InstallerError): void {
	match(error)
		.with({ _tag: "MissingVirtualEnv" }, () => {
			console.error("This requires the chia python virtual environment.");
			console.error("Execute '. ./activate' before running.");
		})
		.with({ _tag: "VersionResolutionError" }, (e) => {
			console.error(`Could not determine the ${e.subject} version from:`);
			console.error(e.output.trimEnd());
		})
		.with({ _tag: "Exec" }, (e) => {
			console.error(`Command failed with status ${e.exitCode}: ${e.command}`);
			console.error(`  ${e.detail}`);
		})
		.with({ _tag: "FS" }, (e) => {
			console.error(`Filesystem error${e.path === undefined ? "" : ` at ${e.path}`}: ${e.detail}`);
		})
		.exhaustive();
}
