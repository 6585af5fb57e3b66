// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code the installer itself decides on.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}; statuses of failed external commands are carried by ExecError
 */
export type ExitCode = 0 | 1;

/**
 * Interpreter label in the form `python<major>.<minor>`, e.g. `python3.11`.
 */
export type PythonVersion = `python${number}.${number}`;

/**
 * Pinned install specifier, e.g. `chiavdf==1.1.4`.
 */
export type PinnedRequirement = `${string}==${string}`;

/**
 * RedHat-family package manager found on PATH.
 */
export type RedHatManager = "dnf" | "yum";

/**
 * Host platform family. Exactly one variant is produced per run.
 *
 * @invariant kind is assigned once by detectPlatform and never changes
 */
export type Platform =
	| { readonly kind: "debian" }
	| { readonly kind: "redhat"; readonly manager: RedHatManager }
	| { readonly kind: "macos" }
	| { readonly kind: "unknown" };

/**
 * Raw facts about the host collected by the shell before classification.
 */
export interface PlatformProbe {
	/** Value of `os.platform()`: "linux", "darwin", ... */
	readonly osName: string;
	readonly hasAptGet: boolean;
	readonly hasDnf: boolean;
	readonly hasYum: boolean;
}

/**
 * External command description. Environment entries are added on top of the
 * installer's own environment for this command only.
 */
export interface CommandSpec {
	readonly command: string;
	readonly args: ReadonlyArray<string>;
	readonly env?: Readonly<Record<string, string>>;
}

/**
 * One step of an install plan.
 *
 * @invariant steps run strictly in array order; the first failure aborts the rest
 */
export type InstallStep =
	| {
			readonly _tag: "Notice";
			readonly level: "info" | "warn";
			readonly message: string;
	  }
	| { readonly _tag: "SystemPackages"; readonly command: CommandSpec }
	| { readonly _tag: "ForceReinstall"; readonly command: CommandSpec }
	| { readonly _tag: "LinkBenchmark"; readonly pythonVersion: PythonVersion };

/**
 * Outcome of the benchmark symlink helper.
 */
export type LinkOutcome =
	| { readonly _tag: "Created"; readonly target: string; readonly link: string }
	| { readonly _tag: "AlreadyLinked"; readonly link: string }
	| { readonly _tag: "BenchmarkMissing"; readonly target: string };
