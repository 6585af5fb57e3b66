// CHANGE: Pure install planning; the shell only executes the returned steps
// PURITY: CORE
// INVARIANT: plan(context) is deterministic; no step is emitted for an unmatched branch
// COMPLEXITY: O(1) per platform branch

import { match } from "ts-pattern";

import type {
	CommandSpec,
	InstallStep,
	PinnedRequirement,
	Platform,
	PythonVersion,
} from "./models.js";
import type { InstallerConfig } from "./types/config.js";

/**
 * Environment variable asking the native build to also produce the benchmark.
 */
const BENCH_BUILD_ENV: Readonly<Record<string, string>> = {
	BUILD_VDF_BENCH: "Y",
};

const DEBIAN_PACKAGES = {
	before: ["libgmp-dev", "libboost-python-dev"],
	after: ["libboost-system-dev", "build-essential"],
} as const;

const REDHAT_PACKAGES = [
	"gcc",
	"gcc-c++",
	"gmp-devel",
	"libtool",
	"make",
	"autoconf",
	"automake",
	"openssl-devel",
	"libevent-devel",
	"boost-devel",
	"python3",
	"cmake",
] as const;

/**
 * Everything the planner needs, gathered by the shell beforehand.
 */
export interface PlanContext {
	readonly platform: Platform;
	readonly hasVenvPython: boolean;
	readonly installPythonDev: boolean;
	readonly pythonVersion: PythonVersion;
	readonly requirement: PinnedRequirement;
	readonly config: InstallerConfig;
}

/**
 * Name of the Python headers package for a platform, or null when skipped.
 *
 * @pure true
 * @invariant installPythonDev = false → null; macOS and unknown hosts → null
 * @complexity O(1)
 */
export function pythonDevPackage(
	platform: Platform,
	pythonVersion: PythonVersion,
	installPythonDev: boolean,
): string | null {
	if (!installPythonDev) return null;
	return match(platform)
		.with({ kind: "debian" }, () => `lib${pythonVersion}-dev`)
		.with({ kind: "redhat" }, () => `${pythonVersion}-devel`)
		.otherwise(() => null);
}

/**
 * System package-manager command for the platform, or null on unknown hosts.
 *
 * @pure true
 * @invariant result.command ∈ {sudo, brew} ∨ result = null
 * @complexity O(1)
 */
export function systemPackagesStep(
	platform: Platform,
	pythonVersion: PythonVersion,
	installPythonDev: boolean,
	config: InstallerConfig,
): CommandSpec | null {
	const devPackage = pythonDevPackage(platform, pythonVersion, installPythonDev);
	const dev = devPackage === null ? [] : [devPackage];
	return match(platform)
		.returnType<CommandSpec | null>()
		.with({ kind: "debian" }, () => ({
			command: "sudo",
			args: [
				"apt-get",
				"install",
				...DEBIAN_PACKAGES.before,
				...dev,
				...DEBIAN_PACKAGES.after,
				"-y",
			],
		}))
		.with({ kind: "redhat" }, ({ manager }) => ({
			command: "sudo",
			args: [manager, "install", ...dev, ...REDHAT_PACKAGES, "-y"],
		}))
		.with({ kind: "macos" }, () => ({
			command: "brew",
			args: [
				"install",
				"--formula",
				"--quiet",
				config.boostFormula,
				"cmake",
				"gmp",
			],
		}))
		.with({ kind: "unknown" }, () => null)
		.exhaustive();
}

/**
 * Compiler and linker flags pointing at the keg-only boost formula.
 *
 * @pure true
 * @complexity O(1)
 */
export function boostBuildFlags(
	config: InstallerConfig,
): Readonly<Record<string, string>> {
	const keg = `${config.brewPrefix}/${config.boostFormula}`;
	return {
		LDFLAGS: `-L${keg}/lib`,
		CPPFLAGS: `-I${keg}/include`,
	};
}

/**
 * Forced from-source reinstall through the virtual environment's pip.
 *
 * @pure true
 * @invariant env always contains BUILD_VDF_BENCH=Y
 * @complexity O(1)
 */
export function forceReinstallCommand(
	config: InstallerConfig,
	requirement: PinnedRequirement,
	extraEnv: Readonly<Record<string, string>> = {},
): CommandSpec {
	return {
		command: `${config.venvDir}/bin/python`,
		args: [
			"-m",
			"pip",
			"install",
			"--force-reinstall",
			"--no-binary",
			config.packageName,
			requirement,
		],
		env: { ...BENCH_BUILD_ENV, ...extraEnv },
	};
}

const notice = (message: string): InstallStep => ({
	_tag: "Notice",
	level: "info",
	message,
});

/**
 * Ordered steps for a host where the client binary is not built yet.
 *
 * @param context - platform, flags and resolved versions
 * @returns steps to run in order
 *
 * @pure true
 * @invariant ¬hasVenvPython → single warning notice, no commands
 * @invariant hasVenvPython → last two steps are ForceReinstall, LinkBenchmark
 * @complexity O(1)
 */
export function planInstall(context: PlanContext): ReadonlyArray<InstallStep> {
	const { platform, config, requirement, pythonVersion } = context;
	if (!context.hasVenvPython) {
		return [
			{
				_tag: "Notice",
				level: "warn",
				message: "No venv created yet, please run install.sh.",
			},
		];
	}

	const pkg = config.packageName;
	const system = systemPackagesStep(
		platform,
		pythonVersion,
		context.installPythonDev,
		config,
	);
	const link: InstallStep = { _tag: "LinkBenchmark", pythonVersion };

	return match(platform)
		.returnType<ReadonlyArray<InstallStep>>()
		.with({ kind: "debian" }, () => [
			notice(`Installing ${pkg} dependencies on Ubuntu/Debian`),
			...systemSteps(system),
			notice(`Installing ${pkg} from source on Ubuntu/Debian`),
			{ _tag: "ForceReinstall", command: forceReinstallCommand(config, requirement) },
			link,
		])
		.with({ kind: "redhat" }, () => [
			notice(`Installing ${pkg} dependencies on RedHat/CentOS/Fedora`),
			...systemSteps(system),
			notice(`Installing ${pkg} from source on RedHat/CentOS/Fedora`),
			{ _tag: "ForceReinstall", command: forceReinstallCommand(config, requirement) },
			link,
		])
		.with({ kind: "macos" }, () => [
			notice(`Installing ${pkg} dependencies for MacOS.`),
			...systemSteps(system),
			notice(`Installing ${pkg} from source.`),
			{
				_tag: "ForceReinstall",
				command: forceReinstallCommand(
					config,
					requirement,
					boostBuildFlags(config),
				),
			},
			link,
		])
		.with({ kind: "unknown" }, () => [
			notice(`Installing ${pkg} from source.`),
			{ _tag: "ForceReinstall", command: forceReinstallCommand(config, requirement) },
			link,
		])
		.exhaustive();
}

function systemSteps(command: CommandSpec | null): ReadonlyArray<InstallStep> {
	return command === null ? [] : [{ _tag: "SystemPackages", command }];
}

/**
 * Renders a command the way it is echoed before execution.
 *
 * @pure true
 * @invariant env assignments precede the command, in insertion order
 * @complexity O(n) where n = number of arguments
 *
 * @example
 * ```ts
 * formatCommand({ command: "brew", args: ["install", "gmp"] }); // "brew install gmp"
 * ```
 */
export function formatCommand(spec: CommandSpec): string {
	const assignments = Object.entries(spec.env ?? {}).map(
		([key, value]) => `${key}=${value}`,
	);
	return [...assignments, spec.command, ...spec.args].join(" ");
}

/**
 * Closing hint printed at the end of every run that got past the preconditions.
 *
 * @pure true
 * @complexity O(1)
 */
export function benchmarkHint(config: InstallerConfig): string {
	return `To estimate a timelord on this CPU try './${config.benchBinary} square_asm 400000' for an ips estimate.`;
}
