// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP entry points

// ═══════════════════════════════════════════════════════════════════════════════
// APP (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Installer orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { createNodeHost, DEFAULT_CONFIG, runInstaller } from "timelord-installer";
 *
 * const code = await Effect.runPromise(
 *   runInstaller({ installPythonDev: false }, createNodeHost(), DEFAULT_CONFIG),
 * );
 * ```
 */
export { runInstaller, VIRTUAL_ENV_MARKER } from "./app/runInstaller.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CommandSpec,
	ExitCode,
	InstallStep,
	LinkOutcome,
	PinnedRequirement,
	Platform,
	PlatformProbe,
	PythonVersion,
} from "./core/models.js";
export type { CLIOptions, CliCommand, InstallerConfig } from "./core/types/index.js";
export { DEFAULT_CONFIG } from "./core/types/index.js";
export {
	ExecError,
	FSError,
	type InstallerError,
	MissingVirtualEnv,
	UsageError,
	VersionResolutionError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { benchmarkPaths, decideBenchmarkLink } from "./core/benchmark.js";
export { computeExitStatus } from "./core/decision.js";
export {
	benchmarkHint,
	boostBuildFlags,
	forceReinstallCommand,
	formatCommand,
	planInstall,
	pythonDevPackage,
	systemPackagesStep,
} from "./core/plan.js";
export { detectPlatform, platformBanner } from "./core/platform.js";
export {
	parsePoetryVersion,
	parsePythonVersion,
	pinRequirement,
} from "./core/version.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (host access, for embedding and tests)
// ═══════════════════════════════════════════════════════════════════════════════

export { createNodeHost, type HostSystem } from "./shell/system/host.js";
export { linkBenchmark } from "./shell/fs/benchmark-link.js";
