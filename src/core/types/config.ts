// PURITY: CORE
// INVARIANT: configuration values are immutable after loading

/**
 * Installer configuration from timelord.config.json merged over defaults.
 *
 * @property packageName Python distribution built from source
 * @property venvDir Virtual environment directory, relative to the working directory
 * @property poetryPath Poetry executable used to resolve the pinned version
 * @property clientBinary Executable expected beside the installed package
 * @property benchBinary Benchmark executable linked into the working directory
 * @property boostFormula Homebrew formula pinned for macOS builds
 * @property brewPrefix Directory holding Homebrew's keg-only `opt` links
 */
export interface InstallerConfig {
	readonly packageName: string;
	readonly venvDir: string;
	readonly poetryPath: string;
	readonly clientBinary: string;
	readonly benchBinary: string;
	readonly boostFormula: string;
	readonly brewPrefix: string;
}

export const DEFAULT_CONFIG: InstallerConfig = {
	packageName: "chiavdf",
	venvDir: "venv",
	poetryPath: ".penv/bin/poetry",
	clientBinary: "vdf_client",
	benchBinary: "vdf_bench",
	boostFormula: "boost@1.85",
	brewPrefix: "/usr/local/opt",
};

/**
 * Options accepted on the command line.
 *
 * @property installPythonDev False when `-n` was given
 */
export interface CLIOptions {
	readonly installPythonDev: boolean;
}

/**
 * Parsed command line: either run the installer or print help.
 */
export type CliCommand =
	| { readonly _tag: "Run"; readonly options: CLIOptions }
	| { readonly _tag: "Help" };
