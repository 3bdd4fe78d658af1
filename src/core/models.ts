// CHANGE: Domain models for the build pipeline (pure, immutable)
// WHY: Every stage reads the same BuildConfig; no module-level defaults
// REF: REQ-PIPELINE-CONFIG
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the build process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Ordered, duplicate-free list of configure flags.
 *
 * @remarks
 * Order is kept stable for a reproducible configure command line but
 * carries no meaning.
 */
export type OptionSet = ReadonlyArray<string>;

/**
 * Where inherited options come from.
 *
 * `none` is the CLI sentinel "None": start from an empty option set.
 */
export type OptionSource =
	| { readonly kind: "none" }
	| { readonly kind: "interpreter"; readonly executable: string };

/**
 * Parsed interpreter version, e.g. `3.12.0rc1` → release `3.12.0`, tag `rc1`.
 */
export interface InterpreterVersion {
	readonly raw: string;
	readonly release: string;
	readonly major: number;
	readonly minor: number;
	readonly patch: number;
	readonly preRelease: string | undefined;
}

/**
 * Immutable run configuration, constructed once by the CLI shell.
 *
 * @property directory User-specified working directory; undefined = ephemeral temp dir
 * @property threads Job count handed to `make -j`
 * @property mirror Base URL of the source archive mirror
 */
export interface BuildConfig {
	readonly version: InterpreterVersion;
	readonly source: OptionSource;
	readonly directory: string | undefined;
	readonly threads: number;
	readonly optimizations: boolean;
	readonly pip: boolean;
	readonly include: ReadonlyArray<string>;
	readonly exclude: ReadonlyArray<string>;
	readonly mirror: string;
	readonly configureCommand: string;
	readonly quiet: boolean;
}

/**
 * Pipeline stage names used in failure reports.
 */
export type Stage =
	| "arguments"
	| "download"
	| "query"
	| "reconcile"
	| "configure"
	| "build"
	| "install";

/**
 * Result of the install stage. `manual` means the privileged step must be
 * run by hand with `command`.
 */
export type InstallOutcome =
	| { readonly kind: "installed" }
	| { readonly kind: "manual"; readonly command: string; readonly reason: string };

/**
 * Result of a successful configure run.
 *
 * @invariant options ∪ removed = initial option set
 * @invariant attempts = removed.length + 1
 */
export interface ConfigureOutcome {
	readonly options: OptionSet;
	readonly removed: ReadonlyArray<string>;
	readonly attempts: number;
}

/**
 * Summary of a completed run.
 */
export interface BuildReport {
	readonly sourceDir: string;
	readonly configure: ConfigureOutcome;
	readonly install: InstallOutcome;
}
