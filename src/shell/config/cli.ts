// CHANGE: CLI surface: raw argv + environment → immutable BuildConfig
// WHY: Attribution of free tokens needs token order, so argv is scanned before anything is interpreted
// REF: REQ-CLI-ATTRIBUTION, REQ-PIPELINE-CONFIG
// PURITY: SHELL boundary (reads nothing itself; argv and env are passed in)
// EFFECT: Either<CliRequest, ArgumentError | AttributionError>
// INVARIANT: BuildConfig is built once per run and never mutated
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import {
	EXCLUDE_MARKER,
	INCLUDE_MARKER,
	scanArgv,
} from "../../core/cli/attribution.js";
import type { FlagSpec, ScannedArgv } from "../../core/cli/attribution.js";
import { ArgumentError, type AttributionError } from "../../core/errors.js";
import type { BuildConfig, OptionSource } from "../../core/models.js";
import { parseVersion } from "../../core/source/version.js";

export const DEFAULT_THREADS = 4;
export const DEFAULT_SOURCE_EXECUTABLE = "python3";
export const DEFAULT_MIRROR = "https://www.python.org/ftp/python";
export const DEFAULT_CONFIGURE_COMMAND = "./configure";
/** Source executable value meaning "do not inherit options". */
export const NO_INHERITANCE = "None";

export const FLAGS: FlagSpec = {
	valueFlags: new Set(["--directory", "--threads"]),
	switches: new Set([
		"--without-optimizations",
		"--without-pip",
		"--without-ensurepip",
		"--help",
		"-h",
	]),
};

/**
 * Environment variables read at startup.
 */
export interface CliEnvironment {
	readonly PY_ALTBUILD_PYTHON?: string | undefined;
	readonly PY_ALTBUILD_MIRROR?: string | undefined;
	readonly PY_ALTBUILD_QUIET?: string | undefined;
}

/**
 * Picks the variables this tool reads from the process environment.
 *
 * @pure true
 */
export const readEnvironment = (env: NodeJS.ProcessEnv): CliEnvironment => ({
	PY_ALTBUILD_PYTHON: env["PY_ALTBUILD_PYTHON"],
	PY_ALTBUILD_MIRROR: env["PY_ALTBUILD_MIRROR"],
	PY_ALTBUILD_QUIET: env["PY_ALTBUILD_QUIET"],
});

export type CliRequest =
	| { readonly kind: "help" }
	| { readonly kind: "build"; readonly config: BuildConfig };

export const USAGE = [
	"Usage: py-altbuild <version> [source-executable|None] [options] [--include <opts...>] [--exclude <opts...>]",
	"",
	"Builds the given interpreter version from source and installs it with make altinstall.",
	"Configure options are inherited from source-executable (default: python3); pass None to start empty.",
	"",
	"Options:",
	"  --directory <path>         download and build here (default: temporary directory, removed afterwards)",
	`  --threads <n>              parallel make jobs (default: ${DEFAULT_THREADS})`,
	"  --without-optimizations    drop --with-lto and --enable-optimizations",
	"  --without-pip              configure with --without-ensurepip (alias: --without-ensurepip)",
	`  ${INCLUDE_MARKER} <opts...>       add configure options`,
	`  ${EXCLUDE_MARKER} <opts...>       remove configure options (wins over --include)`,
	"  -h, --help                 show this help",
].join("\n");

const isTruthyEnv = (value: string | undefined): boolean =>
	value !== undefined && ["1", "true", "yes"].includes(value.toLowerCase());

/**
 * Parses `--threads`.
 *
 * @pure true
 * @postcondition Right(n) → n ∈ ℕ⁺
 */
export function parseThreads(
	raw: string | undefined,
): Either.Either<number, ArgumentError> {
	if (raw === undefined) return Either.right(DEFAULT_THREADS);
	const threads = /^\d+$/u.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
	return Number.isSafeInteger(threads) && threads > 0
		? Either.right(threads)
		: Either.left(
				new ArgumentError({
					detail: `--threads expects a positive integer, got "${raw}"`,
				}),
			);
}

const resolveSource = (
	raw: string | undefined,
	env: CliEnvironment,
): OptionSource => {
	const executable = raw ?? env.PY_ALTBUILD_PYTHON ?? DEFAULT_SOURCE_EXECUTABLE;
	return executable === NO_INHERITANCE
		? { kind: "none" }
		: { kind: "interpreter", executable };
};

function toBuildConfig(
	scanned: ScannedArgv,
	env: CliEnvironment,
): Either.Either<BuildConfig, ArgumentError> {
	const [rawVersion, rawSource] = scanned.positionals;
	if (rawVersion === undefined) {
		return Either.left(
			new ArgumentError({ detail: "missing required <version> argument" }),
		);
	}

	return Either.all([
		parseVersion(rawVersion),
		parseThreads(scanned.values.get("--threads")),
	]).pipe(
		Either.map(
			([version, threads]): BuildConfig => ({
				version,
				source: resolveSource(rawSource, env),
				directory: scanned.values.get("--directory"),
				threads,
				optimizations: !scanned.switches.has("--without-optimizations"),
				pip: !(
					scanned.switches.has("--without-pip") ||
					scanned.switches.has("--without-ensurepip")
				),
				include: scanned.include,
				exclude: scanned.exclude,
				mirror: env.PY_ALTBUILD_MIRROR ?? DEFAULT_MIRROR,
				configureCommand: DEFAULT_CONFIGURE_COMMAND,
				quiet: isTruthyEnv(env.PY_ALTBUILD_QUIET),
			}),
		),
	);
}

/**
 * Parses command-line arguments.
 *
 * @param argv - Arguments after the node and script entries
 * @param env - Process environment
 * @returns help request, or the run configuration
 *
 * @example
 * ```ts
 * // Command: py-altbuild 3.8.2 None --threads 8 --include --enable-shared
 * parseCLIArgs(["3.8.2", "None", "--threads", "8", "--include", "--enable-shared"], {});
 * // Right({ kind: "build", config: { threads: 8, source: { kind: "none" }, include: ["--enable-shared"], ... } })
 * ```
 */
export function parseCLIArgs(
	argv: ReadonlyArray<string>,
	env: CliEnvironment,
): Either.Either<CliRequest, ArgumentError | AttributionError> {
	const scanned = scanArgv(argv, FLAGS);
	if (Either.isLeft(scanned)) return Either.left(scanned.left);
	if (scanned.right.switches.has("--help") || scanned.right.switches.has("-h")) {
		return Either.right({ kind: "help" });
	}
	return toBuildConfig(scanned.right, env).pipe(
		Either.map((config): CliRequest => ({ kind: "build", config })),
	);
}
