// CHANGE: Single left-to-right pass over raw argv that attributes free tokens to --include/--exclude
// WHY: A structured parser loses token positions; attribution depends on the nearest preceding marker
// REF: REQ-CLI-ATTRIBUTION
// FORMAT THEOREM: ∀ free token t: marker(t) = nearest marker m with index(m) < index(t), else AttributionError(t)
// PURITY: CORE
// EFFECT: Either<ScannedArgv, AttributionError | ArgumentError>
// INVARIANT: Tool flags never reset the current marker
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { ArgumentError, AttributionError } from "../errors.js";

export const INCLUDE_MARKER = "--include";
export const EXCLUDE_MARKER = "--exclude";

/** Maximum number of positionals before the first marker: version, source executable. */
export const MAX_POSITIONALS = 2;

/**
 * Flags the tool itself understands.
 *
 * @property valueFlags Flags that take a value (`--threads 8` or `--threads=8`)
 * @property switches Boolean flags
 */
export interface FlagSpec {
	readonly valueFlags: ReadonlySet<string>;
	readonly switches: ReadonlySet<string>;
}

/**
 * Raw argv split into its parts; values are not interpreted yet.
 */
export interface ScannedArgv {
	readonly positionals: ReadonlyArray<string>;
	readonly include: ReadonlyArray<string>;
	readonly exclude: ReadonlyArray<string>;
	readonly values: ReadonlyMap<string, string>;
	readonly switches: ReadonlySet<string>;
}

type Marker = "include" | "exclude" | undefined;

interface ScanState {
	readonly positionals: string[];
	readonly include: string[];
	readonly exclude: string[];
	readonly values: Map<string, string>;
	readonly switches: Set<string>;
	marker: Marker;
}

/**
 * Splits `--name=value` when `name` is a value flag.
 */
const splitInlineValue = (
	arg: string,
	spec: FlagSpec,
): readonly [string, string] | undefined => {
	const eq = arg.indexOf("=");
	if (eq === -1) return undefined;
	const name = arg.slice(0, eq);
	return spec.valueFlags.has(name) ? [name, arg.slice(eq + 1)] : undefined;
};

/**
 * Attributes a token that is neither a tool flag nor a marker.
 */
const attributeFreeToken = (
	state: ScanState,
	token: string,
): AttributionError | undefined => {
	if (state.marker === "include") {
		state.include.push(token);
		return undefined;
	}
	if (state.marker === "exclude") {
		state.exclude.push(token);
		return undefined;
	}
	if (!token.startsWith("-") && state.positionals.length < MAX_POSITIONALS) {
		state.positionals.push(token);
		return undefined;
	}
	return new AttributionError({ token });
};

/**
 * Scans raw argv (without the node and script entries).
 *
 * @param argv - Raw command-line tokens in original order
 * @param spec - Flags recognized by the tool
 * @returns ScannedArgv, or the first AttributionError / ArgumentError met
 *
 * @pure true
 * @invariant |positionals| ≤ MAX_POSITIONALS
 * @invariant a token appears in at most one of positionals, include, exclude
 * @complexity O(n)
 *
 * @example
 * ```ts
 * scanArgv(["3.8.2", "--exclude", "--with-x", "--threads", "8", "--with-y"], spec);
 * // Right({ positionals: ["3.8.2"], include: [], exclude: ["--with-x", "--with-y"], ... })
 * ```
 */
export function scanArgv(
	argv: ReadonlyArray<string>,
	spec: FlagSpec,
): Either.Either<ScannedArgv, AttributionError | ArgumentError> {
	const state: ScanState = {
		positionals: [],
		include: [],
		exclude: [],
		values: new Map(),
		switches: new Set(),
		marker: undefined,
	};

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		if (arg.length === 0) continue;

		if (arg === INCLUDE_MARKER) {
			state.marker = "include";
			continue;
		}
		if (arg === EXCLUDE_MARKER) {
			state.marker = "exclude";
			continue;
		}
		if (spec.switches.has(arg)) {
			state.switches.add(arg);
			continue;
		}
		if (spec.valueFlags.has(arg)) {
			const value = argv[i + 1];
			if (value === undefined) {
				return Either.left(
					new ArgumentError({ detail: `${arg} requires a value` }),
				);
			}
			state.values.set(arg, value);
			i++;
			continue;
		}
		const inline = splitInlineValue(arg, spec);
		if (inline !== undefined) {
			state.values.set(inline[0], inline[1]);
			continue;
		}

		const error = attributeFreeToken(state, arg);
		if (error !== undefined) return Either.left(error);
	}

	return Either.right({
		positionals: state.positionals,
		include: state.include,
		exclude: state.exclude,
		values: state.values,
		switches: state.switches,
	});
}
