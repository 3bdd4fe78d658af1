// CHANGE: Pure retry policy for the configure step
// WHY: The shell loop only spawns processes; every keep/drop/stop decision lives here
// REF: REQ-CONFIGURE-RETRY
// FORMAT THEOREM: nextConfigureStep(s, a) = Retry(s') → |s'| = |s| - 1 ∧ s' ⊂ s
// PURITY: CORE
// INVARIANT: Options are only ever removed, one per recoverable rejection
// COMPLEXITY: O(n) per step where n = |options|

import type { OptionSet } from "../models.js";

/**
 * Outcome of one configure invocation.
 */
export interface ConfigureAttempt {
	readonly exitCode: number;
	readonly output: string;
}

/**
 * What the configurator does next.
 */
export type ConfigureStep =
	| { readonly kind: "done" }
	| {
			readonly kind: "retry";
			readonly options: OptionSet;
			readonly removed: string;
	  }
	| { readonly kind: "fail"; readonly reason: string };

const UNRECOGNIZED_PATTERN = /unrecognized options?:\s*[`'"]?([^\s,`'"]+)/u;

/** Number of trailing output lines kept in error reports. */
export const DIAGNOSTIC_TAIL_LINES = 20;

/**
 * Extracts the first option named by an "unrecognized option" diagnostic.
 *
 * Covers the autoconf spellings:
 * - `configure: error: unrecognized option: \`--frob'`
 * - `configure: error: unrecognized option: '--frob'`
 * - `configure: WARNING: unrecognized options: --with-foo, --with-bar`
 *
 * @returns Option name, or undefined when the output names none
 *
 * @pure true
 */
export const findUnrecognizedOption = (output: string): string | undefined =>
	UNRECOGNIZED_PATTERN.exec(output)?.[1];

/**
 * Last lines of a command's output, for failure reports.
 *
 * @pure true
 */
export const diagnosticTail = (
	output: string,
	lines: number = DIAGNOSTIC_TAIL_LINES,
): string => output.trimEnd().split(/\r?\n/u).slice(-lines).join("\n");

/**
 * Decides the next configure step from the current set and the last attempt.
 *
 * @param options - Option set passed to the last attempt
 * @param attempt - Exit status and combined output of that attempt
 * @returns done | retry with one option removed | fail
 *
 * @pure true
 * @invariant retry ⇒ result.options = options \ {removed} ∧ |result.options| > 0
 * @invariant the named option is removed only when it is a member of options
 * @complexity O(n)
 */
export function nextConfigureStep(
	options: OptionSet,
	attempt: ConfigureAttempt,
): ConfigureStep {
	if (attempt.exitCode === 0) return { kind: "done" };

	const rejected = findUnrecognizedOption(attempt.output);
	if (rejected === undefined) {
		return {
			kind: "fail",
			reason: `configure exited with status ${attempt.exitCode}`,
		};
	}
	if (!options.includes(rejected)) {
		return {
			kind: "fail",
			reason: `configure rejected ${rejected}, which is not in the option set`,
		};
	}

	const remaining = options.filter((option) => option !== rejected);
	if (remaining.length === 0) {
		return {
			kind: "fail",
			reason: `configure rejected ${rejected} and no options remain`,
		};
	}
	return { kind: "retry", options: remaining, removed: rejected };
}
