// CHANGE: Console reporter for pipeline progress and failures
// WHY: All user-facing output goes through Effect's Console; CORE returns data only
// REF: REQ-PIPELINE-OUTPUT
// PURITY: SHELL (console I/O)
// INVARIANT: quiet suppresses progress only; failures and remediation always print
// COMPLEXITY: O(n) where n = printed lines

import { Console, Effect } from "effect";

import type { FailureReport } from "../../core/decision.js";
import type { ReconcileNotice } from "../../core/options/reconcile.js";
import type { ConfigureOutcome, InstallOutcome, OptionSet } from "../../core/types/index.js";

export interface Reporter {
	readonly step: (message: string) => Effect.Effect<void>;
	readonly notices: (notices: ReadonlyArray<ReconcileNotice>) => Effect.Effect<void>;
	readonly options: (label: string, options: OptionSet) => Effect.Effect<void>;
	readonly configured: (outcome: ConfigureOutcome) => Effect.Effect<void>;
	readonly installed: (outcome: InstallOutcome) => Effect.Effect<void>;
	readonly failure: (report: FailureReport) => Effect.Effect<void>;
}

/**
 * One line per reconciliation notice.
 *
 * @pure true
 */
export const formatNotice = (notice: ReconcileNotice): string =>
	notice.kind === "policy-conflict"
		? `ignoring --include ${notice.token}: conflicts with the ${notice.policy} setting`
		: `ignoring --include ${notice.token}: also passed to --exclude`;

/**
 * Renders an option set, one token per line.
 *
 * @pure true
 */
export const formatOptions = (label: string, options: OptionSet): string =>
	options.length === 0
		? `${label}: (none)`
		: [`${label}:`, ...options.map((option) => `  ${option}`)].join("\n");

/**
 * Lines printed for a failed run.
 *
 * @pure true
 */
export const formatFailure = (report: FailureReport): ReadonlyArray<string> => [
	`❌ ${report.stage} failed: ${report.message}`,
	...report.details.map((detail) => `   ${detail}`),
];

/**
 * Lines printed after the install stage.
 *
 * @pure true
 */
export const formatInstall = (outcome: InstallOutcome): ReadonlyArray<string> =>
	outcome.kind === "installed"
		? ["✅ Installed with make altinstall"]
		: [
				`⚠️  Install needs elevated privileges (${outcome.reason}).`,
				"Finish the installation with:",
				`  ${outcome.command}`,
			];

const printAll = (
	lines: ReadonlyArray<string>,
	print: (line: string) => Effect.Effect<void>,
): Effect.Effect<void> => Effect.forEach(lines, print, { discard: true });

/**
 * Console-backed reporter.
 *
 * @param quiet - Suppress progress lines
 * @pure false (console output)
 */
export function createConsoleReporter(quiet: boolean): Reporter {
	const progress = (line: string): Effect.Effect<void> =>
		quiet ? Effect.void : Console.log(line);

	return {
		step: (message) => progress(`🔧 ${message}`),
		notices: (notices) =>
			printAll(notices.map(formatNotice), (line) =>
				Console.warn(`⚠️  ${line}`),
			),
		options: (label, options) => progress(formatOptions(label, options)),
		configured: (outcome) =>
			outcome.removed.length === 0
				? progress("✅ configure succeeded")
				: printAll(
						[
							`✅ configure succeeded after ${outcome.attempts} attempts`,
							...outcome.removed.map(
								(option) => `   removed unrecognized option ${option}`,
							),
						],
						Console.warn,
					),
		installed: (outcome) =>
			printAll(
				formatInstall(outcome),
				outcome.kind === "installed" ? progress : Console.warn,
			),
		failure: (report) => printAll(formatFailure(report), Console.error),
	};
}
