// CHANGE: Pure mapping from run outcome to failing stage, message and exit code
// WHY: The shell prints and exits; which stage failed and why is decided here
// REF: REQ-PIPELINE-ERRORS
// FORMAT THEOREM: ∀ e ∈ PipelineError: computeExitCode(Left(e)) = 1; computeExitCode(Right(_)) = 0
// PURITY: CORE
// INVARIANT: Every error tag maps to exactly one stage (exhaustive match)
// COMPLEXITY: O(1)

import { Either } from "effect";
import { match } from "ts-pattern";

import type { PipelineError } from "./errors.js";
import type { BuildReport, ExitCode, Stage } from "./models.js";

/**
 * User-facing description of a failed run.
 */
export interface FailureReport {
	readonly stage: Stage;
	readonly message: string;
	readonly details: ReadonlyArray<string>;
}

/**
 * Describes a pipeline error by stage.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * describeFailure(new AttributionError({ token: "--with-x" }));
 * // { stage: "reconcile", message: "cannot tell whether --with-x should be included or excluded", details: [...] }
 * ```
 */
export const describeFailure = (error: PipelineError): FailureReport =>
	match<PipelineError, FailureReport>(error)
		.with({ _tag: "ArgumentError" }, (e) => ({
			stage: "arguments",
			message: e.detail,
			details: [],
		}))
		.with({ _tag: "AttributionError" }, (e) => ({
			stage: "reconcile",
			message: `cannot tell whether ${e.token} should be included or excluded`,
			details: [
				`put --include or --exclude before ${e.token} on the command line`,
			],
		}))
		.with({ _tag: "DownloadError" }, (e) => ({
			stage: "download",
			message: e.reason,
			details: [`source: ${e.url}`],
		}))
		.with({ _tag: "ConfigurationQueryError" }, (e) => ({
			stage: "query",
			message: `could not read build options from ${e.executable}: ${e.reason}`,
			details: ['pass "None" as the source executable to skip inheritance'],
		}))
		.with({ _tag: "ConfigurationError" }, (e) => ({
			stage: "configure",
			message: e.reason,
			details: [
				...(e.removed.length > 0
					? [`removed before failing: ${e.removed.join(" ")}`]
					: []),
				`last options: ${e.options.length > 0 ? e.options.join(" ") : "(none)"}`,
				...(e.diagnostic.length > 0 ? [e.diagnostic] : []),
			],
		}))
		.with({ _tag: "MakeError" }, (e) => ({
			stage: "build",
			message: e.reason,
			details: [`jobs: ${e.threads}`],
		}))
		.exhaustive();

/**
 * Exit code of a finished run. A pending manual install still counts as success.
 *
 * @pure true
 * @invariant result ∈ {0, 1}
 */
export const computeExitCode = (
	outcome: Either.Either<BuildReport, PipelineError>,
): ExitCode => (Either.isRight(outcome) ? 0 : 1);
