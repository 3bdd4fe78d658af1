// CHANGE: Resilient Configurator: runs configure, dropping one rejected option per attempt
// WHY: Inherited option sets may carry flags the new source tree no longer accepts
// REF: REQ-CONFIGURE-RETRY
// FORMAT THEOREM: attempts ≤ max(1, |initial|); each retry shrinks the set by exactly one
// PURITY: SHELL (one process spawn per iteration)
// EFFECT: Effect<ConfigureOutcome, ConfigurationError>
// INVARIANT: Never adds options; every dropped option was named by an "unrecognized option" diagnostic
// COMPLEXITY: O(n) spawns where n = |initial options|

import { Effect } from "effect";

import { diagnosticTail, nextConfigureStep } from "../../core/configure/retry.js";
import { ConfigurationError } from "../../core/errors.js";
import type { ConfigureOutcome, OptionSet } from "../../core/models.js";
import type { CommandRunner } from "../../core/types/index.js";

export interface ConfigureRequest {
	readonly sourceDir: string;
	/** Configure script, relative to sourceDir (`./configure`). */
	readonly command: string;
	readonly options: OptionSet;
}

/**
 * Runs configure until it succeeds or fails for a non-recoverable reason.
 *
 * @param runner - Process runner
 * @param request - Source tree, configure command and initial options
 * @returns Final option set, removed options and attempt count
 *
 * @pure false (spawns configure)
 * @effect Effect<ConfigureOutcome, ConfigurationError>
 * @invariant outcome.options ⊆ request.options
 * @postcondition first attempt succeeds → attempts = 1 ∧ removed = []
 */
export function configureWithRetry(
	runner: CommandRunner,
	request: ConfigureRequest,
): Effect.Effect<ConfigureOutcome, ConfigurationError> {
	return Effect.gen(function* () {
		let options = request.options;
		const removed: string[] = [];

		for (;;) {
			const result = yield* runner
				.run({
					command: request.command,
					args: options,
					cwd: request.sourceDir,
					capture: true,
				})
				.pipe(
					Effect.mapError(
						(error) =>
							new ConfigurationError({
								reason: `cannot run ${request.command}: ${error.detail}`,
								options,
								removed,
								diagnostic: "",
							}),
					),
				);

			const output = `${result.stdout}${result.stderr}`;
			const step = nextConfigureStep(options, {
				exitCode: result.exitCode,
				output,
			});

			if (step.kind === "done") {
				return { options, removed, attempts: removed.length + 1 };
			}
			if (step.kind === "fail") {
				return yield* Effect.fail(
					new ConfigurationError({
						reason: step.reason,
						options,
						removed,
						diagnostic: diagnosticTail(output),
					}),
				);
			}
			removed.push(step.removed);
			options = step.options;
		}
	});
}
