// CHANGE: Option Source Reader: asks an installed interpreter for its configure arguments
// REF: REQ-OPTION-SOURCE
// PURITY: SHELL (spawns one process, no filesystem mutation)
// EFFECT: Effect<OptionSet, ConfigurationQueryError>
// INVARIANT: source.kind = "none" → [] without spawning
// COMPLEXITY: O(n) where n = |CONFIG_ARGS|

import { Effect, Either } from "effect";

import { ConfigurationQueryError } from "../../core/errors.js";
import type { OptionSet, OptionSource } from "../../core/models.js";
import { splitConfigArgs } from "../../core/options/config-args.js";
import { toOptionSet } from "../../core/options/option-set.js";
import type { CommandRunner, CommandSpec } from "../../core/types/index.js";

/**
 * Script printing the configure arguments the interpreter was built with.
 */
export const CONFIG_ARGS_SCRIPT =
	"import sysconfig; print(sysconfig.get_config_var('CONFIG_ARGS'))";

/**
 * Command that queries `executable` for its CONFIG_ARGS.
 *
 * @pure true
 */
export const configArgsQuery = (executable: string): CommandSpec => ({
	command: executable,
	args: ["-c", CONFIG_ARGS_SCRIPT],
	capture: true,
});

/**
 * Parses the query output into an option set.
 *
 * @pure true
 * @invariant output "None" (no build information) → ConfigurationQueryError
 */
export function parseConfigArgsOutput(
	executable: string,
	stdout: string,
): Either.Either<OptionSet, ConfigurationQueryError> {
	const raw = stdout.trim();
	if (raw === "None") {
		return Either.left(
			new ConfigurationQueryError({
				executable,
				reason: "interpreter does not expose CONFIG_ARGS",
			}),
		);
	}
	return splitConfigArgs(raw).pipe(
		Either.map(toOptionSet),
		Either.mapLeft(
			(reason) => new ConfigurationQueryError({ executable, reason }),
		),
	);
}

/**
 * Reads the option set of the inheritance source.
 *
 * @param runner - Process runner
 * @param source - Interpreter to inherit from, or the "None" sentinel
 * @returns Inherited options in reported order
 *
 * @pure false (spawns the interpreter)
 * @effect Effect<OptionSet, ConfigurationQueryError>
 */
export function readInheritedOptions(
	runner: CommandRunner,
	source: OptionSource,
): Effect.Effect<OptionSet, ConfigurationQueryError> {
	if (source.kind === "none") return Effect.succeed([]);
	const { executable } = source;

	return Effect.gen(function* () {
		const result = yield* runner.run(configArgsQuery(executable)).pipe(
			Effect.mapError(
				(error) =>
					new ConfigurationQueryError({ executable, reason: error.detail }),
			),
		);
		if (result.exitCode !== 0) {
			const stderr = result.stderr.trim();
			return yield* Effect.fail(
				new ConfigurationQueryError({
					executable,
					reason: `exited with status ${result.exitCode}${stderr.length > 0 ? `: ${stderr}` : ""}`,
				}),
			);
		}
		const parsed = parseConfigArgsOutput(executable, result.stdout);
		return Either.isRight(parsed)
			? parsed.right
			: yield* Effect.fail(parsed.left);
	});
}
