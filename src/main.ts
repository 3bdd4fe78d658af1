// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI options and delegates orchestration to app/runBuild
// REF: Architecture plan (FCIS)
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Console, Effect, Either } from "effect";

import { runPipelineToExitCode } from "./app/runBuild.js";
import { describeFailure } from "./core/decision.js";
import type { ExitCode } from "./core/models.js";
import { nodeCommandRunner } from "./shell/utils/exec.js";
import type { CliEnvironment } from "./shell/config/index.js";
import { parseCLIArgs, USAGE } from "./shell/config/index.js";
import { createConsoleReporter } from "./shell/output/reporter.js";
import { fetchDownloader } from "./shell/source/fetch.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv - Arguments after the node and script entries
 * @param env - Process environment
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export function main(
	argv: ReadonlyArray<string>,
	env: CliEnvironment,
): Effect.Effect<ExitCode> {
	const request = parseCLIArgs(argv, env);
	if (Either.isLeft(request)) {
		return createConsoleReporter(false)
			.failure(describeFailure(request.left))
			.pipe(
				Effect.zipRight(Console.error("Run with --help for usage.")),
				Effect.as<ExitCode>(1),
			);
	}
	if (request.right.kind === "help") {
		return Console.log(USAGE).pipe(Effect.as<ExitCode>(0));
	}

	const { config } = request.right;
	return runPipelineToExitCode(config, {
		runner: nodeCommandRunner,
		download: fetchDownloader,
		reporter: createConsoleReporter(config.quiet),
	});
}
