// CHANGE: Pipeline orchestrator (APP): workdir → source → inherited options → reconcile → configure → make → altinstall
// WHY: APP composes pure CORE decisions with SHELL stages; no process.exit here
// REF: REQ-PIPELINE
// PURITY: APP
// EFFECT: Effect<BuildReport, PipelineError>
// INVARIANT: A failing stage aborts every later stage; the working directory is released on every exit path
// INVARIANT: InstallError never fails the run; it becomes a manual InstallOutcome
// COMPLEXITY: O(k) external processes where k = configure attempts + 3

import { Effect, Either } from "effect";

import { computeExitCode, describeFailure } from "../core/decision.js";
import type { PipelineError } from "../core/errors.js";
import type {
	BuildConfig,
	BuildReport,
	ExitCode,
	InstallOutcome,
} from "../core/models.js";
import { reconcileOptions } from "../core/options/reconcile.js";
import type { CommandRunner } from "../core/types/index.js";
import { configureWithRetry } from "../shell/build/configure.js";
import { runAltinstall, runMake } from "../shell/build/make.js";
import type { Reporter } from "../shell/output/reporter.js";
import type { Downloader } from "../shell/source/fetch.js";
import { ensureSource } from "../shell/source/fetch.js";
import { readInheritedOptions } from "../shell/source/option-source.js";
import type { WorkDir } from "../shell/source/workdir.js";
import { acquireWorkDir } from "../shell/source/workdir.js";

/**
 * External collaborators of the pipeline.
 */
export interface BuildServices {
	readonly runner: CommandRunner;
	readonly download: Downloader;
	readonly reporter: Reporter;
}

/**
 * Install stage: success, or guidance for a manual privileged install.
 *
 * @pure false
 * @postcondition result.kind = "manual" → workDir is kept
 */
function installStage(
	services: BuildServices,
	workDir: WorkDir,
	sourceDir: string,
): Effect.Effect<InstallOutcome> {
	return runAltinstall(services.runner, { sourceDir }).pipe(
		Effect.as<InstallOutcome>({ kind: "installed" }),
		Effect.catchTag("InstallError", (error) =>
			Effect.sync((): InstallOutcome => {
				workDir.keep();
				return {
					kind: "manual",
					command: error.command,
					reason: error.reason,
				};
			}),
		),
	);
}

/**
 * Runs the whole build for one configuration.
 *
 * @param config - Immutable run configuration
 * @param services - Process runner, downloader and reporter
 * @returns BuildReport, or the error of the first failing stage
 *
 * @pure false (coordinates effects)
 * @effect Effect<BuildReport, PipelineError>
 */
export function runPipeline(
	config: BuildConfig,
	services: BuildServices,
): Effect.Effect<BuildReport, PipelineError> {
	const { runner, reporter } = services;

	return Effect.scoped(
		Effect.gen(function* () {
			const workDir = yield* acquireWorkDir(config.directory);
			yield* reporter.step(`Working directory: ${workDir.path}`);

			yield* reporter.step(`Fetching Python ${config.version.raw}`);
			const sourceDir = yield* ensureSource(
				{ runner, download: services.download },
				{
					version: config.version,
					directory: workDir.path,
					mirror: config.mirror,
				},
			);

			if (config.source.kind === "interpreter") {
				yield* reporter.step(
					`Reading build options of ${config.source.executable}`,
				);
			}
			const inherited = yield* readInheritedOptions(runner, config.source);

			const { options, notices } = reconcileOptions({
				inherited,
				optimizations: config.optimizations,
				pip: config.pip,
				include: config.include,
				exclude: config.exclude,
			});
			yield* reporter.notices(notices);
			yield* reporter.options("Configure options", options);

			yield* reporter.step("Running configure");
			const configure = yield* configureWithRetry(runner, {
				sourceDir,
				command: config.configureCommand,
				options,
			});
			yield* reporter.configured(configure);

			yield* reporter.step(`Building with ${config.threads} jobs`);
			yield* runMake(runner, { sourceDir, threads: config.threads });

			yield* reporter.step("Installing");
			const install = yield* installStage(services, workDir, sourceDir);
			yield* reporter.installed(install);

			return { sourceDir, configure, install };
		}),
	);
}

/**
 * Runs the pipeline, reports the outcome and returns the exit code as a value.
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @effect Effect<ExitCode, never>
 * @invariant ExitCode ∈ {0,1}
 */
export function runPipelineToExitCode(
	config: BuildConfig,
	services: BuildServices,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const outcome = yield* Effect.either(runPipeline(config, services));
		if (Either.isLeft(outcome)) {
			yield* services.reporter.failure(describeFailure(outcome.left));
		}
		return computeExitCode(outcome);
	});
}
