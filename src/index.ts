// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, CORE functions and typed errors; SHELL internals stay private
// REF: Architecture plan (FCIS)
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect programs
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Build pipeline for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { main } from "py-altbuild";
 *
 * const exitCode = await Effect.runPromise(
 *   main(["3.8.2", "None", "--threads", "8"], { PY_ALTBUILD_QUIET: "1" }),
 * );
 * ```
 */
export type { BuildServices } from "./app/runBuild.js";
export { runPipeline, runPipelineToExitCode } from "./app/runBuild.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	BuildConfig,
	BuildReport,
	CommandResult,
	CommandRunner,
	CommandSpec,
	ConfigureOutcome,
	ExitCode,
	InstallOutcome,
	InterpreterVersion,
	OptionSet,
	OptionSource,
	Stage,
} from "./core/types/index.js";
export {
	ArgumentError,
	AttributionError,
	ConfigurationError,
	ConfigurationQueryError,
	DownloadError,
	ExecError,
	InstallError,
	MakeError,
} from "./core/errors.js";
export type { PipelineError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Option reconciliation: inherited options + policies + include/exclude.
 *
 * @pure true
 */
export { reconcileOptions } from "./core/options/reconcile.js";
export type {
	ReconcileInput,
	ReconcileNotice,
	ReconcileResult,
} from "./core/options/reconcile.js";
export { splitConfigArgs } from "./core/options/config-args.js";
export { scanArgv } from "./core/cli/attribution.js";
export {
	findUnrecognizedOption,
	nextConfigureStep,
} from "./core/configure/retry.js";
export { computeExitCode, describeFailure } from "./core/decision.js";
export { parseVersion } from "./core/source/version.js";
