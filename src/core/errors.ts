// CHANGE: Typed domain error ADT for every pipeline stage using Effect.Data
// WHY: Each stage fails with its own tag; the shell maps tags to stage reports
// REF: REQ-PIPELINE-ERRORS, Effect Data API
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Invalid command line (bad version, bad thread count, missing value).
 *
 * @invariant detail.length > 0
 */
export class ArgumentError extends Data.TaggedError("ArgumentError")<{
	readonly detail: string;
}> {}

/**
 * A free command-line token with no preceding `--include`/`--exclude` marker.
 *
 * @invariant token is the first offending token in argv order
 */
export class AttributionError extends Data.TaggedError("AttributionError")<{
	readonly token: string;
}> {}

/**
 * Fetching or extracting the source archive failed.
 */
export class DownloadError extends Data.TaggedError("DownloadError")<{
	readonly url: string;
	readonly reason: string;
}> {}

/**
 * The inherited interpreter could not report its configure arguments.
 */
export class ConfigurationQueryError extends Data.TaggedError(
	"ConfigurationQueryError",
)<{
	readonly executable: string;
	readonly reason: string;
}> {}

/**
 * Configure failed for a reason other than one recognizable unrecognized option,
 * or ran out of options to remove.
 *
 * @property options Option set of the last attempt
 * @property removed Options dropped by earlier attempts, in removal order
 * @property diagnostic Tail of the last attempt's output
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
	readonly reason: string;
	readonly options: ReadonlyArray<string>;
	readonly removed: ReadonlyArray<string>;
	readonly diagnostic: string;
}> {}

/**
 * Parallel build failed.
 */
export class MakeError extends Data.TaggedError("MakeError")<{
	readonly threads: number;
	readonly reason: string;
}> {}

/**
 * Install step failed; recoverable by running `command` manually.
 *
 * @invariant command = `cd <sourceDir> && sudo make altinstall`
 */
export class InstallError extends Data.TaggedError("InstallError")<{
	readonly command: string;
	readonly reason: string;
}> {}

/**
 * An external command could not be spawned at all.
 *
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Union of every error that aborts the pipeline.
 *
 * @invariant InstallError is absent: the orchestrator converts it to guidance
 */
export type PipelineError =
	| ArgumentError
	| AttributionError
	| DownloadError
	| ConfigurationQueryError
	| ConfigurationError
	| MakeError;
