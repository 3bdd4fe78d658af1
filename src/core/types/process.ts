// CHANGE: Process execution contract shared by every external stage
// WHY: Stages depend on this interface; the shell provides the spawn-backed implementation
// REF: REQ-PIPELINE-COLLABORATORS
// PURITY: CORE (types only)
// INVARIANT: A completed process always yields a CommandResult; only spawn failures are errors
// COMPLEXITY: O(1)

import type { Effect } from "effect";

import type { ExecError } from "../errors.js";

/**
 * External command to run.
 *
 * @property capture true: collect stdout/stderr; false: inherit the terminal
 */
export interface CommandSpec {
	readonly command: string;
	readonly args: ReadonlyArray<string>;
	readonly cwd?: string;
	readonly capture: boolean;
}

/**
 * Finished process. stdout/stderr are empty when not captured.
 */
export interface CommandResult {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

export interface CommandRunner {
	readonly run: (spec: CommandSpec) => Effect.Effect<CommandResult, ExecError>;
}

/**
 * Renders a command for messages: `make -j4`.
 *
 * @pure true
 */
export const formatCommand = (spec: CommandSpec): string =>
	[spec.command, ...spec.args].join(" ");
