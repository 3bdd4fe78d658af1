// CHANGE: Spawn-backed CommandRunner in Effect style
// WHY: configure needs exit status plus output; make needs the terminal; both go through one runner
// REF: REQ-PIPELINE-COLLABORATORS
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<CommandResult, ExecError>
// INVARIANT: ∀ spec: run(spec) → CommandResult (process exited) ∨ ExecError (process never started)
// COMPLEXITY: O(n) space where n = captured output length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import type {
	CommandResult,
	CommandRunner,
	CommandSpec,
} from "../../core/types/index.js";
import { formatCommand } from "../../core/types/index.js";
import { spawn } from "./node-mods.js";

/**
 * Exit code reported for a process killed by a signal.
 */
export const SIGNAL_EXIT_CODE = 128;

/**
 * Runs an external command to completion.
 *
 * @param spec - Command, arguments, working directory and capture mode
 * @returns Effect with exit status and captured output, or ExecError when spawning fails
 *
 * @pure false (spawns a process)
 * @effect Effect<CommandResult, ExecError>
 * @invariant capture = false → stdout = stderr = ""
 * @complexity O(n) where n = process runtime
 */
export function runCommand(
	spec: CommandSpec,
): Effect.Effect<CommandResult, ExecError> {
	return Effect.async<CommandResult, ExecError>((resume) => {
		const child = spawn(spec.command, [...spec.args], {
			cwd: spec.cwd,
			stdio: spec.capture ? ["ignore", "pipe", "pipe"] : "inherit",
		});

		// INVARIANT: resume is called once; "close" may follow "error"
		let settled = false;
		let stdout = "";
		let stderr = "";
		child.stdout?.setEncoding("utf8");
		child.stderr?.setEncoding("utf8");
		child.stdout?.on("data", (chunk: string) => {
			stdout += chunk;
		});
		child.stderr?.on("data", (chunk: string) => {
			stderr += chunk;
		});

		child.once("error", (error) => {
			if (settled) return;
			settled = true;
			resume(
				Effect.fail(
					new ExecError({
						command: formatCommand(spec),
						detail: error.message,
					}),
				),
			);
		});
		child.once("close", (code, signal) => {
			if (settled) return;
			settled = true;
			const exitCode = code ?? (signal === null ? 1 : SIGNAL_EXIT_CODE);
			resume(Effect.succeed({ exitCode, stdout, stderr }));
		});
	});
}

/**
 * Default runner used by the CLI.
 */
export const nodeCommandRunner: CommandRunner = { run: runCommand };
