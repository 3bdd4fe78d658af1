#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// REF: Architecture plan (FCIS)
// FORMAT THEOREM: ∀run ∈ App: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../main.js";
import { readEnvironment } from "../shell/config/index.js";

/**
 * CLI entry point for py-altbuild.
 *
 * @remarks
 * - @pure false (contains side effects: process termination and console I/O)
 * - @invariant exit code is 0 when the interpreter was built (installed or pending manual install), otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(
			main(process.argv.slice(2), readEnvironment(process.env)),
		);
		process.exit(code);
	} catch (error) {
		// Shell boundary: defects only; typed failures are reported by APP
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
