// CHANGE: Build and install drivers (make -jN, make altinstall)
// PURITY: SHELL (runs make with the terminal attached)
// EFFECT: Effect<void, MakeError> | Effect<void, InstallError>
// INVARIANT: install never overwrites the default interpreter (altinstall only)
// COMPLEXITY: O(1) spawns

import { Effect } from "effect";

import { InstallError, MakeError } from "../../core/errors.js";
import type { CommandRunner } from "../../core/types/index.js";

export const MAKE = "make";
export const INSTALL_TARGET = "altinstall";

const SHELL_SAFE = /^[\w@%+=:,./-]+$/u;

/**
 * POSIX single-quoting; words made only of safe characters stay bare.
 *
 * @pure true
 * @example
 * ```ts
 * shellQuote("/tmp/My Builds"); // "'/tmp/My Builds'"
 * shellQuote("/tmp/it's");      // "'/tmp/it'\\''s'"
 * ```
 */
export const shellQuote = (word: string): string =>
	SHELL_SAFE.test(word) ? word : `'${word.replaceAll("'", "'\\''")}'`;

/**
 * Command to run by hand when the install step lacks privileges.
 *
 * @pure true
 */
export const remediationCommand = (sourceDir: string): string =>
	`cd ${shellQuote(sourceDir)} && sudo ${MAKE} ${INSTALL_TARGET}`;

/**
 * Builds the configured tree with `threads` parallel jobs.
 *
 * @pure false (spawns make)
 * @effect Effect<void, MakeError>
 */
export function runMake(
	runner: CommandRunner,
	request: { readonly sourceDir: string; readonly threads: number },
): Effect.Effect<void, MakeError> {
	const { sourceDir, threads } = request;
	return runner
		.run({
			command: MAKE,
			args: [`-j${threads}`],
			cwd: sourceDir,
			capture: false,
		})
		.pipe(
			Effect.mapError(
				(error) => new MakeError({ threads, reason: error.detail }),
			),
			Effect.flatMap((result) =>
				result.exitCode === 0
					? Effect.void
					: Effect.fail(
							new MakeError({
								threads,
								reason: `${MAKE} exited with status ${result.exitCode}`,
							}),
						),
			),
		);
}

/**
 * Installs the built tree side by side with the system interpreter.
 *
 * @returns InstallError carrying the manual command when make altinstall fails
 *
 * @pure false (spawns make)
 * @effect Effect<void, InstallError>
 */
export function runAltinstall(
	runner: CommandRunner,
	request: { readonly sourceDir: string },
): Effect.Effect<void, InstallError> {
	const command = remediationCommand(request.sourceDir);
	return runner
		.run({
			command: MAKE,
			args: [INSTALL_TARGET],
			cwd: request.sourceDir,
			capture: false,
		})
		.pipe(
			Effect.mapError(
				(error) => new InstallError({ command, reason: error.detail }),
			),
			Effect.flatMap((result) =>
				result.exitCode === 0
					? Effect.void
					: Effect.fail(
							new InstallError({
								command,
								reason: `${MAKE} ${INSTALL_TARGET} exited with status ${result.exitCode}`,
							}),
						),
			),
		);
}
