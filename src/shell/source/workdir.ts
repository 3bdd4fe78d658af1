// CHANGE: Scoped working directory (ephemeral temp dir or user directory)
// WHY: The pipeline owns the directory for the whole run and must release it on every exit path
// REF: REQ-WORKDIR-SCOPE
// PURITY: SHELL (filesystem)
// EFFECT: Effect<WorkDir, DownloadError, Scope>
// INVARIANT: User directories are never deleted
// INVARIANT: Ephemeral directories are removed on success, failure and interruption, unless the run asks to keep them
// COMPLEXITY: O(1) + O(n) removal where n = files in the tree

import { Console, Effect } from "effect";

import { DownloadError } from "../../core/errors.js";
import { fsp, os, path } from "../utils/node-mods.js";

export const TEMP_PREFIX = "py-altbuild-";

/**
 * Acquired working directory.
 *
 * @property ephemeral true when created by the run and removed at release
 * @property keep Marks an ephemeral directory to survive release
 */
export interface WorkDir {
	readonly path: string;
	readonly ephemeral: boolean;
	readonly keep: () => void;
	readonly isKept: () => boolean;
}

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

const makeWorkDir = (dir: string, ephemeral: boolean): WorkDir => {
	let kept = false;
	return {
		path: dir,
		ephemeral,
		keep: () => {
			kept = true;
		},
		isKept: () => kept,
	};
};

/**
 * Creates (or reuses) the working directory.
 *
 * @pure false (filesystem)
 */
function createWorkDir(
	requested: string | undefined,
): Effect.Effect<WorkDir, DownloadError> {
	if (requested === undefined) {
		return Effect.tryPromise({
			try: () => fsp.mkdtemp(path.join(os.tmpdir(), TEMP_PREFIX)),
			catch: (error) =>
				new DownloadError({
					url: os.tmpdir(),
					reason: `cannot create temporary directory: ${errorMessage(error)}`,
				}),
		}).pipe(Effect.map((dir) => makeWorkDir(dir, true)));
	}
	const dir = path.resolve(requested);
	return Effect.tryPromise({
		try: () => fsp.mkdir(dir, { recursive: true }),
		catch: (error) =>
			new DownloadError({
				url: dir,
				reason: `cannot create directory: ${errorMessage(error)}`,
			}),
	}).pipe(Effect.map(() => makeWorkDir(dir, false)));
}

/**
 * Removes an ephemeral directory; a failed removal is reported, not raised.
 *
 * @pure false (filesystem, console)
 */
function releaseWorkDir(workDir: WorkDir): Effect.Effect<void> {
	if (!workDir.ephemeral) return Effect.void;
	if (workDir.isKept()) {
		return Console.log(`📁 Keeping build directory ${workDir.path}`);
	}
	return Effect.tryPromise({
		try: () => fsp.rm(workDir.path, { recursive: true, force: true }),
		catch: errorMessage,
	}).pipe(
		Effect.catchAll((reason) =>
			Console.error(`⚠️  Could not remove ${workDir.path}: ${reason}`),
		),
	);
}

/**
 * Acquires the working directory for the enclosing scope.
 *
 * @param requested - `--directory` value; undefined for an ephemeral temp dir
 *
 * @pure false
 * @effect Effect<WorkDir, DownloadError, Scope>
 */
export const acquireWorkDir = (requested: string | undefined) =>
	Effect.acquireRelease(createWorkDir(requested), releaseWorkDir);
