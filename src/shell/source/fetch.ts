// CHANGE: Source acquisition: download the release archive and unpack it with tar
// REF: REQ-SOURCE-FETCH
// PURITY: SHELL (network, filesystem, tar)
// EFFECT: Effect<string, DownloadError>
// INVARIANT: A tree that already holds a configure script is reused as is
// INVARIANT: A partially downloaded archive is never mistaken for a complete one
// COMPLEXITY: O(n) where n = archive size

import { Effect } from "effect";

import { DownloadError } from "../../core/errors.js";
import type { InterpreterVersion } from "../../core/models.js";
import {
	archiveName,
	archiveUrl,
	sourceDirName,
} from "../../core/source/version.js";
import type { CommandRunner } from "../../core/types/index.js";
import { fs, fsp, path } from "../utils/node-mods.js";

/**
 * Writes the resource at `url` to `destination`.
 */
export type Downloader = (
	url: string,
	destination: string,
) => Effect.Effect<void, DownloadError>;

export interface SourceRequest {
	readonly version: InterpreterVersion;
	readonly directory: string;
	readonly mirror: string;
}

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Downloads with the global fetch (Node.js 20).
 *
 * @pure false (network, filesystem)
 * @effect Effect<void, DownloadError>
 */
export const fetchDownloader: Downloader = (url, destination) =>
	Effect.tryPromise({
		try: async () => {
			const response = await fetch(url);
			if (!response.ok) {
				throw new Error(`HTTP ${response.status} ${response.statusText}`);
			}
			const body = Buffer.from(await response.arrayBuffer());
			await fsp.writeFile(destination, body);
		},
		catch: (error) => new DownloadError({ url, reason: errorMessage(error) }),
	});

const hasConfigureScript = (sourceDir: string): boolean =>
	fs.existsSync(path.join(sourceDir, "configure"));

/**
 * Downloads the archive unless it is already present.
 */
function ensureArchive(
	download: Downloader,
	url: string,
	archive: string,
): Effect.Effect<void, DownloadError> {
	if (fs.existsSync(archive)) return Effect.void;
	const partial = `${archive}.part`;
	return download(url, partial).pipe(
		Effect.flatMap(() =>
			Effect.tryPromise({
				try: () => fsp.rename(partial, archive),
				catch: (error) =>
					new DownloadError({ url, reason: errorMessage(error) }),
			}),
		),
	);
}

/**
 * Makes sure `<directory>/Python-<version>` holds an extracted source tree.
 *
 * @param services - Process runner (tar) and downloader
 * @param request - Version, target directory and mirror
 * @returns Absolute path of the source tree
 *
 * @pure false
 * @effect Effect<string, DownloadError>
 * @postcondition result/configure exists
 */
export function ensureSource(
	services: { readonly runner: CommandRunner; readonly download: Downloader },
	request: SourceRequest,
): Effect.Effect<string, DownloadError> {
	const sourceDir = path.resolve(
		request.directory,
		sourceDirName(request.version),
	);
	const url = archiveUrl(request.version, request.mirror);
	const archive = path.resolve(request.directory, archiveName(request.version));

	return Effect.gen(function* () {
		if (hasConfigureScript(sourceDir)) return sourceDir;

		yield* ensureArchive(services.download, url, archive);

		const result = yield* services.runner
			.run({
				command: "tar",
				args: ["-xzf", archive, "-C", request.directory],
				capture: true,
			})
			.pipe(
				Effect.mapError(
					(error) => new DownloadError({ url, reason: error.detail }),
				),
			);
		if (result.exitCode !== 0) {
			return yield* Effect.fail(
				new DownloadError({
					url,
					reason: `extracting ${archive} failed: ${result.stderr.trim()}`,
				}),
			);
		}
		if (!hasConfigureScript(sourceDir)) {
			return yield* Effect.fail(
				new DownloadError({
					url,
					reason: `${archive} did not unpack to ${sourceDir}`,
				}),
			);
		}
		return sourceDir;
	});
}
