// CHANGE: Version parsing and source archive naming
// PURITY: CORE
// INVARIANT: release = `${major}.${minor}.${patch}`; raw = release + (preRelease ?? "")
// COMPLEXITY: O(1)

import { Either } from "effect";

import { ArgumentError } from "../errors.js";
import type { InterpreterVersion } from "../models.js";

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)((?:a|b|rc)\d+)?$/u;

/**
 * Parses a full dotted version with an optional pre-release tag.
 *
 * @example
 * ```ts
 * parseVersion("3.12.0rc1");
 * // Right({ raw: "3.12.0rc1", release: "3.12.0", major: 3, minor: 12, patch: 0, preRelease: "rc1" })
 * parseVersion("3.8"); // Left(ArgumentError)
 * ```
 *
 * @pure true
 */
export function parseVersion(
	raw: string,
): Either.Either<InterpreterVersion, ArgumentError> {
	const match = VERSION_PATTERN.exec(raw);
	if (match === null) {
		return Either.left(
			new ArgumentError({
				detail: `invalid version "${raw}": expected a full version such as 3.8.2`,
			}),
		);
	}
	const major = Number(match[1]);
	const minor = Number(match[2]);
	const patch = Number(match[3]);
	return Either.right({
		raw,
		release: `${major}.${minor}.${patch}`,
		major,
		minor,
		patch,
		preRelease: match[4],
	});
}

/**
 * Name of the extracted source directory, `Python-3.8.2`.
 *
 * @pure true
 */
export const sourceDirName = (version: InterpreterVersion): string =>
	`Python-${version.raw}`;

/**
 * Name of the downloaded archive, `Python-3.8.2.tgz`.
 *
 * @pure true
 */
export const archiveName = (version: InterpreterVersion): string =>
	`${sourceDirName(version)}.tgz`;

/**
 * Archive location on the mirror; pre-releases live under the release directory.
 *
 * @example
 * ```ts
 * archiveUrl(v("3.12.0rc1"), "https://www.python.org/ftp/python/");
 * // "https://www.python.org/ftp/python/3.12.0/Python-3.12.0rc1.tgz"
 * ```
 *
 * @pure true
 */
export const archiveUrl = (
	version: InterpreterVersion,
	mirror: string,
): string =>
	`${mirror.replace(/\/+$/u, "")}/${version.release}/${archiveName(version)}`;
