// CHANGE: Specs for source acquisition with a fake downloader and a fake tar
// PURITY: SHELL (real temp directory, no network, no processes)
// INVARIANT: An extracted tree is reused without downloading

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DownloadError } from "../../../src/core/errors.js";
import { parseVersion } from "../../../src/core/source/version.js";
import { type Downloader, ensureSource } from "../../../src/shell/source/fetch.js";
import { failed, fakeRunner, ok } from "../../utils/fakeRunner.js";
import { createTempDir, type TempDir, writeSourceTree } from "../../utils/tempDir.js";

const version = Either.getOrThrow(parseVersion("3.8.2"));
const MIRROR = "https://mirror.example/python";
const URL = "https://mirror.example/python/3.8.2/Python-3.8.2.tgz";

const recordingDownloader = (): { download: Downloader; urls: string[] } => {
	const urls: string[] = [];
	const download: Downloader = (url, destination) =>
		Effect.sync(() => {
			urls.push(url);
			fs.writeFileSync(destination, "archive-bytes");
		});
	return { download, urls };
};

describe("ensureSource", () => {
	let temp: TempDir;

	beforeEach(() => {
		temp = createTempDir();
	});

	afterEach(() => {
		temp.cleanup();
	});

	it("reuses an already extracted tree", async () => {
		const sourceDir = writeSourceTree(temp.dir, "Python-3.8.2");
		const runner = fakeRunner(() => ok());
		const { download, urls } = recordingDownloader();

		const result = await Effect.runPromise(
			ensureSource({ runner, download }, { version, directory: temp.dir, mirror: MIRROR }),
		);

		expect(result).toBe(sourceDir);
		expect(urls).toEqual([]);
		expect(runner.calls).toEqual([]);
	});

	it("downloads and extracts the archive into the directory", async () => {
		const archive = path.join(temp.dir, "Python-3.8.2.tgz");
		const runner = fakeRunner(() => {
			writeSourceTree(temp.dir, "Python-3.8.2");
			return ok();
		});
		const { download, urls } = recordingDownloader();

		const result = await Effect.runPromise(
			ensureSource({ runner, download }, { version, directory: temp.dir, mirror: MIRROR }),
		);

		expect(result).toBe(path.join(temp.dir, "Python-3.8.2"));
		expect(urls).toEqual([URL]);
		expect(fs.readFileSync(archive, "utf8")).toBe("archive-bytes");
		expect(fs.existsSync(`${archive}.part`)).toBe(false);
		expect(runner.calls).toEqual([
			{ command: "tar", args: ["-xzf", archive, "-C", temp.dir], capture: true },
		]);
	});

	it("skips the download when the archive is already present", async () => {
		fs.writeFileSync(path.join(temp.dir, "Python-3.8.2.tgz"), "cached");
		const runner = fakeRunner(() => {
			writeSourceTree(temp.dir, "Python-3.8.2");
			return ok();
		});
		const { download, urls } = recordingDownloader();

		await Effect.runPromise(
			ensureSource({ runner, download }, { version, directory: temp.dir, mirror: MIRROR }),
		);

		expect(urls).toEqual([]);
		expect(runner.calls).toHaveLength(1);
	});

	it("propagates a failed download without extracting", async () => {
		const runner = fakeRunner(() => ok());
		const download: Downloader = (url) =>
			Effect.fail(new DownloadError({ url, reason: "HTTP 404 Not Found" }));

		const result = await Effect.runPromise(
			Effect.either(
				ensureSource({ runner, download }, { version, directory: temp.dir, mirror: MIRROR }),
			),
		);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.url).toBe(URL);
			expect(result.left.reason).toBe("HTTP 404 Not Found");
		}
		expect(runner.calls).toEqual([]);
		expect(fs.existsSync(path.join(temp.dir, "Python-3.8.2.tgz"))).toBe(false);
	});

	it("fails when tar exits with an error", async () => {
		const archive = path.join(temp.dir, "Python-3.8.2.tgz");
		const runner = fakeRunner(() => failed(2, "gzip: stdin: not in gzip format\n"));
		const { download } = recordingDownloader();

		const result = await Effect.runPromise(
			Effect.either(
				ensureSource({ runner, download }, { version, directory: temp.dir, mirror: MIRROR }),
			),
		);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.reason).toBe(
				`extracting ${archive} failed: gzip: stdin: not in gzip format`,
			);
		}
	});

	it("fails when the archive does not contain the expected tree", async () => {
		const archive = path.join(temp.dir, "Python-3.8.2.tgz");
		const runner = fakeRunner(() => ok());
		const { download } = recordingDownloader();

		const result = await Effect.runPromise(
			Effect.either(
				ensureSource({ runner, download }, { version, directory: temp.dir, mirror: MIRROR }),
			),
		);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.reason).toBe(
				`${archive} did not unpack to ${path.join(temp.dir, "Python-3.8.2")}`,
			);
		}
	});
});
