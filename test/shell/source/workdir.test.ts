// CHANGE: Specs for the scoped working directory
// PURITY: SHELL (real temp directories)
// INVARIANT: Ephemeral directories disappear when the scope closes, unless kept

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { acquireWorkDir, type WorkDir } from "../../../src/shell/source/workdir.js";
import { createTempDir, type TempDir } from "../../utils/tempDir.js";

describe("acquireWorkDir", () => {
	let temp: TempDir;

	beforeEach(() => {
		temp = createTempDir();
	});

	afterEach(() => {
		temp.cleanup();
	});

	it("removes an ephemeral directory when the scope succeeds", async () => {
		const workDir = await Effect.runPromise(
			Effect.scoped(
				acquireWorkDir(undefined).pipe(
					Effect.tap((dir) =>
						Effect.sync(() => {
							expect(fs.existsSync(dir.path)).toBe(true);
						}),
					),
				),
			),
		);
		expect(workDir.ephemeral).toBe(true);
		expect(path.basename(workDir.path).startsWith("py-altbuild-")).toBe(true);
		expect(fs.existsSync(workDir.path)).toBe(false);
	});

	it("removes an ephemeral directory when the scope fails", async () => {
		let acquired: WorkDir | undefined;
		const result = await Effect.runPromise(
			Effect.either(
				Effect.scoped(
					acquireWorkDir(undefined).pipe(
						Effect.tap((dir) =>
							Effect.sync(() => {
								acquired = dir;
							}),
						),
						Effect.flatMap(() => Effect.fail("stage failed")),
					),
				),
			),
		);
		expect(Either.isLeft(result)).toBe(true);
		expect(acquired).toBeDefined();
		if (acquired !== undefined) {
			expect(fs.existsSync(acquired.path)).toBe(false);
		}
	});

	it("keeps an ephemeral directory marked with keep()", async () => {
		const workDir = await Effect.runPromise(
			Effect.scoped(
				acquireWorkDir(undefined).pipe(Effect.tap((dir) => Effect.sync(dir.keep))),
			),
		);
		expect(workDir.isKept()).toBe(true);
		expect(fs.existsSync(workDir.path)).toBe(true);
		fs.rmSync(workDir.path, { recursive: true, force: true });
	});

	it("creates and never removes a user directory", async () => {
		const requested = path.join(temp.dir, "nested", "build");
		const workDir = await Effect.runPromise(
			Effect.scoped(acquireWorkDir(requested)),
		);
		expect(workDir.ephemeral).toBe(false);
		expect(workDir.path).toBe(requested);
		expect(fs.existsSync(requested)).toBe(true);
	});

	it("fails when the user directory cannot be created", async () => {
		const blocker = path.join(temp.dir, "file");
		fs.writeFileSync(blocker, "");
		const result = await Effect.runPromise(
			Effect.either(Effect.scoped(acquireWorkDir(path.join(blocker, "build")))),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("DownloadError");
			expect(result.left.url).toBe(path.join(blocker, "build"));
		}
	});
});
