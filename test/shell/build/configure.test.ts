// CHANGE: Specs for the resilient configure loop against an in-process runner
// FORMAT THEOREM: attempts ≤ max(1, |initial|); removed ∪ final = initial
// PURITY: SHELL (fake runner, no processes)
// INVARIANT: Exactly one runner call per attempt
// COMPLEXITY: O(n) per test

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { ExecError } from "../../../src/core/errors.js";
import { configureWithRetry } from "../../../src/shell/build/configure.js";
import { failed, fakeRunner, ok } from "../../utils/fakeRunner.js";

const SOURCE_DIR = "/build/Python-3.8.2";

const rejecting = (option: string) =>
	failed(1, `configure: error: unrecognized option: \`${option}'\n`);

describe("configureWithRetry", () => {
	it("runs configure once when the first attempt succeeds", async () => {
		const runner = fakeRunner(() => ok("creating Makefile\n"));
		const outcome = await Effect.runPromise(
			configureWithRetry(runner, {
				sourceDir: SOURCE_DIR,
				command: "./configure",
				options: ["--with-x", "--with-lto"],
			}),
		);
		expect(outcome).toEqual({
			options: ["--with-x", "--with-lto"],
			removed: [],
			attempts: 1,
		});
		expect(runner.calls).toEqual([
			{
				command: "./configure",
				args: ["--with-x", "--with-lto"],
				cwd: SOURCE_DIR,
				capture: true,
			},
		]);
	});

	it("drops a rejected option and succeeds on the second attempt", async () => {
		const runner = fakeRunner((spec) =>
			spec.args.includes("--with-foo") ? rejecting("--with-foo") : ok(),
		);
		const outcome = await Effect.runPromise(
			configureWithRetry(runner, {
				sourceDir: SOURCE_DIR,
				command: "./configure",
				options: ["--with-x", "--with-foo", "--with-lto"],
			}),
		);
		expect(outcome).toEqual({
			options: ["--with-x", "--with-lto"],
			removed: ["--with-foo"],
			attempts: 2,
		});
		expect(runner.calls.map((call) => call.args)).toEqual([
			["--with-x", "--with-foo", "--with-lto"],
			["--with-x", "--with-lto"],
		]);
	});

	it("stops on an unparseable diagnostic without removing anything", async () => {
		const runner = fakeRunner(() =>
			failed(1, "checking for gcc... no\nconfigure: error: no acceptable C compiler found\n"),
		);
		const result = await Effect.runPromise(
			Effect.either(
				configureWithRetry(runner, {
					sourceDir: SOURCE_DIR,
					command: "./configure",
					options: ["--with-x"],
				}),
			),
		);
		expect(runner.calls).toHaveLength(1);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("ConfigurationError");
			expect(result.left.reason).toBe("configure exited with status 1");
			expect(result.left.options).toEqual(["--with-x"]);
			expect(result.left.removed).toEqual([]);
			expect(result.left.diagnostic).toBe(
				"checking for gcc... no\nconfigure: error: no acceptable C compiler found",
			);
		}
	});

	it("terminates within |options| attempts when every option is rejected", async () => {
		const runner = fakeRunner((spec) => rejecting(spec.args[0] ?? ""));
		const result = await Effect.runPromise(
			Effect.either(
				configureWithRetry(runner, {
					sourceDir: SOURCE_DIR,
					command: "./configure",
					options: ["--a", "--b", "--c"],
				}),
			),
		);
		expect(runner.calls.map((call) => call.args.length)).toEqual([3, 2, 1]);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.reason).toBe(
				"configure rejected --c and no options remain",
			);
			expect(result.left.removed).toEqual(["--a", "--b"]);
			expect(result.left.options).toEqual(["--c"]);
		}
	});

	it("still configures an empty option set once", async () => {
		const runner = fakeRunner(() => ok());
		const outcome = await Effect.runPromise(
			configureWithRetry(runner, {
				sourceDir: SOURCE_DIR,
				command: "./configure",
				options: [],
			}),
		);
		expect(outcome.attempts).toBe(1);
		expect(runner.calls[0]?.args).toEqual([]);
	});

	it("reports a configure script that cannot be started", async () => {
		const runner = fakeRunner(
			() =>
				new ExecError({ command: "./configure", detail: "spawn ./configure ENOENT" }),
		);
		const result = await Effect.runPromise(
			Effect.either(
				configureWithRetry(runner, {
					sourceDir: SOURCE_DIR,
					command: "./configure",
					options: ["--with-x"],
				}),
			),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.reason).toBe(
				"cannot run ./configure: spawn ./configure ENOENT",
			);
		}
	});
});
