import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	archiveName,
	archiveUrl,
	parseVersion,
	sourceDirName,
} from "../../../src/core/source/version.js";

const version = (raw: string) => Either.getOrThrow(parseVersion(raw));

describe("parseVersion", () => {
	it("parses a full dotted version", () => {
		expect(version("3.8.2")).toEqual({
			raw: "3.8.2",
			release: "3.8.2",
			major: 3,
			minor: 8,
			patch: 2,
			preRelease: undefined,
		});
	});

	it("splits off a pre-release tag", () => {
		const v = version("3.12.0rc1");
		expect(v.release).toBe("3.12.0");
		expect(v.preRelease).toBe("rc1");
	});

	it.each(["3.8", "3", "3.8.x", "v3.8.2", "3.8.2-dev", ""])(
		"rejects %j",
		(raw) => {
			const result = parseVersion(raw);
			expect(Either.isLeft(result)).toBe(true);
			if (Either.isLeft(result)) {
				expect(result.left.detail).toBe(
					`invalid version "${raw}": expected a full version such as 3.8.2`,
				);
			}
		},
	);
});

describe("archive naming", () => {
	it("names the source directory and archive after the full version", () => {
		expect(sourceDirName(version("3.8.2"))).toBe("Python-3.8.2");
		expect(archiveName(version("3.8.2"))).toBe("Python-3.8.2.tgz");
	});

	it("places pre-releases under the release directory of the mirror", () => {
		expect(
			archiveUrl(version("3.12.0rc1"), "https://mirror.example/python/"),
		).toBe("https://mirror.example/python/3.12.0/Python-3.12.0rc1.tgz");
	});
});
