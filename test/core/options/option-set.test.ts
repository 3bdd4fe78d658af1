import { describe, expect, it } from "vitest";

import {
	addOptions,
	excludeOptions,
	isExcludedBy,
	optionName,
	toOptionSet,
} from "../../../src/core/options/option-set.js";

describe("option-set", () => {
	it("optionName strips the value part", () => {
		expect(optionName("--with-lto=full")).toBe("--with-lto");
		expect(optionName("--enable-shared")).toBe("--enable-shared");
		expect(optionName("CFLAGS=-O2 -g")).toBe("CFLAGS");
	});

	it("toOptionSet keeps the first occurrence", () => {
		expect(toOptionSet(["--b", "--a", "--b"])).toEqual(["--b", "--a"]);
	});

	it("addOptions appends only new options", () => {
		expect(addOptions(["--a"], ["--a", "--b"])).toEqual(["--a", "--b"]);
	});

	it("excludeOptions removes valued variants of a bare token", () => {
		expect(
			excludeOptions(
				["--with-lto=full", "CFLAGS=-O2 -g", "--a"],
				new Set(["--with-lto", "CFLAGS"]),
			),
		).toEqual(["--a"]);
	});

	it("excludeOptions matches a valued token exactly", () => {
		expect(
			excludeOptions(
				["--with-lto=full", "--with-lto=thin", "--with-lto"],
				new Set(["--with-lto=full"]),
			),
		).toEqual(["--with-lto=thin", "--with-lto"]);
	});

	it("isExcludedBy does not match on a shared prefix", () => {
		expect(isExcludedBy("--with-ltox", new Set(["--with-lto"]))).toBe(false);
		expect(isExcludedBy("--with-lto", new Set(["--with-lto=full"]))).toBe(false);
	});
});
