// CHANGE: Ordered set operations over configure flags
// PURITY: CORE
// INVARIANT: ∀ result: result has no duplicates ∧ keeps first-seen order
// COMPLEXITY: O(n + m) per operation

import type { OptionSet } from "../models.js";

/**
 * Flag name of an option: the part before `=`.
 *
 * @example
 * ```ts
 * optionName("--with-lto=full"); // "--with-lto"
 * optionName("CFLAGS=-O2 -g");  // "CFLAGS"
 * ```
 *
 * @pure true
 */
export const optionName = (option: string): string => {
	const eq = option.indexOf("=");
	return eq === -1 ? option : option.slice(0, eq);
};

/**
 * Drops duplicates, keeping the first occurrence.
 *
 * @pure true
 */
export const toOptionSet = (options: Iterable<string>): OptionSet => [
	...new Set(options),
];

/**
 * Appends options not yet present.
 *
 * @pure true
 * @postcondition ∀ o ∈ added: o ∈ result
 */
export const addOptions = (
	set: OptionSet,
	added: Iterable<string>,
): OptionSet => toOptionSet([...set, ...added]);

/**
 * Removes every option matched by the predicate.
 *
 * @pure true
 */
export const removeWhere = (
	set: OptionSet,
	predicate: (option: string) => boolean,
): OptionSet => set.filter((option) => !predicate(option));

/**
 * True when an exclude token names the option. A token without `=` matches
 * every valued variant (`--with-lto` matches `--with-lto=full`); a token
 * with `=` matches only itself.
 *
 * @pure true
 */
export const isExcludedBy = (
	option: string,
	excluded: ReadonlySet<string>,
): boolean =>
	excluded.has(option) ||
	(option.includes("=") && excluded.has(optionName(option)));

/**
 * Removes every option named by an exclude token; absent ones are ignored.
 *
 * @pure true
 * @postcondition ∀ t ∈ excluded: t ∉ result
 */
export const excludeOptions = (
	set: OptionSet,
	excluded: ReadonlySet<string>,
): OptionSet => removeWhere(set, (option) => isExcludedBy(option, excluded));
