// CHANGE: Policy-controlled configure flags
// PURITY: CORE
// INVARIANT: Optimization flags are always handled as a pair
// COMPLEXITY: O(1)

/** Link-time optimization. */
export const LTO_FLAG = "--with-lto";

/** Profile-guided optimization. */
export const PGO_FLAG = "--enable-optimizations";

export const OPTIMIZATION_FLAGS: ReadonlyArray<string> = [LTO_FLAG, PGO_FLAG];

/**
 * An optimization flag with its negated spelling. autoconf also reads
 * `<flag>=no` as the negated form.
 */
export interface OptimizationSwitch {
	readonly flag: string;
	readonly negated: string;
}

export const OPTIMIZATION_SWITCHES: ReadonlyArray<OptimizationSwitch> = [
	{ flag: LTO_FLAG, negated: "--without-lto" },
	{ flag: PGO_FLAG, negated: "--disable-optimizations" },
];

/** Value that turns `--with-X=` / `--enable-X=` into its negation. */
export const DISABLED_VALUE = "no";

/** Skips installing the bundled package manager. */
export const SKIP_PIP_FLAG = "--without-ensurepip";

/** `--with-ensurepip[=install|upgrade|no]` */
export const ENSUREPIP_FLAG = "--with-ensurepip";

/** Spelling of "no pip" in the `--with-ensurepip=` form. */
export const ENSUREPIP_DISABLED = "--with-ensurepip=no";
