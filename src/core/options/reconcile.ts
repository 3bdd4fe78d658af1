// CHANGE: Option reconciler: inherited options + policies + include/exclude → final set
// WHY: Single pure function owns the precedence rules; shell only reports notices
// REF: REQ-RECONCILE
// FORMAT THEOREM: ∀ t ∈ exclude: t ∉ reconcile(x).options
// PURITY: CORE
// INVARIANT: optimizations ⇒ both optimization flags enabled unless excluded, no negated form; ¬optimizations ⇒ no form of either
// INVARIANT: result ⊆ (inherited ∪ policy ∪ include) \ exclude
// COMPLEXITY: O(n + m) where n = |inherited|, m = |include| + |exclude|

import type { OptionSet } from "../models.js";
import {
	DISABLED_VALUE,
	ENSUREPIP_DISABLED,
	ENSUREPIP_FLAG,
	OPTIMIZATION_FLAGS,
	OPTIMIZATION_SWITCHES,
	SKIP_PIP_FLAG,
} from "./flags.js";
import {
	addOptions,
	excludeOptions,
	isExcludedBy,
	optionName,
	removeWhere,
	toOptionSet,
} from "./option-set.js";

/**
 * Inputs of the reconciler.
 *
 * @property inherited Options reported by the source interpreter (empty for no inheritance)
 * @property optimizations LTO + PGO policy
 * @property pip Bundled package manager policy
 */
export interface ReconcileInput {
	readonly inherited: OptionSet;
	readonly optimizations: boolean;
	readonly pip: boolean;
	readonly include: ReadonlyArray<string>;
	readonly exclude: ReadonlyArray<string>;
}

/**
 * Something the user asked for that the reconciler did not honor.
 */
export type ReconcileNotice =
	| {
			readonly kind: "policy-conflict";
			readonly token: string;
			readonly policy: "optimizations" | "pip";
	  }
	| { readonly kind: "exclude-overrides-include"; readonly token: string };

export interface ReconcileResult {
	readonly options: OptionSet;
	readonly notices: ReadonlyArray<ReconcileNotice>;
}

/**
 * Which optimization flag an option turns on or off.
 */
export interface OptimizationStance {
	readonly flag: string;
	readonly enables: boolean;
}

/**
 * Classifies `--with-lto`, `--with-lto=full`, `--without-lto`,
 * `--with-lto=no` and the `--enable-optimizations` counterparts.
 *
 * @pure true
 * @returns undefined for options unrelated to LTO/PGO
 */
export const optimizationStance = (
	option: string,
): OptimizationStance | undefined => {
	const name = optionName(option);
	for (const { flag, negated } of OPTIMIZATION_SWITCHES) {
		if (name === negated) return { flag, enables: false };
		if (name === flag) {
			return { flag, enables: option !== `${flag}=${DISABLED_VALUE}` };
		}
	}
	return undefined;
};

const isOptimizationFlag = (option: string): boolean =>
	optimizationStance(option) !== undefined;

const disablesOptimization = (option: string): boolean =>
	optimizationStance(option)?.enables === false;

/**
 * True when some option of the set turns `flag` on.
 *
 * @pure true
 */
export const enablesOptimization = (set: OptionSet, flag: string): boolean =>
	set.some((option) => {
		const stance = optimizationStance(option);
		return stance !== undefined && stance.flag === flag && stance.enables;
	});

const isEnsurepipEnabling = (option: string): boolean =>
	optionName(option) === ENSUREPIP_FLAG && option !== ENSUREPIP_DISABLED;

const disablesPip = (option: string): boolean =>
	option === SKIP_PIP_FLAG || option === ENSUREPIP_DISABLED;

/**
 * Add-both-or-remove-both for LTO/PGO.
 *
 * @pure true
 * @postcondition enabled ⇒ ∀ f ∈ OPTIMIZATION_FLAGS: enablesOptimization(result, f) ∧ no negated form in result
 * @postcondition ¬enabled ⇒ ∀ o ∈ result: ¬isOptimizationFlag(o)
 */
export const applyOptimizationPolicy = (
	set: OptionSet,
	enabled: boolean,
): OptionSet => {
	if (!enabled) return removeWhere(set, isOptimizationFlag);
	const kept = removeWhere(set, disablesOptimization);
	return addOptions(
		kept,
		OPTIMIZATION_FLAGS.filter((flag) => !enablesOptimization(kept, flag)),
	);
};

/**
 * Add or remove the skip-package-manager flag.
 *
 * @pure true
 * @postcondition enabled ⇒ ∀ o ∈ result: ¬disablesPip(o)
 * @postcondition ¬enabled ⇒ SKIP_PIP_FLAG ∈ result ∧ no `--with-ensurepip*` in result
 */
export const applyPipPolicy = (set: OptionSet, enabled: boolean): OptionSet =>
	enabled
		? removeWhere(set, disablesPip)
		: addOptions(
				removeWhere(set, (option) => optionName(option) === ENSUREPIP_FLAG),
				[SKIP_PIP_FLAG],
			);

/**
 * Policy that an included token contradicts, if any.
 *
 * @pure true
 */
const conflictingPolicy = (
	token: string,
	input: ReconcileInput,
): "optimizations" | "pip" | undefined => {
	if (!input.optimizations && isOptimizationFlag(token)) return "optimizations";
	if (input.optimizations && disablesOptimization(token)) return "optimizations";
	if (input.pip && disablesPip(token)) return "pip";
	if (!input.pip && isEnsurepipEnabling(token)) return "pip";
	return undefined;
};

/**
 * Union of accepted include tokens. An included variant of an optimization
 * flag (`--with-lto=thin`) replaces the policy default.
 *
 * @pure true
 */
const applyInclude = (
	set: OptionSet,
	accepted: ReadonlyArray<string>,
): OptionSet => {
	const overridden = new Set(
		accepted.flatMap((token) => {
			const stance = optimizationStance(token);
			return stance === undefined ? [] : [stance.flag];
		}),
	);
	const base = removeWhere(set, (option) => {
		const stance = optimizationStance(option);
		return (
			stance !== undefined &&
			overridden.has(stance.flag) &&
			!accepted.includes(option)
		);
	});
	return addOptions(base, accepted);
};

/**
 * Computes the final configure option set.
 *
 * Steps, in order: inherited \ exclude → optimization policy → pip policy →
 * include → exclude. Excluding inherited options first lets the policy
 * re-add its plain flag when only a variant (`--with-lto=full`) was excluded.
 *
 * @param input - Inherited options, policies and user overrides
 * @returns Final option set plus notices for ignored user input
 *
 * @pure true
 * @invariant exclude dominates include, policy and inheritance; a bare exclude token also removes its valued variants
 * @invariant policy dominates include
 * @complexity O(n + m)
 *
 * @example
 * ```ts
 * reconcileOptions({
 *   inherited: ["--with-x"],
 *   optimizations: true,
 *   pip: true,
 *   include: [],
 *   exclude: [],
 * }).options;
 * // ["--with-x", "--with-lto", "--enable-optimizations"]
 * ```
 */
export const reconcileOptions = (input: ReconcileInput): ReconcileResult => {
	const notices: ReconcileNotice[] = [];
	const excluded = new Set(input.exclude);

	const accepted: string[] = [];
	for (const token of toOptionSet(input.include)) {
		const policy = conflictingPolicy(token, input);
		if (policy !== undefined) {
			notices.push({ kind: "policy-conflict", token, policy });
		} else if (isExcludedBy(token, excluded)) {
			notices.push({ kind: "exclude-overrides-include", token });
		} else {
			accepted.push(token);
		}
	}

	const inherited = excludeOptions(toOptionSet(input.inherited), excluded);
	const optimized = applyOptimizationPolicy(inherited, input.optimizations);
	const withPip = applyPipPolicy(optimized, input.pip);
	const included = applyInclude(withPip, accepted);
	const options = excludeOptions(included, excluded);

	return { options, notices };
};
