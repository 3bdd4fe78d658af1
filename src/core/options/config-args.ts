// CHANGE: Tokenizer for the shell-quoted CONFIG_ARGS build variable
// WHY: sysconfig reports configure arguments as one string: `'--enable-shared' 'CFLAGS=-O2 -g'`
// REF: REQ-OPTION-SOURCE
// PURITY: CORE
// EFFECT: Either<ReadonlyArray<string>, string>
// INVARIANT: Quoted whitespace never splits a token
// COMPLEXITY: O(n) where n = |raw|

import { Either } from "effect";

type QuoteState = "none" | "single" | "double";

interface TokenizerState {
	readonly tokens: string[];
	current: string;
	inToken: boolean;
	quote: QuoteState;
	escaped: boolean;
}

const isWhitespace = (ch: string): boolean => /\s/u.test(ch);

/**
 * Consumes one character outside of any quotes.
 */
function stepUnquoted(state: TokenizerState, ch: string): void {
	if (ch === "\\") {
		state.escaped = true;
		state.inToken = true;
		return;
	}
	if (ch === "'") {
		state.quote = "single";
		state.inToken = true;
		return;
	}
	if (ch === '"') {
		state.quote = "double";
		state.inToken = true;
		return;
	}
	if (isWhitespace(ch)) {
		if (state.inToken) {
			state.tokens.push(state.current);
			state.current = "";
			state.inToken = false;
		}
		return;
	}
	state.current += ch;
	state.inToken = true;
}

/**
 * Consumes one character inside double quotes; only `\"`, `\\`, `\$` and `` \` `` escape.
 */
function stepDouble(state: TokenizerState, ch: string): void {
	if (ch === '"') {
		state.quote = "none";
		return;
	}
	if (ch === "\\") {
		state.escaped = true;
		return;
	}
	state.current += ch;
}

function stepEscaped(state: TokenizerState, ch: string): void {
	state.escaped = false;
	if (state.quote === "double" && !'"\\$`'.includes(ch)) {
		state.current += "\\";
	}
	state.current += ch;
}

/**
 * Splits a POSIX-shell-quoted argument string into tokens.
 *
 * @param raw - Value of `sysconfig.get_config_var('CONFIG_ARGS')`
 * @returns Right(tokens) or Left(description of the malformed input)
 *
 * @pure true
 * @invariant splitConfigArgs("") = Right([])
 * @complexity O(n)
 *
 * @example
 * ```ts
 * splitConfigArgs("'--with-lto' 'CFLAGS=-O2 -g'");
 * // Either.right(["--with-lto", "CFLAGS=-O2 -g"])
 * ```
 */
export function splitConfigArgs(
	raw: string,
): Either.Either<ReadonlyArray<string>, string> {
	const state: TokenizerState = {
		tokens: [],
		current: "",
		inToken: false,
		quote: "none",
		escaped: false,
	};

	for (const ch of raw) {
		if (state.escaped) {
			stepEscaped(state, ch);
		} else if (state.quote === "single") {
			if (ch === "'") state.quote = "none";
			else state.current += ch;
		} else if (state.quote === "double") {
			stepDouble(state, ch);
		} else {
			stepUnquoted(state, ch);
		}
	}

	if (state.quote !== "none") {
		return Either.left(`unterminated ${state.quote} quote in: ${raw}`);
	}
	if (state.escaped) {
		return Either.left(`trailing backslash in: ${raw}`);
	}
	if (state.inToken) {
		state.tokens.push(state.current);
	}
	return Either.right(state.tokens);
}
