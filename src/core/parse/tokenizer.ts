// CHANGE: Command-line tokenizer
// PURITY: CORE
// INVARIANT: right(tokens) → tokens.length > 0
// COMPLEXITY: O(|line|)

import { Either } from "effect";

import type { ParseError } from "../errors.js";
import { noArguments } from "./messages.js";

/** A whole command line, or one already split into tokens. */
export type CommandLine = string | ReadonlyArray<string>;

const WHITESPACE = /\s+/u;

/**
 * Splits a command line on runs of whitespace, ignoring leading and trailing
 * whitespace. No quoting or escaping.
 *
 * @pure true
 * @invariant ∀ t ∈ result: t ≠ "" ∧ ¬/\s/.test(t)
 * @complexity O(|line|)
 */
export function splitCommandLine(line: string): ReadonlyArray<string> {
	const trimmed = line.trim();
	return trimmed.length === 0 ? [] : trimmed.split(WHITESPACE);
}

/**
 * Produces the token sequence; arrays pass through unchanged.
 *
 * @returns Tokens, or ParseError("NoArguments") when there are none
 *
 * @pure true
 * @complexity O(|line|)
 */
export function tokenize(
	commandLine: CommandLine,
): Either.Either<ReadonlyArray<string>, ParseError> {
	const tokens =
		typeof commandLine === "string" ? splitCommandLine(commandLine) : commandLine;
	return tokens.length === 0 ? Either.left(noArguments()) : Either.right(tokens);
}
