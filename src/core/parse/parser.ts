// CHANGE: Parser entry points composing tokenizer, matcher and validator
// FORMAT THEOREM: parse = tokenize ≫= matchTokens ≫= validateResult
// PURITY: CORE
// INVARIANT: A settings object is never modified; any number of parses may share it
// COMPLEXITY: O(n) where n = |tokens|

import { type Effect, Either, pipe } from "effect";

import { toEffect } from "../either.js";
import type { ParseError } from "../errors.js";
import type { ProgramSettings } from "../types/index.js";
import { matchTokens } from "./matcher.js";
import { ParseResult } from "./result.js";
import { type CommandLine, tokenize } from "./tokenizer.js";
import { validateResult } from "./validator.js";

/**
 * Parses a command line against built settings.
 *
 * @param commandLine - Whole line (split on whitespace) or pre-split tokens
 * @param settings - Registry produced by `buildSettings`
 * @returns Validated result, or the first ParseError encountered
 *
 * @pure true
 * @invariant right(r) → every mandatory option, dependency, conflict and plain-argument bound holds
 * @complexity O(n)
 *
 * @example
 * ```ts
 * pipe(
 *   parse(["time", "-f", "%e", "--", "sleep", "1"], settings),
 *   Either.map((result) => result.plainArguments),
 * ); // right(["sleep", "1"])
 * ```
 */
export function parse(
	commandLine: CommandLine,
	settings: ProgramSettings,
): Either.Either<ParseResult, ParseError> {
	return pipe(
		tokenize(commandLine),
		Either.flatMap((tokens) => matchTokens(tokens, settings)),
		Either.map((outcome) => new ParseResult(outcome)),
		Either.flatMap((result) => validateResult(result, settings)),
	);
}

/**
 * Effect variant of {@link parse} for composition in Effect pipelines.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseEffect = (
	commandLine: CommandLine,
	settings: ProgramSettings,
): Effect.Effect<ParseResult, ParseError> => toEffect(parse(commandLine, settings));
