// CHANGE: ParseError constructors, one per failure reason
// WHY: Message wording lives in one place; the engine and validator only pick the reason
// PURITY: CORE
// INVARIANT: Each builder names exactly one root cause
// COMPLEXITY: O(1)

import { ParseError, type ParseFailureReason } from "../errors.js";

const failure = (reason: ParseFailureReason, message: string): ParseError =>
	new ParseError({ reason, message });

export const noArguments = (): ParseError =>
	failure("NoArguments", "No arguments were given.");

export const malformedOption = (index: number, token: string): ParseError =>
	failure("MalformedOption", `Invalid option at position ${index}: "${token}".`);

export const unknownOption = (name: string): ParseError =>
	failure("UnknownOption", `Unknown option "${name}".`);

export const unexpectedParameter = (name: string): ParseError =>
	failure("UnexpectedParameter", `Option "${name}" does not accept a parameter.`);

export const missingParameter = (name: string): ParseError =>
	failure("MissingParameter", `Option "${name}" requires a parameter value.`);

export const groupedMissingParameter = (name: string): ParseError =>
	failure(
		"MissingParameter",
		`Option "${name}" requires a parameter value and cannot be grouped.`,
	);

export const invalidParameter = (raw: string, name: string): ParseError =>
	failure("InvalidParameter", `Invalid parameter value "${raw}" for option "${name}".`);

export const missingMandatoryOption = (name: string): ParseError =>
	failure("MissingMandatoryOption", `Mandatory option "${name}" is missing.`);

export const unmetDependency = (dependent: string, independent: string): ParseError =>
	failure("UnmetDependency", `Option "${dependent}" requires option "${independent}".`);

export const conflictingOptions = (first: string, second: string): ParseError =>
	failure(
		"ConflictingOptions",
		`Options "${first}" and "${second}" cannot be used together.`,
	);

/**
 * Plain-argument count outside `[min, max]`.
 *
 * @pure true
 * @invariant max = +∞ → message reads "at least min"
 */
export function plainArgumentCount(count: number, min: number, max: number): ParseError {
	const expected =
		max === Number.POSITIVE_INFINITY
			? `at least ${min}`
			: min === max
				? `exactly ${min}`
				: `between ${min} and ${max}`;
	return failure(
		"PlainArgumentCount",
		`Expected ${expected} plain arguments, got ${count}.`,
	);
}
