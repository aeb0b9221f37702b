// CHANGE: Option name rules shared by the builder and the declaration decoder
// PURITY: CORE
// INVARIANT: valid(name) ⇔ name ∈ [A-Za-z]+
// COMPLEXITY: O(|name|)

import { Either } from "effect";

import { InvalidArgument } from "../errors.js";
import type { OptionDefinition } from "../types/index.js";

const OPTION_NAME = /^[A-Za-z]+$/u;

/**
 * Checks whether an option name consists of ASCII letters only.
 *
 * @pure true
 * @invariant isValidOptionName("") = false
 * @complexity O(|name|)
 */
export function isValidOptionName(name: string): boolean {
	return OPTION_NAME.test(name);
}

/**
 * Rejects the first name that is not a valid option name.
 *
 * @pure true
 * @invariant right ⇔ ∀ n ∈ names: isValidOptionName(n)
 * @complexity O(Σ|name|)
 */
export function checkOptionNames(
	names: ReadonlyArray<string>,
): Either.Either<void, InvalidArgument> {
	const invalid = names.find((name) => !isValidOptionName(name));
	return invalid === undefined
		? Either.right(undefined)
		: Either.left(
				new InvalidArgument({
					message: `Option name "${invalid}" must consist of letters only.`,
				}),
			);
}

/**
 * Canonical name of an option: the first registered name.
 *
 * @pure true
 * @complexity O(1)
 */
export const canonicalName = (option: OptionDefinition): string =>
	option.names[0];
