// CHANGE: Cross-option validation of a matched command line
// FORMAT THEOREM: validateResult(r, s) = right(r) ⇔ mandatory ∧ dependencies ∧ conflicts ∧ plainCount
// PURITY: CORE
// INVARIANT: Checks run in that order and stop at the first violation
// COMPLEXITY: O(|options| + |dependencies| + Σ|group|)

import { Either, pipe } from "effect";

import type { ParseError } from "../errors.js";
import { canonicalName } from "../settings/names.js";
import type { ProgramSettings } from "../types/index.js";
import {
	conflictingOptions,
	missingMandatoryOption,
	plainArgumentCount,
	unmetDependency,
} from "./messages.js";
import type { ParseResult } from "./result.js";

type Check = Either.Either<void, ParseError>;

const passed: Check = Either.right(undefined);

function checkMandatory(result: ParseResult, settings: ProgramSettings): Check {
	const missing = settings.mandatoryOptions.find(
		(option) => !result.wasParsed(canonicalName(option)),
	);
	return missing === undefined
		? passed
		: Either.left(missingMandatoryOption(canonicalName(missing)));
}

function checkDependencies(result: ParseResult, settings: ProgramSettings): Check {
	const unmet = settings.dependencies.find(
		({ dependent, independent }) =>
			result.wasParsed(canonicalName(dependent)) &&
			!result.wasParsed(canonicalName(independent)),
	);
	return unmet === undefined
		? passed
		: Either.left(
				unmetDependency(canonicalName(unmet.dependent), canonicalName(unmet.independent)),
			);
}

function checkConflicts(result: ParseResult, settings: ProgramSettings): Check {
	for (const group of settings.conflicts) {
		const [first, second] = group
			.map(canonicalName)
			.filter((name) => result.wasParsed(name));
		if (first !== undefined && second !== undefined) {
			return Either.left(conflictingOptions(first, second));
		}
	}
	return passed;
}

function checkPlainArgumentCount(result: ParseResult, settings: ProgramSettings): Check {
	const count = result.plainArguments.length;
	const { minPlainArgs, maxPlainArgs } = settings;
	return count >= minPlainArgs && count <= maxPlainArgs
		? passed
		: Either.left(plainArgumentCount(count, minPlainArgs, maxPlainArgs));
}

/**
 * Applies the registry's cross-option rules to a matched command line.
 *
 * @returns The same result, or the first violated rule as a ParseError
 *
 * @pure true
 * @invariant rules are evaluated on canonical names
 * @complexity O(|options| + |dependencies| + Σ|group|)
 */
export function validateResult(
	result: ParseResult,
	settings: ProgramSettings,
): Either.Either<ParseResult, ParseError> {
	return pipe(
		checkMandatory(result, settings),
		Either.flatMap(() => checkDependencies(result, settings)),
		Either.flatMap(() => checkConflicts(result, settings)),
		Either.flatMap(() => checkPlainArgumentCount(result, settings)),
		Either.map(() => result),
	);
}
