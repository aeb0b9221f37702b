// CHANGE: Bounded integer parameter converter
// PURITY: CORE
// INVARIANT: convert(raw) = some(Integer(n)) ⇔ raw is a decimal integer ∧ min ≤ n ≤ max
// COMPLEXITY: O(|raw|)

import { Either, Option } from "effect";

import { InvalidArgument } from "../errors.js";
import { ParameterValue } from "../models.js";
import type { ParameterConverter } from "../types/index.js";

const DECIMAL_INTEGER = /^[+-]?\d+$/u;

export interface IntegerParameterOptions {
	readonly name: string;
	readonly mandatory?: boolean | undefined;
	readonly min?: number | undefined;
	readonly max?: number | undefined;
}

/**
 * Parses a decimal integer and checks it against inclusive bounds.
 *
 * @pure true
 * @invariant result = some(n) → Number.isSafeInteger(n) ∧ min ≤ n ≤ max ∧ !Object.is(n, -0)
 * @complexity O(|raw|)
 */
export function parseBoundedInteger(
	raw: string,
	min: number,
	max: number,
): Option.Option<number> {
	if (!DECIMAL_INTEGER.test(raw)) return Option.none();
	const parsed = Number.parseInt(raw, 10);
	// "-0" and "+0" both denote zero
	const value = parsed === 0 ? 0 : parsed;
	const admissible = Number.isSafeInteger(value) && value >= min && value <= max;
	return admissible ? Option.some(value) : Option.none();
}

/**
 * Validates a name/bounds pair shared by the numeric converters.
 *
 * @pure true
 * @invariant right ⇒ name.length > 0 ∧ min ≤ max ∧ both bounds are safe integers
 * @complexity O(1)
 */
export function checkNumericDeclaration(
	name: string,
	min: number,
	max: number,
): Either.Either<void, InvalidArgument> {
	if (name.trim().length === 0) {
		return Either.left(
			new InvalidArgument({ message: "Parameter name must not be empty." }),
		);
	}
	if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
		return Either.left(
			new InvalidArgument({
				message: `Bounds of parameter "${name}" must be safe integers.`,
			}),
		);
	}
	if (min > max) {
		return Either.left(
			new InvalidArgument({
				message: `Lower bound ${min} of parameter "${name}" exceeds upper bound ${max}.`,
			}),
		);
	}
	return Either.right(undefined);
}

/**
 * Creates an integer converter accepting values in `[min, max]`.
 *
 * @param options - Display name, mandatory flag (default true) and inclusive bounds
 * @returns Converter, or InvalidArgument for an empty name or `min > max`
 *
 * @pure true
 * @invariant default bounds are the safe-integer range
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const port = Either.getOrThrow(integerParameter({ name: "PORT", min: 1, max: 65535 }));
 * port.convert("8080"); // some(Integer({ value: 8080 }))
 * ```
 */
export function integerParameter(
	options: IntegerParameterOptions,
): Either.Either<ParameterConverter, InvalidArgument> {
	const min = options.min ?? Number.MIN_SAFE_INTEGER;
	const max = options.max ?? Number.MAX_SAFE_INTEGER;
	return Either.map(checkNumericDeclaration(options.name, min, max), () => ({
		name: options.name,
		mandatory: options.mandatory ?? true,
		convert: (raw: string) =>
			Option.map(parseBoundedInteger(raw, min, max), (value) =>
				ParameterValue.Integer({ value }),
			),
	}));
}
