// CHANGE: Domain-restricted string parameter converters
// PURITY: CORE
// INVARIANT: convert(raw) = some(Text(raw)) ⇔ raw ≠ "" ∧ (domain undefined ∨ raw ∈ domain)
// COMPLEXITY: O(1) per conversion (domain lookup through a Set)

import { Either, Option } from "effect";

import { InvalidArgument } from "../errors.js";
import { ParameterValue } from "../models.js";
import type { ParameterConverter } from "../types/index.js";

export interface StringParameterOptions {
	readonly name: string;
	readonly mandatory?: boolean | undefined;
	readonly domain?: ReadonlyArray<string> | undefined;
}

export interface StringListParameterOptions extends StringParameterOptions {
	readonly separator?: string | undefined;
}

function checkStringDeclaration(
	options: StringParameterOptions,
): Either.Either<ReadonlySet<string> | undefined, InvalidArgument> {
	if (options.name.trim().length === 0) {
		return Either.left(
			new InvalidArgument({ message: "Parameter name must not be empty." }),
		);
	}
	if (options.domain?.length === 0) {
		return Either.left(
			new InvalidArgument({
				message: `Domain of parameter "${options.name}" must not be empty.`,
			}),
		);
	}
	return Either.right(
		options.domain === undefined ? undefined : new Set(options.domain),
	);
}

const admits = (domain: ReadonlySet<string> | undefined, raw: string): boolean =>
	raw.length > 0 && (domain === undefined || domain.has(raw));

/**
 * Creates a string converter, optionally restricted to a domain of values.
 *
 * @param options - Display name, mandatory flag (default true), admissible values
 * @returns Converter, or InvalidArgument for an empty name or an empty domain
 *
 * @pure true
 * @invariant domain comparison is exact (case-sensitive)
 * @complexity O(|domain|) construction
 */
export function stringParameter(
	options: StringParameterOptions,
): Either.Either<ParameterConverter, InvalidArgument> {
	return Either.map(checkStringDeclaration(options), (domain) => ({
		name: options.name,
		mandatory: options.mandatory ?? true,
		convert: (raw: string) =>
			admits(domain, raw)
				? Option.some(ParameterValue.Text({ value: raw }))
				: Option.none(),
	}));
}

/**
 * Creates a converter for separated string lists (`a,b,c`); every item must
 * be non-empty and, when a domain is given, belong to it.
 *
 * @pure true
 * @invariant some(TextList(items)) → items.length ≥ 1
 * @complexity O(|raw|) per conversion
 */
export function stringListParameter(
	options: StringListParameterOptions,
): Either.Either<ParameterConverter, InvalidArgument> {
	const separator = options.separator ?? ",";
	if (separator.length === 0) {
		return Either.left(
			new InvalidArgument({
				message: `Separator of parameter "${options.name}" must not be empty.`,
			}),
		);
	}
	return Either.map(checkStringDeclaration(options), (domain) => ({
		name: options.name,
		mandatory: options.mandatory ?? true,
		convert: (raw: string) => {
			const items = raw.split(separator);
			return items.every((item) => admits(domain, item))
				? Option.some(ParameterValue.TextList({ value: items }))
				: Option.none();
		},
	}));
}
