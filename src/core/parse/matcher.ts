// CHANGE: Single-pass matching engine over classified tokens
// WHY: Converts tokens into parsed options and plain arguments before any cross-option check
// FORMAT THEOREM: ∀ tokens: matchTokens visits each token at most once, left to right
// PURITY: CORE
// INVARIANT: A consumed parameter value is never re-read as an option or a plain argument
// COMPLEXITY: O(n) where n = |tokens|

import { Either, Option } from "effect";
import { match } from "ts-pattern";

import type { ParseError } from "../errors.js";
import type { ParameterValue, ParsedOption } from "../models.js";
import type {
	OptionDefinition,
	ParameterConverter,
	ProgramSettings,
} from "../types/index.js";
import { classifyToken, isParameterToken, type TokenShape } from "./lexer.js";
import {
	groupedMissingParameter,
	invalidParameter,
	malformedOption,
	missingParameter,
	unexpectedParameter,
	unknownOption,
} from "./messages.js";

/** Raw matching outcome; cross-option rules are not checked yet. */
export interface MatchOutcome {
	readonly parsedOptions: ReadonlyArray<ParsedOption>;
	readonly plainArguments: ReadonlyArray<string>;
}

interface Advance {
	readonly _tag: "Advance";
	readonly consumed: number;
	readonly parsed: ReadonlyArray<ParsedOption>;
}

interface Finish {
	readonly _tag: "Finish";
	readonly plainArguments: ReadonlyArray<string>;
}

type Step = Advance | Finish;

const advance = (
	consumed: number,
	option: OptionDefinition,
	value: Option.Option<ParameterValue>,
): Advance => ({
	_tag: "Advance",
	consumed,
	parsed: [{ names: option.names, value }],
});

const convert = (
	parameter: ParameterConverter,
	optionName: string,
	raw: string,
): Either.Either<ParameterValue, ParseError> =>
	Either.fromOption(parameter.convert(raw), () => invalidParameter(raw, optionName));

function resolveParameter(
	option: OptionDefinition,
	parameter: ParameterConverter,
	optionName: string,
	next: string | undefined,
): Either.Either<Advance, ParseError> {
	if (next !== undefined && isParameterToken(next)) {
		return Either.map(convert(parameter, optionName, next), (value) =>
			advance(2, option, Option.some(value)),
		);
	}
	return parameter.mandatory
		? Either.left(missingParameter(optionName))
		: Either.right(advance(1, option, Option.none()));
}

/**
 * Resolves one option occurrence: inline text, then the next token (eager
 * lookahead) when the option takes a parameter.
 *
 * @pure true
 * @invariant consumed ∈ {1, 2}; 2 only when the next token became the value
 * @complexity O(|raw|)
 */
function resolveOption(
	settings: ProgramSettings,
	optionName: string,
	inline: Option.Option<string>,
	next: string | undefined,
): Either.Either<Advance, ParseError> {
	const option = settings.optionsByName.get(optionName);
	if (option === undefined) return Either.left(unknownOption(optionName));
	const parameter = option.parameter;
	if (parameter === undefined) {
		return Option.isSome(inline)
			? Either.left(unexpectedParameter(optionName))
			: Either.right(advance(1, option, Option.none()));
	}
	return Option.match(inline, {
		onNone: () => resolveParameter(option, parameter, optionName, next),
		onSome: (raw) =>
			Either.map(convert(parameter, optionName, raw), (value) =>
				advance(1, option, Option.some(value)),
			),
	});
}

function matchGroup(
	settings: ProgramSettings,
	group: Extract<TokenShape, { _tag: "Grouped" }>,
	next: string | undefined,
): Either.Either<Advance, ParseError> {
	const flags: ParsedOption[] = [];
	for (const name of group.leading) {
		const option = settings.optionsByName.get(name);
		if (option === undefined) return Either.left(unknownOption(name));
		if (option.parameter?.mandatory === true) {
			return Either.left(groupedMissingParameter(name));
		}
		flags.push({ names: option.names, value: Option.none() });
	}
	return Either.map(resolveOption(settings, group.last, group.inline, next), (step) => ({
		...step,
		parsed: [...flags, ...step.parsed],
	}));
}

function matchAt(
	settings: ProgramSettings,
	tokens: ReadonlyArray<string>,
	index: number,
	token: string,
): Either.Either<Step, ParseError> {
	const next = tokens[index + 1];
	return match<TokenShape, Either.Either<Step, ParseError>>(classifyToken(token))
		.with({ _tag: "Separator" }, () =>
			Either.right({ _tag: "Finish", plainArguments: tokens.slice(index + 1) }),
		)
		.with({ _tag: "Parameter" }, () =>
			Either.right({ _tag: "Advance", consumed: 1, parsed: [] }),
		)
		.with({ _tag: "Grouped" }, (group) => matchGroup(settings, group, next))
		.with({ _tag: "Single" }, ({ name, inline }) =>
			resolveOption(settings, name, inline, next),
		)
		.with({ _tag: "Malformed" }, () => Either.left(malformedOption(index, token)))
		.exhaustive();
}

/**
 * Matches a token sequence against the registry.
 *
 * Token 0 is skipped when it equals the program name. A bare parameter token
 * not consumed by a preceding option is skipped. Every occurrence of a
 * repeated option is kept.
 *
 * @param tokens - Non-empty token sequence
 * @param settings - Built registry
 * @returns Parsed options in command order and plain arguments after `--`
 *
 * @pure true
 * @invariant the first fatal token aborts matching
 * @complexity O(n)
 */
export function matchTokens(
	tokens: ReadonlyArray<string>,
	settings: ProgramSettings,
): Either.Either<MatchOutcome, ParseError> {
	const parsedOptions: ParsedOption[] = [];
	let index = tokens[0] === settings.programName ? 1 : 0;
	let token = tokens[index];
	while (token !== undefined) {
		const step = matchAt(settings, tokens, index, token);
		if (Either.isLeft(step)) return Either.left(step.left);
		if (step.right._tag === "Finish") {
			return Either.right({ parsedOptions, plainArguments: step.right.plainArguments });
		}
		parsedOptions.push(...step.right.parsed);
		index += step.right.consumed;
		token = tokens[index];
	}
	return Either.right({ parsedOptions, plainArguments: [] });
}
