// CHANGE: Read-only view over a successful parse
// WHY: Callers query options by any alias; the engine output stays in command order
// PURITY: CORE
// INVARIANT: wasParsed(n) ⇔ ∃ p ∈ parsedOptions: n ∈ p.names
// COMPLEXITY: O(1) per query after O(Σ|names|) construction

import { Option } from "effect";

import { InvalidArgument } from "../errors.js";
import type { ParameterValue, ParsedOption } from "../models.js";
import type { MatchOutcome } from "./matcher.js";

function requireName(name: string): string {
	if (name.trim().length === 0) {
		throw new InvalidArgument({ message: "Option name must not be empty." });
	}
	return name;
}

/**
 * Parsed options and plain arguments of an accepted command line.
 *
 * Repeated options keep every occurrence; lookups by name answer with the
 * first one.
 *
 * @example
 * ```ts
 * const result = Either.getOrThrow(parse("-v -n 3 -- file.txt", settings));
 * result.wasParsed("verbose"); // true
 * result.getParameterValue("n"); // some(Integer({ value: 3 }))
 * result.plainArguments; // ["file.txt"]
 * ```
 */
export class ParseResult {
	readonly parsedOptions: ReadonlyArray<ParsedOption>;
	readonly plainArguments: ReadonlyArray<string>;
	private readonly byName: ReadonlyMap<string, ReadonlyArray<ParsedOption>>;

	constructor(outcome: MatchOutcome) {
		this.parsedOptions = outcome.parsedOptions;
		this.plainArguments = outcome.plainArguments;
		const byName = new Map<string, ParsedOption[]>();
		for (const parsed of outcome.parsedOptions) {
			for (const name of parsed.names) {
				const bucket = byName.get(name);
				if (bucket === undefined) byName.set(name, [parsed]);
				else bucket.push(parsed);
			}
		}
		this.byName = byName;
	}

	/**
	 * Value of the first occurrence of the option.
	 *
	 * @returns none when the option was not parsed or carries no value
	 * @throws InvalidArgument when `name` is empty or blank
	 */
	getParameterValue(name: string): Option.Option<ParameterValue> {
		return Option.flatMap(
			Option.fromNullable(this.occurrences(name)[0]),
			(parsed) => parsed.value,
		);
	}

	/**
	 * @throws InvalidArgument when `name` is empty or blank
	 */
	wasParsed(name: string): boolean {
		return this.occurrences(name).length > 0;
	}

	/**
	 * Every occurrence of the option, in command order.
	 *
	 * @throws InvalidArgument when `name` is empty or blank
	 */
	occurrences(name: string): ReadonlyArray<ParsedOption> {
		return this.byName.get(requireName(name)) ?? [];
	}
}
