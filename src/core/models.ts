// CHANGE: Functional Core domain models (pure, immutable)
// WHY: Parsed values are a closed tagged union; callers match on `_tag` instead of casting
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import { Data, type Option } from "effect";

/**
 * Exit code for the command-line front end.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1, 2}: accepted, rejected, usage/configuration failure
 */
export type ExitCode = 0 | 1 | 2;

/**
 * Outcome of one checked command line.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export type RunOutcome = "accepted" | "rejected" | "usage-error";

/**
 * Converted value of an option parameter.
 *
 * @remarks
 * - @pure true (Data.TaggedEnum, structural equality)
 * - @invariant `_tag` determines the shape of `value`
 */
export type ParameterValue = Data.TaggedEnum<{
	Integer: { readonly value: number };
	Text: { readonly value: string };
	IntegerList: { readonly value: ReadonlyArray<number> };
	TextList: { readonly value: ReadonlyArray<string> };
}>;

export const ParameterValue = Data.taggedEnum<ParameterValue>();

/**
 * A single option recognised in a command line.
 *
 * @remarks
 * - @pure true
 * - @invariant names is the full alias list of the matched option, canonical name first
 * - @invariant value = none ⇔ the option takes no parameter or none was supplied
 */
export interface ParsedOption {
	readonly names: ReadonlyArray<string>;
	readonly value: Option.Option<ParameterValue>;
}
