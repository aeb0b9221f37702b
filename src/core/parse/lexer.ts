// CHANGE: Lexical classification of command-line tokens
// WHY: The engine matches on a closed union of token shapes instead of re-running regexes
// FORMAT THEOREM: classifyToken is total; shapes are tried in the order separator, parameter, grouped, single
// PURITY: CORE
// INVARIANT: isParameterToken(t) ⇔ t ≠ "" ∧ ¬(t starts with "-" followed by a letter or "-")
// COMPLEXITY: O(|token|)

import { Option } from "effect";

/** Token after which every remaining token is a plain argument. */
export const PLAIN_ARGUMENT_SEPARATOR = "--";

const PARAMETER = /^(?!-[A-Za-z-]).+$/su;
const LONG_OPTION = /^--(?<name>[A-Za-z]{2,})(?:=(?<inline>.+))?$/su;
const SHORT_OPTION = /^-(?<name>[A-Za-z])(?:=(?<inline>.+)|(?<attached>[^=].*))?$/su;
const GROUPED_OPTIONS =
	/^-(?<names>[A-Za-z]{2,})(?:=(?<inline>.+)|(?<attached>[^=A-Za-z].*))?$/su;

/**
 * Shape of a single token.
 *
 * - Grouped: `-abc`, `-abc=7`, `-abc7`; `leading` take no value, `last` may
 * - Single: `-x`, `-x=v`, `-xv`, `--name`, `--name=v`
 */
export type TokenShape =
	| { readonly _tag: "Separator" }
	| { readonly _tag: "Parameter"; readonly text: string }
	| {
			readonly _tag: "Grouped";
			readonly leading: ReadonlyArray<string>;
			readonly last: string;
			readonly inline: Option.Option<string>;
	  }
	| {
			readonly _tag: "Single";
			readonly name: string;
			readonly inline: Option.Option<string>;
	  }
	| { readonly _tag: "Malformed" };

/**
 * Whether a token can serve as an option parameter value.
 *
 * @pure true
 * @invariant isParameterToken("-5") ∧ isParameterToken("-") ∧ ¬isParameterToken("--")
 * @complexity O(|token|)
 */
export const isParameterToken = (token: string): boolean => PARAMETER.test(token);

const inlineText = (groups: Partial<Record<string, string>>): Option.Option<string> =>
	Option.fromNullable(groups["inline"] ?? groups["attached"]);

function classifyOption(token: string): TokenShape {
	const grouped = GROUPED_OPTIONS.exec(token)?.groups;
	const names = grouped?.["names"];
	if (grouped !== undefined && names !== undefined) {
		return {
			_tag: "Grouped",
			leading: names.slice(0, -1).split(""),
			last: names.slice(-1),
			inline: inlineText(grouped),
		};
	}
	const single = (LONG_OPTION.exec(token) ?? SHORT_OPTION.exec(token))?.groups;
	const name = single?.["name"];
	return single !== undefined && name !== undefined
		? { _tag: "Single", name, inline: inlineText(single) }
		: { _tag: "Malformed" };
}

/**
 * Classifies a token.
 *
 * @pure true
 * @invariant classifyToken("--") = Separator; classifyToken("-5") = Parameter
 * @complexity O(|token|)
 *
 * @example
 * ```ts
 * classifyToken("-abc7");
 * // { _tag: "Grouped", leading: ["a", "b"], last: "c", inline: some("7") }
 * ```
 */
export function classifyToken(token: string): TokenShape {
	if (token === PLAIN_ARGUMENT_SEPARATOR) return { _tag: "Separator" };
	if (isParameterToken(token)) return { _tag: "Parameter", text: token };
	return classifyOption(token);
}
