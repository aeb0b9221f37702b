// CHANGE: Text and JSON renderings of parse outcomes and failures
// PURITY: CORE
// INVARIANT: Parsed options render in command order, one line each
// COMPLEXITY: O(|parsedOptions| + |plainArguments|)

import { Option } from "effect";
import { match } from "ts-pattern";

import type { AppError } from "../errors.js";
import type { ParsedOption } from "../models.js";
import type { ParseResult } from "../parse/index.js";
import type { JSONObject } from "../types/index.js";
import { displayOptionName, INDENT } from "./help.js";
import { formatParameterValue, parameterValueToJSON } from "./value.js";

function parsedOptionLine(parsed: ParsedOption): string {
	const names = parsed.names.map(displayOptionName).join(", ");
	return Option.match(parsed.value, {
		onNone: () => `${INDENT}${names}`,
		onSome: (value) => `${INDENT}${names}: ${formatParameterValue(value)}`,
	});
}

const orNone = (lines: ReadonlyArray<string>): ReadonlyArray<string> =>
	lines.length > 0 ? lines : [`${INDENT}(none)`];

/**
 * Human-readable listing of an accepted command line.
 *
 * @pure true
 * @invariant result[0] = "Parsed options:"
 * @complexity O(n)
 *
 * @example
 * ```ts
 * formatParseResult(result);
 * // ["Parsed options:", "    -v, --verbose", "Plain arguments:", "    file.txt"]
 * ```
 */
export function formatParseResult(result: ParseResult): ReadonlyArray<string> {
	return [
		"Parsed options:",
		...orNone(result.parsedOptions.map(parsedOptionLine)),
		"Plain arguments:",
		...orNone(result.plainArguments.map((argument) => `${INDENT}${argument}`)),
	];
}

/**
 * JSON document of an accepted command line; absent values are `null`.
 *
 * @pure true
 * @complexity O(n)
 */
export function parseResultToJSON(result: ParseResult): JSONObject {
	return {
		options: result.parsedOptions.map((parsed) => ({
			names: parsed.names,
			value: Option.match(parsed.value, {
				onNone: () => null,
				onSome: parameterValueToJSON,
			}),
		})),
		plainArguments: result.plainArguments,
	};
}

/**
 * One-line diagnostic for any application error.
 *
 * @pure true
 * @invariant result.length > 0
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
	match(error)
		.with({ _tag: "ParseError" }, ({ message }) => `Parse error: ${message}`)
		.with({ _tag: "InvalidArgument" }, ({ message }) => `Invalid settings: ${message}`)
		.with({ _tag: "ConstraintError" }, ({ message }) => `Invalid settings: ${message}`)
		.with(
			{ _tag: "ConfigError" },
			({ where, detail }) => `Invalid settings declaration at ${where}: ${detail}`,
		)
		.with(
			{ _tag: "FS" },
			({ path, detail }) => `Cannot read ${path ?? "settings file"}: ${detail}`,
		)
		.exhaustive();
