// CHANGE: Console output of help, results and diagnostics
// WHY: Rendering is pure (core/format); only the writing to the console happens here
// PURITY: SHELL
// EFFECT: Effect<void>
// INVARIANT: Results go to stdout, diagnostics to stderr
// COMPLEXITY: O(n) where n = number of printed lines

import { Effect } from "effect";

import type { AppError } from "../../core/errors.js";
import { formatHelp } from "../../core/format/help.js";
import {
	formatAppError,
	formatParseResult,
	parseResultToJSON,
} from "../../core/format/result.js";
import type { ParseResult } from "../../core/parse/index.js";
import type { ProgramSettings } from "../../core/types/index.js";

const printLines = (lines: ReadonlyArray<string>): Effect.Effect<void> =>
	Effect.sync(() => {
		for (const line of lines) console.log(line);
	});

/**
 * Prints the usage text of a program.
 *
 * @effect Effect<void>
 */
export const printHelp = (settings: ProgramSettings): Effect.Effect<void> =>
	printLines(formatHelp(settings));

/**
 * Prints an accepted command line as text or as one JSON document.
 *
 * @effect Effect<void>
 */
export const printParseResult = (
	result: ParseResult,
	json: boolean,
): Effect.Effect<void> =>
	json
		? printLines([JSON.stringify(parseResultToJSON(result), null, 2)])
		: printLines(formatParseResult(result));

/**
 * Prints a diagnostic; in JSON mode it is a `{ "error": ... }` document on stdout.
 *
 * @effect Effect<void>
 */
export const printError = (error: AppError, json: boolean): Effect.Effect<void> =>
	Effect.sync(() => {
		if (json) {
			console.log(
				JSON.stringify(
					{ error: { tag: error._tag, message: formatAppError(error) } },
					null,
					2,
				),
			);
			return;
		}
		console.error(formatAppError(error));
	});
