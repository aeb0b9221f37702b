// CHANGE: Front-end argument parsing through the library's own settings
// WHY: The command checks other command lines with the same engine it uses for its own
// PURITY: SHELL
// INVARIANT: --json and --quiet never hold together
// COMPLEXITY: O(|argv|)

import { Either, Option, pipe } from "effect";

import { InvalidArgument, type ParseError, type SettingsError } from "../../core/errors.js";
import { stringParameter } from "../../core/parameters/index.js";
import { parse, type ParseResult } from "../../core/parse/index.js";
import {
	addConflict,
	addPlainArgument,
	addShortLongOption,
	defineSettings,
} from "../../core/settings/index.js";
import type { CLIOptions, ProgramSettings } from "../../core/types/index.js";

export const PROGRAM_NAME = "argv-contract";

/**
 * Settings of the `argv-contract` command itself.
 *
 * @returns Settings, or the registration error (never expected for this fixed table)
 */
export const buildCLISettings = (): Either.Either<ProgramSettings, SettingsError> =>
	Either.flatMap(stringParameter({ name: "FILE" }), (file) =>
		defineSettings(
			{
				programName: PROGRAM_NAME,
				help: "Checks a command line against a JSON settings declaration.",
			},
			[
				addShortLongOption("s", "settings", {
					mandatory: true,
					parameter: file,
					help: "JSON settings declaration to check against.",
				}),
				addShortLongOption("j", "json", { help: "Print the result as JSON." }),
				addShortLongOption("q", "quiet", {
					help: "Print nothing; report through the exit code only.",
				}),
				addShortLongOption("h", "help", {
					help: "Print the help of the loaded declaration and exit.",
				}),
				addConflict("json", "quiet"),
				addPlainArgument(0, "command", "Command line to check, program name first."),
			],
		),
	);

const textValue = (result: ParseResult, name: string): Option.Option<string> =>
	Option.flatMap(result.getParameterValue(name), (value) =>
		value._tag === "Text" ? Option.some(value.value) : Option.none(),
	);

function toCLIOptions(result: ParseResult): Either.Either<CLIOptions, InvalidArgument> {
	return Either.map(
		Either.fromOption(
			textValue(result, "settings"),
			() => new InvalidArgument({ message: "Option \"settings\" has no value." }),
		),
		(settingsPath) => ({
			settingsPath,
			json: result.wasParsed("json"),
			quiet: result.wasParsed("quiet"),
			help: result.wasParsed("help"),
			command: result.plainArguments,
		}),
	);
}

/**
 * Parses the front end's own arguments.
 *
 * @param argv - Arguments after the node executable and script path
 * @returns Options, or the error explaining the misuse
 *
 * @example
 * ```ts
 * parseCLIArgs(["--settings", "time.json", "--", "time", "-v"]);
 * // right({ settingsPath: "time.json", json: false, quiet: false, help: false, command: ["time", "-v"] })
 * ```
 */
export function parseCLIArgs(
	argv: ReadonlyArray<string>,
): Either.Either<CLIOptions, ParseError | SettingsError> {
	return pipe(
		buildCLISettings(),
		Either.flatMap((settings) => parse(argv, settings)),
		Either.flatMap(toCLIOptions),
	);
}
