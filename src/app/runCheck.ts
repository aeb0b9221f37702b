// CHANGE: Application layer orchestration (APP) separated from SHELL and CORE
// WHY: APP composes pure CORE parsing with SHELL loading and printing
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode>
// INVARIANT: Every failure is printed once and mapped to an exit code; nothing escapes as a defect
// COMPLEXITY: O(n) where n = |declaration| + |command tokens|

import { Effect, Either, pipe } from "effect";

import { computeExitCodeEffect, outcomeOfError } from "../core/decision.js";
import type { ParseError } from "../core/errors.js";
import type { ExitCode, RunOutcome } from "../core/models.js";
import { parseEffect } from "../core/parse/index.js";
import type { CLIOptions, ProgramSettings } from "../core/types/index.js";
import {
	buildCLISettings,
	loadSettingsDeclaration,
	parseCLIArgs,
} from "../shell/config/index.js";
import { printError, printHelp, printParseResult } from "../shell/output/index.js";

const accepted: RunOutcome = "accepted";

function checkCommand(
	settings: ProgramSettings,
	options: CLIOptions,
): Effect.Effect<RunOutcome, ParseError> {
	return pipe(
		parseEffect(options.command, settings),
		Effect.tap((result) =>
			options.quiet ? Effect.void : printParseResult(result, options.json),
		),
		Effect.as(accepted),
	);
}

/**
 * Loads the declaration and either prints its help or checks the command.
 *
 * @param options - Parsed front-end options
 * @returns Outcome; failures are printed (unless quiet) and classified
 *
 * @pure false - reads the declaration file, prints to the console
 * @effect Effect<RunOutcome, never>
 * @invariant outcome = "rejected" ⇔ the command line itself was refused
 * @complexity O(n)
 */
export function runCheck(options: CLIOptions): Effect.Effect<RunOutcome> {
	return pipe(
		loadSettingsDeclaration(options.settingsPath),
		Effect.flatMap((settings) =>
			options.help
				? pipe(printHelp(settings), Effect.as(accepted))
				: checkCommand(settings, options),
		),
		Effect.catchAll((error) =>
			pipe(
				options.quiet ? Effect.void : printError(error, options.json),
				Effect.as(outcomeOfError(error)),
			),
		),
	);
}

const printOwnHelp: Effect.Effect<void> = Either.match(buildCLISettings(), {
	onLeft: (error) => printError(error, false),
	onRight: printHelp,
});

/**
 * Runs the command for raw process arguments.
 *
 * A misuse of the front end itself prints the diagnostic followed by the
 * front end's help and ends with exit code 2.
 *
 * @param argv - `process.argv.slice(2)`
 * @returns Exit code for the bin layer
 *
 * @effect Effect<ExitCode, never>
 * @invariant result ∈ {0,1,2}
 * @complexity O(n)
 */
export function main(argv: ReadonlyArray<string>): Effect.Effect<ExitCode> {
	return Either.match(parseCLIArgs(argv), {
		onLeft: (error) =>
			pipe(
				printError(error, false),
				Effect.zipRight(printOwnHelp),
				Effect.flatMap(() => computeExitCodeEffect("usage-error")),
			),
		onRight: (options) => pipe(runCheck(options), Effect.flatMap(computeExitCodeEffect)),
	});
}
