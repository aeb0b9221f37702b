// CHANGE: Settings declaration loading as an Effect
// WHY: File access and JSON parsing are effects; decoding is delegated to the pure core
// PURITY: SHELL
// EFFECT: Effect<ProgramSettings, FSError | ConfigError | SettingsError>
// INVARIANT: The file is read once; nothing is written
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";
import { Effect, pipe } from "effect";

import { toEffect } from "../../core/either.js";
import { ConfigError, FSError } from "../../core/errors.js";
import { type DeclarationError, decodeSettings } from "../../core/settings/index.js";
import type { JSONValue, ProgramSettings } from "../../core/types/index.js";

/**
 * Reads a UTF-8 text file.
 *
 * @effect Effect<string, FSError>
 */
export const readTextFile = (filePath: string): Effect.Effect<string, FSError> =>
	Effect.try({
		try: () => fs.readFileSync(filePath, "utf8"),
		catch: (error) =>
			new FSError({
				detail: error instanceof Error ? error.message : String(error),
				path: filePath,
			}),
	});

/**
 * Parses JSON text; syntax errors become ConfigError located at the file.
 *
 * @effect Effect<JSONValue, ConfigError>
 */
export const parseJSONDocument = (
	text: string,
	where: string,
): Effect.Effect<JSONValue, ConfigError> =>
	Effect.try({
		try: (): JSONValue => JSON.parse(text),
		catch: (error) =>
			new ConfigError({
				where,
				detail: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});

/**
 * Loads and builds the settings declared in a JSON file.
 *
 * @param filePath - Path of the declaration document
 * @returns Built settings; FSError when the file cannot be read, ConfigError for
 *          invalid JSON or shape, InvalidArgument/ConstraintError for rejected registrations
 *
 * @pure false - reads the filesystem
 * @effect Effect<ProgramSettings, FSError | DeclarationError>
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const settings = Effect.runSync(loadSettingsDeclaration("examples/time.json"));
 * ```
 */
export const loadSettingsDeclaration = (
	filePath: string,
): Effect.Effect<ProgramSettings, FSError | DeclarationError> =>
	pipe(
		readTextFile(filePath),
		Effect.flatMap((text) => parseJSONDocument(text, filePath)),
		Effect.flatMap((document) => toEffect(decodeSettings(document))),
	);
