// CHANGE: Pure decoder from a JSON settings declaration to ProgramSettings
// WHY: The shell only reads and parses the file; shape checks and registration stay in the core
// PURITY: CORE
// INVARIANT: Every rejected field is reported with its JSON path
// COMPLEXITY: O(n) where n = size of the document

import { Either, pipe } from "effect";
import { match } from "ts-pattern";

import { ConfigError, type SettingsError } from "../errors.js";
import {
	integerListParameter,
	integerParameter,
	stringListParameter,
	stringParameter,
} from "../parameters/index.js";
import type {
	JSONObject,
	JSONValue,
	ParameterConverter,
	ProgramSettings,
	SettingsDeclaration,
} from "../types/index.js";
import {
	addConflict,
	addDependency,
	addOption,
	addPlainArgument,
	defineSettings,
	type SettingsStep,
} from "./builder.js";

export type DeclarationError = ConfigError | SettingsError;

type Decoded<A> = Either.Either<A, ConfigError>;

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

const fail = (where: string, detail: string): Decoded<never> =>
	Either.left(new ConfigError({ where, detail }));

const expectObject = (value: JSONValue, where: string): Decoded<JSONObject> =>
	isJSONObject(value) ? Either.right(value) : fail(where, "expected an object");

const expectArray = (
	value: JSONValue,
	where: string,
): Decoded<ReadonlyArray<JSONValue>> =>
	isArray(value) ? Either.right(value) : fail(where, "expected an array");

const expectString = (value: JSONValue, where: string): Decoded<string> =>
	typeof value === "string" ? Either.right(value) : fail(where, "expected a string");

const expectInteger = (value: JSONValue, where: string): Decoded<number> =>
	typeof value === "number" && Number.isInteger(value)
		? Either.right(value)
		: fail(where, "expected an integer");

const expectBoolean = (value: JSONValue, where: string): Decoded<boolean> =>
	typeof value === "boolean" ? Either.right(value) : fail(where, "expected a boolean");

const expectStrings = (
	value: JSONValue,
	where: string,
): Decoded<ReadonlyArray<string>> =>
	Either.flatMap(expectArray(value, where), (items) =>
		Either.all(items.map((item, index) => expectString(item, `${where}[${index}]`))),
	);

/**
 * Reads an optional field; absent and `null` both decode to `undefined`.
 *
 * @pure true
 * @complexity O(1) plus the cost of `decode`
 */
function optional<A, E>(
	object: JSONObject,
	key: string,
	where: string,
	decode: (value: JSONValue, where: string) => Either.Either<A, E>,
): Either.Either<A | undefined, E> {
	const value = object[key];
	return value === undefined || value === null
		? Either.right(undefined)
		: decode(value, `${where}.${key}`);
}

function required<A, E>(
	object: JSONObject,
	key: string,
	where: string,
	decode: (value: JSONValue, where: string) => Either.Either<A, E>,
): Either.Either<A, E | ConfigError> {
	const value = object[key];
	return value === undefined
		? fail(`${where}.${key}`, "missing required field")
		: decode(value, `${where}.${key}`);
}

function decodeParameter(
	value: JSONValue,
	where: string,
): Either.Either<ParameterConverter, DeclarationError> {
	return pipe(
		expectObject(value, where),
		Either.flatMap((object) =>
			Either.all({
				type: required(object, "type", where, expectString),
				name: required(object, "name", where, expectString),
				mandatory: optional(object, "mandatory", where, expectBoolean),
				min: optional(object, "min", where, expectInteger),
				max: optional(object, "max", where, expectInteger),
				domain: optional(object, "domain", where, expectStrings),
				separator: optional(object, "separator", where, expectString),
			}),
		),
		Either.flatMap((fields) =>
			match<string, Either.Either<ParameterConverter, DeclarationError>>(fields.type)
				.with("integer", () => integerParameter(fields))
				.with("string", () => stringParameter(fields))
				.with("string-list", () => stringListParameter(fields))
				.with("integer-list", () =>
					fields.min === undefined || fields.max === undefined
						? fail(where, "integer-list parameters require min and max")
						: integerListParameter({ ...fields, min: fields.min, max: fields.max }),
				)
				.otherwise((type) => fail(`${where}.type`, `unknown parameter type "${type}"`)),
		),
	);
}

function decodeOption(
	value: JSONValue,
	where: string,
): Either.Either<SettingsStep, DeclarationError> {
	return pipe(
		expectObject(value, where),
		Either.flatMap((object) =>
			Either.all({
				names: required(object, "names", where, expectStrings),
				mandatory: optional(object, "mandatory", where, expectBoolean),
				help: optional(object, "help", where, expectString),
				parameter: optional(object, "parameter", where, decodeParameter),
			}),
		),
		Either.map((declaration) => addOption(declaration)),
	);
}

function decodeDependency(value: JSONValue, where: string): Decoded<SettingsStep> {
	return Either.flatMap(expectStrings(value, where), (names) => {
		const [dependent, independent, ...extra] = names;
		return dependent === undefined || independent === undefined || extra.length > 0
			? fail(where, "a dependency names exactly two options")
			: Either.right(addDependency(dependent, independent));
	});
}

function decodeConflict(value: JSONValue, where: string): Decoded<SettingsStep> {
	return Either.flatMap(expectStrings(value, where), (names) => {
		const [first, second, ...rest] = names;
		return first === undefined || second === undefined
			? fail(where, "a conflict names at least two options")
			: Either.right(addConflict(first, second, ...rest));
	});
}

function decodePlainArgument(value: JSONValue, where: string): Decoded<SettingsStep> {
	return pipe(
		expectObject(value, where),
		Either.flatMap((object) =>
			Either.all({
				position: required(object, "position", where, expectInteger),
				name: required(object, "name", where, expectString),
				help: optional(object, "help", where, expectString),
			}),
		),
		Either.map(({ position, name, help }) => addPlainArgument(position, name, help)),
	);
}

function decodeList<A, E>(
	object: JSONObject,
	key: string,
	decode: (value: JSONValue, where: string) => Either.Either<A, E>,
): Either.Either<ReadonlyArray<A>, E | ConfigError> {
	return Either.flatMap(optional(object, key, "$", expectArray), (items) =>
		Either.all((items ?? []).map((item, index) => decode(item, `$.${key}[${index}]`))),
	);
}

function decodeSteps(
	root: JSONObject,
): Either.Either<ReadonlyArray<SettingsStep>, DeclarationError> {
	return Either.map(
		Either.all([
			Either.flatMap(required(root, "options", "$", expectArray), () =>
				decodeList(root, "options", decodeOption),
			),
			decodeList(root, "dependencies", decodeDependency),
			decodeList(root, "conflicts", decodeConflict),
			decodeList(root, "plainArguments", decodePlainArgument),
		]),
		(groups) => groups.flat(),
	);
}

const decodeProgram = (root: JSONObject): Decoded<SettingsDeclaration> =>
	Either.all({
		programName: required(root, "programName", "$", expectString),
		help: optional(root, "help", "$", expectString),
		minPlainArgs: optional(root, "minPlainArgs", "$", expectInteger),
		maxPlainArgs: optional(root, "maxPlainArgs", "$", expectInteger),
	});

/**
 * Decodes a parsed JSON settings declaration into a frozen registry.
 *
 * Options are registered first, then dependencies, conflicts and plain
 * argument documentation, each in document order.
 *
 * @param document - Value produced by `JSON.parse`
 * @returns Settings, ConfigError for a wrong shape, or the registration error
 *
 * @pure true
 * @invariant registration starts only after the whole document has decoded
 * @complexity O(n)
 *
 * @example
 * ```ts
 * decodeSettings({ programName: "time", options: [{ names: ["v", "verbose"] }] });
 * // right(ProgramSettings)
 * ```
 */
export function decodeSettings(
	document: JSONValue,
): Either.Either<ProgramSettings, DeclarationError> {
	return pipe(
		expectObject(document, "$"),
		Either.flatMap((root) =>
			Either.all({ declaration: decodeProgram(root), steps: decodeSteps(root) }),
		),
		Either.flatMap(({ declaration, steps }) => defineSettings(declaration, steps)),
	);
}
