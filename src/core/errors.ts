// CHANGE: Typed domain error ADT for the parsing core using Effect.Data
// WHY: Parse and registration failures are values discriminated by `_tag`, never untyped exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values, discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Category of a rejected command line.
 *
 * All categories surface as the same {@link ParseError}; the category only
 * refines the diagnostic.
 */
export type ParseFailureReason =
	| "NoArguments"
	| "MalformedOption"
	| "UnknownOption"
	| "UnexpectedParameter"
	| "MissingParameter"
	| "InvalidParameter"
	| "MissingMandatoryOption"
	| "UnmetDependency"
	| "ConflictingOptions"
	| "PlainArgumentCount";

/**
 * The command line does not conform to the program settings.
 *
 * @pure true (Data class)
 * @invariant message names exactly one root cause
 * @complexity O(1)
 */
export class ParseError extends Data.TaggedError("ParseError")<{
	readonly reason: ParseFailureReason;
	readonly message: string;
}> {}

/**
 * Input validation failed: malformed option names, duplicate names, invalid
 * bounds, or an empty name passed to a result query.
 *
 * @pure true (Data class)
 * @invariant message.length > 0
 * @complexity O(1)
 */
export class InvalidArgument extends Data.TaggedError("InvalidArgument")<{
	readonly message: string;
}> {}

/**
 * A dependency or conflict could not be registered: it references an
 * undefined option, names synonyms, or contradicts an existing constraint.
 *
 * @pure true (Data class)
 * @invariant message.length > 0
 * @complexity O(1)
 */
export class ConstraintError extends Data.TaggedError("ConstraintError")<{
	readonly message: string;
}> {}

/**
 * A settings declaration document has the wrong shape.
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 * @complexity O(1)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 * @complexity O(1)
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/** Errors raised while registering options and constraints. */
export type SettingsError = InvalidArgument | ConstraintError;

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| ParseError
	| InvalidArgument
	| ConstraintError
	| ConfigError
	| FSError;
