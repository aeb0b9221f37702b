// CHANGE: Public API entry point for library consumers
// WHY: Export CORE parsing and settings plus the APP runner; SHELL internals stay hidden except the loader
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effects
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// SETTINGS (registry construction)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Immutable settings builder.
 *
 * @example
 * ```typescript
 * import { Either, pipe } from "effect";
 * import { addDependency, addShortLongOption, buildSettings, createSettings, parse, stringParameter } from "argv-contract";
 *
 * const settings = pipe(
 *   Either.all([stringParameter({ name: "FILE" })]),
 *   Either.flatMap(([file]) =>
 *     pipe(
 *       createSettings({ programName: "time" }),
 *       Either.flatMap(addShortLongOption("o", "output", { parameter: file })),
 *       Either.flatMap(addShortLongOption("a", "append")),
 *       Either.flatMap(addDependency("a", "o")),
 *     ),
 *   ),
 *   Either.map(buildSettings),
 * );
 * ```
 */
export {
	addConflict,
	addDependency,
	addOption,
	addPlainArgument,
	addShortLongOption,
	buildSettings,
	createSettings,
	type DeclarationError,
	decodeSettings,
	defineSettings,
	type SettingsStep,
	UNBOUNDED,
} from "./core/settings/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// PARAMETER CONVERTERS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	integerListParameter,
	integerParameter,
	MAX_LIST_SPAN,
	stringListParameter,
	stringParameter,
} from "./core/parameters/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type CommandLine,
	parse,
	parseEffect,
	ParseResult,
} from "./core/parse/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// FORMATTING (pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { formatHelp } from "./core/format/help.js";
export { formatAppError, formatParseResult, parseResultToJSON } from "./core/format/result.js";
export { formatParameterValue, parameterValueToJSON } from "./core/format/value.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type AppError,
	ConfigError,
	ConstraintError,
	FSError,
	InvalidArgument,
	ParseError,
	type ParseFailureReason,
	type SettingsError,
} from "./core/errors.js";
export { type ExitCode, type ParsedOption, ParameterValue } from "./core/models.js";
export type {
	CLIOptions,
	ConflictGroup,
	OptionDeclaration,
	OptionDefinition,
	OptionDependency,
	ParameterConverter,
	PlainArgumentDoc,
	ProgramSettings,
	SettingsDeclaration,
	SettingsDraft,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL AND APP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Loads settings from a JSON declaration file.
 *
 * @pure false - reads the filesystem
 */
export { loadSettingsDeclaration } from "./shell/config/index.js";
export { main, runCheck } from "./app/runCheck.js";
