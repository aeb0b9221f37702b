// CHANGE: Central export file for all type definitions
// WHY: Provides a single import point for the types used across modules

export type { CLIOptions, JSONObject, JSONValue } from "./config.js";
export type { ParameterConverter } from "./parameter.js";
export type {
	ConflictGroup,
	OptionDeclaration,
	OptionDefinition,
	OptionDependency,
	OptionNames,
	PlainArgumentDoc,
	ProgramSettings,
	SettingsDeclaration,
	SettingsDraft,
	SettingsState,
} from "./settings.js";
