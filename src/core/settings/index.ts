export {
	addConflict,
	addDependency,
	addOption,
	addPlainArgument,
	addShortLongOption,
	buildSettings,
	createSettings,
	defineSettings,
	type SettingsStep,
	UNBOUNDED,
} from "./builder.js";
export { type DeclarationError, decodeSettings } from "./declaration.js";
export { canonicalName, checkOptionNames, isValidOptionName } from "./names.js";
