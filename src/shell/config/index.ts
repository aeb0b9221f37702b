// CHANGE: Central export file for the config module

export { buildCLISettings, PROGRAM_NAME, parseCLIArgs } from "./cli.js";
export {
	loadSettingsDeclaration,
	parseJSONDocument,
	readTextFile,
} from "./loader.js";
