export {
	type IntegerParameterOptions,
	integerParameter,
	parseBoundedInteger,
} from "./integer.js";
export {
	type IntegerListParameterOptions,
	integerListParameter,
	MAX_LIST_SPAN,
	parseIntegerList,
} from "./integer-list.js";
export {
	type StringListParameterOptions,
	type StringParameterOptions,
	stringListParameter,
	stringParameter,
} from "./string.js";
