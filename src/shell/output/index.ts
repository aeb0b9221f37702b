export { printError, printHelp, printParseResult } from "./printer.js";
