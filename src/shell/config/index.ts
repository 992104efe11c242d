// CHANGE: Barrel for CLI, config path and config reader
// WHY: Single import point for APP and BIN

export { parseArgs, USAGE } from "./cli.js";
export {
	defaultSwayConfigPath,
	resolveConfigPath,
	type SwitcherEnv,
} from "./paths.js";
export { readConfigFile } from "./reader.js";
