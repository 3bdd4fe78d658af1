// CHANGE: Barrel for CORE types
// PURITY: Re-exports only (meta-module)
// COMPLEXITY: O(1)

export type {
	BuildConfig,
	BuildReport,
	ConfigureOutcome,
	ExitCode,
	InstallOutcome,
	InterpreterVersion,
	OptionSet,
	OptionSource,
	Stage,
} from "../models.js";
export type { CommandResult, CommandRunner, CommandSpec } from "./process.js";
export { formatCommand } from "./process.js";
