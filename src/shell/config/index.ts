// CHANGE: Barrel for SHELL configuration
// PURITY: Re-exports only (meta-module)

export type { CliEnvironment, CliRequest } from "./cli.js";
export {
	DEFAULT_MIRROR,
	DEFAULT_SOURCE_EXECUTABLE,
	DEFAULT_THREADS,
	NO_INHERITANCE,
	parseCLIArgs,
	parseThreads,
	readEnvironment,
	USAGE,
} from "./cli.js";
