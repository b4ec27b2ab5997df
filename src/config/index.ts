export * from "./constants";
export {
	LogLevel,
	getLoggingConfig,
	parseLogLevel,
	resolveLoggingConfig,
	type LoggingConfig,
} from "./logging";
