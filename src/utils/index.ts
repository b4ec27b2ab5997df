export {
	Logger,
	getLogger,
	configureLogger,
	stringifyLogData,
	type LoggerConfig,
	type LogSink,
} from "./Logger";
export { LogLevel } from "../config/logging";
export {
	LogWriter,
	getLogWriter,
	resetLogWriter,
	type LogWriterConfig,
} from "./LogWriter";
