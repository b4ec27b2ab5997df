/**
 * Services re-exports
 */

export { ConfigService, getConfigService } from "./ConfigService";
export type { ClientConfig, ConfigServiceOptions } from "./ConfigService";
export {
	DbusConnection,
	connectSessionBus,
	formatMatchRule,
	matchesRule,
} from "./DbusConnection";
export type { DbusConnectionOptions, MessageTransport } from "./DbusConnection";
export { Player, playerBusName, toMicroseconds } from "./Player";
export type { PlayerOptions } from "./Player";
export type { ErrorContext, ClearFailure } from "./ErrorHandler";
export {
	ClearCallbacksError,
	ErrorHandler,
	ErrorCategory,
	ErrorSeverity,
	MprisError,
	getErrorHandler,
	createErrorHandler,
} from "./ErrorHandler";
