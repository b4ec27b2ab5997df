/**
 * mpris-control
 * Control MPRIS media players over D-Bus
 *
 * @example
 * const connection = connectSessionBus();
 * const player = await Player.tryNew("vlc", connection);
 * await player.playPause();
 *
 * const events = new EventManager(connection);
 * await events.addCallback(EventType.Seeked, (message) => {
 *   console.log("seeked to", parseSeeked(message));
 *   return true;
 * });
 */

export * from "./services";
export * from "./events";
export type * from "./interfaces";
export { EventType } from "./types/mpris";
export type {
	EventCallback,
	LoopStatus,
	MatchRule,
	MatchToken,
	MetadataMap,
	MethodCall,
	MprisMetadata,
	PlaybackStatus,
	PlayerProperty,
	PlayerPropertyMap,
	PropertiesChangedEvent,
	SignalHandler,
	VariantDict,
	WritablePlayerProperty,
} from "./types/mpris";
export {
	MPRIS_PATH,
	MPRIS_PREFIX,
	PLAYER_INTERFACE,
	ROOT_INTERFACE,
	DEFAULT_CALL_TIMEOUT_MS,
} from "./config";
export {
	LogLevel,
	Logger,
	configureLogger,
	getLogger,
	type LoggerConfig,
	type LogSink,
} from "./utils";
