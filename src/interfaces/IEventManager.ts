/**
 * Event Manager Interface
 * Subscribes callbacks to MPRIS signals and tears them down in bulk
 */

import type { EventCallback, EventType, MatchToken } from "../types/mpris";

export interface EventSubscription {
	readonly token: MatchToken;
	readonly eventType: EventType;
	/** Match rule string as sent to the bus daemon */
	readonly rule: string;
}

export interface IEventManager {
	/**
	 * Subscribe `callback` to signals of `eventType`
	 */
	addCallback(
		eventType: EventType,
		callback: EventCallback,
	): Promise<EventSubscription>;

	/**
	 * Remove every registration this manager holds
	 */
	clearCallbacks(): Promise<void>;

	/**
	 * Tokens of the currently registered matches, in registration order
	 */
	readonly tokens: readonly MatchToken[];
}
