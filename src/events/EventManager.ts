/**
 * Event Manager
 * Subscribes callbacks to MPRIS signals and keeps the registration tokens
 * needed to tear them down again
 */

import type { Message } from "dbus-next";
import type { IBusConnection } from "../interfaces/IBusConnection";
import type {
	EventSubscription,
	IEventManager,
} from "../interfaces/IEventManager";
import { MPRIS_PATH } from "../config/constants";
import { MemberNameSchema, ObjectPathSchema } from "../schemas/mpris";
import { formatMatchRule } from "../services/DbusConnection";
import {
	ClearCallbacksError,
	ErrorCategory,
	ErrorHandler,
	ErrorSeverity,
	MprisError,
	getErrorHandler,
	type ClearFailure,
} from "../services/ErrorHandler";
import {
	EventType,
	type EventCallback,
	type MatchRule,
	type MatchToken,
} from "../types/mpris";
import { getLogger } from "../utils/Logger";

const logger = getLogger("EventManager");

export interface EventManagerOptions {
	errorHandler?: ErrorHandler;
}

/**
 * Signal member name for an event type
 */
export function memberForEvent(eventType: EventType): string {
	switch (eventType) {
		case EventType.PropertiesChanged:
			return "PropertiesChanged";
		case EventType.Seeked:
			return "Seeked";
	}
}

/**
 * Match rule for an event type on the MPRIS object path
 */
export function buildMatchRule(
	eventType: EventType,
	path: string = MPRIS_PATH,
): MatchRule {
	const member = memberForEvent(eventType);
	if (!MemberNameSchema.safeParse(member).success) {
		throw new MprisError(
			ErrorCategory.INVALID_ARGUMENT,
			"addCallback",
			`Invalid signal member name "${member}"`,
		);
	}
	if (!ObjectPathSchema.safeParse(path).success) {
		throw new MprisError(
			ErrorCategory.INVALID_ARGUMENT,
			"addCallback",
			`Invalid object path "${path}"`,
		);
	}
	return { type: "signal", member, path };
}

/**
 * Manages signal subscriptions on a borrowed connection.
 * Every token in `tokens` is a match currently registered on the connection.
 */
export class EventManager implements IEventManager {
	private readonly callbackTokens: MatchToken[] = [];
	private readonly errors: ErrorHandler;

	constructor(
		private readonly connection: IBusConnection,
		options: EventManagerOptions = {},
	) {
		this.errors = options.errorHandler ?? getErrorHandler();
	}

	get tokens(): readonly MatchToken[] {
		return [...this.callbackTokens];
	}

	get size(): number {
		return this.callbackTokens.length;
	}

	/**
	 * Subscribe `callback` to signals of `eventType`.
	 * The callback returns true to keep receiving and false to unsubscribe.
	 */
	async addCallback(
		eventType: EventType,
		callback: EventCallback,
	): Promise<EventSubscription> {
		let rule: MatchRule;
		try {
			rule = buildMatchRule(eventType);
		} catch (error) {
			throw await this.errors.handle(error, {
				category: ErrorCategory.INVALID_ARGUMENT,
				operation: "addCallback",
			});
		}

		// The token is only known once registration resolves
		let token: MatchToken | null = null;
		let ended = false;

		const dispatch = (message: Message) => {
			if (ended) return;

			let keep: boolean;
			try {
				keep = callback(message);
			} catch (error) {
				logger.error(`Callback for ${eventType} threw; unsubscribing`, error);
				keep = false;
			}

			if (!keep && token !== null) {
				ended = true;
				this.release(token).catch((error: unknown) => {
					logger.error(`Failed to end subscription #${token}`, error);
				});
			}
		};

		const registered = await this.errors.guard(
			"addCallback",
			() => this.connection.addMatch(rule, dispatch),
			{ eventType },
		);
		token = registered;
		this.callbackTokens.push(registered);

		logger.debug(`Subscribed #${registered} to ${eventType}`);
		return {
			token: registered,
			eventType,
			rule: formatMatchRule(rule),
		};
	}

	/**
	 * Remove every registration this manager holds.
	 * Every token is attempted even when some fail; removed tokens leave the
	 * list and failed ones stay so a later call can retry them.
	 */
	async clearCallbacks(): Promise<void> {
		const pending = [...this.callbackTokens];
		const failures: ClearFailure[] = [];

		for (const token of pending) {
			try {
				await this.connection.removeMatch(token);
				this.forget(token);
			} catch (error) {
				failures.push({
					token,
					error: this.errors.normalizeError(error, {
						category: ErrorCategory.TRANSPORT,
						operation: "clearCallbacks",
					}),
				});
			}
		}

		logger.debug(
			`Cleared ${pending.length - failures.length}/${pending.length} subscriptions`,
		);

		if (failures.length > 0) {
			throw await this.errors.handle(new ClearCallbacksError(failures), {
				category: ErrorCategory.TRANSPORT,
				severity: ErrorSeverity.WARNING,
				operation: "clearCallbacks",
				metadata: { failed: failures.map((f) => f.token) },
			});
		}
	}

	/**
	 * Remove one registration after its callback asked to stop
	 */
	private async release(token: MatchToken): Promise<void> {
		if (!this.callbackTokens.includes(token)) return;
		await this.connection.removeMatch(token);
		this.forget(token);
	}

	private forget(token: MatchToken): void {
		const index = this.callbackTokens.indexOf(token);
		if (index !== -1) {
			this.callbackTokens.splice(index, 1);
		}
	}
}
