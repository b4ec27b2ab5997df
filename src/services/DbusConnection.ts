/**
 * D-Bus Connection
 * IBusConnection over a dbus-next MessageBus, using its low-level message API
 */

import dbus, { type Message, type Variant } from "dbus-next";
import type { IBusConnection } from "../interfaces/IBusConnection";
import {
	DBUS_INTERFACE,
	DBUS_PATH,
	DBUS_SERVICE,
	DEFAULT_CALL_TIMEOUT_MS,
	PROPERTIES_INTERFACE,
} from "../config/constants";
import {
	GetPropertyReplySchema,
	NameHasOwnerReplySchema,
} from "../schemas/mpris";
import type {
	MatchRule,
	MatchToken,
	MethodCall,
	SignalHandler,
} from "../types/mpris";
import { getLogger } from "../utils/Logger";
import { getConfigService } from "./ConfigService";

const logger = getLogger("DbusConnection");

type MessageListener = (message: Message) => void;

/**
 * The parts of dbus-next's MessageBus this connection uses
 */
export interface MessageTransport {
	call(message: Message): Promise<Pick<Message, "body"> | null>;
	on(event: "message", listener: MessageListener): unknown;
	removeListener(event: "message", listener: MessageListener): unknown;
	disconnect(): void;
}

export interface DbusConnectionOptions {
	/** Per-call reply timeout; 0 disables it */
	callTimeoutMs?: number;
}

interface Registration {
	rule: MatchRule;
	ruleString: string;
	listener: MessageListener;
}

/**
 * Render a rule in D-Bus match-rule syntax
 */
export function formatMatchRule(rule: MatchRule): string {
	const parts = [`type='${rule.type}'`];
	if (rule.sender) parts.push(`sender='${rule.sender}'`);
	if (rule.interface) parts.push(`interface='${rule.interface}'`);
	parts.push(`path='${rule.path}'`);
	parts.push(`member='${rule.member}'`);
	return parts.join(",");
}

/**
 * Whether a message satisfies a rule
 */
export function matchesRule(message: Message, rule: MatchRule): boolean {
	return (
		message.type === dbus.MessageType.SIGNAL &&
		message.member === rule.member &&
		message.path === rule.path &&
		(rule.interface === undefined || message.interface === rule.interface) &&
		(rule.sender === undefined || message.sender === rule.sender)
	);
}

export class DbusConnection implements IBusConnection {
	private readonly callTimeoutMs: number;
	private readonly registrations = new Map<MatchToken, Registration>();
	private readonly pendingRemovals = new Map<MatchToken, Promise<void>>();
	private nextToken: MatchToken = 1;

	constructor(
		private readonly bus: MessageTransport,
		options: DbusConnectionOptions = {},
	) {
		this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
	}

	async call(method: MethodCall): Promise<unknown[]> {
		const message = new dbus.Message({
			destination: method.destination,
			path: method.path,
			interface: method.interface,
			member: method.member,
			signature: method.signature ?? "",
			body: method.body ?? [],
		});

		logger.debug(`-> ${method.destination} ${method.interface}.${method.member}`);
		const reply = await this.withTimeout(
			this.bus.call(message),
			`${method.interface}.${method.member}`,
		);
		const body: unknown[] = reply ? reply.body : [];
		return body;
	}

	async getProperty(
		destination: string,
		path: string,
		interfaceName: string,
		property: string,
	): Promise<Variant> {
		const body = await this.call({
			destination,
			path,
			interface: PROPERTIES_INTERFACE,
			member: "Get",
			signature: "ss",
			body: [interfaceName, property],
		});
		const [value] = GetPropertyReplySchema.parse(body);
		return value;
	}

	async setProperty(
		destination: string,
		path: string,
		interfaceName: string,
		property: string,
		value: Variant,
	): Promise<void> {
		await this.call({
			destination,
			path,
			interface: PROPERTIES_INTERFACE,
			member: "Set",
			signature: "ssv",
			body: [interfaceName, property, value],
		});
	}

	async nameHasOwner(name: string): Promise<boolean> {
		const body = await this.call({
			destination: DBUS_SERVICE,
			path: DBUS_PATH,
			interface: DBUS_INTERFACE,
			member: "NameHasOwner",
			signature: "s",
			body: [name],
		});
		const [hasOwner] = NameHasOwnerReplySchema.parse(body);
		return hasOwner;
	}

	async addMatch(rule: MatchRule, handler: SignalHandler): Promise<MatchToken> {
		const ruleString = formatMatchRule(rule);
		await this.callBusDaemon("AddMatch", ruleString);

		const token = this.nextToken++;
		const listener: MessageListener = (message) => {
			if (matchesRule(message, rule)) {
				handler(message);
			}
		};
		this.bus.on("message", listener);
		this.registrations.set(token, { rule, ruleString, listener });

		logger.debug(`Match #${token} added: ${ruleString}`);
		return token;
	}

	/**
	 * Concurrent removals of one token share a single RemoveMatch; the daemon
	 * drops one copy of a rule per call.
	 */
	async removeMatch(token: MatchToken): Promise<void> {
		const pending = this.pendingRemovals.get(token);
		if (pending) {
			return pending;
		}

		const registration = this.registrations.get(token);
		if (!registration) {
			throw new Error(`Unknown match token #${token}`);
		}

		const removal = this.unregister(token, registration).finally(() => {
			this.pendingRemovals.delete(token);
		});
		this.pendingRemovals.set(token, removal);
		return removal;
	}

	/**
	 * Number of matches currently routed by this connection
	 */
	get matchCount(): number {
		return this.registrations.size;
	}

	/**
	 * Close the underlying bus. Only the connection's owner calls this.
	 */
	disconnect(): void {
		for (const { listener } of this.registrations.values()) {
			this.bus.removeListener("message", listener);
		}
		this.registrations.clear();
		this.bus.disconnect();
	}

	private async unregister(
		token: MatchToken,
		registration: Registration,
	): Promise<void> {
		// Kept routable until the daemon confirms, so a failed removal can be retried
		await this.callBusDaemon("RemoveMatch", registration.ruleString);

		this.bus.removeListener("message", registration.listener);
		this.registrations.delete(token);
		logger.debug(`Match #${token} removed`);
	}

	private async callBusDaemon(member: string, rule: string): Promise<void> {
		await this.call({
			destination: DBUS_SERVICE,
			path: DBUS_PATH,
			interface: DBUS_INTERFACE,
			member,
			signature: "s",
			body: [rule],
		});
	}

	private withTimeout<T>(promise: Promise<T>, what: string): Promise<T> {
		if (this.callTimeoutMs <= 0) {
			return promise;
		}

		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				reject(new Error(`${what} timed out after ${this.callTimeoutMs}ms`));
			}, this.callTimeoutMs);
		});

		return Promise.race([promise, timeout]).finally(() => {
			clearTimeout(timer);
		});
	}
}

/**
 * Open a connection on the session bus.
 * Options left out come from the user's configuration.
 */
export function connectSessionBus(
	options: DbusConnectionOptions = {},
): DbusConnection {
	const config = getConfigService().load();
	return new DbusConnection(dbus.sessionBus(), {
		callTimeoutMs: options.callTimeoutMs ?? config.callTimeoutMs,
	});
}
