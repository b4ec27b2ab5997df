/**
 * Bus Connection Interface
 * The shared, externally owned message-bus connection that players and
 * event managers borrow. Implementations never close it on their behalf.
 */

import type { Variant } from "dbus-next";
import type {
	MatchRule,
	MatchToken,
	MethodCall,
	SignalHandler,
} from "../types/mpris";

export interface IBusConnection {
	/**
	 * Invoke a remote method and resolve with the reply body
	 */
	call(method: MethodCall): Promise<unknown[]>;

	/**
	 * Read a property through org.freedesktop.DBus.Properties.Get
	 */
	getProperty(
		destination: string,
		path: string,
		interfaceName: string,
		property: string,
	): Promise<Variant>;

	/**
	 * Write a property through org.freedesktop.DBus.Properties.Set
	 */
	setProperty(
		destination: string,
		path: string,
		interfaceName: string,
		property: string,
		value: Variant,
	): Promise<void>;

	/**
	 * Ask the bus daemon whether a name currently has an owner
	 */
	nameHasOwner(name: string): Promise<boolean>;

	/**
	 * Register a signal match and route matching messages to `handler`
	 */
	addMatch(rule: MatchRule, handler: SignalHandler): Promise<MatchToken>;

	/**
	 * Remove a match registered by `addMatch`
	 */
	removeMatch(token: MatchToken): Promise<void>;
}
