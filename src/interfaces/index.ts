/**
 * Interfaces module
 * Exports the connection, player and event manager contracts
 */

export type { IBusConnection } from "./IBusConnection";
export type { IEventManager, EventSubscription } from "./IEventManager";
export type { IPlayer } from "./IPlayer";
