/**
 * Player Interface
 * One remote call per method against a single MPRIS player
 */

import type { Variant } from "dbus-next";
import type {
	MprisMetadata,
	PlayerProperty,
	PlayerPropertyMap,
	WritablePlayerProperty,
} from "../types/mpris";

export interface IPlayer {
	readonly name: string;
	readonly busName: string;

	// Playback controls
	next(): Promise<void>;
	previous(): Promise<void>;
	pause(): Promise<void>;
	play(): Promise<void>;
	playPause(): Promise<void>;
	stop(): Promise<void>;
	seek(offsetMs: number): Promise<void>;
	seekReverse(offsetMs: number): Promise<void>;
	setPosition(trackId: string, positionUs: number | bigint): Promise<void>;
	openUri(uri: string): Promise<void>;

	// Properties
	getMetadataProperty(key: string): Promise<Variant>;
	getMetadata(): Promise<MprisMetadata>;
	getProperty<K extends PlayerProperty>(name: K): Promise<PlayerPropertyMap[K]>;
	getRawProperty(name: string): Promise<Variant>;
	setProperty<K extends WritablePlayerProperty>(
		name: K,
		value: PlayerPropertyMap[K],
	): Promise<void>;
	setRawProperty(name: string, value: Variant): Promise<void>;

	// Root interface
	raise(): Promise<void>;
	quit(): Promise<void>;
}
