/**
 * MPRIS Types
 * Types for the MPRIS D-Bus interface
 */

import type { Message, Variant } from "dbus-next";

/**
 * MPRIS Playback status
 */
export type PlaybackStatus = "Playing" | "Paused" | "Stopped";

/**
 * MPRIS Loop status
 */
export type LoopStatus = "None" | "Track" | "Playlist";

/**
 * Decoded `a{sv}` dictionary
 */
export type VariantDict = Record<string, Variant>;

/**
 * Raw metadata dictionary as it comes off the bus
 */
export type MetadataMap = VariantDict;

/**
 * Track metadata from MPRIS
 */
export interface MprisMetadata {
	trackId: string;
	title: string;
	artist: string[];
	album: string;
	albumArtist: string[];
	artUrl: string;
	length: bigint; // microseconds
	url: string;
}

/**
 * Properties of org.mpris.MediaPlayer2.Player with their decoded types
 */
export interface PlayerPropertyMap {
	PlaybackStatus: PlaybackStatus;
	LoopStatus: LoopStatus;
	Rate: number;
	Shuffle: boolean;
	Metadata: MetadataMap;
	Volume: number;
	Position: bigint; // microseconds
	MinimumRate: number;
	MaximumRate: number;
	CanGoNext: boolean;
	CanGoPrevious: boolean;
	CanPlay: boolean;
	CanPause: boolean;
	CanSeek: boolean;
	CanControl: boolean;
}

export type PlayerProperty = keyof PlayerPropertyMap;

/**
 * Player properties clients may write
 */
export type WritablePlayerProperty = "LoopStatus" | "Rate" | "Shuffle" | "Volume";

/**
 * Signals the event manager can subscribe to
 */
export enum EventType {
	/** Any player property changed */
	PropertiesChanged = "PropertiesChanged",
	/** Playback position jumped outside normal progression */
	Seeked = "Seeked",
}

/**
 * A D-Bus signal match rule
 */
export interface MatchRule {
	type: "signal";
	member: string;
	path: string;
	interface?: string;
	sender?: string;
}

/**
 * Opaque handle for one registered match
 */
export type MatchToken = number;

/**
 * Receives every signal matching a registered rule
 */
export type SignalHandler = (message: Message) => void;

/**
 * Return true to keep receiving, false to end the subscription
 */
export type EventCallback = (message: Message) => boolean;

/**
 * A remote method invocation
 */
export interface MethodCall {
	destination: string;
	path: string;
	interface: string;
	member: string;
	signature?: string;
	body?: unknown[];
}

/**
 * Decoded org.freedesktop.DBus.Properties.PropertiesChanged body
 */
export interface PropertiesChangedEvent {
	interfaceName: string;
	changed: VariantDict;
	invalidated: string[];
}
