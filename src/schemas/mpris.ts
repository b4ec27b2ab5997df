/**
 * Zod schemas for values read from and written to MPRIS players
 * Wire values arrive untyped from the bus; everything is validated here
 */

import dbus from "dbus-next";
import { z } from "zod";
import { MAX_BUS_NAME_LENGTH, MPRIS_PREFIX } from "../config/constants";
import type {
	PlayerPropertyMap,
	WritablePlayerProperty,
} from "../types/mpris";

// ============================================================================
// Names
// ============================================================================

/**
 * Player short name: the part after `org.mpris.MediaPlayer2.`.
 * Dot-separated elements of [A-Za-z0-9_-], none starting with a digit.
 */
export const PlayerNameSchema = z
	.string()
	.min(1)
	.max(MAX_BUS_NAME_LENGTH - MPRIS_PREFIX.length - 1)
	.regex(/^[A-Za-z_-][A-Za-z0-9_-]*(\.[A-Za-z_-][A-Za-z0-9_-]*)*$/);

export const ObjectPathSchema = z
	.string()
	.regex(/^\/$|^(\/[A-Za-z0-9_]+)+$/);

export const MemberNameSchema = z
	.string()
	.max(255)
	.regex(/^[A-Za-z_][A-Za-z0-9_]*$/);

export const UriSchema = z.string().url();

// ============================================================================
// Values
// ============================================================================

export const VariantSchema = z.instanceof(dbus.Variant);

export const VariantDictSchema = z.record(z.string(), VariantSchema);

export const PlaybackStatusSchema = z.enum(["Playing", "Paused", "Stopped"]);

export const LoopStatusSchema = z.enum(["None", "Track", "Playlist"]);

/**
 * int64 values normally decode as bigint; accept safe integers too
 */
const Int64Schema = z.union([
	z.bigint(),
	z.number().int().transform((n) => BigInt(n)),
]);

/**
 * Schema for each Player property value
 */
export const PlayerPropertySchemas: {
	[K in keyof PlayerPropertyMap]: z.ZodType<PlayerPropertyMap[K], z.ZodTypeDef, unknown>;
} = {
	PlaybackStatus: PlaybackStatusSchema,
	LoopStatus: LoopStatusSchema,
	Rate: z.number(),
	Shuffle: z.boolean(),
	Metadata: VariantDictSchema,
	Volume: z.number(),
	Position: Int64Schema,
	MinimumRate: z.number(),
	MaximumRate: z.number(),
	CanGoNext: z.boolean(),
	CanGoPrevious: z.boolean(),
	CanPlay: z.boolean(),
	CanPause: z.boolean(),
	CanSeek: z.boolean(),
	CanControl: z.boolean(),
};

/**
 * D-Bus signature written for each writable property
 */
export const WritablePropertySignatures: Record<WritablePlayerProperty, string> = {
	LoopStatus: "s",
	Rate: "d",
	Shuffle: "b",
	Volume: "d",
};

// ============================================================================
// Metadata
// ============================================================================

const variantOf = <T extends z.ZodTypeAny>(inner: T) =>
	VariantSchema.transform((v) => v.value).pipe(inner);

/**
 * Well-known metadata keys with defaults for anything missing or malformed
 */
export const MetadataSchema = z
	.object({
		"mpris:trackid": variantOf(z.string()).catch(""),
		"xesam:title": variantOf(z.string()).catch("Unknown"),
		"xesam:artist": variantOf(z.array(z.string())).catch(["Unknown"]),
		"xesam:album": variantOf(z.string()).catch("Unknown"),
		"xesam:albumArtist": variantOf(z.array(z.string())).catch([]),
		"mpris:artUrl": variantOf(z.string()).catch(""),
		"mpris:length": variantOf(Int64Schema).catch(BigInt(0)),
		"xesam:url": variantOf(z.string()).catch(""),
	})
	.transform((m) => ({
		trackId: m["mpris:trackid"],
		title: m["xesam:title"],
		artist: m["xesam:artist"],
		album: m["xesam:album"],
		albumArtist: m["xesam:albumArtist"],
		artUrl: m["mpris:artUrl"],
		length: m["mpris:length"],
		url: m["xesam:url"],
	}));

// ============================================================================
// Signal bodies
// ============================================================================

/**
 * org.freedesktop.DBus.Properties.PropertiesChanged (sa{sv}as)
 */
export const PropertiesChangedBodySchema = z.tuple([
	z.string(),
	VariantDictSchema,
	z.array(z.string()),
]);

/**
 * org.mpris.MediaPlayer2.Player.Seeked (x)
 */
export const SeekedBodySchema = z.tuple([Int64Schema]);

/**
 * org.freedesktop.DBus.NameHasOwner reply (b)
 */
export const NameHasOwnerReplySchema = z.tuple([z.boolean()]);

/**
 * org.freedesktop.DBus.Properties.Get reply (v)
 */
export const GetPropertyReplySchema = z.tuple([VariantSchema]);
