/**
 * Player
 * Controls one MPRIS player through a borrowed bus connection
 */

import dbus, { type Variant } from "dbus-next";
import type { IBusConnection } from "../interfaces/IBusConnection";
import type { IPlayer } from "../interfaces/IPlayer";
import {
	MPRIS_PATH,
	MPRIS_PREFIX,
	PLAYER_INTERFACE,
	ROOT_INTERFACE,
} from "../config/constants";
import {
	MetadataSchema,
	PlayerNameSchema,
	PlayerPropertySchemas,
	UriSchema,
	VariantSchema,
	WritablePropertySignatures,
} from "../schemas/mpris";
import type {
	MprisMetadata,
	PlayerProperty,
	PlayerPropertyMap,
	WritablePlayerProperty,
} from "../types/mpris";
import { getLogger } from "../utils/Logger";
import {
	ErrorCategory,
	ErrorHandler,
	ErrorSeverity,
	MprisError,
	getErrorHandler,
} from "./ErrorHandler";

const logger = getLogger("Player");

export interface PlayerOptions {
	errorHandler?: ErrorHandler;
}

/**
 * Full bus name for a player short name
 */
export function playerBusName(name: string): string {
	return `${MPRIS_PREFIX}.${name}`;
}

/**
 * Milliseconds to the signed microsecond offset MPRIS expects
 */
export function toMicroseconds(ms: number): bigint {
	return BigInt(Math.round(ms * 1000));
}

/**
 * A validated handle on one MPRIS player.
 * The connection is borrowed: it must outlive the player and is never closed here.
 */
export class Player implements IPlayer {
	readonly busName: string;

	private constructor(
		readonly name: string,
		/** Identity reported by the player when it was validated */
		readonly identity: string,
		private readonly connection: IBusConnection,
		private readonly errors: ErrorHandler,
	) {
		this.busName = playerBusName(name);
	}

	/**
	 * Validate `name` against the bus and build a handle for it.
	 * The check runs once; later calls do not re-validate.
	 */
	static async tryNew(
		name: string,
		connection: IBusConnection,
		options: PlayerOptions = {},
	): Promise<Player> {
		const errors = options.errorHandler ?? getErrorHandler();
		const invalid = (reason: string, cause?: unknown) =>
			errors.handle(
				new MprisError(
					ErrorCategory.INVALID_PLAYER,
					"tryNew",
					`The provided player was invalid: ${reason}`,
					{ cause },
				),
				{
					category: ErrorCategory.INVALID_PLAYER,
					severity: ErrorSeverity.INFO,
					operation: "tryNew",
				},
			);

		if (!PlayerNameSchema.safeParse(name).success) {
			throw await invalid(`"${name}" is not a valid bus name`);
		}

		const busName = playerBusName(name);
		const hasOwner = await errors.guard("tryNew", () =>
			connection.nameHasOwner(busName),
		);
		if (!hasOwner) {
			throw await invalid(`${busName} is not on the bus`);
		}

		let identity: string;
		try {
			const variant = await connection.getProperty(
				busName,
				MPRIS_PATH,
				ROOT_INTERFACE,
				"Identity",
			);
			identity = String(variant.value);
		} catch (error) {
			throw await invalid(`${busName} does not implement ${ROOT_INTERFACE}`, error);
		}

		logger.debug(`Player ${busName} validated (${identity})`);
		return new Player(name, identity, connection, errors);
	}

	// ─────────────────────────────────────────────────────────────
	// Playback Controls
	// ─────────────────────────────────────────────────────────────

	/**
	 * Skip to the next track
	 */
	async next(): Promise<void> {
		await this.invoke(PLAYER_INTERFACE, "Next");
	}

	/**
	 * Skip to the previous track
	 */
	async previous(): Promise<void> {
		await this.invoke(PLAYER_INTERFACE, "Previous");
	}

	async pause(): Promise<void> {
		await this.invoke(PLAYER_INTERFACE, "Pause");
	}

	/**
	 * Start or resume playback
	 */
	async play(): Promise<void> {
		await this.invoke(PLAYER_INTERFACE, "Play");
	}

	async playPause(): Promise<void> {
		await this.invoke(PLAYER_INTERFACE, "PlayPause");
	}

	async stop(): Promise<void> {
		await this.invoke(PLAYER_INTERFACE, "Stop");
	}

	/**
	 * Move the playback position by `offsetMs` relative to the current one
	 */
	async seek(offsetMs: number): Promise<void> {
		if (!Number.isFinite(offsetMs)) {
			throw await this.rejectArgument("seek", `offset must be finite, got ${offsetMs}`);
		}
		await this.invoke(PLAYER_INTERFACE, "Seek", "x", [toMicroseconds(offsetMs)]);
	}

	/**
	 * Same as `seek`, but backwards
	 */
	async seekReverse(offsetMs: number): Promise<void> {
		await this.seek(-offsetMs);
	}

	/**
	 * Jump to an absolute position in the given track.
	 * Unlike a bare `setPosition(us)`, MPRIS `SetPosition(o, x)` needs the track id
	 * too; pass `getMetadata().trackId`. Players ignore the call when `trackId` is
	 * not the current track.
	 */
	async setPosition(trackId: string, positionUs: number | bigint): Promise<void> {
		if (typeof positionUs === "number" && !Number.isSafeInteger(positionUs)) {
			throw await this.rejectArgument(
				"setPosition",
				`position must be an integer number of microseconds, got ${positionUs}`,
			);
		}
		await this.invoke(PLAYER_INTERFACE, "SetPosition", "ox", [
			trackId,
			BigInt(positionUs),
		]);
	}

	/**
	 * Ask the player to open (and usually play) a URI
	 */
	async openUri(uri: string): Promise<void> {
		if (!UriSchema.safeParse(uri).success) {
			throw await this.rejectArgument("openUri", `"${uri}" is not a valid URI`);
		}
		await this.invoke(PLAYER_INTERFACE, "OpenUri", "s", [uri]);
	}

	// ─────────────────────────────────────────────────────────────
	// Root interface
	// ─────────────────────────────────────────────────────────────

	/**
	 * Bring the player's UI to the front
	 */
	async raise(): Promise<void> {
		await this.invoke(ROOT_INTERFACE, "Raise");
	}

	async quit(): Promise<void> {
		await this.invoke(ROOT_INTERFACE, "Quit");
	}

	// ─────────────────────────────────────────────────────────────
	// Properties
	// ─────────────────────────────────────────────────────────────

	/**
	 * One entry of the Metadata dictionary, as sent by the player
	 */
	async getMetadataProperty(key: string): Promise<Variant> {
		const metadata = await this.getProperty("Metadata");
		if (!Object.hasOwn(metadata, key)) {
			throw await this.rejectArgument(
				"getMetadataProperty",
				`metadata has no "${key}" entry`,
			);
		}
		return metadata[key];
	}

	/**
	 * Well-known metadata fields with defaults for missing ones
	 */
	async getMetadata(): Promise<MprisMetadata> {
		const metadata = await this.getProperty("Metadata");
		return MetadataSchema.parse(metadata);
	}

	/**
	 * Read a Player property, checked against its MPRIS type
	 */
	async getProperty<K extends PlayerProperty>(
		name: K,
	): Promise<PlayerPropertyMap[K]> {
		const schema = PlayerPropertySchemas[name];
		return this.errors.guard(
			`getProperty(${name})`,
			async () => {
				const variant = await this.connection.getProperty(
					this.busName,
					MPRIS_PATH,
					PLAYER_INTERFACE,
					name,
				);
				return schema.parse(variant.value);
			},
			{ player: this.busName },
		);
	}

	/**
	 * Read any Player property without interpreting it
	 */
	async getRawProperty(name: string): Promise<Variant> {
		return this.errors.guard(
			`getRawProperty(${name})`,
			() =>
				this.connection.getProperty(
					this.busName,
					MPRIS_PATH,
					PLAYER_INTERFACE,
					name,
				),
			{ player: this.busName },
		);
	}

	/**
	 * Write a writable Player property
	 */
	async setProperty<K extends WritablePlayerProperty>(
		name: K,
		value: PlayerPropertyMap[K],
	): Promise<void> {
		const operation = `setProperty(${name})`;
		const checked = PlayerPropertySchemas[name].safeParse(value);
		if (!checked.success) {
			throw await this.errors.handle(checked.error, {
				category: ErrorCategory.TYPE_MISMATCH,
				severity: ErrorSeverity.WARNING,
				operation,
			});
		}

		const variant = new dbus.Variant(WritablePropertySignatures[name], checked.data);
		await this.errors.guard(
			operation,
			() =>
				this.connection.setProperty(
					this.busName,
					MPRIS_PATH,
					PLAYER_INTERFACE,
					name,
					variant,
				),
			{ player: this.busName },
		);
	}

	/**
	 * Write any Player property with a caller-built variant
	 */
	async setRawProperty(name: string, value: Variant): Promise<void> {
		const operation = `setRawProperty(${name})`;
		if (!VariantSchema.safeParse(value).success) {
			throw await this.rejectArgument(operation, "value must be a Variant");
		}
		await this.errors.guard(
			operation,
			() =>
				this.connection.setProperty(
					this.busName,
					MPRIS_PATH,
					PLAYER_INTERFACE,
					name,
					value,
				),
			{ player: this.busName },
		);
	}

	// ─────────────────────────────────────────────────────────────
	// Internals
	// ─────────────────────────────────────────────────────────────

	private async invoke(
		interfaceName: string,
		member: string,
		signature?: string,
		body?: unknown[],
	): Promise<void> {
		await this.errors.guard(
			member,
			() =>
				this.connection.call({
					destination: this.busName,
					path: MPRIS_PATH,
					interface: interfaceName,
					member,
					signature,
					body,
				}),
			{ player: this.busName },
		);
	}

	private rejectArgument(operation: string, reason: string): Promise<MprisError> {
		return this.errors.handle(
			new MprisError(
				ErrorCategory.INVALID_ARGUMENT,
				operation,
				`${operation}: ${reason}`,
			),
			{
				category: ErrorCategory.INVALID_ARGUMENT,
				severity: ErrorSeverity.WARNING,
				operation,
			},
		);
	}
}
