import dbus from "dbus-next";
import { beforeEach, describe, expect, it } from "vitest";
import { DbusConnection } from "../../src/services/DbusConnection";
import {
	ErrorCategory,
	MprisError,
	createErrorHandler,
} from "../../src/services/ErrorHandler";
import { Player, toMicroseconds } from "../../src/services/Player";
import { PLAYER_INTERFACE, ROOT_INTERFACE } from "../../src/config/constants";
import {
	FakeMessageBus,
	TEST_BUS_NAME,
	TEST_PLAYER,
} from "../support/FakeMessageBus";

const TRACK_ID = "/org/mpris/MediaPlayer2/Track/1";

async function rejection(promise: Promise<unknown>): Promise<MprisError> {
	try {
		await promise;
	} catch (error) {
		if (error instanceof MprisError) return error;
		throw error;
	}
	throw new Error("expected the promise to reject");
}

describe("Player", () => {
	let bus: FakeMessageBus;
	let connection: DbusConnection;

	const createPlayer = () =>
		Player.tryNew(TEST_PLAYER, connection, {
			errorHandler: createErrorHandler(),
		});

	const setPlayerProperty = (name: string, signature: string, value: unknown) =>
		bus.setProperty(
			TEST_BUS_NAME,
			PLAYER_INTERFACE,
			name,
			new dbus.Variant(signature, value),
		);

	beforeEach(() => {
		bus = new FakeMessageBus().addPlayer();
		connection = new DbusConnection(bus, { callTimeoutMs: 0 });
	});

	describe("tryNew()", () => {
		it("validates the player and records its identity", async () => {
			const player = await createPlayer();

			expect(player.name).toBe(TEST_PLAYER);
			expect(player.busName).toBe(TEST_BUS_NAME);
			expect(player.identity).toBe("Test Player");
			expect(bus.sent.map((m) => m.member)).toEqual(["NameHasOwner", "Get"]);
		});

		it.each(["", "9lives", "has space", "double..dot", "trailing."])(
			"rejects the malformed name %j without touching the bus",
			async (name) => {
				const error = await rejection(
					Player.tryNew(name, connection, { errorHandler: createErrorHandler() }),
				);

				expect(error.category).toBe(ErrorCategory.INVALID_PLAYER);
				expect(bus.sent).toHaveLength(0);
			},
		);

		it("rejects a player that is not on the bus", async () => {
			const error = await rejection(
				Player.tryNew("ghost", connection, { errorHandler: createErrorHandler() }),
			);

			expect(error.category).toBe(ErrorCategory.INVALID_PLAYER);
			expect(error.message).toBe(
				"The provided player was invalid: org.mpris.MediaPlayer2.ghost is not on the bus",
			);
			expect(bus.sent.map((m) => m.member)).toEqual(["NameHasOwner"]);
		});

		it("rejects a name owner that does not implement the MPRIS root interface", async () => {
			bus.owners.add("org.mpris.MediaPlayer2.impostor");

			const error = await rejection(
				Player.tryNew("impostor", connection, { errorHandler: createErrorHandler() }),
			);

			expect(error.category).toBe(ErrorCategory.INVALID_PLAYER);
			expect(bus.sentTo("Get")).toHaveLength(1);
		});

		it("reports a failing existence check as a transport error", async () => {
			bus.fail("org.freedesktop.DBus.NameHasOwner", "org.freedesktop.DBus.Error.NoReply");

			const error = await rejection(createPlayer());

			expect(error.category).toBe(ErrorCategory.TRANSPORT);
			expect(error.dbusErrorName).toBe("org.freedesktop.DBus.Error.NoReply");
		});
	});

	describe("playback controls", () => {
		it.each([
			["next", "Next"],
			["previous", "Previous"],
			["pause", "Pause"],
			["play", "Play"],
			["playPause", "PlayPause"],
			["stop", "Stop"],
		] as const)("%s() issues exactly one %s call with no arguments", async (method, member) => {
			const player = await createPlayer();
			bus.clearSent();

			await player[method]();

			expect(bus.sent).toHaveLength(1);
			const [message] = bus.sent;
			expect(message.destination).toBe(TEST_BUS_NAME);
			expect(message.path).toBe("/org/mpris/MediaPlayer2");
			expect(message.interface).toBe(PLAYER_INTERFACE);
			expect(message.member).toBe(member);
			expect(message.signature).toBe("");
			expect(message.body).toEqual([]);
		});

		it("propagates a transport failure", async () => {
			const player = await createPlayer();
			bus.fail(`${PLAYER_INTERFACE}.Next`, "org.freedesktop.DBus.Error.NoReply");

			const error = await rejection(player.next());

			expect(error.category).toBe(ErrorCategory.TRANSPORT);
			expect(error.operation).toBe("Next");
			expect(error.dbusErrorName).toBe("org.freedesktop.DBus.Error.NoReply");
		});

		it("reports an unsupported method as an invalid argument", async () => {
			const player = await createPlayer();
			bus.fail(`${PLAYER_INTERFACE}.Stop`, "org.freedesktop.DBus.Error.UnknownMethod");

			const error = await rejection(player.stop());

			expect(error.category).toBe(ErrorCategory.INVALID_ARGUMENT);
		});

		it("calls Raise and Quit on the root interface", async () => {
			const player = await createPlayer();
			bus.clearSent();

			await player.raise();
			await player.quit();

			expect(bus.sent.map((m) => [m.interface, m.member])).toEqual([
				[ROOT_INTERFACE, "Raise"],
				[ROOT_INTERFACE, "Quit"],
			]);
		});
	});

	describe("seeking", () => {
		it("sends the offset in microseconds", async () => {
			const player = await createPlayer();
			bus.clearSent();

			await player.seek(5000);

			expect(bus.sent).toHaveLength(1);
			expect(bus.sent[0].member).toBe("Seek");
			expect(bus.sent[0].signature).toBe("x");
			expect(bus.sent[0].body).toEqual([BigInt(5_000_000)]);
		});

		it("seekReverse(d) sends exactly what seek(-d) sends", async () => {
			const player = await createPlayer();
			bus.clearSent();

			await player.seekReverse(2500);
			await player.seek(-2500);

			const [reverse, negative] = bus.sentTo("Seek");
			expect(reverse.body).toEqual([BigInt(-2_500_000)]);
			expect(reverse.body).toEqual(negative.body);
			expect(reverse.signature).toBe(negative.signature);
		});

		it("rejects a non-finite offset locally", async () => {
			const player = await createPlayer();
			bus.clearSent();

			const error = await rejection(player.seek(Number.NaN));

			expect(error.category).toBe(ErrorCategory.INVALID_ARGUMENT);
			expect(bus.sent).toHaveLength(0);
		});

		it("rounds fractional milliseconds to whole microseconds", () => {
			expect(toMicroseconds(1.0004)).toBe(BigInt(1000));
			expect(toMicroseconds(-0.25)).toBe(BigInt(-250));
		});
	});

	describe("setPosition()", () => {
		it("issues one SetPosition carrying the track and position", async () => {
			const player = await createPlayer();
			bus.clearSent();

			await player.setPosition(TRACK_ID, 150000);

			expect(bus.sent).toHaveLength(1);
			expect(bus.sent[0].member).toBe("SetPosition");
			expect(bus.sent[0].signature).toBe("ox");
			expect(bus.sent[0].body).toEqual([TRACK_ID, BigInt(150000)]);
		});

		it("rejects a fractional position", async () => {
			const player = await createPlayer();
			bus.clearSent();

			const error = await rejection(player.setPosition(TRACK_ID, 1.5));

			expect(error.category).toBe(ErrorCategory.INVALID_ARGUMENT);
			expect(bus.sent).toHaveLength(0);
		});
	});

	describe("openUri()", () => {
		it("passes the URI through", async () => {
			const player = await createPlayer();
			bus.clearSent();

			await player.openUri("file:///music/song.ogg");

			expect(bus.sent).toHaveLength(1);
			expect(bus.sent[0].member).toBe("OpenUri");
			expect(bus.sent[0].body).toEqual(["file:///music/song.ogg"]);
		});

		it("rejects an invalid URI without calling the player", async () => {
			const player = await createPlayer();
			bus.clearSent();

			const error = await rejection(player.openUri("not a uri"));

			expect(error.category).toBe(ErrorCategory.INVALID_ARGUMENT);
			expect(bus.sent).toHaveLength(0);
		});

		it("surfaces a refusal from the player", async () => {
			const player = await createPlayer();
			bus.fail(`${PLAYER_INTERFACE}.OpenUri`, "org.freedesktop.DBus.Error.NotSupported");

			const error = await rejection(player.openUri("https://example.com/stream"));

			expect(error.category).toBe(ErrorCategory.TRANSPORT);
			expect(error.dbusErrorName).toBe("org.freedesktop.DBus.Error.NotSupported");
		});
	});

	describe("properties", () => {
		it("reads a typed property", async () => {
			setPlayerProperty("PlaybackStatus", "s", "Playing");
			setPlayerProperty("Position", "x", BigInt(42_000_000));
			const player = await createPlayer();

			expect(await player.getProperty("PlaybackStatus")).toBe("Playing");
			expect(await player.getProperty("Position")).toBe(BigInt(42_000_000));
		});

		it("reports a value of the wrong type as a type mismatch", async () => {
			setPlayerProperty("Volume", "s", "loud");
			const player = await createPlayer();

			const error = await rejection(player.getProperty("Volume"));

			expect(error.category).toBe(ErrorCategory.TYPE_MISMATCH);
			expect(error.operation).toBe("getProperty(Volume)");
		});

		it("reports an unknown property as an invalid argument", async () => {
			const player = await createPlayer();

			const error = await rejection(player.getRawProperty("Sparkle"));

			expect(error.category).toBe(ErrorCategory.INVALID_ARGUMENT);
			expect(error.dbusErrorName).toBe("org.freedesktop.DBus.Error.UnknownProperty");
		});

		it("round-trips writable properties through get, set and get", async () => {
			setPlayerProperty("Shuffle", "b", true);
			setPlayerProperty("Volume", "d", 0.5);
			setPlayerProperty("LoopStatus", "s", "Playlist");
			const player = await createPlayer();

			const shuffle = await player.getProperty("Shuffle");
			await player.setProperty("Shuffle", shuffle);
			expect(await player.getProperty("Shuffle")).toBe(true);

			const volume = await player.getProperty("Volume");
			await player.setProperty("Volume", volume);
			expect(await player.getProperty("Volume")).toBe(0.5);

			const loop = await player.getProperty("LoopStatus");
			await player.setProperty("LoopStatus", loop);
			expect(await player.getProperty("LoopStatus")).toBe("Playlist");
		});

		it("writes values with the property's D-Bus signature", async () => {
			const player = await createPlayer();
			bus.clearSent();

			await player.setProperty("Volume", 0.25);

			expect(bus.sent).toHaveLength(1);
			const [set] = bus.sent;
			expect(set.member).toBe("Set");
			expect(set.signature).toBe("ssv");
			expect(set.body[0]).toBe(PLAYER_INTERFACE);
			expect(set.body[1]).toBe("Volume");
			expect(set.body[2]).toBeInstanceOf(dbus.Variant);
			expect(set.body[2].signature).toBe("d");
			expect(set.body[2].value).toBe(0.25);
		});

		it("writes a caller-built variant as is", async () => {
			const player = await createPlayer();

			await player.setRawProperty("Rate", new dbus.Variant("d", 1.5));

			const stored = bus.getStoredProperty(TEST_BUS_NAME, PLAYER_INTERFACE, "Rate");
			expect(stored?.signature).toBe("d");
			expect(stored?.value).toBe(1.5);
			expect((await player.getRawProperty("Rate")).value).toBe(1.5);
		});

		it("reports a read-only property write as an invalid argument", async () => {
			const player = await createPlayer();
			bus.fail(
				"org.freedesktop.DBus.Properties.Set",
				"org.freedesktop.DBus.Error.PropertyReadOnly",
			);

			const error = await rejection(player.setProperty("Rate", 2));

			expect(error.category).toBe(ErrorCategory.INVALID_ARGUMENT);
		});
	});

	describe("metadata", () => {
		beforeEach(() => {
			setPlayerProperty("Metadata", "a{sv}", {
				"mpris:trackid": new dbus.Variant("o", TRACK_ID),
				"xesam:title": new dbus.Variant("s", "Night Drive"),
				"xesam:artist": new dbus.Variant("as", ["First Artist", "Second Artist"]),
				"mpris:length": new dbus.Variant("x", BigInt(180_000_000)),
				"xesam:album": new dbus.Variant("i", 7),
			});
		});

		it("returns one raw metadata entry", async () => {
			const player = await createPlayer();

			const title = await player.getMetadataProperty("xesam:title");

			expect(title.signature).toBe("s");
			expect(title.value).toBe("Night Drive");
		});

		it("fails when the metadata has no such key", async () => {
			const player = await createPlayer();

			const error = await rejection(player.getMetadataProperty("xesam:genre"));

			expect(error.category).toBe(ErrorCategory.INVALID_ARGUMENT);
			expect(error.message).toBe('getMetadataProperty: metadata has no "xesam:genre" entry');
		});

		it("does not resolve keys inherited from Object.prototype", async () => {
			const player = await createPlayer();

			for (const key of ["constructor", "toString", "__proto__"]) {
				const error = await rejection(player.getMetadataProperty(key));

				expect(error.category).toBe(ErrorCategory.INVALID_ARGUMENT);
				expect(error.message).toBe(`getMetadataProperty: metadata has no "${key}" entry`);
			}
		});

		it("parses well-known fields, defaulting missing or malformed ones", async () => {
			const player = await createPlayer();
			bus.clearSent();

			const metadata = await player.getMetadata();

			expect(metadata).toEqual({
				trackId: TRACK_ID,
				title: "Night Drive",
				artist: ["First Artist", "Second Artist"],
				album: "Unknown",
				albumArtist: [],
				artUrl: "",
				length: BigInt(180_000_000),
				url: "",
			});
			expect(bus.sent).toHaveLength(1);
		});
	});
});
