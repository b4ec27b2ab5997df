import dbus from "dbus-next";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
	DbusConnection,
	formatMatchRule,
	matchesRule,
} from "../../src/services/DbusConnection";
import { PLAYER_INTERFACE } from "../../src/config/constants";
import { FakeMessageBus, TEST_BUS_NAME } from "../support/FakeMessageBus";

describe("formatMatchRule()", () => {
	it("renders type, path and member", () => {
		expect(
			formatMatchRule({ type: "signal", member: "Seeked", path: "/org/mpris/MediaPlayer2" }),
		).toBe("type='signal',path='/org/mpris/MediaPlayer2',member='Seeked'");
	});

	it("includes sender and interface when given", () => {
		expect(
			formatMatchRule({
				type: "signal",
				member: "Seeked",
				path: "/org/mpris/MediaPlayer2",
				interface: PLAYER_INTERFACE,
				sender: TEST_BUS_NAME,
			}),
		).toBe(
			"type='signal',sender='org.mpris.MediaPlayer2.testplayer',interface='org.mpris.MediaPlayer2.Player',path='/org/mpris/MediaPlayer2',member='Seeked'",
		);
	});
});

describe("matchesRule()", () => {
	const rule = {
		type: "signal",
		member: "Seeked",
		path: "/org/mpris/MediaPlayer2",
		interface: PLAYER_INTERFACE,
	} as const;

	it("accepts a signal with the same member, path and interface", () => {
		const message = new dbus.Message({
			type: dbus.MessageType.SIGNAL,
			path: "/org/mpris/MediaPlayer2",
			interface: PLAYER_INTERFACE,
			member: "Seeked",
		});

		expect(matchesRule(message, rule)).toBe(true);
	});

	it("ignores method calls that happen to share the member name", () => {
		const message = new dbus.Message({
			destination: TEST_BUS_NAME,
			path: "/org/mpris/MediaPlayer2",
			interface: PLAYER_INTERFACE,
			member: "Seeked",
		});

		expect(matchesRule(message, rule)).toBe(false);
	});

	it("ignores signals from another interface", () => {
		const message = new dbus.Message({
			type: dbus.MessageType.SIGNAL,
			path: "/org/mpris/MediaPlayer2",
			interface: "org.example.Other",
			member: "Seeked",
		});

		expect(matchesRule(message, rule)).toBe(false);
	});
});

describe("DbusConnection", () => {
	let bus: FakeMessageBus;
	let connection: DbusConnection;

	beforeEach(() => {
		bus = new FakeMessageBus();
		connection = new DbusConnection(bus, { callTimeoutMs: 0 });
	});

	it("sends a method call and returns the reply body", async () => {
		bus.reply(`${PLAYER_INTERFACE}.Echo`, (message) => [...message.body].reverse());

		const body = await connection.call({
			destination: TEST_BUS_NAME,
			path: "/org/mpris/MediaPlayer2",
			interface: PLAYER_INTERFACE,
			member: "Echo",
			signature: "su",
			body: ["a", 1],
		});

		expect(body).toEqual([1, "a"]);
		expect(bus.sent[0].destination).toBe(TEST_BUS_NAME);
		expect(bus.sent[0].signature).toBe("su");
	});

	it("asks the bus daemon whether a name has an owner", async () => {
		bus.owners.add(TEST_BUS_NAME);

		expect(await connection.nameHasOwner(TEST_BUS_NAME)).toBe(true);
		expect(await connection.nameHasOwner("org.mpris.MediaPlayer2.nobody")).toBe(false);

		const [first] = bus.sentTo("NameHasOwner");
		expect(first.destination).toBe("org.freedesktop.DBus");
		expect(first.path).toBe("/org/freedesktop/DBus");
		expect(first.body).toEqual([TEST_BUS_NAME]);
	});

	it("gets and sets properties through org.freedesktop.DBus.Properties", async () => {
		await connection.setProperty(
			TEST_BUS_NAME,
			"/org/mpris/MediaPlayer2",
			PLAYER_INTERFACE,
			"Volume",
			new dbus.Variant("d", 0.75),
		);
		const value = await connection.getProperty(
			TEST_BUS_NAME,
			"/org/mpris/MediaPlayer2",
			PLAYER_INTERFACE,
			"Volume",
		);

		expect(value.value).toBe(0.75);
		expect(bus.sent.map((m) => [m.interface, m.member, m.signature])).toEqual([
			["org.freedesktop.DBus.Properties", "Set", "ssv"],
			["org.freedesktop.DBus.Properties", "Get", "ss"],
		]);
	});

	it("routes matching signals to the handler until the match is removed", async () => {
		const handler = vi.fn();
		const token = await connection.addMatch(
			{ type: "signal", member: "Seeked", path: "/org/mpris/MediaPlayer2" },
			handler,
		);

		bus.emitSignal(PLAYER_INTERFACE, "Seeked", "x", [BigInt(10)]);
		await connection.removeMatch(token);
		bus.emitSignal(PLAYER_INTERFACE, "Seeked", "x", [BigInt(20)]);

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler.mock.calls[0][0].body).toEqual([BigInt(10)]);
		expect(bus.listenerCount("message")).toBe(0);
	});

	it("keeps a match routable when the daemon refuses to remove it", async () => {
		const token = await connection.addMatch(
			{ type: "signal", member: "Seeked", path: "/org/mpris/MediaPlayer2" },
			() => undefined,
		);
		bus.fail("org.freedesktop.DBus.RemoveMatch");

		await expect(connection.removeMatch(token)).rejects.toBeInstanceOf(dbus.DBusError);
		expect(connection.matchCount).toBe(1);
		expect(bus.listenerCount("message")).toBe(1);
	});

	it("sends one RemoveMatch for concurrent removals of the same token", async () => {
		const rule = { type: "signal", member: "Seeked", path: "/org/mpris/MediaPlayer2" } as const;
		const first = await connection.addMatch(rule, () => undefined);
		const second = await connection.addMatch(rule, () => undefined);

		await Promise.all([connection.removeMatch(first), connection.removeMatch(first)]);

		expect(bus.sentTo("RemoveMatch")).toHaveLength(1);
		expect(connection.matchCount).toBe(1);

		await connection.removeMatch(second);
		expect(bus.sentTo("RemoveMatch")).toHaveLength(2);
		expect(connection.matchCount).toBe(0);
	});

	it("rejects an unknown token", async () => {
		await expect(connection.removeMatch(99)).rejects.toThrow("Unknown match token #99");
	});

	it("times out calls that never get a reply", async () => {
		const slow = new DbusConnection(bus, { callTimeoutMs: 20 });
		bus.reply(`${PLAYER_INTERFACE}.Play`, () => new Promise<unknown[]>(() => undefined));

		await expect(
			slow.call({
				destination: TEST_BUS_NAME,
				path: "/org/mpris/MediaPlayer2",
				interface: PLAYER_INTERFACE,
				member: "Play",
			}),
		).rejects.toThrow("org.mpris.MediaPlayer2.Player.Play timed out after 20ms");
	});

	it("detaches its listeners and closes the bus on disconnect", async () => {
		await connection.addMatch(
			{ type: "signal", member: "Seeked", path: "/org/mpris/MediaPlayer2" },
			() => undefined,
		);

		connection.disconnect();

		expect(bus.disconnected).toBe(true);
		expect(bus.listenerCount("message")).toBe(0);
		expect(connection.matchCount).toBe(0);
	});
});
