/**
 * Decoders for the signal messages EventManager callbacks receive
 */

import type { Message } from "dbus-next";
import type { z } from "zod";
import {
	PropertiesChangedBodySchema,
	SeekedBodySchema,
} from "../schemas/mpris";
import { ErrorCategory, MprisError } from "../services/ErrorHandler";
import type { PropertiesChangedEvent } from "../types/mpris";

function decode<T>(
	operation: string,
	message: Message,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
	const result = schema.safeParse(message.body);
	if (!result.success) {
		throw new MprisError(
			ErrorCategory.TYPE_MISMATCH,
			operation,
			`${operation}: unexpected ${message.member} body with signature "${message.signature}"`,
			{ cause: result.error },
		);
	}
	return result.data;
}

/**
 * Body of org.freedesktop.DBus.Properties.PropertiesChanged
 */
export function parsePropertiesChanged(message: Message): PropertiesChangedEvent {
	const [interfaceName, changed, invalidated] = decode(
		"parsePropertiesChanged",
		message,
		PropertiesChangedBodySchema,
	);
	return { interfaceName, changed, invalidated };
}

/**
 * New position, in microseconds, carried by a Seeked signal
 */
export function parseSeeked(message: Message): bigint {
	const [position] = decode("parseSeeked", message, SeekedBodySchema);
	return position;
}
