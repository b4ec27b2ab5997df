/**
 * MPRIS / D-Bus protocol constants
 */

export const MPRIS_PREFIX = "org.mpris.MediaPlayer2";
export const MPRIS_PATH = "/org/mpris/MediaPlayer2";
export const ROOT_INTERFACE = "org.mpris.MediaPlayer2";
export const PLAYER_INTERFACE = "org.mpris.MediaPlayer2.Player";
export const PROPERTIES_INTERFACE = "org.freedesktop.DBus.Properties";

/**
 * Bus daemon
 */
export const DBUS_SERVICE = "org.freedesktop.DBus";
export const DBUS_PATH = "/org/freedesktop/DBus";
export const DBUS_INTERFACE = "org.freedesktop.DBus";

/**
 * Transport defaults
 */
export const DEFAULT_CALL_TIMEOUT_MS = 5000;

/**
 * Bus names are capped at 255 characters in total
 */
export const MAX_BUS_NAME_LENGTH = 255;
