export {
	EventManager,
	buildMatchRule,
	memberForEvent,
	type EventManagerOptions,
} from "./EventManager";

export { parsePropertiesChanged, parseSeeked } from "./signals";
