export { isMacAddress, normalizeAddress } from "./address";

export { type BytesLike, toBytes, toHex } from "./bytes";

export {
	createScopedLogger,
	enableDebugLogging,
	getLogger,
	type Logger,
	resetLogger,
	type ScopedLogger,
	setLogger,
} from "./logger";

export {
	BLUETOOTH_UUID_BASE,
	normalizeUuid,
	sameUuid,
	toCompactUuid,
	toFullUuid,
} from "./uuid";
