export {
	AdapterUnavailableError,
	abortError,
	BleError,
	type BleErrorCode,
	type BleErrorOptions,
	CancelledError,
	ConnectionLostError,
	DeviceUnreachableError,
	isBleError,
	isTransientBLEError,
	MAX_TIMEOUT_MS,
	NotConnectedError,
	normalizeError,
	OperationTimeoutError,
	ProtocolError,
	raceWithAbort,
	StaleHandleError,
	throwIfAborted,
	UnsupportedError,
	withTimeout,
} from "./errors";
