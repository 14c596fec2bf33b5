/**
 * Uniform error vocabulary. Every backend maps its native failures into one
 * of these codes before the error leaves the adapter.
 */
export type BleErrorCode =
	| "AdapterUnavailable"
	| "DeviceUnreachable"
	| "ConnectionLost"
	| "OperationTimeout"
	| "Unsupported"
	| "ProtocolError"
	| "Cancelled";

export interface BleErrorOptions {
	/** The native error this one was mapped from */
	cause?: unknown;
}

/**
 * Base class for all errors raised by the library.
 */
export class BleError extends Error {
	constructor(
		public readonly code: BleErrorCode,
		message: string,
		options: BleErrorOptions = {},
	) {
		super(message, "cause" in options ? { cause: options.cause } : undefined);
		this.name = "BleError";
	}
}

/**
 * No usable radio: Bluetooth is off, missing, or permission was denied.
 * Never retried automatically.
 */
export class AdapterUnavailableError extends BleError {
	constructor(message = "Bluetooth adapter unavailable", options?: BleErrorOptions) {
		super("AdapterUnavailable", message, options);
		this.name = "AdapterUnavailableError";
	}
}

/** The device did not answer: out of range, powered off, or connect timed out. */
export class DeviceUnreachableError extends BleError {
	constructor(
		public readonly address: string,
		message = `Device ${address} unreachable`,
		options?: BleErrorOptions,
	) {
		super("DeviceUnreachable", message, options);
		this.name = "DeviceUnreachableError";
	}
}

/** The link dropped while the operation was queued or in flight. */
export class ConnectionLostError extends BleError {
	constructor(message = "Connection lost", options?: BleErrorOptions) {
		super("ConnectionLost", message, options);
		this.name = "ConnectionLostError";
	}
}

/**
 * Error thrown when an operation misses its deadline.
 *
 * Note: The underlying BLE operation may still complete in the background
 * after a timeout is thrown. Its result is discarded.
 */
export class OperationTimeoutError extends BleError {
	constructor(
		public readonly operation: string,
		public readonly timeout: number,
	) {
		super("OperationTimeout", `${operation} timed out after ${timeout}ms`);
		this.name = "OperationTimeoutError";
	}
}

/** The characteristic (or the backend) does not offer the requested operation. */
export class UnsupportedError extends BleError {
	constructor(message = "Operation not supported", options?: BleErrorOptions) {
		super("Unsupported", message, options);
		this.name = "UnsupportedError";
	}
}

/** Malformed or unexpected response, and the fallback for unmapped native errors. */
export class ProtocolError extends BleError {
	constructor(message = "Protocol error", options?: BleErrorOptions) {
		super("ProtocolError", message, options);
		this.name = "ProtocolError";
	}
}

/**
 * Error thrown when an operation is aborted via AbortSignal or by
 * an explicit disconnect.
 */
export class CancelledError extends BleError {
	constructor(message = "Operation cancelled", options?: BleErrorOptions) {
		super("Cancelled", message, options);
		this.name = "CancelledError";
	}
}

/**
 * Error thrown when attempting an operation that requires a connection
 * but the session is not connected.
 */
export class NotConnectedError extends BleError {
	constructor(state?: string) {
		super(
			"ConnectionLost",
			state ? `Not connected to device (state: ${state})` : "Not connected to device",
		);
		this.name = "NotConnectedError";
	}
}

/**
 * A characteristic handle from an earlier connection generation.
 * Handles never survive a disconnect; rediscover and fetch a new one.
 */
export class StaleHandleError extends BleError {
	constructor(
		public readonly handleGeneration: number,
		public readonly currentGeneration: number,
	) {
		super(
			"ConnectionLost",
			`Characteristic handle from generation ${handleGeneration} is no longer valid (current generation ${currentGeneration})`,
		);
		this.name = "StaleHandleError";
	}
}

export function isBleError(e: unknown): e is BleError {
	return e instanceof BleError;
}

function abortMessage(signal: AbortSignal): string {
	const reason: unknown = signal.reason;
	return reason instanceof Error
		? reason.message
		: typeof reason === "string"
			? reason
			: "Operation cancelled";
}

/**
 * Converts an aborted signal into the error the caller should see.
 * A BleError used as the abort reason is passed through unchanged.
 */
export function abortError(signal: AbortSignal): BleError {
	const reason: unknown = signal.reason;
	if (reason instanceof BleError) {
		return reason;
	}
	return new CancelledError(abortMessage(signal));
}

/**
 * Throws a CancelledError if the given signal is aborted.
 * Use this at the start of async operations to fail fast on abort.
 */
export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw abortError(signal);
	}
}

/**
 * Races a promise against an AbortSignal, rejecting with CancelledError if aborted.
 *
 * Note: This does NOT cancel the underlying promise - it continues running
 * in the background. Backends receive the same signal and abort natively
 * where the stack allows it.
 */
export function raceWithAbort<T>(
	promise: Promise<T>,
	signal?: AbortSignal,
): Promise<T> {
	if (!signal) return promise;

	return new Promise((resolve, reject) => {
		const abortHandler = () => {
			reject(abortError(signal));
		};

		if (signal.aborted) {
			abortHandler();
			return;
		}

		signal.addEventListener("abort", abortHandler, { once: true });

		promise
			.then(resolve, reject)
			.finally(() => signal.removeEventListener("abort", abortHandler));
	});
}

/**
 * Normalizes any thrown value into an Error instance.
 * Ensures consistent error handling throughout the codebase.
 */
export function normalizeError(e: unknown): Error {
	if (e instanceof Error) {
		return e;
	}

	if (e === null) {
		return new Error("null");
	}

	if (e === undefined) {
		return new Error("undefined");
	}

	if (typeof e === "string") {
		return new Error(e);
	}

	if (typeof e === "object") {
		try {
			return new Error(JSON.stringify(e));
		} catch {
			// Circular reference or other JSON error
			return new Error(String(e));
		}
	}

	return new Error(String(e));
}

/** Longest delay Node timers honor; larger values fire after 1 ms */
export const MAX_TIMEOUT_MS = 2147483647;

/**
 * Wraps a promise with a timeout.
 * If the promise doesn't settle within the specified time,
 * rejects with an OperationTimeoutError.
 *
 * **Important:** This does NOT cancel the underlying operation.
 *
 * @param promise - The promise to wrap with a timeout
 * @param ms - Timeout duration in milliseconds
 * @param label - Descriptive label for the operation (used in error message)
 * A non-finite `ms` waits forever; a finite one above MAX_TIMEOUT_MS
 * rejects with RangeError.
 */
export function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	label: string,
): Promise<T> {
	if (!Number.isFinite(ms)) {
		return promise;
	}
	if (ms > MAX_TIMEOUT_MS) {
		return Promise.reject(
			new RangeError(`${label} timeout must not exceed ${MAX_TIMEOUT_MS}ms, got ${ms}`),
		);
	}

	return new Promise<T>((resolve, reject) => {
		const timeoutId = setTimeout(() => {
			reject(new OperationTimeoutError(label, ms));
		}, ms);

		promise.then(
			(value) => {
				clearTimeout(timeoutId);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timeoutId);
				reject(error);
			},
		);
	});
}

/**
 * Determines if a BLE error is transient and worth retrying.
 *
 * Retries on DeviceUnreachable, ConnectionLost and OperationTimeout.
 * Never retries AdapterUnavailable, Cancelled, Unsupported or ProtocolError.
 *
 * @remarks
 * Errors that are not BleErrors default to non-retryable (fail-fast).
 * Provide a custom `isRetryable` predicate to `withRetry()` to change that.
 */
export function isTransientBLEError(error: Error): boolean {
	if (!(error instanceof BleError)) {
		return false;
	}

	switch (error.code) {
		case "DeviceUnreachable":
		case "ConnectionLost":
		case "OperationTimeout":
			return true;
		case "AdapterUnavailable":
		case "Unsupported":
		case "ProtocolError":
		case "Cancelled":
			return false;
	}
}
