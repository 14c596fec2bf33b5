import { raceWithAbort, throwIfAborted } from "../errors";
import { createEventEmitter } from "../state/event-emitter";
import type { CharacteristicRef } from "../types";
import { createScopedLogger } from "../utils/logger";

const log = createScopedLogger("notifications");

/** Default per-listener queue length */
export const DEFAULT_NOTIFICATION_BUFFER_SIZE = 64;

export interface DropEvent {
	/** Values dropped by this event */
	dropped: number;
	/** Values dropped on this stream so far */
	total: number;
}

/**
 * One listener's view of a characteristic's notifications.
 *
 * Values are queued up to the buffer size; when the consumer falls behind,
 * the oldest value is dropped and a drop event fires. Iteration ends (it
 * does not throw) when the stream is closed, either by the consumer or
 * because the session left `connected`; `closeReason` tells the two apart.
 *
 * Payloads are shared between the listeners of one characteristic. Treat
 * them as read-only.
 *
 * @example
 * ```typescript
 * const stream = await session.subscribe(EMG_SERVICE, EMG_DATA);
 * stream.onDrop(({ total }) => console.warn(`${total} frames dropped`));
 *
 * for await (const frame of stream) {
 *   handleFrame(frame);
 * }
 * if (stream.closeReason) {
 *   console.log("link lost:", stream.closeReason.message);
 * }
 * ```
 */
export interface NotificationStream extends AsyncIterable<Uint8Array> {
	readonly characteristic: CharacteristicRef;
	/** Resolves with the next value, or `done` once closed and drained. */
	next(): Promise<IteratorResult<Uint8Array, undefined>>;
	/**
	 * Detaches this listener and discards queued values. The backend
	 * subscription is released with the last listener. Idempotent.
	 */
	close(): void;
	readonly closed: boolean;
	/** Why the stream was closed by the library; null when the consumer closed it. */
	readonly closeReason: Error | null;
	/** Values dropped so far */
	readonly dropped: number;
	/** Values waiting to be consumed */
	readonly buffered: number;
	onDrop(callback: (event: DropEvent) => void): () => void;
	/** Fires once; immediately when already closed. */
	onClose(callback: (reason: Error | null) => void): () => void;
}

export interface SubscribeOptions {
	/**
	 * Queue length for this listener.
	 * @default 64
	 */
	bufferSize?: number | undefined;
	/** Cancels a pending subscribe, or closes the stream once open */
	signal?: AbortSignal | undefined;
}

export interface NotificationMultiplexerOptions {
	/** Backend-level subscribe, normally routed through the operation queue */
	subscribe: (ref: CharacteristicRef) => Promise<void>;
	/** Backend-level unsubscribe, normally routed through the operation queue */
	unsubscribe: (ref: CharacteristicRef) => Promise<void>;
	/** Unsubscribe is skipped once this returns false. */
	isConnected?: () => boolean;
	defaultBufferSize?: number;
	/** Name used in log messages */
	name?: string;
}

export interface NotificationMultiplexer {
	subscribe(
		ref: CharacteristicRef,
		options?: SubscribeOptions,
	): Promise<NotificationStream>;
	/** Fans a backend value out to every listener of the characteristic. */
	deliver(ref: CharacteristicRef, value: Uint8Array): void;
	/**
	 * Closes every stream with `reason` without unsubscribing at the
	 * backend. Pending subscribes reject with `reason`.
	 */
	invalidateAll(reason: Error): void;
	/** Listeners of one characteristic, or of all when omitted. */
	listenerCount(ref?: CharacteristicRef): number;
	/** Characteristics with an open or opening backend subscription */
	readonly activeCount: number;
}

type StreamEvents = {
	drop: DropEvent;
	close: Error | null;
};

interface StreamInternals {
	readonly stream: NotificationStream;
	push(value: Uint8Array): void;
	/** Library-side close: keeps queued values for draining. */
	end(reason: Error): void;
}

function createStream(
	characteristic: CharacteristicRef,
	bufferSize: number,
	onDetach: () => void,
): StreamInternals {
	const events = createEventEmitter<StreamEvents>();
	const buffer: Uint8Array[] = [];
	const waiters: Array<(result: IteratorResult<Uint8Array, undefined>) => void> = [];
	let closed = false;
	let closeReason: Error | null = null;
	let dropped = 0;

	function finish(reason: Error | null): void {
		closed = true;
		closeReason = reason;
		for (const waiter of waiters.splice(0)) {
			waiter({ done: true, value: undefined });
		}
		onDetach();
		events.emit("close", reason);
		events.removeAllListeners();
	}

	function push(value: Uint8Array): void {
		if (closed) return;
		const waiter = waiters.shift();
		if (waiter) {
			waiter({ done: false, value });
			return;
		}
		buffer.push(value);
		if (buffer.length > bufferSize) {
			buffer.shift();
			dropped++;
			events.emit("drop", { dropped: 1, total: dropped });
		}
	}

	function next(): Promise<IteratorResult<Uint8Array, undefined>> {
		const value = buffer.shift();
		if (value !== undefined) {
			return Promise.resolve({ done: false, value });
		}
		if (closed) {
			return Promise.resolve({ done: true, value: undefined });
		}
		return new Promise((resolve) => {
			waiters.push(resolve);
		});
	}

	function close(): void {
		if (closed) return;
		buffer.length = 0;
		finish(null);
	}

	const stream: NotificationStream = {
		characteristic,
		next,
		close,
		get closed() {
			return closed;
		},
		get closeReason() {
			return closeReason;
		},
		get dropped() {
			return dropped;
		},
		get buffered() {
			return buffer.length;
		},
		onDrop: (callback) => events.on("drop", callback),
		onClose: (callback) => {
			if (closed) {
				callback(closeReason);
				return () => {};
			}
			return events.on("close", callback);
		},
		[Symbol.asyncIterator]() {
			return {
				next,
				return: () => {
					close();
					return Promise.resolve({ done: true, value: undefined });
				},
			};
		},
	};

	return {
		stream,
		push,
		end: (reason) => {
			if (closed) return;
			finish(reason);
		},
	};
}

interface Subscription {
	readonly key: string;
	readonly ref: CharacteristicRef;
	readonly listeners: Set<StreamInternals>;
	/** Settles when the backend subscribe does */
	ready: Promise<void>;
	/** Subscribers awaiting `ready` */
	waiting: number;
	invalidated: Error | null;
}

function refKey(ref: CharacteristicRef): string {
	return `${ref.serviceUuid}/${ref.characteristicUuid}`;
}

function validateBufferSize(size: number): void {
	if (!Number.isInteger(size) || size < 1) {
		throw new RangeError(`bufferSize must be an integer >= 1, got ${size}`);
	}
}

/**
 * Creates the notification multiplexer of one session.
 *
 * The first listener of a characteristic triggers one backend subscribe
 * (concurrent first listeners share it); the last listener to close
 * triggers one backend unsubscribe.
 */
export function createNotificationMultiplexer(
	options: NotificationMultiplexerOptions,
): NotificationMultiplexer {
	const {
		isConnected = () => true,
		defaultBufferSize = DEFAULT_NOTIFICATION_BUFFER_SIZE,
		name = "multiplexer",
	} = options;
	validateBufferSize(defaultBufferSize);

	const subscriptions = new Map<string, Subscription>();

	function release(sub: Subscription): void {
		if (subscriptions.get(sub.key) !== sub) return;
		subscriptions.delete(sub.key);
		if (sub.invalidated || !isConnected()) return;

		log.debug(`${name}: last listener left ${sub.key}, unsubscribing`);
		options.unsubscribe(sub.ref).catch((error: unknown) => {
			log.warn(`${name}: unsubscribe from ${sub.key} failed:`, error);
		});
	}

	function releaseIfUnused(sub: Subscription): void {
		if (sub.listeners.size === 0 && sub.waiting === 0) {
			release(sub);
		}
	}

	function open(key: string, ref: CharacteristicRef): Subscription {
		const sub: Subscription = {
			key,
			ref,
			listeners: new Set(),
			ready: Promise.resolve(),
			waiting: 0,
			invalidated: null,
		};
		subscriptions.set(key, sub);
		log.debug(`${name}: subscribing to ${key}`);

		sub.ready = options.subscribe(ref);
		sub.ready.then(
			() => {
				// Every waiter was cancelled
				releaseIfUnused(sub);
			},
			() => {
				if (subscriptions.get(key) === sub) {
					subscriptions.delete(key);
				}
			},
		);
		return sub;
	}

	async function subscribe(
		ref: CharacteristicRef,
		opts: SubscribeOptions = {},
	): Promise<NotificationStream> {
		const bufferSize = opts.bufferSize ?? defaultBufferSize;
		validateBufferSize(bufferSize);
		const { signal } = opts;
		throwIfAborted(signal);

		const key = refKey(ref);
		const sub = subscriptions.get(key) ?? open(key, ref);

		sub.waiting++;
		try {
			await raceWithAbort(sub.ready, signal);
		} finally {
			sub.waiting--;
		}

		if (sub.invalidated) {
			throw sub.invalidated;
		}

		const internals = createStream(ref, bufferSize, () => {
			sub.listeners.delete(internals);
			releaseIfUnused(sub);
		});
		sub.listeners.add(internals);

		if (signal) {
			const onAbort = () => internals.stream.close();
			signal.addEventListener("abort", onAbort, { once: true });
			internals.stream.onClose(() => signal.removeEventListener("abort", onAbort));
		}

		return internals.stream;
	}

	function deliver(ref: CharacteristicRef, value: Uint8Array): void {
		const sub = subscriptions.get(refKey(ref));
		if (!sub) return;
		for (const listener of [...sub.listeners]) {
			listener.push(value);
		}
	}

	function invalidateAll(reason: Error): void {
		const all = [...subscriptions.values()];
		subscriptions.clear();
		for (const sub of all) {
			sub.invalidated = reason;
			for (const listener of [...sub.listeners]) {
				listener.end(reason);
			}
		}
	}

	function listenerCount(ref?: CharacteristicRef): number {
		if (ref) {
			return subscriptions.get(refKey(ref))?.listeners.size ?? 0;
		}
		let count = 0;
		for (const sub of subscriptions.values()) {
			count += sub.listeners.size;
		}
		return count;
	}

	return {
		subscribe,
		deliver,
		invalidateAll,
		listenerCount,
		get activeCount() {
			return subscriptions.size;
		},
	};
}
