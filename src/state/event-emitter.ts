import { createScopedLogger } from "../utils/logger";

const log = createScopedLogger("event-emitter");

export type EventMap = { [key: string]: unknown };

type Listener<V> = (data: V) => void;

type ListenerSets<T extends EventMap> = {
	[K in keyof T]?: Set<Listener<T[K]>> | undefined;
};

type OnceWrappers<T extends EventMap> = {
	[K in keyof T]?: Map<Listener<T[K]>, Listener<T[K]>> | undefined;
};

/**
 * A type-safe event emitter that provides compile-time checking for event
 * names and payloads. Used for backend events, session state changes and
 * stream signals.
 *
 * @example
 * ```typescript
 * interface SessionEvents {
 *   state: { from: SessionState; to: SessionState };
 *   value: Uint8Array;
 * }
 *
 * const emitter = createEventEmitter<SessionEvents>();
 * const off = emitter.on("value", (bytes) => console.log(bytes.length));
 * emitter.emit("value", new Uint8Array([1, 2]));
 * off();
 * ```
 */
export interface TypedEventEmitter<T extends EventMap> {
	on<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	once<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	off<K extends keyof T>(event: K, callback: (data: T[K]) => void): void;
	removeAllListeners<K extends keyof T>(event?: K): void;
	/**
	 * Delivers synchronously, in registration order. A throwing listener is
	 * reported through the logger and does not stop delivery to the others.
	 */
	emit<K extends keyof T>(event: K, data: T[K]): void;
	listenerCount<K extends keyof T>(event: K): number;
}

export function createEventEmitter<T extends EventMap>(): TypedEventEmitter<T> {
	let listeners: ListenerSets<T> = {};
	let onceWrappers: OnceWrappers<T> = {};

	function getListenerSet<K extends keyof T>(event: K): Set<Listener<T[K]>> {
		let set = listeners[event];
		if (!set) {
			set = new Set();
			listeners[event] = set;
		}
		return set;
	}

	function on<K extends keyof T>(
		event: K,
		callback: Listener<T[K]>,
	): () => void {
		getListenerSet(event).add(callback);
		return () => off(event, callback);
	}

	function once<K extends keyof T>(
		event: K,
		callback: Listener<T[K]>,
	): () => void {
		let wrappers = onceWrappers[event];
		if (!wrappers) {
			wrappers = new Map();
			onceWrappers[event] = wrappers;
		}
		const wrapper: Listener<T[K]> = (data) => {
			off(event, callback);
			callback(data);
		};
		wrappers.set(callback, wrapper);
		getListenerSet(event).add(wrapper);
		return () => off(event, callback);
	}

	function off<K extends keyof T>(event: K, callback: Listener<T[K]>): void {
		const set = listeners[event];
		if (!set) return;

		const wrapper = onceWrappers[event]?.get(callback);
		if (wrapper) {
			set.delete(wrapper);
			onceWrappers[event]?.delete(callback);
		} else {
			set.delete(callback);
		}
	}

	function removeAllListeners<K extends keyof T>(event?: K): void {
		if (event !== undefined) {
			listeners[event] = undefined;
			onceWrappers[event] = undefined;
			return;
		}
		listeners = {};
		onceWrappers = {};
	}

	function emit<K extends keyof T>(event: K, data: T[K]): void {
		const set = listeners[event];
		if (!set) return;

		for (const cb of [...set]) {
			try {
				cb(data);
			} catch (err) {
				queueMicrotask(() => {
					log.error(`Listener for "${String(event)}" threw an error:`, err);
				});
			}
		}
	}

	function listenerCount<K extends keyof T>(event: K): number {
		return listeners[event]?.size ?? 0;
	}

	return {
		on,
		once,
		off,
		removeAllListeners,
		emit,
		listenerCount,
	};
}
