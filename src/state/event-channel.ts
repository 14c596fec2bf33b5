import { normalizeError } from "../errors";
import { createScopedLogger } from "../utils/logger";

const log = createScopedLogger("event-channel");

/**
 * Ordered, serial message channel. Every task posted to the channel runs
 * after all previously posted tasks have settled, so state that is only
 * mutated from channel tasks needs no further locking.
 *
 * A Device Session posts both caller commands (connect, disconnect) and
 * native events (link loss) into its channel.
 *
 * @example
 * ```typescript
 * const channel = createEventChannel("AA:BB:CC:DD:EE:FF");
 *
 * // Caller command: awaited
 * await channel.post(() => beginConnect());
 *
 * // Native callback: fire-and-forget, never blocks the emitter
 * backend.events.on("disconnect", (event) => {
 *   channel.dispatch("link-lost", () => handleLinkLoss(event));
 * });
 * ```
 */
export interface EventChannel {
	/**
	 * Runs a task after every earlier task has settled.
	 * @returns The task's result, or its error
	 */
	post<T>(task: () => T | Promise<T>): Promise<T>;

	/**
	 * Fire-and-forget variant of `post()`. Task errors are logged with the
	 * given label.
	 */
	dispatch(label: string, task: () => unknown): void;

	/** Resolves once every task posted so far has settled. */
	drain(): Promise<void>;

	/** Tasks posted and not yet settled. */
	readonly pending: number;
}

export function createEventChannel(name = "channel"): EventChannel {
	// Promise chain - acts as a mutex
	let tail: Promise<void> = Promise.resolve();
	let pending = 0;

	function post<T>(task: () => T | Promise<T>): Promise<T> {
		pending++;
		const result = tail.then(task);
		tail = result.then(
			() => {
				pending--;
			},
			() => {
				pending--;
			},
		);
		return result;
	}

	function dispatch(label: string, task: () => unknown): void {
		post(task).catch((error: unknown) => {
			log.error(`${name}: task "${label}" failed:`, normalizeError(error));
		});
	}

	function drain(): Promise<void> {
		return tail;
	}

	return {
		post,
		dispatch,
		drain,
		get pending() {
			return pending;
		},
	};
}
