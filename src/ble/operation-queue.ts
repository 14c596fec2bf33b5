import {
	abortError,
	CancelledError,
	MAX_TIMEOUT_MS,
	normalizeError,
	OperationTimeoutError,
} from "../errors";
import { createScopedLogger } from "../utils/logger";

const log = createScopedLogger("operation-queue");

/** Default deadline for a queued operation in milliseconds */
export const DEFAULT_OPERATION_TIMEOUT_MS = 10000;

export type OperationKind =
	| "discover"
	| "read"
	| "write"
	| "subscribe"
	| "unsubscribe";

/**
 * Handed to the running operation. `signal` is aborted when the operation
 * misses its deadline, is cancelled by its caller, or is failed by
 * `failAll()`; backends use it to request a native abort.
 */
export interface OperationContext {
	readonly id: number;
	readonly signal: AbortSignal;
}

export interface EnqueueOptions {
	/** Deadline in ms, counted from dispatch (default: the queue's default) */
	timeoutMs?: number | undefined;
	/** Cancels this operation only */
	signal?: AbortSignal | undefined;
	/** Used in timeout messages and logs (default: the kind) */
	label?: string | undefined;
}

/** Snapshot of the operation currently dispatched to the backend. */
export interface PendingOperationInfo {
	readonly id: number;
	readonly kind: OperationKind;
	readonly label: string;
	readonly timeoutMs: number;
	/** Epoch ms, set at dispatch */
	readonly deadline: number;
}

/**
 * Options for creating an operation queue.
 */
export interface OperationQueueOptions {
	/**
	 * Deadline applied when `enqueue()` gives none.
	 * @default 10000
	 */
	defaultTimeoutMs?: number;
	/**
	 * AbortSignal that closes the queue, failing every pending operation.
	 */
	signal?: AbortSignal | undefined;
	/** Name used in log messages */
	name?: string;
}

/**
 * A per-session queue that dispatches GATT operations to the backend one at
 * a time, first-in-first-out.
 *
 * Completions are delivered in submission order:
 * - An operation that misses its deadline fails with OperationTimeoutError
 *   and the queue moves on; a late backend result is discarded.
 * - An in-flight operation whose caller aborts fails with CancelledError at
 *   once and the queue moves on.
 * - A queued operation whose caller aborts is never dispatched; its
 *   CancelledError is delivered when it reaches the head of the queue.
 *
 * @example
 * ```typescript
 * const queue = createOperationQueue({ defaultTimeoutMs: 5000 });
 *
 * const [battery, ack] = await Promise.all([
 *   queue.enqueue("read", ({ signal }) =>
 *     backend.readCharacteristic(handle, batteryRef, { signal })),
 *   queue.enqueue("write", ({ signal }) =>
 *     backend.writeCharacteristic(handle, commandRef, bytes, "withResponse", { signal })),
 * ]);
 * ```
 */
export interface OperationQueue {
	/**
	 * Submits an operation. Resolves or rejects exactly once.
	 * @throws RangeError for a timeout that is not a positive number
	 */
	enqueue<T>(
		kind: OperationKind,
		run: (context: OperationContext) => Promise<T>,
		options?: EnqueueOptions,
	): Promise<T>;

	/** Operations submitted and not yet completed, the in-flight one included. */
	getQueueDepth(): number;

	/** The operation currently dispatched, or null when idle. */
	readonly inFlight: PendingOperationInfo | null;

	/**
	 * Fails the in-flight operation, then every queued one in submission
	 * order, with `error`. The queue stays usable.
	 */
	failAll(error: Error): void;

	/**
	 * Like `failAll()`, and rejects every later submission with the same
	 * error. Idempotent.
	 */
	close(error?: Error): void;

	readonly closed: boolean;
}

interface PendingOperation {
	readonly id: number;
	readonly kind: OperationKind;
	readonly label: string;
	readonly timeoutMs: number;
	readonly controller: AbortController;
	/** Runs the operation; the returned thunk delivers its value. */
	readonly execute: (context: OperationContext) => Promise<() => void>;
	readonly fail: (error: Error) => void;
	/** Removes the caller's abort listener */
	readonly detach: () => void;
	deadline: number;
	/** Set when the caller cancelled while queued */
	cancelled: Error | null;
	settled: boolean;
	timer: ReturnType<typeof setTimeout> | undefined;
}

function validateTimeout(timeoutMs: number, name: string): void {
	if (!(timeoutMs > 0)) {
		throw new RangeError(`${name} must be a positive number, got ${timeoutMs}`);
	}
	// Infinity means no deadline
	if (Number.isFinite(timeoutMs) && timeoutMs > MAX_TIMEOUT_MS) {
		throw new RangeError(`${name} must not exceed ${MAX_TIMEOUT_MS}ms, got ${timeoutMs}`);
	}
}

/**
 * Creates the operation queue of one session.
 *
 * @param options - Queue configuration options
 */
export function createOperationQueue(
	options: OperationQueueOptions = {},
): OperationQueue {
	const {
		defaultTimeoutMs = DEFAULT_OPERATION_TIMEOUT_MS,
		signal,
		name = "queue",
	} = options;
	validateTimeout(defaultTimeoutMs, "defaultTimeoutMs");

	const queue: PendingOperation[] = [];
	let current: PendingOperation | null = null;
	let nextId = 1;
	let closedWith: Error | null = null;

	function finish(op: PendingOperation, deliver: () => void): void {
		if (op.settled) {
			// Late backend result after timeout or cancellation
			log.debug(`${name}: discarded late result of #${op.id} ${op.label}`);
			return;
		}
		op.settled = true;
		if (op.timer !== undefined) {
			clearTimeout(op.timer);
			op.timer = undefined;
		}
		op.detach();
		if (current === op) {
			current = null;
		}
		deliver();
		pump();
	}

	function dispatch(op: PendingOperation): void {
		current = op;
		op.deadline = Date.now() + op.timeoutMs;
		log.debug(`${name}: dispatch #${op.id} ${op.label}`);

		if (Number.isFinite(op.timeoutMs)) {
			op.timer = setTimeout(() => {
				const error = new OperationTimeoutError(op.label, op.timeoutMs);
				op.controller.abort(error);
				finish(op, () => op.fail(error));
			}, op.timeoutMs);
		}

		op.execute({ id: op.id, signal: op.controller.signal }).then(
			(commit) => finish(op, commit),
			(error: unknown) => {
				const err = normalizeError(error);
				finish(op, () => op.fail(err));
			},
		);
	}

	function pump(): void {
		while (current === null) {
			const next = queue.shift();
			if (!next) return;
			if (next.cancelled) {
				const reason = next.cancelled;
				next.settled = true;
				next.detach();
				next.fail(reason);
				continue;
			}
			dispatch(next);
		}
	}

	function enqueue<T>(
		kind: OperationKind,
		run: (context: OperationContext) => Promise<T>,
		opts: EnqueueOptions = {},
	): Promise<T> {
		const timeoutMs = opts.timeoutMs ?? defaultTimeoutMs;
		validateTimeout(timeoutMs, "timeoutMs");

		if (closedWith) {
			return Promise.reject(closedWith);
		}

		const callerSignal = opts.signal;

		return new Promise<T>((resolve, reject) => {
			const onAbort = () => {
				if (!callerSignal || op.settled) return;
				const reason = abortError(callerSignal);
				if (current === op) {
					op.controller.abort(reason);
					finish(op, () => reject(reason));
				} else {
					op.cancelled = reason;
				}
			};

			const op: PendingOperation = {
				id: nextId++,
				kind,
				label: opts.label ?? kind,
				timeoutMs,
				controller: new AbortController(),
				execute: async (context) => {
					const value = await run(context);
					return () => resolve(value);
				},
				fail: reject,
				detach: () => callerSignal?.removeEventListener("abort", onAbort),
				deadline: 0,
				cancelled: null,
				settled: false,
				timer: undefined,
			};

			if (callerSignal?.aborted) {
				op.cancelled = abortError(callerSignal);
			} else {
				callerSignal?.addEventListener("abort", onAbort, { once: true });
			}

			queue.push(op);
			pump();
		});
	}

	function failAll(error: Error): void {
		const queued = queue.splice(0);
		const inFlight = current;

		if (inFlight) {
			inFlight.controller.abort(error);
			finish(inFlight, () => inFlight.fail(error));
		}

		for (const op of queued) {
			op.settled = true;
			op.detach();
			if (!op.cancelled) {
				op.controller.abort(error);
			}
			op.fail(op.cancelled ?? error);
		}
	}

	function close(error?: Error): void {
		if (closedWith) return;
		closedWith = error ?? new CancelledError("Operation queue closed");
		failAll(closedWith);
	}

	if (signal) {
		if (signal.aborted) {
			close(abortError(signal));
		} else {
			signal.addEventListener("abort", () => close(abortError(signal)), {
				once: true,
			});
		}
	}

	return {
		enqueue,
		getQueueDepth: () => queue.length + (current ? 1 : 0),
		get inFlight(): PendingOperationInfo | null {
			if (!current) return null;
			const { id, kind, label, timeoutMs, deadline } = current;
			return { id, kind, label, timeoutMs, deadline };
		},
		failAll,
		close,
		get closed() {
			return closedWith !== null;
		},
	};
}
