import pRetry, { AbortError as StopRetrying } from "p-retry";
import {
	abortError,
	isTransientBLEError,
	MAX_TIMEOUT_MS,
	normalizeError,
	throwIfAborted,
} from "../errors";

/** Default number of attempts, the first one included */
export const DEFAULT_RETRY_ATTEMPTS = 3;

/** Default delay before the first retry in milliseconds */
export const DEFAULT_RETRY_DELAY_MS = 1000;

/** Default cap on the delay between retries in milliseconds */
export const DEFAULT_MAX_RETRY_DELAY_MS = 30000;

/**
 * Retry policy for connection attempts and other transient BLE failures.
 */
export interface RetryOptions {
	/** Attempts in total, the first one included (default: 3) */
	maxAttempts?: number;
	/** Delay before the first retry (default: 1000) */
	initialDelayMs?: number;
	/** Cap on any single delay (default: 30000) */
	maxDelayMs?: number;
	/** Growth factor between consecutive delays (default: 2) */
	backoffMultiplier?: number;
	/** Spreads each delay randomly between 1x and 2x (default: true) */
	jitter?: boolean;
	/** No retry starts once this much time has passed since the first attempt */
	maxElapsedMs?: number;
	signal?: AbortSignal | undefined;
	/**
	 * Called before each retry. `delayMs` is the nominal delay; with jitter
	 * the actual wait is up to twice as long.
	 */
	onRetry?: (attempt: number, delayMs: number, error: Error) => void;
	/** Default: isTransientBLEError */
	isRetryable?: (error: Error) => boolean;
}

interface Backoff {
	initialDelayMs: number;
	maxDelayMs: number;
	multiplier: number;
}

function requirePositive(name: string, value: number, allowZero: boolean): void {
	if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
		const kind = allowZero ? "non-negative" : "positive";
		throw new RangeError(`${name} must be a ${kind} number, got ${value}`);
	}
}

/**
 * Nominal delay before retry number `attempt` (1 for the first retry):
 * `initialDelayMs * multiplier^(attempt - 1)`, capped at `maxDelayMs`.
 */
export function backoffDelay(attempt: number, backoff: Backoff): number {
	// The cap also bounds the first delay
	const initial = Math.min(backoff.initialDelayMs, backoff.maxDelayMs);
	return Math.min(initial * backoff.multiplier ** (attempt - 1), backoff.maxDelayMs);
}

/**
 * Runs `operation` until it succeeds, fails with an error `isRetryable`
 * rejects, or runs out of attempts. Backoff timing is p-retry's.
 *
 * @example Connecting with retries
 * ```typescript
 * const handle = await withRetry(
 *   () => backend.connect(address, { timeoutMs: 5000 }),
 *   { maxAttempts: 5, initialDelayMs: 500 },
 * );
 * ```
 *
 * @example Bounded by a signal
 * ```typescript
 * const value = await withRetry(() => session.read(SERVICE, CHAR), {
 *   signal: AbortSignal.timeout(10000),
 *   onRetry: (attempt, delay, error) => {
 *     console.log(`Retry ${attempt} after ${delay}ms: ${error.message}`);
 *   },
 * });
 * ```
 *
 * @param operation - Receives the attempt number, starting at 1
 * @throws The last error once attempts run out, or CancelledError on abort
 * @throws RangeError for an invalid policy
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const {
		maxAttempts = DEFAULT_RETRY_ATTEMPTS,
		jitter = true,
		maxElapsedMs,
		signal,
		onRetry,
		isRetryable = isTransientBLEError,
	} = options;
	const backoff: Backoff = {
		initialDelayMs: options.initialDelayMs ?? DEFAULT_RETRY_DELAY_MS,
		maxDelayMs: options.maxDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS,
		multiplier: options.backoffMultiplier ?? 2,
	};

	if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
		throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
	}
	requirePositive("initialDelayMs", backoff.initialDelayMs, true);
	requirePositive("maxDelayMs", backoff.maxDelayMs, true);
	if (backoff.maxDelayMs > MAX_TIMEOUT_MS) {
		throw new RangeError(
			`maxDelayMs must not exceed ${MAX_TIMEOUT_MS}ms, got ${backoff.maxDelayMs}`,
		);
	}
	requirePositive("backoffMultiplier", backoff.multiplier, false);
	if (maxElapsedMs !== undefined) {
		requirePositive("maxElapsedMs", maxElapsedMs, false);
	}
	throwIfAborted(signal);

	const attemptOnce = async (attempt: number): Promise<T> => {
		try {
			return await operation(attempt);
		} catch (e) {
			const error = normalizeError(e);
			if (isRetryable(error)) throw error;
			// Rethrown by p-retry as the original error
			throw new StopRetrying(error);
		}
	};

	const startedAt = Date.now();
	const withinBudget = (): boolean =>
		maxElapsedMs === undefined || Date.now() - startedAt < maxElapsedMs;

	try {
		return await pRetry(attemptOnce, {
			retries: maxAttempts - 1,
			minTimeout: backoffDelay(1, backoff),
			maxTimeout: backoff.maxDelayMs,
			factor: backoff.multiplier,
			randomize: jitter,
			...(maxElapsedMs !== undefined && { maxRetryTime: maxElapsedMs }),
			...(signal && { signal }),
			onFailedAttempt: (error) => {
				if (error.retriesLeft > 0 && withinBudget()) {
					onRetry?.(error.attemptNumber, backoffDelay(error.attemptNumber, backoff), error);
				}
			},
		});
	} catch (e) {
		if (signal?.aborted) {
			throw abortError(signal);
		}
		throw e;
	}
}
