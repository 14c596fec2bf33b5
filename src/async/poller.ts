import { normalizeError } from "../errors";
import { createScopedLogger } from "../utils/logger";

const log = createScopedLogger("poller");

/** Consecutive failures after which a poller gives up */
export const DEFAULT_MAX_POLL_FAILURES = 3;

export interface PollerOptions {
	intervalMs: number;
	/** Runs the first poll on start instead of one interval later */
	immediate?: boolean;
	/** Default: DEFAULT_MAX_POLL_FAILURES */
	maxConsecutiveFailures?: number;
	onError: (error: Error, consecutiveFailures: number) => void;
	/** Called with the last error when the poller stops on its own */
	onGiveUp?: (error: Error) => void;
}

export interface Poller<TContext> {
	/** Starts polling `context`, replacing any previous run. */
	start(context: TContext): void;
	stop(): void;
	readonly active: boolean;
	/** Polls that succeeded since the last start */
	readonly completed: number;
}

/**
 * Runs `pollFn` repeatedly until stopped. The next poll is scheduled only
 * once the previous one settled, so polls never overlap however slow the
 * native stack answers.
 *
 * @example Reporting the BlueZ device list while discovering
 * ```typescript
 * const poller = createPoller<Adapter>(reportDevices, {
 *   intervalMs: 1000,
 *   immediate: true,
 *   onError: (err) => log.warn("device poll failed:", err.message),
 * });
 *
 * poller.start(adapter);
 * ```
 */
export function createPoller<TContext>(
	pollFn: (context: TContext) => Promise<void>,
	options: PollerOptions,
): Poller<TContext> {
	const {
		intervalMs,
		immediate = false,
		maxConsecutiveFailures = DEFAULT_MAX_POLL_FAILURES,
		onError,
		onGiveUp,
	} = options;

	let timer: ReturnType<typeof setTimeout> | null = null;
	// Bumped on every start and stop; a settling poll from an older run is ignored
	let run = 0;
	let active = false;
	let completed = 0;

	function stop(): void {
		run++;
		active = false;
		if (timer !== null) {
			clearTimeout(timer);
			timer = null;
		}
	}

	function start(context: TContext): void {
		stop();
		const current = run;
		let failures = 0;
		active = true;
		completed = 0;

		const schedule = (delayMs: number): void => {
			timer = setTimeout(() => {
				timer = null;
				pollFn(context).then(
					() => {
						if (current !== run) return;
						failures = 0;
						completed++;
						schedule(intervalMs);
					},
					(e: unknown) => {
						if (current !== run) return;
						const error = normalizeError(e);
						failures++;
						onError(error, failures);
						if (failures >= maxConsecutiveFailures) {
							log.warn(`giving up after ${failures} consecutive failures`);
							stop();
							onGiveUp?.(error);
							return;
						}
						schedule(intervalMs);
					},
				);
			}, delayMs);
		};

		schedule(immediate ? 0 : intervalMs);
	}

	return {
		start,
		stop,
		get active() {
			return active;
		},
		get completed() {
			return completed;
		},
	};
}
