import type { SessionState } from "../types";
import { createScopedLogger } from "../utils/logger";

const log = createScopedLogger("state-machine");

/**
 * Called after every transition. `cause` is the error that forced the
 * transition, when there was one (link loss, connect failure).
 */
export type TransitionCallback = (
	from: SessionState,
	to: SessionState,
	cause?: Error,
) => void;

export interface StateMachine {
	getState(): SessionState;
	canTransition(to: SessionState): boolean;
	transition(to: SessionState, cause?: Error): void;
	onTransition(callback: TransitionCallback): () => void;
}

/**
 * Valid state transitions:
 * - disconnected -> connecting
 * - connecting -> connected | disconnecting | disconnected (failed)
 * - connected -> disconnecting | reconnecting | disconnected (link lost)
 * - reconnecting -> connected | disconnecting | disconnected (gave up)
 * - disconnecting -> disconnected
 */
const VALID_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
	disconnected: ["connecting"],
	connecting: ["connected", "disconnecting", "disconnected"],
	connected: ["disconnecting", "reconnecting", "disconnected"],
	reconnecting: ["connected", "disconnecting", "disconnected"],
	disconnecting: ["disconnected"],
};

/**
 * Creates the lifecycle state machine of one device session.
 * Enforces valid state transitions and notifies listeners on changes.
 *
 * @param initialState The initial state (default: 'disconnected')
 *
 * @example
 * ```typescript
 * const machine = createStateMachine();
 *
 * machine.onTransition((from, to, cause) => {
 *   console.log(`${from} -> ${to}`, cause?.message ?? "");
 * });
 *
 * machine.transition("connecting");
 * try {
 *   handle = await backend.connect(address, { timeoutMs: 20000 });
 *   machine.transition("connected");
 * } catch (error) {
 *   machine.transition("disconnected", normalizeError(error));
 * }
 * ```
 */
export function createStateMachine(
	initialState: SessionState = "disconnected",
): StateMachine {
	let state: SessionState = initialState;
	const callbacks = new Set<TransitionCallback>();
	let isTransitioning = false;

	function getState(): SessionState {
		return state;
	}

	function canTransition(to: SessionState): boolean {
		return VALID_TRANSITIONS[state].includes(to);
	}

	function transition(to: SessionState, cause?: Error): void {
		if (isTransitioning) {
			throw new Error(
				`Cannot transition while another transition is in progress (attempted ${state} -> ${to})`,
			);
		}

		if (!canTransition(to)) {
			throw new Error(`Invalid state transition: ${state} -> ${to}`);
		}

		const from = state;
		state = to;
		isTransitioning = true;

		try {
			for (const cb of [...callbacks]) {
				try {
					cb(from, to, cause);
				} catch (e) {
					log.error("Transition callback error:", e);
				}
			}
		} finally {
			isTransitioning = false;
		}
	}

	function onTransition(callback: TransitionCallback): () => void {
		callbacks.add(callback);
		return () => {
			callbacks.delete(callback);
		};
	}

	return {
		getState,
		canTransition,
		transition,
		onTransition,
	};
}
