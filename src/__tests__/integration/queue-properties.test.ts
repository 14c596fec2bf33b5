/**
 * Property tests for operation ordering and subscription sharing.
 */

import * as fc from "fast-check";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createNotificationMultiplexer } from "../../ble/notification-multiplexer";
import { createOperationQueue } from "../../ble/operation-queue";
import {
	CancelledError,
	ConnectionLostError,
	OperationTimeoutError,
} from "../../errors";
import type { CharacteristicRef } from "../../types";
import { resetLogger, setLogger } from "../../utils/logger";
import { normalizeUuid } from "../../utils/uuid";

const TIMEOUT_MS = 50;

type Outcome = "ok" | "fail" | "hang";

interface PlannedOp {
	outcome: Outcome;
	/** Time the backend takes to answer, below the deadline */
	delayMs: number;
	/** Caller aborts right after submitting everything */
	cancel: boolean;
}

type Settled =
	| { index: number; status: "fulfilled"; value: number }
	| { index: number; status: "rejected"; reason: unknown };

const opArb: fc.Arbitrary<PlannedOp> = fc.record({
	outcome: fc.constantFrom<Outcome>("ok", "fail", "hang"),
	delayMs: fc.integer({ min: 0, max: TIMEOUT_MS - 10 }),
	cancel: fc.boolean(),
});

function answerAfter(op: PlannedOp, index: number): Promise<number> {
	if (op.outcome === "hang") {
		return new Promise<number>(() => {});
	}
	return new Promise<number>((resolve, reject) => {
		setTimeout(() => {
			if (op.outcome === "ok") {
				resolve(index);
			} else {
				reject(new Error(`op ${index} failed`));
			}
		}, op.delayMs);
	});
}

const STREAM: CharacteristicRef = {
	serviceUuid: normalizeUuid("fff0"),
	characteristicUuid: normalizeUuid("fff4"),
};

describe("operation queue properties", () => {
	afterEach(() => {
		vi.useRealTimers();
		resetLogger();
	});

	it("completes operations in submission order under timeouts and cancellations", async () => {
		setLogger({ warn: vi.fn(), error: vi.fn() });

		await fc.assert(
			fc.asyncProperty(fc.array(opArb, { minLength: 1, maxLength: 8 }), async (plan) => {
				vi.useFakeTimers();
				try {
					const queue = createOperationQueue({ defaultTimeoutMs: TIMEOUT_MS });
					const controllers = plan.map(() => new AbortController());
					const started: number[] = [];
					const settled: Settled[] = [];

					plan.forEach((op, index) => {
						queue
							.enqueue(
								"read",
								() => {
									started.push(index);
									return answerAfter(op, index);
								},
								{ signal: controllers[index]?.signal },
							)
							.then(
								(value) => settled.push({ index, status: "fulfilled", value }),
								(reason: unknown) => settled.push({ index, status: "rejected", reason }),
							);
					});
					// Last first, so no cancelled operation reaches the head before its abort
					for (let index = plan.length - 1; index >= 0; index--) {
						if (plan[index]?.cancel) controllers[index]?.abort();
					}

					await vi.advanceTimersByTimeAsync(plan.length * TIMEOUT_MS + 10);

					expect(settled.map((s) => s.index)).toEqual(plan.map((_, index) => index));
					expect(queue.getQueueDepth()).toBe(0);

					plan.forEach((op, index) => {
						const result = settled[index];
						// The first operation is already in flight when the caller aborts
						const cancelledInQueue = op.cancel && index > 0;
						expect(started.includes(index)).toBe(!cancelledInQueue);

						if (op.cancel) {
							expect(result?.status === "rejected" && result.reason).toBeInstanceOf(
								CancelledError,
							);
						} else if (op.outcome === "ok") {
							expect(result).toEqual({ index, status: "fulfilled", value: index });
						} else if (op.outcome === "fail") {
							expect(result?.status === "rejected" && result.reason).toEqual(
								new Error(`op ${index} failed`),
							);
						} else {
							expect(result?.status === "rejected" && result.reason).toBeInstanceOf(
								OperationTimeoutError,
							);
						}
					});
				} finally {
					vi.useRealTimers();
				}
			}),
			{ numRuns: 50 },
		);
	});

	it("fails exactly the uncompleted operations on link loss", async () => {
		await fc.assert(
			fc.asyncProperty(
				fc.integer({ min: 1, max: 8 }).chain((total) =>
					fc.tuple(fc.constant(total), fc.integer({ min: 0, max: total })),
				),
				async ([total, completedBeforeLoss]) => {
					vi.useFakeTimers();
					try {
						const queue = createOperationQueue({ defaultTimeoutMs: 1000 });
						const results = Array.from({ length: total }, (_, index) =>
							queue.enqueue(
								"write",
								() =>
									new Promise<number>((resolve) => {
										setTimeout(() => resolve(index), 10);
									}),
							),
						);

						// Operation i answers at (i + 1) * 10 ms
						await vi.advanceTimersByTimeAsync(completedBeforeLoss * 10 + 5);
						const lost = new ConnectionLostError("link lost");
						queue.failAll(lost);

						const outcomes = await Promise.allSettled(results);
						outcomes.forEach((outcome, index) => {
							if (index < completedBeforeLoss) {
								expect(outcome).toEqual({ status: "fulfilled", value: index });
							} else {
								expect(outcome).toEqual({ status: "rejected", reason: lost });
								expect(outcome.status === "rejected" && outcome.reason).toBe(lost);
							}
						});
						expect(queue.getQueueDepth()).toBe(0);
					} finally {
						vi.useRealTimers();
					}
				},
			),
			{ numRuns: 50 },
		);
	});
});

describe("notification sharing properties", () => {
	it("shares one backend subscription and delivers identical sequences", async () => {
		await fc.assert(
			fc.asyncProperty(
				fc.integer({ min: 1, max: 6 }).chain((listeners) =>
					fc.tuple(
						fc.shuffledSubarray(
							Array.from({ length: listeners }, (_, i) => i),
							{ minLength: listeners, maxLength: listeners },
						),
						fc.array(fc.uint8Array({ minLength: 1, maxLength: 4 }), { maxLength: 10 }),
					),
				),
				async ([closeOrder, values]) => {
					const subscribe = vi.fn(async (_ref: CharacteristicRef) => {});
					const unsubscribe = vi.fn(async (_ref: CharacteristicRef) => {});
					const multiplexer = createNotificationMultiplexer({ subscribe, unsubscribe });

					const streams = await Promise.all(
						closeOrder.map(() => multiplexer.subscribe(STREAM, { bufferSize: 16 })),
					);
					for (const value of values) {
						multiplexer.deliver(STREAM, value);
					}

					for (const stream of streams) {
						const received: Uint8Array[] = [];
						for (let i = 0; i < values.length; i++) {
							const next = await stream.next();
							if (!next.done) received.push(next.value);
						}
						expect(received).toEqual(values);
					}
					expect(subscribe).toHaveBeenCalledTimes(1);

					closeOrder.forEach((index, position) => {
						streams[index]?.close();
						const remaining = closeOrder.length - position - 1;
						expect(multiplexer.listenerCount(STREAM)).toBe(remaining);
						expect(unsubscribe).toHaveBeenCalledTimes(remaining === 0 ? 1 : 0);
					});
					expect(multiplexer.activeCount).toBe(0);
				},
			),
			{ numRuns: 50 },
		);
	});
});
