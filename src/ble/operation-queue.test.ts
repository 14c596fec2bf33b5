import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	CancelledError,
	ConnectionLostError,
	OperationTimeoutError,
} from "../errors";
import { createOperationQueue, type OperationContext } from "./operation-queue";

interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (error: Error) => void;
}

function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	let reject: (error: Error) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

function track(order: string[], name: string, promise: Promise<unknown>): Promise<void> {
	return promise.then(
		() => {
			order.push(`${name}:ok`);
		},
		(error: unknown) => {
			order.push(`${name}:${error instanceof Error ? error.name : "?"}`);
		},
	);
}

async function flush(): Promise<void> {
	for (let i = 0; i < 5; i++) {
		await Promise.resolve();
	}
}

describe("createOperationQueue", () => {
	describe("basic functionality", () => {
		it("executes a single operation", async () => {
			const queue = createOperationQueue();
			const result = await queue.enqueue("read", () =>
				Promise.resolve(new Uint8Array([0x64])),
			);
			expect(result).toEqual(new Uint8Array([0x64]));
		});

		it("propagates operation errors", async () => {
			const queue = createOperationQueue();
			await expect(
				queue.enqueue("write", () => Promise.reject(new Error("Operation failed"))),
			).rejects.toThrow("Operation failed");
		});

		it("continues after a failed operation", async () => {
			const queue = createOperationQueue();
			const failed = queue.enqueue("write", () => Promise.reject(new Error("nope")));
			const next = queue.enqueue("read", () => Promise.resolve("next"));

			await expect(failed).rejects.toThrow("nope");
			await expect(next).resolves.toBe("next");
		});

		it("rejects a timeout that is not positive", () => {
			expect(() => createOperationQueue({ defaultTimeoutMs: 0 })).toThrow(RangeError);
			const queue = createOperationQueue();
			expect(() => queue.enqueue("read", async () => 1, { timeoutMs: -5 })).toThrow(
				"timeoutMs must be a positive number, got -5",
			);
		});

		it("rejects a finite timeout longer than a timer can wait", async () => {
			expect(() => createOperationQueue({ defaultTimeoutMs: 2147483648 })).toThrow(
				"defaultTimeoutMs must not exceed 2147483647ms, got 2147483648",
			);
			const queue = createOperationQueue();
			expect(() => queue.enqueue("read", async () => 1, { timeoutMs: 3e9 })).toThrow(
				"timeoutMs must not exceed 2147483647ms, got 3000000000",
			);

			await expect(
				queue.enqueue("read", async () => 1, { timeoutMs: 2147483647 }),
			).resolves.toBe(1);
			await expect(
				queue.enqueue("read", async () => 2, { timeoutMs: Number.POSITIVE_INFINITY }),
			).resolves.toBe(2);
		});
	});

	describe("serialization", () => {
		it("dispatches one operation at a time", async () => {
			const queue = createOperationQueue();
			const first = deferred<string>();
			const secondRun = vi.fn(() => Promise.resolve("second"));

			const p1 = queue.enqueue("read", () => first.promise);
			const p2 = queue.enqueue("read", secondRun);

			await flush();
			expect(secondRun).not.toHaveBeenCalled();
			expect(queue.getQueueDepth()).toBe(2);

			first.resolve("first");
			await expect(p1).resolves.toBe("first");
			await expect(p2).resolves.toBe("second");
			expect(secondRun).toHaveBeenCalledTimes(1);
			expect(queue.getQueueDepth()).toBe(0);
		});

		it("delivers completions in submission order", async () => {
			const queue = createOperationQueue();
			const order: string[] = [];
			const gates = [deferred<number>(), deferred<number>(), deferred<number>()];

			const tracked = gates.map((gate, i) =>
				track(order, `op${i + 1}`, queue.enqueue("read", () => gate.promise)),
			);

			// Settle out of order: later gates first
			gates[1]?.promise.catch(() => {});
			gates[2]?.resolve(3);
			gates[1]?.reject(new Error("second failed"));
			gates[0]?.resolve(1);

			await Promise.all(tracked);
			expect(order).toEqual(["op1:ok", "op2:Error", "op3:ok"]);
		});

		it("passes a distinct id and signal to each operation", async () => {
			const queue = createOperationQueue();
			const contexts: OperationContext[] = [];

			await Promise.all([
				queue.enqueue("read", async (ctx) => {
					contexts.push(ctx);
				}),
				queue.enqueue("read", async (ctx) => {
					contexts.push(ctx);
				}),
			]);

			expect(contexts.map((c) => c.id)).toEqual([1, 2]);
			expect(contexts[0]?.signal).not.toBe(contexts[1]?.signal);
		});

		it("reports the in-flight operation", async () => {
			const queue = createOperationQueue({ defaultTimeoutMs: 5000 });
			const gate = deferred<void>();
			expect(queue.inFlight).toBeNull();

			const p = queue.enqueue("write", () => gate.promise, { label: "write ffe1" });

			expect(queue.inFlight).toMatchObject({
				id: 1,
				kind: "write",
				label: "write ffe1",
				timeoutMs: 5000,
			});

			gate.resolve();
			await p;
			expect(queue.inFlight).toBeNull();
		});
	});

	describe("deadlines", () => {
		beforeEach(() => {
			vi.useFakeTimers();
		});

		afterEach(() => {
			vi.useRealTimers();
		});

		it("times out the in-flight operation and moves on", async () => {
			const queue = createOperationQueue();
			let firstSignal: AbortSignal | undefined;
			const secondRun = vi.fn(() => Promise.resolve("second"));

			const p1 = queue.enqueue(
				"read",
				({ signal }) => {
					firstSignal = signal;
					return new Promise<never>(() => {});
				},
				{ timeoutMs: 100 },
			);
			const r1 = p1.catch((e: unknown) => e);
			const p2 = queue.enqueue("read", secondRun);

			await vi.advanceTimersByTimeAsync(99);
			expect(secondRun).not.toHaveBeenCalled();

			await vi.advanceTimersByTimeAsync(1);
			const error = await r1;
			expect(error).toBeInstanceOf(OperationTimeoutError);
			expect(error).toHaveProperty("message", "read timed out after 100ms");
			expect(firstSignal?.aborted).toBe(true);
			await expect(p2).resolves.toBe("second");
		});

		it("starts the deadline at dispatch, not at submission", async () => {
			const queue = createOperationQueue();

			const p1 = queue.enqueue(
				"read",
				() => new Promise<number>((r) => setTimeout(() => r(1), 80)),
			);
			const p2 = queue.enqueue(
				"read",
				() => new Promise<number>((r) => setTimeout(() => r(2), 90)),
				{ timeoutMs: 100 },
			);

			await vi.advanceTimersByTimeAsync(200);

			await expect(p1).resolves.toBe(1);
			await expect(p2).resolves.toBe(2);
		});

		it("discards a result that arrives after the deadline", async () => {
			const queue = createOperationQueue();
			const gate = deferred<string>();

			const p1 = queue.enqueue("read", () => gate.promise, {
				timeoutMs: 50,
				label: "read battery",
			});
			const r1 = p1.catch((e: unknown) => e);

			await vi.advanceTimersByTimeAsync(50);
			gate.resolve("late");
			await flush();

			const error = await r1;
			expect(error).toBeInstanceOf(OperationTimeoutError);
			expect(error).toHaveProperty("message", "read battery timed out after 50ms");
			await expect(
				queue.enqueue("read", () => Promise.resolve("after")),
			).resolves.toBe("after");
		});
	});

	describe("cancellation", () => {
		it("cancels the in-flight operation immediately", async () => {
			const queue = createOperationQueue();
			const controller = new AbortController();
			let opSignal: AbortSignal | undefined;

			const p1 = queue.enqueue(
				"write",
				({ signal }) => {
					opSignal = signal;
					return new Promise<never>(() => {});
				},
				{ signal: controller.signal },
			);
			const p2 = queue.enqueue("read", () => Promise.resolve("next"));

			controller.abort();

			await expect(p1).rejects.toBeInstanceOf(CancelledError);
			expect(opSignal?.aborted).toBe(true);
			await expect(p2).resolves.toBe("next");
		});

		it("skips a cancelled queued operation and delivers in order", async () => {
			const queue = createOperationQueue();
			const order: string[] = [];
			const gate = deferred<number>();
			const controller = new AbortController();
			const cancelledRun = vi.fn(() => Promise.resolve(2));

			const t1 = track(order, "op1", queue.enqueue("read", () => gate.promise));
			const t2 = track(
				order,
				"op2",
				queue.enqueue("read", cancelledRun, { signal: controller.signal }),
			);
			const t3 = track(order, "op3", queue.enqueue("read", () => Promise.resolve(3)));

			controller.abort();
			await flush();
			// Not delivered before the head completes
			expect(order).toEqual([]);

			gate.resolve(1);
			await Promise.all([t1, t2, t3]);

			expect(order).toEqual(["op1:ok", "op2:CancelledError", "op3:ok"]);
			expect(cancelledRun).not.toHaveBeenCalled();
		});

		it("never dispatches an operation whose signal is already aborted", async () => {
			const queue = createOperationQueue();
			const controller = new AbortController();
			controller.abort("user gave up");
			const run = vi.fn(() => Promise.resolve(1));

			await expect(
				queue.enqueue("read", run, { signal: controller.signal }),
			).rejects.toThrow("user gave up");
			expect(run).not.toHaveBeenCalled();
		});

		it("passes a BleError abort reason through", async () => {
			const queue = createOperationQueue();
			const controller = new AbortController();
			const reason = new ConnectionLostError("link dropped");

			const p = queue.enqueue("read", () => new Promise<never>(() => {}), {
				signal: controller.signal,
			});
			controller.abort(reason);

			await expect(p).rejects.toBe(reason);
		});
	});

	describe("failAll", () => {
		it("fails in-flight first, then queued in submission order", async () => {
			const queue = createOperationQueue();
			const order: string[] = [];
			let inFlightSignal: AbortSignal | undefined;
			const error = new ConnectionLostError();

			const tracked = [
				track(
					order,
					"op1",
					queue.enqueue("read", ({ signal }) => {
						inFlightSignal = signal;
						return new Promise<never>(() => {});
					}),
				),
				track(order, "op2", queue.enqueue("write", () => Promise.resolve())),
				track(order, "op3", queue.enqueue("subscribe", () => Promise.resolve())),
			];

			queue.failAll(error);
			await Promise.all(tracked);

			expect(order).toEqual([
				"op1:ConnectionLostError",
				"op2:ConnectionLostError",
				"op3:ConnectionLostError",
			]);
			expect(inFlightSignal?.reason).toBe(error);
			expect(queue.getQueueDepth()).toBe(0);
		});

		it("leaves completed operations alone and stays usable", async () => {
			const queue = createOperationQueue();
			await expect(queue.enqueue("read", () => Promise.resolve(1))).resolves.toBe(1);

			queue.failAll(new ConnectionLostError());

			expect(queue.closed).toBe(false);
			await expect(queue.enqueue("read", () => Promise.resolve(2))).resolves.toBe(2);
		});
	});

	describe("close", () => {
		it("fails pending operations and rejects later submissions", async () => {
			const queue = createOperationQueue();
			const pending = queue.enqueue("read", () => new Promise<never>(() => {}));
			const error = new ConnectionLostError("session closed");

			queue.close(error);

			await expect(pending).rejects.toBe(error);
			await expect(queue.enqueue("read", () => Promise.resolve(1))).rejects.toBe(error);
			expect(queue.closed).toBe(true);
		});

		it("defaults to CancelledError and is idempotent", async () => {
			const queue = createOperationQueue();
			queue.close();
			queue.close(new ConnectionLostError());

			await expect(
				queue.enqueue("read", () => Promise.resolve(1)),
			).rejects.toThrow("Operation queue closed");
		});

		it("closes when the queue signal aborts", async () => {
			const controller = new AbortController();
			const queue = createOperationQueue({ signal: controller.signal });
			const pending = queue.enqueue("read", () => new Promise<never>(() => {}));

			controller.abort();

			await expect(pending).rejects.toBeInstanceOf(CancelledError);
			expect(queue.closed).toBe(true);
		});
	});
});
