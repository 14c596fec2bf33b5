import { afterEach, describe, expect, it, vi } from "vitest";
import { type Logger, resetLogger, setLogger } from "../utils/logger";
import { createEventChannel } from "./event-channel";

function delay(ms: number): Promise<void> {
	return new Promise((r) => setTimeout(r, ms));
}

describe("createEventChannel", () => {
	afterEach(() => {
		resetLogger();
	});

	it("returns the task result", async () => {
		const channel = createEventChannel();
		await expect(channel.post(() => 42)).resolves.toBe(42);
		await expect(channel.post(async () => "async")).resolves.toBe("async");
	});

	it("runs tasks one at a time in posting order", async () => {
		const channel = createEventChannel();
		const events: string[] = [];

		const first = channel.post(async () => {
			events.push("first:start");
			await delay(20);
			events.push("first:end");
		});
		const second = channel.post(() => {
			events.push("second");
		});

		await Promise.all([first, second]);

		expect(events).toEqual(["first:start", "first:end", "second"]);
	});

	it("keeps running after a failed task", async () => {
		const channel = createEventChannel();

		const failed = channel.post(() => {
			throw new Error("boom");
		});
		const next = channel.post(() => "next");

		await expect(failed).rejects.toThrow("boom");
		await expect(next).resolves.toBe("next");
	});

	it("counts pending tasks", async () => {
		const channel = createEventChannel();
		expect(channel.pending).toBe(0);

		const a = channel.post(() => delay(10));
		const b = channel.post(() => undefined);
		expect(channel.pending).toBe(2);

		await Promise.all([a, b]);
		await channel.drain();
		expect(channel.pending).toBe(0);
	});

	it("logs errors from dispatched tasks", async () => {
		const logger: Logger = { warn: vi.fn(), error: vi.fn() };
		setLogger(logger);
		const channel = createEventChannel("AA:BB:CC:DD:EE:FF");
		const error = new Error("handler failed");

		channel.dispatch("link-lost", () => {
			throw error;
		});
		await channel.drain();
		await Promise.resolve();

		expect(logger.error).toHaveBeenCalledWith(
			'[unible:event-channel] AA:BB:CC:DD:EE:FF: task "link-lost" failed:',
			error,
		);
	});

	it("drain waits for dispatched tasks", async () => {
		const channel = createEventChannel();
		let done = false;

		channel.dispatch("slow", async () => {
			await delay(10);
			done = true;
		});
		await channel.drain();

		expect(done).toBe(true);
	});
});
