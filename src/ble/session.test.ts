import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMemoryBackend, type MemoryBackend, type SimulatedDevice } from "../backends/memory";
import type { SessionConfig } from "../config";
import {
	AdapterUnavailableError,
	CancelledError,
	ConnectionLostError,
	DeviceUnreachableError,
	NotConnectedError,
	ProtocolError,
	StaleHandleError,
	UnsupportedError,
} from "../errors";
import { type Logger, resetLogger, setLogger } from "../utils/logger";
import { normalizeUuid } from "../utils/uuid";
import { createSession, type DeviceSession, type StateChange } from "./session";

const ADDRESS = "AA:BB:CC:DD:EE:FF";

function device(overrides: Partial<SimulatedDevice> = {}): SimulatedDevice {
	return {
		address: ADDRESS,
		name: "Band-FF",
		services: [
			{
				uuid: "fff0",
				characteristics: [
					{ uuid: "fff1", properties: ["read", "write"], value: [0x10] },
					{ uuid: "fff3", properties: ["read"], readDelay: new Promise<void>(() => {}) },
					{ uuid: "fff4", properties: ["notify"] },
				],
			},
			{
				uuid: "ffe0",
				characteristics: [{ uuid: "ffe1", properties: ["writeWithoutResponse"] }],
			},
		],
		...overrides,
	};
}

function setup(config: Partial<SessionConfig> = {}, spec: SimulatedDevice = device()) {
	const backend = createMemoryBackend();
	backend.addDevice(spec);
	const session = createSession({ address: ADDRESS, backend, config });
	const changes: StateChange[] = [];
	session.onStateChange((change) => changes.push(change));
	return { backend, session, changes };
}

function transitions(changes: StateChange[]): string[] {
	return changes.map(({ from, to }) => `${from}->${to}`);
}

async function connected(
	config: Partial<SessionConfig> = {},
): Promise<{ backend: MemoryBackend; session: DeviceSession; changes: StateChange[] }> {
	const ctx = setup(config);
	await ctx.session.connect();
	return ctx;
}

describe("createSession", () => {
	let logger: Logger;

	beforeEach(() => {
		logger = { warn: vi.fn(), error: vi.fn() };
		setLogger(logger);
	});

	afterEach(() => {
		vi.useRealTimers();
		resetLogger();
	});

	describe("connect", () => {
		it("connects, discovers services and starts generation 1", async () => {
			const { backend, session, changes } = setup();

			await session.connect();

			expect(session.state).toBe("connected");
			expect(session.generation).toBe(1);
			expect(transitions(changes)).toEqual(["disconnected->connecting", "connecting->connected"]);
			expect(backend.calls.map((call) => call.method)).toEqual(["connect", "discoverServices"]);

			const tree = session.getServices();
			expect(tree?.generation).toBe(1);
			expect(tree?.services.map((s) => s.uuid)).toEqual([
				normalizeUuid("fff0"),
				normalizeUuid("ffe0"),
			]);
			expect(session.getCharacteristic("fff0", 0xfff1)?.handle).toEqual({
				sessionId: session.id,
				generation: 1,
				serviceUuid: normalizeUuid("fff0"),
				characteristicUuid: normalizeUuid("fff1"),
			});
		});

		it("joins a pending attempt", async () => {
			const { backend, session } = setup();

			await Promise.all([session.connect(), session.connect()]);

			expect(backend.countCalls("connect")).toBe(1);
		});

		it("resolves at once when already connected", async () => {
			const { backend, session } = await connected();

			await session.connect();

			expect(backend.countCalls("connect")).toBe(1);
			expect(session.generation).toBe(1);
		});

		it("returns to disconnected with the backend error", async () => {
			const error = new ProtocolError("pairing rejected");
			const { session, changes } = setup({}, device({ connect: error }));

			await expect(session.connect()).rejects.toBe(error);

			expect(session.state).toBe("disconnected");
			expect(session.lastError).toBe(error);
			expect(changes.at(-1)).toEqual({ from: "connecting", to: "disconnected", error });
		});

		it("reports a silent device as unreachable after the timeout", async () => {
			vi.useFakeTimers();
			const { session } = setup({}, device({ connect: "silent" }));

			const attempt = session.connect({ timeoutMs: 250 });
			const assertion = expect(attempt).rejects.toThrow(
				`Device ${ADDRESS} did not respond within 250ms`,
			);
			await vi.advanceTimersByTimeAsync(250);

			await assertion;
			expect(session.lastError).toBeInstanceOf(DeviceUnreachableError);
			expect(session.state).toBe("disconnected");
		});

		it("disconnects and rejects when discovery fails", async () => {
			const error = new ProtocolError("bad ATT response");
			const failure = Promise.reject(error);
			failure.catch(() => {});
			const { backend, session, changes } = setup({}, device({ discoverDelay: failure }));

			await expect(session.connect()).rejects.toBe(error);

			expect(session.state).toBe("disconnected");
			expect(backend.isConnected(ADDRESS)).toBe(false);
			expect(transitions(changes)).toEqual([
				"disconnected->connecting",
				"connecting->connected",
				"connected->disconnecting",
				"disconnecting->disconnected",
			]);
		});

		it("rejects a pending connect with CancelledError on disconnect", async () => {
			const { session, changes } = setup({}, device({ connect: "silent" }));

			const attempt = session.connect();
			const outcome = expect(attempt).rejects.toBeInstanceOf(CancelledError);
			await vi.waitFor(() => {
				expect(session.state).toBe("connecting");
			});
			await session.disconnect();

			await outcome;
			expect(transitions(changes)).toEqual([
				"disconnected->connecting",
				"connecting->disconnecting",
				"disconnecting->disconnected",
			]);
		});

		it("cancels through the caller's signal", async () => {
			const { session } = setup({}, device({ connect: "silent" }));
			const controller = new AbortController();

			const attempt = session.connect({ signal: controller.signal });
			await vi.waitFor(() => {
				expect(session.state).toBe("connecting");
			});
			controller.abort(new CancelledError("user gave up"));

			await expect(attempt).rejects.toThrow("user gave up");
			expect(session.state).toBe("disconnected");
		});

		it("rejects an invalid timeout", async () => {
			const { session } = setup();

			await expect(session.connect({ timeoutMs: 0 })).rejects.toThrow(
				"timeoutMs must be a positive number, got 0",
			);
			await expect(session.connect({ timeoutMs: 2147483648 })).rejects.toThrow(
				"timeoutMs must not exceed 2147483647ms, got 2147483648",
			);
			expect(session.state).toBe("disconnected");
		});
	});

	describe("GATT operations", () => {
		it("reads by UUID and caches the value", async () => {
			const { session } = await connected();

			const value = await session.read("fff0", "fff1");

			expect(value).toEqual(new Uint8Array([0x10]));
			expect(session.getCharacteristic("fff0", "fff1")?.value).toEqual(new Uint8Array([0x10]));
		});

		it("reads by handle", async () => {
			const { session } = await connected();
			const characteristic = session.getCharacteristic("fff0", "fff1");
			if (!characteristic) throw new Error("characteristic missing");

			await expect(session.read(characteristic.handle)).resolves.toEqual(new Uint8Array([0x10]));
		});

		it("writes with response", async () => {
			const { backend, session } = await connected();

			await session.write("fff0", "fff1", [0x01, 0x02]);

			expect(backend.getValue(ADDRESS, "fff0", "fff1")).toEqual(new Uint8Array([0x01, 0x02]));
		});

		it("writes without response by handle", async () => {
			const { backend, session } = await connected();
			const characteristic = session.getCharacteristic("ffe0", "ffe1");
			if (!characteristic) throw new Error("characteristic missing");

			await session.write(characteristic.handle, new Uint8Array([0xa5]), "withoutResponse");

			expect(backend.calls.at(-1)).toMatchObject({
				method: "writeCharacteristic",
				mode: "withoutResponse",
				data: new Uint8Array([0xa5]),
			});
		});

		it("rejects operations the characteristic does not offer", async () => {
			const { backend, session } = await connected();

			await expect(session.read("fff0", "fff4")).rejects.toThrow(
				"Characteristic fff0/fff4 does not support read",
			);
			await expect(session.write("ffe0", "ffe1", [1])).rejects.toThrow(
				"Characteristic ffe0/ffe1 does not support write withResponse",
			);
			await expect(session.read("fff0", "abcd")).rejects.toThrow(
				`Characteristic fff0/abcd not found on ${ADDRESS}`,
			);
			expect(backend.countCalls("readCharacteristic")).toBe(0);
		});

		it("rejects operations while not connected", async () => {
			const { session } = setup();

			await expect(session.read("fff0", "fff1")).rejects.toBeInstanceOf(NotConnectedError);
			await expect(session.subscribe("fff0", "fff4")).rejects.toThrow(
				"Not connected to device (state: disconnected)",
			);
		});

		it("rejects a handle of another session", async () => {
			const { session } = await connected();
			const other = createSession({ address: ADDRESS, backend: createMemoryBackend() });

			await expect(
				session.read({
					sessionId: other.id,
					generation: 1,
					serviceUuid: normalizeUuid("fff0"),
					characteristicUuid: normalizeUuid("fff1"),
				}),
			).rejects.toBeInstanceOf(ProtocolError);
		});

		it("applies the per-call timeout", async () => {
			const { session } = await connected();

			await expect(session.read("fff0", "fff3", { timeoutMs: 20 })).rejects.toThrow(
				"read fff0/fff3 timed out after 20ms",
			);
			await expect(session.read("fff0", "fff1")).resolves.toEqual(new Uint8Array([0x10]));
		});
	});

	describe("notifications", () => {
		it("shares one backend subscription between listeners", async () => {
			const { backend, session } = await connected();

			const a = await session.subscribe("fff0", "fff4");
			const b = await session.subscribe("fff0", "fff4", { bufferSize: 4 });
			backend.notify(ADDRESS, "fff0", "fff4", [1]);
			backend.notify(ADDRESS, "fff0", "fff4", [2]);

			expect(backend.countCalls("subscribe")).toBe(1);
			await expect(a.next()).resolves.toEqual({ done: false, value: new Uint8Array([1]) });
			await expect(b.next()).resolves.toEqual({ done: false, value: new Uint8Array([1]) });
			expect(session.getCharacteristic("fff0", "fff4")?.value).toEqual(new Uint8Array([2]));

			a.close();
			b.close();
			await vi.waitFor(() => {
				expect(backend.countCalls("unsubscribe")).toBe(1);
			});
		});

		it("rejects a characteristic without notify", async () => {
			const { session } = await connected();

			await expect(session.subscribe("fff0", "fff1")).rejects.toBeInstanceOf(UnsupportedError);
		});
	});

	describe("link loss", () => {
		it("fails pending operations and closes streams", async () => {
			const { backend, session, changes } = await connected();
			const stream = await session.subscribe("fff0", "fff4");
			const inFlight = session.read("fff0", "fff3");
			const queued = session.read("fff0", "fff1");
			await vi.waitFor(() => {
				expect(session.queueDepth).toBe(2);
			});

			const outcomes = Promise.allSettled([inFlight, queued]);

			backend.dropConnection(ADDRESS, new Error("supervision timeout"));

			const [first, second] = await outcomes;
			expect(first?.status).toBe("rejected");
			expect(second?.status).toBe("rejected");
			if (first?.status === "rejected" && second?.status === "rejected") {
				expect(first.reason).toBeInstanceOf(ConnectionLostError);
				expect(first.reason).toBe(second.reason);
				expect(first.reason.message).toBe("supervision timeout");
			}
			expect(stream.closed).toBe(true);
			expect(stream.closeReason).toBeInstanceOf(ConnectionLostError);
			await vi.waitFor(() => {
				expect(session.state).toBe("disconnected");
			});
			expect(changes.at(-1)?.error?.message).toBe("supervision timeout");
			expect(session.lastError).toBe(changes.at(-1)?.error);
			expect(session.getServices()).toBeNull();
		});

		it("reconnects with a new generation and invalidates old handles", async () => {
			const { backend, session, changes } = await connected({
				autoReconnect: true,
				reconnectDelayMs: 1,
				maxReconnectDelayMs: 1,
			});
			const characteristic = session.getCharacteristic("fff0", "fff1");
			if (!characteristic) throw new Error("characteristic missing");

			backend.dropConnection(ADDRESS);
			await vi.waitFor(() => {
				expect(session.generation).toBe(2);
				expect(session.getServices()?.generation).toBe(2);
			});

			expect(session.state).toBe("connected");
			expect(transitions(changes).slice(-2)).toEqual([
				"connected->reconnecting",
				"reconnecting->connected",
			]);
			await expect(session.read(characteristic.handle)).rejects.toBeInstanceOf(StaleHandleError);
			await expect(session.read("fff0", "fff1")).resolves.toEqual(new Uint8Array([0x10]));
		});

		it("gives up after maxReconnectAttempts with the last error", async () => {
			const { backend, session } = await connected({
				autoReconnect: true,
				maxReconnectAttempts: 2,
				reconnectDelayMs: 1,
				maxReconnectDelayMs: 1,
			});
			const error = new DeviceUnreachableError(ADDRESS);
			backend.setConnectBehavior(ADDRESS, error);

			backend.dropConnection(ADDRESS);
			await vi.waitFor(() => {
				expect(session.state).toBe("disconnected");
			});

			expect(session.lastError).toBe(error);
			expect(backend.countCalls("connect")).toBe(3);
		});

		it("does not reconnect after the adapter went away", async () => {
			const { backend, session, changes } = await connected({ autoReconnect: true });

			backend.setAvailable(false);
			await vi.waitFor(() => {
				expect(session.state).toBe("disconnected");
			});

			expect(transitions(changes).at(-1)).toBe("connected->disconnected");
			expect(backend.countCalls("connect")).toBe(1);
		});

		it("stops reconnecting on disconnect", async () => {
			const { backend, session } = await connected({ autoReconnect: true });
			backend.setConnectBehavior(ADDRESS, "silent");

			backend.dropConnection(ADDRESS);
			await vi.waitFor(() => {
				expect(backend.countCalls("connect")).toBe(2);
			});
			await session.disconnect();

			expect(session.state).toBe("disconnected");
			expect(session.lastError).toBeInstanceOf(ConnectionLostError);
		});
	});

	describe("disconnect", () => {
		it("tears the link down and is idempotent", async () => {
			const { backend, session, changes } = await connected();

			await session.disconnect();
			await session.disconnect();

			expect(backend.isConnected(ADDRESS)).toBe(false);
			expect(transitions(changes).slice(-2)).toEqual([
				"connected->disconnecting",
				"disconnecting->disconnected",
			]);
		});

		it("fails operations still queued", async () => {
			const { session } = await connected();
			const inFlight = session.read("fff0", "fff3");
			const outcome = expect(inFlight).rejects.toThrow(`Disconnected from ${ADDRESS}`);

			await session.disconnect();

			await outcome;
		});

		it("ignores the backend's own disconnect event", async () => {
			const { session, changes } = await connected();

			await session.disconnect();
			await new Promise((resolve) => setTimeout(resolve, 0));

			expect(changes).toHaveLength(4);
			expect(logger.error).not.toHaveBeenCalled();
		});

		it("connects again with the next generation", async () => {
			const { session } = await connected();

			await session.disconnect();
			await session.connect();

			expect(session.generation).toBe(2);
		});
	});

	describe("configure", () => {
		it("applies new settings from the next connection on", async () => {
			const { backend, session } = await connected();
			await session.disconnect();

			session.configure({ readTimeoutMs: 20, bufferSize: 1 });
			await session.connect();

			await expect(session.read("fff0", "fff3")).rejects.toThrow(
				"read fff0/fff3 timed out after 20ms",
			);
			const stream = await session.subscribe("fff0", "fff4");
			backend.notify(ADDRESS, "fff0", "fff4", [1]);
			backend.notify(ADDRESS, "fff0", "fff4", [2]);
			await expect(stream.next()).resolves.toEqual({ done: false, value: new Uint8Array([2]) });
			stream.close();
		});

		it("refuses while a link is up", async () => {
			const { session } = await connected();

			expect(() => session.configure({ autoReconnect: true })).toThrow(
				`Cannot reconfigure ${ADDRESS} while connected`,
			);
		});

		it("validates the merged settings", () => {
			const { session } = setup();

			expect(() => session.configure({ connectTimeoutMs: 3e9 })).toThrow(
				"connectTimeoutMs must not exceed 2147483647ms, got 3000000000",
			);
		});

		it("refuses a closed session", async () => {
			const { session } = setup();
			await session.close();

			expect(() => session.configure({ readTimeoutMs: 100 })).toThrow(
				`Session ${session.id} is closed`,
			);
		});
	});

	describe("close", () => {
		it("disconnects and refuses further use", async () => {
			const { backend, session } = await connected();
			const onClose = vi.fn();
			session.onClose(onClose);

			await session.close();
			await session.close();

			expect(onClose).toHaveBeenCalledTimes(1);
			expect(session.closed).toBe(true);
			expect(backend.isConnected(ADDRESS)).toBe(false);
			await expect(session.connect()).rejects.toThrow(`Session ${session.id} is closed`);
		});
	});

	it("rejects invalid configuration", () => {
		expect(() =>
			createSession({
				address: ADDRESS,
				backend: createMemoryBackend(),
				config: { readTimeoutMs: -1 },
			}),
		).toThrow(RangeError);
	});

	it("treats adapter loss on connect as final", async () => {
		const backend = createMemoryBackend({ available: false });
		backend.addDevice(device());
		const session = createSession({ address: ADDRESS, backend });

		await expect(session.connect()).rejects.toBeInstanceOf(AdapterUnavailableError);
	});
});
