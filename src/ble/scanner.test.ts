import { afterEach, describe, expect, it, vi } from "vitest";
import { createMemoryBackend, type MemoryBackend } from "../backends/memory";
import { AdapterUnavailableError, CancelledError, DeviceUnreachableError } from "../errors";
import type { Advertisement } from "../types";
import { resetLogger } from "../utils/logger";
import { normalizeUuid } from "../utils/uuid";
import { createScanner, matchesFilters } from "./scanner";

const BAND = "AA:BB:CC:DD:EE:01";
const SCALE = "AA:BB:CC:DD:EE:02";

function setup(): MemoryBackend {
	const backend = createMemoryBackend({ advertiseOnScan: false });
	backend.addDevice({ address: BAND, name: "Band-01", serviceUuids: ["fff0"], rssi: -50 });
	backend.addDevice({ address: SCALE, name: "Scale", serviceUuids: ["181d"], rssi: -70 });
	return backend;
}

function advertisement(overrides: Partial<Advertisement> = {}): Advertisement {
	return {
		address: BAND,
		name: "Band-01",
		rssi: -50,
		serviceUuids: [normalizeUuid("fff0"), normalizeUuid("180f")],
		manufacturerData: new Uint8Array(0),
		timestamp: 0,
		...overrides,
	};
}

describe("matchesFilters", () => {
	it("matches everything without filters", () => {
		expect(matchesFilters(advertisement(), [])).toBe(true);
	});

	it("ANDs the fields of one filter", () => {
		expect(matchesFilters(advertisement(), [{ services: ["fff0"], namePrefix: "Band" }])).toBe(
			true,
		);
		expect(matchesFilters(advertisement(), [{ services: ["fff0"], namePrefix: "Scale" }])).toBe(
			false,
		);
	});

	it("ORs the filters of a list", () => {
		expect(matchesFilters(advertisement(), [{ name: "Scale" }, { services: [0x180f] }])).toBe(
			true,
		);
	});

	it("compares service UUIDs after normalization", () => {
		expect(
			matchesFilters(advertisement(), [{ services: ["0000FFF0-0000-1000-8000-00805F9B34FB"] }]),
		).toBe(true);
	});

	it("does not match a name filter against a nameless device", () => {
		const { name: _name, ...nameless } = advertisement();
		expect(matchesFilters(nameless, [{ namePrefix: "B" }])).toBe(false);
	});
});

describe("createScanner", () => {
	afterEach(() => {
		vi.useRealTimers();
		resetLogger();
	});

	it("yields each device once and updates it in place", async () => {
		const backend = setup();
		const scanner = createScanner(backend);
		const stream = await scanner.scan();
		const onUpdate = vi.fn();
		stream.onUpdate(onUpdate);

		backend.advertise(BAND);
		const first = await stream.next();
		backend.advertise(BAND, { rssi: -40 });

		expect(first.done).toBe(false);
		expect(stream.devices.size).toBe(1);
		expect(onUpdate).toHaveBeenCalledTimes(1);
		expect(onUpdate).toHaveBeenCalledWith(first.value);
		expect(first.value?.rssi).toBe(-40);
		await stream.stop();
	});

	it("applies filters per stream", async () => {
		const backend = setup();
		const scanner = createScanner(backend);
		const stream = await scanner.scan([{ services: ["181d"] }]);

		backend.advertise(BAND);
		backend.advertise(SCALE);

		const found = await stream.next();
		expect(found.value?.address).toBe(SCALE);
		expect([...stream.devices.keys()]).toEqual([SCALE]);
		await stream.stop();
	});

	it("offers a device again once a late name matches", async () => {
		const backend = setup();
		const scanner = createScanner(backend);
		const unnamed = "AA:BB:CC:DD:EE:03";
		backend.addDevice({ address: unnamed, serviceUuids: ["fff0"] });
		const stream = await scanner.scan([{ namePrefix: "Band" }]);

		backend.advertise(unnamed);
		expect(stream.devices.size).toBe(0);
		backend.advertise(unnamed, { name: "Band-03" });

		expect(stream.devices.get(unnamed)?.name).toBe("Band-03");
		await stream.stop();
	});

	it("shares one backend scan and seeds joiners with known devices", async () => {
		const backend = setup();
		const scanner = createScanner(backend);
		const [a, b] = await Promise.all([scanner.scan(), scanner.scan()]);
		backend.advertise(BAND);

		const late = await scanner.scan([{ name: "Band-01" }]);

		expect(backend.countCalls("startScan")).toBe(1);
		expect(late.devices.get(BAND)).toBe(a.devices.get(BAND));
		expect(b.devices.get(BAND)).toBe(a.devices.get(BAND));

		await a.stop();
		await b.stop();
		expect(scanner.scanning).toBe(true);
		await late.stop();
		expect(scanner.scanning).toBe(false);
		expect(backend.countCalls("stopScan")).toBe(1);
	});

	it("ends iteration after durationMs", async () => {
		vi.useFakeTimers();
		const backend = setup();
		const scanner = createScanner(backend);
		const stream = await scanner.scan([], { durationMs: 3000 });
		backend.advertise(BAND);

		const seen: string[] = [];
		const loop = (async () => {
			for await (const adv of stream) {
				seen.push(adv.address);
			}
		})();

		await vi.advanceTimersByTimeAsync(2999);
		expect(stream.active).toBe(true);
		await vi.advanceTimersByTimeAsync(1);
		await loop;

		expect(seen).toEqual([BAND]);
		expect(stream.active).toBe(false);
		expect(backend.scanning).toBe(false);
	});

	it("stops a stream when its signal aborts", async () => {
		const backend = setup();
		const scanner = createScanner(backend);
		const controller = new AbortController();
		const stream = await scanner.scan([], { signal: controller.signal });

		controller.abort();
		await stream.finished;

		expect(stream.active).toBe(false);
	});

	it("rejects an already aborted scan", async () => {
		const scanner = createScanner(setup());
		const controller = new AbortController();
		controller.abort(new CancelledError("not now"));

		await expect(scanner.scan([], { signal: controller.signal })).rejects.toThrow("not now");
	});

	it("releases the backend scan when aborted while it starts", async () => {
		const backend = setup();
		const scanner = createScanner(backend);
		const controller = new AbortController();

		const pending = scanner.scan([], { signal: controller.signal });
		controller.abort(new CancelledError("user left"));

		await expect(pending).rejects.toThrow("user left");
		expect(scanner.scanning).toBe(false);
		expect(backend.scanning).toBe(false);
		expect(backend.countCalls("stopScan")).toBe(1);
	});

	it("keeps the scan for a caller still joining when another aborts", async () => {
		const backend = setup();
		const scanner = createScanner(backend);
		const controller = new AbortController();

		const aborted = scanner.scan([], { signal: controller.signal });
		const kept = scanner.scan();
		controller.abort();

		await expect(aborted).rejects.toBeInstanceOf(CancelledError);
		const stream = await kept;
		expect(stream.active).toBe(true);
		expect(backend.scanning).toBe(true);
		expect(backend.countCalls("stopScan")).toBe(0);
		await stream.stop();
	});

	it("rejects an invalid duration", async () => {
		const scanner = createScanner(setup());

		await expect(scanner.scan([], { durationMs: 0 })).rejects.toThrow(
			"durationMs must be a positive number, got 0",
		);
		await expect(scanner.scan([], { durationMs: 2147483648 })).rejects.toThrow(
			"durationMs must not exceed 2147483647ms, got 2147483648",
		);
	});

	it("scans until stopped with an unbounded duration", async () => {
		vi.useFakeTimers();
		const backend = setup();
		const scanner = createScanner(backend);
		const stream = await scanner.scan([], { durationMs: Number.POSITIVE_INFINITY });

		await vi.advanceTimersByTimeAsync(60000);

		expect(stream.active).toBe(true);
		expect(backend.scanning).toBe(true);
		await stream.stop();
		expect(backend.scanning).toBe(false);
	});

	it("propagates a backend start failure", async () => {
		const scanner = createScanner(createMemoryBackend({ available: false }));

		await expect(scanner.scan()).rejects.toBeInstanceOf(AdapterUnavailableError);
		expect(scanner.scanning).toBe(false);
	});

	it("stops every stream when the adapter goes away", async () => {
		const backend = setup();
		const scanner = createScanner(backend);
		const stream = await scanner.scan();

		backend.setAvailable(false);
		await stream.finished;

		expect(scanner.scanning).toBe(false);
	});

	describe("findDevice", () => {
		it("resolves the first matching advertisement", async () => {
			const backend = setup();
			const scanner = createScanner(backend);

			const found = scanner.findDevice([{ namePrefix: "Scale" }]);
			await vi.waitFor(() => {
				expect(backend.scanning).toBe(true);
			});
			backend.advertise(BAND);
			backend.advertise(SCALE);

			await expect(found).resolves.toMatchObject({ address: SCALE, name: "Scale" });
			expect(backend.scanning).toBe(false);
		});

		it("rejects with DeviceUnreachableError when nothing matches in time", async () => {
			vi.useFakeTimers();
			const scanner = createScanner(setup());

			const found = scanner.findDevice([{ name: "Missing" }], { timeoutMs: 500 });
			const assertion = expect(found).rejects.toThrow(
				'No device matching [{"name":"Missing"}] found within 500ms',
			);
			await vi.advanceTimersByTimeAsync(0);
			await vi.advanceTimersByTimeAsync(500);

			await assertion;
			await expect(found).rejects.toBeInstanceOf(DeviceUnreachableError);
		});
	});
});
