import {
	DeviceUnreachableError,
	MAX_TIMEOUT_MS,
	normalizeError,
	throwIfAborted,
} from "../errors";
import { createEventEmitter } from "../state/event-emitter";
import type {
	Advertisement,
	BackendAdapter,
	DeviceAddress,
	ScanFilter,
} from "../types";
import { createScopedLogger } from "../utils/logger";
import { normalizeUuid } from "../utils/uuid";

const log = createScopedLogger("scanner");

/** Default time `findDevice()` scans before giving up, in milliseconds */
export const DEFAULT_FIND_TIMEOUT_MS = 10000;

export interface ScanOptions {
	/** Stops this stream after the given time; Infinity scans until stopped */
	durationMs?: number | undefined;
	/** Stops this stream when aborted */
	signal?: AbortSignal | undefined;
}

export interface FindDeviceOptions {
	/** @default 10000 */
	timeoutMs?: number | undefined;
	signal?: AbortSignal | undefined;
}

/**
 * Devices found by one `scan()` call.
 *
 * Iteration yields each matching address once, as the shared Advertisement
 * object; repeat sightings update that object in place and fire
 * `onUpdate`. Iteration ends when the stream stops.
 *
 * @example
 * ```typescript
 * const stream = await scanner.scan([{ namePrefix: "gForce" }], { durationMs: 5000 });
 * stream.onUpdate((adv) => console.log(adv.address, adv.rssi));
 *
 * for await (const adv of stream) {
 *   console.log("found", adv.name, adv.address);
 * }
 * console.log(`${stream.devices.size} devices`);
 * ```
 */
export interface ScanStream extends AsyncIterable<Advertisement> {
	readonly devices: ReadonlyMap<DeviceAddress, Advertisement>;
	next(): Promise<IteratorResult<Advertisement, undefined>>;
	onUpdate(callback: (advertisement: Advertisement) => void): () => void;
	/** Stops this stream. The backend scan stops with the last stream. */
	stop(): Promise<void>;
	readonly active: boolean;
	/** Resolves once the stream has stopped */
	readonly finished: Promise<void>;
}

export interface Scanner {
	/**
	 * Starts a scan stream. Concurrent calls share one backend scan; a
	 * stream joining a running scan first receives the matching devices
	 * already seen.
	 */
	scan(filters?: readonly ScanFilter[], options?: ScanOptions): Promise<ScanStream>;
	/**
	 * Scans until the first matching device shows up.
	 * @throws DeviceUnreachableError when none does within the timeout
	 */
	findDevice(
		filters: readonly ScanFilter[],
		options?: FindDeviceOptions,
	): Promise<Advertisement>;
	/** True while a backend scan is running */
	readonly scanning: boolean;
	/** Stops every stream and the backend scan. */
	stopAll(): Promise<void>;
}

interface CompiledFilter {
	services: string[];
	namePrefix?: string | undefined;
	name?: string | undefined;
}

function compileFilters(filters: readonly ScanFilter[]): CompiledFilter[] {
	return filters.map((filter) => ({
		services: (filter.services ?? []).map((uuid) => normalizeUuid(uuid)),
		namePrefix: filter.namePrefix,
		name: filter.name,
	}));
}

/**
 * True when any filter matches. Fields inside one filter must all match;
 * an empty filter list matches every advertisement.
 */
export function matchesFilters(
	advertisement: Advertisement,
	filters: readonly ScanFilter[],
): boolean {
	return matchesCompiled(advertisement, compileFilters(filters));
}

function matchesCompiled(adv: Advertisement, filters: CompiledFilter[]): boolean {
	if (filters.length === 0) return true;
	return filters.some(
		(filter) =>
			filter.services.every((uuid) => adv.serviceUuids.includes(uuid)) &&
			(filter.namePrefix === undefined ||
				(adv.name?.startsWith(filter.namePrefix) ?? false)) &&
			(filter.name === undefined || adv.name === filter.name),
	);
}

function describeFilters(filters: readonly ScanFilter[]): string {
	return filters.length === 0 ? "any device" : JSON.stringify(filters);
}

/** Folds a repeat sighting into the entry already handed out. */
function mergeInto(target: Advertisement, update: Advertisement): void {
	target.rssi = update.rssi;
	target.timestamp = update.timestamp;
	if (update.name !== undefined) {
		target.name = update.name;
	}
	for (const uuid of update.serviceUuids) {
		if (!target.serviceUuids.includes(uuid)) {
			target.serviceUuids.push(uuid);
		}
	}
	if (update.manufacturerData.length > 0) {
		target.manufacturerData = update.manufacturerData;
	}
	if (update.serviceData) {
		const merged = target.serviceData ?? new Map<string, Uint8Array>();
		for (const [uuid, data] of update.serviceData) {
			merged.set(uuid, data);
		}
		target.serviceData = merged;
	}
	if (update.txPower !== undefined) {
		target.txPower = update.txPower;
	}
	if (update.connectable !== undefined) {
		target.connectable = update.connectable;
	}
}

function copyAdvertisement(adv: Advertisement): Advertisement {
	return {
		...adv,
		serviceUuids: [...adv.serviceUuids],
		...(adv.serviceData && { serviceData: new Map(adv.serviceData) }),
	};
}

type StreamEvents = {
	update: Advertisement;
};

interface StreamState {
	readonly stream: ScanStream;
	/** Adds a new entry when it matches the stream's filters. */
	offer(adv: Advertisement): void;
	/** Called on in-place updates of an entry already offered. */
	update(adv: Advertisement): void;
	end(): void;
}

export interface ScannerOptions {
	/** Name used in log messages */
	name?: string;
}

/**
 * Creates the scanner of one backend. The backend scan is always started
 * unfiltered; filters are applied per stream.
 */
export function createScanner(
	backend: BackendAdapter,
	options: ScannerOptions = {},
): Scanner {
	const { name = backend.name } = options;
	const streams = new Set<StreamState>();
	/** Entries seen during the current backend scan */
	const seen = new Map<DeviceAddress, Advertisement>();

	let starting: Promise<void> | null = null;
	let running = false;
	/** `scan()` calls waiting for the backend scan to start */
	let joining = 0;
	let stopping: Promise<void> = Promise.resolve();
	let detach: (() => void) | null = null;

	function onAdvertisement(adv: Advertisement): void {
		const existing = seen.get(adv.address);
		if (existing) {
			mergeInto(existing, adv);
			for (const state of [...streams]) {
				state.update(existing);
			}
			return;
		}
		const entry = copyAdvertisement(adv);
		seen.set(entry.address, entry);
		for (const state of [...streams]) {
			state.offer(entry);
		}
	}

	function ensureScanning(): Promise<void> {
		if (running) return Promise.resolve();
		if (starting) return starting;

		const start = stopping.then(async () => {
			const offAdvertisement = backend.events.on("advertisement", onAdvertisement);
			const offAvailability = backend.events.on("availability", ({ available }) => {
				if (!available && running) {
					log.warn(`${name}: adapter became unavailable, stopping scan`);
					stopAll().catch((error: unknown) => {
						log.error(`${name}: stopping scan failed:`, error);
					});
				}
			});
			const off = () => {
				offAdvertisement();
				offAvailability();
			};
			detach = off;
			try {
				await backend.startScan();
				running = true;
				log.debug(`${name}: backend scan started`);
			} catch (error) {
				off();
				detach = null;
				throw normalizeError(error);
			}
		});
		starting = start;
		start.then(
			() => {
				starting = null;
			},
			() => {
				starting = null;
			},
		);
		return start;
	}

	function stopBackendScan(): Promise<void> {
		if (!running) return stopping;
		running = false;
		detach?.();
		detach = null;
		seen.clear();
		stopping = backend.stopScan().then(
			() => {
				log.debug(`${name}: backend scan stopped`);
			},
			(error: unknown) => {
				log.warn(`${name}: stopping backend scan failed:`, error);
			},
		);
		return stopping;
	}

	function createStream(filters: CompiledFilter[], opts: ScanOptions): StreamState {
		const events = createEventEmitter<StreamEvents>();
		const devices = new Map<DeviceAddress, Advertisement>();
		const pending: Advertisement[] = [];
		const waiters: Array<(result: IteratorResult<Advertisement, undefined>) => void> = [];
		let active = true;
		let timer: ReturnType<typeof setTimeout> | undefined;
		let resolveFinished: () => void = () => {};
		const finished = new Promise<void>((resolve) => {
			resolveFinished = resolve;
		});

		const onAbort = () => {
			stop().catch((error: unknown) => {
				log.error(`${name}: stopping scan stream failed:`, error);
			});
		};

		function offer(adv: Advertisement): void {
			if (!active || devices.has(adv.address) || !matchesCompiled(adv, filters)) {
				return;
			}
			devices.set(adv.address, adv);
			const waiter = waiters.shift();
			if (waiter) {
				waiter({ done: false, value: adv });
			} else {
				pending.push(adv);
			}
		}

		function update(adv: Advertisement): void {
			if (!active) return;
			if (devices.get(adv.address) === adv) {
				events.emit("update", adv);
			} else {
				// A scan response may complete a name the filters ask for
				offer(adv);
			}
		}

		function end(): void {
			if (!active) return;
			active = false;
			if (timer !== undefined) clearTimeout(timer);
			opts.signal?.removeEventListener("abort", onAbort);
			for (const waiter of waiters.splice(0)) {
				waiter({ done: true, value: undefined });
			}
			events.removeAllListeners();
			resolveFinished();
		}

		function next(): Promise<IteratorResult<Advertisement, undefined>> {
			const adv = pending.shift();
			if (adv) {
				return Promise.resolve({ done: false, value: adv });
			}
			if (!active) {
				return Promise.resolve({ done: true, value: undefined });
			}
			return new Promise((resolve) => {
				waiters.push(resolve);
			});
		}

		async function stop(): Promise<void> {
			if (!active) return;
			streams.delete(state);
			end();
			if (streams.size === 0) {
				await stopBackendScan();
			}
		}

		const stream: ScanStream = {
			devices,
			next,
			onUpdate: (callback) => events.on("update", callback),
			stop,
			get active() {
				return active;
			},
			finished,
			[Symbol.asyncIterator]() {
				return {
					next,
					return: async () => {
						await stop();
						return { done: true, value: undefined };
					},
				};
			},
		};

		const state: StreamState = { stream, offer, update, end };

		if (opts.durationMs !== undefined && Number.isFinite(opts.durationMs)) {
			timer = setTimeout(onAbort, opts.durationMs);
		}
		opts.signal?.addEventListener("abort", onAbort, { once: true });

		return state;
	}

	async function scan(
		filters: readonly ScanFilter[] = [],
		opts: ScanOptions = {},
	): Promise<ScanStream> {
		const { durationMs } = opts;
		if (durationMs !== undefined && !(durationMs > 0)) {
			throw new RangeError(`durationMs must be a positive number, got ${durationMs}`);
		}
		if (durationMs !== undefined && Number.isFinite(durationMs) && durationMs > MAX_TIMEOUT_MS) {
			throw new RangeError(`durationMs must not exceed ${MAX_TIMEOUT_MS}ms, got ${durationMs}`);
		}
		const compiled = compileFilters(filters);
		throwIfAborted(opts.signal);

		joining++;
		try {
			// A stop may race the start; the scan must be running when we join
			do {
				await ensureScanning();
			} while (!running);
		} finally {
			joining--;
		}

		if (opts.signal?.aborted) {
			// Aborted while the scan started
			if (streams.size === 0 && joining === 0) {
				await stopBackendScan();
			}
			throwIfAborted(opts.signal);
		}

		const state = createStream(compiled, opts);
		streams.add(state);
		for (const adv of seen.values()) {
			state.offer(adv);
		}
		return state.stream;
	}

	async function findDevice(
		filters: readonly ScanFilter[],
		opts: FindDeviceOptions = {},
	): Promise<Advertisement> {
		const { timeoutMs = DEFAULT_FIND_TIMEOUT_MS, signal } = opts;
		const stream = await scan(filters, { durationMs: timeoutMs, signal });
		try {
			const first = await stream.next();
			if (!first.done) {
				return first.value;
			}
			throwIfAborted(signal);
			throw new DeviceUnreachableError(
				describeFilters(filters),
				`No device matching ${describeFilters(filters)} found within ${timeoutMs}ms`,
			);
		} finally {
			await stream.stop();
		}
	}

	async function stopAll(): Promise<void> {
		for (const state of [...streams]) {
			state.end();
		}
		streams.clear();
		await stopBackendScan();
	}

	return {
		scan,
		findDevice,
		get scanning() {
			return running;
		},
		stopAll,
	};
}
