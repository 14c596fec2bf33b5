import {
	AdapterUnavailableError,
	ConnectionLostError,
	DeviceUnreachableError,
	ProtocolError,
	raceWithAbort,
	throwIfAborted,
	UnsupportedError,
} from "../errors";
import { createEventEmitter } from "../state/event-emitter";
import type {
	Advertisement,
	BackendAdapter,
	BackendCallOptions,
	BackendConnectOptions,
	BackendEvents,
	CharacteristicProperties,
	CharacteristicRef,
	ConnectionHandle,
	DeviceAddress,
	ServiceDescriptor,
	WriteMode,
} from "../types";
import { type BytesLike, toBytes } from "../utils/bytes";
import { createScopedLogger } from "../utils/logger";
import { normalizeUuid } from "../utils/uuid";
import { NO_PROPERTIES } from "./properties";

const log = createScopedLogger("memory");

export type CharacteristicProperty = keyof CharacteristicProperties;

/** Delay before a simulated device answers: ms, or a promise to await. */
export type SimulatedDelay = number | Promise<void>;

export interface SimulatedCharacteristic {
	uuid: number | string;
	properties: CharacteristicProperty[];
	/** Initial value returned by reads */
	value?: BytesLike;
	/** Overrides the stored value on read */
	onRead?: () => BytesLike | Promise<BytesLike>;
	/**
	 * Device-side handling of a write. Awaited for `withResponse` writes
	 * only; `withoutResponse` writes resolve once accepted.
	 */
	onWrite?: (data: Uint8Array, mode: WriteMode) => void | Promise<void>;
	readDelay?: SimulatedDelay;
	writeDelay?: SimulatedDelay;
}

export interface SimulatedService {
	uuid: number | string;
	characteristics: SimulatedCharacteristic[];
}

/**
 * How the simulated device answers connection attempts.
 * - 'accept': connects
 * - 'silent': never answers; the attempt only ends on abort
 * - an Error: the attempt rejects with it
 */
export type ConnectBehavior = "accept" | "silent" | Error;

export interface SimulatedDevice {
	address: DeviceAddress;
	name?: string;
	rssi?: number;
	serviceUuids?: (number | string)[];
	manufacturerData?: BytesLike;
	txPower?: number;
	connectable?: boolean;
	services?: SimulatedService[];
	connect?: ConnectBehavior;
	connectDelay?: SimulatedDelay;
	discoverDelay?: SimulatedDelay;
}

export interface MemoryBackendOptions {
	/** Initial radio state (default: true) */
	available?: boolean;
	/** Advertise every registered device when a scan starts (default: true) */
	advertiseOnScan?: boolean;
}

export type BackendMethod =
	| "startScan"
	| "stopScan"
	| "connect"
	| "discoverServices"
	| "readCharacteristic"
	| "writeCharacteristic"
	| "subscribe"
	| "unsubscribe"
	| "disconnect";

export interface BackendCall {
	method: BackendMethod;
	address?: DeviceAddress;
	serviceUuid?: string;
	characteristicUuid?: string;
	data?: Uint8Array;
	mode?: WriteMode;
}

/**
 * In-process simulated radio. Devices are registered up front; tests drive
 * advertisements, notifications and link loss explicitly.
 *
 * @example
 * ```typescript
 * const backend = createMemoryBackend();
 * backend.addDevice({
 *   address: "AA:BB:CC:DD:EE:FF",
 *   name: "gForce-0001",
 *   services: [{
 *     uuid: "fff0",
 *     characteristics: [{ uuid: "fff4", properties: ["notify"] }],
 *   }],
 * });
 *
 * const client = createBleClient({ backend });
 * const session = await client.connect("AA:BB:CC:DD:EE:FF");
 * const stream = await session.subscribe("fff0", "fff4");
 * backend.notify("AA:BB:CC:DD:EE:FF", "fff0", "fff4", [0x01, 0x02]);
 * ```
 */
export interface MemoryBackend extends BackendAdapter {
	addDevice(device: SimulatedDevice): void;
	removeDevice(address: DeviceAddress): void;
	/** Changes how later connection attempts are answered. */
	setConnectBehavior(address: DeviceAddress, behavior: ConnectBehavior): void;
	/** Emits an advertisement while scanning; returns false otherwise. */
	advertise(address: DeviceAddress, overrides?: Partial<Advertisement>): boolean;
	/**
	 * Emits a value change on a subscribed characteristic of a connected
	 * device. Returns false when nobody is subscribed.
	 */
	notify(
		address: DeviceAddress,
		serviceUuid: number | string,
		characteristicUuid: number | string,
		value: BytesLike,
	): boolean;
	/** Simulates an unexpected link drop. Returns false when not connected. */
	dropConnection(address: DeviceAddress, error?: Error): boolean;
	/** Turns the radio on or off; off drops every connection. */
	setAvailable(available: boolean): void;
	/** Last value written to or read from a characteristic */
	getValue(
		address: DeviceAddress,
		serviceUuid: number | string,
		characteristicUuid: number | string,
	): Uint8Array | undefined;
	isConnected(address: DeviceAddress): boolean;
	readonly scanning: boolean;
	/** Every backend call, in order */
	readonly calls: readonly BackendCall[];
	countCalls(method: BackendMethod): number;
	clearCalls(): void;
}

interface CharacteristicState {
	readonly uuid: string;
	readonly properties: CharacteristicProperties;
	readonly spec: SimulatedCharacteristic;
	value: Uint8Array | undefined;
}

interface DeviceState {
	readonly spec: SimulatedDevice;
	readonly characteristics: Map<string, CharacteristicState>;
	readonly services: ServiceDescriptor[];
	connect: ConnectBehavior;
}

interface LiveConnection {
	readonly handle: ConnectionHandle;
	readonly device: DeviceState;
	readonly subscribed: Set<string>;
}

function toProperties(list: CharacteristicProperty[]): CharacteristicProperties {
	const properties = { ...NO_PROPERTIES };
	for (const property of list) {
		properties[property] = true;
	}
	return properties;
}

function charKey(serviceUuid: string, characteristicUuid: string): string {
	return `${serviceUuid}/${characteristicUuid}`;
}

async function wait(delay: SimulatedDelay | undefined, signal?: AbortSignal): Promise<void> {
	if (delay === undefined) return;
	const pending =
		typeof delay === "number"
			? new Promise<void>((resolve) => setTimeout(resolve, delay))
			: delay;
	await raceWithAbort(pending, signal);
}

function buildDevice(spec: SimulatedDevice): DeviceState {
	const characteristics = new Map<string, CharacteristicState>();
	const services: ServiceDescriptor[] = (spec.services ?? []).map((service) => {
		const serviceUuid = normalizeUuid(service.uuid);
		return {
			uuid: serviceUuid,
			characteristics: service.characteristics.map((c) => {
				const state: CharacteristicState = {
					uuid: normalizeUuid(c.uuid),
					properties: toProperties(c.properties),
					spec: c,
					value: c.value === undefined ? undefined : toBytes(c.value),
				};
				characteristics.set(charKey(serviceUuid, state.uuid), state);
				return { uuid: state.uuid, properties: { ...state.properties } };
			}),
		};
	});
	return { spec, characteristics, services, connect: spec.connect ?? "accept" };
}

export function createMemoryBackend(options: MemoryBackendOptions = {}): MemoryBackend {
	const { advertiseOnScan = true } = options;
	const events = createEventEmitter<BackendEvents>();
	const devices = new Map<DeviceAddress, DeviceState>();
	const connections = new Map<string, LiveConnection>();
	const calls: BackendCall[] = [];
	let available = options.available ?? true;
	let scanning = false;
	let nextConnectionId = 1;

	function record(call: BackendCall): void {
		calls.push(call);
	}

	function requireAvailable(): void {
		if (!available) {
			throw new AdapterUnavailableError("Simulated adapter is powered off");
		}
	}

	function liveConnection(handle: ConnectionHandle): LiveConnection {
		const live = connections.get(handle.id);
		if (!live) {
			throw new ConnectionLostError(`Connection ${handle.id} is not open`);
		}
		return live;
	}

	function connectionOf(address: DeviceAddress): LiveConnection | undefined {
		for (const live of connections.values()) {
			if (live.handle.address === address) return live;
		}
		return undefined;
	}

	function characteristic(live: LiveConnection, ref: CharacteristicRef): CharacteristicState {
		const state = live.device.characteristics.get(
			charKey(ref.serviceUuid, ref.characteristicUuid),
		);
		if (!state) {
			throw new ProtocolError(
				`Characteristic ${ref.characteristicUuid} not found in service ${ref.serviceUuid}`,
			);
		}
		return state;
	}

	function advertisementOf(device: DeviceState): Advertisement {
		const { spec } = device;
		return {
			address: spec.address,
			...(spec.name !== undefined && { name: spec.name }),
			rssi: spec.rssi ?? -60,
			serviceUuids: (spec.serviceUuids ?? []).map((uuid) => normalizeUuid(uuid)),
			manufacturerData: toBytes(spec.manufacturerData ?? []),
			...(spec.txPower !== undefined && { txPower: spec.txPower }),
			connectable: spec.connectable ?? true,
			timestamp: Date.now(),
		};
	}

	function advertise(address: DeviceAddress, overrides: Partial<Advertisement> = {}): boolean {
		const device = devices.get(address);
		if (!scanning || !device) return false;
		events.emit("advertisement", { ...advertisementOf(device), ...overrides, address });
		return true;
	}

	function drop(live: LiveConnection, error?: Error): void {
		connections.delete(live.handle.id);
		events.emit("disconnect", {
			handleId: live.handle.id,
			address: live.handle.address,
			...(error && { error: new ConnectionLostError(error.message, { cause: error }) }),
		});
	}

	const backend: MemoryBackend = {
		name: "memory",
		events,

		async getAvailability() {
			return available;
		},

		async startScan() {
			record({ method: "startScan" });
			requireAvailable();
			scanning = true;
			if (advertiseOnScan) {
				queueMicrotask(() => {
					for (const address of devices.keys()) {
						advertise(address);
					}
				});
			}
		},

		async stopScan() {
			record({ method: "stopScan" });
			scanning = false;
		},

		async connect(address: DeviceAddress, opts: BackendConnectOptions) {
			record({ method: "connect", address });
			requireAvailable();
			throwIfAborted(opts.signal);

			const device = devices.get(address);
			const behavior = device?.connect ?? "silent";
			if (behavior instanceof Error) {
				throw behavior;
			}
			if (behavior === "silent" || !device) {
				// Only an abort ends the attempt
				await raceWithAbort(new Promise<never>(() => {}), opts.signal);
				throw new DeviceUnreachableError(address);
			}
			await wait(device.spec.connectDelay, opts.signal);

			const existing = connectionOf(address);
			if (existing) {
				return existing.handle;
			}
			const handle: ConnectionHandle = { id: `${address}#${nextConnectionId++}`, address };
			connections.set(handle.id, { handle, device, subscribed: new Set() });
			log.debug(`connected ${handle.id}`);
			return handle;
		},

		async discoverServices(handle: ConnectionHandle, opts: BackendCallOptions = {}) {
			record({ method: "discoverServices", address: handle.address });
			const live = liveConnection(handle);
			await wait(live.device.spec.discoverDelay, opts.signal);
			liveConnection(handle);
			return live.device.services.map((service) => ({
				uuid: service.uuid,
				characteristics: service.characteristics.map((c) => ({
					uuid: c.uuid,
					properties: { ...c.properties },
				})),
			}));
		},

		async readCharacteristic(
			handle: ConnectionHandle,
			ref: CharacteristicRef,
			opts: BackendCallOptions = {},
		) {
			record({ method: "readCharacteristic", address: handle.address, ...ref });
			const live = liveConnection(handle);
			const state = characteristic(live, ref);
			if (!state.properties.read) {
				throw new UnsupportedError(`Characteristic ${state.uuid} does not support read`);
			}
			await wait(state.spec.readDelay, opts.signal);
			if (state.spec.onRead) {
				state.value = toBytes(await raceWithAbort(Promise.resolve(state.spec.onRead()), opts.signal));
			}
			liveConnection(handle);
			return state.value ? Uint8Array.from(state.value) : new Uint8Array(0);
		},

		async writeCharacteristic(
			handle: ConnectionHandle,
			ref: CharacteristicRef,
			data: Uint8Array,
			mode: WriteMode,
			opts: BackendCallOptions = {},
		) {
			const bytes = toBytes(data);
			record({ method: "writeCharacteristic", address: handle.address, ...ref, data: bytes, mode });
			const live = liveConnection(handle);
			const state = characteristic(live, ref);
			const supported =
				mode === "withResponse" ? state.properties.write : state.properties.writeWithoutResponse;
			if (!supported) {
				throw new UnsupportedError(`Characteristic ${state.uuid} does not support write ${mode}`);
			}
			state.value = bytes;

			const onWrite = state.spec.onWrite;
			if (mode === "withoutResponse") {
				// Accepted locally; the device side runs detached
				if (onWrite) {
					Promise.resolve()
						.then(() => onWrite(bytes, mode))
						.catch((error: unknown) => {
							log.warn(`device-side write handler failed for ${state.uuid}:`, error);
						});
				}
				return;
			}

			await wait(state.spec.writeDelay, opts.signal);
			if (onWrite) {
				await raceWithAbort(Promise.resolve(onWrite(bytes, mode)), opts.signal);
			}
			liveConnection(handle);
		},

		async subscribe(handle: ConnectionHandle, ref: CharacteristicRef) {
			record({ method: "subscribe", address: handle.address, ...ref });
			const live = liveConnection(handle);
			const state = characteristic(live, ref);
			if (!state.properties.notify && !state.properties.indicate) {
				throw new UnsupportedError(`Characteristic ${state.uuid} does not support notify`);
			}
			live.subscribed.add(charKey(ref.serviceUuid, ref.characteristicUuid));
		},

		async unsubscribe(handle: ConnectionHandle, ref: CharacteristicRef) {
			record({ method: "unsubscribe", address: handle.address, ...ref });
			const live = liveConnection(handle);
			live.subscribed.delete(charKey(ref.serviceUuid, ref.characteristicUuid));
		},

		async disconnect(handle: ConnectionHandle) {
			record({ method: "disconnect", address: handle.address });
			const live = connections.get(handle.id);
			if (live) {
				drop(live);
			}
		},

		async dispose() {
			scanning = false;
			connections.clear();
			events.removeAllListeners();
		},

		addDevice(device: SimulatedDevice) {
			devices.set(device.address, buildDevice(device));
		},

		removeDevice(address: DeviceAddress) {
			devices.delete(address);
		},

		setConnectBehavior(address: DeviceAddress, behavior: ConnectBehavior) {
			const device = devices.get(address);
			if (!device) {
				throw new Error(`Unknown simulated device ${address}`);
			}
			device.connect = behavior;
		},

		advertise,

		notify(address, serviceUuid, characteristicUuid, value) {
			const live = connectionOf(address);
			const service = normalizeUuid(serviceUuid);
			const char = normalizeUuid(characteristicUuid);
			const key = charKey(service, char);
			if (!live || !live.subscribed.has(key)) {
				return false;
			}
			const bytes = toBytes(value);
			const state = live.device.characteristics.get(key);
			if (state) {
				state.value = bytes;
			}
			events.emit("value", {
				handleId: live.handle.id,
				serviceUuid: service,
				characteristicUuid: char,
				value: Uint8Array.from(bytes),
			});
			return true;
		},

		dropConnection(address, error = new Error("Simulated link loss")) {
			const live = connectionOf(address);
			if (!live) return false;
			drop(live, error);
			return true;
		},

		setAvailable(value: boolean) {
			if (available === value) return;
			available = value;
			if (!value) {
				scanning = false;
				for (const live of [...connections.values()]) {
					drop(live, new AdapterUnavailableError("Simulated adapter powered off"));
				}
			}
			events.emit("availability", { available: value });
		},

		getValue(address, serviceUuid, characteristicUuid) {
			const state = devices
				.get(address)
				?.characteristics.get(charKey(normalizeUuid(serviceUuid), normalizeUuid(characteristicUuid)));
			return state?.value ? Uint8Array.from(state.value) : undefined;
		},

		isConnected(address) {
			return connectionOf(address) !== undefined;
		},

		get scanning() {
			return scanning;
		},

		get calls() {
			return calls;
		},

		countCalls(method: BackendMethod) {
			return calls.filter((call) => call.method === method).length;
		},

		clearCalls() {
			calls.length = 0;
		},
	};

	return backend;
}
