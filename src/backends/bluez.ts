import { createPoller } from "../async/poller";
import {
	AdapterUnavailableError,
	abortError,
	BleError,
	ConnectionLostError,
	DeviceUnreachableError,
	MAX_TIMEOUT_MS,
	normalizeError,
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
	CharacteristicDescriptor,
	CharacteristicRef,
	ConnectionHandle,
	DeviceAddress,
	ServiceDescriptor,
	WriteMode,
} from "../types";
import { normalizeAddress } from "../utils/address";
import { toBytes } from "../utils/bytes";
import { createScopedLogger } from "../utils/logger";
import { normalizeUuid } from "../utils/uuid";
import { propertiesFromFlags } from "./properties";

const log = createScopedLogger("bluez");

/** How often the BlueZ device list is polled while scanning */
export const DEFAULT_POLL_INTERVAL_MS = 1000;

// Structural view of the parts of node-ble this backend drives.

export type BluezValueListener = (value: Uint8Array) => void;

export interface BluezCharacteristicLike {
	getFlags(): Promise<string[]>;
	readValue(): Promise<Uint8Array>;
	writeValueWithResponse(value: Buffer): Promise<void>;
	writeValueWithoutResponse(value: Buffer): Promise<void>;
	startNotifications(): Promise<void>;
	stopNotifications(): Promise<void>;
	on(event: "valuechanged", listener: BluezValueListener): unknown;
	removeListener(event: "valuechanged", listener: BluezValueListener): unknown;
}

export interface BluezServiceLike {
	characteristics(): Promise<string[]>;
	getCharacteristic(uuid: string): Promise<BluezCharacteristicLike>;
}

export interface BluezGattServerLike {
	services(): Promise<string[]>;
	getPrimaryService(uuid: string): Promise<BluezServiceLike>;
}

export interface BluezDeviceLike {
	getName(): Promise<string>;
	getRSSI(): Promise<number | string>;
	getManufacturerData(): Promise<Record<string, unknown>>;
	getServiceData?(): Promise<Record<string, unknown>>;
	getTXPower?(): Promise<number | string>;
	/** D-Bus property access; node-ble has no getter for the advertised UUIDs */
	helper?: { prop(name: string): Promise<unknown> };
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	gatt(): Promise<BluezGattServerLike>;
	on(event: "disconnect", listener: () => void): unknown;
	removeListener(event: "disconnect", listener: () => void): unknown;
}

export interface BluezAdapterLike {
	isPowered(): Promise<boolean>;
	isDiscovering(): Promise<boolean>;
	startDiscovery(): Promise<void>;
	stopDiscovery(): Promise<void>;
	devices(): Promise<string[]>;
	getDevice(address: string): Promise<BluezDeviceLike>;
	waitDevice(address: string, timeoutMs?: number): Promise<BluezDeviceLike>;
}

/** What `createBluetooth()` returns */
export interface BluezStack {
	bluetooth: { defaultAdapter(): Promise<BluezAdapterLike> };
	destroy(): void;
}

export type BluezOperation =
	| "scan"
	| "connect"
	| "discover"
	| "read"
	| "write"
	| "subscribe"
	| "unsubscribe"
	| "disconnect";

function dbusErrorName(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "type" in error) {
		return typeof error.type === "string" ? error.type : undefined;
	}
	return undefined;
}

function dbusErrorText(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "text" in error) {
		return typeof error.text === "string" ? error.text : undefined;
	}
	return undefined;
}

/**
 * Maps a node-ble failure onto the library's error vocabulary by its D-Bus
 * error name (`org.bluez.Error.*`). Unrecognized errors become a
 * ProtocolError.
 */
export function mapBluezError(
	error: unknown,
	operation: BluezOperation,
	address?: DeviceAddress,
): BleError {
	if (error instanceof BleError) {
		return error;
	}
	const cause = normalizeError(error);
	const type = dbusErrorName(error);
	const text = dbusErrorText(error) ?? cause.message;
	const unreachable = () => new DeviceUnreachableError(address ?? "unknown", text, { cause });

	switch (type) {
		case "org.bluez.Error.NotReady":
		case "org.bluez.Error.NotAvailable":
		case "org.freedesktop.DBus.Error.ServiceUnknown":
		case "org.freedesktop.DBus.Error.AccessDenied":
			return new AdapterUnavailableError(`Bluetooth adapter unavailable: ${text}`, { cause });
		case "org.bluez.Error.NotConnected":
			return new ConnectionLostError(text, { cause });
		case "org.bluez.Error.NotPermitted":
		case "org.bluez.Error.NotSupported":
		case "org.bluez.Error.NotAuthorized":
			return new UnsupportedError(text, { cause });
		case "org.bluez.Error.InvalidArguments":
		case "org.bluez.Error.InvalidValueLength":
			return new ProtocolError(text, { cause });
		case "org.freedesktop.DBus.Error.NoReply":
		case "org.bluez.Error.DoesNotExist":
		case "org.freedesktop.DBus.Error.UnknownObject":
			return operation === "connect" ? unreachable() : new ConnectionLostError(text, { cause });
		case "org.bluez.Error.Failed":
		case "org.bluez.Error.InProgress":
			if (operation === "connect") {
				return unreachable();
			}
			if (/not connected|abort|disconnect/i.test(text)) {
				return new ConnectionLostError(text, { cause });
			}
			return new ProtocolError(`BlueZ ${operation} failed: ${text}`, { cause });
		default:
			if (operation === "connect" && /time(d)? ?out/i.test(text)) {
				return unreachable();
			}
			return new ProtocolError(`BlueZ ${operation} failed: ${text}`, { cause });
	}
}

function isFactory(value: unknown): value is () => unknown {
	return typeof value === "function";
}

function isBluezStack(value: unknown): value is BluezStack {
	if (typeof value !== "object" || value === null) return false;
	if (!("destroy" in value) || typeof value.destroy !== "function") return false;
	if (!("bluetooth" in value)) return false;
	const { bluetooth } = value;
	return (
		typeof bluetooth === "object" &&
		bluetooth !== null &&
		"defaultAdapter" in bluetooth &&
		typeof bluetooth.defaultAdapter === "function"
	);
}

function createBluetoothOf(mod: unknown): unknown {
	if (typeof mod !== "object" || mod === null) return undefined;
	if ("createBluetooth" in mod) return mod.createBluetooth;
	if ("default" in mod) return createBluetoothOf(mod.default);
	return undefined;
}

/** Loads node-ble and opens a connection to the system D-Bus. */
export async function importNodeBle(): Promise<BluezStack> {
	const mod: unknown = await import("node-ble");
	const createBluetooth = createBluetoothOf(mod);
	if (!isFactory(createBluetooth)) {
		throw new Error("node-ble did not export createBluetooth");
	}
	const stack = createBluetooth();
	if (!isBluezStack(stack)) {
		throw new Error("node-ble createBluetooth() returned an unexpected value");
	}
	return stack;
}

function unwrapVariant(value: unknown): unknown {
	if (typeof value === "object" && value !== null && "signature" in value && "value" in value) {
		return value.value;
	}
	return value;
}

function variantBytes(value: unknown): Uint8Array | undefined {
	const inner = unwrapVariant(value);
	if (inner instanceof Uint8Array) {
		return toBytes(inner);
	}
	if (Array.isArray(inner) && inner.every((byte): byte is number => typeof byte === "number")) {
		return toBytes(inner);
	}
	return undefined;
}

/**
 * Rebuilds raw manufacturer data (company identifier first, little-endian)
 * from BlueZ's `ManufacturerData` dictionary. Only the first entry is kept.
 */
export function manufacturerBytes(data: Record<string, unknown>): Uint8Array {
	for (const [key, value] of Object.entries(data)) {
		const companyId = Number(key);
		const bytes = variantBytes(value);
		if (!Number.isInteger(companyId) || !bytes) continue;
		const raw = new Uint8Array(bytes.length + 2);
		raw[0] = companyId & 0xff;
		raw[1] = (companyId >> 8) & 0xff;
		raw.set(bytes, 2);
		return raw;
	}
	return new Uint8Array(0);
}

/** Reads a D-Bus property that may be absent; BlueZ rejects reads of unset properties. */
function optional<T>(read: (() => Promise<T>) | undefined): Promise<T | undefined> {
	if (!read) return Promise.resolve(undefined);
	return read().then(
		(value) => value,
		() => undefined,
	);
}

function charKey(ref: CharacteristicRef): string {
	return `${ref.serviceUuid}/${ref.characteristicUuid}`;
}

export interface BluezBackendOptions {
	/** Supplies the node-ble stack; defaults to loading `node-ble` on first use */
	load?: () => Promise<BluezStack>;
	/** @default 1000 */
	pollIntervalMs?: number;
}

interface BluezLink {
	readonly handle: ConnectionHandle;
	readonly device: BluezDeviceLike;
	readonly gatt: BluezGattServerLike;
	readonly characteristics: Map<string, BluezCharacteristicLike>;
	readonly listeners: Map<string, BluezValueListener>;
	readonly onDisconnect: () => void;
	closing: boolean;
}

interface LoadedStack {
	readonly stack: BluezStack;
	readonly adapter: BluezAdapterLike;
}

/**
 * Backend for Linux through BlueZ over D-Bus (`node-ble`).
 *
 * BlueZ reports discovered devices as D-Bus objects rather than events, so
 * scanning polls the adapter's device list. Writes without response
 * resolve once BlueZ accepted the packet; there is no flow control signal.
 */
export function createBluezBackend(options: BluezBackendOptions = {}): BackendAdapter {
	const { load = importNodeBle, pollIntervalMs = DEFAULT_POLL_INTERVAL_MS } = options;
	const events = createEventEmitter<BackendEvents>();
	const links = new Map<string, BluezLink>();

	let loading: Promise<LoadedStack> | null = null;
	let powered: boolean | undefined;
	let userScanning = false;
	let lookups = 0;
	let discovering = false;
	let nextLinkId = 1;

	const poller = createPoller<BluezAdapterLike>(reportDevices, {
		intervalMs: pollIntervalMs,
		immediate: true,
		onError: (error) => log.warn("device poll failed:", error.message),
		onGiveUp: (error) => log.error("stopped reporting devices; restart the scan to resume:", error),
	});

	async function readAdvertisement(
		adapter: BluezAdapterLike,
		path: string,
	): Promise<Advertisement | undefined> {
		const device = await adapter.getDevice(path);
		const rssi = Number(await optional(() => device.getRSSI()));
		// BlueZ keeps devices it saw earlier; only those heard recently carry an RSSI
		if (!Number.isFinite(rssi)) return undefined;

		const { helper } = device;
		const [name, manufacturer, serviceData, txPower, uuids] = await Promise.all([
			optional(() => device.getName()),
			optional(() => device.getManufacturerData()),
			optional(device.getServiceData?.bind(device)),
			optional(device.getTXPower?.bind(device)),
			optional(helper && (() => helper.prop("UUIDs"))),
		]);

		const services = new Map<string, Uint8Array>();
		for (const [uuid, value] of Object.entries(serviceData ?? {})) {
			const bytes = variantBytes(value);
			if (bytes) services.set(normalizeUuid(uuid), bytes);
		}
		const advertisedUuids = unwrapVariant(uuids);
		const tx = Number(txPower);

		return {
			address: normalizeAddress(path),
			...(name ? { name } : {}),
			rssi,
			serviceUuids: Array.isArray(advertisedUuids)
				? advertisedUuids
						.filter((uuid): uuid is string => typeof uuid === "string")
						.map((uuid) => normalizeUuid(uuid))
				: [],
			manufacturerData: manufacturer ? manufacturerBytes(manufacturer) : new Uint8Array(0),
			...(services.size > 0 && { serviceData: services }),
			...(Number.isFinite(tx) && { txPower: tx }),
			connectable: true,
			timestamp: Date.now(),
		};
	}

	async function reportDevices(adapter: BluezAdapterLike): Promise<void> {
		for (const path of await adapter.devices()) {
			if (!userScanning) return;
			const advertisement = await readAdvertisement(adapter, path);
			if (advertisement && userScanning) {
				events.emit("advertisement", advertisement);
			}
		}
	}

	function ensureStack(): Promise<LoadedStack> {
		if (!loading) {
			loading = load()
				.then(async (stack) => {
					try {
						return { stack, adapter: await stack.bluetooth.defaultAdapter() };
					} catch (error) {
						stack.destroy();
						throw error;
					}
				})
				.catch((error: unknown) => {
					loading = null;
					throw new AdapterUnavailableError("Failed to open BlueZ through node-ble", {
						cause: error,
					});
				});
		}
		return loading;
	}

	function notePower(isPowered: boolean): void {
		if (powered !== undefined && powered !== isPowered) {
			events.emit("availability", { available: isPowered });
		}
		powered = isPowered;
	}

	async function ready(): Promise<BluezAdapterLike> {
		const { adapter } = await ensureStack();
		let isPowered: boolean;
		try {
			isPowered = await adapter.isPowered();
		} catch (error) {
			throw mapBluezError(error, "scan");
		}
		notePower(isPowered);
		if (!isPowered) {
			throw new AdapterUnavailableError("Bluetooth adapter is powered off");
		}
		return adapter;
	}

	async function syncDiscovery(adapter: BluezAdapterLike): Promise<void> {
		const wanted = userScanning || lookups > 0;
		if (wanted === discovering) return;
		discovering = wanted;
		try {
			if (!wanted) {
				await adapter.stopDiscovery();
			} else if (!(await adapter.isDiscovering())) {
				await adapter.startDiscovery();
			}
		} catch (error) {
			discovering = !wanted;
			throw mapBluezError(error, "scan");
		}
	}

	async function findDevice(
		adapter: BluezAdapterLike,
		address: DeviceAddress,
		timeoutMs: number,
		signal?: AbortSignal,
	): Promise<BluezDeviceLike> {
		const known = (await adapter.devices()).find((path) => normalizeAddress(path) === address);
		if (known !== undefined) {
			return adapter.getDevice(known);
		}

		log.debug(`discovering ${address} before connecting`);
		lookups++;
		try {
			await syncDiscovery(adapter);
			const waitMs = Number.isFinite(timeoutMs) ? timeoutMs : MAX_TIMEOUT_MS;
			return await raceWithAbort(adapter.waitDevice(address, waitMs), signal);
		} catch (error) {
			if (signal?.aborted || error instanceof BleError) throw error;
			throw new DeviceUnreachableError(
				address,
				`Device ${address} not found within ${timeoutMs}ms`,
				{ cause: error },
			);
		} finally {
			lookups--;
			await syncDiscovery(adapter).catch((error: unknown) => {
				log.warn(`failed to stop lookup discovery for ${address}:`, error);
			});
		}
	}

	function closeLink(link: BluezLink, adapterPowered = true): void {
		if (!links.delete(link.handle.id)) return;
		link.device.removeListener("disconnect", link.onDisconnect);
		for (const [key, listener] of link.listeners) {
			link.characteristics.get(key)?.removeListener("valuechanged", listener);
		}
		link.listeners.clear();

		const message = `Link to ${link.handle.address} lost`;
		const error = link.closing
			? undefined
			: adapterPowered
				? new ConnectionLostError(message)
				: new ConnectionLostError(message, {
						cause: new AdapterUnavailableError("Bluetooth adapter is powered off"),
					});
		log.debug(`closed ${link.handle.id}`);
		events.emit("disconnect", {
			handleId: link.handle.id,
			address: link.handle.address,
			...(error && { error }),
		});
	}

	function openLink(
		adapter: BluezAdapterLike,
		address: DeviceAddress,
		device: BluezDeviceLike,
		gatt: BluezGattServerLike,
	): ConnectionHandle {
		const handle: ConnectionHandle = { id: `${address}#${nextLinkId++}`, address };
		const link: BluezLink = {
			handle,
			device,
			gatt,
			characteristics: new Map(),
			listeners: new Map(),
			// The adapter state tells a link loss from the radio going away
			onDisconnect: () => {
				adapter.isPowered().then(
					(isPowered) => {
						notePower(isPowered);
						closeLink(link, isPowered);
					},
					(error: unknown) => {
						log.debug("adapter power query failed:", error);
						closeLink(link, false);
					},
				);
			},
			closing: false,
		};
		device.on("disconnect", link.onDisconnect);
		links.set(handle.id, link);
		log.debug(`connected ${handle.id}`);
		return handle;
	}

	function liveLink(handle: ConnectionHandle): BluezLink {
		const link = links.get(handle.id);
		if (!link) {
			throw new ConnectionLostError(`Connection ${handle.id} is not open`);
		}
		return link;
	}

	function characteristicOf(link: BluezLink, ref: CharacteristicRef): BluezCharacteristicLike {
		const characteristic = link.characteristics.get(charKey(ref));
		if (!characteristic) {
			throw new ProtocolError(
				`Characteristic ${ref.characteristicUuid} not found in service ${ref.serviceUuid}`,
			);
		}
		return characteristic;
	}

	function callError(
		error: unknown,
		operation: BluezOperation,
		link: BluezLink,
		signal?: AbortSignal,
	): BleError {
		if (signal?.aborted) {
			return abortError(signal);
		}
		if (!links.has(link.handle.id)) {
			return new ConnectionLostError(`Connection ${link.handle.id} closed during ${operation}`, {
				cause: error,
			});
		}
		return mapBluezError(error, operation, link.handle.address);
	}

	async function describeGatt(link: BluezLink): Promise<ServiceDescriptor[]> {
		link.characteristics.clear();
		const services: ServiceDescriptor[] = [];
		for (const serviceId of await link.gatt.services()) {
			const service = await link.gatt.getPrimaryService(serviceId);
			const serviceUuid = normalizeUuid(serviceId);
			const characteristics: CharacteristicDescriptor[] = [];
			for (const characteristicId of await service.characteristics()) {
				const characteristic = await service.getCharacteristic(characteristicId);
				const uuid = normalizeUuid(characteristicId);
				const flags = await characteristic.getFlags();
				link.characteristics.set(charKey({ serviceUuid, characteristicUuid: uuid }), characteristic);
				characteristics.push({ uuid, properties: propertiesFromFlags(flags) });
			}
			services.push({ uuid: serviceUuid, characteristics });
		}
		return services;
	}

	return {
		name: "bluez",
		events,

		async getAvailability() {
			try {
				await ready();
				return true;
			} catch (error) {
				log.debug("adapter unavailable:", error);
				return false;
			}
		},

		async startScan() {
			const adapter = await ready();
			userScanning = true;
			try {
				await syncDiscovery(adapter);
			} catch (error) {
				userScanning = false;
				throw error;
			}
			poller.start(adapter);
		},

		async stopScan() {
			userScanning = false;
			poller.stop();
			if (!loading) return;
			const { adapter } = await ensureStack();
			await syncDiscovery(adapter);
		},

		async connect(requested: DeviceAddress, { timeoutMs, signal }: BackendConnectOptions) {
			const address = normalizeAddress(requested);
			const adapter = await ready();
			throwIfAborted(signal);

			for (const link of links.values()) {
				if (link.handle.address === address && !link.closing) {
					return link.handle;
				}
			}

			let device: BluezDeviceLike;
			try {
				device = await findDevice(adapter, address, timeoutMs, signal);
			} catch (error) {
				throw mapBluezError(error, "connect", address);
			}

			const release = () => {
				device.disconnect().catch((error: unknown) => {
					log.debug(`releasing ${address} failed:`, error);
				});
			};
			signal?.addEventListener("abort", release, { once: true });
			try {
				await raceWithAbort(device.connect(), signal);
				const gatt = await raceWithAbort(device.gatt(), signal);
				return openLink(adapter, address, device, gatt);
			} catch (error) {
				if (signal?.aborted) {
					throw abortError(signal);
				}
				release();
				throw mapBluezError(error, "connect", address);
			} finally {
				signal?.removeEventListener("abort", release);
			}
		},

		async discoverServices(handle: ConnectionHandle, opts: BackendCallOptions = {}) {
			const link = liveLink(handle);
			try {
				const services = await raceWithAbort(describeGatt(link), opts.signal);
				liveLink(handle);
				return services;
			} catch (error) {
				throw callError(error, "discover", link, opts.signal);
			}
		},

		async readCharacteristic(
			handle: ConnectionHandle,
			ref: CharacteristicRef,
			opts: BackendCallOptions = {},
		) {
			const link = liveLink(handle);
			const characteristic = characteristicOf(link, ref);
			try {
				return toBytes(await raceWithAbort(characteristic.readValue(), opts.signal));
			} catch (error) {
				throw callError(error, "read", link, opts.signal);
			}
		},

		async writeCharacteristic(
			handle: ConnectionHandle,
			ref: CharacteristicRef,
			data: Uint8Array,
			mode: WriteMode,
			opts: BackendCallOptions = {},
		) {
			const link = liveLink(handle);
			const characteristic = characteristicOf(link, ref);
			const payload = Buffer.from(data);
			try {
				await raceWithAbort(
					mode === "withResponse"
						? characteristic.writeValueWithResponse(payload)
						: characteristic.writeValueWithoutResponse(payload),
					opts.signal,
				);
			} catch (error) {
				throw callError(error, "write", link, opts.signal);
			}
		},

		async subscribe(handle: ConnectionHandle, ref: CharacteristicRef, opts: BackendCallOptions = {}) {
			const link = liveLink(handle);
			const characteristic = characteristicOf(link, ref);
			const key = charKey(ref);
			let listener = link.listeners.get(key);
			if (!listener) {
				const onValue: BluezValueListener = (value) => {
					events.emit("value", {
						handleId: handle.id,
						serviceUuid: ref.serviceUuid,
						characteristicUuid: ref.characteristicUuid,
						value: toBytes(value),
					});
				};
				characteristic.on("valuechanged", onValue);
				link.listeners.set(key, onValue);
				listener = onValue;
			}
			try {
				await raceWithAbort(characteristic.startNotifications(), opts.signal);
			} catch (error) {
				characteristic.removeListener("valuechanged", listener);
				link.listeners.delete(key);
				throw callError(error, "subscribe", link, opts.signal);
			}
		},

		async unsubscribe(handle: ConnectionHandle, ref: CharacteristicRef, opts: BackendCallOptions = {}) {
			const link = liveLink(handle);
			const characteristic = characteristicOf(link, ref);
			const key = charKey(ref);
			const listener = link.listeners.get(key);
			if (listener) {
				characteristic.removeListener("valuechanged", listener);
				link.listeners.delete(key);
			}
			try {
				await raceWithAbort(characteristic.stopNotifications(), opts.signal);
			} catch (error) {
				throw callError(error, "unsubscribe", link, opts.signal);
			}
		},

		async disconnect(handle: ConnectionHandle) {
			const link = links.get(handle.id);
			if (!link) return;
			link.closing = true;
			try {
				await link.device.disconnect();
			} catch (error) {
				const mapped = mapBluezError(error, "disconnect", handle.address);
				// Already gone is what was asked for
				if (!(mapped instanceof ConnectionLostError)) {
					throw mapped;
				}
			} finally {
				closeLink(link);
			}
		},

		async dispose() {
			userScanning = false;
			poller.stop();
			for (const link of [...links.values()]) {
				link.closing = true;
				try {
					await link.device.disconnect();
				} catch (error) {
					log.warn(`failed to disconnect ${link.handle.id} on dispose:`, error);
				}
				closeLink(link);
			}
			if (loading) {
				const pending = loading;
				loading = null;
				try {
					const { stack, adapter } = await pending;
					if (discovering) {
						discovering = false;
						await adapter.stopDiscovery().catch((error: unknown) => {
							log.warn("failed to stop discovery on dispose:", error);
						});
					}
					stack.destroy();
				} catch (error) {
					log.debug("BlueZ stack was never opened:", error);
				}
			}
			events.removeAllListeners();
		},
	};
}
