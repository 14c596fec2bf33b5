import {
	AdapterUnavailableError,
	abortError,
	BleError,
	CancelledError,
	ConnectionLostError,
	DeviceUnreachableError,
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

const log = createScopedLogger("noble");

/** How long to wait for noble to report a settled radio state */
export const DEFAULT_STATE_TIMEOUT_MS = 5000;

// Structural view of the parts of @stoprocent/noble this backend drives.

export interface NobleAdvertisementLike {
	localName?: string | undefined;
	serviceUuids?: string[] | undefined;
	manufacturerData?: Uint8Array | undefined;
	serviceData?: { uuid: string; data: Uint8Array }[] | undefined;
	txPowerLevel?: number | undefined;
}

export type NobleDataListener = (data: Uint8Array, isNotification?: boolean) => void;

export interface NobleCharacteristicLike {
	readonly uuid: string;
	readonly properties: readonly string[];
	readAsync(): Promise<Uint8Array>;
	writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
	subscribeAsync(): Promise<void>;
	unsubscribeAsync(): Promise<void>;
	on(event: "data", listener: NobleDataListener): unknown;
	removeListener(event: "data", listener: NobleDataListener): unknown;
}

export interface NobleServiceLike {
	readonly uuid: string;
	readonly characteristics: readonly NobleCharacteristicLike[];
}

export type NobleDisconnectListener = (reason?: unknown) => void;

export interface NoblePeripheralLike {
	readonly id: string;
	readonly address: string;
	readonly rssi: number;
	readonly connectable?: boolean | undefined;
	readonly advertisement: NobleAdvertisementLike;
	connectAsync(): Promise<void>;
	disconnectAsync(): Promise<void>;
	cancelConnect?(): void;
	discoverAllServicesAndCharacteristicsAsync(): Promise<{
		services: readonly NobleServiceLike[];
	}>;
	once(event: "disconnect", listener: NobleDisconnectListener): unknown;
	removeListener(event: "disconnect", listener: NobleDisconnectListener): unknown;
}

export type NobleDiscoverListener = (peripheral: NoblePeripheralLike) => void;
export type NobleStateListener = (state: string) => void;

export interface NobleLike {
	readonly state: string;
	startScanningAsync(serviceUuids?: string[], allowDuplicates?: boolean): Promise<void>;
	stopScanningAsync(): Promise<void>;
	on(event: "discover", listener: NobleDiscoverListener): unknown;
	on(event: "stateChange", listener: NobleStateListener): unknown;
	removeListener(event: "discover", listener: NobleDiscoverListener): unknown;
	removeListener(event: "stateChange", listener: NobleStateListener): unknown;
}

export type NobleOperation =
	| "scan"
	| "connect"
	| "discover"
	| "read"
	| "write"
	| "subscribe"
	| "unsubscribe"
	| "disconnect";

const ADAPTER_PATTERN =
	/powered ?off|unauthorized|not powered|no compatible|libusb|eacces|permission denied|adapter/i;
const CANCEL_PATTERN = /cancel|abort/i;
const UNSUPPORTED_PATTERN = /not supported|unsupported|not permitted|not allowed/i;
const LINK_PATTERN =
	/not connected|disconnected|connection (lost|terminated|closed)|reset by peer|link loss/i;
const UNREACHABLE_PATTERN =
	/time(d)? ?out|not found|unknown peripheral|unreachable|failed to connect|connection (failed|refused)/i;

/**
 * Maps a noble failure onto the library's error vocabulary. noble reports
 * errors as plain `Error`s (sometimes bare strings), so classification
 * goes by message. Anything unrecognized becomes a ProtocolError.
 */
export function mapNobleError(
	error: unknown,
	operation: NobleOperation,
	address?: DeviceAddress,
): BleError {
	if (error instanceof BleError) {
		return error;
	}
	const cause = normalizeError(error);
	const message = cause.message;

	if (ADAPTER_PATTERN.test(message)) {
		return new AdapterUnavailableError(`Bluetooth adapter unavailable: ${message}`, { cause });
	}
	if (CANCEL_PATTERN.test(message)) {
		return new CancelledError(message, { cause });
	}
	if (UNSUPPORTED_PATTERN.test(message)) {
		return new UnsupportedError(message, { cause });
	}
	if (LINK_PATTERN.test(message)) {
		return new ConnectionLostError(message, { cause });
	}
	if (operation === "connect" && UNREACHABLE_PATTERN.test(message)) {
		return new DeviceUnreachableError(address ?? "unknown", message, { cause });
	}
	return new ProtocolError(`noble ${operation} failed: ${message}`, { cause });
}

function isNobleLike(value: unknown): value is NobleLike {
	return (
		typeof value === "object" &&
		value !== null &&
		"startScanningAsync" in value &&
		typeof value.startScanningAsync === "function" &&
		"on" in value &&
		typeof value.on === "function" &&
		"removeListener" in value &&
		typeof value.removeListener === "function"
	);
}

/** Loads `@stoprocent/noble`, which opens the radio as a side effect of importing it. */
export async function importNoble(): Promise<NobleLike> {
	const mod: unknown = await import("@stoprocent/noble");
	const candidate =
		typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;
	if (!isNobleLike(candidate)) {
		throw new Error("@stoprocent/noble did not export a noble instance");
	}
	return candidate;
}

/**
 * The address noble peripherals are tracked by: the MAC where the platform
 * reveals it, else the peripheral id (CoreBluetooth).
 */
export function peripheralAddress(peripheral: NoblePeripheralLike): DeviceAddress {
	const { address } = peripheral;
	if (address && address !== "unknown") {
		return normalizeAddress(address);
	}
	return peripheral.id;
}

function toAdvertisement(address: DeviceAddress, peripheral: NoblePeripheralLike): Advertisement {
	const adv = peripheral.advertisement;
	const serviceData = new Map<string, Uint8Array>();
	for (const entry of adv.serviceData ?? []) {
		serviceData.set(normalizeUuid(entry.uuid), toBytes(entry.data));
	}
	return {
		address,
		...(adv.localName ? { name: adv.localName } : {}),
		rssi: peripheral.rssi,
		serviceUuids: (adv.serviceUuids ?? []).map((uuid) => normalizeUuid(uuid)),
		manufacturerData: adv.manufacturerData ? toBytes(adv.manufacturerData) : new Uint8Array(0),
		...(serviceData.size > 0 && { serviceData }),
		...(adv.txPowerLevel !== undefined && { txPower: adv.txPowerLevel }),
		...(peripheral.connectable !== undefined && { connectable: peripheral.connectable }),
		timestamp: Date.now(),
	};
}

function charKey(ref: CharacteristicRef): string {
	return `${ref.serviceUuid}/${ref.characteristicUuid}`;
}

export interface NobleBackendOptions {
	/** Supplies the noble instance; defaults to loading `@stoprocent/noble` on first use */
	load?: () => Promise<NobleLike>;
	/** @default 5000 */
	stateTimeoutMs?: number;
}

interface NobleLink {
	readonly handle: ConnectionHandle;
	readonly peripheral: NoblePeripheralLike;
	readonly characteristics: Map<string, NobleCharacteristicLike>;
	readonly listeners: Map<string, NobleDataListener>;
	readonly onDisconnect: NobleDisconnectListener;
	closing: boolean;
}

interface PeripheralWait {
	readonly found: Promise<NoblePeripheralLike>;
	cancel(): void;
}

/**
 * Backend for Windows (WinRT), macOS (CoreBluetooth) and Linux HCI sockets
 * through `@stoprocent/noble`.
 *
 * noble can only connect to peripherals it has seen advertise, so
 * connecting to an address that was not scanned first runs a short
 * lookup scan bounded by the connect timeout.
 *
 * Writes without response resolve once noble handed the packet to the
 * stack; noble exposes no flow control.
 */
export function createNobleBackend(options: NobleBackendOptions = {}): BackendAdapter {
	const { load = importNoble, stateTimeoutMs = DEFAULT_STATE_TIMEOUT_MS } = options;
	const events = createEventEmitter<BackendEvents>();
	const peripherals = new Map<DeviceAddress, NoblePeripheralLike>();
	const waiters = new Map<DeviceAddress, Set<(peripheral: NoblePeripheralLike) => void>>();
	const links = new Map<string, NobleLink>();

	let loading: Promise<NobleLike> | null = null;
	let attached: NobleLike | null = null;
	let userScanning = false;
	let lookups = 0;
	let radioScanning = false;
	let nextLinkId = 1;

	function onDiscover(peripheral: NoblePeripheralLike): void {
		const address = peripheralAddress(peripheral);
		peripherals.set(address, peripheral);

		const waiting = waiters.get(address);
		if (waiting) {
			waiters.delete(address);
			for (const resolve of waiting) {
				resolve(peripheral);
			}
		}

		if (!userScanning) return;
		try {
			events.emit("advertisement", toAdvertisement(address, peripheral));
		} catch (error) {
			log.warn(`dropped malformed advertisement from ${address}:`, error);
		}
	}

	function onStateChange(state: string): void {
		log.debug(`radio state ${state}`);
		if (state !== "poweredOn") {
			radioScanning = false;
		}
		events.emit("availability", { available: state === "poweredOn" });
	}

	function ensureNoble(): Promise<NobleLike> {
		if (!loading) {
			loading = load().then(
				(noble) => {
					attached = noble;
					noble.on("discover", onDiscover);
					noble.on("stateChange", onStateChange);
					return noble;
				},
				(error: unknown) => {
					loading = null;
					throw new AdapterUnavailableError("Failed to load @stoprocent/noble", {
						cause: error,
					});
				},
			);
		}
		return loading;
	}

	function settledState(noble: NobleLike): Promise<string> {
		const pending = (state: string) => state === "unknown" || state === "resetting";
		if (!pending(noble.state)) {
			return Promise.resolve(noble.state);
		}
		return new Promise((resolve) => {
			const onChange = (state: string) => {
				if (pending(state)) return;
				clearTimeout(timer);
				noble.removeListener("stateChange", onChange);
				resolve(state);
			};
			const timer = setTimeout(() => {
				noble.removeListener("stateChange", onChange);
				resolve(noble.state);
			}, stateTimeoutMs);
			noble.on("stateChange", onChange);
		});
	}

	async function ready(): Promise<NobleLike> {
		const noble = await ensureNoble();
		const state = await settledState(noble);
		if (state !== "poweredOn") {
			throw new AdapterUnavailableError(`Bluetooth adapter is ${state}`);
		}
		return noble;
	}

	async function syncRadioScan(noble: NobleLike): Promise<void> {
		const wanted = userScanning || lookups > 0;
		if (wanted === radioScanning) return;
		radioScanning = wanted;
		try {
			if (wanted) {
				await noble.startScanningAsync([], true);
			} else {
				await noble.stopScanningAsync();
			}
		} catch (error) {
			radioScanning = !wanted;
			throw mapNobleError(error, "scan");
		}
	}

	function waitForPeripheral(address: DeviceAddress, timeoutMs: number): PeripheralWait {
		const waiting = waiters.get(address) ?? new Set();
		waiters.set(address, waiting);
		let settle: (peripheral: NoblePeripheralLike) => void = () => {};
		let timer: ReturnType<typeof setTimeout> | undefined;
		const found = new Promise<NoblePeripheralLike>((resolve, reject) => {
			settle = resolve;
			if (!Number.isFinite(timeoutMs)) return;
			timer = setTimeout(() => {
				reject(
					new DeviceUnreachableError(
						address,
						`Device ${address} not found within ${timeoutMs}ms`,
					),
				);
			}, timeoutMs);
		});
		waiting.add(settle);
		return {
			found,
			cancel() {
				clearTimeout(timer);
				waiting.delete(settle);
				if (waiting.size === 0 && waiters.get(address) === waiting) {
					waiters.delete(address);
				}
			},
		};
	}

	async function findPeripheral(
		noble: NobleLike,
		address: DeviceAddress,
		timeoutMs: number,
		signal?: AbortSignal,
	): Promise<NoblePeripheralLike> {
		const known = peripherals.get(address);
		if (known) return known;

		log.debug(`scanning for ${address} before connecting`);
		const wait = waitForPeripheral(address, timeoutMs);
		lookups++;
		try {
			await syncRadioScan(noble);
			return await raceWithAbort(wait.found, signal);
		} finally {
			wait.cancel();
			lookups--;
			await syncRadioScan(noble).catch((error: unknown) => {
				log.warn(`failed to stop lookup scan for ${address}:`, error);
			});
		}
	}

	function lostError(link: NobleLink, reason: unknown): ConnectionLostError {
		const detail = reason === undefined ? "" : ` (reason ${String(reason)})`;
		const message = `Link to ${link.handle.address} lost${detail}`;
		if (attached && attached.state !== "poweredOn") {
			return new ConnectionLostError(message, {
				cause: new AdapterUnavailableError(`Bluetooth adapter is ${attached.state}`),
			});
		}
		return new ConnectionLostError(message);
	}

	function closeLink(link: NobleLink, reason?: unknown): void {
		if (!links.delete(link.handle.id)) return;
		link.peripheral.removeListener("disconnect", link.onDisconnect);
		for (const [key, listener] of link.listeners) {
			link.characteristics.get(key)?.removeListener("data", listener);
		}
		link.listeners.clear();

		const error = link.closing ? undefined : lostError(link, reason);
		log.debug(`closed ${link.handle.id}`);
		events.emit("disconnect", {
			handleId: link.handle.id,
			address: link.handle.address,
			...(error && { error }),
		});
	}

	function openLink(address: DeviceAddress, peripheral: NoblePeripheralLike): ConnectionHandle {
		const handle: ConnectionHandle = { id: `${address}#${nextLinkId++}`, address };
		const link: NobleLink = {
			handle,
			peripheral,
			characteristics: new Map(),
			listeners: new Map(),
			onDisconnect: (reason) => closeLink(link, reason),
			closing: false,
		};
		peripheral.once("disconnect", link.onDisconnect);
		links.set(handle.id, link);
		log.debug(`connected ${handle.id}`);
		return handle;
	}

	function liveLink(handle: ConnectionHandle): NobleLink {
		const link = links.get(handle.id);
		if (!link) {
			throw new ConnectionLostError(`Connection ${handle.id} is not open`);
		}
		return link;
	}

	function characteristicOf(link: NobleLink, ref: CharacteristicRef): NobleCharacteristicLike {
		const characteristic = link.characteristics.get(charKey(ref));
		if (!characteristic) {
			throw new ProtocolError(
				`Characteristic ${ref.characteristicUuid} not found in service ${ref.serviceUuid}`,
			);
		}
		return characteristic;
	}

	/** Maps a GATT call failure, preferring abort and link loss over the native message. */
	function callError(
		error: unknown,
		operation: NobleOperation,
		link: NobleLink,
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
		return mapNobleError(error, operation, link.handle.address);
	}

	return {
		name: "noble",
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
			const noble = await ready();
			userScanning = true;
			try {
				await syncRadioScan(noble);
			} catch (error) {
				userScanning = false;
				throw error;
			}
		},

		async stopScan() {
			userScanning = false;
			if (!loading) return;
			await syncRadioScan(await ensureNoble());
		},

		async connect(requested: DeviceAddress, { timeoutMs, signal }: BackendConnectOptions) {
			const address = normalizeAddress(requested);
			const noble = await ready();
			throwIfAborted(signal);

			for (const link of links.values()) {
				if (link.handle.address === address && !link.closing) {
					return link.handle;
				}
			}

			const peripheral = await findPeripheral(noble, address, timeoutMs, signal);
			const cancel = () => {
				peripheral.cancelConnect?.();
			};
			signal?.addEventListener("abort", cancel, { once: true });
			const attempt = peripheral.connectAsync();
			try {
				await raceWithAbort(attempt, signal);
			} catch (error) {
				if (signal?.aborted) {
					// A connect that completes after the abort is torn down again
					attempt
						.then(() => peripheral.disconnectAsync())
						.catch((late: unknown) => {
							log.debug(`abandoned connect to ${address} ended:`, late);
						});
					throw abortError(signal);
				}
				throw mapNobleError(error, "connect", address);
			} finally {
				signal?.removeEventListener("abort", cancel);
			}
			return openLink(address, peripheral);
		},

		async discoverServices(handle: ConnectionHandle, opts: BackendCallOptions = {}) {
			const link = liveLink(handle);
			let discovered: { services: readonly NobleServiceLike[] };
			try {
				discovered = await raceWithAbort(
					link.peripheral.discoverAllServicesAndCharacteristicsAsync(),
					opts.signal,
				);
			} catch (error) {
				throw callError(error, "discover", link, opts.signal);
			}
			liveLink(handle);

			link.characteristics.clear();
			return discovered.services.map((service): ServiceDescriptor => {
				const serviceUuid = normalizeUuid(service.uuid);
				return {
					uuid: serviceUuid,
					characteristics: service.characteristics.map((characteristic) => {
						const uuid = normalizeUuid(characteristic.uuid);
						link.characteristics.set(
							charKey({ serviceUuid, characteristicUuid: uuid }),
							characteristic,
						);
						return { uuid, properties: propertiesFromFlags(characteristic.properties) };
					}),
				};
			});
		},

		async readCharacteristic(
			handle: ConnectionHandle,
			ref: CharacteristicRef,
			opts: BackendCallOptions = {},
		) {
			const link = liveLink(handle);
			const characteristic = characteristicOf(link, ref);
			try {
				return toBytes(await raceWithAbort(characteristic.readAsync(), opts.signal));
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
			try {
				await raceWithAbort(
					characteristic.writeAsync(Buffer.from(data), mode === "withoutResponse"),
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
				// Reads emit "data" too, flagged as not a notification
				const onData: NobleDataListener = (data, isNotification) => {
					if (isNotification === false) return;
					events.emit("value", {
						handleId: handle.id,
						serviceUuid: ref.serviceUuid,
						characteristicUuid: ref.characteristicUuid,
						value: toBytes(data),
					});
				};
				characteristic.on("data", onData);
				link.listeners.set(key, onData);
				listener = onData;
			}
			try {
				await raceWithAbort(characteristic.subscribeAsync(), opts.signal);
			} catch (error) {
				characteristic.removeListener("data", listener);
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
				characteristic.removeListener("data", listener);
				link.listeners.delete(key);
			}
			try {
				await raceWithAbort(characteristic.unsubscribeAsync(), opts.signal);
			} catch (error) {
				throw callError(error, "unsubscribe", link, opts.signal);
			}
		},

		async disconnect(handle: ConnectionHandle) {
			const link = links.get(handle.id);
			if (!link) return;
			link.closing = true;
			try {
				await link.peripheral.disconnectAsync();
			} catch (error) {
				throw mapNobleError(error, "disconnect", handle.address);
			} finally {
				closeLink(link);
			}
		},

		async dispose() {
			userScanning = false;
			for (const link of [...links.values()]) {
				link.closing = true;
				try {
					await link.peripheral.disconnectAsync();
				} catch (error) {
					log.warn(`failed to disconnect ${link.handle.id} on dispose:`, error);
				}
				closeLink(link);
			}
			if (attached) {
				const noble = attached;
				if (radioScanning) {
					radioScanning = false;
					await noble.stopScanningAsync().catch((error: unknown) => {
						log.warn("failed to stop scanning on dispose:", error);
					});
				}
				noble.removeListener("discover", onDiscover);
				noble.removeListener("stateChange", onStateChange);
			}
			peripherals.clear();
			waiters.clear();
			events.removeAllListeners();
		},
	};
}
