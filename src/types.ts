/**
 * @fileoverview Core type definitions for unible.
 *
 * ## Null vs Undefined Conventions
 *
 * - **`null`**: Intentionally empty or "not found"
 *   - `session.getServices()` returns `null` before the first discovery
 *   - `client.getSession()` returns `null` for unknown addresses
 *
 * - **`undefined`**: Not set yet or optional property
 *   - `characteristic.value` is `undefined` before the first read or notification
 *   - `advertisement.name` is `undefined` when the device does not advertise one
 */

import type { BleError } from "./errors";
import type { TypedEventEmitter } from "./state/event-emitter";

/**
 * Platform-normalized device identifier: an upper-case colon separated MAC
 * where the stack exposes one, otherwise the stack's opaque UUID handle
 * (CoreBluetooth never reveals MAC addresses).
 */
export type DeviceAddress = string;

/**
 * Device session lifecycle state.
 * - 'disconnected': No active connection
 * - 'connecting': Connection attempt in progress
 * - 'connected': Link up, GATT operations accepted
 * - 'disconnecting': Explicit disconnect in progress
 * - 'reconnecting': Link dropped unexpectedly, auto-reconnect running
 */
export type SessionState =
	| "disconnected"
	| "connecting"
	| "connected"
	| "disconnecting"
	| "reconnecting";

/**
 * A device seen while scanning.
 *
 * The Scanner keeps one object per address for the lifetime of a scan and
 * updates it in place on every repeat sighting.
 */
export interface Advertisement {
	readonly address: DeviceAddress;
	/** Local name from the advertisement or scan response */
	name?: string;
	/** Received Signal Strength Indicator in dBm */
	rssi: number;
	/** Advertised service UUIDs, normalized to the 128-bit form */
	serviceUuids: string[];
	/** Raw manufacturer specific data, company identifier included. Empty when absent. */
	manufacturerData: Uint8Array;
	/** Service data keyed by normalized service UUID */
	serviceData?: Map<string, Uint8Array>;
	/** Transmit power level in dBm */
	txPower?: number;
	connectable?: boolean;
	/** Time of the latest sighting, ms since epoch */
	timestamp: number;
}

/**
 * Filter options for device discovery.
 * Fields inside one filter must all match; a list of filters matches when
 * any of them does.
 */
export interface ScanFilter {
	/** Match devices advertising all of these service UUIDs */
	services?: (number | string)[];
	/** Match devices whose name starts with this prefix */
	namePrefix?: string;
	/** Match devices with this exact name */
	name?: string;
}

/**
 * Properties indicating what operations a characteristic supports.
 */
export interface CharacteristicProperties {
	broadcast: boolean;
	read: boolean;
	/** Write without response (no ATT acknowledgment) */
	writeWithoutResponse: boolean;
	write: boolean;
	notify: boolean;
	/** Acknowledged notifications */
	indicate: boolean;
	authenticatedSignedWrites: boolean;
	reliableWrite: boolean;
	writableAuxiliaries: boolean;
}

export type WriteMode = "withResponse" | "withoutResponse";

/** Identifies a characteristic inside a service, by normalized UUIDs. */
export interface CharacteristicRef {
	readonly serviceUuid: string;
	readonly characteristicUuid: string;
}

/**
 * A characteristic reference scoped to one session and one connection
 * generation. Rejected with StaleHandleError once the session reconnects.
 */
export interface CharacteristicHandle extends CharacteristicRef {
	readonly sessionId: string;
	readonly generation: number;
}

/** Characteristic as reported by a backend during discovery. */
export interface CharacteristicDescriptor {
	uuid: string;
	properties: CharacteristicProperties;
}

/** Service as reported by a backend during discovery. */
export interface ServiceDescriptor {
	uuid: string;
	characteristics: CharacteristicDescriptor[];
}

export interface DiscoveredCharacteristic {
	readonly uuid: string;
	readonly properties: CharacteristicProperties;
	readonly handle: CharacteristicHandle;
	/** Last value read or notified, `undefined` until then */
	value?: Uint8Array;
}

export interface DiscoveredService {
	readonly uuid: string;
	readonly characteristics: readonly DiscoveredCharacteristic[];
}

/** Result of service discovery for one connection generation. */
export interface ServiceTree {
	readonly generation: number;
	readonly services: readonly DiscoveredService[];
}

/**
 * Opaque native connection reference. `id` is unique per native
 * connection, so events from an earlier link can be told apart.
 */
export interface ConnectionHandle {
	readonly id: string;
	readonly address: DeviceAddress;
}

export interface BackendConnectOptions {
	timeoutMs: number;
	signal?: AbortSignal | undefined;
}

export interface BackendCallOptions {
	/** Aborted when the operation times out or is cancelled */
	signal?: AbortSignal | undefined;
}

/**
 * Events every backend raises. Native callbacks only translate and emit;
 * the consumer (Scanner, Device Session) decides what to do with them.
 */
export interface BackendEvents extends Record<string, unknown> {
	advertisement: Advertisement;
	disconnect: { handleId: string; address: DeviceAddress; error?: BleError };
	value: {
		handleId: string;
		serviceUuid: string;
		characteristicUuid: string;
		value: Uint8Array;
	};
	availability: { available: boolean };
}

/**
 * Capability interface implemented once per native BLE stack. The rest of
 * the library is written against this interface only.
 *
 * Every rejection is a BleError subclass: native errors are mapped at the
 * adapter boundary.
 *
 * @example Custom backend
 * ```typescript
 * const backend: BackendAdapter = {
 *   name: "my-stack",
 *   events: createEventEmitter<BackendEvents>(),
 *   async connect(address, { timeoutMs, signal }) {
 *     const link = await myStack.open(address, { timeoutMs, signal });
 *     return { id: link.id, address };
 *   },
 *   // ...
 * };
 * ```
 */
export interface BackendAdapter {
	readonly name: string;
	readonly events: TypedEventEmitter<BackendEvents>;

	/** Resolves false when no radio is usable; never rejects. */
	getAvailability(): Promise<boolean>;

	/**
	 * Starts reporting `advertisement` events. Repeat sightings of the same
	 * device are reported too.
	 */
	startScan(filters?: readonly ScanFilter[]): Promise<void>;
	stopScan(): Promise<void>;

	connect(
		address: DeviceAddress,
		options: BackendConnectOptions,
	): Promise<ConnectionHandle>;
	discoverServices(
		handle: ConnectionHandle,
		options?: BackendCallOptions,
	): Promise<ServiceDescriptor[]>;
	readCharacteristic(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		options?: BackendCallOptions,
	): Promise<Uint8Array>;
	/**
	 * For `withoutResponse`, resolves once the local stack accepted the
	 * packet, never waiting for the peer.
	 */
	writeCharacteristic(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		data: Uint8Array,
		mode: WriteMode,
		options?: BackendCallOptions,
	): Promise<void>;
	/** Values are delivered as `value` events for this handle. */
	subscribe(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		options?: BackendCallOptions,
	): Promise<void>;
	unsubscribe(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		options?: BackendCallOptions,
	): Promise<void>;
	/** Idempotent. Resolves once the stack acknowledged the disconnect. */
	disconnect(handle: ConnectionHandle): Promise<void>;

	/** Releases native resources. The adapter is unusable afterwards. */
	dispose(): Promise<void>;
}

export type BackendName = "noble" | "bluez";
