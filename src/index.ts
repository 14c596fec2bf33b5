/**
 * unible - Bluetooth Low Energy central client for Node.js.
 *
 * One client owns a platform backend (noble on macOS and Windows, BlueZ on
 * Linux) and one session per device. Each session serializes its GATT
 * operations and shares notification subscriptions between listeners.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import { createBleClient } from "unible";
 *
 * const client = createBleClient({ autoReconnect: true });
 * const band = await client.findDevice([{ services: ["fff0"] }], { timeoutMs: 15000 });
 * const session = await client.connect(band.address);
 *
 * await session.write("fff0", "fff1", [0x01]);
 * for await (const frame of await session.subscribe("fff0", "fff4")) {
 *   console.log(frame);
 * }
 * ```
 */

// Client
export {
	type BleClient,
	type ClientConnectOptions,
	type ClientEvents,
	createBleClient,
} from "./client";
// Configuration
export {
	BACKEND_ENV_VAR,
	type ClientOptions,
	DEBUG_ENV_VAR,
	DEFAULT_BUFFER_SIZE,
	DEFAULT_CONNECT_TIMEOUT_MS,
	DEFAULT_DISCONNECT_TIMEOUT_MS,
	DEFAULT_DISCOVER_TIMEOUT_MS,
	DEFAULT_MAX_RECONNECT_ATTEMPTS,
	DEFAULT_MAX_RECONNECT_DELAY_MS,
	DEFAULT_NOTIFICATION_TIMEOUT_MS,
	DEFAULT_READ_TIMEOUT_MS,
	DEFAULT_RECONNECT_DELAY_MS,
	DEFAULT_SESSION_CONFIG,
	DEFAULT_WRITE_TIMEOUT_MS,
	type Environment,
	MAX_BLE_CONNECTIONS,
	type ResolvedClientOptions,
	resolveClientOptions,
	type SessionConfig,
	selectBackendName,
	validateSessionConfig,
} from "./config";
// Backends
export {
	type BackendCall,
	type BackendMethod,
	type BluezBackendOptions,
	type ConnectBehavior,
	createBackend,
	createBluezBackend,
	createMemoryBackend,
	createNobleBackend,
	type MemoryBackend,
	type MemoryBackendOptions,
	type NobleBackendOptions,
	type SimulatedCharacteristic,
	type SimulatedDevice,
	type SimulatedService,
} from "./backends";
// Sessions, queue and notifications
export {
	type ConnectOptions,
	createNotificationMultiplexer,
	createOperationQueue,
	createScanner,
	createSession,
	type DeviceSession,
	type FindDeviceOptions,
	type NotificationMultiplexer,
	type NotificationStream,
	type OperationKind,
	type OperationOptions,
	type OperationQueue,
	type OperationQueueOptions,
	type RetryOptions,
	type ScanOptions,
	type ScanStream,
	type Scanner,
	type SessionOptions,
	type StateChange,
	type SubscribeOptions,
	type UuidLike,
	withRetry,
} from "./ble";
// Errors
export {
	AdapterUnavailableError,
	BleError,
	type BleErrorCode,
	type BleErrorOptions,
	CancelledError,
	ConnectionLostError,
	DeviceUnreachableError,
	isBleError,
	isTransientBLEError,
	MAX_TIMEOUT_MS,
	NotConnectedError,
	normalizeError,
	OperationTimeoutError,
	ProtocolError,
	raceWithAbort,
	StaleHandleError,
	UnsupportedError,
	withTimeout,
} from "./errors";
// State management
export {
	createEventEmitter,
	createStateMachine,
	type EventMap,
	type StateMachine,
	type TransitionCallback,
	type TypedEventEmitter,
} from "./state";
// Types
export type {
	Advertisement,
	BackendAdapter,
	BackendEvents,
	BackendName,
	CharacteristicHandle,
	CharacteristicProperties,
	CharacteristicRef,
	ConnectionHandle,
	DeviceAddress,
	DiscoveredCharacteristic,
	DiscoveredService,
	ScanFilter,
	ServiceTree,
	SessionState,
	WriteMode,
} from "./types";
// Utils
export {
	type BytesLike,
	enableDebugLogging,
	isMacAddress,
	type Logger,
	normalizeAddress,
	normalizeUuid,
	resetLogger,
	sameUuid,
	setLogger,
	toBytes,
	toCompactUuid,
	toFullUuid,
	toHex,
} from "./utils";
