import { createBackend } from "./backends";
import { type RetryOptions, withRetry } from "./ble/retry";
import {
	createScanner,
	type FindDeviceOptions,
	type ScanOptions,
	type ScanStream,
} from "./ble/scanner";
import { createSession, type DeviceSession } from "./ble/session";
import { type ClientOptions, resolveClientOptions, type SessionConfig } from "./config";
import { CancelledError } from "./errors";
import { createEventEmitter, type TypedEventEmitter } from "./state/event-emitter";
import type { Advertisement, BackendAdapter, DeviceAddress, ScanFilter } from "./types";
import { normalizeAddress } from "./utils/address";
import { createScopedLogger, enableDebugLogging, setLogger } from "./utils/logger";

const log = createScopedLogger("client");

/**
 * Options for `client.connect()`. Session settings given here are merged
 * into the session for the address when it is created or disconnected; a
 * session that is connected or still connecting keeps its own.
 */
export interface ClientConnectOptions extends Partial<SessionConfig> {
	/** Connect timeout; defaults to the session's `connectTimeoutMs` */
	timeoutMs?: number | undefined;
	/** Cancels the attempt, retries included */
	signal?: AbortSignal | undefined;
	/**
	 * Retries transient connect failures (DeviceUnreachable, ConnectionLost,
	 * OperationTimeout). `true` uses the default backoff.
	 */
	retry?: boolean | RetryOptions;
}

/**
 * Events emitted by the client.
 */
export interface ClientEvents extends Record<string, unknown> {
	/** A session reached `connected`, after a reconnect too */
	connect: { address: DeviceAddress; session: DeviceSession };
	/** A session that had been connected went back to `disconnected` */
	disconnect: { address: DeviceAddress; error?: Error };
}

/**
 * Entry point of the library: owns the backend, its scanner and one
 * session per device address.
 */
export interface BleClient {
	/** The backend selected at startup */
	readonly backend: BackendAdapter;

	/**
	 * Starts a scan stream. Concurrent scans share one backend scan.
	 *
	 * @param filters - An advertisement matches when any filter matches
	 */
	scan(filters?: readonly ScanFilter[], options?: ScanOptions): Promise<ScanStream>;

	/**
	 * Scans until the first matching device shows up.
	 *
	 * @throws DeviceUnreachableError when none does within the timeout
	 */
	findDevice(
		filters: readonly ScanFilter[],
		options?: FindDeviceOptions,
	): Promise<Advertisement>;

	/**
	 * Connects to a device and discovers its services.
	 *
	 * There is at most one session per address: connecting to an address
	 * that already has one returns that session, connecting it again when
	 * it is disconnected.
	 *
	 * @param address - MAC address in any case or separator, or the platform's device id
	 * @returns The connected session
	 * @throws Error if the connection limit is reached
	 * @throws DeviceUnreachableError when the device does not answer in time
	 */
	connect(address: DeviceAddress, options?: ClientConnectOptions): Promise<DeviceSession>;

	/**
	 * Get the session of a device address.
	 *
	 * @returns The session, or null when none was created or it was closed
	 */
	getSession(address: DeviceAddress): DeviceSession | null;

	/**
	 * Get all sessions, connected or not.
	 *
	 * @returns Map of addresses to sessions
	 */
	getSessions(): Map<DeviceAddress, DeviceSession>;

	/** Number of sessions held by the client */
	readonly sessionCount: number;

	/** Number of sessions that are not `disconnected` */
	readonly activeCount: number;

	/** Maximum number of sessions that may be active at once */
	readonly maxConnections: number;

	/**
	 * Register a callback for device connection events.
	 *
	 * @returns Unsubscribe function
	 */
	onConnect(callback: (address: DeviceAddress, session: DeviceSession) => void): () => void;

	/**
	 * Register a callback for device disconnection events.
	 *
	 * @returns Unsubscribe function
	 */
	onDisconnect(callback: (address: DeviceAddress, error?: Error) => void): () => void;

	/** Disconnects every session; sessions stay available for reconnecting. */
	disconnectAll(): Promise<void>;

	/**
	 * Stops scanning, closes every session and releases the backend.
	 * The client is unusable afterwards.
	 */
	close(): Promise<void>;
}

/**
 * Creates a BLE client.
 *
 * Without a `backend` option the backend comes from `UNIBLE_BACKEND`,
 * else BlueZ on Linux and noble elsewhere. The `logger` and `debug`
 * options configure the library-wide logger.
 *
 * @example Scan, then connect to the first match
 * ```typescript
 * const client = createBleClient({ connectTimeoutMs: 10000 });
 *
 * const band = await client.findDevice([{ namePrefix: "gForce" }], { timeoutMs: 15000 });
 * const session = await client.connect(band.address, { autoReconnect: true });
 *
 * client.onDisconnect((address, error) => {
 *   console.log(`${address} disconnected`, error?.message);
 * });
 *
 * await client.close();
 * ```
 *
 * @example Against the in-process backend
 * ```typescript
 * const backend = createMemoryBackend();
 * backend.addDevice({ address: "AA:BB:CC:DD:EE:FF", services: [] });
 * const client = createBleClient({ backend });
 * ```
 *
 * @throws RangeError for invalid options
 */
export function createBleClient(options: ClientOptions = {}): BleClient {
	const resolved = resolveClientOptions(options);
	if (resolved.logger) {
		setLogger(resolved.logger);
	}
	if (resolved.debug) {
		enableDebugLogging();
	}

	const backend =
		typeof resolved.backend === "string" ? createBackend(resolved.backend) : resolved.backend;
	const { maxConnections } = resolved;
	const scanner = createScanner(backend);
	const sessions = new Map<DeviceAddress, DeviceSession>();
	// Addresses between the capacity check and the session leaving `disconnected`
	const starting = new Set<DeviceAddress>();
	const emitter: TypedEventEmitter<ClientEvents> = createEventEmitter();
	let closed = false;

	log.debug(`using the ${backend.name} backend`);

	function activeCount(except?: DeviceAddress): number {
		let count = 0;
		for (const [address, session] of sessions) {
			if (address === except) continue;
			if (session.state !== "disconnected" || starting.has(address)) count++;
		}
		return count;
	}

	function requireCapacity(address: DeviceAddress): void {
		if (activeCount(address) >= maxConnections) {
			throw new Error(
				`Maximum connections (${maxConnections}) reached. Disconnect a device before connecting another.`,
			);
		}
	}

	function requireOpen(): void {
		if (closed) {
			throw new CancelledError("Client is closed");
		}
	}

	function openSession(address: DeviceAddress, config: Partial<SessionConfig>): DeviceSession {
		const session = createSession({
			address,
			backend,
			config: { ...resolved.session, ...config },
		});
		let wasConnected = false;

		const offState = session.onStateChange(({ to, error }) => {
			if (to === "connected") {
				wasConnected = true;
				emitter.emit("connect", { address, session });
			} else if (to === "disconnected" && wasConnected) {
				wasConnected = false;
				emitter.emit("disconnect", { address, ...(error && { error }) });
			}
		});
		session.onClose(() => {
			offState();
			if (sessions.get(address) === session) {
				sessions.delete(address);
			}
		});

		sessions.set(address, session);
		return session;
	}

	return {
		backend,

		async scan(filters = [], scanOptions) {
			requireOpen();
			return scanner.scan(filters, scanOptions);
		},

		async findDevice(filters, findOptions) {
			requireOpen();
			return scanner.findDevice(filters, findOptions);
		},

		async connect(requested, connectOptions = {}) {
			requireOpen();
			const address = normalizeAddress(requested);
			const { timeoutMs, signal, retry, ...config } = connectOptions;

			let session = sessions.get(address);
			if (!session || session.state === "disconnected") {
				requireCapacity(address);
			}
			if (!session) {
				session = openSession(address, config);
			} else if (Object.keys(config).length > 0) {
				if (session.state === "disconnected") {
					session.configure(config);
				} else {
					log.warn(`${address} is ${session.state}; session options ignored`);
				}
			}

			const target = session;
			const attempt = () => target.connect({ timeoutMs, signal });

			starting.add(address);
			try {
				if (retry) {
					const retryOptions: RetryOptions = retry === true ? {} : retry;
					await withRetry(attempt, {
						...retryOptions,
						signal,
						onRetry: (n, delayMs, error) => {
							log.warn(
								`connect to ${address} failed (attempt ${n}: ${error.message}), retrying in ${delayMs}ms`,
							);
							retryOptions.onRetry?.(n, delayMs, error);
						},
					});
				} else {
					await attempt();
				}
			} finally {
				starting.delete(address);
			}
			return target;
		},

		getSession(address) {
			return sessions.get(normalizeAddress(address)) ?? null;
		},

		getSessions() {
			return new Map(sessions);
		},

		get sessionCount() {
			return sessions.size;
		},

		get activeCount() {
			return activeCount();
		},

		get maxConnections() {
			return maxConnections;
		},

		onConnect(callback) {
			return emitter.on("connect", ({ address, session }) => callback(address, session));
		},

		onDisconnect(callback) {
			return emitter.on("disconnect", ({ address, error }) => callback(address, error));
		},

		async disconnectAll() {
			const results = await Promise.allSettled(
				[...sessions.values()].map((session) => session.disconnect()),
			);
			const failures = results.filter((r) => r.status === "rejected");
			if (failures.length > 0) {
				log.warn(`${failures.length} disconnect(s) failed`);
			}
		},

		async close() {
			if (closed) return;
			closed = true;
			await scanner.stopAll().catch((error: unknown) => {
				log.warn("failed to stop scanning:", error);
			});
			const results = await Promise.allSettled(
				[...sessions.values()].map((session) => session.close()),
			);
			for (const result of results) {
				if (result.status === "rejected") {
					log.warn("failed to close session:", result.reason);
				}
			}
			sessions.clear();
			await backend.dispose();
			emitter.removeAllListeners();
		},
	};
}
