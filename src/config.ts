import { MAX_TIMEOUT_MS } from "./errors";
import type { BackendAdapter, BackendName } from "./types";
import type { Logger } from "./utils/logger";

/** Default timeout for establishing a connection in milliseconds */
export const DEFAULT_CONNECT_TIMEOUT_MS = 20000;

/** Default timeout for BLE read operations in milliseconds */
export const DEFAULT_READ_TIMEOUT_MS = 5000;

/** Default timeout for BLE write operations in milliseconds */
export const DEFAULT_WRITE_TIMEOUT_MS = 10000;

/** Default timeout for starting BLE notifications in milliseconds */
export const DEFAULT_NOTIFICATION_TIMEOUT_MS = 15000;

/** Default timeout for service discovery in milliseconds */
export const DEFAULT_DISCOVER_TIMEOUT_MS = 15000;

/** Default timeout for the backend to acknowledge a disconnect in milliseconds */
export const DEFAULT_DISCONNECT_TIMEOUT_MS = 5000;

/** Default number of reconnect attempts after an unexpected link loss */
export const DEFAULT_MAX_RECONNECT_ATTEMPTS = 3;

/** Default delay before the first reconnect attempt in milliseconds */
export const DEFAULT_RECONNECT_DELAY_MS = 1000;

/** Default cap on the delay between reconnect attempts in milliseconds */
export const DEFAULT_MAX_RECONNECT_DELAY_MS = 30000;

/** Default per-listener notification queue length */
export const DEFAULT_BUFFER_SIZE = 64;

/**
 * Maximum number of simultaneous BLE connections.
 * Most adapters support at most 7 concurrent connections.
 */
export const MAX_BLE_CONNECTIONS = 7;

/** Environment variable selecting the backend: `noble` or `bluez` */
export const BACKEND_ENV_VAR = "UNIBLE_BACKEND";

/** Environment variable enabling debug logging */
export const DEBUG_ENV_VAR = "UNIBLE_DEBUG";

const BACKEND_NAMES: readonly BackendName[] = ["noble", "bluez"];

/**
 * Per-session behaviour. Every field has a default; the Client applies
 * its own options on top, and `connect()` options on top of those.
 */
export interface SessionConfig {
	connectTimeoutMs: number;
	readTimeoutMs: number;
	writeTimeoutMs: number;
	notificationTimeoutMs: number;
	discoverTimeoutMs: number;
	disconnectTimeoutMs: number;
	autoReconnect: boolean;
	maxReconnectAttempts: number;
	reconnectDelayMs: number;
	maxReconnectDelayMs: number;
	bufferSize: number;
}

export const DEFAULT_SESSION_CONFIG: Readonly<SessionConfig> = {
	connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
	readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
	writeTimeoutMs: DEFAULT_WRITE_TIMEOUT_MS,
	notificationTimeoutMs: DEFAULT_NOTIFICATION_TIMEOUT_MS,
	discoverTimeoutMs: DEFAULT_DISCOVER_TIMEOUT_MS,
	disconnectTimeoutMs: DEFAULT_DISCONNECT_TIMEOUT_MS,
	autoReconnect: false,
	maxReconnectAttempts: DEFAULT_MAX_RECONNECT_ATTEMPTS,
	reconnectDelayMs: DEFAULT_RECONNECT_DELAY_MS,
	maxReconnectDelayMs: DEFAULT_MAX_RECONNECT_DELAY_MS,
	bufferSize: DEFAULT_BUFFER_SIZE,
};

/**
 * Options for `createBleClient()`.
 */
export interface ClientOptions extends Partial<SessionConfig> {
	/**
	 * Backend name or instance. Defaults to `UNIBLE_BACKEND`, then `bluez`
	 * on Linux and `noble` elsewhere.
	 */
	backend?: BackendName | BackendAdapter;
	/** @default 7 */
	maxConnections?: number;
	/** Enables debug logging (also enabled by `UNIBLE_DEBUG=1`) */
	debug?: boolean;
	/** Routes library logging to this logger */
	logger?: Logger;
}

export interface ResolvedClientOptions {
	backend: BackendName | BackendAdapter;
	maxConnections: number;
	debug: boolean;
	logger: Logger | undefined;
	session: SessionConfig;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function isBackendName(value: string): value is BackendName {
	return BACKEND_NAMES.some((name) => name === value);
}

function parseFlag(value: string | undefined): boolean {
	if (value === undefined) return false;
	return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function requirePositive(name: string, value: number): void {
	if (!(value > 0)) {
		throw new RangeError(`${name} must be a positive number, got ${value}`);
	}
}

/** Infinity disables a deadline; a finite value must fit a Node timer */
function requireTimeout(name: string, value: number, unbounded: boolean): void {
	requirePositive(name, value);
	if (!Number.isFinite(value) && unbounded) return;
	if (!(value <= MAX_TIMEOUT_MS)) {
		throw new RangeError(`${name} must not exceed ${MAX_TIMEOUT_MS}ms, got ${value}`);
	}
}

function requireInteger(name: string, value: number, min: number): void {
	if (!Number.isInteger(value) || value < min) {
		throw new RangeError(`${name} must be an integer >= ${min}, got ${value}`);
	}
}

/**
 * Validates a session configuration.
 * @throws RangeError for out-of-range values
 */
export function validateSessionConfig(config: SessionConfig): void {
	requireTimeout("connectTimeoutMs", config.connectTimeoutMs, true);
	requireTimeout("readTimeoutMs", config.readTimeoutMs, true);
	requireTimeout("writeTimeoutMs", config.writeTimeoutMs, true);
	requireTimeout("notificationTimeoutMs", config.notificationTimeoutMs, true);
	requireTimeout("discoverTimeoutMs", config.discoverTimeoutMs, true);
	requireTimeout("disconnectTimeoutMs", config.disconnectTimeoutMs, true);
	requireInteger("maxReconnectAttempts", config.maxReconnectAttempts, 1);
	requireTimeout("reconnectDelayMs", config.reconnectDelayMs, false);
	requireTimeout("maxReconnectDelayMs", config.maxReconnectDelayMs, false);
	requireInteger("bufferSize", config.bufferSize, 1);
}

/**
 * Picks the backend when none is given: `UNIBLE_BACKEND`, else BlueZ on
 * Linux and noble everywhere else.
 * @throws RangeError for an unknown backend name
 */
export function selectBackendName(
	env: Environment = process.env,
	platform: NodeJS.Platform = process.platform,
): BackendName {
	const fromEnv = env[BACKEND_ENV_VAR]?.trim().toLowerCase();
	if (fromEnv) {
		if (!isBackendName(fromEnv)) {
			throw new RangeError(
				`${BACKEND_ENV_VAR} must be one of ${BACKEND_NAMES.join(", ")}, got "${fromEnv}"`,
			);
		}
		return fromEnv;
	}
	return platform === "linux" ? "bluez" : "noble";
}

/**
 * Merges client options with defaults and the environment.
 *
 * @example
 * ```typescript
 * const resolved = resolveClientOptions({ connectTimeoutMs: 5000 }, process.env);
 * resolved.session.readTimeoutMs; // 5000 (default)
 * ```
 *
 * @throws RangeError for invalid numeric options or an unknown backend name
 */
export function resolveClientOptions(
	options: ClientOptions = {},
	env: Environment = process.env,
	platform: NodeJS.Platform = process.platform,
): ResolvedClientOptions {
	const { backend, maxConnections = MAX_BLE_CONNECTIONS, debug, logger, ...overrides } =
		options;

	const session: SessionConfig = { ...DEFAULT_SESSION_CONFIG, ...overrides };
	validateSessionConfig(session);
	requireInteger("maxConnections", maxConnections, 1);

	if (typeof backend === "string" && !isBackendName(backend)) {
		throw new RangeError(
			`backend must be one of ${BACKEND_NAMES.join(", ")}, got "${backend}"`,
		);
	}

	return {
		backend: backend ?? selectBackendName(env, platform),
		maxConnections,
		debug: debug ?? parseFlag(env[DEBUG_ENV_VAR]),
		logger,
		session,
	};
}
