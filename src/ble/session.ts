import {
	DEFAULT_SESSION_CONFIG,
	type SessionConfig,
	validateSessionConfig,
} from "../config";
import {
	AdapterUnavailableError,
	abortError,
	CancelledError,
	ConnectionLostError,
	DeviceUnreachableError,
	MAX_TIMEOUT_MS,
	NotConnectedError,
	normalizeError,
	OperationTimeoutError,
	ProtocolError,
	raceWithAbort,
	StaleHandleError,
	UnsupportedError,
	withTimeout,
} from "../errors";
import { createEventChannel } from "../state/event-channel";
import { createEventEmitter } from "../state/event-emitter";
import { createStateMachine } from "../state/state-machine";
import type {
	BackendAdapter,
	BackendEvents,
	CharacteristicHandle,
	CharacteristicRef,
	ConnectionHandle,
	DeviceAddress,
	DiscoveredCharacteristic,
	ServiceDescriptor,
	ServiceTree,
	SessionState,
	WriteMode,
} from "../types";
import { type BytesLike, toBytes, toHex } from "../utils/bytes";
import { createScopedLogger } from "../utils/logger";
import { normalizeUuid, toCompactUuid } from "../utils/uuid";
import {
	createNotificationMultiplexer,
	type NotificationStream,
	type SubscribeOptions,
} from "./notification-multiplexer";
import { createOperationQueue } from "./operation-queue";
import { withRetry } from "./retry";

const log = createScopedLogger("session");

/** A UUID in any spelling `normalizeUuid()` accepts */
export type UuidLike = number | string;

export interface OperationOptions {
	/** Deadline from dispatch; defaults to the session's per-kind timeout */
	timeoutMs?: number | undefined;
	signal?: AbortSignal | undefined;
}

export interface ConnectOptions {
	/** Connect timeout; defaults to the session's `connectTimeoutMs` */
	timeoutMs?: number | undefined;
	/** Cancels link establishment */
	signal?: AbortSignal | undefined;
}

export interface StateChange {
	from: SessionState;
	to: SessionState;
	/** The error that forced the transition, if any */
	error?: Error;
}

type SessionEvents = {
	state: StateChange;
	closed: DeviceAddress;
};

/**
 * Connection to one peripheral.
 *
 * @example
 * ```typescript
 * const session = await client.connect("AA:BB:CC:DD:EE:FF", { autoReconnect: true });
 * session.onStateChange(({ from, to, error }) => console.log(from, "->", to, error?.message));
 *
 * const battery = await session.read(0x180f, 0x2a19);
 * await session.write("fff0", "fff1", [0x01], "withoutResponse");
 *
 * for await (const frame of await session.subscribe("fff0", "fff4")) {
 *   handle(frame);
 * }
 * ```
 */
export interface DeviceSession {
	readonly id: string;
	readonly address: DeviceAddress;
	readonly state: SessionState;
	/** Increments on every successful connection */
	readonly generation: number;
	/** Error behind the latest failed connect or link loss */
	readonly lastError: Error | null;
	/** Operations queued or in flight */
	readonly queueDepth: number;
	readonly closed: boolean;

	/**
	 * Connects and discovers services. Joins a pending attempt; resolves at
	 * once when already connected.
	 * @throws DeviceUnreachableError when the device does not answer in time
	 */
	connect(options?: ConnectOptions): Promise<void>;
	/** Idempotent. A pending connect rejects with CancelledError. */
	disconnect(): Promise<void>;
	/**
	 * Merges settings into the session's configuration; the next `connect()`
	 * and every operation after it use them.
	 * @throws Error unless the session is disconnected and not closed
	 * @throws RangeError for out-of-range values
	 */
	configure(config: Partial<SessionConfig>): void;
	/** Disconnects and detaches from the backend. The session is unusable afterwards. */
	close(): Promise<void>;

	/** Re-runs service discovery through the operation queue. */
	discoverServices(options?: OperationOptions): Promise<ServiceTree>;
	/** The current generation's service tree, or null before discovery. */
	getServices(): ServiceTree | null;
	getCharacteristic(
		serviceUuid: UuidLike,
		characteristicUuid: UuidLike,
	): DiscoveredCharacteristic | null;

	read(
		serviceUuid: UuidLike,
		characteristicUuid: UuidLike,
		options?: OperationOptions,
	): Promise<Uint8Array>;
	read(handle: CharacteristicHandle, options?: OperationOptions): Promise<Uint8Array>;

	write(
		serviceUuid: UuidLike,
		characteristicUuid: UuidLike,
		data: BytesLike,
		mode?: WriteMode,
		options?: OperationOptions,
	): Promise<void>;
	write(
		handle: CharacteristicHandle,
		data: BytesLike,
		mode?: WriteMode,
		options?: OperationOptions,
	): Promise<void>;

	subscribe(
		serviceUuid: UuidLike,
		characteristicUuid: UuidLike,
		options?: SubscribeOptions,
	): Promise<NotificationStream>;
	subscribe(
		handle: CharacteristicHandle,
		options?: SubscribeOptions,
	): Promise<NotificationStream>;

	onStateChange(callback: (change: StateChange) => void): () => void;
	/** Fires once, after `close()` */
	onClose(callback: () => void): () => void;
}

export interface SessionOptions {
	address: DeviceAddress;
	backend: BackendAdapter;
	config?: Partial<SessionConfig>;
}

/** A link being established, by `connect()` or by auto-reconnect */
interface EstablishJob {
	readonly kind: "connect" | "reconnect";
	readonly controller: AbortController;
	promise: Promise<void>;
}

interface OpenedLink {
	readonly generation: number;
	readonly discovery: Promise<ServiceTree>;
}

type Target = UuidLike | CharacteristicHandle;

let nextSessionNumber = 1;

function refKey(ref: CharacteristicRef): string {
	return `${ref.serviceUuid}/${ref.characteristicUuid}`;
}

function describeRef(ref: CharacteristicRef): string {
	return `${toCompactUuid(ref.serviceUuid)}/${toCompactUuid(ref.characteristicUuid)}`;
}

function isHandle(target: Target): target is CharacteristicHandle {
	return typeof target === "object";
}

function settled(promise: Promise<unknown>): Promise<void> {
	return promise.then(
		() => undefined,
		() => undefined,
	);
}

function isAdapterLoss(error: Error): boolean {
	return (
		error instanceof AdapterUnavailableError ||
		error.cause instanceof AdapterUnavailableError
	);
}

/**
 * Creates the session of one device address.
 *
 * Commands and native events are serialized through one event channel;
 * session state is only changed from channel tasks. GATT operations go
 * through one operation queue and resolve UUIDs against the service tree
 * when they are dispatched.
 */
export function createSession(options: SessionOptions): DeviceSession {
	const { address, backend } = options;
	let config: SessionConfig = { ...DEFAULT_SESSION_CONFIG, ...options.config };
	validateSessionConfig(config);

	const id = `${address}/${nextSessionNumber++}`;
	const machine = createStateMachine();
	const channel = createEventChannel(address);
	const events = createEventEmitter<SessionEvents>();
	const queue = createOperationQueue({
		defaultTimeoutMs: config.writeTimeoutMs,
		name: address,
	});

	let generation = 0;
	let link: ConnectionHandle | null = null;
	let services: ServiceTree | null = null;
	const characteristics = new Map<string, DiscoveredCharacteristic>();
	let lastError: Error | null = null;
	let pending: EstablishJob | null = null;
	let closing: Promise<void> | null = null;
	let closed = false;

	const multiplexer = createNotificationMultiplexer({
		subscribe: (ref) => {
			const submitted = generation;
			return queue.enqueue(
				"subscribe",
				async ({ signal }) => {
					const { connection, characteristic } = resolveCharacteristic(ref, submitted);
					const { notify, indicate } = characteristic.properties;
					if (!notify && !indicate) {
						throw new UnsupportedError(
							`Characteristic ${describeRef(ref)} does not support notifications`,
						);
					}
					await backend.subscribe(connection, ref, { signal });
				},
				{ timeoutMs: config.notificationTimeoutMs, label: `subscribe ${describeRef(ref)}` },
			);
		},
		unsubscribe: (ref) =>
			queue.enqueue(
				"unsubscribe",
				async ({ signal }) => {
					if (!link) return;
					await backend.unsubscribe(link, ref, { signal });
				},
				{ timeoutMs: config.notificationTimeoutMs, label: `unsubscribe ${describeRef(ref)}` },
			),
		isConnected: () => machine.getState() === "connected",
		name: address,
	});

	machine.onTransition((from, to, cause) => {
		log.debug(`${address}: ${from} -> ${to}`, cause?.message ?? "");
		events.emit("state", { from, to, ...(cause && { error: cause }) });
	});

	const offDisconnect = backend.events.on("disconnect", (event) => {
		channel.dispatch("link-lost", () => onLinkLost(event));
	});

	const offValue = backend.events.on("value", (event) => {
		if (!link || event.handleId !== link.id) return;
		const ref: CharacteristicRef = {
			serviceUuid: event.serviceUuid,
			characteristicUuid: event.characteristicUuid,
		};
		const characteristic = characteristics.get(refKey(ref));
		if (characteristic) {
			characteristic.value = event.value;
		}
		multiplexer.deliver(ref, event.value);
	});

	// ---------------------------------------------------------------------
	// Link lifecycle
	// ---------------------------------------------------------------------

	function releaseLink(connection: ConnectionHandle): Promise<void> {
		return withTimeout(
			backend.disconnect(connection),
			config.disconnectTimeoutMs,
			`disconnect ${address}`,
		).catch((error: unknown) => {
			log.warn(`${address}: backend disconnect failed:`, error);
		});
	}

	/** Forgets the current link; every pending operation and stream ends. */
	function resetLink(reason: ConnectionLostError): void {
		link = null;
		services = null;
		characteristics.clear();
		queue.failAll(reason);
		multiplexer.invalidateAll(reason);
	}

	async function establish(
		parent: AbortSignal,
		timeoutMs: number,
	): Promise<ConnectionHandle> {
		const attempt = new AbortController();
		const forward = () => attempt.abort(parent.reason);
		if (parent.aborted) {
			forward();
		} else {
			parent.addEventListener("abort", forward, { once: true });
		}

		const connecting = backend.connect(address, { timeoutMs, signal: attempt.signal });
		try {
			return await raceWithAbort(
				withTimeout(connecting, timeoutMs, `connect ${address}`),
				attempt.signal,
			);
		} catch (error) {
			const err =
				error instanceof OperationTimeoutError
					? new DeviceUnreachableError(
							address,
							`Device ${address} did not respond within ${timeoutMs}ms`,
							{ cause: error },
						)
					: normalizeError(error);
			if (!attempt.signal.aborted) {
				attempt.abort(err);
			}
			// The backend may still complete after we gave up
			connecting.then(releaseLink).catch((late: unknown) => {
				log.debug(`${address}: abandoned connect attempt ended:`, late);
			});
			throw err;
		} finally {
			parent.removeEventListener("abort", forward);
		}
	}

	/**
	 * Establishes the link and enqueues discovery ahead of anything a
	 * `connected` listener submits.
	 */
	async function openLink(job: EstablishJob, timeoutMs: number): Promise<void> {
		const { signal } = job.controller;
		const connection = await establish(signal, timeoutMs);

		const opened = await channel.post((): OpenedLink | null => {
			if (signal.aborted || pending !== job) return null;
			link = connection;
			generation++;
			const discovery = enqueueDiscovery(connection, generation);
			lastError = null;
			machine.transition("connected");
			return { generation, discovery };
		});
		if (!opened) {
			await releaseLink(connection);
			throw signal.aborted
				? abortError(signal)
				: new CancelledError(`Connection to ${address} superseded`);
		}

		try {
			await opened.discovery;
		} catch (error) {
			const err = normalizeError(error);
			const { teardown } = await channel.post(() => ({
				teardown: abandonLink(job, opened.generation, err),
			}));
			await teardown;
			throw signal.aborted ? abortError(signal) : err;
		}
	}

	/** Discovery failed on a fresh link: a first connect gives up, a reconnect retries. */
	function abandonLink(job: EstablishJob, gen: number, error: Error): Promise<void> {
		if (pending !== job || gen !== generation || !link) {
			return Promise.resolve();
		}
		lastError = error;
		if (job.kind === "connect") {
			pending = null;
			return beginDisconnect(error);
		}
		const connection = link;
		resetLink(
			new ConnectionLostError(`Service discovery on ${address} failed`, { cause: error }),
		);
		machine.transition("reconnecting", error);
		return releaseLink(connection);
	}

	function createJob(kind: EstablishJob["kind"]): EstablishJob {
		return { kind, controller: new AbortController(), promise: Promise.resolve() };
	}

	async function runConnect(job: EstablishJob, timeoutMs: number): Promise<void> {
		try {
			await openLink(job, timeoutMs);
		} catch (error) {
			const err = normalizeError(error);
			await channel.post(() => {
				if (pending !== job) return;
				pending = null;
				if (machine.getState() === "connecting") {
					lastError = err;
					machine.transition("disconnected", err);
				}
			});
			throw err;
		}
		await channel.post(() => {
			if (pending === job) pending = null;
		});
	}

	async function runReconnect(job: EstablishJob): Promise<void> {
		try {
			await withRetry(
				(attempt) => {
					log.debug(`${address}: reconnect attempt ${attempt}`);
					return openLink(job, config.connectTimeoutMs);
				},
				{
					maxAttempts: config.maxReconnectAttempts,
					initialDelayMs: config.reconnectDelayMs,
					maxDelayMs: config.maxReconnectDelayMs,
					signal: job.controller.signal,
					onRetry: (attempt, delayMs, error) => {
						log.warn(
							`${address}: reconnect attempt ${attempt} failed (${error.message}), retrying in ${delayMs}ms`,
						);
					},
				},
			);
		} catch (error) {
			const err = normalizeError(error);
			await channel.post(() => {
				if (pending !== job) return;
				pending = null;
				if (machine.getState() === "reconnecting") {
					lastError = err;
					machine.transition("disconnected", err);
				}
			});
			throw err;
		}
		await channel.post(() => {
			if (pending === job) pending = null;
		});
	}

	function startReconnect(): void {
		const job = createJob("reconnect");
		pending = job;
		job.promise = runReconnect(job);
		job.promise.catch((error: unknown) => {
			if (error instanceof CancelledError) {
				log.debug(`${address}: reconnect cancelled`);
			} else {
				log.warn(`${address}: giving up reconnecting:`, error);
			}
		});
	}

	function onLinkLost(event: BackendEvents["disconnect"]): void {
		if (!link || link.id !== event.handleId) return;

		const cause: Error = event.error ?? new ConnectionLostError(`Connection to ${address} lost`);
		resetLink(
			cause instanceof ConnectionLostError
				? cause
				: new ConnectionLostError(`Connection to ${address} lost: ${cause.message}`, { cause }),
		);
		lastError = cause;
		log.warn(`${address}: link lost:`, cause.message);

		if (pending?.kind === "reconnect") {
			// The running retry loop tries again
			machine.transition("reconnecting", cause);
			return;
		}
		if (pending === null && config.autoReconnect && !isAdapterLoss(cause)) {
			machine.transition("reconnecting", cause);
			startReconnect();
			return;
		}
		machine.transition("disconnected", cause);
	}

	function beginConnect(timeoutMs: number, signal?: AbortSignal): Promise<void> {
		if (closed) {
			return Promise.reject(new CancelledError(`Session ${id} is closed`));
		}
		if (pending) {
			return pending.promise;
		}
		const state = machine.getState();
		if (state === "connected") {
			return Promise.resolve();
		}
		if (state === "disconnecting") {
			return (closing ?? Promise.resolve()).then(() => connect({ timeoutMs, signal }));
		}
		if (signal?.aborted) {
			return Promise.reject(abortError(signal));
		}

		const job = createJob("connect");
		pending = job;
		machine.transition("connecting");

		if (signal) {
			const onAbort = () => job.controller.abort(abortError(signal));
			signal.addEventListener("abort", onAbort, { once: true });
			job.promise = runConnect(job, timeoutMs).finally(() => {
				signal.removeEventListener("abort", onAbort);
			});
		} else {
			job.promise = runConnect(job, timeoutMs);
		}
		return job.promise;
	}

	function beginDisconnect(cause?: Error): Promise<void> {
		const state = machine.getState();
		if (state === "disconnected") {
			return Promise.resolve();
		}
		if (state === "disconnecting") {
			return closing ?? Promise.resolve();
		}

		const job = pending;
		pending = null;
		job?.controller.abort(
			new CancelledError(`Connection to ${address} cancelled by disconnect()`),
		);

		const connection = link;
		resetLink(
			new ConnectionLostError(
				`Disconnected from ${address}`,
				cause ? { cause } : {},
			),
		);
		machine.transition("disconnecting", cause);

		const done = (async () => {
			if (job) {
				await settled(job.promise);
			}
			if (connection) {
				await releaseLink(connection);
			}
			await channel.post(() => {
				closing = null;
				machine.transition("disconnected", cause);
			});
		})();
		closing = done;
		return done;
	}

	function connect(opts: ConnectOptions = {}): Promise<void> {
		const timeoutMs = opts.timeoutMs ?? config.connectTimeoutMs;
		if (!(timeoutMs > 0)) {
			return Promise.reject(
				new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`),
			);
		}
		if (Number.isFinite(timeoutMs) && timeoutMs > MAX_TIMEOUT_MS) {
			return Promise.reject(
				new RangeError(`timeoutMs must not exceed ${MAX_TIMEOUT_MS}ms, got ${timeoutMs}`),
			);
		}
		return channel
			.post(() => ({ done: beginConnect(timeoutMs, opts.signal) }))
			.then(({ done }) => done);
	}

	function disconnect(): Promise<void> {
		return channel.post(() => ({ done: beginDisconnect() })).then(({ done }) => done);
	}

	function configure(changes: Partial<SessionConfig>): void {
		if (closed) {
			throw new Error(`Session ${id} is closed`);
		}
		const state = machine.getState();
		if (state !== "disconnected") {
			throw new Error(`Cannot reconfigure ${address} while ${state}`);
		}
		const next: SessionConfig = { ...config, ...changes };
		validateSessionConfig(next);
		config = next;
	}

	async function close(): Promise<void> {
		if (closed) return;
		closed = true;
		await disconnect();
		offDisconnect();
		offValue();
		queue.close(new CancelledError(`Session ${id} is closed`));
		events.emit("closed", address);
		events.removeAllListeners();
	}

	// ---------------------------------------------------------------------
	// Discovery
	// ---------------------------------------------------------------------

	function applyServices(gen: number, descriptors: ServiceDescriptor[]): ServiceTree {
		if (gen !== generation || !link) {
			throw new StaleHandleError(gen, generation);
		}
		const previous = new Map(characteristics);
		characteristics.clear();

		const tree: ServiceTree = {
			generation: gen,
			services: descriptors.map((service) => {
				const serviceUuid = normalizeUuid(service.uuid);
				return {
					uuid: serviceUuid,
					characteristics: service.characteristics.map((c) => {
						const characteristicUuid = normalizeUuid(c.uuid);
						const key = refKey({ serviceUuid, characteristicUuid });
						const discovered: DiscoveredCharacteristic = {
							uuid: characteristicUuid,
							properties: { ...c.properties },
							handle: { sessionId: id, generation: gen, serviceUuid, characteristicUuid },
						};
						const cached = previous.get(key)?.value;
						if (cached) {
							discovered.value = cached;
						}
						characteristics.set(key, discovered);
						return discovered;
					}),
				};
			}),
		};
		services = tree;
		log.debug(
			`${address}: discovered ${tree.services.length} services, ${characteristics.size} characteristics`,
		);
		return tree;
	}

	function enqueueDiscovery(
		connection: ConnectionHandle,
		gen: number,
		opts: OperationOptions = {},
	): Promise<ServiceTree> {
		return queue.enqueue(
			"discover",
			async ({ signal }) => {
				const descriptors = await backend.discoverServices(connection, { signal });
				return channel.post(() => applyServices(gen, descriptors));
			},
			{
				timeoutMs: opts.timeoutMs ?? config.discoverTimeoutMs,
				signal: opts.signal,
				label: `discover ${address}`,
			},
		);
	}

	async function discoverServices(opts: OperationOptions = {}): Promise<ServiceTree> {
		requireConnected();
		if (!link) {
			throw new NotConnectedError(machine.getState());
		}
		return enqueueDiscovery(link, generation, opts);
	}

	function getCharacteristic(
		serviceUuid: UuidLike,
		characteristicUuid: UuidLike,
	): DiscoveredCharacteristic | null {
		return (
			characteristics.get(
				refKey({
					serviceUuid: normalizeUuid(serviceUuid),
					characteristicUuid: normalizeUuid(characteristicUuid),
				}),
			) ?? null
		);
	}

	// ---------------------------------------------------------------------
	// GATT operations
	// ---------------------------------------------------------------------

	function requireConnected(): void {
		if (closed) {
			throw new CancelledError(`Session ${id} is closed`);
		}
		const state = machine.getState();
		if (state !== "connected") {
			throw new NotConnectedError(state);
		}
	}

	/** Checks a caller-held handle and returns the generation it belongs to. */
	function checkHandle(handle: CharacteristicHandle): number {
		if (handle.sessionId !== id) {
			throw new ProtocolError(
				`Characteristic handle belongs to session ${handle.sessionId}, not ${id}`,
			);
		}
		if (handle.generation !== generation) {
			throw new StaleHandleError(handle.generation, generation);
		}
		return handle.generation;
	}

	function toRef(target: Target, characteristicUuid?: UuidLike): CharacteristicRef {
		if (isHandle(target)) {
			return {
				serviceUuid: target.serviceUuid,
				characteristicUuid: target.characteristicUuid,
			};
		}
		if (characteristicUuid === undefined) {
			throw new TypeError("A characteristic UUID is required with a service UUID");
		}
		return {
			serviceUuid: normalizeUuid(target),
			characteristicUuid: normalizeUuid(characteristicUuid),
		};
	}

	/** Resolves a characteristic when its operation is dispatched. */
	function resolveCharacteristic(
		ref: CharacteristicRef,
		submitted: number,
	): { connection: ConnectionHandle; characteristic: DiscoveredCharacteristic } {
		if (!link) {
			throw new NotConnectedError(machine.getState());
		}
		if (submitted !== generation) {
			throw new StaleHandleError(submitted, generation);
		}
		const characteristic = characteristics.get(refKey(ref));
		if (!characteristic) {
			throw new UnsupportedError(
				`Characteristic ${describeRef(ref)} not found on ${address}`,
			);
		}
		return { connection: link, characteristic };
	}

	async function read(
		target: Target,
		second?: UuidLike | OperationOptions,
		third?: OperationOptions,
	): Promise<Uint8Array> {
		const handleForm = isHandle(target);
		const ref = toRef(target, typeof second === "object" ? undefined : second);
		const opts = (handleForm ? (typeof second === "object" ? second : undefined) : third) ?? {};
		requireConnected();
		const submitted = handleForm ? checkHandle(target) : generation;

		return queue.enqueue(
			"read",
			async ({ signal }) => {
				const { connection, characteristic } = resolveCharacteristic(ref, submitted);
				if (!characteristic.properties.read) {
					throw new UnsupportedError(`Characteristic ${describeRef(ref)} does not support read`);
				}
				const value = await backend.readCharacteristic(connection, ref, { signal });
				characteristic.value = value;
				return value;
			},
			{
				timeoutMs: opts.timeoutMs ?? config.readTimeoutMs,
				signal: opts.signal,
				label: `read ${describeRef(ref)}`,
			},
		);
	}

	async function write(
		target: Target,
		second: UuidLike | BytesLike,
		third?: BytesLike | WriteMode,
		fourth?: WriteMode | OperationOptions,
		fifth?: OperationOptions,
	): Promise<void> {
		let ref: CharacteristicRef;
		let payload: BytesLike;
		let mode: WriteMode = "withResponse";
		let opts: OperationOptions = {};
		let submitted: number;

		if (isHandle(target)) {
			if (typeof second !== "object") {
				throw new TypeError("write(handle, data) expects bytes as the second argument");
			}
			ref = toRef(target);
			payload = second;
			if (typeof third === "string") mode = third;
			if (typeof fourth === "object") opts = fourth;
			requireConnected();
			submitted = checkHandle(target);
		} else {
			if (typeof second === "object" || third === undefined || typeof third === "string") {
				throw new TypeError("write(service, characteristic, data) expects bytes as the third argument");
			}
			ref = toRef(target, second);
			payload = third;
			if (typeof fourth === "string") mode = fourth;
			if (fifth) opts = fifth;
			requireConnected();
			submitted = generation;
		}

		const data = toBytes(payload);
		log.debug(`${address}: write ${describeRef(ref)} ${mode}: ${toHex(data)}`);

		await queue.enqueue(
			"write",
			async ({ signal }) => {
				const { connection, characteristic } = resolveCharacteristic(ref, submitted);
				const supported =
					mode === "withResponse"
						? characteristic.properties.write
						: characteristic.properties.writeWithoutResponse;
				if (!supported) {
					throw new UnsupportedError(
						`Characteristic ${describeRef(ref)} does not support write ${mode}`,
					);
				}
				await backend.writeCharacteristic(connection, ref, data, mode, { signal });
			},
			{
				timeoutMs: opts.timeoutMs ?? config.writeTimeoutMs,
				signal: opts.signal,
				label: `write ${describeRef(ref)}`,
			},
		);
	}

	async function subscribe(
		target: Target,
		second?: UuidLike | SubscribeOptions,
		third?: SubscribeOptions,
	): Promise<NotificationStream> {
		const handleForm = isHandle(target);
		const ref = toRef(target, typeof second === "object" ? undefined : second);
		const opts = (handleForm ? (typeof second === "object" ? second : undefined) : third) ?? {};
		requireConnected();
		if (handleForm) {
			checkHandle(target);
		}
		return multiplexer.subscribe(ref, {
			...opts,
			bufferSize: opts.bufferSize ?? config.bufferSize,
		});
	}

	return {
		id,
		address,
		get state() {
			return machine.getState();
		},
		get generation() {
			return generation;
		},
		get lastError() {
			return lastError;
		},
		get queueDepth() {
			return queue.getQueueDepth();
		},
		get closed() {
			return closed;
		},
		connect,
		disconnect,
		configure,
		close,
		discoverServices,
		getServices: () => services,
		getCharacteristic,
		read,
		write,
		subscribe,
		onStateChange: (callback) => events.on("state", callback),
		onClose: (callback) => events.on("closed", () => callback()),
	};
}
