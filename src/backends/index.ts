import type { BackendAdapter, BackendName } from "../types";
import { createBluezBackend } from "./bluez";
import { createNobleBackend } from "./noble";

/**
 * Creates a native backend by name. Nothing native is loaded until the
 * backend is first used; a missing stack then surfaces as
 * AdapterUnavailableError.
 */
export function createBackend(name: BackendName): BackendAdapter {
	switch (name) {
		case "noble":
			return createNobleBackend();
		case "bluez":
			return createBluezBackend();
	}
}

export {
	type BluezBackendOptions,
	type BluezStack,
	createBluezBackend,
	DEFAULT_POLL_INTERVAL_MS,
	importNodeBle,
	mapBluezError,
} from "./bluez";

export {
	type BackendCall,
	type BackendMethod,
	type ConnectBehavior,
	createMemoryBackend,
	type MemoryBackend,
	type MemoryBackendOptions,
	type SimulatedCharacteristic,
	type SimulatedDevice,
	type SimulatedService,
} from "./memory";

export {
	createNobleBackend,
	DEFAULT_STATE_TIMEOUT_MS,
	importNoble,
	mapNobleError,
	type NobleBackendOptions,
	type NobleLike,
} from "./noble";

export { NO_PROPERTIES, propertiesFromFlags } from "./properties";
