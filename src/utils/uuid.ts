/** Bluetooth Base UUID suffix for constructing full UUIDs */
export const BLUETOOTH_UUID_BASE = "-0000-1000-8000-00805f9b34fb";

const FULL_UUID_PATTERN =
	/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const HEX_PATTERN = /^[0-9a-f]+$/;

/**
 * Converts a short UUID to a full Bluetooth Base UUID.
 * @param shortId - A number (0-65535) or hex string (1-4 chars)
 * @throws RangeError if number is out of 16-bit range
 * @throws Error if string is invalid hex or empty
 *
 * @example
 * ```typescript
 * toFullUuid(0xfe00); // "0000fe00-0000-1000-8000-00805f9b34fb"
 * toFullUuid("1");    // "00000001-0000-1000-8000-00805f9b34fb"
 * ```
 */
export function toFullUuid(shortId: number | string): string {
	if (typeof shortId === "number") {
		if (!Number.isInteger(shortId) || shortId < 0 || shortId > 0xffff) {
			throw new RangeError(
				`Short UUID must be integer 0-65535, got ${shortId}`,
			);
		}
		return `0000${shortId.toString(16).padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
	}

	if (shortId.length === 0 || shortId.length > 4) {
		throw new Error(
			`Invalid short UUID length: ${shortId.length} (must be 1-4)`,
		);
	}

	if (!/^[0-9a-fA-F]+$/.test(shortId)) {
		throw new Error(`Invalid short UUID format: ${shortId} (must be hex)`);
	}

	return `0000${shortId.toLowerCase().padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
}

/**
 * Normalizes any UUID spelling a native stack may hand out into the
 * lower-case, dashed 128-bit form used throughout the library.
 *
 * Accepts 16-bit numbers, 16-bit and 32-bit hex short forms, 32 hex digits
 * without dashes (noble) and the dashed 128-bit form (BlueZ, WinRT).
 *
 * @example
 * ```typescript
 * normalizeUuid("FFE1");                             // "0000ffe1-0000-1000-8000-00805f9b34fb"
 * normalizeUuid("6e400001b5a3f393e0a9e50e24dcca9e"); // "6e400001-b5a3-f393-e0a9-e50e24dcca9e"
 * ```
 */
export function normalizeUuid(uuid: number | string): string {
	if (typeof uuid === "number") {
		return toFullUuid(uuid);
	}

	const lower = uuid.trim().toLowerCase();

	if (FULL_UUID_PATTERN.test(lower)) {
		return lower;
	}

	const compact = lower.replace(/-/g, "");
	if (!HEX_PATTERN.test(compact)) {
		throw new Error(`Invalid UUID: ${uuid}`);
	}

	if (compact.length <= 4) {
		return toFullUuid(compact);
	}

	if (compact.length === 8) {
		return `${compact}${BLUETOOTH_UUID_BASE}`;
	}

	if (compact.length === 32) {
		return `${compact.slice(0, 8)}-${compact.slice(8, 12)}-${compact.slice(12, 16)}-${compact.slice(16, 20)}-${compact.slice(20)}`;
	}

	throw new Error(`Invalid UUID length: ${uuid}`);
}

/**
 * Converts a UUID into the compact spelling noble uses: the 16-bit short
 * form for Bluetooth Base UUIDs, 32 hex digits without dashes otherwise.
 */
export function toCompactUuid(uuid: number | string): string {
	const full = normalizeUuid(uuid);
	if (full.endsWith(BLUETOOTH_UUID_BASE) && full.startsWith("0000")) {
		return full.substring(4, 8);
	}
	return full.replace(/-/g, "");
}

/**
 * Compares two UUIDs regardless of spelling (short, compact or dashed).
 * Returns false when either side is not a valid UUID.
 */
export function sameUuid(a: number | string, b: number | string): boolean {
	try {
		return normalizeUuid(a) === normalizeUuid(b);
	} catch {
		return false;
	}
}
