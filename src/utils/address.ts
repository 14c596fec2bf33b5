const MAC_PATTERN = /^[0-9a-f]{2}([:-][0-9a-f]{2}){5}$/i;

/**
 * Normalizes a device address: MAC addresses become upper-case and
 * colon separated, opaque platform identifiers are returned unchanged.
 *
 * @example
 * ```typescript
 * normalizeAddress("aa-bb-cc-dd-ee-ff"); // "AA:BB:CC:DD:EE:FF"
 * normalizeAddress("3f2a9c1e0b7d4e1f"); // unchanged (CoreBluetooth id)
 * ```
 */
export function normalizeAddress(address: string): string {
	const trimmed = address.trim();
	if (MAC_PATTERN.test(trimmed)) {
		return trimmed.replace(/-/g, ":").toUpperCase();
	}
	return trimmed;
}

export function isMacAddress(address: string): boolean {
	return MAC_PATTERN.test(address.trim());
}
