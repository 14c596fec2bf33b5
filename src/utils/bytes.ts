/** Anything the library accepts as a GATT payload */
export type BytesLike = Uint8Array | ArrayBuffer | DataView | readonly number[];

/**
 * Copies a payload into a fresh Uint8Array.
 *
 * Native stacks hand out Node Buffers that may be slices of a shared pool,
 * so values crossing the backend boundary are always copied.
 */
export function toBytes(data: BytesLike): Uint8Array {
	if (data instanceof Uint8Array) {
		return Uint8Array.from(data);
	}
	if (data instanceof ArrayBuffer) {
		return new Uint8Array(data.slice(0));
	}
	if (ArrayBuffer.isView(data)) {
		const copy = new Uint8Array(data.byteLength);
		copy.set(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
		return copy;
	}
	for (const byte of data) {
		if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
			throw new RangeError(`Byte values must be integers 0-255, got ${byte}`);
		}
	}
	return Uint8Array.from(data);
}

/**
 * Formats bytes as space separated hex for log output.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([0xa7, 0xb3, 0x01])); // "a7 b3 01"
 * ```
 */
export function toHex(data: Uint8Array, maxBytes = 32): string {
	const shown = Array.from(data.subarray(0, maxBytes), (b) =>
		b.toString(16).padStart(2, "0"),
	).join(" ");
	return data.length > maxBytes ? `${shown} …(+${data.length - maxBytes})` : shown;
}
