/**
 * Little-endian field access over byte buffers.
 * Reads past the end of the buffer yield 0 for the missing bytes.
 */

export function readU16LE(data: Uint8Array, offset: number): number {
	return (data[offset] ?? 0) | ((data[offset + 1] ?? 0) << 8)
}

export function readU32LE(data: Uint8Array, offset: number): number {
	return (
		((data[offset] ?? 0) |
			((data[offset + 1] ?? 0) << 8) |
			((data[offset + 2] ?? 0) << 16) |
			((data[offset + 3] ?? 0) << 24)) >>>
		0
	)
}

export function readI32LE(data: Uint8Array, offset: number): number {
	return readU32LE(data, offset) | 0
}

export function readU32BE(data: Uint8Array, offset: number): number {
	return (
		(((data[offset] ?? 0) << 24) |
			((data[offset + 1] ?? 0) << 16) |
			((data[offset + 2] ?? 0) << 8) |
			(data[offset + 3] ?? 0)) >>>
		0
	)
}

export function writeU16LE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
}

export function writeU32LE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
	data[offset + 2] = (value >> 16) & 0xff
	data[offset + 3] = (value >>> 24) & 0xff
}

/**
 * Check whether `signature` occurs in `data` at `offset`
 */
export function startsWith(data: Uint8Array, signature: Uint8Array, offset = 0): boolean {
	if (offset < 0 || data.length < offset + signature.length) return false
	for (let i = 0; i < signature.length; i++) {
		if (data[offset + i] !== signature[i]) return false
	}
	return true
}

/**
 * First offset at or after `from` where `signature` occurs, or -1
 */
export function indexOfSignature(data: Uint8Array, signature: Uint8Array, from = 0): number {
	const last = data.length - signature.length
	for (let offset = Math.max(0, from); offset <= last; offset++) {
		if (startsWith(data, signature, offset)) return offset
	}
	return -1
}
