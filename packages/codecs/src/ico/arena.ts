/**
 * Growable byte buffer owned by one processing session.
 * Entries refer to it by offset and length; growth only ever appends.
 */
export class ByteArena {
	private buffer: Uint8Array
	private size: number

	constructor(initial: Uint8Array) {
		this.buffer = new Uint8Array(Math.max(initial.length, 16))
		this.buffer.set(initial)
		this.size = initial.length
	}

	get length(): number {
		return this.size
	}

	/**
	 * Live view of a range; invalidated by the next append
	 */
	view(offset: number, length: number): Uint8Array {
		if (offset < 0 || length < 0 || offset + length > this.size) {
			throw new RangeError(`Range ${offset}+${length} is outside the arena (${this.size} bytes)`)
		}
		return this.buffer.subarray(offset, offset + length)
	}

	write(offset: number, bytes: Uint8Array): void {
		this.view(offset, bytes.length).set(bytes)
	}

	fill(offset: number, length: number, value = 0): void {
		this.view(offset, length).fill(value)
	}

	/**
	 * Append bytes at the end and return their offset
	 */
	append(bytes: Uint8Array): number {
		const offset = this.size
		const needed = this.size + bytes.length
		if (needed > this.buffer.length) {
			let capacity = this.buffer.length
			while (capacity < needed) capacity *= 2
			const grown = new Uint8Array(capacity)
			grown.set(this.buffer.subarray(0, this.size))
			this.buffer = grown
		}
		this.buffer.set(bytes, offset)
		this.size = needed
		return offset
	}

	toBytes(): Uint8Array {
		return this.buffer.slice(0, this.size)
	}
}
