import {
	type ChannelCount,
	type DecodedImage,
	readI32LE,
	readU16LE,
	readU32LE,
} from '@lumaflip/core'

/**
 * BMP compression types
 */
export const BI_RGB = 0
export const BI_BITFIELDS = 3

/** Size of the BITMAPFILEHEADER that precedes the DIB in a .bmp file */
export const BMP_FILE_HEADER_SIZE = 14

/**
 * Decode BMP file to RGBA.
 * Handles 24-bit and 32-bit true-color bitmaps, bottom-up or top-down.
 */
export function decodeBmp(data: Uint8Array): DecodedImage {
	// Validate signature
	if (data[0] !== 0x42 || data[1] !== 0x4d) {
		throw new Error('Invalid BMP signature')
	}

	const dataOffset = readU32LE(data, 10)
	return decodeDibPixels(data, BMP_FILE_HEADER_SIZE, dataOffset)
}

/**
 * Decode a headerless DIB (BITMAPINFOHEADER followed by pixels), as stored
 * inside icon containers. The stored height is doubled there to cover the AND
 * mask, which is not read.
 */
export function decodeDib(data: Uint8Array): DecodedImage {
	const dibSize = readU32LE(data, 0)
	return decodeDibPixels(data, 0, dibSize, true)
}

function decodeDibPixels(
	data: Uint8Array,
	dibOffset: number,
	pixelOffset: number,
	doubledHeight = false
): DecodedImage {
	const dibSize = readU32LE(data, dibOffset)
	if (dibSize < 40) {
		throw new Error(`Unsupported DIB header size: ${dibSize}`)
	}

	const width = readI32LE(data, dibOffset + 4)
	const storedHeight = readI32LE(data, dibOffset + 8)
	const height = doubledHeight ? Math.trunc(storedHeight / 2) : storedHeight
	const bitsPerPixel = readU16LE(data, dibOffset + 14)
	const compression = readU32LE(data, dibOffset + 16)

	// Negative height means top-down rows
	const topDown = height < 0
	const absHeight = Math.abs(height)

	if (width <= 0 || absHeight <= 0) {
		throw new Error(`Invalid dimensions: ${width}x${absHeight}`)
	}
	if (bitsPerPixel !== 24 && bitsPerPixel !== 32) {
		throw new Error(`Unsupported bits per pixel: ${bitsPerPixel}`)
	}
	if (compression !== BI_RGB && !(compression === BI_BITFIELDS && bitsPerPixel === 32)) {
		throw new Error(`Unsupported compression: ${compression}`)
	}

	let masks: [number, number, number, number] | null = null
	if (compression === BI_BITFIELDS) {
		// Masks live in the V4+ header, or right after a 40-byte header
		const maskOffset = dibOffset + 40
		masks = [
			readU32LE(data, maskOffset),
			readU32LE(data, maskOffset + 4),
			readU32LE(data, maskOffset + 8),
			dibSize >= 56 ? readU32LE(data, maskOffset + 12) : 0,
		]
		if (dibSize === 40) pixelOffset = Math.max(pixelOffset, maskOffset + 12)
	}

	// Rows are padded to 4 bytes
	const rowStride = Math.floor((bitsPerPixel * width + 31) / 32) * 4
	if (pixelOffset + rowStride * absHeight > data.length) {
		throw new Error('BMP pixel data is truncated')
	}

	const output = new Uint8Array(width * absHeight * 4)
	let alphaSeen = false

	for (let y = 0; y < absHeight; y++) {
		const srcY = topDown ? y : absHeight - 1 - y
		const srcRowOffset = pixelOffset + srcY * rowStride

		for (let x = 0; x < width; x++) {
			const dstIdx = (y * width + x) * 4

			if (bitsPerPixel === 24) {
				const src = srcRowOffset + x * 3
				output[dstIdx] = data[src + 2]!
				output[dstIdx + 1] = data[src + 1]!
				output[dstIdx + 2] = data[src]!
				output[dstIdx + 3] = 255
				continue
			}

			const src = srcRowOffset + x * 4
			if (masks) {
				const pixel = readU32LE(data, src)
				output[dstIdx] = applyMask(pixel, masks[0])
				output[dstIdx + 1] = applyMask(pixel, masks[1])
				output[dstIdx + 2] = applyMask(pixel, masks[2])
				output[dstIdx + 3] = masks[3] ? applyMask(pixel, masks[3]) : 255
			} else {
				output[dstIdx] = data[src + 2]!
				output[dstIdx + 1] = data[src + 1]!
				output[dstIdx + 2] = data[src]!
				output[dstIdx + 3] = data[src + 3]!
			}
			if (output[dstIdx + 3] !== 0) alphaSeen = true
		}
	}

	let channels: ChannelCount = bitsPerPixel === 32 && (!masks || masks[3] !== 0) ? 4 : 3

	// 32-bit BI_RGB files often leave the fourth byte zeroed: read that as opaque
	if (channels === 4 && !alphaSeen) {
		channels = 3
		for (let i = 3; i < output.length; i += 4) output[i] = 255
	}

	return { image: { width, height: absHeight, data: output }, channels, format: 'bmp' }
}

/**
 * Apply bit mask and normalize to 0-255
 */
function applyMask(value: number, mask: number): number {
	if (mask === 0) return 0

	let m = mask >>> 0

	// Find shift amount (trailing zeros)
	let shift = 0
	while ((m & 1) === 0) {
		shift++
		m = m >>> 1
	}

	// Count bits in mask
	let bits = 0
	let temp = m
	while (temp) {
		bits += temp & 1
		temp = temp >>> 1
	}

	const extracted = ((value & mask) >>> shift) & 0xff
	return bits >= 8 ? extracted >>> (bits - 8) : extracted << (8 - bits)
}
