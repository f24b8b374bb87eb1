import { type ImageData, writeU16LE, writeU32LE } from '@lumaflip/core'
import { encodePng } from '../png'
import { directoryEnd, serializeDirectory } from './parser'
import { BITMAP_INFO_HEADER_SIZE, ICO_TYPE, type IconDirEntry } from './types'

export interface IcoEncodeOptions {
	/** Embed entries as PNG streams or as 32-bit bitmaps (default png) */
	payload?: 'png' | 'bmp'
}

export interface SingleEntryOptions {
	width: number
	height: number
	bitCount: number
}

/**
 * Build a one-image container around an already encoded payload.
 * Dimensions are stored in 8 bits, so 256 becomes 0.
 */
export function wrapSingleEntry(payload: Uint8Array, options: SingleEntryOptions): Uint8Array {
	const offset = directoryEnd(1)
	const entry: IconDirEntry = {
		width: options.width & 0xff,
		height: options.height & 0xff,
		colorCount: 0,
		reserved: 0,
		planes: 1,
		bitCount: options.bitCount,
		bytesInRes: payload.length,
		imageOffset: offset,
	}

	const output = new Uint8Array(offset + payload.length)
	output.set(serializeDirectory({ reserved: 0, type: ICO_TYPE, count: 1 }, [entry]))
	output.set(payload, offset)
	return output
}

/**
 * Encode a 32-bit DIB as stored in icons: doubled height, bottom-up BGRA rows,
 * followed by an all-zero AND mask
 */
export function encodeDib(image: ImageData): Uint8Array {
	const { width, height, data } = image
	const pixelBytes = width * height * 4
	const maskStride = Math.ceil(width / 32) * 4
	const output = new Uint8Array(BITMAP_INFO_HEADER_SIZE + pixelBytes + maskStride * height)

	writeU32LE(output, 0, BITMAP_INFO_HEADER_SIZE)
	writeU32LE(output, 4, width)
	writeU32LE(output, 8, height * 2)
	writeU16LE(output, 12, 1) // Planes
	writeU16LE(output, 14, 32) // Bits per pixel
	writeU32LE(output, 16, 0) // BI_RGB
	writeU32LE(output, 20, pixelBytes)

	for (let y = 0; y < height; y++) {
		const srcRowOffset = (height - 1 - y) * width * 4
		const dstRowOffset = BITMAP_INFO_HEADER_SIZE + y * width * 4
		for (let x = 0; x < width; x++) {
			const src = srcRowOffset + x * 4
			const dst = dstRowOffset + x * 4
			output[dst] = data[src + 2]!
			output[dst + 1] = data[src + 1]!
			output[dst + 2] = data[src]!
			output[dst + 3] = data[src + 3]!
		}
	}

	return output
}

/**
 * Encode images into a single ICO file
 */
export function encodeIco(images: readonly ImageData[], options: IcoEncodeOptions = {}): Uint8Array {
	if (images.length === 0) {
		throw new Error('At least one image is required')
	}

	const payloads: Uint8Array[] = []
	for (const image of images) {
		if (image.width > 256 || image.height > 256) {
			throw new Error(`ICO image dimensions must be <= 256 (got ${image.width}x${image.height})`)
		}
		payloads.push(options.payload === 'bmp' ? encodeDib(image) : encodePng(image))
	}

	let imageOffset = directoryEnd(images.length)
	const entries: IconDirEntry[] = images.map((image, i) => {
		const length = payloads[i]!.length
		const entry: IconDirEntry = {
			width: image.width & 0xff,
			height: image.height & 0xff,
			colorCount: 0,
			reserved: 0,
			planes: 1,
			bitCount: 32,
			bytesInRes: length,
			imageOffset,
		}
		imageOffset += length
		return entry
	})

	const output = new Uint8Array(imageOffset)
	output.set(serializeDirectory({ reserved: 0, type: ICO_TYPE, count: images.length }, entries))
	for (let i = 0; i < payloads.length; i++) {
		output.set(payloads[i]!, entries[i]!.imageOffset)
	}
	return output
}
