import { type EncodeOptions, type ImageData, writeU16LE, writeU32LE } from '@lumaflip/core'
import { BI_BITFIELDS, BI_RGB, BMP_FILE_HEADER_SIZE } from './decoder'

const V4_HEADER_SIZE = 108
const INFO_HEADER_SIZE = 40

/**
 * Encode RGBA image data to BMP.
 * 4-channel images become 32-bit BITMAPV4HEADER files with an alpha mask,
 * 3-channel images become 24-bit BITMAPINFOHEADER files.
 */
export function encodeBmp(image: ImageData, options: EncodeOptions = {}): Uint8Array {
	return options.channels === 3 ? encodeBmp24(image) : encodeBmp32(image)
}

function writeFileHeader(output: Uint8Array, dataOffset: number): void {
	output[0] = 0x42 // 'B'
	output[1] = 0x4d // 'M'
	writeU32LE(output, 2, output.length)
	writeU32LE(output, 6, 0) // Reserved
	writeU32LE(output, 10, dataOffset)
}

function encodeBmp32(image: ImageData): Uint8Array {
	const { width, height, data } = image
	const dataOffset = BMP_FILE_HEADER_SIZE + V4_HEADER_SIZE
	const pixelDataSize = width * height * 4

	const output = new Uint8Array(dataOffset + pixelDataSize)
	writeFileHeader(output, dataOffset)

	// BITMAPV4HEADER
	writeU32LE(output, 14, V4_HEADER_SIZE)
	writeU32LE(output, 18, width)
	writeU32LE(output, 22, height) // Positive = bottom-up
	writeU16LE(output, 26, 1) // Planes
	writeU16LE(output, 28, 32) // Bits per pixel
	writeU32LE(output, 30, BI_BITFIELDS)
	writeU32LE(output, 34, pixelDataSize)
	writeU32LE(output, 38, 2835) // X pixels per meter (~72 DPI)
	writeU32LE(output, 42, 2835) // Y pixels per meter

	writeU32LE(output, 54, 0x00ff0000) // Red mask
	writeU32LE(output, 58, 0x0000ff00) // Green mask
	writeU32LE(output, 62, 0x000000ff) // Blue mask
	writeU32LE(output, 66, 0xff000000) // Alpha mask
	writeU32LE(output, 70, 0x73524742) // LCS_sRGB; endpoints and gamma stay zero

	for (let y = 0; y < height; y++) {
		const srcRowOffset = (height - 1 - y) * width * 4
		const dstRowOffset = dataOffset + y * width * 4

		for (let x = 0; x < width; x++) {
			const srcIdx = srcRowOffset + x * 4
			const dstIdx = dstRowOffset + x * 4
			output[dstIdx] = data[srcIdx + 2]!
			output[dstIdx + 1] = data[srcIdx + 1]!
			output[dstIdx + 2] = data[srcIdx]!
			output[dstIdx + 3] = data[srcIdx + 3]!
		}
	}

	return output
}

function encodeBmp24(image: ImageData): Uint8Array {
	const { width, height, data } = image
	const dataOffset = BMP_FILE_HEADER_SIZE + INFO_HEADER_SIZE
	const rowStride = Math.floor((24 * width + 31) / 32) * 4
	const pixelDataSize = rowStride * height

	const output = new Uint8Array(dataOffset + pixelDataSize)
	writeFileHeader(output, dataOffset)

	writeU32LE(output, 14, INFO_HEADER_SIZE)
	writeU32LE(output, 18, width)
	writeU32LE(output, 22, height)
	writeU16LE(output, 26, 1)
	writeU16LE(output, 28, 24)
	writeU32LE(output, 30, BI_RGB)
	writeU32LE(output, 34, pixelDataSize)
	writeU32LE(output, 38, 2835)
	writeU32LE(output, 42, 2835)

	for (let y = 0; y < height; y++) {
		const srcRowOffset = (height - 1 - y) * width * 4
		const dstRowOffset = dataOffset + y * rowStride

		for (let x = 0; x < width; x++) {
			const srcIdx = srcRowOffset + x * 4
			const dstIdx = dstRowOffset + x * 3
			output[dstIdx] = data[srcIdx + 2]!
			output[dstIdx + 1] = data[srcIdx + 1]!
			output[dstIdx + 2] = data[srcIdx]!
		}
	}

	return output
}
