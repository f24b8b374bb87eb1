import { type ChannelCount, type DecodedImage, readU32BE, startsWith } from '@lumaflip/core'
import { PNG } from 'pngjs'
import { ChunkType, ColorType, type IHDRData, PNG_SIGNATURE, type PngChunk } from './types'

/**
 * Check if data starts with the PNG signature
 */
export function isPng(data: Uint8Array): boolean {
	return startsWith(data, PNG_SIGNATURE)
}

/**
 * Walk the chunk list up to and including IEND.
 * Stops early at a chunk whose declared length runs past the buffer.
 */
export function readChunks(data: Uint8Array): PngChunk[] {
	const chunks: PngChunk[] = []
	let offset = PNG_SIGNATURE.length

	while (offset + 12 <= data.length) {
		const length = readU32BE(data, offset)
		const type = readU32BE(data, offset + 4)
		if (offset + 12 + length > data.length) break

		chunks.push({ type, offset, length })
		offset += 12 + length
		if (type === ChunkType.IEND) break
	}

	return chunks
}

/**
 * Offset just past the IEND chunk, or the buffer length when there is none
 */
export function findPngEnd(data: Uint8Array): number {
	const last = readChunks(data).at(-1)
	if (last?.type !== ChunkType.IEND) return data.length
	return last.offset + 12 + last.length
}

/**
 * Read the IHDR chunk
 */
export function readPngHeader(data: Uint8Array): IHDRData {
	if (!isPng(data)) {
		throw new Error('Invalid PNG signature')
	}

	const first = readChunks(data)[0]
	if (first?.type !== ChunkType.IHDR || first.length < 13) {
		throw new Error('PNG is missing its IHDR chunk')
	}

	const start = first.offset + 8
	return {
		width: readU32BE(data, start),
		height: readU32BE(data, start + 4),
		bitDepth: data[start + 8]!,
		colorType: data[start + 9]!,
		interlaceMethod: data[start + 12]!,
	}
}

/**
 * Channels the PNG actually stores: 4 with an alpha channel or a tRNS chunk, else 3
 */
export function pngChannels(data: Uint8Array): ChannelCount {
	const { colorType } = readPngHeader(data)
	if (colorType === ColorType.RGBA || colorType === ColorType.GrayscaleAlpha) return 4
	return readChunks(data).some((chunk) => chunk.type === ChunkType.tRNS) ? 4 : 3
}

/**
 * Decode PNG to RGBA. Bytes after IEND are ignored.
 */
export function decodePng(data: Uint8Array): DecodedImage {
	const stream = data.subarray(0, findPngEnd(data))
	const channels = pngChannels(stream)
	const png = PNG.sync.read(Buffer.from(stream.buffer, stream.byteOffset, stream.byteLength))

	return {
		image: { width: png.width, height: png.height, data: new Uint8Array(png.data) },
		channels,
		format: 'png',
	}
}
