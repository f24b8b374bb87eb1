/**
 * PNG color types
 */
export const ColorType = {
	Grayscale: 0,
	RGB: 2,
	Indexed: 3,
	GrayscaleAlpha: 4,
	RGBA: 6,
} as const

export type ColorType = (typeof ColorType)[keyof typeof ColorType]

/**
 * PNG chunk types this package looks at
 */
export const ChunkType = {
	IHDR: 0x49484452,
	IEND: 0x49454e44,
	tRNS: 0x74524e53,
} as const

/**
 * PNG signature bytes
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10])

/**
 * IHDR chunk data
 */
export interface IHDRData {
	width: number
	height: number
	bitDepth: number
	colorType: number
	interlaceMethod: number
}

/**
 * Chunk position inside a PNG stream
 */
export interface PngChunk {
	type: number
	offset: number // start of the length field
	length: number // data length
}
