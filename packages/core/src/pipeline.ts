import type { ImageData } from './types'

/**
 * Per-pixel mapping function
 */
export type PixelMapper = (
	r: number,
	g: number,
	b: number,
	a: number,
	x: number,
	y: number
) => [number, number, number, number]

/**
 * Map over image pixels, returning a new image
 */
export function mapPixels(image: ImageData, fn: PixelMapper): ImageData {
	const { width, height, data } = image
	const output = new Uint8Array(data.length)

	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const idx = (y * width + x) * 4
			const [r, g, b, a] = fn(data[idx]!, data[idx + 1]!, data[idx + 2]!, data[idx + 3]!, x, y)
			output[idx] = r
			output[idx + 1] = g
			output[idx + 2] = b
			output[idx + 3] = a
		}
	}

	return { width, height, data: output }
}
