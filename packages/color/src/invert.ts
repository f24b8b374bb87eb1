/**
 * Image-level lightness inversion
 */

import { type ChannelCount, type ImageData, mapPixels } from '@lumaflip/core'
import { invertLightness } from './convert'
import type { PixelTransform } from './types'

/**
 * Apply a color transform to every pixel.
 * 4-channel images keep their alpha; 3-channel images are written fully opaque.
 */
export function transformImage(
	image: ImageData,
	channels: ChannelCount,
	transform: PixelTransform = invertLightness
): ImageData {
	return mapPixels(image, (r, g, b, a) => {
		const [nr, ng, nb] = transform(r, g, b)
		return [nr, ng, nb, channels === 4 ? a : 255]
	})
}

/**
 * Invert the lightness of every pixel
 */
export function invertImage(image: ImageData, channels: ChannelCount = 4): ImageData {
	return transformImage(image, channels, invertLightness)
}

/**
 * Apply a color transform in place to a BGRA pixel run
 * (the channel order of 32-bit bitmaps).
 */
export function transformBgra(
	data: Uint8Array,
	start: number,
	pixelCount: number,
	transform: PixelTransform = invertLightness
): void {
	for (let i = 0; i < pixelCount; i++) {
		const idx = start + i * 4
		const [r, g, b] = transform(data[idx + 2]!, data[idx + 1]!, data[idx]!)
		data[idx] = b
		data[idx + 1] = g
		data[idx + 2] = r
	}
}
