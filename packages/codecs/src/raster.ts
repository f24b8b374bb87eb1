/**
 * Format-dispatched raster decode and encode
 */

import {
	type DecodedImage,
	type EncodeOptions,
	type ImageCodec,
	type ImageData,
	type RasterFormat,
	detectRasterFormat,
	errorMessage,
} from '@lumaflip/core'
import { BmpCodec } from './bmp'
import { JpegCodec } from './jpeg'
import { PngCodec } from './png'

export const CODECS: Record<RasterFormat, ImageCodec> = {
	png: PngCodec,
	jpeg: JpegCodec,
	bmp: BmpCodec,
}

const FORCED_ORDER: readonly RasterFormat[] = ['png', 'jpeg', 'bmp']

/**
 * Decode a raster image, detecting the format from its magic bytes unless given
 */
export function decodeRaster(data: Uint8Array, format?: RasterFormat): DecodedImage {
	const resolved = format ?? detectRasterFormat(data)
	if (!resolved) {
		throw new Error('Unknown image format')
	}
	return CODECS[resolved].decode(data)
}

/**
 * Decode with every codec in turn, the detected one first.
 * Used on buffers whose headers cannot be trusted.
 */
export function decodeRasterForced(data: Uint8Array): DecodedImage {
	const detected = detectRasterFormat(data)
	const order = detected ? [detected, ...FORCED_ORDER.filter((f) => f !== detected)] : FORCED_ORDER
	const failures: string[] = []

	for (const format of order) {
		try {
			return CODECS[format].decode(data)
		} catch (err) {
			failures.push(`${format}: ${errorMessage(err)}`)
		}
	}

	throw new Error(`No decoder accepted the data (${failures.join('; ')})`)
}

/**
 * Encode image data to the given raster format
 */
export function encodeRaster(
	image: ImageData,
	format: RasterFormat,
	options?: EncodeOptions
): Uint8Array {
	return CODECS[format].encode(image, options)
}
