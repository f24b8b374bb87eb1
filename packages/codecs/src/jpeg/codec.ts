import type { DecodedImage, EncodeOptions, ImageCodec, ImageData } from '@lumaflip/core'
import jpeg from 'jpeg-js'

/**
 * Quality used when the caller gives none
 */
export const DEFAULT_JPEG_QUALITY = 95

/**
 * Decode JPEG to RGBA. JPEG has no alpha, so the result is always 3-channel.
 */
export function decodeJpeg(data: Uint8Array): DecodedImage {
	const decoded = jpeg.decode(data, { useTArray: true, formatAsRGBA: true })
	return {
		image: { width: decoded.width, height: decoded.height, data: decoded.data },
		channels: 3,
		format: 'jpeg',
	}
}

/**
 * Encode RGBA image data to baseline JPEG
 */
export function encodeJpeg(image: ImageData, options: EncodeOptions = {}): Uint8Array {
	const quality = Math.min(100, Math.max(1, Math.round(options.quality ?? DEFAULT_JPEG_QUALITY)))
	const encoded = jpeg.encode({ width: image.width, height: image.height, data: image.data }, quality)
	return new Uint8Array(encoded.data)
}

/**
 * JPEG codec implementation
 */
export const JpegCodec: ImageCodec = {
	format: 'jpeg',

	decode(data: Uint8Array): DecodedImage {
		return decodeJpeg(data)
	},

	encode(image: ImageData, options?: EncodeOptions): Uint8Array {
		return encodeJpeg(image, options)
	},
}
