import type { DecodedImage, EncodeOptions, ImageCodec, ImageData } from '@lumaflip/core'
import { decodeBmp } from './decoder'
import { encodeBmp } from './encoder'

/**
 * BMP codec implementation
 */
export const BmpCodec: ImageCodec = {
	format: 'bmp',

	decode(data: Uint8Array): DecodedImage {
		return decodeBmp(data)
	},

	encode(image: ImageData, options?: EncodeOptions): Uint8Array {
		return encodeBmp(image, options)
	},
}
