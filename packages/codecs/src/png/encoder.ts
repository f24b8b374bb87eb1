import type { EncodeOptions, ImageData } from '@lumaflip/core'
import { PNG } from 'pngjs'
import { ColorType } from './types'

/**
 * Encode RGBA image data to PNG.
 * 3-channel output drops the alpha channel (color type 2).
 */
export function encodePng(image: ImageData, options: EncodeOptions = {}): Uint8Array {
	const { width, height, data } = image
	if (data.length !== width * height * 4) {
		throw new Error(`Pixel buffer is ${data.length} bytes, expected ${width * height * 4}`)
	}

	const png = new PNG({ width, height })
	png.data = Buffer.from(data)

	const encoded = PNG.sync.write(png, {
		colorType: options.channels === 3 ? ColorType.RGB : ColorType.RGBA,
		inputColorType: ColorType.RGBA,
	})
	return new Uint8Array(encoded)
}
