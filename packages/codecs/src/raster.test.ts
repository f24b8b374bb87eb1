import { describe, expect, it } from 'vitest'
import { encodeBmp } from './bmp'
import { encodeJpeg } from './jpeg'
import { encodePng } from './png'
import { decodeRaster, decodeRasterForced, encodeRaster } from './raster'

const image = { width: 1, height: 2, data: new Uint8Array([200, 100, 50, 255, 5, 10, 15, 255]) }

describe('decodeRaster', () => {
	it('detects the format from magic bytes', () => {
		expect(decodeRaster(encodePng(image)).format).toBe('png')
		expect(decodeRaster(encodeJpeg(image)).format).toBe('jpeg')
		expect(decodeRaster(encodeBmp(image)).format).toBe('bmp')
	})

	it('throws on unknown data without a hint', () => {
		expect(() => decodeRaster(new Uint8Array([1, 2, 3]))).toThrow('Unknown image format')
	})

	it('uses the given format', () => {
		expect(() => decodeRaster(encodePng(image), 'bmp')).toThrow('Invalid BMP signature')
	})
})

describe('decodeRasterForced', () => {
	it('decodes whatever codec accepts the data', () => {
		const decoded = decodeRasterForced(encodeBmp(image))
		expect(decoded.format).toBe('bmp')
		expect(Array.from(decoded.image.data)).toEqual(Array.from(image.data))
	})

	it('lists every failure when nothing decodes', () => {
		expect(() => decodeRasterForced(new Uint8Array(8))).toThrow(
			/^No decoder accepted the data \(png: .*; jpeg: .*; bmp: Invalid BMP signature\)$/
		)
	})
})

describe('encodeRaster', () => {
	it('dispatches on format', () => {
		expect(encodeRaster(image, 'png')[0]).toBe(0x89)
		expect(encodeRaster(image, 'jpeg')[0]).toBe(0xff)
		expect(encodeRaster(image, 'bmp')[0]).toBe(0x42)
	})
})
