import { invertImage } from '@lumaflip/color'
import { describe, expect, it } from 'vitest'
import { decodeBmp, encodeBmp } from './bmp'
import { decodeIco, encodeIco } from './ico'
import { decodeJpeg, encodeJpeg } from './jpeg'
import { decodePng, encodePng } from './png'
import { invertAsset } from './invert'

const image = {
	width: 2,
	height: 1,
	data: new Uint8Array([0, 0, 0, 255, 0, 0, 128, 100]),
}

describe('invertAsset', () => {
	it('inverts PNG files and keeps alpha', () => {
		const result = invertAsset(encodePng(image), 'png')
		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(Array.from(decodePng(result.data).image.data)).toEqual([255, 255, 255, 255, 127, 127, 255, 100])
	})

	it('writes 3-channel BMP files back as 24-bit', () => {
		const result = invertAsset(encodeBmp(image, { channels: 3 }), 'bmp')
		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.data[28]).toBe(24)
		expect(Array.from(decodeBmp(result.data).image.data)).toEqual([255, 255, 255, 255, 127, 127, 255, 255])
	})

	it('re-encodes JPEG files as JPEG', () => {
		const result = invertAsset(encodeJpeg(image), 'jpeg', { quality: 90 })
		expect(result.ok).toBe(true)
		if (!result.ok) return
		const decoded = decodeJpeg(result.data)
		expect(decoded.image.width).toBe(2)
		expect(decoded.image.height).toBe(1)
	})

	it('decodes by content and writes the declared format', () => {
		const result = invertAsset(encodePng(image), 'bmp')
		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.data[0]).toBe(0x42)
		expect(decodeBmp(result.data).channels).toBe(4)
	})

	it('inverts icon files', () => {
		const result = invertAsset(encodeIco([image]), 'ico')
		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(decodeIco(result.data)[0]?.image.data).toEqual(invertImage(image).data)
	})

	it('reports unprocessable icon files', () => {
		const result = invertAsset(new Uint8Array([0, 0, 1, 0]), 'ico')
		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.message).toBe('Unprocessable icon file')
		expect(result.diagnostics.at(-1)?.code).toBe('Unprocessable')
	})

	it('inverts SVG markup', () => {
		const svg = new TextEncoder().encode('<svg xmlns="http://www.w3.org/2000/svg" fill="#fff"/>')
		const result = invertAsset(svg, 'svg')
		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(new TextDecoder().decode(result.data)).toBe('<svg xmlns="http://www.w3.org/2000/svg" fill="#000000"/>')
	})

	it('reports markup that is not SVG', () => {
		const result = invertAsset(new TextEncoder().encode('<html/>'), 'svg')
		expect(result).toEqual({ ok: false, message: 'Document root is not an <svg> element', diagnostics: [] })
	})

	it('reports undecodable rasters', () => {
		const result = invertAsset(new Uint8Array([1, 2, 3, 4]), 'png')
		expect(result).toEqual({
			ok: false,
			message: 'Invalid PNG signature',
			diagnostics: [{ code: 'DecodeFailed', message: 'Invalid PNG signature' }],
		})
	})
})
