import { describe, expect, it } from 'vitest'
import { decodeJpeg, encodeJpeg } from './codec'

function solid(width: number, height: number, rgb: [number, number, number]) {
	const data = new Uint8Array(width * height * 4)
	for (let i = 0; i < data.length; i += 4) {
		data.set([...rgb, 255], i)
	}
	return { width, height, data }
}

describe('JPEG codec', () => {
	it('encodes a baseline JPEG', () => {
		const encoded = encodeJpeg(solid(8, 8, [120, 60, 30]))
		expect(Array.from(encoded.subarray(0, 3))).toEqual([0xff, 0xd8, 0xff])
		expect(Array.from(encoded.subarray(-2))).toEqual([0xff, 0xd9])
	})

	it('decodes to an opaque 3-channel image', () => {
		const decoded = decodeJpeg(encodeJpeg(solid(16, 8, [128, 128, 128])))
		expect(decoded.format).toBe('jpeg')
		expect(decoded.channels).toBe(3)
		expect(decoded.image.width).toBe(16)
		expect(decoded.image.height).toBe(8)

		for (let i = 0; i < decoded.image.data.length; i += 4) {
			expect(Math.abs(decoded.image.data[i]! - 128)).toBeLessThanOrEqual(3)
			expect(decoded.image.data[i + 3]).toBe(255)
		}
	})

	it('gets smaller at lower quality', () => {
		const image = solid(32, 32, [0, 0, 0])
		for (let i = 0; i < image.data.length; i += 4) {
			image.data[i] = (i * 7) & 0xff
			image.data[i + 1] = (i * 13) & 0xff
		}
		const low = encodeJpeg(image, { quality: 10 })
		const high = encodeJpeg(image, { quality: 95 })
		expect(low.length).toBeLessThan(high.length)
	})

	it('rejects data without a start-of-image marker', () => {
		expect(() => decodeJpeg(new Uint8Array([1, 2, 3, 4]))).toThrow()
	})
})
