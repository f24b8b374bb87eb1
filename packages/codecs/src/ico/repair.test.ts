import { describe, expect, it } from 'vitest'
import { encodePng } from '../png'
import { findCodecSignature, locateBitmapHeader, repairIco } from './repair'

// Bitmap header of a 2x2, 32-bit icon image (height stored doubled)
const DIB_HEADER = [40, 0, 0, 0, 2, 0, 0, 0, 4, 0, 0, 0, 1, 0, 32, 0, ...new Array<number>(24).fill(0)]

// Bottom row first, BGRA
const DIB_PIXELS = [
	0, 0, 0, 255, 128, 0, 0, 255, // black, navy
	0, 0, 255, 255, 255, 255, 255, 255, // red, white
]

// Zero-count directory, three junk bytes, then the bitmap
const brokenBitmapIcon = new Uint8Array([0, 0, 1, 0, 0, 0, 0xaa, 0xaa, 0xaa, ...DIB_HEADER, ...DIB_PIXELS])

const png = encodePng({ width: 3, height: 1, data: new Uint8Array([255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255]) })

describe('findCodecSignature', () => {
	it('finds an embedded PNG stream', () => {
		const data = new Uint8Array([1, 2, 3, ...png])
		expect(findCodecSignature(data)).toBe(3)
	})

	it('returns -1 without one', () => {
		expect(findCodecSignature(brokenBitmapIcon)).toBe(-1)
	})
})

describe('locateBitmapHeader', () => {
	it('accepts the first plausible header', () => {
		const candidate = locateBitmapHeader(brokenBitmapIcon)
		expect(candidate?.offset).toBe(9)
		expect(candidate?.length).toBe(56)
		expect(candidate?.header).toEqual({
			size: 40,
			width: 2,
			height: 4,
			planes: 1,
			bitCount: 32,
			compression: 0,
			sizeImage: 0,
		})
	})

	it('rejects a header whose pixels run past the end', () => {
		expect(locateBitmapHeader(brokenBitmapIcon.subarray(0, brokenBitmapIcon.length - 1))).toBeNull()
	})

	it('rejects unsupported depths and plane counts', () => {
		const depth16 = brokenBitmapIcon.slice()
		depth16[9 + 14] = 16
		expect(locateBitmapHeader(depth16)).toBeNull()

		const planes2 = brokenBitmapIcon.slice()
		planes2[9 + 12] = 2
		expect(locateBitmapHeader(planes2)).toBeNull()
	})

	it('sizes 24-bit pixel data at three bytes per pixel', () => {
		const depth24 = brokenBitmapIcon.slice()
		depth24[9 + 14] = 24
		expect(locateBitmapHeader(depth24)?.length).toBe(40 + 12)
	})
})

describe('repairIco', () => {
	it('wraps an embedded PNG stream in a fresh directory', () => {
		const data = new Uint8Array([0, 0, 1, 0, 0, 0, 0xaa, 0xaa, ...png])
		const result = repairIco(data)

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.strategy).toBe('codec-signature')
		expect(Array.from(result.data.subarray(0, 22))).toEqual([
			0, 0, 1, 0, 1, 0, 3, 1, 0, 0, 1, 0, 32, 0,
			png.length & 0xff, png.length >> 8, 0, 0, 22, 0, 0, 0,
		])
		expect(result.data.subarray(22)).toEqual(png)
	})

	it('wraps a raw bitmap in a fresh directory', () => {
		const result = repairIco(brokenBitmapIcon)

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.strategy).toBe('bitmap-header')
		expect(result.diagnostics).toEqual([])
		expect(Array.from(result.data)).toEqual([
			0, 0, 1, 0, 1, 0, 2, 2, 0, 0, 1, 0, 32, 0, 56, 0, 0, 0, 22, 0, 0, 0,
			...DIB_HEADER,
			...DIB_PIXELS,
		])
	})

	it('falls through to the bitmap scan when the PNG stream is broken', () => {
		const data = new Uint8Array([...brokenBitmapIcon, 0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0])
		const result = repairIco(data)

		expect(result.ok && result.strategy).toBe('bitmap-header')
		expect(result.diagnostics.map((d) => d.code)).toEqual(['DecodeFailed'])
	})

	it('fails when nothing is found', () => {
		const result = repairIco(new Uint8Array(64).fill(0xaa))
		expect(result.ok).toBe(false)
		expect(result.diagnostics).toEqual([
			{ code: 'RepairFailed', message: 'No embedded PNG stream or bitmap header found' },
		])
	})
})
