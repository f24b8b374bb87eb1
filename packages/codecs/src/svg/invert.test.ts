import { describe, expect, it } from 'vitest'
import { invertStyle, invertSvg, invertSvgBytes } from './invert'

const NS = 'xmlns="http://www.w3.org/2000/svg"'

describe('invertStyle', () => {
	it('rewrites color declarations and keeps the rest', () => {
		expect(invertStyle('fill:#000;stroke: red !important; opacity:0.5')).toEqual({
			style: 'fill:#FFFFFF;stroke: #FF0000 !important; opacity:0.5',
			changed: 2,
		})
	})

	it('leaves declined values alone', () => {
		expect(invertStyle('fill:none;stroke:url(#grad);color:currentColor')).toEqual({
			style: 'fill:none;stroke:url(#grad);color:currentColor',
			changed: 0,
		})
	})
})

describe('invertSvg', () => {
	it('inverts presentation attributes', () => {
		const result = invertSvg(`<svg ${NS}><rect fill="#000" stroke="none"/></svg>`)
		expect(result.changed).toBe(1)
		expect(result.data).toBe(`<svg ${NS}><rect fill="#FFFFFF" stroke="none"/></svg>`)
	})

	it('returns the source untouched when nothing changes', () => {
		const source = `<svg ${NS}>\n  <path d="M0 0" fill="currentColor"/>\n</svg>`
		const result = invertSvg(source)
		expect(result.changed).toBe(0)
		expect(result.data).toBe(source)
	})

	it('keeps functional notation and alpha', () => {
		const result = invertSvg(
			`<svg ${NS}><circle fill="rgb(0, 0, 128)" style="stop-color:rgba(255,255,255,0.5)"/></svg>`
		)
		expect(result.changed).toBe(2)
		expect(result.data).toContain('fill="rgb(127, 127, 255)"')
		expect(result.data).toContain('style="stop-color:rgba(0, 0, 0, 0.5)"')
	})

	it('reaches the root, nested elements and gradient stops', () => {
		const result = invertSvg(
			`<svg ${NS} fill="#00008080"><defs><linearGradient id="g"><stop offset="0" stop-color="#fff"/></linearGradient></defs><g><rect fill="url(#g)" color="white"/></g></svg>`
		)
		expect(result.changed).toBe(3)
		expect(result.data).toContain('fill="#7F7FFF80"')
		expect(result.data).toContain('stop-color="#000000"')
		expect(result.data).toContain('fill="url(#g)" color="#000000"')
	})

	it('rejects documents whose root is not svg', () => {
		expect(() => invertSvg('<html><body/></html>')).toThrow('Document root is not an <svg> element')
	})

	it('rejects an empty document', () => {
		expect(() => invertSvg('')).toThrow(/^Malformed SVG/)
	})
})

describe('invertSvgBytes', () => {
	it('reads UTF-8 with or without a byte order mark', () => {
		const source = new TextEncoder().encode(`<svg ${NS}><rect fill="#000"/></svg>`)
		const withBom = new Uint8Array([0xef, 0xbb, 0xbf, ...source])

		const result = invertSvgBytes(withBom)
		expect(result.changed).toBe(1)
		expect(new TextDecoder().decode(result.data)).toBe(`<svg ${NS}><rect fill="#FFFFFF"/></svg>`)
	})
})
