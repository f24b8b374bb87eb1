/**
 * Color space conversion
 */

import type { HSL, RGB } from './types'

/**
 * Convert RGB to HSL.
 * Achromatic colors (max == min) get hue 0 and saturation 0.
 */
export function rgbToHsl(r: number, g: number, b: number): HSL {
	const rn = r / 255
	const gn = g / 255
	const bn = b / 255

	const max = Math.max(rn, gn, bn)
	const min = Math.min(rn, gn, bn)
	const l = (max + min) / 2

	if (max === min) {
		return [0, 0, l]
	}

	const d = max - min
	const s = l > 0.5 ? d / (2 - max - min) : d / (max + min)

	let h = 0
	switch (max) {
		case rn:
			h = ((gn - bn) / d + (gn < bn ? 6 : 0)) / 6
			break
		case gn:
			h = ((bn - rn) / d + 2) / 6
			break
		case bn:
			h = ((rn - gn) / d + 4) / 6
			break
	}

	return [h, s, l]
}

/**
 * Convert HSL to RGB
 */
export function hslToRgb(h: number, s: number, l: number): RGB {
	if (s === 0) {
		const gray = Math.round(l * 255)
		return [gray, gray, gray]
	}

	const hue2rgb = (p: number, q: number, t: number): number => {
		let tn = t
		if (tn < 0) tn += 1
		if (tn > 1) tn -= 1
		if (tn < 1 / 6) return p + (q - p) * 6 * tn
		if (tn < 1 / 2) return q
		if (tn < 2 / 3) return p + (q - p) * (2 / 3 - tn) * 6
		return p
	}

	const q = l < 0.5 ? l * (1 + s) : l + s - l * s
	const p = 2 * l - q

	return [
		Math.round(hue2rgb(p, q, h + 1 / 3) * 255),
		Math.round(hue2rgb(p, q, h) * 255),
		Math.round(hue2rgb(p, q, h - 1 / 3) * 255),
	]
}

/**
 * Invert perceived lightness, keeping hue and saturation: l := 1 - l
 */
export function invertLightness(r: number, g: number, b: number): RGB {
	const [h, s, l] = rgbToHsl(r, g, b)
	return hslToRgb(h, s, 1 - l)
}

/**
 * Format RGB as uppercase #RRGGBB
 */
export function rgbToHex(r: number, g: number, b: number): string {
	return `#${[r, g, b].map((c) => c.toString(16).padStart(2, '0')).join('').toUpperCase()}`
}
