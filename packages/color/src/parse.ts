/**
 * CSS color tokens: parse, invert, and write back in the original notation
 */

import { invertLightness, rgbToHex } from './convert'
import namedColors from './named-colors.json'
import type { ColorToken, PixelTransform, RGB } from './types'

const NAMED_COLORS: Record<string, string> = namedColors

/** Keywords that carry no concrete color */
const DECLINED_KEYWORDS = new Set([
	'none',
	'transparent',
	'currentcolor',
	'inherit',
	'initial',
	'unset',
	'context-fill',
	'context-stroke',
])

const HEX_PATTERN = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i
const FUNCTION_PATTERN = /^rgba?\(([^)]*)\)$/i
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(%?)$/

/**
 * Parse a color token, or return null when it names no concrete color
 */
export function parseColor(token: string): ColorToken | null {
	const value = token.trim()
	const lower = value.toLowerCase()
	if (value === '' || DECLINED_KEYWORDS.has(lower) || lower.startsWith('url(')) {
		return null
	}

	const hex = HEX_PATTERN.exec(value)
	if (hex) return parseHex(hex[1]!)

	const fn = FUNCTION_PATTERN.exec(value)
	if (fn) return parseFunction(fn[1]!)

	const named = NAMED_COLORS[lower]
	if (named) {
		return { rgb: parseHex(named.slice(1)).rgb, notation: 'named' }
	}

	return null
}

function parseHex(digits: string): ColorToken {
	const full =
		digits.length <= 4
			? digits
					.split('')
					.map((c) => c + c)
					.join('')
			: digits

	const token: ColorToken = {
		rgb: [
			Number.parseInt(full.slice(0, 2), 16),
			Number.parseInt(full.slice(2, 4), 16),
			Number.parseInt(full.slice(4, 6), 16),
		],
		notation: 'hex',
	}
	if (full.length === 8) token.alpha = full.slice(6, 8).toUpperCase()
	return token
}

/**
 * rgb()/rgba() body in either comma or space syntax:
 * `0, 128, 255`, `0, 128, 255, 0.5`, `0 128 255 / 50%`
 */
function parseFunction(body: string): ColorToken | null {
	const [colorPart = '', slashAlpha, ...rest] = body.split('/')
	if (rest.length > 0) return null

	const parts = colorPart.split(/[\s,]+/).filter((part) => part !== '')
	let alpha = slashAlpha?.trim()
	if (parts.length === 4 && alpha === undefined) {
		alpha = parts.pop()
	}
	if (parts.length !== 3 || alpha === '') return null

	const rgb: number[] = []
	for (const part of parts) {
		const match = NUMBER_PATTERN.exec(part)
		if (!match) return null
		const value = Number.parseFloat(part)
		const scaled = match[2] === '%' ? (value * 255) / 100 : value
		rgb.push(Math.round(Math.min(255, Math.max(0, scaled))))
	}

	const token: ColorToken = { rgb: [rgb[0]!, rgb[1]!, rgb[2]!], notation: 'function' }
	if (alpha !== undefined) token.alpha = alpha
	return token
}

/**
 * Write a color in the notation the token was parsed from
 */
export function formatColor(token: ColorToken, rgb: RGB = token.rgb): string {
	switch (token.notation) {
		case 'function':
			return token.alpha === undefined
				? `rgb(${rgb.join(', ')})`
				: `rgba(${rgb.join(', ')}, ${token.alpha})`
		case 'hex':
			return rgbToHex(...rgb) + (token.alpha ?? '')
		case 'named':
			return rgbToHex(...rgb)
	}
}

/**
 * Lightness-inverted form of a color token, or null when the token is declined
 */
export function invertColorToken(
	token: string,
	transform: PixelTransform = invertLightness
): string | null {
	const parsed = parseColor(token)
	if (!parsed) return null
	return formatColor(parsed, transform(...parsed.rgb))
}
