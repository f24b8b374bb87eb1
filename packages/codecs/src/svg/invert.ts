/**
 * SVG color inversion: rewrites paint colors in attributes and inline styles
 */

import { type PixelTransform, invertColorToken, invertLightness } from '@lumaflip/color'
import { DOMParser, XMLSerializer } from '@xmldom/xmldom'

/** Presentation attributes and style properties that hold a color */
export const COLOR_PROPERTIES: ReadonlySet<string> = new Set([
	'fill',
	'stroke',
	'stop-color',
	'flood-color',
	'lighting-color',
	'color',
])

const DECLARATION_PATTERN = /^(\s*)([\w-]+)(\s*:\s*)(.*?)(\s*!important)?(\s*)$/i

export interface SvgInvertResult {
	data: string
	/** Number of color values rewritten */
	changed: number
	warnings: string[]
}

/**
 * Rewrite the color declarations of an inline style.
 * Declarations that hold no concrete color are kept as written.
 */
export function invertStyle(
	style: string,
	transform: PixelTransform = invertLightness
): { style: string; changed: number } {
	let changed = 0
	const declarations = style.split(';').map((declaration) => {
		const match = DECLARATION_PATTERN.exec(declaration)
		if (!match) return declaration

		const [, lead = '', property = '', colon = '', value = '', important = '', trail = ''] = match
		if (!COLOR_PROPERTIES.has(property.toLowerCase())) return declaration

		const inverted = invertColorToken(value, transform)
		if (inverted === null) return declaration

		changed++
		return `${lead}${property}${colon}${inverted}${important}${trail}`
	})
	return { style: declarations.join(';'), changed }
}

/**
 * Invert every paint color of an SVG document.
 * Throws when the markup is not well-formed or its root is not <svg>.
 */
export function invertSvg(source: string, transform: PixelTransform = invertLightness): SvgInvertResult {
	const warnings: string[] = []
	const errors: string[] = []

	const parser = new DOMParser({
		errorHandler: {
			warning: (msg: string) => warnings.push(msg),
			error: (msg: string) => errors.push(msg),
			fatalError: (msg: string) => errors.push(msg),
		},
	})
	const doc = parser.parseFromString(source, 'image/svg+xml')

	if (errors.length > 0) {
		throw new Error(`Malformed SVG: ${errors[0]}`)
	}
	const root = doc?.documentElement
	if (!root || root.localName !== 'svg') {
		throw new Error('Document root is not an <svg> element')
	}

	let changed = 0
	const elements = doc.getElementsByTagName('*')

	for (let i = 0; i < elements.length; i++) {
		const element = elements.item(i)
		if (!element) continue

		for (const name of COLOR_PROPERTIES) {
			if (!element.hasAttribute(name)) continue
			const inverted = invertColorToken(element.getAttribute(name) ?? '', transform)
			if (inverted === null) continue
			element.setAttribute(name, inverted)
			changed++
		}

		if (element.hasAttribute('style')) {
			const result = invertStyle(element.getAttribute('style') ?? '', transform)
			if (result.changed > 0) {
				element.setAttribute('style', result.style)
				changed += result.changed
			}
		}
	}

	const data = changed > 0 ? new XMLSerializer().serializeToString(doc) : source
	return { data, changed, warnings }
}

/**
 * Byte-level wrapper over invertSvg; input is read as UTF-8
 */
export function invertSvgBytes(
	data: Uint8Array,
	transform: PixelTransform = invertLightness
): { data: Uint8Array; changed: number; warnings: string[] } {
	const result = invertSvg(new TextDecoder().decode(data), transform)
	return { ...result, data: new TextEncoder().encode(result.data) }
}
