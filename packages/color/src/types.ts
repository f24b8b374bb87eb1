/**
 * Color model types
 */

/** RGB color, 8-bit channels (0-255) */
export type RGB = [number, number, number]

/** RGBA color, 8-bit channels (0-255) */
export type RGBA = [number, number, number, number]

/** HSL color, every component in the unit interval (hue 1 = 360 degrees) */
export type HSL = [number, number, number]

/** Replaces the color of one pixel; alpha is never passed or returned */
export type PixelTransform = (r: number, g: number, b: number) => RGB

/** How a color token was written, so the replacement keeps the same notation */
export type ColorNotation = 'hex' | 'function' | 'named'

/**
 * A parsed CSS color token
 */
export interface ColorToken {
	rgb: RGB
	notation: ColorNotation
	/** Alpha as written: two uppercase hex digits for hex notation, the raw text for rgba() */
	alpha?: string
}
