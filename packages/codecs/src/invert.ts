/**
 * One entry point per asset: bytes and kind in, inverted bytes out
 */

import { type PixelTransform, invertLightness, transformImage } from '@lumaflip/color'
import {
	type AssetKind,
	type Diagnostic,
	type RasterFormat,
	detectRasterFormat,
	errorMessage,
} from '@lumaflip/core'
import { processIco } from './ico'
import { decodeRaster, encodeRaster } from './raster'
import { invertSvgBytes } from './svg'

export interface InvertOptions {
	transform?: PixelTransform
	/** JPEG re-encode quality */
	quality?: number
}

export type InvertResult =
	| { ok: true; data: Uint8Array; diagnostics: Diagnostic[] }
	| { ok: false; message: string; diagnostics: Diagnostic[] }

/**
 * Invert the lightness of one asset, keeping its format
 */
export function invertAsset(data: Uint8Array, kind: AssetKind, options: InvertOptions = {}): InvertResult {
	const transform = options.transform ?? invertLightness

	switch (kind) {
		case 'ico': {
			const result = processIco(data, { transform })
			return result.ok
				? { ok: true, data: result.data, diagnostics: result.diagnostics }
				: { ok: false, message: 'Unprocessable icon file', diagnostics: result.diagnostics }
		}

		case 'svg':
			try {
				const result = invertSvgBytes(data, transform)
				return {
					ok: true,
					data: result.data,
					diagnostics: result.warnings.map((message): Diagnostic => ({ code: 'MarkupWarning', message })),
				}
			} catch (err) {
				return { ok: false, message: errorMessage(err), diagnostics: [] }
			}

		default:
			return invertRaster(data, kind, transform, options.quality)
	}
}

/**
 * Decode by content (falling back to the declared format), transform,
 * and write back in the declared format with the source's channel count
 */
function invertRaster(
	data: Uint8Array,
	format: RasterFormat,
	transform: PixelTransform,
	quality: number | undefined
): InvertResult {
	try {
		const decoded = decodeRaster(data, detectRasterFormat(data) ?? format)
		const image = transformImage(decoded.image, decoded.channels, transform)
		const encoded = encodeRaster(image, format, { channels: decoded.channels, quality })
		return { ok: true, data: encoded, diagnostics: [] }
	} catch (err) {
		return {
			ok: false,
			message: errorMessage(err),
			diagnostics: [{ code: 'DecodeFailed', message: errorMessage(err) }],
		}
	}
}
