import { invertLightness, transformImage } from '@lumaflip/color'
import { type DecodedImage, type Diagnostic, errorMessage } from '@lumaflip/core'
import { encodePng } from '../png'
import { decodeRasterForced } from '../raster'
import { wrapSingleEntry } from './encoder'
import type { ProcessOptions } from './types'

export type RecoverResult =
	| { ok: true; data: Uint8Array; diagnostics: Diagnostic[] }
	| { ok: false; diagnostics: Diagnostic[] }

/**
 * Treat the whole file as a plain raster image and wrap the transformed
 * result as a one-entry container with a PNG payload
 */
export function recoverIco(data: Uint8Array, options: ProcessOptions = {}): RecoverResult {
	let decoded: DecodedImage
	try {
		decoded = decodeRasterForced(data)
	} catch (err) {
		return { ok: false, diagnostics: [{ code: 'DecodeFailed', message: errorMessage(err) }] }
	}

	const image = transformImage(decoded.image, decoded.channels, options.transform ?? invertLightness)

	let payload: Uint8Array
	try {
		payload = encodePng(image, { channels: decoded.channels })
	} catch (err) {
		return { ok: false, diagnostics: [{ code: 'EncodeFailed', message: errorMessage(err) }] }
	}

	return {
		ok: true,
		data: wrapSingleEntry(payload, { width: image.width, height: image.height, bitCount: 32 }),
		diagnostics: [],
	}
}
