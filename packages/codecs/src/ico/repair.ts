/**
 * Rebuild a container from bytes whose directory cannot be trusted
 */

import { type Diagnostic, errorMessage, indexOfSignature } from '@lumaflip/core'
import { PNG_SIGNATURE } from '../png'
import { decodeRaster } from '../raster'
import { wrapSingleEntry } from './encoder'
import { readBitmapInfoHeader } from './parser'
import { BITMAP_INFO_HEADER_SIZE, type BitmapInfoHeader } from './types'

export interface BitmapCandidate {
	offset: number
	header: BitmapInfoHeader
	/** Header plus the color rows */
	length: number
}

export type RepairResult =
	| { ok: true; data: Uint8Array; strategy: 'codec-signature' | 'bitmap-header'; diagnostics: Diagnostic[] }
	| { ok: false; diagnostics: Diagnostic[] }

/**
 * First offset of an embedded PNG stream, or -1
 */
export function findCodecSignature(data: Uint8Array): number {
	return indexOfSignature(data, PNG_SIGNATURE)
}

/**
 * Probe every offset for a plausible BITMAPINFOHEADER whose color rows fit in the buffer
 */
export function locateBitmapHeader(data: Uint8Array): BitmapCandidate | null {
	for (let offset = 0; offset + BITMAP_INFO_HEADER_SIZE <= data.length; offset++) {
		const header = readBitmapInfoHeader(data, offset)
		if (
			header.size !== BITMAP_INFO_HEADER_SIZE ||
			header.width <= 0 ||
			header.height <= 0 ||
			(header.bitCount !== 24 && header.bitCount !== 32) ||
			header.planes !== 1
		) {
			continue
		}

		const pixelBytes = header.width * Math.trunc(header.height / 2) * (header.bitCount / 8)
		const length = BITMAP_INFO_HEADER_SIZE + pixelBytes
		if (offset + length > data.length) continue

		return { offset, header, length }
	}
	return null
}

/**
 * Try the PNG signature scan, then the bitmap header scan.
 * The first hit becomes the only entry of a fresh container.
 */
export function repairIco(data: Uint8Array): RepairResult {
	const diagnostics: Diagnostic[] = []

	const signatureAt = findCodecSignature(data)
	if (signatureAt >= 0) {
		const payload = data.subarray(signatureAt)
		try {
			const { image } = decodeRaster(payload, 'png')
			return {
				ok: true,
				data: wrapSingleEntry(payload, { width: image.width, height: image.height, bitCount: 32 }),
				strategy: 'codec-signature',
				diagnostics,
			}
		} catch (err) {
			diagnostics.push({
				code: 'DecodeFailed',
				message: `PNG stream at offset ${signatureAt} did not decode: ${errorMessage(err)}`,
			})
		}
	}

	const candidate = locateBitmapHeader(data)
	if (candidate) {
		const { offset, header, length } = candidate
		return {
			ok: true,
			data: wrapSingleEntry(data.subarray(offset, offset + length), {
				width: header.width,
				height: Math.trunc(header.height / 2),
				bitCount: header.bitCount,
			}),
			strategy: 'bitmap-header',
			diagnostics,
		}
	}

	diagnostics.push({ code: 'RepairFailed', message: 'No embedded PNG stream or bitmap header found' })
	return { ok: false, diagnostics }
}
