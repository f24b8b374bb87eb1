/**
 * Per-entry color transform over a parsed container
 */

import { type PixelTransform, invertLightness, transformBgra, transformImage } from '@lumaflip/color'
import { type DecodedImage, type Diagnostic, errorMessage, startsWith } from '@lumaflip/core'
import { PNG_SIGNATURE, decodePng, encodePng } from '../png'
import { ByteArena } from './arena'
import { directoryEnd, isEntryInRange, readBitmapInfoHeader, serializeDirectory } from './parser'
import {
	BITMAP_INFO_HEADER_SIZE,
	type EntryPayload,
	type IconDir,
	type IconDirEntry,
	type ProcessOptions,
} from './types'

export interface TransformResult {
	data: Uint8Array
	entries: IconDirEntry[]
	diagnostics: Diagnostic[]
}

/**
 * Tag an entry's payload by its leading bytes
 */
export function classifyPayload(data: Uint8Array, entry: IconDirEntry): EntryPayload {
	const payload = data.subarray(entry.imageOffset, entry.imageOffset + entry.bytesInRes)
	return {
		kind: startsWith(payload, PNG_SIGNATURE) ? 'png' : 'bitmap',
		offset: entry.imageOffset,
		length: entry.bytesInRes,
	}
}

/**
 * Apply the transform to every entry, then rewrite the directory table.
 * A failing entry is reported and its bytes are left as they were.
 * Entries sharing one payload range get it transformed once.
 */
export function transformIco(
	data: Uint8Array,
	header: IconDir,
	entries: readonly IconDirEntry[],
	options: ProcessOptions = {}
): TransformResult {
	const transform = options.transform ?? invertLightness
	const arena = new ByteArena(data)
	const tableEnd = directoryEnd(entries.length)
	const diagnostics: Diagnostic[] = []
	const updated = entries.map((entry) => ({ ...entry }))
	// payload range -> first entry that owns it
	const owners = new Map<string, IconDirEntry>()

	for (let index = 0; index < updated.length; index++) {
		const entry = updated[index]!

		if (!isEntryInRange(entry, tableEnd, data.length)) {
			diagnostics.push({
				code: 'EntryOutOfRange',
				message: `Payload ${entry.imageOffset}+${entry.bytesInRes} lies outside ${tableEnd}..${data.length}`,
				entry: index,
			})
			continue
		}

		const range = `${entry.imageOffset}:${entry.bytesInRes}`
		const owner = owners.get(range)
		if (owner) {
			// Shared payload: transformed once, follow wherever it moved
			entry.imageOffset = owner.imageOffset
			entry.bytesInRes = owner.bytesInRes
			continue
		}
		owners.set(range, entry)

		const payload = classifyPayload(data, entry)
		const problem =
			payload.kind === 'png'
				? transformPngEntry(arena, entry, transform)
				: transformBitmapEntry(arena, payload, transform)
		if (problem) diagnostics.push({ ...problem, entry: index })
	}

	arena.write(0, serializeDirectory(header, updated))
	return { data: arena.toBytes(), entries: updated, diagnostics }
}

/**
 * Decode, transform and re-encode a PNG payload.
 * The result goes back into the old slot when it fits, else to the end of the arena.
 */
function transformPngEntry(
	arena: ByteArena,
	entry: IconDirEntry,
	transform: PixelTransform
): Diagnostic | null {
	let decoded: DecodedImage
	try {
		decoded = decodePng(arena.view(entry.imageOffset, entry.bytesInRes))
	} catch (err) {
		return { code: 'DecodeFailed', message: `PNG decode failed: ${errorMessage(err)}` }
	}

	const output = transformImage(decoded.image, decoded.channels, transform)

	let encoded: Uint8Array
	try {
		encoded = encodePng(output, { channels: decoded.channels })
	} catch (err) {
		return { code: 'EncodeFailed', message: `PNG encode failed: ${errorMessage(err)}` }
	}

	if (encoded.length <= entry.bytesInRes) {
		arena.write(entry.imageOffset, encoded)
		arena.fill(entry.imageOffset + encoded.length, entry.bytesInRes - encoded.length)
	} else {
		entry.imageOffset = arena.append(encoded)
	}
	entry.bytesInRes = encoded.length
	return null
}

/**
 * Transform the color rows of a 32-bit bitmap payload in place.
 * Rows that the payload is too short to hold are left alone.
 */
function transformBitmapEntry(
	arena: ByteArena,
	payload: EntryPayload,
	transform: PixelTransform
): Diagnostic | null {
	if (payload.length < BITMAP_INFO_HEADER_SIZE) {
		return { code: 'InvalidBitmapHeader', message: `Payload of ${payload.length} bytes has no bitmap header` }
	}

	const header = readBitmapInfoHeader(arena.view(payload.offset, BITMAP_INFO_HEADER_SIZE), 0)
	if (header.size !== BITMAP_INFO_HEADER_SIZE) {
		return { code: 'InvalidBitmapHeader', message: `Unexpected bitmap header size ${header.size}` }
	}
	if (header.bitCount !== 32) {
		return { code: 'UnsupportedBitDepth', message: `${header.bitCount}-bit bitmaps are left unchanged` }
	}

	const width = header.width
	const height = Math.trunc(header.height / 2)
	if (width <= 0 || height <= 0) {
		return { code: 'InvalidBitmapHeader', message: `Invalid dimensions ${width}x${height}` }
	}

	const pixelStart = payload.offset + BITMAP_INFO_HEADER_SIZE
	const available = payload.offset + payload.length - pixelStart
	const rows = Math.min(height, Math.floor(available / (width * 4)))
	const pixelCount = rows * width

	transformBgra(arena.view(pixelStart, pixelCount * 4), 0, pixelCount, transform)

	if (rows < height) {
		return {
			code: 'PixelDataTruncated',
			message: `Pixel data holds ${rows} of ${height} rows`,
		}
	}
	return null
}
