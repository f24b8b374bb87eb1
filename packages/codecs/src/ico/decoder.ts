import { type DecodedImage, startsWith } from '@lumaflip/core'
import { decodeDib } from '../bmp'
import { PNG_SIGNATURE, decodePng } from '../png'
import { parseIco } from './parser'
import type { IconDirEntry } from './types'

/**
 * Decode the image one directory entry points at
 */
export function decodeIcoEntry(data: Uint8Array, entry: IconDirEntry): DecodedImage {
	const end = entry.imageOffset + entry.bytesInRes
	if (end > data.length) {
		throw new Error('ICO entry points outside the file')
	}

	const payload = data.subarray(entry.imageOffset, end)
	return startsWith(payload, PNG_SIGNATURE) ? decodePng(payload) : decodeDib(payload)
}

/**
 * Decode every in-range entry of an ICO file
 */
export function decodeIco(data: Uint8Array): DecodedImage[] {
	const parsed = parseIco(data)
	if (parsed.status === 'invalid') {
		throw new Error(`Invalid ICO file: ${parsed.reason}`)
	}

	return parsed.entries
		.filter((entry) => entry.imageOffset + entry.bytesInRes <= data.length)
		.map((entry) => decodeIcoEntry(data, entry))
}
