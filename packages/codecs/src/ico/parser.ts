import {
	type Diagnostic,
	readI32LE,
	readU16LE,
	readU32LE,
	writeU16LE,
	writeU32LE,
} from '@lumaflip/core'
import {
	type BitmapInfoHeader,
	ICON_DIR_ENTRY_SIZE,
	ICON_DIR_SIZE,
	type IconDir,
	type IconDirEntry,
	type ParseResult,
} from './types'

/**
 * Read ICONDIR header
 */
export function readIconDir(data: Uint8Array): IconDir {
	return {
		reserved: readU16LE(data, 0),
		type: readU16LE(data, 2),
		count: readU16LE(data, 4),
	}
}

export function writeIconDir(data: Uint8Array, header: IconDir): void {
	writeU16LE(data, 0, header.reserved)
	writeU16LE(data, 2, header.type)
	writeU16LE(data, 4, header.count)
}

/**
 * Read ICONDIRENTRY
 */
export function readIconDirEntry(data: Uint8Array, offset: number): IconDirEntry {
	return {
		width: data[offset] ?? 0,
		height: data[offset + 1] ?? 0,
		colorCount: data[offset + 2] ?? 0,
		reserved: data[offset + 3] ?? 0,
		planes: readU16LE(data, offset + 4),
		bitCount: readU16LE(data, offset + 6),
		bytesInRes: readU32LE(data, offset + 8),
		imageOffset: readU32LE(data, offset + 12),
	}
}

export function writeIconDirEntry(data: Uint8Array, offset: number, entry: IconDirEntry): void {
	data[offset] = entry.width & 0xff
	data[offset + 1] = entry.height & 0xff
	data[offset + 2] = entry.colorCount & 0xff
	data[offset + 3] = entry.reserved & 0xff
	writeU16LE(data, offset + 4, entry.planes)
	writeU16LE(data, offset + 6, entry.bitCount)
	writeU32LE(data, offset + 8, entry.bytesInRes)
	writeU32LE(data, offset + 12, entry.imageOffset)
}

/**
 * Read BITMAPINFOHEADER
 */
export function readBitmapInfoHeader(data: Uint8Array, offset: number): BitmapInfoHeader {
	return {
		size: readU32LE(data, offset),
		width: readI32LE(data, offset + 4),
		height: readI32LE(data, offset + 8),
		planes: readU16LE(data, offset + 12),
		bitCount: readU16LE(data, offset + 14),
		compression: readU32LE(data, offset + 16),
		sizeImage: readU32LE(data, offset + 20),
	}
}

/**
 * Offset just past a directory of `count` entries
 */
export function directoryEnd(count: number): number {
	return ICON_DIR_SIZE + count * ICON_DIR_ENTRY_SIZE
}

/**
 * Whether the payload starts past the directory table and ends inside the buffer
 */
export function isEntryInRange(entry: IconDirEntry, tableEnd: number, bufferLength: number): boolean {
	return entry.imageOffset >= tableEnd && entry.imageOffset + entry.bytesInRes <= bufferLength
}

/**
 * Write header and entries into a new directory table
 */
export function serializeDirectory(header: IconDir, entries: readonly IconDirEntry[]): Uint8Array {
	const table = new Uint8Array(directoryEnd(entries.length))
	writeIconDir(table, header)
	for (let i = 0; i < entries.length; i++) {
		writeIconDirEntry(table, directoryEnd(i), entries[i]!)
	}
	return table
}

/**
 * Parse the ICO directory.
 * Never throws: a short directory table is clamped to the entries that fit,
 * and entries whose payload overlaps the table or runs past the buffer are kept
 * but not counted as valid.
 */
export function parseIco(data: Uint8Array): ParseResult {
	const diagnostics: Diagnostic[] = []

	if (data.length < ICON_DIR_SIZE) {
		diagnostics.push({
			code: 'TruncatedHeader',
			message: `File is ${data.length} bytes, shorter than the ${ICON_DIR_SIZE}-byte header`,
		})
		return {
			status: 'invalid',
			reason: 'TruncatedHeader',
			header: null,
			entries: [],
			validCount: 0,
			diagnostics,
		}
	}

	const header = readIconDir(data)

	if (header.count === 0) {
		diagnostics.push({ code: 'EmptyContainer', message: 'Directory declares no images' })
		return { status: 'invalid', reason: 'EmptyContainer', header, entries: [], validCount: 0, diagnostics }
	}

	let count = header.count
	if (data.length < directoryEnd(count)) {
		count = Math.floor((data.length - ICON_DIR_SIZE) / ICON_DIR_ENTRY_SIZE)
		diagnostics.push({
			code: 'DirectoryTruncated',
			message: `Directory declares ${header.count} entries but only ${count} fit in the file`,
		})
	}

	const entries: IconDirEntry[] = []
	const tableEnd = directoryEnd(count)
	let validCount = 0

	for (let i = 0; i < count; i++) {
		const entry = readIconDirEntry(data, directoryEnd(i))
		entries.push(entry)
		if (isEntryInRange(entry, tableEnd, data.length)) validCount++
	}

	if (validCount === 0) {
		diagnostics.push({
			code: 'NoValidEntries',
			message:
				entries.length === 0
					? 'No directory entry fits in the file'
					: 'Every directory entry points outside the payload area',
		})
		return { status: 'invalid', reason: 'NoValidEntries', header, entries, validCount, diagnostics }
	}

	return { status: 'valid', header, entries, validCount, diagnostics }
}
