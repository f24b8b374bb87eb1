/**
 * ICO format types and constants
 */

import type { Diagnostic } from '@lumaflip/core'
import type { PixelTransform } from '@lumaflip/color'

// File type constants
export const ICO_TYPE = 1 // Icon

export const ICON_DIR_SIZE = 6
export const ICON_DIR_ENTRY_SIZE = 16
export const BITMAP_INFO_HEADER_SIZE = 40

/**
 * ICONDIR header structure
 */
export interface IconDir {
	reserved: number // Should be 0, tolerated otherwise
	type: number // 1 for ICO
	count: number // Number of images
}

/**
 * ICONDIRENTRY structure
 */
export interface IconDirEntry {
	width: number // 0 means 256
	height: number // 0 means 256
	colorCount: number // 0 if >= 256 colors
	reserved: number
	planes: number
	bitCount: number
	bytesInRes: number // Size of image data
	imageOffset: number // Absolute offset to image data
}

/**
 * BITMAPINFOHEADER at the start of a raw bitmap payload
 */
export interface BitmapInfoHeader {
	size: number
	width: number
	height: number // Doubled: color rows plus mask rows
	planes: number
	bitCount: number
	compression: number
	sizeImage: number
}

/**
 * Outcome of reading the directory
 */
export type ParseResult =
	| {
			status: 'valid'
			header: IconDir
			entries: IconDirEntry[]
			validCount: number
			diagnostics: Diagnostic[]
	  }
	| {
			status: 'invalid'
			reason: 'TruncatedHeader' | 'EmptyContainer' | 'NoValidEntries'
			header: IconDir | null
			entries: IconDirEntry[]
			validCount: number
			diagnostics: Diagnostic[]
	  }

/**
 * Where an entry's bytes live and how they are encoded
 */
export interface EntryPayload {
	kind: 'png' | 'bitmap'
	offset: number
	length: number
}

/**
 * How the output container came to be
 */
export type Recovery = 'none' | 'repaired' | 'last-resort'

export type ProcessResult =
	| { ok: true; data: Uint8Array; recovery: Recovery; diagnostics: Diagnostic[] }
	| { ok: false; error: 'Unprocessable'; diagnostics: Diagnostic[] }

export interface ProcessOptions {
	/** Color function applied to every pixel; lightness inversion when omitted */
	transform?: PixelTransform
}
