import type { AssetKind, RasterFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<RasterFormat, { bytes: number[]; offset?: number }> = {
	png: { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
	jpeg: { bytes: [0xff, 0xd8, 0xff] },
	bmp: { bytes: [0x42, 0x4d] }, // "BM"
}

/**
 * File extension to asset kind
 */
const EXTENSIONS: Record<string, AssetKind> = {
	svg: 'svg',
	ico: 'ico',
	png: 'png',
	jpg: 'jpeg',
	jpeg: 'jpeg',
	bmp: 'bmp',
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: { bytes: number[]; offset?: number }): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Detect a raster format from binary data
 */
export function detectRasterFormat(data: Uint8Array): RasterFormat | null {
	if (matchMagic(data, MAGIC_BYTES.png)) return 'png'
	if (matchMagic(data, MAGIC_BYTES.jpeg)) return 'jpeg'
	if (matchMagic(data, MAGIC_BYTES.bmp)) return 'bmp'
	return null
}

/**
 * Asset kind for a file path, by extension (case-insensitive)
 */
export function assetKindFromPath(path: string): AssetKind | null {
	const dot = path.lastIndexOf('.')
	const slash = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'))
	if (dot <= slash + 1) return null
	return EXTENSIONS[path.slice(dot + 1).toLowerCase()] ?? null
}
