/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Number of meaningful channels in a decoded image.
 * 3-channel images still carry an RGBA buffer, with alpha fixed at 255.
 */
export type ChannelCount = 3 | 4

/**
 * Raster formats the codecs can decode and encode
 */
export type RasterFormat = 'png' | 'jpeg' | 'bmp'

/**
 * Every asset kind the inverter understands
 */
export type AssetKind = RasterFormat | 'ico' | 'svg'

/**
 * Decoder output: pixels plus what the source actually stored
 */
export interface DecodedImage {
	readonly image: ImageData
	readonly channels: ChannelCount
	readonly format: RasterFormat
}

/**
 * Encode options
 */
export interface EncodeOptions {
	quality?: number // 0-100, lossy formats only
	channels?: ChannelCount // defaults to 4
}

/**
 * Codec interface for encoding/decoding raster images
 */
export interface ImageCodec {
	readonly format: RasterFormat
	decode(data: Uint8Array): DecodedImage
	encode(image: ImageData, options?: EncodeOptions): Uint8Array
}

/**
 * Non-fatal event codes reported by the inverters
 */
export type DiagnosticCode =
	| 'TruncatedHeader'
	| 'EmptyContainer'
	| 'NoValidEntries'
	| 'DirectoryTruncated'
	| 'EntryOutOfRange'
	| 'UnsupportedBitDepth'
	| 'InvalidBitmapHeader'
	| 'PixelDataTruncated'
	| 'DecodeFailed'
	| 'EncodeFailed'
	| 'RepairFailed'
	| 'Unprocessable'
	| 'MarkupWarning'

/**
 * Something the caller should hear about; `entry` is the directory index when it concerns one image
 */
export interface Diagnostic {
	code: DiagnosticCode
	message: string
	entry?: number
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
