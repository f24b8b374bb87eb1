export { DEFAULT_JPEG_QUALITY, JpegCodec, decodeJpeg, encodeJpeg } from './codec'
