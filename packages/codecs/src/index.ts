/**
 * @lumaflip/codecs - raster codecs, icon container repair and inversion, SVG color inversion
 */

export * from './png'
export * from './jpeg'
export * from './bmp'
export * from './ico'
export * from './svg'
export * from './raster'
export * from './invert'
