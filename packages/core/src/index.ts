/**
 * @lumaflip/core - shared image types, format detection and binary helpers
 */

export * from './types'
export * from './format'
export * from './binary'
export * from './pipeline'
