/**
 * @lumaflip/color - HSL color model, lightness inversion and CSS color tokens
 */

export * from './types'
export * from './convert'
export * from './invert'
export * from './parse'
