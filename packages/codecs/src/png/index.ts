export * from './types'
export * from './decoder'
export * from './encoder'
export { PngCodec } from './codec'
