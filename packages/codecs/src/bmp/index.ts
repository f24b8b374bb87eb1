export * from './decoder'
export * from './encoder'
export { BmpCodec } from './codec'
