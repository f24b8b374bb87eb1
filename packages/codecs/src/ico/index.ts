export * from './types'
export { ByteArena } from './arena'
export * from './parser'
export * from './repair'
export * from './transform'
export { recoverIco, type RecoverResult } from './recover'
export * from './encoder'
export * from './decoder'
export { processBuffer, processIco } from './process'
