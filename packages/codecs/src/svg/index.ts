export * from './invert'
