export * from './query'
export * from './range'
