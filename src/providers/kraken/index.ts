export * from './kraken-rest-client'
export * from './kraken-stream-client'
export * from './types'
