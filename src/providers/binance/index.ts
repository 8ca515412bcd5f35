export * from './binance-rest-client'
export * from './binance-stream-client'
export * from './types'
