export * from './base/stream-socket'
export * from './base/streaming-price-client'
export * from './base/types'
export * from './binance'
export * from './coingecko'
export * from './kraken'
