export * from './coingecko-rest-client'
