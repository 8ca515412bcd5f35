export * from './candle'
export * from './miner'
export * from './network-stats'
export * from './price-quote'
export * from './snapshot'
