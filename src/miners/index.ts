export * from './miner-aggregator'
export * from './miner-client'
export * from './miner-poller'
export * from './miner-state'
