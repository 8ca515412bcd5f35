export * from './mempool-client'
export * from './network-stats-poller'
