export * from './health-monitor'
export * from './rest-fallback-manager'
export * from './rest-price-poller'
export * from './scheduled-task'
export * from './symbol-rotator'
