export * from './candles'
export * from './config'
export * from './core'
export * from './miners'
export * from './models'
export * from './network'
export * from './network-stats'
export * from './pipeline'
export * from './providers'
export * from './state'
export * from './symbols'
export * from './utils'
export { formatStatusLine } from './cli/status-line'
