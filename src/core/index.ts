export * from './dashboard-core'
