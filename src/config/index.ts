export * from './config-loader'
export * from './dashboard-config'
