export * from './backoff'
export * from './decode'
export * from './errors'
export * from './http-client'
