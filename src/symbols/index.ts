export * from './symbol-registry'
