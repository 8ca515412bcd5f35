export * from './dates'
export * from './format'
export * from './freeze'
export * from './logger'
export * from './sleep'
export * from './time-source'
