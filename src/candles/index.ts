export * from './candle-builder'
