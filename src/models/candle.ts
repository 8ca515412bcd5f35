import type { EpochDate } from '../utils/dates'

/**
 * Fixed-duration OHLC bucket of price ticks
 */
export interface Candle {
  /** Start of the bucket (epoch ms, aligned to the duration) */
  readonly bucketStart: EpochDate
  /** Bucket length in seconds */
  readonly durationSeconds: number
  readonly open: number
  readonly high: number
  readonly low: number
  readonly close: number
}

/**
 * Validates the OHLC relationships of a candle
 * @returns true when high >= max(open, close) and low <= min(open, close)
 */
export function isValidCandle(candle: Candle): boolean {
  const values = [candle.open, candle.high, candle.low, candle.close]
  if (values.some(value => !Number.isFinite(value) || value < 0)) {
    return false
  }

  return candle.high >= Math.max(candle.open, candle.close) &&
    candle.low <= Math.min(candle.open, candle.close)
}
